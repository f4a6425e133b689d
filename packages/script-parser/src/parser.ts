import { readFile } from 'node:fs/promises';

import { ParseError } from '@voicescript/contracts';

import { normalizeSource, sanitizeText } from './sanitize.js';
import type {
  AliasTable,
  DiagnosticKind,
  HeadingLevel,
  ParseDiagnostic,
  ParsedDocument,
  RawSegment,
  Section,
} from './types.js';

const HEADING_RE = /^ {0,3}(#{1,6})[ \t]+(\S.*)$/;
const ALIAS_RE = /\[alias:([^[\]]*)\]/g;
const VOICE_RE = /\[voice:([^[\]]*)\]/g;

function toHeadingLevel(hashes: string): HeadingLevel {
  switch (hashes.length) {
    case 1:
      return 1;
    case 2:
      return 2;
    case 3:
      return 3;
    case 4:
      return 4;
    case 5:
      return 5;
    default:
      return 6;
  }
}

function splitAlias(inner: string): { name: string; target: string } | null {
  const eq = inner.indexOf('=');
  if (eq === -1) return null;
  const name = inner.slice(0, eq).trim();
  const target = inner.slice(eq + 1).trim();
  if (!name || !target) return null;
  return { name, target };
}

class DocumentBuilder {
  readonly sections: Section[] = [];
  readonly roots: number[] = [];
  readonly aliases: AliasTable = new Map();
  readonly diagnostics: ParseDiagnostic[] = [];

  private open: number[] = [];
  private current: RawSegment | null = null;
  private paragraphBreak = false;

  get inPreamble(): boolean {
    return this.sections.length === 0;
  }

  report(kind: DiagnosticKind, line: number, message: string): void {
    this.diagnostics.push({ kind, line, message });
  }

  openSection(level: HeadingLevel, title: string, line: number): void {
    while (this.open.length > 0) {
      const top = this.sections[this.open[this.open.length - 1] ?? -1];
      if (!top || top.level < level) break;
      this.open.pop();
    }
    const parent = this.open.length > 0 ? (this.open[this.open.length - 1] ?? null) : null;
    const section: Section = {
      id: this.sections.length,
      level,
      title,
      parent,
      children: [],
      body: [],
      line,
    };
    this.sections.push(section);
    if (parent === null) {
      this.roots.push(section.id);
    } else {
      this.sections[parent]?.children.push(section.id);
    }
    this.open.push(section.id);
    this.current = null;
    this.paragraphBreak = false;
  }

  defineAlias(name: string, target: string, line: number): void {
    const previous = this.aliases.get(name);
    if (previous !== undefined && previous !== target) {
      this.report('duplicate-alias', line, `alias "${name}" redefined from "${previous}" to "${target}"`);
    }
    this.aliases.set(name, target);
  }

  startSegment(directive: string, line: number): void {
    const section = this.sections[this.sections.length - 1];
    if (!section) return;
    this.current = { directive, text: '', line };
    section.body.push(this.current);
    this.paragraphBreak = false;
  }

  appendText(chunk: string, line: number): void {
    const text = sanitizeText(chunk);
    if (!text) return;
    const section = this.sections[this.sections.length - 1];
    if (!section) return;
    if (!this.current) {
      this.current = { text: '', line };
      section.body.push(this.current);
    }
    if (!this.current.text) {
      this.current.text = text;
    } else {
      this.current.text += this.paragraphBreak ? `\n\n${text}` : ` ${text}`;
    }
    this.paragraphBreak = false;
  }

  blankLine(): void {
    if (this.current?.text) this.paragraphBreak = true;
  }

  build(): ParsedDocument {
    return {
      sections: this.sections,
      roots: this.roots,
      aliases: this.aliases,
      diagnostics: this.diagnostics,
    };
  }
}

function scanPreambleLine(doc: DocumentBuilder, line: string, lineNo: number): void {
  let leftover = '';
  let cursor = 0;
  for (const match of line.matchAll(ALIAS_RE)) {
    const start = match.index ?? 0;
    leftover += line.slice(cursor, start);
    cursor = start + match[0].length;
    const alias = splitAlias(match[1] ?? '');
    if (!alias) {
      doc.report('malformed-directive', lineNo, `malformed alias directive ${match[0]}`);
      leftover += match[0];
      continue;
    }
    doc.defineAlias(alias.name, alias.target, lineNo);
  }
  leftover += line.slice(cursor);
  if (sanitizeText(leftover)) {
    doc.report('preamble-text', lineNo, 'text before the first heading is not spoken');
  }
}

function scanBodyLine(doc: DocumentBuilder, line: string, lineNo: number): void {
  if (line.includes('[alias:')) {
    doc.report('misplaced-alias', lineNo, 'alias directives after the first heading are read as text');
  }
  let pending = '';
  let cursor = 0;
  for (const match of line.matchAll(VOICE_RE)) {
    const start = match.index ?? 0;
    pending += line.slice(cursor, start);
    cursor = start + match[0].length;
    const name = (match[1] ?? '').trim();
    if (!name) {
      doc.report('malformed-directive', lineNo, `voice directive without a name: ${match[0]}`);
      pending += match[0];
      continue;
    }
    doc.appendText(pending, lineNo);
    pending = '';
    doc.startSegment(name, lineNo);
  }
  pending += line.slice(cursor);
  doc.appendText(pending, lineNo);
}

/**
 * Parse a voice-annotated markdown script into a section arena, the preamble
 * alias table, and diagnostics for directives that were read as plain text.
 */
export function parseDocument(markdown: string): ParsedDocument {
  const doc = new DocumentBuilder();
  const lines = normalizeSource(markdown).split('\n');

  lines.forEach((line, idx) => {
    const lineNo = idx + 1;
    const heading = HEADING_RE.exec(line);
    if (heading) {
      doc.openSection(toHeadingLevel(heading[1] ?? ''), sanitizeText(heading[2] ?? ''), lineNo);
      return;
    }
    if (!line.trim()) {
      doc.blankLine();
      return;
    }
    if (doc.inPreamble) {
      scanPreambleLine(doc, line, lineNo);
    } else {
      scanBodyLine(doc, line, lineNo);
    }
  });

  return doc.build();
}

export async function parseDocumentFile(path: string): Promise<ParsedDocument> {
  return parseDocument(await readFile(path, 'utf8'));
}

/**
 * Strict mode for callers that would rather stop than speak a malformed
 * directive aloud.
 */
export function assertWellFormed(doc: ParsedDocument): void {
  const malformed = doc.diagnostics.find((d) => d.kind === 'malformed-directive');
  if (malformed) throw new ParseError(malformed.line, malformed.message);
}
