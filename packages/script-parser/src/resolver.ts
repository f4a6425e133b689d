import { hasSpeakableContent } from './sanitize.js';
import type { AliasTable, ParsedDocument, ResolvedSection, VoiceSegment } from './types.js';

export interface ResolveOptions {
  defaultVoice: string;
}

/**
 * The voice in effect while walking the document. It is threaded through the
 * traversal explicitly so that a directive in one section carries into the
 * sections that follow it.
 */
export interface VoiceCursor {
  currentVoice: string;
}

/**
 * Single substitution through the alias table. Aliases do not chain: an alias
 * whose target is itself an alias name resolves to that name verbatim. Names
 * that are not aliases pass through as literal voice names; whether the
 * backend knows them is only discovered at synthesis time.
 */
export function resolveVoiceName(aliases: AliasTable, name: string): string {
  return aliases.get(name) ?? name;
}

function resolveSection(
  doc: ParsedDocument,
  id: number,
  titlePath: string[],
  cursor: VoiceCursor,
  out: ResolvedSection[],
): void {
  const section = doc.sections[id];
  if (!section) return;
  const path = [...titlePath, section.title];

  const segments: VoiceSegment[] = [];
  for (const raw of section.body) {
    if (raw.directive !== undefined) {
      cursor.currentVoice = resolveVoiceName(doc.aliases, raw.directive);
    }
    if (!hasSpeakableContent(raw.text)) continue;
    segments.push({ voice: cursor.currentVoice, text: raw.text });
  }

  const resolved: ResolvedSection = { id: section.id, title: section.title, titlePath: path, segments };
  if (section.explicitFilename !== undefined) resolved.explicitFilename = section.explicitFilename;
  out.push(resolved);

  for (const child of section.children) {
    resolveSection(doc, child, path, cursor, out);
  }
}

/**
 * Assign a concrete voice to every segment, in document order. Every section
 * is returned, including the ones with no segments: those produce no audio
 * but callers still need them to see the full hierarchy.
 */
export function resolveVoices(doc: ParsedDocument, options: ResolveOptions): ResolvedSection[] {
  const cursor: VoiceCursor = { currentVoice: options.defaultVoice };
  const out: ResolvedSection[] = [];
  for (const root of doc.roots) {
    resolveSection(doc, root, [], cursor, out);
  }
  return out;
}

export function isAudioSection(section: ResolvedSection): boolean {
  return section.segments.length > 0;
}
