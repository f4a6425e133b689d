export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

/** Alias name -> voice name. Case-sensitive; only the preamble defines entries. */
export type AliasTable = Map<string, string>;

/**
 * A run of body text as written. `directive` is the raw `[voice:...]` name that
 * opened it, absent for the text that precedes the first tag of a section.
 */
export interface RawSegment {
  directive?: string;
  text: string;
  line: number;
}

export interface Section {
  id: number;
  level: HeadingLevel;
  title: string;
  parent: number | null;
  children: number[];
  body: RawSegment[];
  line: number;
  explicitFilename?: string;
}

export type DiagnosticKind =
  | 'malformed-directive'
  | 'misplaced-alias'
  | 'duplicate-alias'
  | 'preamble-text';

export interface ParseDiagnostic {
  kind: DiagnosticKind;
  line: number;
  message: string;
}

export interface ParsedDocument {
  /** Arena in document order; `Section.id` is the index into it. */
  sections: Section[];
  roots: number[];
  aliases: AliasTable;
  diagnostics: ParseDiagnostic[];
}

export interface VoiceSegment {
  voice: string;
  text: string;
}

export interface ResolvedSection {
  id: number;
  title: string;
  /** Titles from the root ancestor down to this section. */
  titlePath: string[];
  segments: VoiceSegment[];
  explicitFilename?: string;
}

export interface SlideNotes {
  index: number;
  title: string;
  notes: string;
}
