export {
  parseDocument,
  parseDocumentFile,
  assertWellFormed,
} from './parser.js';
export { resolveVoices, resolveVoiceName, isAudioSection } from './resolver.js';
export type { ResolveOptions, VoiceCursor } from './resolver.js';
export {
  DEFAULT_AUDIO_EXTENSION,
  slugifyTitle,
  sectionStem,
  generateSectionFilename,
  assignOutputPaths,
  findFilenameCollisions,
} from './filenames.js';
export type { NamingOptions, NamedSection, FilenameCollision } from './filenames.js';
export { buildSlideScript } from './slides.js';
export type { SlideScriptOptions } from './slides.js';
export { sanitizeText, normalizeSource, hasSpeakableContent } from './sanitize.js';
export type {
  AliasTable,
  DiagnosticKind,
  HeadingLevel,
  ParseDiagnostic,
  ParsedDocument,
  RawSegment,
  ResolvedSection,
  Section,
  SlideNotes,
  VoiceSegment,
} from './types.js';
