import { access } from 'node:fs/promises';
import { resolve } from 'node:path';

import {
  type FilenameCollision,
  type ParseDiagnostic,
  type ResolvedSection,
  type VoiceSegment,
  assertWellFormed,
  assignOutputPaths,
  findFilenameCollisions,
  parseDocument,
  resolveVoices,
} from '@voicescript/script-parser';
import type { AudioFormat } from '@voicescript/tts-backends';

export interface PlanOptions {
  outputDir: string;
  defaultVoice: string;
  format: AudioFormat;
  overwriteAudio?: boolean;
  /** Output paths keyed by generated filename stem. */
  filenames?: Readonly<Record<string, string>>;
  /** Refuse documents with malformed directives instead of warning. */
  strict?: boolean;
}

export interface PlannedOutput {
  sectionId: number;
  title: string;
  titlePath: string[];
  relativePath: string;
  outputPath: string;
  segments: VoiceSegment[];
  /** The file already exists and overwriting is off. */
  skip: boolean;
}

export interface DocumentPlan {
  outputDir: string;
  format: AudioFormat;
  sections: ResolvedSection[];
  outputs: PlannedOutput[];
  diagnostics: ParseDiagnostic[];
  collisions: FilenameCollision[];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse, resolve voices and name outputs without calling any backend. The
 * result is everything a run needs, and what `--dry-run` prints.
 */
export async function planDocument(markdown: string, options: PlanOptions): Promise<DocumentPlan> {
  const doc = parseDocument(markdown);
  if (options.strict) assertWellFormed(doc);
  const sections = resolveVoices(doc, { defaultVoice: options.defaultVoice });
  const named = assignOutputPaths(sections, {
    extension: options.format.extension,
    overrides: options.filenames,
  });
  const outputDir = resolve(options.outputDir);

  const outputs = await Promise.all(
    named.map(async (section): Promise<PlannedOutput> => {
      const outputPath = resolve(outputDir, section.relativePath);
      return {
        sectionId: section.id,
        title: section.title,
        titlePath: section.titlePath,
        relativePath: section.relativePath,
        outputPath,
        segments: section.segments,
        skip: !options.overwriteAudio && (await exists(outputPath)),
      };
    }),
  );

  return {
    outputDir,
    format: options.format,
    sections,
    outputs,
    diagnostics: doc.diagnostics,
    collisions: findFilenameCollisions(named),
  };
}

/** Distinct voices in a section, in order of first use. */
export function voicesOf(output: Pick<PlannedOutput, 'segments'>): string[] {
  return [...new Set(output.segments.map((segment) => segment.voice))];
}
