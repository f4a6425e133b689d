import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';

import { z } from 'zod';

import { FilesystemError, ValidationError, errorMessage } from '@voicescript/contracts';
import { type SlideNotes, buildSlideScript } from '@voicescript/script-parser';

import {
  type ProcessOptions,
  type ProcessResult,
  type SynthesisDependencies,
  processMarkdownDocument,
} from './synthesize.js';

/** Where speaker notes come from; the CLI ships a JSON reader. */
export interface SlideNotesSource {
  /** File the notes were read from; outputs go beside it. */
  path: string;
  title: string;
  readSlides(): Promise<SlideNotes[]>;
}

const slideSchema = z.object({
  index: z.number().int().positive(),
  title: z.string().default(''),
  notes: z.string().default(''),
});

const notesFileSchema = z.union([
  z.array(slideSchema),
  z.object({ title: z.string().optional(), slides: z.array(slideSchema) }),
]);

function deckName(path: string): string {
  return basename(path, extname(path));
}

/**
 * Read slide notes exported as JSON: either an array of
 * `{ index, title, notes }` or `{ title, slides: [...] }`.
 */
export async function createJsonNotesSource(path: string): Promise<SlideNotesSource> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err: unknown) {
    throw new ValidationError(`Cannot read slide notes from ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = notesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Slide notes in ${path} are not in the expected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  const slides = Array.isArray(parsed.data) ? parsed.data : parsed.data.slides;
  const title = (Array.isArray(parsed.data) ? undefined : parsed.data.title) ?? deckName(path);
  const ordered = [...slides].sort((a, b) => a.index - b.index);
  return { path, title, readSlides: async () => ordered };
}

export type SlideDeckOptions = Omit<ProcessOptions, 'outputDir'> & {
  includeSlideTitles?: boolean;
  includeEmptyNotes?: boolean;
  overwriteScript?: boolean;
  /** Defaults to a folder beside the source named after it. */
  outputDir?: string;
};

export interface SlideDeckResult extends ProcessResult {
  scriptPath: string;
  scriptReused: boolean;
}

/** Folder and script names for a deck: spaces become underscores. */
export function slideDeckPaths(sourcePath: string, outputDir?: string): { outputDir: string; scriptPath: string } {
  const name = deckName(sourcePath).replace(/ /g, '_');
  const dir = outputDir ?? join(dirname(sourcePath), name);
  return { outputDir: dir, scriptPath: join(dir, `${name}.md`) };
}

async function readExisting(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw new FilesystemError(path, `Cannot read existing script ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Turn a deck's speaker notes into a script and speak it. An existing script
 * is reused unless `overwriteScript` is set, so hand edits to it survive.
 */
export async function processSlideDeck(
  source: SlideNotesSource,
  options: SlideDeckOptions,
  deps: SynthesisDependencies,
): Promise<SlideDeckResult> {
  const { outputDir, scriptPath } = slideDeckPaths(source.path, options.outputDir);
  await mkdir(outputDir, { recursive: true });

  const existing = options.overwriteScript ? undefined : await readExisting(scriptPath);
  let script: string;
  if (existing !== undefined) {
    script = existing;
  } else {
    script = buildSlideScript(source.title, await source.readSlides(), {
      defaultVoice: options.defaultVoice,
      includeSlideTitles: options.includeSlideTitles,
      includeEmptyNotes: options.includeEmptyNotes,
    });
    await writeFile(scriptPath, script, 'utf8');
  }

  const result = await processMarkdownDocument(script, { ...options, outputDir }, deps);
  return { ...result, scriptPath, scriptReused: existing !== undefined };
}
