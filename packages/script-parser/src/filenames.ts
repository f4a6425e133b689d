import { normalize } from 'node:path';

import type { ResolvedSection } from './types.js';

export const DEFAULT_AUDIO_EXTENSION = 'mp3';

export interface NamingOptions {
  extension?: string;
  /** Relative output paths keyed by generated stem, used verbatim. */
  overrides?: Readonly<Record<string, string>>;
}

export interface NamedSection extends ResolvedSection {
  stem: string;
  relativePath: string;
  /** True when the path came from an override rather than the title hierarchy. */
  explicit: boolean;
}

export interface FilenameCollision {
  relativePath: string;
  sectionIds: number[];
}

/**
 * Lowercase a heading and turn every run of whitespace or punctuation into a
 * single underscore. Digits survive, so "Section 2.3: Advanced Topics" becomes
 * "section_2_3_advanced_topics"; a lone hyphen between two word characters is
 * kept ("well-known"); apostrophes are dropped rather than split on.
 */
export function slugifyTitle(title: string): string {
  const folded = title
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .replace(/['‘’`]/g, '')
    .toLowerCase();
  return folded
    .replace(/[^\p{L}\p{N}]+/gu, (run: string, offset: number, whole: string) =>
      run === '-' && offset > 0 && offset + run.length < whole.length ? '-' : '_',
    )
    .replace(/^_+|_+$/g, '');
}

/** Stem for a title hierarchy; `position` (1-based) names sections whose titles slugify to nothing. */
export function sectionStem(titlePath: readonly string[], position: number): string {
  const tokens = titlePath.map(slugifyTitle).filter((token) => token.length > 0);
  return tokens.length > 0 ? tokens.join('_') : `section_${position}`;
}

function normalizeExtension(extension: string | undefined): string {
  const ext = (extension ?? DEFAULT_AUDIO_EXTENSION).replace(/^\.+/, '');
  return ext || DEFAULT_AUDIO_EXTENSION;
}

export function generateSectionFilename(
  titlePath: readonly string[],
  options: { extension?: string; position?: number } = {},
): string {
  return `${sectionStem(titlePath, options.position ?? 1)}.${normalizeExtension(options.extension)}`;
}

/**
 * Name every audio-producing section. Sections without segments are skipped
 * here; their titles already live in their descendants' title paths.
 */
export function assignOutputPaths(
  sections: readonly ResolvedSection[],
  options: NamingOptions = {},
): NamedSection[] {
  const extension = normalizeExtension(options.extension);
  const overrides = options.overrides ?? {};
  const named: NamedSection[] = [];

  for (const section of sections) {
    if (section.segments.length === 0) continue;
    const stem = sectionStem(section.titlePath, section.id + 1);
    const override = section.explicitFilename ?? overrides[stem];
    named.push({
      ...section,
      stem,
      relativePath: override ?? `${stem}.${extension}`,
      explicit: override !== undefined,
    });
  }

  return named;
}

/** Paths claimed by more than one section. The later section's file wins on disk. */
export function findFilenameCollisions(named: readonly NamedSection[]): FilenameCollision[] {
  const byPath = new Map<string, number[]>();
  for (const section of named) {
    const key = normalize(section.relativePath);
    const ids = byPath.get(key) ?? [];
    ids.push(section.id);
    byPath.set(key, ids);
  }
  return [...byPath.entries()]
    .filter(([, ids]) => ids.length > 1)
    .map(([relativePath, sectionIds]) => ({ relativePath, sectionIds }));
}
