import { describe, expect, it } from 'vitest';

import {
  assignOutputPaths,
  findFilenameCollisions,
  generateSectionFilename,
  sectionStem,
  slugifyTitle,
} from '../src/filenames.js';
import { parseDocument } from '../src/parser.js';
import { resolveVoices } from '../src/resolver.js';
import type { ResolvedSection } from '../src/types.js';

const section = (id: number, titlePath: string[], extra: Partial<ResolvedSection> = {}): ResolvedSection => ({
  id,
  title: titlePath[titlePath.length - 1] ?? '',
  titlePath,
  segments: [{ voice: 'Aria', text: 'hello' }],
  ...extra,
});

describe('slugifyTitle', () => {
  it('lowercases and joins words with underscores', () => {
    expect(slugifyTitle('Section 2.3: Advanced Topics')).toBe('section_2_3_advanced_topics');
  });

  it('folds accents and drops apostrophes', () => {
    expect(slugifyTitle("Café Owner's Guide")).toBe('cafe_owners_guide');
  });

  it('keeps a single internal hyphen', () => {
    expect(slugifyTitle('Well-known facts')).toBe('well-known_facts');
    expect(slugifyTitle('A -- B')).toBe('a_b');
    expect(slugifyTitle('-leading')).toBe('leading');
  });

  it('returns an empty slug for titles without letters or digits', () => {
    expect(slugifyTitle('*** ???')).toBe('');
  });
});

describe('generateSectionFilename', () => {
  it('joins the title path with underscores', () => {
    expect(generateSectionFilename(['Section 2.3: Advanced Topics'])).toBe('section_2_3_advanced_topics.mp3');
    expect(generateSectionFilename(['Title', 'Sub'])).toBe('title_sub.mp3');
  });

  it('uses the requested extension', () => {
    expect(generateSectionFilename(['Title'], { extension: '.wav' })).toBe('title.wav');
  });

  it('falls back to the section position when nothing survives slugification', () => {
    expect(sectionStem(['!!!'], 4)).toBe('section_4');
    expect(generateSectionFilename(['', '???'], { position: 2 })).toBe('section_2.mp3');
  });

  it('skips empty ancestors in the path', () => {
    expect(sectionStem(['***', 'Intro'], 1)).toBe('intro');
  });
});

describe('assignOutputPaths', () => {
  it('names only sections that have speech', () => {
    const resolved = resolveVoices(parseDocument('# Title\n## Sub\n\nBody.\n'), { defaultVoice: 'Aria' });
    const named = assignOutputPaths(resolved);
    expect(named.map((s) => [s.id, s.relativePath, s.explicit])).toEqual([[1, 'title_sub.mp3', false]]);
  });

  it('gives sibling sections distinct names', () => {
    const resolved = resolveVoices(parseDocument('# Course\n## One\n\na\n\n## Two\n\nb\n'), {
      defaultVoice: 'Aria',
    });
    expect(assignOutputPaths(resolved).map((s) => s.relativePath)).toEqual([
      'course_one.mp3',
      'course_two.mp3',
    ]);
  });

  it('applies overrides keyed by stem, with an explicit filename taking precedence', () => {
    const named = assignOutputPaths(
      [section(0, ['Intro']), section(1, ['Outro'], { explicitFilename: 'custom/outro-final.mp3' })],
      { extension: 'ogg', overrides: { intro: 'chapters/00-intro.ogg', outro: 'ignored.ogg' } },
    );
    expect(named.map((s) => [s.stem, s.relativePath, s.explicit])).toEqual([
      ['intro', 'chapters/00-intro.ogg', true],
      ['outro', 'custom/outro-final.mp3', true],
    ]);
  });

  it('numbers untitled sections by their position in the document', () => {
    const named = assignOutputPaths([section(0, ['Intro']), section(2, ['???'])]);
    expect(named.map((s) => s.relativePath)).toEqual(['intro.mp3', 'section_3.mp3']);
  });
});

describe('findFilenameCollisions', () => {
  it('reports paths claimed by several sections', () => {
    const named = assignOutputPaths([
      section(0, ['Q&A']),
      section(1, ['Q A']),
      section(2, ['Summary']),
    ]);
    expect(findFilenameCollisions(named)).toEqual([{ relativePath: 'q_a.mp3', sectionIds: [0, 1] }]);
  });

  it('returns nothing when every path is unique', () => {
    expect(findFilenameCollisions(assignOutputPaths([section(0, ['A']), section(1, ['B'])]))).toEqual([]);
  });
});
