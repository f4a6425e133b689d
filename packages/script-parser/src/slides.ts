import { sanitizeText } from './sanitize.js';
import type { SlideNotes } from './types.js';

export interface SlideScriptOptions {
  /** Written as a voice directive on the first slide that has notes. */
  defaultVoice?: string;
  includeSlideTitles?: boolean;
  includeEmptyNotes?: boolean;
}

// Leading hashes would turn a line of notes into a heading of its own.
function cleanNotes(notes: string): string {
  return notes
    .split(/\r?\n/)
    .map((line) => sanitizeText(line).replace(/^#+\s*/, ''))
    .filter(Boolean)
    .join('\n');
}

/**
 * Assemble speaker notes into a script: the deck title as the level-1
 * heading and one level-2 heading per slide. Slides without notes are left out
 * unless `includeEmptyNotes` is set, in which case they get a heading only.
 */
export function buildSlideScript(
  deckTitle: string,
  slides: readonly SlideNotes[],
  options: SlideScriptOptions = {},
): string {
  const { defaultVoice, includeSlideTitles = true, includeEmptyNotes = false } = options;
  const lines: string[] = [`# ${sanitizeText(deckTitle) || 'Presentation'}`, ''];
  let voiceWritten = false;

  for (const slide of slides) {
    const notes = cleanNotes(slide.notes);
    if (!notes && !includeEmptyNotes) continue;

    const title = sanitizeText(slide.title);
    lines.push(includeSlideTitles && title ? `## Slide ${slide.index} - ${title}` : `## Slide ${slide.index}`, '');

    if (!notes) continue;
    if (!voiceWritten && defaultVoice) {
      lines.push(`[voice:${defaultVoice}]`, '');
      voiceWritten = true;
    }
    lines.push(notes, '');
  }

  return `${lines.join('\n').trimEnd()}\n`;
}
