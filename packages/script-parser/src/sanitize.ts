const BOM = /^\uFEFF/;
const NBSP = /\u00A0/g;
const ZERO_WIDTH = /[\u200B\u200C\u200D\u2060]/g;

// Control, format, private-use and unassigned code points, pictographic emoji
// (with their variation selectors) and the gender signs that slide decks
// tend to carry into speaker notes.
const UNSPEAKABLE = /[\p{Cc}\p{Cf}\p{Co}\p{Cn}\p{Extended_Pictographic}\uFE0E\uFE0F\u2640\u2642]/gu;

export function normalizeSource(md: string): string {
  return md
    .replace(BOM, '')
    .replaceAll(NBSP, ' ')
    .replaceAll(ZERO_WIDTH, '')
    .replaceAll('\r\n', '\n')
    .replaceAll('\r', '\n');
}

/**
 * Clean one line of heading or body text: tabs and other whitespace become
 * single spaces, unspeakable characters are dropped, ends are trimmed.
 */
export function sanitizeText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(UNSPEAKABLE, '')
    .replace(/ {2,}/g, ' ')
    .trim();
}

export function hasSpeakableContent(text: string): boolean {
  return /[\p{L}\p{N}]/u.test(text);
}
