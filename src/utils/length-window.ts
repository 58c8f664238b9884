import { normalizeWhitespace } from './text-analyzer';

export interface LengthWindow {
  min: number;
  max: number;
}

const TRAILING_SEPARATORS = /[\s,;:|-]+$/;

/** Length in code points, so a surrogate pair counts as one character. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

function sliceChars(text: string, end: number): string {
  return Array.from(text).slice(0, end).join('');
}

export function isWithinWindow(text: string, window: LengthWindow): boolean {
  const length = charLength(text);
  return length >= window.min && length <= window.max;
}

/** Longest whole-word prefix of at most `maxLength` characters, or '' when none exists. */
export function clipToWord(text: string, maxLength: number): string {
  if (charLength(text) <= maxLength) return text;
  if (maxLength <= 0) return '';
  const head = sliceChars(text, maxLength + 1);
  const boundary = head.lastIndexOf(' ');
  return boundary > 0 ? head.slice(0, boundary).replace(TRAILING_SEPARATORS, '') : '';
}

/**
 * Clips text longer than the window at a word boundary. Falls back to a hard
 * cut when the word boundary lands below the minimum.
 */
export function clipToWindow(text: string, window: LengthWindow): string {
  if (charLength(text) <= window.max) return text;
  const clipped = clipToWord(text, window.max);
  if (charLength(clipped) >= window.min) return clipped;
  return sliceChars(text, window.max).trimEnd();
}

/**
 * Pads short text with fillers and clips long text so the result lands inside
 * the window. Unused fillers that fit are preferred; when none fits the next
 * filler is appended anyway and the result clipped.
 */
export function fitToWindow(
  text: string,
  window: LengthWindow,
  fillers: readonly string[],
  separator = ' ',
): string {
  const pool = fillers.map(normalizeWhitespace).filter(Boolean);
  const used = new Set<string>();
  const join = (base: string, filler: string) =>
    base ? `${base}${separator}${filler}` : filler;
  const fits = (base: string) => (filler: string) =>
    charLength(join(base, filler)) <= window.max;

  let result = normalizeWhitespace(text);
  let index = 0;
  while (charLength(result) < window.min && pool.length > 0) {
    const unused = pool.filter((filler) => !used.has(filler));
    const filler =
      unused.find(fits(result)) ??
      pool.find(fits(result)) ??
      unused[0] ??
      pool[index % pool.length];
    used.add(filler);
    result = join(result, filler);
    index++;
  }
  return clipToWindow(result, window);
}
