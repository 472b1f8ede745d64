/**
 * Low-level helpers shared by the inline scanners.
 */

const PUNCTUATION = /[\p{P}\p{S}]/u;
const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/;
const UNICODE_WHITESPACE = /\s/u;

/**
 * Whitespace for delimiter flanking. The edges of the text count as whitespace.
 */
export function isFlankingWhitespace(ch: string | undefined): boolean {
  return ch === undefined || ch === '' || UNICODE_WHITESPACE.test(ch);
}

export function isPunctuation(ch: string | undefined): boolean {
  return ch !== undefined && ch !== '' && PUNCTUATION.test(ch);
}

/**
 * A backslash at `index` escapes the following ASCII punctuation character.
 */
export function isEscapeAt(text: string, index: number): boolean {
  if (text[index] !== '\\') return false;
  const next = text[index + 1];
  return next !== undefined && ASCII_PUNCTUATION.test(next);
}

export function isAsciiAlphanumeric(ch: string | undefined): boolean {
  if (ch === undefined || ch.length !== 1) return false;
  const code = ch.charCodeAt(0);
  return (code >= 0x30 && code <= 0x39) || (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a);
}

export function isAsciiLetter(ch: string | undefined): boolean {
  if (ch === undefined || ch.length !== 1) return false;
  const code = ch.charCodeAt(0) | 0x20;
  return code >= 0x61 && code <= 0x7a;
}

/**
 * Character preceding `index`, as a full code point.
 */
export function charBefore(text: string, index: number): string | undefined {
  if (index <= 0) return undefined;
  const low = text.charCodeAt(index - 1);
  if (low >= 0xdc00 && low <= 0xdfff && index >= 2) {
    const high = text.charCodeAt(index - 2);
    if (high >= 0xd800 && high <= 0xdbff) return text.slice(index - 2, index);
  }
  return text[index - 1];
}

export function charAfter(text: string, index: number): string | undefined {
  const cp = text.codePointAt(index);
  return cp === undefined ? undefined : String.fromCodePoint(cp);
}

/**
 * `indexOf` that remembers its last answer per needle. Searches move forward
 * through the text, so repeated lookups for the same closer stay linear.
 */
export class CloserFinder {
  private readonly text: string;
  // needle -> last search origin and the first match at or after it (-1: none)
  private readonly cache = new Map<string, { from: number; found: number }>();

  constructor(text: string) {
    this.text = text;
  }

  find(needle: string, from: number): number {
    const cached = this.cache.get(needle);
    if (cached && from >= cached.from && (cached.found < 0 || from <= cached.found)) {
      return cached.found;
    }
    const found = this.text.indexOf(needle, from);
    this.cache.set(needle, { from, found });
    return found;
  }
}
