// Character classes used by sentence detection.

const CLOSING_QUOTES = new Set(['"', "'", '”', '’', '»', '›']);
const OPENING_QUOTES = new Set(['"', "'", '“', '‘', '«', '‹']);
const CJK_TERMINATORS = new Set(['。', '！', '？']);
// Brackets and quotes that may close a CJK sentence: 」 』 ） 】 〉 》
const CJK_CLOSERS = new Set(['」', '』', '）', '】', '〉', '》']);
// Markers skipped when looking at the first letter of the next sentence
const EMPHASIS_MARKERS = new Set(['*', '_', '~']);
const UPPERCASE = /^\p{Uppercase}$/u;

export function isSentenceTerminator(ch: string): boolean {
  return ch === '.' || ch === '!' || ch === '?';
}

export function isCjkTerminator(ch: string): boolean {
  return CJK_TERMINATORS.has(ch);
}

export function isClosingQuote(ch: string): boolean {
  return CLOSING_QUOTES.has(ch);
}

export function isOpeningQuote(ch: string): boolean {
  return OPENING_QUOTES.has(ch);
}

export function isCjkCloser(ch: string): boolean {
  return CJK_CLOSERS.has(ch) || CLOSING_QUOTES.has(ch);
}

export function isEmphasisMarkerChar(ch: string): boolean {
  return EMPHASIS_MARKERS.has(ch);
}

export function isCjkCodePoint(cp: number): boolean {
  return (
    (cp >= 0x4e00 && cp <= 0x9fff) || // CJK Unified Ideographs
    (cp >= 0x3400 && cp <= 0x4dbf) || // Extension A
    (cp >= 0x3040 && cp <= 0x309f) || // Hiragana
    (cp >= 0x30a0 && cp <= 0x30ff) || // Katakana
    (cp >= 0xac00 && cp <= 0xd7af) // Hangul syllables
  );
}

export function isUppercase(ch: string): boolean {
  return UPPERCASE.test(ch);
}

/**
 * Whitespace that separates words. NBSP does not.
 */
export function isBreakingSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

/**
 * Code point starting at `index`, as a string (one or two code units).
 */
export function charAt(text: string, index: number): string {
  const cp = text.codePointAt(index);
  return cp === undefined ? '' : String.fromCodePoint(cp);
}
