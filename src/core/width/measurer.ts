import { eastAsianWidth } from 'get-east-asian-width';
import type { LengthMode } from '../../types/config.js';

const ZERO_WIDTH = /[\p{Mn}\p{Me}\p{Cf}\p{Cc}]/u;
const PICTOGRAPHIC = /\p{Extended_Pictographic}/u;
const VARIATION_SELECTOR_16 = 0xfe0f;

/**
 * Column width of a single code point in `visual` mode.
 */
export function codePointWidth(codePoint: number): 0 | 1 | 2 {
  const ch = String.fromCodePoint(codePoint);
  if (ZERO_WIDTH.test(ch)) return 0;
  // Variation selectors are Mn, Hangul jungseong/jongseong fillers are not
  if (codePoint >= 0x1160 && codePoint <= 0x11ff) return 0;
  return eastAsianWidth(codePoint, { ambiguousAsWide: false }) === 2 ? 2 : 1;
}

function visualWidth(text: string): number {
  let width = 0;
  let prevCodePoint = -1;
  let prevWidth = 0;

  for (const ch of text) {
    const cp = ch.codePointAt(0);
    if (cp === undefined) continue;

    // A text-presentation pictograph turned into emoji presentation
    if (cp === VARIATION_SELECTOR_16 && prevWidth === 1 && PICTOGRAPHIC.test(String.fromCodePoint(prevCodePoint))) {
      width += 1;
      prevWidth = 2;
      prevCodePoint = cp;
      continue;
    }

    const w = codePointWidth(cp);
    width += w;
    prevWidth = w;
    prevCodePoint = cp;
  }

  return width;
}

function charCount(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    // Count a surrogate pair once
    if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) i++;
    }
    count++;
  }
  return count;
}

export function measureWidth(text: string, mode: LengthMode): number {
  if (!text) return 0;
  switch (mode) {
    case 'chars':
      return charCount(text);
    case 'bytes':
      return Buffer.byteLength(text, 'utf8');
    case 'visual':
      return visualWidth(text);
  }
}

/**
 * Bound measurer, handy where the same mode is applied many times.
 */
export function createMeasurer(mode: LengthMode): (text: string) => number {
  return (text: string) => measureWidth(text, mode);
}
