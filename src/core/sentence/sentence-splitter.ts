import type { ProtectedSpan } from '../../types/markdown.js';
import { scanSpans } from '../inline/span-scanner.js';
import { AbbreviationSet } from './abbreviations.js';
import {
  charAt,
  isBreakingSpace,
  isCjkCloser,
  isCjkCodePoint,
  isCjkTerminator,
  isClosingQuote,
  isEmphasisMarkerChar,
  isOpeningQuote,
  isSentenceTerminator,
  isUppercase
} from './punctuation.js';

const LEADING_NON_WORD = /^[^\p{L}\p{N}]+/u;

/**
 * Walks one range of text and records where sentences end. Protected spans
 * are opaque; an emphasis span whose content ends with a terminator can end
 * a sentence.
 */
class BoundaryScanner {
  private readonly boundaries: number[] = [];

  constructor(
    private readonly text: string,
    private readonly abbreviations: AbbreviationSet,
    private readonly from: number,
    private readonly to: number
  ) {}

  run(spans: readonly ProtectedSpan[]): number[] {
    const { to } = this;
    let spanIndex = 0;
    let i = this.from;

    while (i < to) {
      const span = spans[spanIndex];
      if (span && span.start <= i) {
        spanIndex++;
        if (span.start === i && span.kind.type === 'emphasis' && span.contentEnd > span.contentStart) {
          const last = span.contentEnd - 1;
          this.consider(last, span.end, span.contentStart);
        }
        i = Math.max(i, span.end);
        continue;
      }
      i = this.consider(i, i + 1, this.from) ?? i + 1;
    }
    return this.boundaries;
  }

  /**
   * Check the character at `index`, which is followed in the text by
   * `after`. Returns where scanning may resume, or null if nothing matched.
   */
  private consider(index: number, after: number, wordFloor: number): number | null {
    const ch = this.text[index] ?? '';
    if (isSentenceTerminator(ch)) {
      const boundary = this.asciiBoundary(index, after, wordFloor);
      if (boundary < 0) return null;
      this.push(boundary);
      return boundary;
    }
    if (isCjkTerminator(ch)) {
      const { boundary, resume } = this.cjkBoundary(after);
      if (boundary >= 0) this.push(boundary);
      return resume;
    }
    return null;
  }

  /**
   * `.`, `!` or `?`, optional closing quotes, whitespace, then an uppercase
   * letter or CJK character after any opening quotes or emphasis markers.
   */
  private asciiBoundary(index: number, after: number, wordFloor: number): number {
    const { text, to } = this;
    let j = after;
    while (j < to && isClosingQuote(text[j] ?? '')) j++;
    const boundary = j;

    if (j >= to || !isBreakingSpace(text[j])) return -1;
    while (j < to && isBreakingSpace(text[j])) j++;
    while (j < to && (isOpeningQuote(text[j] ?? '') || isEmphasisMarkerChar(text[j] ?? ''))) j++;
    if (j >= to) return -1;

    const next = charAt(text, j);
    const cp = next.codePointAt(0) ?? 0;
    if (!isUppercase(next) && !isCjkCodePoint(cp)) return -1;

    if (text[index] === '.' && this.abbreviations.endsWithAbbreviation(this.wordEndingAt(index, wordFloor))) {
      return -1;
    }
    return boundary;
  }

  /**
   * A CJK terminator ends the sentence as soon as more content follows,
   * with or without whitespace. The run of terminators and closers after it
   * is never scanned again, boundary or not.
   */
  private cjkBoundary(after: number): { boundary: number; resume: number } {
    const { text, to } = this;
    let j = after;
    while (j < to && (isCjkCloser(text[j] ?? '') || isCjkTerminator(text[j] ?? ''))) j++;
    const resume = j;
    while (j < to && isBreakingSpace(text[j])) j++;
    return { boundary: j < to ? resume : -1, resume };
  }

  private wordEndingAt(index: number, floor: number): string {
    let start = index;
    while (start > floor && !isBreakingSpace(this.text[start - 1])) start--;
    return this.text.slice(start, index + 1).replace(LEADING_NON_WORD, '');
  }

  private push(boundary: number): void {
    const last = this.boundaries[this.boundaries.length - 1];
    if (last === undefined || boundary > last) this.boundaries.push(boundary);
  }
}

/**
 * Offsets in `text` where a sentence ends, between `from` and `to`.
 * `spans` are the top-level spans of that range, sorted by start.
 */
export function findSentenceBoundaries(
  text: string,
  spans: readonly ProtectedSpan[],
  abbreviations: AbbreviationSet,
  from = 0,
  to = text.length
): number[] {
  return new BoundaryScanner(text, abbreviations, from, to).run(spans);
}

/**
 * Cut `[from, to)` at `boundaries` and trim each piece; empty pieces are dropped.
 */
export function sliceSentences(text: string, boundaries: readonly number[], from = 0, to = text.length): string[] {
  const sentences: string[] = [];
  let start = from;
  for (const boundary of [...boundaries, to]) {
    const sentence = text.slice(start, boundary).trim();
    if (sentence) sentences.push(sentence);
    start = boundary;
  }
  return sentences;
}

/**
 * Split plain inline text into sentences. Markup is respected: a period
 * inside a code span or link never ends a sentence.
 */
export function splitIntoSentences(
  text: string,
  abbreviations: AbbreviationSet | readonly string[] = new AbbreviationSet()
): string[] {
  const set = abbreviations instanceof AbbreviationSet ? abbreviations : new AbbreviationSet(abbreviations);
  const spans = scanSpans(text);
  return sliceSentences(text, findSentenceBoundaries(text, spans, set));
}
