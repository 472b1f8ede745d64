import type { EmphasisMarker, EmphasisStyle, EmphasisWeight, ProtectedSpan, Range } from '../../types/markdown.js';
import { charAfter, charBefore, isEscapeAt, isFlankingWhitespace, isPunctuation } from './text-utils.js';

type Delimiter = {
  char: EmphasisMarker;
  // Remaining characters occupy [start, start + remaining)
  start: number;
  remaining: number;
  originalLength: number;
  canOpen: boolean;
  canClose: boolean;
};

function isMarker(ch: string | undefined): ch is EmphasisMarker {
  return ch === '*' || ch === '_' || ch === '~' || ch === '^' || ch === '=';
}

/**
 * Collect delimiter runs in the text outside `leaves` (sorted, disjoint).
 */
function collectDelimiters(text: string, leaves: readonly Range[]): Delimiter[] {
  const delimiters: Delimiter[] = [];
  let leafIndex = 0;
  let i = 0;

  while (i < text.length) {
    const leaf = leaves[leafIndex];
    if (leaf && i >= leaf.start) {
      i = Math.max(i, leaf.end);
      leafIndex++;
      continue;
    }
    if (isEscapeAt(text, i)) {
      i += 2;
      continue;
    }
    const ch = text[i];
    if (!isMarker(ch)) {
      i++;
      continue;
    }

    const limit = leaf ? leaf.start : text.length;
    const start = i;
    while (i < limit && text[i] === ch) i++;
    const before = charBefore(text, start);
    const after = charAfter(text, i);
    const { canOpen, canClose } = flanking(ch, before, after);
    delimiters.push({ char: ch, start, remaining: i - start, originalLength: i - start, canOpen, canClose });
  }
  return delimiters;
}

function flanking(
  ch: EmphasisMarker,
  before: string | undefined,
  after: string | undefined
): { canOpen: boolean; canClose: boolean } {
  const leftFlanking =
    !isFlankingWhitespace(after) &&
    (!isPunctuation(after) || isFlankingWhitespace(before) || isPunctuation(before));
  const rightFlanking =
    !isFlankingWhitespace(before) &&
    (!isPunctuation(before) || isFlankingWhitespace(after) || isPunctuation(after));

  if (ch === '_') {
    return {
      canOpen: leftFlanking && (!rightFlanking || isPunctuation(before)),
      canClose: rightFlanking && (!leftFlanking || isPunctuation(after))
    };
  }
  return { canOpen: leftFlanking, canClose: rightFlanking };
}

/**
 * How many characters an opener/closer pair consumes, or 0 when they cannot
 * pair.
 */
function pairLength(opener: Delimiter, closer: Delimiter): number {
  switch (opener.char) {
    case '*':
    case '_': {
      // Rule of 3
      if (
        (opener.canClose || closer.canOpen) &&
        (opener.originalLength + closer.originalLength) % 3 === 0 &&
        !(opener.originalLength % 3 === 0 && closer.originalLength % 3 === 0)
      ) {
        return 0;
      }
      if (opener.remaining >= 3 && closer.remaining >= 3) return 3;
      if (opener.remaining >= 2 && closer.remaining >= 2) return 2;
      return 1;
    }
    case '~':
      return opener.remaining === closer.remaining && opener.remaining <= 2 ? opener.remaining : 0;
    case '^':
      return opener.remaining === 1 && closer.remaining === 1 ? 1 : 0;
    case '=':
      return opener.remaining === 2 && closer.remaining === 2 ? 2 : 0;
  }
}

function describe(char: EmphasisMarker, length: number): { weight: EmphasisWeight; style: EmphasisStyle } {
  switch (char) {
    case '~':
      return length === 2 ? { weight: 'bold', style: 'strikethrough' } : { weight: 'italic', style: 'subscript' };
    case '^':
      return { weight: 'italic', style: 'superscript' };
    case '=':
      return { weight: 'bold', style: 'highlight' };
    default:
      if (length === 3) return { weight: 'bold-italic', style: 'strong-emphasis' };
      if (length === 2) return { weight: 'bold', style: 'strong' };
      return { weight: 'italic', style: 'emphasis' };
  }
}

function bottomKey(delimiter: Delimiter): string {
  return `${delimiter.char}:${delimiter.originalLength % 3}:${delimiter.canOpen ? 1 : 0}`;
}

/**
 * Pair emphasis delimiters with the CommonMark delimiter-stack algorithm.
 * The result is flat; spans created later enclose those created earlier.
 * `openersBottom` keeps failed searches from rescanning the stack.
 */
export function scanEmphasis(text: string, leaves: readonly Range[]): ProtectedSpan[] {
  const spans: ProtectedSpan[] = [];
  const stack: Delimiter[] = [];
  const openersBottom = new Map<string, number>();

  for (const closer of collectDelimiters(text, leaves)) {
    if (closer.canClose) {
      while (closer.remaining > 0) {
        const key = bottomKey(closer);
        const bottom = Math.min(openersBottom.get(key) ?? 0, stack.length);
        let openerIndex = -1;
        let use = 0;
        for (let s = stack.length - 1; s >= bottom; s--) {
          const candidate = stack[s];
          if (!candidate || candidate.char !== closer.char) continue;
          const length = pairLength(candidate, closer);
          if (length > 0) {
            openerIndex = s;
            use = length;
            break;
          }
        }
        const opener = stack[openerIndex];
        if (!opener) {
          openersBottom.set(key, stack.length);
          break;
        }

        const start = opener.start + opener.remaining - use;
        const end = closer.start + use;
        spans.push({
          start,
          end,
          kind: { type: 'emphasis', markerChar: closer.char, ...describe(closer.char, use) },
          contentStart: start + use,
          contentEnd: closer.start,
          children: []
        });

        opener.remaining -= use;
        closer.start += use;
        closer.remaining -= use;
        stack.length = opener.remaining > 0 ? openerIndex + 1 : openerIndex;
      }
    }
    if (closer.remaining > 0 && closer.canOpen) stack.push(closer);
  }
  return spans;
}
