import type { ProtectedSpan } from '../../types/markdown.js';
import type { AbbreviationSet } from './abbreviations.js';
import { findSentenceBoundaries, sliceSentences } from './sentence-splitter.js';

/**
 * Split an emphasis span that holds several sentences into one emphasized
 * fragment per sentence, each wrapped in the span's own delimiters:
 * `**One. Two.**` becomes `**One.**` and `**Two.**`.
 *
 * Only one level is split; nested spans stay inside their sentence. Spans
 * other than emphasis, or emphasis holding a single sentence, come back
 * unchanged as one fragment.
 */
export function continueEmphasis(text: string, span: ProtectedSpan, abbreviations: AbbreviationSet): string[] {
  const whole = text.slice(span.start, span.end);
  if (span.kind.type !== 'emphasis') return [whole];

  const boundaries = findSentenceBoundaries(text, span.children, abbreviations, span.contentStart, span.contentEnd);
  if (boundaries.length === 0) return [whole];

  const sentences = sliceSentences(text, boundaries, span.contentStart, span.contentEnd);
  if (sentences.length < 2) return [whole];

  const open = text.slice(span.start, span.contentStart);
  const close = text.slice(span.contentEnd, span.end);
  return sentences.map((sentence) => `${open}${sentence}${close}`);
}
