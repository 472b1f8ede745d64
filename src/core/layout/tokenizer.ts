import type { LengthMode } from '../../types/config.js';
import type { ProtectedSpan, Token } from '../../types/markdown.js';
import { scanSpans } from '../inline/span-scanner.js';
import type { AbbreviationSet } from '../sentence/abbreviations.js';
import { continueEmphasis } from '../sentence/emphasis-continuation.js';
import { isBreakingSpace } from '../sentence/punctuation.js';
import { findSentenceBoundaries } from '../sentence/sentence-splitter.js';
import { measureWidth } from '../width/measurer.js';

/**
 * - `none`: words only
 * - `boundaries`: words, flagged where a sentence ends at whitespace
 * - `split`: also cut at boundaries without whitespace (CJK) and split
 *   emphasis spans holding several sentences
 */
export type SentenceMode = 'none' | 'boundaries' | 'split';

export type TokenizeOptions = {
  lengthMode: LengthMode;
  abbreviations: AbbreviationSet;
  sentences: SentenceMode;
};

type RawToken = {
  text: string;
  atomic: boolean;
  sentenceEnd: boolean;
};

// Never start a line, never stand alone
const TRAILING_PUNCTUATION = /^[,.:;!?)\]}]+$/;
const OPENING_BRACKETS = /^[([{]+$/;

class TokenBuilder {
  readonly tokens: RawToken[] = [];
  private parts: string[] = [];
  private atomic = false;

  add(text: string, atomic: boolean): void {
    if (!text) return;
    this.parts.push(text);
    this.atomic ||= atomic;
  }

  end(sentenceEnd: boolean): void {
    if (this.parts.length > 0) {
      this.tokens.push({ text: this.parts.join(''), atomic: this.atomic, sentenceEnd });
    } else if (sentenceEnd) {
      const last = this.tokens[this.tokens.length - 1];
      if (last) last.sentenceEnd = true;
    }
    this.parts = [];
    this.atomic = false;
  }
}

/**
 * Cut inline text into packer tokens: whitespace-separated words, with every
 * protected span kept whole inside the word it belongs to.
 */
export function tokenize(text: string, options: TokenizeOptions): Token[] {
  const spans = scanSpans(text);
  const boundaries =
    options.sentences === 'none' ? [] : findSentenceBoundaries(text, spans, options.abbreviations);
  const builder = new TokenBuilder();

  let spanIndex = 0;
  let boundaryIndex = 0;
  let runStart = 0;
  let i = 0;

  while (i < text.length) {
    const boundary = boundaries[boundaryIndex];
    if (boundary !== undefined && boundary <= i) {
      boundaryIndex++;
      if (boundary === i && (options.sentences === 'split' || isBreakingSpace(text[i]))) {
        builder.add(text.slice(runStart, i), false);
        builder.end(true);
        runStart = i;
      }
      continue;
    }

    const span = spans[spanIndex];
    if (span && span.start === i) {
      builder.add(text.slice(runStart, i), false);
      addSpan(builder, text, span, options);
      spanIndex++;
      i = span.end;
      runStart = i;
      continue;
    }

    if (isBreakingSpace(text[i])) {
      builder.add(text.slice(runStart, i), false);
      builder.end(false);
      runStart = i + 1;
    }
    i++;
  }
  builder.add(text.slice(runStart), false);
  builder.end(false);

  return glueDetachedPunctuation(builder.tokens).map((token) => ({
    ...token,
    width: measureWidth(token.text, options.lengthMode)
  }));
}

function addSpan(builder: TokenBuilder, text: string, span: ProtectedSpan, options: TokenizeOptions): void {
  const pieces =
    options.sentences === 'split' && span.kind.type === 'emphasis'
      ? continueEmphasis(text, span, options.abbreviations)
      : [text.slice(span.start, span.end)];

  pieces.forEach((piece, index) => {
    if (index > 0) builder.end(true);
    builder.add(piece, true);
  });
}

/**
 * `word ,` becomes `word,` and `( word` becomes `(word`, so that a second run
 * sees the same words as the first.
 */
function glueDetachedPunctuation(tokens: readonly RawToken[]): RawToken[] {
  const out: RawToken[] = [];
  let opener: RawToken | null = null;

  for (const raw of tokens) {
    let token = raw;
    const previous = out[out.length - 1];
    if (!opener && previous && !previous.sentenceEnd && TRAILING_PUNCTUATION.test(token.text)) {
      out[out.length - 1] = join(previous, token);
      continue;
    }
    if (opener) {
      token = join(opener, token);
      opener = null;
    }
    if (OPENING_BRACKETS.test(token.text) && !token.sentenceEnd) {
      opener = token;
      continue;
    }
    out.push(token);
  }
  if (opener) out.push(opener);
  return out;
}

function join(left: RawToken, right: RawToken): RawToken {
  return {
    text: left.text + right.text,
    atomic: left.atomic || right.atomic,
    sentenceEnd: right.sentenceEnd
  };
}
