import type { ReflowConfig, ReflowOptions } from '../../types/config.js';
import type { ReflowableBlock, SourceLine, Token } from '../../types/markdown.js';
import { createDebugLogger } from '../../utils/debug.js';
import { classifyDocument, isReflowEligible } from '../blocks/block-classifier.js';
import { columnsOf, startsBlockStructure } from '../blocks/line-kinds.js';
import { packSemanticLines, packTokens } from '../layout/line-packer.js';
import { tokenize } from '../layout/tokenizer.js';
import { toReflowOptions } from '../options.js';
import { AbbreviationSet } from '../sentence/abbreviations.js';
import { measureWidth } from '../width/measurer.js';

const debug = createDebugLogger('reflow');

/**
 * Everything one invocation needs, built once from the options.
 */
export type ReflowContext = {
  options: ReflowOptions;
  abbreviations: AbbreviationSet;
};

type InlineLayout = {
  firstLinePrefix: string;
  continuationPrefix: string;
  // Definition bodies are wrapped by width only
  sentenceSplitting: boolean;
};

type Part = {
  // Indexes into the block's lines
  from: number;
  to: number;
  hardBreak: boolean;
};

export type RenderedBlock = {
  lines: string[];
  // Between output lines
  newline: string;
  // After the last output line, as in the source
  finalNewline: string;
};

export function createReflowContext(options?: ReflowConfig | ReflowOptions): ReflowContext {
  const resolved = toReflowOptions(options);
  return { options: resolved, abbreviations: new AbbreviationSet(resolved.abbreviations) };
}

function usesSentenceLines(options: ReflowOptions): boolean {
  return options.sentencePerLine || options.semanticLineBreaks;
}

/**
 * Two or more trailing spaces, or a trailing backslash.
 */
export function hasHardBreak(line: string): boolean {
  return /(?: {2,}|\\)$/.test(line);
}

/**
 * Lay out one logical run of inline text. Lines come back with their
 * prefixes applied.
 */
function layoutInline(text: string, context: ReflowContext, layout: InlineLayout): string[] {
  const { options, abbreviations } = context;

  if (layout.sentenceSplitting && usesSentenceLines(options)) {
    const tokens = tokenize(text, { lengthMode: options.lengthMode, abbreviations, sentences: 'split' });
    const lines: string[] = [];
    groupSentences(tokens).forEach((sentence, index) => {
      const prefix = index === 0 ? layout.firstLinePrefix : layout.continuationPrefix;
      if (options.sentencePerLine) {
        lines.push(prefix + sentence.map((token) => token.text).join(' '));
        return;
      }
      lines.push(
        ...packSemanticLines(sentence, {
          width: options.lineLength,
          lengthMode: options.lengthMode,
          firstLinePrefix: prefix,
          continuationPrefix: layout.continuationPrefix
        })
      );
    });
    return lines;
  }

  const tokens = tokenize(text, {
    lengthMode: options.lengthMode,
    abbreviations,
    sentences: options.breakOnSentences ? 'boundaries' : 'none'
  });
  return packTokens(tokens, {
    width: options.lineLength,
    lengthMode: options.lengthMode,
    firstLinePrefix: layout.firstLinePrefix,
    continuationPrefix: layout.continuationPrefix,
    breakOnSentences: options.breakOnSentences
  });
}

/**
 * Split tokens after every sentence end. A sentence whose first word would
 * read as block syntax at the start of a line stays with the one before.
 */
function groupSentences(tokens: readonly Token[]): Token[][] {
  const sentences: Token[][] = [];
  let current: Token[] = [];
  for (const token of tokens) {
    if (current.length === 0 && sentences.length > 0 && startsBlockStructure(token.text)) {
      current = sentences.pop() ?? [];
    }
    current.push(token);
    if (token.sentenceEnd) {
      sentences.push(current);
      current = [];
    }
  }
  if (current.length > 0) sentences.push(current);
  return sentences;
}

function blockLayout(block: ReflowableBlock): InlineLayout {
  switch (block.type) {
    case 'paragraph':
      return { firstLinePrefix: block.indent, continuationPrefix: block.indent, sentenceSplitting: true };
    case 'list-item':
      return {
        firstLinePrefix: `${block.indent}${block.marker} `,
        continuationPrefix: block.continuationIndent,
        sentenceSplitting: true
      };
    case 'blockquote': {
      const prefix = block.indent + '> '.repeat(block.depth);
      return { firstLinePrefix: prefix, continuationPrefix: prefix, sentenceSplitting: true };
    }
    case 'definition':
      return {
        firstLinePrefix: block.marker,
        continuationPrefix: ' '.repeat(columnsOf(block.marker.replace(':', ' '))),
        sentenceSplitting: false
      };
  }
}

/**
 * Hard breaks always end a part; with preserveBreaks every line is its own.
 */
function splitParts(lines: readonly string[], preserveBreaks: boolean): Part[] {
  const parts: Part[] = [];
  let from = 0;
  lines.forEach((line, index) => {
    const hardBreak = hasHardBreak(line);
    if (preserveBreaks || hardBreak || index === lines.length - 1) {
      parts.push({ from, to: index + 1, hardBreak });
      from = index + 1;
    }
  });
  return parts;
}

/**
 * Reflow one eligible block. Source lines that already fit are kept as
 * written in width mode, so a second run changes nothing.
 */
export function renderBlock(block: ReflowableBlock, source: readonly SourceLine[], context: ReflowContext): RenderedBlock {
  const { options } = context;
  const sourceLines = source.slice(block.firstLine, block.lastLine + 1);
  const newline = sourceLines.find((line) => line.newline !== '')?.newline ?? '\n';
  const finalNewline = sourceLines[sourceLines.length - 1]?.newline ?? '';

  const layout = blockLayout(block);
  const sentenceLines = layout.sentenceSplitting && usesSentenceLines(options);
  const parts = splitParts(block.lines, options.preserveBreaks);
  const out: string[] = [];

  parts.forEach((part, partIndex) => {
    const contents = block.lines.slice(part.from, part.to);
    const joined = contents
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .join(' ');
    const firstSource = sourceLines[part.from]?.text ?? '';

    if (!joined) {
      out.push(firstSource);
      return;
    }
    if (
      !sentenceLines &&
      part.to - part.from === 1 &&
      (options.lineLength === 0 || measureWidth(firstSource.trimEnd(), options.lengthMode) <= options.lineLength)
    ) {
      out.push(firstSource);
      return;
    }

    const lines = layoutInline(joined, context, {
      ...layout,
      firstLinePrefix: partIndex === 0 ? layout.firstLinePrefix : layout.continuationPrefix
    });
    const isLast = partIndex === parts.length - 1;
    if (part.hardBreak && !isLast && !joined.endsWith('\\') && lines.length > 0) {
      lines[lines.length - 1] += '  ';
    }
    out.push(...lines);
  });

  return { lines: out, newline, finalNewline };
}

/**
 * Reflow a whole document. Blocks that are not prose are copied unchanged.
 */
export function reflowMarkdown(text: string, options?: ReflowConfig | ReflowOptions): string {
  const context = createReflowContext(options);
  const { lines, blocks } = classifyDocument(text);
  debug.log('reflowing', blocks.length, 'blocks', context.options);

  let result = '';
  for (const block of blocks) {
    if (!isReflowEligible(block)) {
      result += text.slice(block.start, block.end);
      continue;
    }
    const rendered = renderBlock(block, lines, context);
    result += rendered.lines.join(rendered.newline) + rendered.finalNewline;
  }
  return result;
}

/**
 * Reflow one logical line or paragraph on its own, without block structure.
 */
export function reflowLine(text: string, options?: ReflowConfig | ReflowOptions): string[] {
  const context = createReflowContext(options);
  const { lineLength, lengthMode } = context.options;
  if (!text.trim()) return [];

  const fits = lineLength === 0 || measureWidth(text, lengthMode) <= lineLength;
  if (fits && !usesSentenceLines(context.options) && !/[\r\n]/.test(text)) return [text];

  return layoutInline(text.trim(), context, { firstLinePrefix: '', continuationPrefix: '', sentenceSplitting: true });
}
