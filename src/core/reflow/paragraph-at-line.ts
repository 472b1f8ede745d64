import type { ReflowConfig, ReflowOptions } from '../../types/config.js';
import { classifyDocument, isReflowEligible } from '../blocks/block-classifier.js';
import { createReflowContext, renderBlock } from './engine.js';

export type ParagraphReflow = {
  // Offsets of the replaced text; `end` stops before the block's final newline
  start: number;
  end: number;
  // 1-based, inclusive
  startLine: number;
  endLine: number;
  replacement: string;
};

/**
 * Reflow only the block that contains `lineNumber` (1-based). Returns null
 * when the line does not exist or its block is not prose.
 */
export function reflowParagraphAtLine(
  content: string,
  lineNumber: number,
  options?: ReflowConfig | ReflowOptions
): ParagraphReflow | null {
  if (!Number.isInteger(lineNumber) || lineNumber < 1) return null;

  const { lines, blocks } = classifyDocument(content);
  const index = lineNumber - 1;
  if (index >= lines.length) return null;

  const block = blocks.find((candidate) => candidate.firstLine <= index && index <= candidate.lastLine);
  if (!block || !isReflowEligible(block)) return null;

  const rendered = renderBlock(block, lines, createReflowContext(options));
  return {
    start: block.start,
    end: block.end - rendered.finalNewline.length,
    startLine: block.firstLine + 1,
    endLine: block.lastLine + 1,
    replacement: rendered.lines.join(rendered.newline)
  };
}
