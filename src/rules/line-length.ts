import type { LengthModeAlias, LineLengthConfig, ReflowConfig, ReflowOptions } from '../types/config.js';
import type { Block } from '../types/markdown.js';
import { classifyDocument } from '../core/blocks/block-classifier.js';
import { isReferenceDefinition } from '../core/blocks/line-kinds.js';
import { scanSpans } from '../core/inline/span-scanner.js';
import { resolveReflowOptions } from '../core/options.js';
import { reflowMarkdown } from '../core/reflow/engine.js';
import { reflowParagraphAtLine } from '../core/reflow/paragraph-at-line.js';
import { measureWidth } from '../core/width/measurer.js';
import { createDebugLogger } from '../utils/debug.js';

const debug = createDebugLogger('line-length');

export type LineLengthRuleConfig = Partial<Omit<LineLengthConfig, 'lengthMode' | 'abbreviations'>> & {
  lengthMode?: LineLengthConfig['lengthMode'] | LengthModeAlias;
  abbreviations?: readonly string[];
};

export interface LineLengthWarning {
  // 1-based
  line: number;
  // 1-based column of the first character past the limit
  column: number;
  length: number;
  limit: number;
  message: string;
}

const LINK_KINDS = new Set(['link', 'image', 'linked-image']);
const BARE_URL = /^<?https?:\/\/\S+>?$/;
const SETEXT_UNDERLINE = /^(?:=+|-+)$/;
const INLINE_LINK = /\[([^\[\]]*)\]\((https?:\/\/[^\s()]+)\)/g;
// Stops at brackets so a URL inside a link's parentheses is left alone
const URL_IN_TEXT = /(?<![(<])https?:\/\/[^\s()<>\[\]]+/g;
const URL_PLACEHOLDER_LENGTH = 15;
// Quote markers, list markers and heading hashes in front of a line's text
const LINE_PREFIX = /^(?:>[ \t]?)*(?:(?:[-*+]|\d{1,9}[.)]|#{1,6})[ \t]+)?/;

/**
 * Reports lines wider than the limit and, when reflow is on, rewraps the
 * prose that holds them.
 */
export class LineLengthRule {
  private readonly config: Omit<LineLengthConfig, 'abbreviations'>;
  private readonly reflowOptions: ReflowOptions;

  constructor(config: LineLengthRuleConfig = {}) {
    // Validates lineLength and lengthMode
    this.reflowOptions = resolveReflowOptions({
      lineLength: config.lineLength ?? 80,
      lengthMode: config.lengthMode ?? 'chars',
      abbreviations: config.abbreviations ?? []
    });
    this.config = {
      lineLength: this.reflowOptions.lineLength,
      codeBlocks: config.codeBlocks ?? true,
      tables: config.tables ?? false,
      headings: config.headings ?? true,
      paragraphs: config.paragraphs ?? true,
      strict: config.strict ?? false,
      reflow: config.reflow ?? false,
      reflowMode: config.reflowMode ?? 'default',
      lengthMode: this.reflowOptions.lengthMode
    };
  }

  check(content: string): LineLengthWarning[] {
    const limit = this.config.lineLength;
    if (limit === 0) return [];

    const { lines, blocks } = classifyDocument(content);
    const warnings: LineLengthWarning[] = [];

    for (const block of blocks) {
      if (!this.checksBlock(block)) continue;
      for (let index = block.firstLine; index <= block.lastLine; index++) {
        const text = (lines[index]?.text ?? '').trimEnd();
        const length = this.effectiveLength(text);
        if (length <= limit) continue;
        if (!this.config.strict && this.isExempt(text)) continue;
        warnings.push({
          line: index + 1,
          column: limit + 1,
          length,
          limit,
          message: `Line length ${length} exceeds ${limit} characters`
        });
      }
    }
    return warnings;
  }

  fix(content: string): string {
    if (!this.config.reflow || !this.config.paragraphs) return content;

    switch (this.config.reflowMode) {
      case 'normalize':
        return reflowMarkdown(content, this.reflowConfig({}));
      case 'sentence-per-line':
        return reflowMarkdown(content, this.reflowConfig({ sentencePerLine: true }));
      case 'default':
        return this.fixWarnedParagraphs(content);
    }
  }

  /**
   * Rewrap only the paragraphs that hold a too-long line, bottom-up so
   * earlier line numbers stay valid.
   */
  private fixWarnedParagraphs(content: string): string {
    const warnings = this.check(content);
    if (warnings.length === 0) return content;

    const options = this.reflowConfig({ preserveBreaks: true });
    const done = new Set<number>();
    let result = content;
    for (const warning of [...warnings].reverse()) {
      const fixed = reflowParagraphAtLine(result, warning.line, options);
      if (!fixed || done.has(fixed.startLine)) continue;
      done.add(fixed.startLine);
      result = result.slice(0, fixed.start) + fixed.replacement + result.slice(fixed.end);
    }
    debug.log('reflowed', done.size, 'paragraphs for', warnings.length, 'warnings');
    return result;
  }

  private reflowConfig(overrides: ReflowConfig): ReflowConfig {
    return {
      lineLength: this.reflowOptions.lineLength,
      lengthMode: this.reflowOptions.lengthMode,
      abbreviations: this.reflowOptions.abbreviations,
      ...overrides
    };
  }

  private checksBlock(block: Block): boolean {
    switch (block.type) {
      case 'code-block':
        return this.config.codeBlocks;
      case 'table':
        return this.config.tables;
      case 'heading':
        return this.config.headings;
      case 'blank':
      case 'front-matter':
        return false;
      case 'html-block':
        return this.config.strict;
      default:
        return this.config.paragraphs;
    }
  }

  /**
   * Lines that wrapping cannot shorten: reference definitions, a lone link,
   * image or URL, and setext underlines.
   */
  private isExempt(text: string): boolean {
    const trimmed = text.trim();
    if (isReferenceDefinition(trimmed) || SETEXT_UNDERLINE.test(trimmed)) return true;

    const content = trimmed.replace(LINE_PREFIX, '');
    if (BARE_URL.test(content)) return true;
    const spans = scanSpans(content);
    const only = spans[0];
    return spans.length === 1 && only?.start === 0 && only.end === content.length && LINK_KINDS.has(only.kind.type);
  }

  /**
   * Width with long link destinations and bare URLs counted as short
   * placeholders, so a URL alone never makes a line too long.
   */
  private effectiveLength(text: string): number {
    const length = measureWidth(text, this.config.lengthMode);
    if (this.config.strict || !text.includes('http')) return length;
    const shortened = text
      .replace(INLINE_LINK, (match: string, label: string, url: string) =>
        url.length > URL_PLACEHOLDER_LENGTH ? `[${label}](url)` : match
      )
      .replace(URL_IN_TEXT, (url: string) => 'x'.repeat(Math.min(URL_PLACEHOLDER_LENGTH, url.length)));
    return measureWidth(shortened, this.config.lengthMode);
  }
}
