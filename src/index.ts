import type {
  ChainableMarkdownReflow,
  LengthMode,
  ReflowConfig,
  ReflowPresetName,
  SentencePerLineConfig,
  WrapConfig
} from './types/index.js';
import { resolveReflowOptions } from './core/options.js';
import { reflowLine, reflowMarkdown } from './core/reflow/engine.js';

// Convenience configuration presets
export const ReflowPresets = {
  /**
   * Wrap prose at 80 columns, keeping sentence starts off line ends
   */
  wrap: {
    lineLength: 80,
    breakOnSentences: true,
    preserveBreaks: false,
    sentencePerLine: false,
    semanticLineBreaks: false
  } satisfies WrapConfig,

  /**
   * Join and rewrap every paragraph, ignoring how the source was broken
   */
  normalize: {
    lineLength: 80,
    breakOnSentences: false,
    preserveBreaks: false,
    sentencePerLine: false,
    semanticLineBreaks: false
  } satisfies WrapConfig,

  /**
   * One sentence per line, no width limit. Diff-friendly
   */
  sentencePerLine: {
    lineLength: 0,
    sentencePerLine: true,
    semanticLineBreaks: false,
    preserveBreaks: false
  } satisfies SentencePerLineConfig,

  /**
   * Semantic line breaks: one sentence per line, long sentences broken at
   * clauses
   */
  semantic: {
    lineLength: 80,
    sentencePerLine: false,
    semanticLineBreaks: true,
    preserveBreaks: false
  }
} satisfies Record<ReflowPresetName, ReflowConfig>;

export type ReflowPreset = keyof typeof ReflowPresets;

export class MarkdownReflow implements ChainableMarkdownReflow {
  private config: ReflowConfig;

  constructor(config: ReflowConfig = {}) {
    // Fail on bad options here rather than on the first reflow
    resolveReflowOptions(config);
    this.config = { ...config };
  }

  // Chainable configuration methods
  setLineLength(length: number): this {
    return this.update({ lineLength: length });
  }

  setLengthMode(mode: LengthMode): this {
    return this.update({ lengthMode: mode });
  }

  sentencePerLine(enabled: boolean = true): this {
    return this.update({ sentencePerLine: enabled });
  }

  semanticLineBreaks(enabled: boolean = true): this {
    return this.update({ semanticLineBreaks: enabled });
  }

  preserveBreaks(enabled: boolean = true): this {
    return this.update({ preserveBreaks: enabled });
  }

  breakOnSentences(enabled: boolean = true): this {
    return this.update({ breakOnSentences: enabled });
  }

  addAbbreviations(abbreviations: readonly string[]): this {
    return this.update({ abbreviations: [...(this.config.abbreviations ?? []), ...abbreviations] });
  }

  // Apply a preset configuration; abbreviations and length mode are kept
  applyPreset(preset: ReflowPreset): this {
    if (!Object.hasOwn(ReflowPresets, preset)) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(ReflowPresets).join(', ')}`);
    }
    return this.update(ReflowPresets[preset]);
  }

  getConfig(): Readonly<ReflowConfig> {
    return { ...this.config };
  }

  reflow(markdown: string): string {
    return reflowMarkdown(markdown, this.config);
  }

  reflowLine(line: string): string[] {
    return reflowLine(line, this.config);
  }

  // Static convenience method
  static reflowWithPreset(markdown: string, preset: ReflowPreset): string {
    return new MarkdownReflow().applyPreset(preset).reflow(markdown);
  }

  private update(changes: ReflowConfig): this {
    const next = { ...this.config, ...changes };
    resolveReflowOptions(next);
    this.config = next;
    return this;
  }
}

export { LineLengthRule, type LineLengthRuleConfig, type LineLengthWarning } from './rules/line-length.js';
export * from './types/index.js';
export * from './core/index.js';
