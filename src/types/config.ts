export type LengthMode = 'chars' | 'visual' | 'bytes';

/**
 * Options accepted by the reflow entry points. Every field is optional;
 * `resolveReflowOptions` fills in the defaults.
 */
export interface ReflowConfig {
  // Target width; 0 disables wrapping
  lineLength?: number;
  // Move a dangling sentence start down to the next line when wrapping
  breakOnSentences?: boolean;
  // Reflow every source line of a paragraph on its own
  preserveBreaks?: boolean;
  // One sentence per output line, no width wrapping
  sentencePerLine?: boolean;
  // One sentence per line; long sentences break at clauses, then words
  semanticLineBreaks?: boolean;
  // Added to the built-in abbreviations; the trailing period is optional
  abbreviations?: readonly string[];
  lengthMode?: LengthMode | LengthModeAlias;
}

export type LengthModeAlias = 'characters' | 'display' | 'visual-width';

/**
 * Fully resolved, immutable options. Created once per invocation.
 */
export interface ReflowOptions {
  readonly lineLength: number;
  readonly breakOnSentences: boolean;
  readonly preserveBreaks: boolean;
  readonly sentencePerLine: boolean;
  readonly semanticLineBreaks: boolean;
  readonly abbreviations: readonly string[] | undefined;
  readonly lengthMode: LengthMode;
}

export type ReflowMode = 'default' | 'normalize' | 'sentence-per-line';

export interface LineLengthConfig {
  lineLength: number;
  codeBlocks: boolean;
  tables: boolean;
  headings: boolean;
  paragraphs: boolean;
  // Disables the URL / single-link / reference-definition exemptions
  strict: boolean;
  reflow: boolean;
  reflowMode: ReflowMode;
  lengthMode: LengthMode;
  abbreviations: string[];
}

// Helper types for common configurations
export type SentencePerLineConfig = ReflowConfig & {
  sentencePerLine: true;
  lineLength: 0;
};

export type WrapConfig = ReflowConfig & {
  sentencePerLine?: false;
  semanticLineBreaks?: false;
};

export type ReflowPresetName = 'wrap' | 'normalize' | 'sentencePerLine' | 'semantic';

// Chainable configuration interface for better TypeScript support
export interface ChainableMarkdownReflow {
  setLineLength(length: number): ChainableMarkdownReflow;
  setLengthMode(mode: LengthMode): ChainableMarkdownReflow;
  sentencePerLine(enabled?: boolean): ChainableMarkdownReflow;
  semanticLineBreaks(enabled?: boolean): ChainableMarkdownReflow;
  preserveBreaks(enabled?: boolean): ChainableMarkdownReflow;
  breakOnSentences(enabled?: boolean): ChainableMarkdownReflow;
  addAbbreviations(abbreviations: readonly string[]): ChainableMarkdownReflow;
  applyPreset(preset: ReflowPresetName): ChainableMarkdownReflow;
  reflow(markdown: string): string;
  reflowLine(line: string): string[];
}
