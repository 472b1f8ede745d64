import type { LengthMode, ReflowConfig, ReflowOptions } from '../types/config.js';

const LENGTH_MODES: Record<string, LengthMode> = {
  chars: 'chars',
  characters: 'chars',
  visual: 'visual',
  display: 'visual',
  'visual-width': 'visual',
  visual_width: 'visual',
  bytes: 'bytes'
};

export const DEFAULT_REFLOW_OPTIONS: ReflowOptions = Object.freeze({
  lineLength: 80,
  breakOnSentences: true,
  preserveBreaks: false,
  sentencePerLine: false,
  semanticLineBreaks: false,
  abbreviations: undefined,
  lengthMode: 'chars'
});

export function parseLengthMode(value: string): LengthMode {
  const mode = LENGTH_MODES[value.trim().toLowerCase()];
  if (!mode) {
    throw new Error(`Unknown length mode: ${value}. Available modes: chars, visual, bytes`);
  }
  return mode;
}

/**
 * Fill in defaults and validate. The result is frozen and shared by the whole
 * invocation.
 */
export function resolveReflowOptions(config: ReflowConfig = {}): ReflowOptions {
  const lineLength = config.lineLength ?? DEFAULT_REFLOW_OPTIONS.lineLength;
  if (!Number.isInteger(lineLength) || lineLength < 0) {
    throw new Error(`Invalid line length: ${lineLength}. Expected a non-negative integer (0 = unlimited)`);
  }

  let abbreviations: string[] | undefined;
  if (config.abbreviations) {
    abbreviations = [];
    for (const entry of config.abbreviations) {
      if (entry.replace(/\.+$/, '').trim().length === 0) {
        console.warn(`Ignoring empty abbreviation entry: ${JSON.stringify(entry)}`);
        continue;
      }
      abbreviations.push(entry);
    }
  }

  return Object.freeze({
    lineLength,
    breakOnSentences: config.breakOnSentences ?? DEFAULT_REFLOW_OPTIONS.breakOnSentences,
    preserveBreaks: config.preserveBreaks ?? DEFAULT_REFLOW_OPTIONS.preserveBreaks,
    sentencePerLine: config.sentencePerLine ?? DEFAULT_REFLOW_OPTIONS.sentencePerLine,
    semanticLineBreaks: config.semanticLineBreaks ?? DEFAULT_REFLOW_OPTIONS.semanticLineBreaks,
    abbreviations: abbreviations ? Object.freeze(abbreviations) : undefined,
    lengthMode: config.lengthMode ? parseLengthMode(config.lengthMode) : DEFAULT_REFLOW_OPTIONS.lengthMode
  });
}

/**
 * Options may arrive either resolved or as a partial config.
 */
export function toReflowOptions(options: ReflowConfig | ReflowOptions | undefined): ReflowOptions {
  if (options && Object.isFrozen(options) && isResolved(options)) return options;
  return resolveReflowOptions(options);
}

function isResolved(options: ReflowConfig | ReflowOptions): options is ReflowOptions {
  return (
    typeof options.lineLength === 'number' &&
    typeof options.breakOnSentences === 'boolean' &&
    typeof options.preserveBreaks === 'boolean' &&
    typeof options.sentencePerLine === 'boolean' &&
    typeof options.semanticLineBreaks === 'boolean' &&
    typeof options.lengthMode === 'string' &&
    options.lengthMode in LENGTH_MODES &&
    LENGTH_MODES[options.lengthMode] === options.lengthMode
  );
}
