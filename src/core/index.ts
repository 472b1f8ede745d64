export { measureWidth, codePointWidth, createMeasurer } from './width/measurer.js';
export { scanSpans, flattenSpans, isInsideSpan } from './inline/span-scanner.js';
export { AbbreviationSet, DEFAULT_ABBREVIATIONS } from './sentence/abbreviations.js';
export { findSentenceBoundaries, splitIntoSentences } from './sentence/sentence-splitter.js';
export { continueEmphasis } from './sentence/emphasis-continuation.js';
export { classifyBlocks, classifyDocument, isReflowEligible, type ClassifiedDocument } from './blocks/block-classifier.js';
export { tokenize, type SentenceMode, type TokenizeOptions } from './layout/tokenizer.js';
export { packTokens, packSemanticLines, type PackOptions } from './layout/line-packer.js';
export { DEFAULT_REFLOW_OPTIONS, parseLengthMode, resolveReflowOptions } from './options.js';
export { reflowMarkdown, reflowLine, hasHardBreak } from './reflow/engine.js';
export { reflowParagraphAtLine, type ParagraphReflow } from './reflow/paragraph-at-line.js';
