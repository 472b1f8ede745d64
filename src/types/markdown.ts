/**
 * Markdown structures shared by the reflow pipeline.
 *
 * Offsets are string indices (UTF-16 code units) into the text the structure
 * was computed from; `end` is exclusive.
 */

export type Range = {
  start: number;
  end: number;
};

// ---------------------------------------------------------------------------
// Blocks
// ---------------------------------------------------------------------------

export type BlockType =
  | 'paragraph'
  | 'list-item'
  | 'blockquote'
  | 'definition'
  | 'heading'
  | 'code-block'
  | 'table'
  | 'html-block'
  | 'front-matter'
  | 'thematic-break'
  | 'reference-definition'
  | 'template-directive'
  | 'blank';

/**
 * One physical source line. `text` excludes the terminator.
 */
export type SourceLine = {
  text: string;
  start: number;
  // Offset after the terminator
  end: number;
  newline: '' | '\n' | '\r\n';
  index: number;
};

type BlockBase = Range & {
  // 0-based index of the first and last source line
  firstLine: number;
  lastLine: number;
};

export type ParagraphBlock = BlockBase & {
  type: 'paragraph';
  indent: string;
  // Content of each line with the indent removed; trailing whitespace kept
  lines: string[];
};

export type ListItemBlock = BlockBase & {
  type: 'list-item';
  indent: string;
  marker: string;
  ordered: boolean;
  continuationIndent: string;
  lines: string[];
};

export type BlockquoteBlock = BlockBase & {
  type: 'blockquote';
  depth: number;
  indent: string;
  content: 'prose' | 'structure';
  lines: string[];
};

export type DefinitionBlock = BlockBase & {
  type: 'definition';
  isTerm: boolean;
  // Leading part of a body's first line, e.g. ": " or "  :   "
  marker: string;
  lines: string[];
};

export type HeadingBlock = BlockBase & {
  type: 'heading';
  level: number;
  setext: boolean;
};

export type CodeBlock = BlockBase & {
  type: 'code-block';
  fenced: boolean;
};

export type FrontMatterBlock = BlockBase & {
  type: 'front-matter';
  format: 'yaml' | 'toml';
};

export type OpaqueBlock = BlockBase & {
  type: 'table' | 'html-block' | 'thematic-break' | 'reference-definition' | 'template-directive' | 'blank';
};

export type Block =
  | ParagraphBlock
  | ListItemBlock
  | BlockquoteBlock
  | DefinitionBlock
  | HeadingBlock
  | CodeBlock
  | FrontMatterBlock
  | OpaqueBlock;

export type ReflowableBlock = ParagraphBlock | ListItemBlock | BlockquoteBlock | DefinitionBlock;

// ---------------------------------------------------------------------------
// Inline spans
// ---------------------------------------------------------------------------

export type EmphasisMarker = '*' | '_' | '~' | '^' | '=';

export type EmphasisWeight = 'italic' | 'bold' | 'bold-italic';

export type EmphasisStyle =
  | 'emphasis'
  | 'strong'
  | 'strong-emphasis'
  | 'strikethrough'
  | 'subscript'
  | 'superscript'
  | 'highlight';

export type LinkedImagePattern =
  | 'inline-inline'
  | 'reference-inline'
  | 'inline-reference'
  | 'reference-reference';

export type SpanKind =
  | { type: 'inline-code' }
  | { type: 'link'; form: 'inline' | 'reference' | 'collapsed' | 'shortcut' | 'autolink' | 'wiki' }
  | { type: 'image'; form: 'inline' | 'reference' | 'collapsed' | 'shortcut' }
  | { type: 'linked-image'; pattern: LinkedImagePattern }
  | { type: 'footnote'; form: 'inline' | 'numeric' | 'named' }
  // Template tags: {{< >}}, {{% %}}, {% %}, {{ }}
  | { type: 'shortcode'; open: string; close: string }
  | { type: 'emphasis'; markerChar: EmphasisMarker; weight: EmphasisWeight; style: EmphasisStyle }
  | { type: 'html-tag' }
  | { type: 'html-entity' }
  | { type: 'math'; display: boolean }
  | { type: 'emoji-shortcode' };

export type SpanType = SpanKind['type'];

export type ProtectedSpan = Range & {
  kind: SpanKind;
  // Interior range; equals [start, end) for kinds without delimiters
  contentStart: number;
  contentEnd: number;
  // Only emphasis spans have children
  children: ProtectedSpan[];
};

// ---------------------------------------------------------------------------
// Packing
// ---------------------------------------------------------------------------

export type Token = {
  text: string;
  width: number;
  // Contains a protected span and must never be split
  atomic: boolean;
  // A sentence ends after this token
  sentenceEnd: boolean;
};
