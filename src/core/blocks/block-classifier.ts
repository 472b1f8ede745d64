import type {
  Block,
  BlockquoteBlock,
  DefinitionBlock,
  ListItemBlock,
  OpaqueBlock,
  ParagraphBlock,
  ReflowableBlock,
  SourceLine
} from '../../types/markdown.js';
import { createDebugLogger } from '../../utils/debug.js';
import {
  atxHeadingLevel,
  closesFence,
  closesHtmlBlock,
  columnsOf,
  htmlBlockKind,
  indentColumns,
  isBlank,
  isReferenceDefinition,
  isTemplateDirective,
  isThematicBreak,
  leadingWhitespace,
  parseDefinitionMarker,
  parseFence,
  parseListMarker,
  parseQuote,
  setextLevel,
  splitLines,
  startsTable,
  type Fence
} from './line-kinds.js';

const debug = createDebugLogger('blocks');

// Columns of indentation that still leave a line structural
const MAX_STRUCTURAL_INDENT = 3;
const CODE_INDENT = 4;

type Span = { first: number; last: number };

/**
 * Partition a document into blocks. Only enough of Markdown is recognised to
 * know what must never be rewrapped; every line lands in exactly one block.
 */
class BlockClassifier {
  readonly lines: SourceLine[];
  private readonly blocks: Block[] = [];
  // Continuation column of the most recent list item while its context lasts
  private listColumn: number | null = null;

  constructor(source: string) {
    this.lines = splitLines(source);
  }

  classify(): Block[] {
    let i = 0;
    while (i < this.lines.length) {
      i = Math.max(this.classifyAt(i), i + 1);
    }
    debug.log('classified', this.blocks.length, 'blocks from', this.lines.length, 'lines');
    return this.blocks;
  }

  private text(index: number): string {
    return this.lines[index]?.text ?? '';
  }

  /**
   * Classify the block starting at line `i` and return the index after it.
   */
  private classifyAt(i: number): number {
    const text = this.text(i);

    if (i === 0) {
      const end = this.frontMatterEnd();
      if (end >= 0) {
        const format = text.trimEnd() === '+++' ? 'toml' : 'yaml';
        this.push({ type: 'front-matter', format, ...this.range({ first: 0, last: end }) });
        return end + 1;
      }
    }

    if (isBlank(text)) {
      let last = i;
      while (last + 1 < this.lines.length && isBlank(this.text(last + 1))) last++;
      this.pushOpaque('blank', { first: i, last });
      return last + 1;
    }

    const columns = indentColumns(text);
    if (this.listColumn !== null && columns < this.listColumn && !parseListMarker(text.trimStart())) {
      this.listColumn = null;
    }
    const base = this.listColumn ?? 0;
    const content = text.slice(leadingWhitespace(text).length);

    if (columns >= base + CODE_INDENT) return this.indentedCode(i, base + CODE_INDENT);

    const fence = parseFence(content);
    if (fence) return this.fencedCode(i, fence);

    const level = atxHeadingLevel(content);
    if (level > 0) {
      this.push({ type: 'heading', level, setext: false, ...this.range({ first: i, last: i }) });
      return i + 1;
    }

    if (isThematicBreak(content)) {
      this.pushOpaque('thematic-break', { first: i, last: i });
      return i + 1;
    }

    if (parseQuote(content)) return this.blockquote(i);
    if (parseListMarker(content)) return this.listItem(i);

    const html = htmlBlockKind(content);
    if (html) return this.htmlBlock(i, html);

    if (startsTable(content, this.text(i + 1))) return this.table(i);

    if (isReferenceDefinition(content)) {
      this.pushOpaque('reference-definition', { first: i, last: i });
      return i + 1;
    }

    if (isTemplateDirective(content)) {
      this.pushOpaque('template-directive', { first: i, last: i });
      return i + 1;
    }

    if (parseDefinitionMarker(text) && this.promoteTerm()) return this.definitionBody(i);

    return this.paragraph(i);
  }

  /**
   * Last line of front matter opened on line 0, or -1.
   */
  private frontMatterEnd(): number {
    const open = this.text(0).trimEnd();
    if (open !== '---' && open !== '+++') return -1;
    for (let j = 1; j < this.lines.length; j++) {
      const line = this.text(j).trimEnd();
      if (line === open || (open === '---' && line === '...')) return j;
    }
    return -1;
  }

  /**
   * Lines that end a paragraph, list item or definition body.
   */
  private interrupts(index: number): boolean {
    const text = this.text(index);
    if (isBlank(text)) return true;
    if (indentColumns(text) > (this.listColumn ?? 0) + MAX_STRUCTURAL_INDENT) return false;
    const content = text.trimStart();
    return (
      parseFence(content) !== null ||
      atxHeadingLevel(content) > 0 ||
      isThematicBreak(content) ||
      parseQuote(content) !== null ||
      parseListMarker(content) !== null ||
      parseDefinitionMarker(text) !== null ||
      startsTable(content, this.text(index + 1))
    );
  }

  private paragraph(i: number): number {
    const indent = leadingWhitespace(this.text(i));
    const lines = [this.text(i).slice(indent.length)];
    let j = i + 1;

    for (; j < this.lines.length; j++) {
      const text = this.text(j);
      const underline = indentColumns(text) <= MAX_STRUCTURAL_INDENT ? setextLevel(text.trimStart()) : 0;
      if (underline > 0) {
        this.push({ type: 'heading', level: underline, setext: true, ...this.range({ first: i, last: j }) });
        return j + 1;
      }
      if (parseDefinitionMarker(text)) {
        this.push({ type: 'definition', isTerm: true, marker: '', lines, ...this.range({ first: i, last: j - 1 }) });
        return j;
      }
      if (this.interrupts(j)) break;
      lines.push(text.trimStart());
    }

    const block: ParagraphBlock = { type: 'paragraph', indent, lines, ...this.range({ first: i, last: j - 1 }) };
    this.push(block);
    return j;
  }

  private listItem(i: number): number {
    const text = this.text(i);
    const indent = leadingWhitespace(text);
    const item = parseListMarker(text.slice(indent.length));
    if (!item) return this.paragraph(i);

    const continuationIndent = indent + ' '.repeat(item.marker.length + 1);
    const continuationColumns = columnsOf(continuationIndent);
    const lines = [item.content];
    // Structure inside the item is measured from its own content column
    this.listColumn = continuationColumns;

    let j = i + 1;
    while (j < this.lines.length && !this.interrupts(j) && indentColumns(this.text(j)) >= continuationColumns) {
      lines.push(this.text(j).trimStart());
      j++;
    }

    const block: ListItemBlock = {
      type: 'list-item',
      indent,
      marker: item.marker,
      ordered: item.ordered,
      continuationIndent,
      lines,
      ...this.range({ first: i, last: j - 1 })
    };
    this.push(block);
    return j;
  }

  /**
   * A run of quote lines at one depth. Prose is reflowed; anything
   * structural inside the quote is kept as written.
   */
  private blockquote(i: number): number {
    const text = this.text(i);
    const indent = leadingWhitespace(text);
    const quote = parseQuote(text.slice(indent.length));
    if (!quote) return this.paragraph(i);

    const depth = quote.depth;
    const quoteAt = (index: number) => {
      const line = this.text(index);
      const lineIndent = leadingWhitespace(line);
      if (lineIndent !== indent) return null;
      const parsed = parseQuote(line.slice(lineIndent.length));
      return parsed && parsed.depth === depth ? parsed : null;
    };

    let j = i + 1;
    const first = quote.content;
    if (isBlank(first) || isQuoteStructure(first)) {
      const fence = parseFence(first.trimStart());
      if (fence) {
        while (j < this.lines.length) {
          const inner = quoteAt(j);
          if (!inner) break;
          j++;
          if (closesFence(inner.content.trimStart(), fence)) break;
        }
      } else if (!isBlank(first)) {
        while (j < this.lines.length) {
          const inner = quoteAt(j);
          if (!inner || isBlank(inner.content)) break;
          j++;
        }
      }
      this.push(quoteBlock(indent, depth, 'structure', [], this.range({ first: i, last: j - 1 })));
      return j;
    }

    const lines = [first.trimStart()];
    while (j < this.lines.length) {
      const inner = quoteAt(j);
      if (!inner || isBlank(inner.content) || interruptsQuoteProse(inner.content, quoteAt(j + 1)?.content ?? '')) break;
      lines.push(inner.content.trimStart());
      j++;
    }
    this.push(quoteBlock(indent, depth, 'prose', lines, this.range({ first: i, last: j - 1 })));
    return j;
  }

  /**
   * A body line such as ": text". It is only a definition when a term or
   * another definition precedes it.
   */
  private definitionBody(i: number): number {
    const body = parseDefinitionMarker(this.text(i));
    if (!body) return this.paragraph(i);
    const markerColumns = columnsOf(body.marker.replace(':', ' '));
    const lines = [body.content];

    let j = i + 1;
    while (j < this.lines.length && !this.interrupts(j) && indentColumns(this.text(j)) >= markerColumns) {
      lines.push(this.text(j).trimStart());
      j++;
    }

    const block: DefinitionBlock = {
      type: 'definition',
      isTerm: false,
      marker: body.marker,
      lines,
      ...this.range({ first: i, last: j - 1 })
    };
    this.push(block);
    return j;
  }

  /**
   * Make sure a definition body has something to attach to: the previous
   * non-blank block must be a definition, or a paragraph, which becomes its
   * term.
   */
  private promoteTerm(): boolean {
    let index = this.blocks.length - 1;
    let block = this.blocks[index];
    if (block?.type === 'blank') block = this.blocks[--index];
    if (!block) return false;
    if (block.type === 'definition') return true;
    if (block.type !== 'paragraph') return false;
    this.blocks[index] = {
      type: 'definition',
      isTerm: true,
      marker: '',
      lines: block.lines,
      start: block.start,
      end: block.end,
      firstLine: block.firstLine,
      lastLine: block.lastLine
    };
    return true;
  }

  private fencedCode(i: number, fence: Fence): number {
    let j = i + 1;
    while (j < this.lines.length) {
      const text = this.text(j);
      j++;
      if (closesFence(text.trimStart(), fence)) break;
    }
    this.push({ type: 'code-block', fenced: true, ...this.range({ first: i, last: j - 1 }) });
    return j;
  }

  private indentedCode(i: number, minColumns: number): number {
    let last = i;
    for (let j = i + 1; j < this.lines.length; j++) {
      const text = this.text(j);
      if (isBlank(text)) continue;
      if (indentColumns(text) < minColumns) break;
      last = j;
    }
    this.push({ type: 'code-block', fenced: false, ...this.range({ first: i, last }) });
    return last + 1;
  }

  private htmlBlock(i: number, kind: 'comment' | 'raw' | 'generic'): number {
    const opener = this.text(i).trimStart();
    let last = i;
    if (kind === 'generic') {
      while (last + 1 < this.lines.length && !isBlank(this.text(last + 1))) last++;
    } else {
      while (!closesHtmlBlock(this.text(last), kind, opener) && last + 1 < this.lines.length) last++;
    }
    this.pushOpaque('html-block', { first: i, last });
    return last + 1;
  }

  private table(i: number): number {
    let last = i;
    while (last + 1 < this.lines.length) {
      const text = this.text(last + 1);
      if (isBlank(text) || !text.includes('|')) break;
      last++;
    }
    this.pushOpaque('table', { first: i, last });
    return last + 1;
  }

  private range(span: Span): { start: number; end: number; firstLine: number; lastLine: number } {
    return {
      start: this.lines[span.first]?.start ?? 0,
      end: this.lines[span.last]?.end ?? 0,
      firstLine: span.first,
      lastLine: span.last
    };
  }

  private pushOpaque(type: OpaqueBlock['type'], span: Span): void {
    this.push({ type, ...this.range(span) });
  }

  private push(block: Block): void {
    this.blocks.push(block);
  }
}

function quoteBlock(
  indent: string,
  depth: number,
  content: 'prose' | 'structure',
  lines: string[],
  range: { start: number; end: number; firstLine: number; lastLine: number }
): BlockquoteBlock {
  return { type: 'blockquote', depth, indent, content, lines, ...range };
}

/**
 * Quote content that is not plain prose.
 */
function isQuoteStructure(content: string): boolean {
  if (indentColumns(content) >= CODE_INDENT) return true;
  const trimmed = content.trimStart();
  return (
    parseFence(trimmed) !== null ||
    atxHeadingLevel(trimmed) > 0 ||
    isThematicBreak(trimmed) ||
    parseListMarker(trimmed) !== null ||
    trimmed.startsWith('|') ||
    htmlBlockKind(trimmed) !== null ||
    isReferenceDefinition(trimmed) ||
    parseDefinitionMarker(content) !== null ||
    setextLevel(trimmed) > 0
  );
}

/**
 * Lines that end a run of quoted prose. HTML only counts on the first line
 * of a quote, as with paragraphs.
 */
function interruptsQuoteProse(content: string, nextContent: string): boolean {
  const trimmed = content.trimStart();
  return (
    startsTable(trimmed, nextContent) ||
    parseFence(trimmed) !== null ||
    atxHeadingLevel(trimmed) > 0 ||
    isThematicBreak(trimmed) ||
    parseListMarker(trimmed) !== null ||
    parseDefinitionMarker(content) !== null ||
    setextLevel(trimmed) > 0
  );
}

export type ClassifiedDocument = {
  lines: SourceLine[];
  blocks: Block[];
};

export function classifyDocument(source: string): ClassifiedDocument {
  const classifier = new BlockClassifier(source);
  const blocks = classifier.classify();
  return { lines: classifier.lines, blocks };
}

export function classifyBlocks(source: string): Block[] {
  return classifyDocument(source).blocks;
}

export function isReflowEligible(block: Block): block is ReflowableBlock {
  switch (block.type) {
    case 'paragraph':
    case 'list-item':
      return true;
    case 'blockquote':
      return block.content === 'prose';
    case 'definition':
      return !block.isTerm;
    default:
      return false;
  }
}
