import type { SourceLine } from '../../types/markdown.js';

/**
 * Single-line recognisers used by the block classifier. Unless stated
 * otherwise they take a line's content with its leading whitespace removed.
 */

const ATX_HEADING = /^(#{1,6})(?:[ \t]|$)/;
const SETEXT_UNDERLINE = /^(?:=+|-+)[ \t]*$/;
const THEMATIC_BREAK = /^(?:(?:\*[ \t]*){3,}|(?:-[ \t]*){3,}|(?:_[ \t]*){3,})$/;
const BULLET_MARKER = /^([-*+])(?:[ \t]|$)/;
const ORDERED_MARKER = /^(\d{1,9}[.)])(?:[ \t]|$)/;
const FENCE = /^(`{3,}|~{3,})(.*)$/;
const DEFINITION_MARKER = /^([ \t]{0,3}:)([ \t]+)(?=\S)/;
const REFERENCE_DEFINITION = /^\[[^\]]+\]:/;
const TABLE_DELIMITER = /^\|?[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)*\|?[ \t]*$/;
const TEMPLATE_DIRECTIVE = /^(?:\{\{[<%].*[>%]\}\}|\{%.*%\})[ \t]*$/;
const HTML_RAW_OPEN = /^<(script|pre|style|textarea)(?:[ \t>]|$)/i;
const HTML_TAG_OPEN = /^<\/?[A-Za-z][A-Za-z0-9-]*(?:[ \t>]|\/>|$)/;

export function splitLines(source: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;
  while (start < source.length) {
    const lf = source.indexOf('\n', start);
    if (lf < 0) {
      lines.push({ text: source.slice(start), start, end: source.length, newline: '', index: lines.length });
      break;
    }
    const crlf = lf > start && source[lf - 1] === '\r';
    lines.push({
      text: source.slice(start, crlf ? lf - 1 : lf),
      start,
      end: lf + 1,
      newline: crlf ? '\r\n' : '\n',
      index: lines.length
    });
    start = lf + 1;
  }
  return lines;
}

export function isBlank(text: string): boolean {
  return /^[ \t]*$/.test(text);
}

export function leadingWhitespace(text: string): string {
  let i = 0;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t')) i++;
  return text.slice(0, i);
}

/**
 * Width of leading whitespace in columns; tabs advance to the next multiple of 4.
 */
export function columnsOf(whitespace: string): number {
  let columns = 0;
  for (const ch of whitespace) {
    if (ch === '\t') columns += 4 - (columns % 4);
    else if (ch === ' ') columns++;
    else break;
  }
  return columns;
}

export function indentColumns(text: string): number {
  return columnsOf(leadingWhitespace(text));
}

export type Fence = {
  char: '`' | '~';
  length: number;
};

export function parseFence(content: string): Fence | null {
  const match = FENCE.exec(content);
  const run = match?.[1];
  if (!match || !run) return null;
  const char = run[0] === '`' ? '`' : '~';
  // A backtick fence's info string may not contain backticks
  if (char === '`' && (match[2] ?? '').includes('`')) return null;
  return { char, length: run.length };
}

export function closesFence(content: string, fence: Fence): boolean {
  let i = 0;
  while (content[i] === fence.char) i++;
  return i >= fence.length && isBlank(content.slice(i));
}

export function atxHeadingLevel(content: string): number {
  return ATX_HEADING.exec(content)?.[1]?.length ?? 0;
}

export function setextLevel(content: string): 0 | 1 | 2 {
  if (!SETEXT_UNDERLINE.test(content)) return 0;
  return content[0] === '=' ? 1 : 2;
}

export function isThematicBreak(content: string): boolean {
  return THEMATIC_BREAK.test(content);
}

export type ListMarker = {
  marker: string;
  ordered: boolean;
  // Text after the marker and the whitespace that follows it
  content: string;
};

export function parseListMarker(content: string): ListMarker | null {
  const bullet = BULLET_MARKER.exec(content);
  const ordered = bullet ? null : ORDERED_MARKER.exec(content);
  const marker = bullet?.[1] ?? ordered?.[1];
  if (!marker) return null;
  return {
    marker,
    ordered: !bullet,
    content: content.slice(marker.length).replace(/^[ \t]+/, '')
  };
}

export type QuotePrefix = {
  depth: number;
  // Content after the last `>` and its optional following space
  content: string;
};

export function parseQuote(content: string): QuotePrefix | null {
  if (content[0] !== '>') return null;
  let depth = 0;
  let i = 0;
  while (content[i] === '>') {
    depth++;
    i++;
    if (content[i] === ' ') i++;
    // "> > x" nests, "> text" does not
    const next = leadingWhitespace(content.slice(i));
    if (content[i + next.length] === '>' && next.length <= 3) i += next.length;
  }
  return { depth, content: content.slice(i) };
}

export type DefinitionMarker = {
  // Indent, colon and the whitespace after it
  marker: string;
  content: string;
};

/**
 * Takes the full line, indent included.
 */
export function parseDefinitionMarker(text: string): DefinitionMarker | null {
  const match = DEFINITION_MARKER.exec(text);
  if (!match) return null;
  const marker = `${match[1] ?? ''}${match[2] ?? ''}`;
  return { marker, content: text.slice(marker.length) };
}

export type HtmlBlockKind = 'comment' | 'raw' | 'generic';

export function htmlBlockKind(content: string): HtmlBlockKind | null {
  if (content.startsWith('<!--')) return 'comment';
  if (HTML_RAW_OPEN.test(content)) return 'raw';
  if (HTML_TAG_OPEN.test(content) || content.startsWith('<?') || /^<![A-Z]/.test(content)) return 'generic';
  return null;
}

/**
 * Whether `content` ends the raw or comment HTML block that `opener` started.
 */
export function closesHtmlBlock(content: string, kind: HtmlBlockKind, opener: string): boolean {
  if (kind === 'comment') return content.includes('-->');
  if (kind === 'raw') {
    const name = HTML_RAW_OPEN.exec(opener)?.[1]?.toLowerCase() ?? '';
    return content.toLowerCase().includes(`</${name}>`);
  }
  return false;
}

export function isTableDelimiterRow(content: string): boolean {
  return content.includes('-') && TABLE_DELIMITER.test(content);
}

/**
 * A table row, or a header row whose next line is a delimiter row.
 */
export function startsTable(content: string, nextContent: string): boolean {
  return content.startsWith('|') || (content.includes('|') && isTableDelimiterRow(nextContent.trim()));
}

export function isReferenceDefinition(content: string): boolean {
  return REFERENCE_DEFINITION.test(content);
}

export function isTemplateDirective(content: string): boolean {
  return TEMPLATE_DIRECTIVE.test(content);
}

/**
 * Words that would change the block structure if a wrapped line began with
 * them: list markers, heading hashes, quote markers, table pipes, fences,
 * setext underlines, delimiter cells, definition colons and reference labels.
 */
export function startsBlockStructure(word: string): boolean {
  if (word.startsWith('>') || word.startsWith('|')) return true;
  if (/^(?:#{1,6}|[-+*]|\d{1,9}[.)]|=+|:?-+:?|:|\*{3,}|_{3,})$/.test(word)) return true;
  if (/^(?:`{3,}|~{3,})/.test(word)) return true;
  return isReferenceDefinition(word);
}
