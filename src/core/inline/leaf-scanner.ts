import type { LinkedImagePattern, ProtectedSpan, SpanKind } from '../../types/markdown.js';
import { isBreakingSpace } from '../sentence/punctuation.js';
import { CloserFinder, isAsciiAlphanumeric, isAsciiLetter, isEscapeAt } from './text-utils.js';

/**
 * Leaf spans are the inline constructs that never contain other spans:
 * code, links, images, footnotes, template tags, HTML, entities, math and
 * emoji shortcodes. Every search is backed by a precomputed index or a
 * memoized closer lookup so one pass over the text stays linear.
 */

// Longest opener first
const SHORTCODE_DELIMITERS: ReadonlyArray<readonly [string, string]> = [
  ['{{<', '>}}'],
  ['{{%', '%}}'],
  ['{%', '%}'],
  ['{{', '}}']
];

const ENTITY = /&(?:#[0-9]{1,7}|#[xX][0-9a-fA-F]{1,6}|[A-Za-z][A-Za-z0-9]{1,31});/y;
const EMAIL_LOCAL = /[A-Za-z0-9.!#$%&'*+/=?^_`{|}~-]/;
const EMAIL_DOMAIN = /[A-Za-z0-9.-]/;
const EMOJI_NAME = /[A-Za-z0-9_+-]/;
const URI_SCHEME = /[A-Za-z0-9+.-]/;
const MAX_SCHEME_LENGTH = 32;

type BracketTarget = {
  end: number;
  form: 'inline' | 'reference' | 'collapsed' | 'shortcut';
};

function makeSpan(start: number, end: number, kind: SpanKind, contentStart = start, contentEnd = end): ProtectedSpan {
  return { start, end, kind, contentStart, contentEnd, children: [] };
}

/**
 * Match backtick runs into code spans. A closer is the next run of exactly
 * the same length; runs are bucketed by length and each bucket is walked
 * with a pointer that only moves forward.
 */
export function findCodeSpans(text: string): ProtectedSpan[] {
  const runs: Array<{ start: number; length: number; escaped: boolean }> = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] !== '`') {
      i++;
      continue;
    }
    const start = i;
    while (text[i] === '`') i++;
    let backslashes = 0;
    while (start - backslashes - 1 >= 0 && text[start - backslashes - 1] === '\\') backslashes++;
    runs.push({ start, length: i - start, escaped: backslashes % 2 === 1 });
  }

  const byLength = new Map<number, number[]>();
  runs.forEach((run, index) => {
    const bucket = byLength.get(run.length);
    if (bucket) bucket.push(index);
    else byLength.set(run.length, [index]);
  });
  const pointers = new Map<number, number>();

  const spans: ProtectedSpan[] = [];
  let k = 0;
  while (k < runs.length) {
    const run = runs[k];
    if (!run) break;
    // An escaped run gives up its first backtick
    const openStart = run.escaped ? run.start + 1 : run.start;
    const openLength = run.escaped ? run.length - 1 : run.length;
    const bucket = openLength > 0 ? byLength.get(openLength) : undefined;
    if (!bucket) {
      k++;
      continue;
    }
    let p = pointers.get(openLength) ?? 0;
    while (p < bucket.length && (bucket[p] ?? Infinity) <= k) p++;
    pointers.set(openLength, p);
    const closerIndex = bucket[p];
    const closer = closerIndex === undefined ? undefined : runs[closerIndex];
    if (closerIndex === undefined || !closer) {
      k++;
      continue;
    }
    spans.push(
      makeSpan(openStart, closer.start + closer.length, { type: 'inline-code' }, openStart + openLength, closer.start)
    );
    k = closerIndex + 1;
  }
  return spans;
}

export class LeafScanner {
  private readonly text: string;
  private readonly closers: CloserFinder;
  private readonly codeSpans: ProtectedSpan[];
  // Index of the matching `]` / `)` for every `[` / `(`, or -1
  private readonly closeBracket: Int32Array;
  private readonly closeParen: Int32Array;
  // First breaking space / non-space at or after each offset
  private readonly nextSpace: Int32Array;
  private readonly nextNonSpace: Int32Array;

  constructor(text: string) {
    this.text = text;
    this.closers = new CloserFinder(text);
    this.codeSpans = findCodeSpans(text);
    this.closeBracket = new Int32Array(text.length).fill(-1);
    this.closeParen = new Int32Array(text.length).fill(-1);
    this.nextSpace = new Int32Array(text.length + 1);
    this.nextNonSpace = new Int32Array(text.length + 1);
    this.indexBrackets();
    this.indexSpaces();
  }

  scan(): ProtectedSpan[] {
    const { text, codeSpans } = this;
    const leaves: ProtectedSpan[] = [];
    let codeIndex = 0;
    let i = 0;

    while (i < text.length) {
      let code = codeSpans[codeIndex];
      while (code && code.start < i) code = codeSpans[++codeIndex];
      if (code && code.start === i) {
        leaves.push(code);
        i = code.end;
        codeIndex++;
        continue;
      }
      if (isEscapeAt(text, i)) {
        i += 2;
        continue;
      }
      const span = this.leafAt(i);
      if (span) {
        leaves.push(span);
        i = span.end;
      } else {
        i++;
      }
    }
    return leaves;
  }

  private leafAt(i: number): ProtectedSpan | null {
    switch (this.text[i]) {
      case '[':
        return this.bracketAt(i);
      case '!':
        return this.imageAt(i);
      case '^':
        return this.inlineFootnoteAt(i);
      case '<':
        return this.autolinkAt(i) ?? this.htmlAt(i);
      case '{':
        return this.shortcodeAt(i);
      case '$':
        return this.mathAt(i);
      case '&':
        return this.entityAt(i);
      case ':':
        return this.emojiAt(i);
      default:
        return null;
    }
  }

  private bracketAt(i: number): ProtectedSpan | null {
    const { text } = this;
    if (text[i + 1] === '!' && text[i + 2] === '[') {
      const linked = this.linkedImageAt(i);
      if (linked) return linked;
    }
    if (text[i + 1] === '[') {
      const wiki = this.wikiLinkAt(i);
      if (wiki) return wiki;
    }
    const link = this.bracketTarget(i, false);
    if (link) return makeSpan(i, link.end, { type: 'link', form: link.form });
    if (text[i + 1] === '^') return this.footnoteReferenceAt(i);
    return null;
  }

  private imageAt(i: number): ProtectedSpan | null {
    if (this.text[i + 1] !== '[') return null;
    const image = this.bracketTarget(i + 1, true);
    return image ? makeSpan(i, image.end, { type: 'image', form: image.form }) : null;
  }

  /**
   * `[![alt](img)](url)` and its reference variants. The image must fill the
   * outer brackets exactly.
   */
  private linkedImageAt(i: number): ProtectedSpan | null {
    const outerClose = this.closeBracket[i] ?? -1;
    if (outerClose < 0) return null;
    const image = this.bracketTarget(i + 2, true);
    if (!image || image.end !== outerClose) return null;

    const after = outerClose + 1;
    let target: 'inline' | 'reference' | null = null;
    let end = -1;
    if (this.text[after] === '(') {
      const close = this.closeParen[after] ?? -1;
      if (close >= 0 && this.isLinkDestination(after + 1, close)) {
        target = 'inline';
        end = close + 1;
      }
    } else if (this.text[after] === '[') {
      const close = this.closeBracket[after] ?? -1;
      if (close >= 0) {
        target = 'reference';
        end = close + 1;
      }
    }
    if (!target) return null;

    const source = image.form === 'inline' ? 'inline' : 'reference';
    const pattern: LinkedImagePattern = `${source}-${target}`;
    return makeSpan(i, end, { type: 'linked-image', pattern });
  }

  private wikiLinkAt(i: number): ProtectedSpan | null {
    const innerClose = this.closeBracket[i + 1] ?? -1;
    const outerClose = this.closeBracket[i] ?? -1;
    if (innerClose < 0 || outerClose !== innerClose + 1) return null;
    return makeSpan(i, outerClose + 1, { type: 'link', form: 'wiki' });
  }

  /**
   * Resolve what follows the bracketed text opened at `open`: an inline
   * destination, a reference label, an empty label, or nothing.
   */
  private bracketTarget(open: number, image: boolean): BracketTarget | null {
    const { text } = this;
    const close = this.closeBracket[open] ?? -1;
    if (close < 0) return null;
    const after = close + 1;

    if (text[after] === '(') {
      const parenClose = this.closeParen[after] ?? -1;
      if (parenClose >= 0 && this.isLinkDestination(after + 1, parenClose)) {
        return { end: parenClose + 1, form: 'inline' };
      }
    } else if (text[after] === '[') {
      const labelClose = this.closeBracket[after] ?? -1;
      if (labelClose >= 0) {
        const empty = this.nextNonSpace[after + 1] ?? labelClose;
        return { end: labelClose + 1, form: empty >= labelClose ? 'collapsed' : 'reference' };
      }
    }

    if (close === open + 1) return null;
    // `[^x]` is a footnote reference, not a shortcut link
    if (!image && text[open + 1] === '^') return null;
    return { end: close + 1, form: 'shortcut' };
  }

  /**
   * Destination between `from` and the closing paren `to`: empty, a single
   * run of non-space characters, or a destination followed by a title.
   */
  private isLinkDestination(from: number, to: number): boolean {
    const start = this.nextNonSpace[from] ?? to;
    if (start >= to || this.text[start] === '<') return true;
    const space = this.nextSpace[start] ?? to;
    if (space >= to) return true;
    const title = this.nextNonSpace[space] ?? to;
    if (title >= to) return true;
    const ch = this.text[title];
    return ch === '"' || ch === "'" || ch === '(';
  }

  private footnoteReferenceAt(i: number): ProtectedSpan | null {
    const close = this.closeBracket[i] ?? -1;
    if (close <= i + 2) return null;
    if ((this.nextSpace[i + 2] ?? close) < close) return null;
    const name = this.text.slice(i + 2, close);
    const form = /^\d+$/.test(name) ? 'numeric' : 'named';
    return makeSpan(i, close + 1, { type: 'footnote', form });
  }

  private inlineFootnoteAt(i: number): ProtectedSpan | null {
    if (this.text[i + 1] !== '[') return null;
    const close = this.closeBracket[i + 1] ?? -1;
    if (close < 0) return null;
    return makeSpan(i, close + 1, { type: 'footnote', form: 'inline' }, i + 2, close);
  }

  private autolinkAt(i: number): ProtectedSpan | null {
    const { text } = this;
    let j = i + 1;

    if (isAsciiLetter(text[j])) {
      while (j < text.length && j - i - 1 < MAX_SCHEME_LENGTH && URI_SCHEME.test(text[j] ?? '')) j++;
      if (text[j] === ':' && j - i - 1 >= 2) {
        j++;
        while (j < text.length) {
          const ch = text[j] ?? '';
          if (ch === '<' || ch === '>' || ch <= ' ') break;
          j++;
        }
        if (text[j] === '>') return makeSpan(i, j + 1, { type: 'link', form: 'autolink' });
        return null;
      }
    }

    j = i + 1;
    while (j < text.length && EMAIL_LOCAL.test(text[j] ?? '')) j++;
    if (j === i + 1 || text[j] !== '@') return null;
    const domainStart = ++j;
    while (j < text.length && EMAIL_DOMAIN.test(text[j] ?? '')) j++;
    if (j === domainStart || text[j] !== '>') return null;
    return makeSpan(i, j + 1, { type: 'link', form: 'autolink' });
  }

  private htmlAt(i: number): ProtectedSpan | null {
    const { text } = this;
    if (text.startsWith('<!--', i)) {
      const close = this.closers.find('-->', i + 4);
      return close < 0 ? null : makeSpan(i, close + 3, { type: 'html-tag' });
    }

    let j = i + 1;
    if (text[j] === '/') j++;
    if (!isAsciiLetter(text[j])) return null;
    while (j < text.length && (isAsciiAlphanumeric(text[j]) || text[j] === '-')) j++;
    const after = text[j];
    if (after !== '>' && after !== '/' && !isBreakingSpace(after)) return null;

    // Attributes; a stray `<` means this was not a tag
    let quote: string | null = null;
    for (; j < text.length; j++) {
      const ch = text[j];
      if (ch === '<') return null;
      if (quote) {
        if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === '>') {
        return makeSpan(i, j + 1, { type: 'html-tag' });
      }
    }
    return null;
  }

  private shortcodeAt(i: number): ProtectedSpan | null {
    for (const [open, close] of SHORTCODE_DELIMITERS) {
      if (!this.text.startsWith(open, i)) continue;
      const end = this.closers.find(close, i + open.length);
      if (end >= 0) {
        return makeSpan(i, end + close.length, { type: 'shortcode', open, close }, i + open.length, end);
      }
    }
    return null;
  }

  private mathAt(i: number): ProtectedSpan | null {
    const { text } = this;
    if (text[i + 1] === '$') {
      const close = this.closers.find('$$', i + 2);
      if (close <= i + 2) return null;
      return makeSpan(i, close + 2, { type: 'math', display: true }, i + 2, close);
    }

    const first = text[i + 1];
    if (first === undefined || isBreakingSpace(first)) return null;
    const close = this.closers.find('$', i + 1);
    if (close < 0 || isBreakingSpace(text[close - 1])) return null;
    // "$5 and $6" is currency, not math
    const next = text[close + 1];
    if (next !== undefined && next >= '0' && next <= '9') return null;
    return makeSpan(i, close + 1, { type: 'math', display: false }, i + 1, close);
  }

  private entityAt(i: number): ProtectedSpan | null {
    ENTITY.lastIndex = i;
    const match = ENTITY.exec(this.text);
    return match ? makeSpan(i, i + match[0].length, { type: 'html-entity' }) : null;
  }

  private emojiAt(i: number): ProtectedSpan | null {
    const { text } = this;
    if (isAsciiAlphanumeric(text[i - 1])) return null;
    let j = i + 1;
    let hasLetter = false;
    while (j < text.length && EMOJI_NAME.test(text[j] ?? '')) {
      if (isAsciiLetter(text[j])) hasLetter = true;
      j++;
    }
    if (j === i + 1 || text[j] !== ':' || !hasLetter) return null;
    return makeSpan(i, j + 1, { type: 'emoji-shortcode' });
  }

  /**
   * Pair brackets and parentheses with one stack pass. Escaped characters
   * and code span interiors do not take part.
   */
  private indexBrackets(): void {
    const { text, codeSpans } = this;
    const brackets: number[] = [];
    const parens: number[] = [];
    let codeIndex = 0;

    for (let i = 0; i < text.length; i++) {
      let code = codeSpans[codeIndex];
      while (code && code.start < i) code = codeSpans[++codeIndex];
      if (code && i === code.start) {
        i = code.end - 1;
        codeIndex++;
        continue;
      }
      if (isEscapeAt(text, i)) {
        i++;
        continue;
      }
      switch (text[i]) {
        case '[':
          brackets.push(i);
          break;
        case ']': {
          const open = brackets.pop();
          if (open !== undefined) this.closeBracket[open] = i;
          break;
        }
        case '(':
          parens.push(i);
          break;
        case ')': {
          const open = parens.pop();
          if (open !== undefined) this.closeParen[open] = i;
          break;
        }
      }
    }
  }

  private indexSpaces(): void {
    const { text } = this;
    const n = text.length;
    this.nextSpace[n] = n;
    this.nextNonSpace[n] = n;
    for (let i = n - 1; i >= 0; i--) {
      const space = isBreakingSpace(text[i]);
      this.nextSpace[i] = space ? i : (this.nextSpace[i + 1] ?? n);
      this.nextNonSpace[i] = space ? (this.nextNonSpace[i + 1] ?? n) : i;
    }
  }
}

export function scanLeafSpans(text: string): ProtectedSpan[] {
  return new LeafScanner(text).scan();
}
