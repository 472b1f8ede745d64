import type { LengthMode } from '../../types/config.js';
import type { Token } from '../../types/markdown.js';
import { startsBlockStructure } from '../blocks/line-kinds.js';
import { measureWidth } from '../width/measurer.js';

export interface PackOptions {
  width: number; // 0 = never wrap
  lengthMode: LengthMode;
  firstLinePrefix?: string;
  continuationPrefix?: string;
  breakOnSentences?: boolean; // Keep a new sentence's first word off the end of a line
}

const CLAUSE_END = /[,;:]$/;

/**
 * Accumulates tokens into lines. Widths include the line prefix.
 */
class LineBuilder {
  readonly lines: string[] = [];
  private readonly options: Required<PackOptions>;
  private readonly continuationWidth: number;
  private tokens: Token[] = [];
  private prefix: string;
  private width: number;

  constructor(options: PackOptions) {
    this.options = {
      width: options.width,
      lengthMode: options.lengthMode,
      firstLinePrefix: options.firstLinePrefix ?? '',
      continuationPrefix: options.continuationPrefix ?? '',
      breakOnSentences: options.breakOnSentences ?? false
    };
    this.prefix = this.options.firstLinePrefix;
    this.width = measureWidth(this.prefix, this.options.lengthMode);
    this.continuationWidth = measureWidth(this.options.continuationPrefix, this.options.lengthMode);
  }

  get isEmpty(): boolean {
    return this.tokens.length === 0;
  }

  /**
   * Whether `extra` columns of content fit after one more space.
   */
  fits(extra: number): boolean {
    if (this.options.width === 0) return true;
    const gap = this.tokens.length > 0 ? 1 : 0;
    return this.width + gap + extra <= this.options.width;
  }

  append(token: Token): void {
    this.width += (this.tokens.length > 0 ? 1 : 0) + token.width;
    this.tokens.push(token);
  }

  /**
   * Greedy placement. Atomic tokens overflow rather than split. A token that
   * would read as block syntax never opens a continuation line, and a token
   * ending in a backslash never closes one.
   */
  add(token: Token): void {
    if (this.isEmpty || this.fits(token.width)) {
      this.append(token);
      return;
    }

    let carry = this.sentenceCarry(token);
    const last = this.tokens[this.tokens.length - 1];
    // A backslash at the end of a line would become a hard break
    const mustCarry = startsBlockStructure(token.text) || (last?.text.endsWith('\\') ?? false);
    if (carry === 0 && mustCarry) {
      if (this.tokens.length < 2 || !last || startsBlockStructure(last.text)) {
        this.append(token);
        return;
      }
      carry = 1;
    }

    const carried = this.tokens.splice(this.tokens.length - carry, carry);
    this.flush();
    for (const moved of carried) this.append(moved);
    this.append(token);
  }

  /**
   * End the current line before `token`, unless `token` may not start one.
   */
  breakBefore(token: Token): void {
    if (!this.isEmpty && !startsBlockStructure(token.text)) this.flush();
  }

  flush(): void {
    if (this.tokens.length > 0) {
      this.lines.push(this.prefix + this.tokens.map((t) => t.text).join(' '));
    }
    this.tokens = [];
    this.prefix = this.options.continuationPrefix;
    this.width = this.continuationWidth;
  }

  /**
   * With breakOnSentences: when the line's last token opens a sentence the
   * token before it closed, move it down if it still fits beside `next`.
   */
  private sentenceCarry(next: Token): number {
    if (!this.options.breakOnSentences || this.tokens.length < 3) return 0;
    const last = this.tokens[this.tokens.length - 1];
    const previous = this.tokens[this.tokens.length - 2];
    if (!last || !previous || !previous.sentenceEnd || last.sentenceEnd) return 0;
    if (startsBlockStructure(last.text)) return 0;
    return this.continuationWidth + last.width + 1 + next.width <= this.options.width ? 1 : 0;
  }
}

export function packTokens(tokens: readonly Token[], options: PackOptions): string[] {
  const builder = new LineBuilder(options);
  for (const token of tokens) builder.add(token);
  builder.flush();
  return builder.lines;
}

/**
 * Pack one sentence for semantic line breaks: on one line when it fits,
 * otherwise one clause per line (clauses end in `,` `;` or `:`), and words
 * where a clause is still too wide.
 */
export function packSemanticLines(tokens: readonly Token[], options: PackOptions): string[] {
  const builder = new LineBuilder({ ...options, breakOnSentences: false });
  const total = tokens.reduce((sum, token, index) => sum + token.width + (index > 0 ? 1 : 0), 0);

  if (builder.fits(total)) {
    for (const token of tokens) builder.append(token);
    builder.flush();
    return builder.lines;
  }

  for (const clause of splitClauses(tokens)) {
    const first = clause[0];
    if (!first) continue;
    const clauseWidth = clause.reduce((sum, token, index) => sum + token.width + (index > 0 ? 1 : 0), 0);
    if (!builder.fits(clauseWidth)) builder.breakBefore(first);
    for (const token of clause) builder.add(token);
  }
  builder.flush();
  return builder.lines;
}

function splitClauses(tokens: readonly Token[]): Token[][] {
  const clauses: Token[][] = [];
  let current: Token[] = [];
  for (const token of tokens) {
    current.push(token);
    if (CLAUSE_END.test(token.text)) {
      clauses.push(current);
      current = [];
    }
  }
  if (current.length > 0) clauses.push(current);
  return clauses;
}
