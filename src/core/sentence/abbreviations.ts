/**
 * Abbreviations that never end a sentence.
 *
 * Only words that always take a period and are always followed by something
 * (a name, an example). Words that can end a sentence ("Inc.", "etc.") are
 * left out on purpose; users can add them.
 */
export const DEFAULT_ABBREVIATIONS: readonly string[] = [
  'mr',
  'mrs',
  'ms',
  'dr',
  'prof',
  'sr',
  'jr',
  'i.e',
  'e.g'
];

export class AbbreviationSet {
  private readonly entries: ReadonlySet<string>;

  constructor(custom?: readonly string[]) {
    const entries = new Set<string>(DEFAULT_ABBREVIATIONS);
    for (const raw of custom ?? []) {
      const normalized = normalizeAbbreviation(raw);
      if (normalized) entries.add(normalized);
    }
    this.entries = entries;
  }

  get size(): number {
    return this.entries.size;
  }

  has(word: string): boolean {
    const normalized = normalizeAbbreviation(word);
    return normalized.length > 0 && this.entries.has(normalized);
  }

  /**
   * True when `text` ends with a period and the whitespace-delimited word
   * before it is an abbreviation. "paradigms." is not "ms.".
   */
  endsWithAbbreviation(text: string): boolean {
    if (!text.endsWith('.')) return false;
    return this.has(lastWord(text));
  }

  toArray(): string[] {
    return [...this.entries].sort();
  }
}

export function normalizeAbbreviation(raw: string): string {
  let end = raw.length;
  while (end > 0 && raw.charCodeAt(end - 1) === 0x2e) end--;
  return raw.slice(0, end).trim().toLowerCase();
}

function lastWord(text: string): string {
  let end = text.length;
  while (end > 0 && isWhitespace(text[end - 1] ?? '')) end--;
  let start = end;
  while (start > 0 && !isWhitespace(text[start - 1] ?? '')) start--;
  return text.slice(start, end);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}
