import type { ProtectedSpan } from '../../types/markdown.js';
import { scanEmphasis } from './emphasis-scanner.js';
import { scanLeafSpans } from './leaf-scanner.js';

/**
 * Find every protected inline span in `text` and return the top-level ones.
 * Emphasis spans carry the spans they enclose as children; all other kinds
 * are leaves. Spans never partially overlap.
 */
export function scanSpans(text: string): ProtectedSpan[] {
  if (!text) return [];
  const leaves = scanLeafSpans(text);
  const emphasis = scanEmphasis(text, leaves);
  return nestSpans([...leaves, ...emphasis]);
}

function nestSpans(spans: ProtectedSpan[]): ProtectedSpan[] {
  spans.sort((a, b) => a.start - b.start || b.end - a.end);
  const roots: ProtectedSpan[] = [];
  const open: ProtectedSpan[] = [];

  for (const span of spans) {
    let parent = open[open.length - 1];
    while (parent && parent.end <= span.start) {
      open.pop();
      parent = open[open.length - 1];
    }
    if (parent) parent.children.push(span);
    else roots.push(span);
    open.push(span);
  }
  return roots;
}

/**
 * Depth-first list of a span tree, parents before children.
 */
export function flattenSpans(spans: readonly ProtectedSpan[]): ProtectedSpan[] {
  const out: ProtectedSpan[] = [];
  const visit = (list: readonly ProtectedSpan[]): void => {
    for (const span of list) {
      out.push(span);
      visit(span.children);
    }
  };
  visit(spans);
  return out;
}

/**
 * True when `offset` falls strictly inside one of the top-level spans.
 */
export function isInsideSpan(spans: readonly ProtectedSpan[], offset: number): boolean {
  let lo = 0;
  let hi = spans.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const span = spans[mid];
    if (!span) break;
    if (offset <= span.start) hi = mid - 1;
    else if (offset >= span.end) lo = mid + 1;
    else return true;
  }
  return false;
}
