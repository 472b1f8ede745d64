import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { classifyBlocks, isReflowEligible, measureWidth, reflowMarkdown, type ReflowConfig } from '../../src/index.js';

function fixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url)), 'utf8');
}

function words(text: string): string[] {
  return text
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .sort();
}

const PROSE = fixture('prose.md');
const MIXED = fixture('mixed.md');

const OPTION_SETS: Array<[string, ReflowConfig]> = [
  ['wrap at 40', { lineLength: 40 }],
  ['wrap at 60', { lineLength: 60 }],
  ['wrap at 80 without sentence carry', { lineLength: 80, breakOnSentences: false }],
  ['preserved breaks at 40', { lineLength: 40, preserveBreaks: true }],
  ['visual width at 50', { lineLength: 50, lengthMode: 'visual' }],
  ['sentence per line', { lineLength: 0, sentencePerLine: true }],
  ['semantic breaks at 50', { lineLength: 50, semanticLineBreaks: true }]
];

describe('reflow properties', () => {
  describe('idempotence', () => {
    for (const [name, options] of OPTION_SETS) {
      it(`should be stable on a second pass (${name})`, () => {
        for (const document of [PROSE, MIXED]) {
          const once = reflowMarkdown(document, options);
          expect(reflowMarkdown(once, options)).toBe(once);
        }
      });
    }
  });

  describe('content preservation', () => {
    for (const [name, options] of OPTION_SETS) {
      it(`should keep every word (${name})`, () => {
        expect(words(reflowMarkdown(PROSE, options))).toEqual(words(PROSE));
      });
    }
  });

  describe('width bound', () => {
    for (const lineLength of [50, 60, 80]) {
      it(`should keep prose lines within ${lineLength} columns`, () => {
        for (const options of [{ lineLength }, { lineLength, semanticLineBreaks: true }]) {
          for (const line of reflowMarkdown(PROSE, options).split('\n')) {
            expect(measureWidth(line.trimEnd(), 'chars')).toBeLessThanOrEqual(lineLength);
          }
        }
      });
    }
  });

  describe('structure', () => {
    it('should copy every non-prose block unchanged', () => {
      const output = reflowMarkdown(MIXED, { lineLength: 40 });
      for (const block of classifyBlocks(MIXED)) {
        if (isReflowEligible(block) || block.type === 'blank') continue;
        expect(output).toContain(MIXED.slice(block.start, block.end));
      }
    });

    it('should keep the same block sequence', () => {
      const output = reflowMarkdown(MIXED, { lineLength: 40 });
      expect(classifyBlocks(output).map((block) => block.type)).toEqual(
        classifyBlocks(MIXED).map((block) => block.type)
      );
    });

    it('should never break a badge or link apart', () => {
      for (const [, options] of OPTION_SETS) {
        const output = reflowMarkdown(MIXED, options);
        expect(output).not.toContain(']\n(');
        expect(output).not.toContain(']\n[');
      }
    });

    it('should keep the hard break in place', () => {
      expect(reflowMarkdown(PROSE, { lineLength: 40 })).toContain('Hard breaks stay where they are  \neven when');
    });
  });
});
