import { describe, it, expect } from 'vitest';
import { AbbreviationSet } from '../../src/core/sentence/abbreviations.js';
import { findSentenceBoundaries, sliceSentences, splitIntoSentences } from '../../src/core/sentence/sentence-splitter.js';

describe('splitIntoSentences', () => {
  it('should split on terminators followed by an uppercase word', () => {
    expect(splitIntoSentences('Is it? Yes! It is.')).toEqual(['Is it?', 'Yes!', 'It is.']);
  });

  it('should not split before a lowercase word', () => {
    expect(splitIntoSentences('Version 2. then more text.')).toEqual(['Version 2. then more text.']);
  });

  describe('abbreviations', () => {
    it('should not let a word ending in an abbreviation suppress a boundary', () => {
      expect(splitIntoSentences('Why does `tool` dislike the word paradigms? Next sentence.')).toHaveLength(2);
      expect(splitIntoSentences('We studied paradigms. Next sentence.')).toEqual([
        'We studied paradigms.',
        'Next sentence.'
      ]);
      expect(splitIntoSentences('Those systems. They work.')).toHaveLength(2);
    });

    it('should suppress a boundary after a real abbreviation', () => {
      expect(splitIntoSentences('Talk to Dr. Smith. He is helpful.')).toEqual([
        'Talk to Dr. Smith.',
        'He is helpful.'
      ]);
    });

    it('should accept user abbreviations', () => {
      expect(splitIntoSentences('Acme Inc. Builds tools.')).toHaveLength(2);
      expect(splitIntoSentences('Acme Inc. Builds tools.', ['Inc'])).toEqual(['Acme Inc. Builds tools.']);
      expect(splitIntoSentences('Acme Inc. Builds tools.', new AbbreviationSet(['inc.']))).toHaveLength(1);
    });

    it('should never suppress ! or ?', () => {
      expect(splitIntoSentences('Ask Dr? Sure.')).toHaveLength(2);
    });
  });

  it('should look past closing and opening quotes', () => {
    expect(splitIntoSentences('He said "Stop." Then he left.')).toEqual(['He said "Stop."', 'Then he left.']);
    expect(splitIntoSentences('It ended. "Really?" she asked.')).toEqual(['It ended.', '"Really?" she asked.']);
  });

  it('should ignore terminators inside protected spans', () => {
    expect(splitIntoSentences('Run `a. B` now. Then stop.')).toEqual(['Run `a. B` now.', 'Then stop.']);
    expect(splitIntoSentences('See [v. Two](u) here.')).toEqual(['See [v. Two](u) here.']);
  });

  it('should end a sentence at emphasis that ends with a terminator', () => {
    expect(splitIntoSentences('*This is emphasized.* Next sentence.')).toEqual([
      '*This is emphasized.*',
      'Next sentence.'
    ]);
  });

  it('should skip emphasis markers before the next sentence', () => {
    expect(splitIntoSentences('First one. *Second* one.')).toEqual(['First one.', '*Second* one.']);
  });

  describe('CJK', () => {
    it('should split at CJK terminators without whitespace', () => {
      expect(splitIntoSentences('第一句话。第二句话。')).toEqual(['第一句话。', '第二句话。']);
    });

    it('should split at CJK terminators followed by whitespace', () => {
      expect(splitIntoSentences('これはペンです。 それは本です！')).toEqual(['これはペンです。', 'それは本です！']);
    });

    it('should keep closing brackets with the sentence', () => {
      expect(splitIntoSentences('他说「好。」然后走了。')).toEqual(['他说「好。」', '然后走了。']);
    });

    it('should end the sentence after a run of terminators', () => {
      expect(splitIntoSentences('好。。。然后。')).toEqual(['好。。。', '然后。']);
      expect(splitIntoSentences(`a${'。'.repeat(5)}`)).toEqual([`a${'。'.repeat(5)}`]);
    });

    it('should split an ASCII sentence before CJK text', () => {
      expect(splitIntoSentences('Done. 好的。')).toEqual(['Done.', '好的。']);
    });
  });

  it('should split long runs of punctuation in linear time', () => {
    const text = `${'.'.repeat(50_000)} ${'! '.repeat(20_000)}${'Dr. '.repeat(10_000)}`;
    const started = performance.now();
    splitIntoSentences(text);
    expect(performance.now() - started).toBeLessThan(2_000);
  });

  it('should split long runs of CJK terminators in linear time', () => {
    for (const text of [`a${'。'.repeat(50_000)}`, `a${'！」'.repeat(25_000)} `, '好。'.repeat(25_000)]) {
      const started = performance.now();
      splitIntoSentences(text);
      expect(performance.now() - started).toBeLessThan(2_000);
    }
  });
});

describe('findSentenceBoundaries', () => {
  it('should return offsets after each sentence', () => {
    expect(findSentenceBoundaries('Hi there. Bye.', [], new AbbreviationSet())).toEqual([9]);
  });

  it('should limit the scan to the given range', () => {
    const text = 'Out. In one. In two. Out.';
    expect(findSentenceBoundaries(text, [], new AbbreviationSet(), 5, 20)).toEqual([12]);
  });
});

describe('sliceSentences', () => {
  it('should trim pieces and drop empty ones', () => {
    expect(sliceSentences('A. B.  ', [2, 5])).toEqual(['A.', 'B.']);
  });
});
