import { describe, it, expect } from 'vitest';
import { packSemanticLines, packTokens } from '../../src/core/layout/line-packer.js';
import { tokenize, type SentenceMode } from '../../src/core/layout/tokenizer.js';
import { AbbreviationSet } from '../../src/core/sentence/abbreviations.js';
import type { Token } from '../../src/types/markdown.js';

function tok(text: string, sentenceEnd = false): Token {
  return { text, width: text.length, atomic: false, sentenceEnd };
}

function words(text: string): Token[] {
  return text.split(' ').map((word) => tok(word));
}

function tokens(text: string, sentences: SentenceMode = 'none'): Token[] {
  return tokenize(text, { lengthMode: 'chars', abbreviations: new AbbreviationSet(), sentences });
}

describe('tokenize', () => {
  it('should keep protected spans whole inside their words', () => {
    const result = tokens('Hello, world (see `a b`).');
    expect(result.map((t) => t.text)).toEqual(['Hello,', 'world', '(see', '`a b`).']);
    expect(result.map((t) => t.atomic)).toEqual([false, false, false, true]);
    expect(result.map((t) => t.width)).toEqual([6, 5, 4, 7]);
  });

  it('should glue detached punctuation and opening brackets', () => {
    expect(tokens('word , next ( x )').map((t) => t.text)).toEqual(['word,', 'next', '(x)']);
  });

  it('should flag sentence ends followed by whitespace', () => {
    const result = tokens('One two. Three four.', 'boundaries');
    expect(result.map((t) => [t.text, t.sentenceEnd])).toEqual([
      ['One', false],
      ['two.', true],
      ['Three', false],
      ['four.', false]
    ]);
  });

  it('should split CJK sentences only in split mode', () => {
    expect(tokens('第一句话。第二句话。', 'boundaries').map((t) => t.text)).toEqual(['第一句话。第二句话。']);
    expect(tokens('第一句话。第二句话。', 'split').map((t) => [t.text, t.sentenceEnd])).toEqual([
      ['第一句话。', true],
      ['第二句话。', false]
    ]);
  });

  it('should split multi-sentence emphasis in split mode', () => {
    expect(tokens('*A one. B two.* tail', 'split').map((t) => [t.text, t.sentenceEnd])).toEqual([
      ['*A one.*', true],
      ['*B two.*', false],
      ['tail', false]
    ]);
    expect(tokens('*A one. B two.* tail', 'boundaries').map((t) => t.text)).toEqual(['*A one. B two.*', 'tail']);
  });

  it('should measure in the requested mode', () => {
    const result = tokenize('中文 ab', { lengthMode: 'visual', abbreviations: new AbbreviationSet(), sentences: 'none' });
    expect(result.map((t) => t.width)).toEqual([4, 2]);
  });
});

describe('packTokens', () => {
  it('should wrap greedily', () => {
    expect(packTokens(words('aaa bbb ccc ddd'), { width: 7, lengthMode: 'chars' })).toEqual(['aaa bbb', 'ccc ddd']);
  });

  it('should never wrap at width 0', () => {
    expect(packTokens(words('aaa bbb ccc ddd'), { width: 0, lengthMode: 'chars' })).toEqual(['aaa bbb ccc ddd']);
  });

  it('should count prefixes toward the width', () => {
    expect(
      packTokens(words('alpha beta gamma'), {
        width: 10,
        lengthMode: 'chars',
        firstLinePrefix: '- ',
        continuationPrefix: '  '
      })
    ).toEqual(['- alpha', '  beta', '  gamma']);
  });

  it('should place an over-wide token on its own line', () => {
    expect(packTokens(words('ab abcdefghij cd'), { width: 5, lengthMode: 'chars' })).toEqual(['ab', 'abcdefghij', 'cd']);
  });

  it('should move a dangling sentence start down with breakOnSentences', () => {
    const input = [tok('aa'), tok('bb.', true), tok('Cc'), tok('dd')];
    expect(packTokens(input, { width: 10, lengthMode: 'chars', breakOnSentences: true })).toEqual(['aa bb.', 'Cc dd']);
    expect(packTokens(input, { width: 10, lengthMode: 'chars' })).toEqual(['aa bb. Cc', 'dd']);
  });

  it('should never start a continuation line with block syntax', () => {
    expect(packTokens(words('aaaa bbbb - cc'), { width: 10, lengthMode: 'chars' })).toEqual(['aaaa', 'bbbb - cc']);
    expect(packTokens(words('aaaa bbbb # cc'), { width: 10, lengthMode: 'chars' })).toEqual(['aaaa', 'bbbb # cc']);
    expect(packTokens(words('aaaa bbbb | cc'), { width: 10, lengthMode: 'chars' })).toEqual(['aaaa', 'bbbb | cc']);
  });

  it('should never end a line with a backslash', () => {
    expect(packTokens(words('aaaa b\\ cccc'), { width: 8, lengthMode: 'chars' })).toEqual(['aaaa', 'b\\ cccc']);
  });
});

describe('packSemanticLines', () => {
  it('should keep a sentence that fits on one line', () => {
    expect(packSemanticLines(words('a short one.'), { width: 20, lengthMode: 'chars' })).toEqual(['a short one.']);
  });

  it('should break long sentences at clauses', () => {
    expect(packSemanticLines(words('First clause, second clause; third part here'), { width: 20, lengthMode: 'chars' })).toEqual([
      'First clause,',
      'second clause;',
      'third part here'
    ]);
  });

  it('should fall back to words inside a long clause', () => {
    expect(packSemanticLines(words('one two three four five'), { width: 10, lengthMode: 'chars' })).toEqual([
      'one two',
      'three four',
      'five'
    ]);
  });

  it('should apply prefixes', () => {
    expect(
      packSemanticLines(words('alpha, beta gamma'), {
        width: 12,
        lengthMode: 'chars',
        firstLinePrefix: '> ',
        continuationPrefix: '> '
      })
    ).toEqual(['> alpha,', '> beta gamma']);
  });
});
