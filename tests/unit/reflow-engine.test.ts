import { describe, it, expect } from 'vitest';
import { hasHardBreak, reflowLine, reflowMarkdown } from '../../src/core/reflow/engine.js';

describe('reflowMarkdown', () => {
  describe('width mode', () => {
    it('should wrap a long paragraph', () => {
      expect(reflowMarkdown('The quick brown fox jumps over the lazy dog.', { lineLength: 20 })).toBe(
        'The quick brown fox\njumps over the lazy\ndog.'
      );
    });

    it('should join short lines of one paragraph', () => {
      expect(reflowMarkdown('a b\nc d\n', { lineLength: 20 })).toBe('a b c d\n');
    });

    it('should keep a line that already fits', () => {
      const input = 'short line\n\nanother one\n';
      expect(reflowMarkdown(input, { lineLength: 20 })).toBe(input);
    });

    it('should leave everything alone at width 0 without sentence modes', () => {
      const input = 'one very long line that would normally wrap somewhere\n';
      expect(reflowMarkdown(input, { lineLength: 0 })).toBe(input);
    });

    it('should glue punctuation to code spans', () => {
      expect(
        reflowMarkdown('The options are: `alpha`, `beta`, `gamma`, and `delta` (or `epsilon`).', { lineLength: 30 })
      ).toBe('The options are: `alpha`,\n`beta`, `gamma`, and `delta`\n(or `epsilon`).');
    });

    it('should never split a linked-image badge', () => {
      const badge = (name: string) => `[![${name}](https://x.test/${name}.svg)](https://x.test)`;
      const output = reflowMarkdown(`${badge('a')} ${badge('b')}`, { lineLength: 30 });
      expect(output).toBe(`${badge('a')}\n${badge('b')}`);
      expect(output).not.toContain(']\n(');
      expect(output).not.toContain(']\n[');
    });

    it('should never start a line with a list marker', () => {
      expect(reflowMarkdown('aaaa bbbb - cc', { lineLength: 9 })).toBe('aaaa\nbbbb - cc');
    });
  });

  describe('hard breaks', () => {
    it('should keep two trailing spaces and the break after them', () => {
      expect(reflowMarkdown('alpha beta gamma  \ndelta', { lineLength: 11 })).toBe('alpha beta\ngamma  \ndelta');
    });

    it('should keep a trailing backslash break', () => {
      expect(reflowMarkdown('alpha beta gamma\\\ndelta', { lineLength: 11 })).toBe('alpha beta\ngamma\\\ndelta');
    });

    it('should never merge a hard-broken line into the next', () => {
      expect(reflowMarkdown('a  \nb\n', { lineLength: 80 })).toBe('a  \nb\n');
    });

    it('should reflow every source line on its own with preserveBreaks', () => {
      expect(reflowMarkdown('alpha beta gamma\nx', { lineLength: 11, preserveBreaks: true })).toBe(
        'alpha beta\ngamma\nx'
      );
    });
  });

  describe('block prefixes', () => {
    it('should indent list continuations under the content', () => {
      expect(reflowMarkdown('- This is a list item that is long enough to wrap around', { lineLength: 30 })).toBe(
        '- This is a list item that is\n  long enough to wrap around'
      );
    });

    it('should repeat quote markers on every line', () => {
      expect(reflowMarkdown('> one two three four five six', { lineLength: 16 })).toBe(
        '> one two three\n> four five six'
      );
    });

    it('should align definition bodies after the marker', () => {
      expect(reflowMarkdown('Term\n: alpha beta gamma delta', { lineLength: 14 })).toBe(
        'Term\n: alpha beta\n  gamma delta'
      );
    });
  });

  describe('sentence modes', () => {
    it('should put each emphasized sentence on its own line', () => {
      const output = reflowMarkdown('*Sentence one. Sentence two. Sentence three.*', {
        sentencePerLine: true,
        lineLength: 0
      });
      expect(output.split('\n')).toEqual(['*Sentence one.*', '*Sentence two.*', '*Sentence three.*']);
    });

    it('should not split definition bodies into sentences', () => {
      const input = 'Term\n: First sentence of definition. Second sentence.';
      expect(reflowMarkdown(input, { sentencePerLine: true })).toBe(input);
    });

    it('should split CJK sentences without whitespace', () => {
      expect(reflowMarkdown('第一句话。第二句话。', { sentencePerLine: true })).toBe('第一句话。\n第二句话。');
    });

    it('should keep abbreviations inside their sentence', () => {
      expect(reflowMarkdown('Talk to Dr. Smith. He is helpful.', { sentencePerLine: true, lineLength: 0 })).toBe(
        'Talk to Dr. Smith.\nHe is helpful.'
      );
    });

    it('should break long sentences at clauses in semantic mode', () => {
      const input = 'This sentence is short. This one is much longer, and it has a clause that goes on.';
      expect(reflowMarkdown(input, { semanticLineBreaks: true, lineLength: 30 }).split('\n')).toEqual([
        'This sentence is short.',
        'This one is much longer,',
        'and it has a clause that goes',
        'on.'
      ]);
    });
  });

  describe('pass-through', () => {
    it('should copy non-prose blocks byte for byte', () => {
      const input = [
        '# A heading that is far longer than the limit',
        '',
        '```',
        'code that is far longer than the limit allows',
        '```',
        '',
        '| a table row that is far longer than the limit |',
        ''
      ].join('\n');
      expect(reflowMarkdown(input, { lineLength: 20 })).toBe(input);
    });

    it('should keep a table directly below a paragraph line', () => {
      const input = 'Some intro text here.\n| a | b |\n| - | - |\n| 1 | 2 |\n';
      expect(reflowMarkdown(input, { lineLength: 80 })).toBe(input);
      expect(reflowMarkdown(input, { sentencePerLine: true })).toBe(input);
      expect(reflowMarkdown(input, { lineLength: 10 })).toBe('Some intro\ntext here.\n| a | b |\n| - | - |\n| 1 | 2 |\n');
    });

    it('should keep CRLF line endings', () => {
      expect(reflowMarkdown('a b c\r\nd e\r\n\r\nnext para\r\n', { lineLength: 20 })).toBe(
        'a b c d e\r\n\r\nnext para\r\n'
      );
    });

    it('should return empty input unchanged', () => {
      expect(reflowMarkdown('')).toBe('');
    });
  });

  it('should reject invalid options', () => {
    expect(() => reflowMarkdown('x', { lineLength: -1 })).toThrow('Invalid line length: -1');
  });
});

describe('reflowLine', () => {
  it('should return nothing for blank input', () => {
    expect(reflowLine('   ')).toEqual([]);
  });

  it('should return a fitting line as is', () => {
    expect(reflowLine('List: `a`, `b`, `c`.', { lineLength: 30 })).toEqual(['List: `a`, `b`, `c`.']);
  });

  it('should not add spaces between code spans and punctuation', () => {
    const lines = reflowLine('List: `a`, `b`, `c`.', { lineLength: 10 });
    expect(lines).toEqual(['List: `a`,', '`b`, `c`.']);
    expect(lines.join('\n')).not.toContain('` ,');
  });

  it('should measure by display width in visual mode', () => {
    expect(reflowLine('中文 字符 测试', { lineLength: 9, lengthMode: 'visual' })).toEqual(['中文 字符', '测试']);
  });

  it('should split sentences', () => {
    expect(reflowLine('One. Two.', { sentencePerLine: true })).toEqual(['One.', 'Two.']);
  });
});

describe('hasHardBreak', () => {
  it('should recognise both hard break forms', () => {
    expect(hasHardBreak('text  ')).toBe(true);
    expect(hasHardBreak('text\\')).toBe(true);
    expect(hasHardBreak('text ')).toBe(false);
  });
});
