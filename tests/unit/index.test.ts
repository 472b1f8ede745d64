import { describe, it, expect } from 'vitest';
import {
  MarkdownReflow,
  ReflowPresets,
  reflowMarkdown,
  type ChainableMarkdownReflow,
  type SentencePerLineConfig,
  type WrapConfig
} from '../../src/index.js';

describe('MarkdownReflow', () => {
  it('should start from the given configuration', () => {
    expect(new MarkdownReflow({ lineLength: 20 }).getConfig()).toEqual({ lineLength: 20 });
  });

  it('should reject invalid configuration up front', () => {
    expect(() => new MarkdownReflow({ lineLength: 1.5 })).toThrow('Invalid line length: 1.5');
  });

  it('should chain configuration calls', () => {
    const output = new MarkdownReflow()
      .addAbbreviations(['Inc'])
      .sentencePerLine()
      .setLineLength(0)
      .reflow('Acme Inc. Makes tools. Done.');
    expect(output).toBe('Acme Inc. Makes tools.\nDone.');
  });

  it('should append abbreviations', () => {
    const reflow = new MarkdownReflow({ abbreviations: ['Inc'] }).addAbbreviations(['Ltd']);
    expect(reflow.getConfig().abbreviations).toEqual(['Inc', 'Ltd']);
  });

  it('should keep the previous configuration when a setter fails', () => {
    const reflow = new MarkdownReflow({ lineLength: 40 });
    expect(() => reflow.setLineLength(-1)).toThrow('Invalid line length: -1');
    expect(reflow.getConfig().lineLength).toBe(40);
  });

  it('should not expose its configuration for mutation', () => {
    const reflow = new MarkdownReflow({ lineLength: 40 });
    const config = reflow.getConfig();
    expect(config).not.toBe(reflow.getConfig());
  });

  it('should reflow single lines', () => {
    expect(new MarkdownReflow().setLineLength(10).reflowLine('List: `a`, `b`, `c`.')).toEqual([
      'List: `a`,',
      '`b`, `c`.'
    ]);
  });

  it('should match the functional API', () => {
    const input = 'The quick brown fox jumps over the lazy dog.';
    expect(new MarkdownReflow().setLineLength(20).reflow(input)).toBe(reflowMarkdown(input, { lineLength: 20 }));
  });

  describe('presets', () => {
    it('should apply a preset over the current configuration', () => {
      const reflow = new MarkdownReflow({ lengthMode: 'visual' }).applyPreset('semantic');
      expect(reflow.getConfig()).toEqual({ ...ReflowPresets.semantic, lengthMode: 'visual' });
    });

    it('should type each preset by the mode it selects', () => {
      const wrap: WrapConfig = ReflowPresets.wrap;
      const sentencePerLine: SentencePerLineConfig = ReflowPresets.sentencePerLine;
      expect(wrap.sentencePerLine).toBe(false);
      expect(sentencePerLine).toMatchObject({ sentencePerLine: true, lineLength: 0 });
    });

    it('should apply presets through the chainable interface', () => {
      const chain: ChainableMarkdownReflow = new MarkdownReflow();
      expect(chain.applyPreset('wrap').reflow('a\nb')).toBe('a b');
    });

    it('should reject unknown presets', () => {
      const reflow = new MarkdownReflow();
      expect(() => Reflect.apply(reflow.applyPreset, reflow, ['nope'])).toThrow(
        'Unknown preset: nope. Available presets: wrap, normalize, sentencePerLine, semantic'
      );
    });

    it('should reflow with a preset in one call', () => {
      expect(MarkdownReflow.reflowWithPreset('a\nb', 'normalize')).toBe('a b');
      expect(MarkdownReflow.reflowWithPreset('One. Two.', 'sentencePerLine')).toBe('One.\nTwo.');
    });
  });
});
