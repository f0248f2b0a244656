import { StrategySelectorService } from './strategy-selector.service';
import { ChunkingStrategy } from '../types';

describe('StrategySelectorService', () => {
  const selector = new StrategySelectorService();

  describe('select', () => {
    it('picks markdown when a line starts with a heading marker', () => {
      expect(selector.select('# Title\n\nBody')).toBe(ChunkingStrategy.MARKDOWN);
      expect(selector.select('Intro\n###### Deep heading')).toBe(
        ChunkingStrategy.MARKDOWN,
      );
    });

    it('does not treat seven hashes as a heading', () => {
      expect(selector.select('####### not a heading')).toBe(
        ChunkingStrategy.SEMANTIC,
      );
    });

    it('picks recursive for fenced code', () => {
      expect(selector.select('Intro\n```\nconst a = 1;\n```')).toBe(
        ChunkingStrategy.RECURSIVE,
      );
    });

    it('picks recursive for more than five indented lines', () => {
      const text = 'Listing:\n' + '    line\n'.repeat(6);
      expect(selector.select(text)).toBe(ChunkingStrategy.RECURSIVE);
    });

    it('keeps five indented lines out of the code rule', () => {
      const text = 'Listing:\n' + '    line\n'.repeat(5);
      expect(selector.select(text)).toBe(ChunkingStrategy.SEMANTIC);
    });

    it('picks paragraph for more than three blank-line separated blocks', () => {
      expect(selector.select('One.\n\nTwo.\n\nThree.\n\nFour.')).toBe(
        ChunkingStrategy.PARAGRAPH,
      );
    });

    it('picks sentence for short text with many sentences', () => {
      const text = 'Abcdefghijklmnopqr. '.repeat(15);
      expect(text).toHaveLength(300);
      expect(selector.select(text)).toBe(ChunkingStrategy.SENTENCE);
    });

    it('picks sliding_window for long unstructured text', () => {
      const text = 'word '.repeat(2400);
      expect(text).toHaveLength(12000);
      expect(selector.select(text)).toBe(ChunkingStrategy.SLIDING_WINDOW);
    });

    it('falls through to semantic', () => {
      expect(selector.select('A single short note.')).toBe(
        ChunkingStrategy.SEMANTIC,
      );
    });
  });

  describe('resolve', () => {
    it('selects from the text for auto or a missing request', () => {
      expect(selector.resolve('auto', '# Title\n\nBody')).toBe(
        ChunkingStrategy.MARKDOWN,
      );
      expect(selector.resolve(undefined, 'A single short note.')).toBe(
        ChunkingStrategy.SEMANTIC,
      );
    });

    it('passes known strategy names through', () => {
      expect(selector.resolve('sliding_window', '# Title')).toBe(
        ChunkingStrategy.SLIDING_WINDOW,
      );
    });

    it('falls back to recursive for unknown names', () => {
      expect(selector.resolve('fancy', 'Body')).toBe(ChunkingStrategy.RECURSIVE);
    });
  });
});
