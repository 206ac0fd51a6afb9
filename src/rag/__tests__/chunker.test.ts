// @vitest-environment node
import { describe, it, expect } from 'vitest';
import { chunkText, joinChunks, pageAt, validateChunkOptions } from '../chunker';
import { InvalidConfigurationError } from '../errors';

describe('Chunker', () => {
  describe('chunkText', () => {
    it('should return no chunks for empty text', () => {
      expect(chunkText('', 10, 2, 'empty.txt')).toEqual([]);
    });

    it('should slide windows by chunkSize - overlap and keep the tail', () => {
      const chunks = chunkText('abcdefghij', 4, 1, 'letters.txt');

      expect(chunks.map((c) => c.text)).toEqual(['abcd', 'defg', 'ghij', 'j']);
      expect(chunks.map((c) => c.charSpan)).toEqual([
        [0, 4],
        [3, 7],
        [6, 10],
        [9, 10],
      ]);
      expect(chunks.map((c) => c.position)).toEqual([0, 1, 2, 3]);
      expect(chunks.every((c) => c.sourceDocument === 'letters.txt')).toBe(true);
    });

    it('should produce ceil(length / step) chunks', () => {
      const text = 'x'.repeat(2500);
      expect(chunkText(text, 1000, 200)).toHaveLength(4);
      expect(chunkText(text, 1000, 0)).toHaveLength(3);
    });

    it('should return a single chunk for text shorter than chunkSize', () => {
      const chunks = chunkText('short', 1000, 200);
      expect(chunks).toHaveLength(1);
      expect(chunks[0].text).toBe('short');
      expect(chunks[0].charSpan).toEqual([0, 5]);
    });

    it('should cover the whole text once overlaps are removed', () => {
      const text = 'The quick brown fox jumps over the lazy dog. '.repeat(37);
      const chunks = chunkText(text, 120, 30);
      expect(joinChunks(chunks)).toBe(text);
    });

    it('should tag chunks with the page where they start', () => {
      // Page starts at 0, 10 and 20
      const text = 'a'.repeat(9) + '\n' + 'b'.repeat(9) + '\n' + 'c'.repeat(9);
      const chunks = chunkText(text, 8, 0, 'paged.txt', [0, 10, 20]);

      expect(chunks.map((c) => c.charSpan[0])).toEqual([0, 8, 16, 24]);
      expect(chunks.map((c) => c.page)).toEqual([1, 1, 2, 3]);
    });

    it('should leave page unset without page offsets', () => {
      const [chunk] = chunkText('no pages here', 100, 10);
      expect(chunk).not.toHaveProperty('page');
    });
  });

  describe('validateChunkOptions', () => {
    it('should accept overlap of zero', () => {
      expect(() => validateChunkOptions(10, 0)).not.toThrow();
    });

    it('should reject non-positive or fractional chunk sizes', () => {
      expect(() => validateChunkOptions(0, 0)).toThrow(InvalidConfigurationError);
      expect(() => validateChunkOptions(-5, 0)).toThrow(InvalidConfigurationError);
      expect(() => validateChunkOptions(10.5, 0)).toThrow(InvalidConfigurationError);
    });

    it('should reject overlap that is negative or not below chunkSize', () => {
      for (const overlap of [-1, 10, 11]) {
        try {
          validateChunkOptions(10, overlap);
          expect.unreachable(`overlap ${overlap} accepted`);
        } catch (error) {
          expect(error).toBeInstanceOf(InvalidConfigurationError);
          expect(error).toHaveProperty('field', 'overlap');
        }
      }
    });

    it('should be enforced by chunkText', () => {
      expect(() => chunkText('text', 100, 100)).toThrow(
        'Invalid configuration for "overlap": must be smaller than chunkSize (100 >= 100)'
      );
    });
  });

  describe('pageAt', () => {
    const offsets = [0, 10, 20];

    it('should find the page containing an offset', () => {
      expect(pageAt(0, offsets)).toBe(1);
      expect(pageAt(9, offsets)).toBe(1);
      expect(pageAt(10, offsets)).toBe(2);
      expect(pageAt(19, offsets)).toBe(2);
      expect(pageAt(25, offsets)).toBe(3);
    });

    it('should return undefined without offsets', () => {
      expect(pageAt(3, [])).toBeUndefined();
    });
  });
});
