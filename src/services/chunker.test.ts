import { describe, it, expect } from 'vitest';
import { splitText, validateChunkParameters } from './chunker';
import { ConfigurationError } from '../utils/errors';

describe('splitText', () => {
  it('cuts at sentence ends with the configured overlap', () => {
    const chunks = splitText('A. B. C.', 4, 1);

    expect(chunks.map(c => [c.startOffset, c.endOffset, c.text])).toEqual([
      [0, 3, 'A. '],
      [2, 6, ' B. '],
      [5, 8, ' C.'],
    ]);
    expect(chunks.map(c => c.index)).toEqual([0, 1, 2]);
  });

  it('produces identical boundaries on every run', () => {
    const first = splitText('A. B. C.', 4, 1);
    const second = splitText('A. B. C.', 4, 1);

    expect(second).toEqual(first);
  });

  it('cuts hard at the target size when no break is in range', () => {
    const chunks = splitText('abcdefghij', 4, 1);

    expect(chunks.map(c => c.text)).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('prefers a paragraph break over a nearer word break', () => {
    const text = 'aaaa bbbb\n\ncccc dddd eeee';
    const chunks = splitText(text, 14, 2, { boundaryTolerance: 6 });

    expect(chunks[0].text).toBe('aaaa bbbb\n\n');
    expect(chunks[1].startOffset).toBe(9);
    expect(chunks[1].endOffset).toBe(21);
    expect(chunks[2].text).toBe('d eeee');
  });

  it('covers the whole text with overlapping, contiguous chunks', () => {
    const text = 'The quick brown fox jumps over the lazy dog. '.repeat(20);
    const chunks = splitText(text, 100, 20);

    expect(chunks[0].startOffset).toBe(0);
    expect(chunks[chunks.length - 1].endOffset).toBe(text.length);
    chunks.forEach((chunk, i) => {
      expect(chunk.index).toBe(i);
      expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset));
      expect(chunk.length).toBeLessThanOrEqual(100);
      if (i > 0) {
        expect(chunk.startOffset).toBe(chunks[i - 1].endOffset - 20);
        expect(chunk.startOffset).toBeGreaterThan(chunks[i - 1].startOffset);
      }
    });
  });

  it('returns a single chunk for short text and none for empty text', () => {
    expect(splitText('short', 10, 2)).toEqual([
      { index: 0, text: 'short', startOffset: 0, endOffset: 5, length: 5, tokenEstimate: 2 },
    ]);
    expect(splitText('', 10, 2)).toEqual([]);
  });

  it('rejects invalid parameters', () => {
    expect(() => splitText('text', 0, 1)).toThrow(ConfigurationError);
    expect(() => splitText('text', 10, 10)).toThrow(ConfigurationError);
    expect(() => splitText('text', 10, 0)).toThrow(ConfigurationError);
    expect(() => splitText('text', 10.5, 2)).toThrow(ConfigurationError);
    expect(() => splitText('text', 10, 2, { boundaryTolerance: -1 })).toThrow(ConfigurationError);
  });
});

describe('validateChunkParameters', () => {
  it('accepts an overlap smaller than the chunk size', () => {
    expect(() => validateChunkParameters(1000, 200)).not.toThrow();
  });

  it('names the offending values', () => {
    expect(() => validateChunkParameters(100, 150)).toThrow(
      'overlap must be smaller than chunkSize (got overlap 150, chunkSize 100)'
    );
  });
});
