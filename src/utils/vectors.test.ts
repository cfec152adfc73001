import { describe, it, expect } from 'vitest';
import {
  distanceToSimilarity,
  isFiniteVector,
  normalizeVector,
  serializeVector,
} from './vectors';

describe('vector utilities', () => {
  it('stores vectors as float32 blobs', () => {
    const buffer = serializeVector([0.5, -1, 2]);

    expect(buffer.byteLength).toBe(12);
    expect(Array.from(new Float32Array(new Uint8Array(buffer).buffer))).toEqual([0.5, -1, 2]);
  });

  it('normalizes to unit length and leaves zero vectors alone', () => {
    expect(normalizeVector([3, 4])).toEqual([0.6, 0.8]);
    expect(normalizeVector([0, 0])).toEqual([0, 0]);
  });

  it('maps distances onto a similarity in [0, 1]', () => {
    expect(distanceToSimilarity(0, 'cosine')).toBe(1);
    expect(distanceToSimilarity(0.25, 'cosine')).toBe(0.75);
    expect(distanceToSimilarity(1.5, 'cosine')).toBe(0);
    expect(distanceToSimilarity(0, 'l2')).toBe(1);
    expect(distanceToSimilarity(3, 'l2')).toBe(0.25);
  });

  it('accepts only non-empty finite vectors', () => {
    expect(isFiniteVector([1, 2])).toBe(true);
    expect(isFiniteVector([])).toBe(false);
    expect(isFiniteVector([1, Number.NaN])).toBe(false);
  });
});
