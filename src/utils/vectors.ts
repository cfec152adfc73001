/**
 * Utilities for vector serialization and operations
 */
import type { DistanceMetric } from '../types/index';

/**
 * Serialize a number array to a Float32 buffer for BLOB storage and for
 * binding as a sqlite-vec vector parameter
 */
export function serializeVector(vector: number[]): Buffer {
  const float32Array = new Float32Array(vector);
  return Buffer.from(float32Array.buffer, float32Array.byteOffset, float32Array.byteLength);
}

/**
 * Normalize a vector (for cosine similarity with pre-normalized vectors)
 */
export function normalizeVector(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vector;
  return vector.map(val => val / magnitude);
}

/**
 * Map a store distance onto a [0, 1] similarity, higher is better.
 * Cosine distance lies in [0, 2]; L2 distance is unbounded.
 */
export function distanceToSimilarity(distance: number, metric: DistanceMetric): number {
  if (metric === 'cosine') {
    return Math.min(1, Math.max(0, 1 - distance));
  }
  return 1 / (1 + distance);
}

export function isFiniteVector(vector: number[]): boolean {
  return vector.length > 0 && vector.every(value => Number.isFinite(value));
}
