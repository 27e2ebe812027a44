import { describe, expect, test } from 'vitest';
import { VectorUtils } from '../../utils/vector-utils.js';

describe('VectorUtils', () => {
  test('should measure cosine similarity independent of magnitude', () => {
    expect(VectorUtils.cosineSimilarity([1, 0], [3, 0])).toBe(1);
    expect(VectorUtils.cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(VectorUtils.cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  test('should treat a zero vector as dissimilar to everything', () => {
    expect(VectorUtils.cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  test('should reject vectors of different lengths', () => {
    expect(() => VectorUtils.cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vectors must have the same length (2 vs 3)');
  });

  test('should average similarity over all distinct pairs', () => {
    expect(VectorUtils.meanPairwiseSimilarity([[1, 0], [1, 0], [0, 1]])).toBeCloseTo(1 / 3);
    expect(VectorUtils.meanPairwiseSimilarity([[1, 0]])).toBe(1);
  });

  test('should reject empty and non-finite vectors', () => {
    expect(VectorUtils.isValid(new Float32Array([0.5, -0.5]))).toBe(true);
    expect(VectorUtils.isValid([])).toBe(false);
    expect(VectorUtils.isValid([1, Number.NaN])).toBe(false);
    expect(VectorUtils.isValid([Number.POSITIVE_INFINITY])).toBe(false);
  });
});
