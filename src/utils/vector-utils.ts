/**
 * Vector utility functions for similarity calculations
 */

export type Vector = Float32Array | readonly number[];

export class VectorUtils {
  /**
   * Calculate cosine similarity between two vectors
   */
  static cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
      throw new Error(`Vectors must have the same length (${a.length} vs ${b.length})`);
    }

    let dotProduct = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
      dotProduct += a[i] * b[i];
      normA += a[i] * a[i];
      normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
      return 0;
    }

    return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
  }

  /**
   * Mean cosine similarity over all distinct pairs; 1 for fewer than two vectors
   */
  static meanPairwiseSimilarity(vectors: Vector[]): number {
    if (vectors.length < 2) return 1;

    let total = 0;
    let pairs = 0;
    for (let i = 0; i < vectors.length; i++) {
      for (let j = i + 1; j < vectors.length; j++) {
        total += this.cosineSimilarity(vectors[i], vectors[j]);
        pairs++;
      }
    }

    return total / pairs;
  }

  /**
   * Check if vector has valid values (not NaN or infinite)
   */
  static isValid(vector: Vector): boolean {
    if (vector.length === 0) return false;
    for (let i = 0; i < vector.length; i++) {
      if (!Number.isFinite(vector[i])) {
        return false;
      }
    }
    return true;
  }
}
