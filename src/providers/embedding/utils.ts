/**
 * Embedding Provider Utilities
 *
 * Vector helpers shared by the embedding client and the label matcher.
 */

/**
 * L2 normalize a vector to unit length.
 * Returns a new array - does not mutate input.
 */
export function normalizeL2(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vector;
  return vector.map((val) => val / magnitude);
}

/**
 * Cosine similarity between two vectors.
 *
 * Does not assume unit length: cached vectors may come from any client,
 * including test doubles. Mismatched or empty vectors score 0.
 */
export function cosineSimilarity(vectorA: number[], vectorB: number[]): number {
  if (vectorA.length === 0 || vectorA.length !== vectorB.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < vectorA.length; i++) {
    const a = vectorA[i] ?? 0;
    const b = vectorB[i] ?? 0;
    dot += a * b;
    normA += a * a;
    normB += b * b;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
