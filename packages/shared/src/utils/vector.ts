/** Cosine similarity; 0 for mismatched or empty vectors. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

/**
 * Ranks candidates by descending score. `Array.prototype.sort` is stable,
 * so equal scores keep their insertion order.
 */
export function rankByScore<T extends { score: number }>(candidates: T[], topK: number): T[] {
  return [...candidates].sort((a, b) => b.score - a.score).slice(0, Math.max(0, topK));
}
