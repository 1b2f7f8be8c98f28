/**
 * Vector similarity helpers shared by chunk retrieval and the knowledge retriever.
 */

/**
 * Cosine similarity of two vectors. A zero-length or zero-norm vector scores 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface Ranked<T> {
  item: T;
  score: number;
}

/**
 * Score every candidate against the query and sort by score, highest first.
 * Ties keep their input order.
 */
export function rankBySimilarity<T>(
  queryVector: readonly number[],
  candidates: readonly T[],
  vectorOf: (candidate: T) => readonly number[]
): Ranked<T>[] {
  return candidates
    .map((item, position) => ({ item, score: cosineSimilarity(queryVector, vectorOf(item)), position }))
    .sort((a, b) => b.score - a.score || a.position - b.position)
    .map(({ item, score }) => ({ item, score }));
}

/**
 * Keep at most topK ranked entries scoring at or above the threshold.
 */
export function selectTopMatches<T>(ranked: readonly Ranked<T>[], topK: number, threshold: number): Ranked<T>[] {
  return ranked.slice(0, Math.max(0, topK)).filter((entry) => entry.score >= threshold);
}
