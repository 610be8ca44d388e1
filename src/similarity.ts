import { DegenerateInputError } from "./errors";
import type { EmbeddingVector, ScoredCandidate } from "./types";

function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DegenerateInputError(
      `Embedding dimension mismatch: ${a.length} vs ${b.length}`,
    );
  }
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/**
 * Euclidean norm of a vector. A self-dot-product of zero (or anything not
 * strictly positive) would make the cosine ratio undefined, so it is rejected.
 *
 * @param label Used in the error message to name the offending vector.
 */
function norm(v: readonly number[], label: string): number {
  const self = dot(v, v);
  if (!(self > 0)) throw new DegenerateInputError(`${label} is zero`);
  return Math.sqrt(self);
}

/**
 * Cosine similarity `dot(a,b) / (‖a‖·‖b‖)`, in range [-1, 1].
 *
 * @throws {DegenerateInputError} On a zero vector or mismatched dimensions.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  return dot(a, b) / norm(a, "embedding") / norm(b, "embedding");
}

/**
 * Score every corpus vector against the query and sort by descending score.
 * Equal scores keep ascending corpus position.
 */
export function rankBySimilarity(
  query: readonly number[],
  corpus: readonly EmbeddingVector[],
): ScoredCandidate[] {
  const queryNorm = norm(query, "query embedding");
  const scored = corpus.map((v, i): ScoredCandidate => {
    const vNorm = norm(v.values, `corpus embedding ${i}`);
    return { position: v.position, score: dot(query, v.values) / queryNorm / vNorm };
  });
  scored.sort((a, b) => b.score - a.score || a.position - b.position);
  return scored;
}

/**
 * Positions of the `n` corpus vectors most similar to `query`.
 * Returns `min(n, corpus.length)` entries, best first.
 */
export function topSimilar(
  query: readonly number[],
  corpus: readonly EmbeddingVector[],
  n: number,
): number[] {
  const limit = Math.max(0, Math.min(n, corpus.length));
  return rankBySimilarity(query, corpus)
    .slice(0, limit)
    .map((c) => c.position);
}
