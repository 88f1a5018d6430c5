/**
 * Brute-force similarity ranking over an in-memory document set.
 *
 * Scores every document against the query (O(N·D) full scan, no index) and
 * returns the top-K by descending cosine similarity. An approximate index
 * can later sit behind the same contract without changing callers.
 */

import { InvalidArgumentError } from '../errors.js';
import { cosineSimilarity } from './similarity.js';

/**
 * Anything that carries a precomputed embedding.
 */
export interface Embedded {
  readonly embedding: ArrayLike<number>;
}

/**
 * A document paired with its similarity to the query.
 */
export interface SimilarityResult<T> {
  document: T;

  /** Cosine similarity in [-1, 1] (higher is more similar) */
  score: number;
}

/**
 * Ranks documents by cosine similarity to a query vector.
 *
 * Ordering contract:
 * - Descending by score
 * - Equal scores keep the order in which `documents` were supplied
 *   (Array.prototype.sort is stable)
 *
 * The input array is neither mutated nor retained. Callers that may mutate
 * their collection concurrently must pass a snapshot.
 *
 * Edge cases:
 * - Empty document set: Returns empty array
 * - topK larger than the set: Returns every document
 * - Dimension mismatch on any document: Throws (from cosineSimilarity)
 *
 * @param query - Query embedding
 * @param documents - Documents with embeddings of the same dimensionality
 * @param topK - Maximum results (positive integer)
 * @returns Up to topK results sorted by descending score
 * @throws InvalidArgumentError if topK is not a positive integer or dimensions differ
 *
 * @example
 * ```typescript
 * const results = searchDocuments(queryEmbedding, store.listAll(), 5);
 * // results[0].score >= results[1].score >= ...
 * ```
 */
export function searchDocuments<T extends Embedded>(
  query: ArrayLike<number>,
  documents: readonly T[],
  topK: number,
): SimilarityResult<T>[] {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InvalidArgumentError(`topK must be a positive integer, got ${topK}`);
  }

  const scored = documents.map((document) => ({
    document,
    score: cosineSimilarity(query, document.embedding),
  }));

  return scored.sort((a, b) => b.score - a.score).slice(0, topK);
}
