/**
 * Cosine similarity between embedding vectors.
 */

import { InvalidArgumentError } from '../errors.js';

/**
 * Computes the cosine of the angle between two vectors.
 *
 * Accumulates in double precision. If either vector has zero magnitude the
 * similarity is defined as 0 (not an error), which keeps ranking total. The
 * result is clamped to [-1, 1] so rounding never pushes it out of range.
 *
 * @param a - First vector
 * @param b - Second vector (same dimensionality as `a`)
 * @returns Similarity in [-1, 1]
 * @throws InvalidArgumentError if the vectors differ in length
 *
 * @example
 * ```typescript
 * cosineSimilarity([1, 0], [0, 1]); // => 0
 * cosineSimilarity([1, 2], [2, 4]); // => 1
 * ```
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new InvalidArgumentError(
      `Vectors must have the same dimensions (got ${a.length} and ${b.length})`,
    );
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    magnitudeA += a[i] * a[i];
    magnitudeB += b[i] * b[i];
  }

  magnitudeA = Math.sqrt(magnitudeA);
  magnitudeB = Math.sqrt(magnitudeB);

  if (magnitudeA === 0 || magnitudeB === 0) {
    return 0;
  }

  const similarity = dotProduct / (magnitudeA * magnitudeB);
  return Math.min(1, Math.max(-1, similarity));
}
