/**
 * Terminal and JSON formatting for CLI output.
 */

import chalk from 'chalk';
import type { StoredDocument } from '../persistence/repository.js';
import type { SimilarityResult } from '../search/searcher.js';

/**
 * Shows the first few components of a vector and its dimensionality.
 *
 * @example
 * ```typescript
 * formatVectorPreview(new Float32Array([0.5, -0.25, 0.125]), 2);
 * // => '[0.5000, -0.2500, …] (3 dims)'
 * ```
 */
export function formatVectorPreview(vector: ArrayLike<number>, count = 6): string {
  const shown = Array.from(vector)
    .slice(0, count)
    .map((value) => value.toFixed(4));
  const ellipsis = vector.length > count ? ', …' : '';
  return `[${shown.join(', ')}${ellipsis}] (${vector.length} dims)`;
}

/**
 * Formats a similarity score for display.
 */
export function formatScore(score: number): string {
  return score.toFixed(4);
}

/**
 * JSON-safe view of a stored document. Embeddings become plain arrays and
 * are omitted unless requested.
 */
export function documentToJson(
  document: StoredDocument,
  includeEmbedding: boolean,
): Record<string, unknown> {
  return {
    id: document.id,
    question: document.question,
    answer: document.answer,
    combinedText: document.combinedText,
    embeddingDimensions: document.embeddingDimensions,
    createdAt: document.createdAt.toISOString(),
    ...(includeEmbedding && { embedding: Array.from(document.embedding) }),
  };
}

/**
 * Renders ranked search results, one block per document.
 */
export function formatSearchResults(results: SimilarityResult<StoredDocument>[]): string {
  return results
    .map(({ document, score }, index) =>
      [
        `${chalk.bold(`${index + 1}.`)} ${chalk.cyan(`[${formatScore(score)}]`)} ${document.question} ${chalk.dim(`(#${document.id})`)}`,
        `   ${document.answer}`,
      ].join('\n'),
    )
    .join('\n\n');
}
