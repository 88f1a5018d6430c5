/**
 * Vector search service: the request/response surface consumed by the CLI
 * (or any transport layer).
 *
 * Composes the embedding pipeline, the document store and the ranking
 * engine. Applies the E5 instruction prefixes: queries are embedded with
 * the query prefix, while `embed` / `embedMany` embed text exactly as given.
 *
 * Errors propagate unchanged. Callers decide on retry or presentation.
 */

import { InvalidArgumentError } from '../errors.js';
import {
  embed,
  embedMany,
  tokenizeText,
  type EmbeddingPipeline,
} from '../embedding/pipeline.js';
import type { TokenSequence } from '../embedding/tokenizer.js';
import type { DocumentStore, StoredDocument } from '../persistence/repository.js';
import { searchDocuments, type SimilarityResult } from '../search/searcher.js';
import { cosineSimilarity } from '../search/similarity.js';

export interface EmbeddingResult {
  text: string;
  embedding: Float32Array;
  dimensions: number;
}

export interface BatchEmbeddingResult {
  results: EmbeddingResult[];
  totalCount: number;
}

export interface TextSimilarityResult {
  text1: string;
  text2: string;

  /** Cosine similarity in [-1, 1] */
  similarity: number;
  embedding1: Float32Array;
  embedding2: Float32Array;
}

export interface SimilaritySearchResult {
  queryText: string;
  queryEmbedding: Float32Array;
  results: SimilarityResult<StoredDocument>[];

  /** Documents scanned */
  totalDocuments: number;
}

export interface VectorSearchServiceOptions {
  pipeline: EmbeddingPipeline;
  store: DocumentStore;

  /** Prefix for search queries and similarity inputs (default: 'query: ') */
  queryPrefix?: string;

  /** Largest accepted topK (default: 50) */
  maxTopK?: number;
}

export interface VectorSearchService {
  embed(text: string): Promise<EmbeddingResult>;
  embedMany(texts: readonly string[]): Promise<BatchEmbeddingResult>;
  similarity(text1: string, text2: string): Promise<TextSimilarityResult>;
  listDocuments(): StoredDocument[];
  search(queryText: string, topK: number): Promise<SimilaritySearchResult>;
  tokenize(text: string): TokenSequence;
}

function requireText(text: string, label: string): void {
  if (typeof text !== 'string' || text.trim() === '') {
    throw new InvalidArgumentError(`${label} cannot be null or empty`);
  }
}

/**
 * Creates the vector search service.
 *
 * @example
 * ```typescript
 * const service = createVectorSearchService({ pipeline, store });
 * const { results } = await service.search('How do I cancel my booking?', 5);
 * ```
 */
export function createVectorSearchService(
  options: VectorSearchServiceOptions,
): VectorSearchService {
  const { pipeline, store } = options;
  const queryPrefix = options.queryPrefix ?? 'query: ';
  const maxTopK = options.maxTopK ?? 50;

  return {
    async embed(text) {
      requireText(text, 'Text');
      const embedding = await embed(pipeline, text);
      return { text, embedding, dimensions: embedding.length };
    },

    async embedMany(texts) {
      if (texts.length === 0) {
        throw new InvalidArgumentError('Texts cannot be null or empty');
      }
      texts.forEach((text, index) => requireText(text, `Text at index ${index}`));

      const embeddings = await embedMany(pipeline, texts);
      const results = texts.map((text, index) => ({
        text,
        embedding: embeddings[index],
        dimensions: embeddings[index].length,
      }));
      return { results, totalCount: results.length };
    },

    async similarity(text1, text2) {
      requireText(text1, 'First text');
      requireText(text2, 'Second text');

      const [embedding1, embedding2] = await embedMany(pipeline, [
        queryPrefix + text1,
        queryPrefix + text2,
      ]);
      return {
        text1,
        text2,
        similarity: cosineSimilarity(embedding1, embedding2),
        embedding1,
        embedding2,
      };
    },

    listDocuments() {
      return store.listAll();
    },

    async search(queryText, topK) {
      requireText(queryText, 'Query text');
      if (!Number.isInteger(topK) || topK < 1 || topK > maxTopK) {
        throw new InvalidArgumentError(`topK must be an integer between 1 and ${maxTopK}`);
      }

      const queryEmbedding = await embed(pipeline, queryPrefix + queryText);
      const documents = store.listAll();
      const results = searchDocuments(queryEmbedding, documents, topK);

      return {
        queryText,
        queryEmbedding,
        results,
        totalDocuments: documents.length,
      };
    },

    tokenize(text) {
      requireText(text, 'Text');
      return tokenizeText(pipeline, text);
    },
  };
}
