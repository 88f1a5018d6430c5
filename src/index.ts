export * from './errors.js';
export type { TensorData, TensorMap, InferenceSessionHandle, InferenceRunner } from './runtime/types.js';
export { createModelRuntime, initModelRuntime, type ModelRuntime } from './runtime/onnx.js';
export {
  tokenize,
  remapTokenIds,
  loadVocabulary,
  createSubwordVocabulary,
  MAX_SEQUENCE_LENGTH,
  type SubwordPiece,
  type SubwordVocabulary,
  type TokenSequence,
  type VocabularyIdLayout,
} from './embedding/tokenizer.js';
export { buildModelInputs, toModelFeeds, type ModelInputTensors } from './embedding/tensors.js';
export { normalizeVector, poolAndNormalize, type PoolingStrategy } from './embedding/pooling.js';
export {
  createEmbeddingPipeline,
  embed,
  embedMany,
  tokenizeText,
  type EmbeddingPipeline,
  type EmbeddingPipelineOptions,
} from './embedding/pipeline.js';
export { initEmbeddingPipeline, type LoadedEmbeddingPipeline } from './embedding/loader.js';
export { cosineSimilarity } from './search/similarity.js';
export { searchDocuments, type SimilarityResult } from './search/searcher.js';
export { initDatabase } from './persistence/schema.js';
export {
  listAllDocuments,
  getDocumentById,
  countDocuments,
  replaceAllDocuments,
  insertDocumentsBatch,
  createSqliteDocumentStore,
  type StoredDocument,
  type NewDocument,
  type DocumentStore,
} from './persistence/repository.js';
export { ingestDataset, parseDataset, type IngestStats } from './ingest/ingest.js';
export {
  createVectorSearchService,
  type VectorSearchService,
  type VectorSearchServiceOptions,
} from './service/vector-search.js';
export { loadConfig, DEFAULTS } from './config/loader.js';
export type { ResolvedConfig, VecrankConfig } from './config/schema.js';
