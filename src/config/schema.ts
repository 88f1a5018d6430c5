/**
 * Configuration schema and types for vecrank.
 *
 * Defines TypeScript interfaces for the configuration file structure and the
 * zod schema loader.ts validates file contents against.
 */

import { z } from 'zod';
import type { PoolingStrategy } from '../embedding/pooling.js';
import { MAX_SEQUENCE_LENGTH } from '../embedding/tokenizer.js';

/**
 * Encoder model configuration.
 */
export interface ModelConfig {
  /** Path to the ONNX encoder (env var: VECRANK_MODEL_PATH) */
  modelPath?: string;

  /** Path to tokenizer.json or its directory (env var: VECRANK_TOKENIZER_PATH) */
  tokenizerPath?: string;

  /** Maximum token ids per input (default and upper bound: 512) */
  maxLength?: number;

  /** Pooling strategy (default: 'cls') */
  pooling?: PoolingStrategy;

  /** Name of the hidden-state output tensor (default: last_hidden_state) */
  hiddenStateOutput?: string;

  /** Intra-op thread count (env var: VECRANK_INTRA_OP_THREADS, default: 20) */
  intraOpThreads?: number;

  /** Inter-op thread count (env var: VECRANK_INTER_OP_THREADS, default: 40) */
  interOpThreads?: number;
}

/**
 * Document store configuration.
 */
export interface StoreConfig {
  /** SQLite database path (env var: VECRANK_DB_PATH, default: .vecrank/embeddings.db) */
  dbPath?: string;
}

/**
 * Instruction prefixes prepended before embedding.
 *
 * E5 models are trained with "query: " on search queries and "passage: " on
 * indexed documents; mixing them up degrades ranking quality.
 */
export interface PrefixConfig {
  query?: string;
  passage?: string;
}

/**
 * Search limits.
 */
export interface SearchConfig {
  /** Results returned when --top-k is not given (default: 5) */
  defaultTopK?: number;

  /** Largest accepted top-k (default: 50) */
  maxTopK?: number;
}

/**
 * vecrank configuration structure.
 *
 * Can be defined in:
 * - .vecrankrc (JSON or YAML)
 * - .vecrankrc.json
 * - .vecrankrc.yaml
 * - .vecrankrc.js (exports object)
 * - vecrank.config.js
 * - package.json "vecrank" property
 *
 * Environment variables take precedence over config file values.
 */
export interface VecrankConfig {
  model?: ModelConfig;
  store?: StoreConfig;
  prefixes?: PrefixConfig;
  search?: SearchConfig;
}

/**
 * Fully resolved configuration: every field has a value.
 */
export interface ResolvedConfig {
  model: Required<ModelConfig>;
  store: Required<StoreConfig>;
  prefixes: Required<PrefixConfig>;
  search: Required<SearchConfig>;
}

const positiveInt = z.number().int().positive();

/**
 * Validation schema for config file contents.
 * Unknown keys are stripped.
 */
export const VecrankConfigSchema = z.object({
  model: z
    .object({
      modelPath: z.string().min(1).optional(),
      tokenizerPath: z.string().min(1).optional(),
      maxLength: positiveInt.max(MAX_SEQUENCE_LENGTH).optional(),
      pooling: z.enum(['cls', 'mean']).optional(),
      hiddenStateOutput: z.string().min(1).optional(),
      intraOpThreads: positiveInt.optional(),
      interOpThreads: positiveInt.optional(),
    })
    .optional(),
  store: z
    .object({
      dbPath: z.string().min(1).optional(),
    })
    .optional(),
  prefixes: z
    .object({
      query: z.string().optional(),
      passage: z.string().optional(),
    })
    .optional(),
  search: z
    .object({
      defaultTopK: positiveInt.optional(),
      maxTopK: positiveInt.optional(),
    })
    .optional(),
}) satisfies z.ZodType<VecrankConfig>;
