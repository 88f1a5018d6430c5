/**
 * Text → embedding pipeline.
 *
 * Orchestrates tokenizer, tensor builder, model runtime and pooling into a
 * single operation:
 *
 *   text → token ids → [1, L] tensors → inference → pooled vector → unit vector
 *
 * One pipeline shape serves every encoder variant: what differs between
 * models (length limit, pooling, output name, the runtime itself) is data in
 * EmbeddingPipelineOptions plus the injected InferenceRunner.
 */

import type { InferenceRunner } from '../runtime/types.js';
import { buildModelInputs, toModelFeeds } from './tensors.js';
import { HIDDEN_STATE_OUTPUT, poolAndNormalize, type PoolingStrategy } from './pooling.js';
import {
  MAX_SEQUENCE_LENGTH,
  tokenize,
  type SubwordVocabulary,
  type TokenSequence,
} from './tokenizer.js';

/**
 * Per-model pipeline parameters.
 */
export interface EmbeddingPipelineOptions {
  /** Maximum token ids per input (default: 512) */
  maxLength?: number;

  /** Pooling strategy (default: 'cls') */
  pooling?: PoolingStrategy;

  /** Hidden-state output name (default: last_hidden_state) */
  hiddenStateOutput?: string;
}

/**
 * A ready-to-use embedding pipeline.
 */
export interface EmbeddingPipeline {
  readonly vocabulary: SubwordVocabulary;
  readonly runtime: InferenceRunner;
  readonly options: Readonly<Required<EmbeddingPipelineOptions>>;
}

/**
 * Binds a vocabulary and an inference runner into a pipeline.
 *
 * @param vocabulary - Loaded tokenizer vocabulary
 * @param runtime - Anything that can run the encoder
 * @param options - Per-model parameters
 */
export function createEmbeddingPipeline(
  vocabulary: SubwordVocabulary,
  runtime: InferenceRunner,
  options: EmbeddingPipelineOptions = {},
): EmbeddingPipeline {
  return {
    vocabulary,
    runtime,
    options: Object.freeze({
      maxLength: options.maxLength ?? MAX_SEQUENCE_LENGTH,
      pooling: options.pooling ?? 'cls',
      hiddenStateOutput: options.hiddenStateOutput ?? HIDDEN_STATE_OUTPUT,
    }),
  };
}

/**
 * Tokenizes text with the pipeline's vocabulary and length limit.
 */
export function tokenizeText(pipeline: EmbeddingPipeline, text: string): TokenSequence {
  return tokenize(pipeline.vocabulary, text, { maxLength: pipeline.options.maxLength });
}

/**
 * Generates a normalized embedding for one text.
 *
 * Errors from any stage (InvalidArgumentError for empty text, InternalError
 * for a mismatched model) propagate unchanged.
 *
 * @param pipeline - Pipeline from createEmbeddingPipeline()
 * @param text - Non-empty input text
 * @returns Unit-length Float32Array (or the zero vector for degenerate output)
 */
export async function embed(pipeline: EmbeddingPipeline, text: string): Promise<Float32Array> {
  const sequence = tokenizeText(pipeline, text);
  const inputs = buildModelInputs(sequence.ids);

  const outputs = await pipeline.runtime.run(toModelFeeds(inputs), [
    pipeline.options.hiddenStateOutput,
  ]);

  return poolAndNormalize(outputs, {
    outputName: pipeline.options.hiddenStateOutput,
    strategy: pipeline.options.pooling,
    attentionMask: inputs.attentionMask,
  });
}

/**
 * Generates embeddings for several texts.
 *
 * Each text is an independent `embed` call; all calls are issued at once
 * against the shared runtime. Results keep input order.
 *
 * CRITICAL: All-or-nothing. The first failing text rejects the whole batch
 * and no partial results are returned.
 *
 * @param pipeline - Pipeline from createEmbeddingPipeline()
 * @param texts - Texts to embed
 * @returns One embedding per text, same order
 */
export async function embedMany(
  pipeline: EmbeddingPipeline,
  texts: readonly string[],
): Promise<Float32Array[]> {
  return Promise.all(texts.map((text) => embed(pipeline, text)));
}
