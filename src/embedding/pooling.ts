/**
 * Pooling and L2 normalization of encoder hidden states.
 *
 * Reduces the token-level output [batch, sequence, hidden] to a single
 * unit-length vector for batch item 0.
 */

import { InternalError } from '../errors.js';
import type { TensorData, TensorMap } from '../runtime/types.js';

/** Default name of the token-level hidden-state output. */
export const HIDDEN_STATE_OUTPUT = 'last_hidden_state';

/** Norms at or below this are treated as the zero vector. */
export const NORM_EPSILON = 1e-12;

/**
 * Pooling strategy.
 *
 * - 'cls': the hidden state at sequence position 0 (the start marker).
 *   This is what multilingual-e5 checkpoints exported for this pipeline use.
 * - 'mean': average over positions whose attention mask is 1.
 */
export type PoolingStrategy = 'cls' | 'mean';

export interface PoolingOptions {
  /** Output tensor holding the hidden states (default: last_hidden_state) */
  outputName?: string;

  /** Pooling strategy (default: 'cls') */
  strategy?: PoolingStrategy;

  /** Attention mask for 'mean' pooling; all positions count when omitted */
  attentionMask?: TensorData;
}

/**
 * Scales a vector to unit L2 norm.
 *
 * Vectors with norm <= 1e-12 are returned unchanged (as a copy) rather than
 * divided by a near-zero magnitude.
 */
export function normalizeVector(vector: ArrayLike<number>): Float32Array {
  let sumOfSquares = 0;
  for (let i = 0; i < vector.length; i++) {
    sumOfSquares += vector[i] * vector[i];
  }
  const norm = Math.sqrt(sumOfSquares);

  const normalized = Float32Array.from(vector);
  if (norm > NORM_EPSILON) {
    for (let i = 0; i < normalized.length; i++) {
      normalized[i] = vector[i] / norm;
    }
  }
  return normalized;
}

/**
 * Extracts the pooled representation from the encoder outputs and normalizes it.
 *
 * @param outputs - Runtime outputs containing the hidden-state tensor
 * @param options - Output name, strategy and (for mean pooling) attention mask
 * @returns Unit-length embedding, or the zero vector for degenerate input
 * @throws InternalError if the hidden state is missing, not float32, not rank 3,
 *   or shorter than its declared shape
 */
export function poolAndNormalize(outputs: TensorMap, options: PoolingOptions = {}): Float32Array {
  const outputName = options.outputName ?? HIDDEN_STATE_OUTPUT;
  const hiddenState = outputs[outputName];

  if (!hiddenState) {
    throw new InternalError(`Model output "${outputName}" not found in inference results.`);
  }
  if (hiddenState.type !== 'float32') {
    throw new InternalError(
      `Unexpected element type for ${outputName}: ${hiddenState.type} (expected float32)`,
    );
  }
  if (hiddenState.dims.length !== 3) {
    throw new InternalError(
      `Unexpected shape for ${outputName}: ${hiddenState.dims.join(', ')}`,
    );
  }

  const [, sequenceLength, hiddenSize] = hiddenState.dims;
  if (hiddenState.data.length < sequenceLength * hiddenSize) {
    throw new InternalError(
      `Output ${outputName} holds ${hiddenState.data.length} values, fewer than its shape ${hiddenState.dims.join(', ')} requires`,
    );
  }

  const pooled =
    options.strategy === 'mean'
      ? meanPool(hiddenState.data, sequenceLength, hiddenSize, options.attentionMask)
      : hiddenState.data.subarray(0, hiddenSize);

  return normalizeVector(pooled);
}

function meanPool(
  data: Float32Array,
  sequenceLength: number,
  hiddenSize: number,
  attentionMask?: TensorData,
): Float64Array {
  const sum = new Float64Array(hiddenSize);
  let counted = 0;

  for (let position = 0; position < sequenceLength; position++) {
    if (attentionMask && Number(attentionMask.data[position] ?? 0) === 0) continue;

    const offset = position * hiddenSize;
    for (let j = 0; j < hiddenSize; j++) {
      sum[j] += data[offset + j];
    }
    counted++;
  }

  if (counted > 0) {
    for (let j = 0; j < hiddenSize; j++) {
      sum[j] /= counted;
    }
  }
  return sum;
}
