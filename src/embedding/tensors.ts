/**
 * Builds the three parallel int64 tensors the encoder expects.
 */

import type { TensorData } from '../runtime/types.js';

/** Names of the encoder's required inputs, in declaration order. */
export const MODEL_INPUT_NAMES = ['input_ids', 'attention_mask', 'token_type_ids'] as const;

export type ModelInputName = (typeof MODEL_INPUT_NAMES)[number];

type Int64Tensor = Extract<TensorData, { type: 'int64' }>;

/**
 * Encoder inputs for a single sequence. All three tensors share dims [1, L].
 */
export interface ModelInputTensors {
  /** Remapped token ids */
  readonly inputIds: Int64Tensor;

  /** All ones: every position is a real token (no padding at batch size 1) */
  readonly attentionMask: Int64Tensor;

  /** All zeros: single-segment input */
  readonly tokenTypeIds: Int64Tensor;
}

/**
 * Assembles encoder inputs from a token id sequence.
 *
 * @param ids - Token ids (already remapped and truncated)
 * @returns Tensors of shape [1, ids.length]
 */
export function buildModelInputs(ids: readonly number[]): ModelInputTensors {
  const length = ids.length;
  const dims = [1, length];

  const inputIds = new BigInt64Array(length);
  for (let i = 0; i < length; i++) {
    inputIds[i] = BigInt(ids[i]);
  }

  return {
    inputIds: { type: 'int64', data: inputIds, dims },
    attentionMask: { type: 'int64', data: new BigInt64Array(length).fill(1n), dims },
    tokenTypeIds: { type: 'int64', data: new BigInt64Array(length), dims },
  };
}

/**
 * Maps the typed input structure to the named feeds the session declares.
 */
export function toModelFeeds(inputs: ModelInputTensors): Record<ModelInputName, TensorData> {
  return {
    input_ids: inputs.inputIds,
    attention_mask: inputs.attentionMask,
    token_type_ids: inputs.tokenTypeIds,
  };
}
