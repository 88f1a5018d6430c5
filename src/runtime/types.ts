/**
 * Tensor and session contracts shared by the runtime adapter and the
 * embedding pipeline.
 *
 * These types deliberately mirror the structural shape of onnxruntime's
 * `Tensor` (type, data, dims) so the ONNX binding can be swapped for an
 * in-process fake in tests without loading the native module.
 */

/**
 * A dense tensor with its element type, flat data buffer and shape.
 *
 * Only the two element types the encoder contract uses are modelled:
 * int64 for token ids / masks and float32 for hidden states.
 */
export type TensorData =
  | { readonly type: 'int64'; readonly data: BigInt64Array; readonly dims: readonly number[] }
  | { readonly type: 'float32'; readonly data: Float32Array; readonly dims: readonly number[] };

/** Named tensors passed into or returned from a session. */
export type TensorMap = Record<string, TensorData>;

/**
 * Minimal surface of a loaded inference session.
 *
 * Implemented by the ONNX Runtime binding in onnx.ts and by test doubles.
 * `run` must be safe to call concurrently.
 */
export interface InferenceSessionHandle {
  /** Input names the model declares (all required). */
  readonly inputNames: readonly string[];

  /** Output names the model can produce. */
  readonly outputNames: readonly string[];

  /**
   * Executes the model.
   *
   * @param feeds - Input tensors keyed by name
   * @param fetches - Output names to compute
   * @returns Output tensors keyed by name
   */
  run(feeds: TensorMap, fetches: readonly string[]): Promise<TensorMap>;

  /** Releases native resources held by the session. */
  release(): Promise<void>;
}

/**
 * Narrow "run inference" capability consumed by the embedding pipeline.
 *
 * The pipeline depends only on this interface, so model variants plug in by
 * providing a different runner rather than subclassing.
 */
export interface InferenceRunner {
  run(inputs: TensorMap, wantedOutputs?: readonly string[]): Promise<TensorMap>;
}

/**
 * Thread-pool configuration for an inference session.
 */
export interface RuntimeThreadOptions {
  /** Threads used inside a single operator (default: 20) */
  intraOpThreads?: number;

  /** Threads used to run independent operators in parallel (default: 40) */
  interOpThreads?: number;
}
