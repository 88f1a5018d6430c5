// Lazy import onnxruntime-node so that commands which never run the model
// (documents, config, --help) do not pay for loading the native binding.
import type * as ort from 'onnxruntime-node';
import { existsSync } from 'node:fs';
import { InternalError, InvalidArgumentError, ModelArtifactMissingError } from '../errors.js';
import type {
  InferenceRunner,
  InferenceSessionHandle,
  RuntimeThreadOptions,
  TensorData,
  TensorMap,
} from './types.js';

/** Default intra-op thread count for the encoder session. */
export const DEFAULT_INTRA_OP_THREADS = 20;

/** Default inter-op thread count for the encoder session. */
export const DEFAULT_INTER_OP_THREADS = 40;

/**
 * Validated inference runtime bound to one long-lived session.
 */
export interface ModelRuntime extends InferenceRunner {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  dispose(): Promise<void>;
}

/**
 * Builds the "Invalid / Missing / Valid" diagnostic used for both input and
 * output name validation. Returns null when nothing is wrong.
 */
function describeNameMismatch(
  kind: 'input' | 'output',
  provided: readonly string[],
  valid: readonly string[],
  requireAll: boolean,
): string | null {
  const invalid = provided.filter((name) => !valid.includes(name));
  const missing = requireAll ? valid.filter((name) => !provided.includes(name)) : [];

  if (invalid.length === 0 && missing.length === 0) return null;

  const messages: string[] = [];
  if (invalid.length > 0) {
    messages.push(`Invalid ${kind} name(s): ${invalid.join(', ')}.`);
  }
  if (missing.length > 0) {
    messages.push(`Missing required ${kind} name(s): ${missing.join(', ')}.`);
  }
  messages.push(`Valid ${kind} names are: ${valid.join(', ')}.`);
  return messages.join(' ');
}

/**
 * Wraps a loaded session with the runtime contract checks.
 *
 * Contract:
 * - `inputs` must be non-empty and its key set must equal the session's
 *   declared input names. Extra and missing names are reported together.
 * - `wantedOutputs`, when given, may only name outputs the session produces.
 *   When omitted, every declared output is fetched.
 * - The result holds exactly the requested outputs, in request order. A
 *   session returning a different number of outputs is a contract violation
 *   (InternalError), not an input error.
 *
 * CRITICAL: The wrapper holds no per-call state, so concurrent `run` calls
 * against the same session are safe as long as the session itself is.
 *
 * @param session - Loaded session (ONNX Runtime or a test double)
 * @returns Runtime exposing `run`, the declared names and `dispose`
 */
export function createModelRuntime(session: InferenceSessionHandle): ModelRuntime {
  async function run(inputs: TensorMap, wantedOutputs?: readonly string[]): Promise<TensorMap> {
    const providedInputs = Object.keys(inputs);
    if (providedInputs.length === 0) {
      throw new InvalidArgumentError('Inputs cannot be empty.');
    }

    const inputProblem = describeNameMismatch('input', providedInputs, session.inputNames, true);
    if (inputProblem) {
      throw new InvalidArgumentError(inputProblem);
    }

    if (wantedOutputs) {
      const outputProblem = describeNameMismatch(
        'output',
        wantedOutputs,
        session.outputNames,
        false,
      );
      if (outputProblem) {
        throw new InvalidArgumentError(outputProblem);
      }
    }

    const fetches = wantedOutputs ?? session.outputNames;
    const results = await session.run(inputs, fetches);

    const returnedCount = Object.keys(results).length;
    if (returnedCount !== fetches.length) {
      throw new InternalError(`Expected ${fetches.length} outputs, but got ${returnedCount}.`);
    }

    const outputs: TensorMap = {};
    for (const name of fetches) {
      const tensor = results[name];
      if (!tensor) {
        throw new InternalError(`Runtime did not return requested output "${name}".`);
      }
      outputs[name] = tensor;
    }
    return outputs;
  }

  return {
    inputNames: session.inputNames,
    outputNames: session.outputNames,
    run,
    dispose: () => session.release(),
  };
}

/**
 * Converts an ONNX Runtime output tensor into the pipeline's TensorData.
 *
 * Only float32 and int64 outputs are part of the encoder contract; anything
 * else indicates a model that does not match.
 */
function fromOrtTensor(name: string, tensor: ort.Tensor): TensorData {
  const { data, dims } = tensor;
  if (data instanceof Float32Array) {
    return { type: 'float32', data, dims };
  }
  if (data instanceof BigInt64Array) {
    return { type: 'int64', data, dims };
  }
  throw new InternalError(`Unsupported tensor type "${tensor.type}" for output "${name}".`);
}

/**
 * Loads the encoder model into a long-lived ONNX Runtime session.
 *
 * Session configuration:
 * - executionMode 'parallel' with explicit intra-/inter-op thread pools
 * - graphOptimizationLevel 'extended'
 * - warning-level runtime logging
 *
 * Inference runs on onnxruntime's native worker threads; `run` returns a
 * promise, so the event loop is never blocked by the compute session.
 *
 * @param modelPath - Path to the .onnx encoder file
 * @param options - Thread-pool sizes (defaults: 20 intra-op, 40 inter-op)
 * @returns Validated runtime wrapping the session
 * @throws InvalidArgumentError if modelPath is blank
 * @throws ModelArtifactMissingError if the model file does not exist
 * @throws InternalError if ONNX Runtime fails to load the model
 *
 * @example
 * ```typescript
 * const runtime = await initModelRuntime('.vecrank/models/model.onnx', { intraOpThreads: 4 });
 * const outputs = await runtime.run(feeds, ['last_hidden_state']);
 * ```
 */
export async function initModelRuntime(
  modelPath: string,
  options: RuntimeThreadOptions = {},
): Promise<ModelRuntime> {
  if (!modelPath.trim()) {
    throw new InvalidArgumentError('Model path cannot be empty.');
  }
  if (!existsSync(modelPath)) {
    throw new ModelArtifactMissingError(modelPath, `Model file not found at ${modelPath}`);
  }

  const binding = await import('onnxruntime-node');

  let session: ort.InferenceSession;
  try {
    session = await binding.InferenceSession.create(modelPath, {
      executionProviders: ['cpu'],
      executionMode: 'parallel',
      graphOptimizationLevel: 'extended',
      intraOpNumThreads: options.intraOpThreads ?? DEFAULT_INTRA_OP_THREADS,
      interOpNumThreads: options.interOpThreads ?? DEFAULT_INTER_OP_THREADS,
      logSeverityLevel: 2,
      logId: 'vecrank-session',
    });
  } catch (error) {
    throw new InternalError(
      `Failed to load model at ${modelPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const handle: InferenceSessionHandle = {
    inputNames: session.inputNames,
    outputNames: session.outputNames,
    async run(feeds, fetches) {
      const ortFeeds: Record<string, ort.Tensor> = {};
      for (const [name, tensor] of Object.entries(feeds)) {
        ortFeeds[name] =
          tensor.type === 'int64'
            ? new binding.Tensor('int64', tensor.data, tensor.dims)
            : new binding.Tensor('float32', tensor.data, tensor.dims);
      }

      const results = await session.run(ortFeeds, fetches, {
        logSeverityLevel: 2,
        tag: 'vecrank-run',
      });

      const outputs: TensorMap = {};
      for (const [name, value] of Object.entries(results)) {
        outputs[name] = fromOrtTensor(name, value);
      }
      return outputs;
    },
    release: () => session.release(),
  };

  return createModelRuntime(handle);
}
