/**
 * Startup loading of the embedding model artifacts.
 *
 * Resolves the model and tokenizer files from configuration, loads both once,
 * and checks the loaded session against the pipeline's output contract
 * before any text is embedded.
 */

import { existsSync } from 'node:fs';
import { InternalError, ModelArtifactMissingError } from '../errors.js';
import type { ModelConfig } from '../config/schema.js';
import { initModelRuntime, type ModelRuntime } from '../runtime/onnx.js';
import { createEmbeddingPipeline, type EmbeddingPipeline } from './pipeline.js';
import { loadVocabulary, type SubwordVocabulary } from './tokenizer.js';

/**
 * Loaded pipeline plus a handle to release the model session.
 */
export interface LoadedEmbeddingPipeline {
  pipeline: EmbeddingPipeline;
  dispose(): Promise<void>;
}

/**
 * Optional loaders, replaceable in tests.
 */
export interface PipelineLoaders {
  loadVocabulary?: (tokenizerPath: string) => Promise<SubwordVocabulary>;
  initRuntime?: (modelPath: string, config: Required<ModelConfig>) => Promise<ModelRuntime>;
}

/**
 * Loads vocabulary and model and returns a ready pipeline.
 *
 * Process:
 * 1. Check both artifacts exist (fatal if either is missing)
 * 2. Load the tokenizer vocabulary
 * 3. Create the inference session with the configured thread pools
 * 4. Verify the session produces the hidden-state output
 *
 * @param config - Resolved model configuration
 * @param loaders - Replacement loaders (tests only)
 * @returns Pipeline and dispose handle
 * @throws ModelArtifactMissingError if the model or tokenizer file is missing
 * @throws TokenizerUnavailableError if the tokenizer cannot be built
 * @throws InternalError if the model lacks the hidden-state output
 */
export async function initEmbeddingPipeline(
  config: Required<ModelConfig>,
  loaders: PipelineLoaders = {},
): Promise<LoadedEmbeddingPipeline> {
  if (!existsSync(config.modelPath)) {
    throw new ModelArtifactMissingError(
      config.modelPath,
      `Model file not found at ${config.modelPath}`,
    );
  }
  if (!existsSync(config.tokenizerPath)) {
    throw new ModelArtifactMissingError(
      config.tokenizerPath,
      `Tokenizer file not found at ${config.tokenizerPath}`,
    );
  }

  const vocabulary = await (loaders.loadVocabulary ?? loadVocabulary)(config.tokenizerPath);

  const runtime = await (loaders.initRuntime ?? defaultInitRuntime)(config.modelPath, config);

  if (!runtime.outputNames.includes(config.hiddenStateOutput)) {
    await runtime.dispose();
    throw new InternalError(
      `Model at ${config.modelPath} does not produce "${config.hiddenStateOutput}". Available outputs: ${runtime.outputNames.join(', ')}`,
    );
  }

  const pipeline = createEmbeddingPipeline(vocabulary, runtime, {
    maxLength: config.maxLength,
    pooling: config.pooling,
    hiddenStateOutput: config.hiddenStateOutput,
  });

  return {
    pipeline,
    dispose: () => runtime.dispose(),
  };
}

function defaultInitRuntime(
  modelPath: string,
  config: Required<ModelConfig>,
): Promise<ModelRuntime> {
  return initModelRuntime(modelPath, {
    intraOpThreads: config.intraOpThreads,
    interOpThreads: config.interOpThreads,
  });
}
