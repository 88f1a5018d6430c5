/**
 * Configuration loader with three-tier fallback.
 *
 * Priority order:
 * 1. Environment variables (highest priority)
 * 2. Config file (.vecrankrc, vecrank.config.js, package.json)
 * 3. Defaults (lowest priority)
 *
 * - Node 20+ native .env loading via process.loadEnvFile()
 * - cosmiconfig for config file discovery, zod for validation
 * - Missing or invalid config never crashes: defaults apply
 */

import { cosmiconfig } from 'cosmiconfig';
import { VecrankConfigSchema, type ResolvedConfig, type VecrankConfig } from './schema.js';

/**
 * Default configuration values.
 *
 * These are used when no env var or config file provides a value.
 */
export const DEFAULTS: ResolvedConfig = {
  model: {
    modelPath: '.vecrank/models/model.onnx',
    tokenizerPath: '.vecrank/models/tokenizer.json',
    maxLength: 512,
    pooling: 'cls',
    hiddenStateOutput: 'last_hidden_state',
    intraOpThreads: 20,
    interOpThreads: 40,
  },
  store: {
    dbPath: '.vecrank/embeddings.db',
  },
  prefixes: {
    query: 'query: ',
    passage: 'passage: ',
  },
  search: {
    defaultTopK: 5,
    maxTopK: 50,
  },
};

/**
 * Reads a positive integer from an environment variable.
 *
 * Returns undefined (and warns) when the variable is set but not a positive
 * integer, so the next tier applies.
 */
function readIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    console.warn(`Ignoring ${name}="${raw}": expected a positive integer`);
    return undefined;
  }
  return value;
}

/**
 * Loads vecrank configuration with three-tier fallback.
 *
 * Process:
 * 1. Load .env file (if exists) using Node 20+ native support
 * 2. Search for config file using cosmiconfig
 * 3. Validate the file with zod
 * 4. Merge: env vars > config file > defaults
 *
 * Edge cases:
 * - No .env file: Continue (not required)
 * - No config file: Use defaults + env vars
 * - Invalid config file: Log warning, use defaults + env vars
 * - Non-numeric thread env vars: Log warning, fall through to file/defaults
 * - defaultTopK above maxTopK: Log warning, clamp to maxTopK
 *
 * @param searchFrom - Directory to start the config file search from (default: cwd)
 * @returns Promise resolving to fully resolved configuration
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const { pipeline } = await initEmbeddingPipeline(config.model);
 * ```
 */
export async function loadConfig(searchFrom?: string): Promise<ResolvedConfig> {
  // Tier 1: Load .env file (Node 20+ native support)
  try {
    if (typeof process.loadEnvFile === 'function') {
      process.loadEnvFile();
    }
  } catch {
    // No .env in cwd: system env vars and config file still apply
  }

  // Tier 2: Load and validate config file
  let fileConfig: VecrankConfig | undefined;
  try {
    const explorer = cosmiconfig('vecrank');
    const result = await explorer.search(searchFrom);

    if (result && !result.isEmpty) {
      const parsed = VecrankConfigSchema.safeParse(result.config);
      if (parsed.success) {
        fileConfig = parsed.data;
      } else {
        const issue = parsed.error.issues[0];
        console.warn(
          `Ignoring invalid config file ${result.filepath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`,
        );
      }
    }
  } catch (error) {
    // Config file exists but cannot be parsed (syntax error)
    console.warn('Failed to load config file:', error instanceof Error ? error.message : error);
  }

  // Tier 3: Merge with priority (env var > config file > defaults)
  return {
    model: {
      modelPath:
        process.env.VECRANK_MODEL_PATH || fileConfig?.model?.modelPath || DEFAULTS.model.modelPath,
      tokenizerPath:
        process.env.VECRANK_TOKENIZER_PATH ||
        fileConfig?.model?.tokenizerPath ||
        DEFAULTS.model.tokenizerPath,
      maxLength: fileConfig?.model?.maxLength ?? DEFAULTS.model.maxLength,
      pooling: fileConfig?.model?.pooling ?? DEFAULTS.model.pooling,
      hiddenStateOutput:
        fileConfig?.model?.hiddenStateOutput ?? DEFAULTS.model.hiddenStateOutput,
      intraOpThreads:
        readIntEnv('VECRANK_INTRA_OP_THREADS') ??
        fileConfig?.model?.intraOpThreads ??
        DEFAULTS.model.intraOpThreads,
      interOpThreads:
        readIntEnv('VECRANK_INTER_OP_THREADS') ??
        fileConfig?.model?.interOpThreads ??
        DEFAULTS.model.interOpThreads,
    },
    store: {
      dbPath: process.env.VECRANK_DB_PATH || fileConfig?.store?.dbPath || DEFAULTS.store.dbPath,
    },
    prefixes: {
      // Empty string is a valid prefix (disables it), so ?? rather than ||
      query: fileConfig?.prefixes?.query ?? DEFAULTS.prefixes.query,
      passage: fileConfig?.prefixes?.passage ?? DEFAULTS.prefixes.passage,
    },
    search: resolveSearchLimits(fileConfig?.search?.defaultTopK, fileConfig?.search?.maxTopK),
  };
}

/**
 * Resolves the search limits so that defaultTopK never exceeds maxTopK.
 */
function resolveSearchLimits(
  defaultTopK = DEFAULTS.search.defaultTopK,
  maxTopK = DEFAULTS.search.maxTopK,
): ResolvedConfig['search'] {
  if (defaultTopK > maxTopK) {
    console.warn(`search.defaultTopK (${defaultTopK}) exceeds search.maxTopK (${maxTopK}): using ${maxTopK}`);
    return { defaultTopK: maxTopK, maxTopK };
  }
  return { defaultTopK, maxTopK };
}
