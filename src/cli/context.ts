/**
 * Shared bootstrap for CLI commands that embed text.
 *
 * Loads configuration, the embedding model (with a spinner, since loading a
 * multilingual encoder takes a few seconds) and a lazily opened document
 * store, then releases everything when the command finishes or is
 * interrupted.
 */

import chalk from 'chalk';
import ora from 'ora';
import type Database from 'better-sqlite3';
import { loadConfig } from '../config/loader.js';
import type { ResolvedConfig } from '../config/schema.js';
import { initEmbeddingPipeline, type LoadedEmbeddingPipeline } from '../embedding/loader.js';
import { describeError } from '../errors.js';
import { initDatabase } from '../persistence/schema.js';
import { listAllDocuments, type DocumentStore } from '../persistence/repository.js';
import {
  createVectorSearchService,
  type VectorSearchService,
} from '../service/vector-search.js';

export interface CommandContext {
  config: ResolvedConfig;
  service: VectorSearchService;
}

export interface ContextOptions {
  /** Overrides config.store.dbPath */
  dbPath?: string;
}

/**
 * Loads the embedding model behind a spinner.
 */
export async function loadPipelineWithSpinner(
  config: ResolvedConfig,
): Promise<LoadedEmbeddingPipeline> {
  const spinner = ora('Loading embedding model...').start();
  try {
    const loaded = await initEmbeddingPipeline(config.model);
    spinner.succeed('Embedding model loaded');
    return loaded;
  } catch (error) {
    spinner.fail('Failed to load embedding model');
    throw error;
  }
}

/**
 * Prints a failure in the CLI's error format and marks the process as failed.
 */
export function reportFailure(label: string, error: unknown): void {
  console.error(chalk.red(`❌ ${label}:`), describeError(error));
  process.exitCode = 1;
}

/**
 * Registers SIGINT/SIGTERM handlers that release resources before exiting.
 *
 * @returns Function removing the handlers
 */
export function onInterrupt(cleanup: () => Promise<void>): () => void {
  const handleSigint = () => {
    console.log('\n\nInterrupted by user.');
    void cleanup().finally(() => process.exit(130));
  };
  const handleSigterm = () => {
    console.log('\n\nTerminated.');
    void cleanup().finally(() => process.exit(143));
  };

  process.on('SIGINT', handleSigint);
  process.on('SIGTERM', handleSigterm);

  return () => {
    process.off('SIGINT', handleSigint);
    process.off('SIGTERM', handleSigterm);
  };
}

/**
 * Runs a command body with a ready service, reporting failures and always
 * releasing the model session and database.
 *
 * The database is opened only if the body reads documents, so commands like
 * `embed` never create a database file.
 *
 * @param label - Failure label (e.g. 'Search failed')
 * @param options - Database path override
 * @param body - Command logic
 */
export async function withService(
  label: string,
  options: ContextOptions,
  body: (context: CommandContext) => Promise<void>,
): Promise<void> {
  let db: Database.Database | null = null;
  let loaded: LoadedEmbeddingPipeline | null = null;

  const cleanup = async () => {
    if (db) {
      db.close();
      db = null;
    }
    if (loaded) {
      const current = loaded;
      loaded = null;
      await current.dispose();
    }
  };
  const removeHandlers = onInterrupt(cleanup);

  try {
    const config = await loadConfig();
    const dbPath = options.dbPath ?? config.store.dbPath;

    const store: DocumentStore = {
      listAll: () => {
        db ??= initDatabase(dbPath);
        return listAllDocuments(db);
      },
    };

    loaded = await loadPipelineWithSpinner(config);

    const service = createVectorSearchService({
      pipeline: loaded.pipeline,
      store,
      queryPrefix: config.prefixes.query,
      maxTopK: config.search.maxTopK,
    });

    await body({ config, service });
  } catch (error) {
    reportFailure(label, error);
  } finally {
    removeHandlers();
    await cleanup();
  }
}
