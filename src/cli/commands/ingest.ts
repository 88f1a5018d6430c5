import { Command } from 'commander';
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import type Database from 'better-sqlite3';
import { loadConfig } from '../../config/loader.js';
import type { LoadedEmbeddingPipeline } from '../../embedding/loader.js';
import { ingestDataset } from '../../ingest/ingest.js';
import { initDatabase } from '../../persistence/schema.js';
import { loadPipelineWithSpinner, onInterrupt, reportFailure } from '../context.js';

export const ingestCommand = new Command('ingest')
  .description('Embed a question/answer CSV and replace the stored documents')
  .argument('<csv>', 'CSV file with a header row and id,question,answer columns')
  .option('--db <path>', 'Database path (default from config)')
  .addHelpText(
    'after',
    `

Examples:
  $ vecrank ingest data/faq.csv
  $ vecrank ingest data/faq.csv --db /tmp/faq.db

Notes:
  - Each row is embedded from "question : answer" with the passage prefix
  - Existing documents are replaced only after every row is embedded
  - Rows with fewer than three fields are skipped
`,
  )
  .action(async (csvPath: string, options: { db?: string }) => {
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
      const dbPath = options.db ?? config.store.dbPath;

      console.log(chalk.blue(`ℹ️  Ingesting ${csvPath} into ${dbPath}\n`));

      loaded = await loadPipelineWithSpinner(config);
      db = initDatabase(dbPath);

      const progressBar = new cliProgress.SingleBar(
        {
          format: 'Embedding | {bar} | {percentage}% | {value}/{total} rows',
        },
        cliProgress.Presets.shades_classic,
      );
      let barStarted = false;

      try {
        const stats = await ingestDataset({
          csvPath,
          db,
          pipeline: loaded.pipeline,
          passagePrefix: config.prefixes.passage,
          onProgress: (current, total) => {
            if (!barStarted) {
              progressBar.start(total, 0);
              barStarted = true;
            }
            progressBar.update(current);
          },
        });

        if (barStarted) progressBar.stop();

        console.log(chalk.green('\n✅ Ingestion complete!'));
        console.log(`Rows read: ${chalk.bold(stats.rowsRead)}`);
        console.log(`Documents stored: ${chalk.bold(stats.documentsStored)}`);
        console.log(`Rows skipped: ${chalk.bold(stats.rowsSkipped)}`);
        console.log(`Duration: ${chalk.bold((stats.durationMs / 1000).toFixed(2))}s`);
      } catch (error) {
        if (barStarted) progressBar.stop();
        throw error;
      }
    } catch (error) {
      reportFailure('Ingestion failed', error);
    } finally {
      removeHandlers();
      await cleanup();
    }
  });
