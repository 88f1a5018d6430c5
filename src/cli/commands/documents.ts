import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { loadConfig } from '../../config/loader.js';
import { initDatabase } from '../../persistence/schema.js';
import {
  countDocuments,
  getDocumentById,
  listAllDocuments,
  type StoredDocument,
} from '../../persistence/repository.js';
import { InvalidArgumentError } from '../../errors.js';
import { reportFailure } from '../context.js';
import { documentToJson } from '../format.js';

interface DocumentsOptions {
  id?: string;
  db?: string;
  includeEmbeddings?: boolean;
  json?: boolean;
}

export const documentsCommand = new Command('documents')
  .description('List stored documents')
  .option('--id <id>', 'Show a single document by id')
  .option('--db <path>', 'Database path (default from config)')
  .option('--include-embeddings', 'Include embeddings in JSON output')
  .option('--json', 'Print documents as JSON')
  .addHelpText(
    'after',
    `

Examples:
  $ vecrank documents
  $ vecrank documents --json --include-embeddings
  $ vecrank documents --id 42
`,
  )
  .action(async (options: DocumentsOptions) => {
    try {
      const config = await loadConfig();
      const dbPath = options.db ?? config.store.dbPath;

      // Listing never creates a database
      if (dbPath !== ':memory:' && !existsSync(dbPath)) {
        console.log(chalk.yellow(`⚠️  No database at ${dbPath}. Run "vecrank ingest <csv>" first.`));
        return;
      }

      const db = initDatabase(dbPath);
      try {
        let documents: StoredDocument[];
        if (options.id !== undefined) {
          const id = Number(options.id);
          if (!Number.isInteger(id)) {
            throw new InvalidArgumentError(`Document id must be an integer, got ${options.id}`);
          }
          const document = getDocumentById(db, id);
          if (!document) {
            console.log(chalk.yellow(`⚠️  No document with id ${id}`));
            process.exitCode = 1;
            return;
          }
          documents = [document];
        } else {
          documents = listAllDocuments(db);
        }

        if (options.json) {
          const payload = documents.map((document) =>
            documentToJson(document, options.includeEmbeddings ?? false),
          );
          console.log(JSON.stringify(options.id !== undefined ? payload[0] : payload, null, 2));
          return;
        }

        for (const document of documents) {
          console.log(`${chalk.dim(`#${document.id}`)} ${chalk.bold(document.question)}`);
          console.log(`   ${document.answer}`);
        }
        if (options.id === undefined) {
          console.log(chalk.dim(`\n${countDocuments(db)} document(s)`));
        }
      } finally {
        db.close();
      }
    } catch (error) {
      reportFailure('Listing failed', error);
    }
  });
