import { Command } from 'commander';
import chalk from 'chalk';
import { withService } from '../context.js';
import { documentToJson, formatSearchResults } from '../format.js';

export const searchCommand = new Command('search')
  .description('Find the stored documents most similar to a query')
  .argument('<query>', 'Query text')
  .option('-k, --top-k <n>', 'Number of results (default from config, usually 5)')
  .option('--db <path>', 'Database path (default from config)')
  .option('--include-embeddings', 'Include embeddings in JSON output')
  .option('--json', 'Print results as JSON')
  .addHelpText(
    'after',
    `

Examples:
  # Top 5 matches
  $ vecrank search "How can I change my delivery address?"

  # Top 10 matches as JSON
  $ vecrank search "annuler ma commande" --top-k 10 --json

Notes:
  - Run "vecrank ingest" first to populate the database
  - The query is embedded with the query prefix
`,
  )
  .action(
    async (
      query: string,
      options: { topK?: string; db?: string; includeEmbeddings?: boolean; json?: boolean },
    ) => {
      await withService('Search failed', { dbPath: options.db }, async ({ config, service }) => {
        const topK =
          options.topK === undefined ? config.search.defaultTopK : Number(options.topK);
        const result = await service.search(query, topK);

        if (options.json) {
          console.log(
            JSON.stringify(
              {
                queryText: result.queryText,
                totalDocuments: result.totalDocuments,
                results: result.results.map(({ document, score }) => ({
                  score,
                  document: documentToJson(document, options.includeEmbeddings ?? false),
                })),
                ...(options.includeEmbeddings && {
                  queryEmbedding: Array.from(result.queryEmbedding),
                }),
              },
              null,
              2,
            ),
          );
          return;
        }

        if (result.results.length === 0) {
          console.log(chalk.yellow('⚠️  No documents stored. Run "vecrank ingest <csv>" first.'));
          return;
        }

        console.log(formatSearchResults(result.results));
        console.log(
          chalk.dim(
            `\n${result.results.length} of ${result.totalDocuments} document(s) shown`,
          ),
        );
      });
    },
  );
