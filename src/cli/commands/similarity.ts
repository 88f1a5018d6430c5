import { Command } from 'commander';
import chalk from 'chalk';
import { withService } from '../context.js';
import { formatScore, formatVectorPreview } from '../format.js';

export const similarityCommand = new Command('similarity')
  .description('Compute the cosine similarity between two texts')
  .argument('<text1>', 'First text')
  .argument('<text2>', 'Second text')
  .option('--include-embeddings', 'Also print both embeddings')
  .option('--json', 'Print the result as JSON')
  .addHelpText(
    'after',
    `

Examples:
  $ vecrank similarity "I love cats" "J'adore les chats"
  $ vecrank similarity "refund policy" "how do returns work" --json

Notes:
  - Both texts are embedded with the query prefix
  - Scores range from -1 (opposite) to 1 (identical)
`,
  )
  .action(
    async (
      text1: string,
      text2: string,
      options: { includeEmbeddings?: boolean; json?: boolean },
    ) => {
      await withService('Similarity failed', {}, async ({ service }) => {
        const result = await service.similarity(text1, text2);

        if (options.json) {
          console.log(
            JSON.stringify(
              {
                text1: result.text1,
                text2: result.text2,
                similarity: result.similarity,
                ...(options.includeEmbeddings && {
                  embedding1: Array.from(result.embedding1),
                  embedding2: Array.from(result.embedding2),
                }),
              },
              null,
              2,
            ),
          );
          return;
        }

        console.log(`Similarity: ${chalk.bold(formatScore(result.similarity))}`);
        if (options.includeEmbeddings) {
          console.log(`  ${chalk.dim('text1')} ${formatVectorPreview(result.embedding1)}`);
          console.log(`  ${chalk.dim('text2')} ${formatVectorPreview(result.embedding2)}`);
        }
      });
    },
  );
