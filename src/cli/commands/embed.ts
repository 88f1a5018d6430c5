import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader.js';
import { loadVocabulary, tokenize } from '../../embedding/tokenizer.js';
import { reportFailure, withService } from '../context.js';
import { formatVectorPreview } from '../format.js';

export const embedCommand = new Command('embed')
  .description('Generate normalized embeddings for one or more texts')
  .argument('<texts...>', 'Texts to embed (quote each one)')
  .option('--json', 'Print full vectors as JSON')
  .addHelpText(
    'after',
    `

Examples:
  # Embed a single text
  $ vecrank embed "How do I reset my password?"

  # Embed several texts in one run
  $ vecrank embed "first text" "second text" --json

Notes:
  - Texts are embedded exactly as given (no query/passage prefix)
  - Vectors are L2-normalized
`,
  )
  .action(async (texts: string[], options: { json?: boolean }) => {
    await withService('Embedding failed', {}, async ({ service }) => {
      const batch = await service.embedMany(texts);

      if (options.json) {
        const payload = batch.results.map((result) => ({
          text: result.text,
          dimensions: result.dimensions,
          embedding: Array.from(result.embedding),
        }));
        console.log(JSON.stringify({ results: payload, totalCount: batch.totalCount }, null, 2));
        return;
      }

      for (const result of batch.results) {
        console.log(chalk.bold(result.text));
        console.log(`  ${formatVectorPreview(result.embedding)}`);
      }
      console.log(chalk.dim(`\n${batch.totalCount} embedding(s) generated`));
    });
  });

export const tokenizeCommand = new Command('tokenize')
  .description('Show the subword pieces and model ids for a text')
  .argument('<text>', 'Text to tokenize')
  .option('--json', 'Print the token sequence as JSON')
  .addHelpText(
    'after',
    `

Examples:
  $ vecrank tokenize "Bonjour tout le monde"
`,
  )
  .action(async (text: string, options: { json?: boolean }) => {
    try {
      // Vocabulary only: no ONNX session
      const config = await loadConfig();
      const vocabulary = await loadVocabulary(config.model.tokenizerPath);
      const sequence = tokenize(vocabulary, text, { maxLength: config.model.maxLength });

      if (options.json) {
        console.log(JSON.stringify(sequence, null, 2));
        return;
      }

      sequence.tokens.forEach(({ piece, id }, index) => {
        console.log(`${chalk.dim(String(index).padStart(4))}  ${piece}  ${chalk.cyan(String(id))}`);
      });
      console.log(chalk.dim(`\n${sequence.tokens.length} token(s)`));
      if (sequence.truncated) {
        console.log(chalk.yellow('⚠️  Sequence was truncated to the maximum length'));
      }
    } catch (error) {
      reportFailure('Tokenization failed', error);
    }
  });
