import { Command } from 'commander';
import { configCommand } from './commands/config.js';
import { documentsCommand } from './commands/documents.js';
import { embedCommand, tokenizeCommand } from './commands/embed.js';
import { ingestCommand } from './commands/ingest.js';
import { searchCommand } from './commands/search.js';
import { similarityCommand } from './commands/similarity.js';

export const program = new Command()
  .name('vecrank')
  .description('Multilingual text embeddings and similarity search')
  .version('0.1.0');

program.addCommand(embedCommand);
program.addCommand(tokenizeCommand);
program.addCommand(similarityCommand);
program.addCommand(searchCommand);
program.addCommand(documentsCommand);
program.addCommand(ingestCommand);
program.addCommand(configCommand);
