import { Command } from 'commander';
import { input, select } from '@inquirer/prompts';
import { writeFile } from 'fs/promises';
import isCI from 'is-ci';
import chalk from 'chalk';
import { DEFAULTS } from '../../config/loader.js';
import type { VecrankConfig } from '../../config/schema.js';
import type { PoolingStrategy } from '../../embedding/pooling.js';

export const CONFIG_FILE_NAME = '.vecrankrc.json';

function validatePath(value: string): string | true {
  return value.trim() ? true : 'Path cannot be empty';
}

function validateThreads(value: string): string | true {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    return 'Enter a positive whole number';
  }
  return true;
}

/**
 * Run interactive configuration wizard.
 *
 * Writes .vecrankrc.json in the current directory. Environment variables
 * still override whatever is saved here.
 */
export async function runConfigWizard(forceInteractive = false): Promise<void> {
  // Prompts would hang without a TTY
  if (isCI && !forceInteractive) {
    console.log(chalk.yellow('⚠️  Running in CI environment.'));
    console.log(chalk.dim('Tip: Use --force to run wizard anyway\n'));
    console.log('Set environment variables instead:');
    console.log('  - VECRANK_MODEL_PATH (ONNX model file)');
    console.log('  - VECRANK_TOKENIZER_PATH (tokenizer.json)');
    console.log('  - VECRANK_DB_PATH (document database)');
    console.log('  - VECRANK_INTRA_OP_THREADS / VECRANK_INTER_OP_THREADS');
    console.log(`\nOr create ${CONFIG_FILE_NAME} manually:`);
    console.log('  { "model": { "modelPath": "models/model.onnx" } }');
    process.exit(0);
  }

  if (isCI && forceInteractive) {
    console.log(chalk.blue('ℹ️  CI detected, but running wizard anyway (--force)\n'));
  }

  console.log(chalk.blue('🔧 Welcome to the vecrank configuration wizard!\n'));

  const modelPath = await input({
    message: 'ONNX model file:',
    default: DEFAULTS.model.modelPath,
    validate: validatePath,
  });

  const tokenizerPath = await input({
    message: 'Tokenizer file (tokenizer.json or its directory):',
    default: DEFAULTS.model.tokenizerPath,
    validate: validatePath,
  });

  const pooling = await select<PoolingStrategy>({
    message: 'Pooling strategy:',
    choices: [
      {
        name: 'First token (recommended for E5 exports)',
        value: 'cls',
      },
      {
        name: 'Mean of all tokens',
        value: 'mean',
      },
    ],
    default: DEFAULTS.model.pooling,
  });

  const intraOpThreads = await input({
    message: 'Intra-op threads:',
    default: String(DEFAULTS.model.intraOpThreads),
    validate: validateThreads,
  });

  const interOpThreads = await input({
    message: 'Inter-op threads:',
    default: String(DEFAULTS.model.interOpThreads),
    validate: validateThreads,
  });

  const dbPath = await input({
    message: 'Document database:',
    default: DEFAULTS.store.dbPath,
    validate: validatePath,
  });

  const config: VecrankConfig = {
    model: {
      modelPath: modelPath.trim(),
      tokenizerPath: tokenizerPath.trim(),
      pooling,
      intraOpThreads: Number(intraOpThreads.trim()),
      interOpThreads: Number(interOpThreads.trim()),
    },
    store: {
      dbPath: dbPath.trim(),
    },
  };

  await writeFile(CONFIG_FILE_NAME, JSON.stringify(config, null, 2));

  console.log(chalk.green(`\n✅ Configuration saved to ${CONFIG_FILE_NAME}`));
  console.log(chalk.blue(`   Model: ${modelPath.trim()}`));
  console.log('\nNext steps:');
  console.log(chalk.bold('  1. vecrank ingest <csv>') + '  - Embed a question/answer dataset');
  console.log(chalk.bold('  2. vecrank search <query>') + ' - Find similar documents');
}

export const configCommand = new Command('config')
  .description('Configure model, tokenizer and database paths')
  .option('--force', 'Force interactive mode even in CI environments')
  .addHelpText(
    'after',
    `

Examples:
  # Interactive configuration wizard
  $ vecrank config

  # Force interactive mode
  $ vecrank config --force

  # Alternative: Set environment variables
  $ export VECRANK_MODEL_PATH=models/model.onnx
  $ export VECRANK_TOKENIZER_PATH=models/tokenizer.json

Notes:
  - Creates ${CONFIG_FILE_NAME} in the current directory
  - Environment variables override the config file
`,
  )
  .action(async (options: { force?: boolean }) => {
    await runConfigWizard(options.force || false);
  });
