import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import chalk from 'chalk';
import { initDatabase } from '../../src/persistence/schema.js';
import { insertDocumentsBatch } from '../../src/persistence/repository.js';
import { unigramTokenizerJson } from '../helpers/fakes.js';

vi.mock('../../src/embedding/loader.js', () => ({
  initEmbeddingPipeline: vi.fn(),
}));

/** Runs the CLI on a fresh module graph so option values do not leak between runs. */
async function runCli(...args: string[]): Promise<void> {
  vi.resetModules();
  const { program } = await import('../../src/cli/program.js');
  await program.parseAsync(args, { from: 'user' });
}

describe('CLI commands', () => {
  const originalEnv = { ...process.env };
  let dir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    chalk.level = 0;
    dir = mkdtempSync(path.join(tmpdir(), 'vecrank-cli-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = { ...originalEnv };
    process.exitCode = undefined;
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('tokenize', () => {
    it('prints remapped ids without loading the model', async () => {
      const tokenizerPath = path.join(dir, 'tokenizer.json');
      writeFileSync(tokenizerPath, JSON.stringify(unigramTokenizerJson('sentencepiece')));
      process.env.VECRANK_TOKENIZER_PATH = tokenizerPath;
      process.env.VECRANK_MODEL_PATH = path.join(dir, 'missing.onnx');

      await runCli('tokenize', 'Hello world', '--json');

      const { initEmbeddingPipeline } = await import('../../src/embedding/loader.js');
      expect(vi.mocked(initEmbeddingPipeline)).not.toHaveBeenCalled();
      expect(process.exitCode).toBeUndefined();
      expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
        tokens: [
          { piece: '<s>', id: 0 },
          { piece: '▁Hello', id: 4 },
          { piece: '▁world', id: 5 },
          { piece: '</s>', id: 2 },
        ],
        ids: [0, 4, 5, 2],
        truncated: false,
      });
    });
  });

  describe('documents', () => {
    let dbPath: string;

    beforeEach(() => {
      dbPath = path.join(dir, 'docs.db');
      const db = initDatabase(dbPath);
      insertDocumentsBatch(db, [
        {
          id: 1,
          question: 'Do you ship abroad?',
          answer: 'Yes.',
          combinedText: 'Do you ship abroad? : Yes.',
          embedding: Float32Array.from([1, 0]),
        },
        {
          id: 2,
          question: 'Can I return an item?',
          answer: 'Within 30 days.',
          combinedText: 'Can I return an item? : Within 30 days.',
          embedding: Float32Array.from([0, 1]),
        },
      ]);
      db.close();
    });

    it('lists every document followed by the stored count', async () => {
      await runCli('documents', '--db', dbPath);

      expect(log.mock.calls.map((call) => call[0])).toEqual([
        '#1 Do you ship abroad?',
        '   Yes.',
        '#2 Can I return an item?',
        '   Within 30 days.',
        '\n2 document(s)',
      ]);
    });

    it('shows a single document by id', async () => {
      await runCli('documents', '--db', dbPath, '--id', '2', '--json');

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
        id: 2,
        question: 'Can I return an item?',
        answer: 'Within 30 days.',
        embeddingDimensions: 2,
      });
    });

    it('reports a missing id', async () => {
      await runCli('documents', '--db', dbPath, '--id', '9');

      expect(log).toHaveBeenCalledWith('⚠️  No document with id 9');
      expect(process.exitCode).toBe(1);
    });
  });
});
