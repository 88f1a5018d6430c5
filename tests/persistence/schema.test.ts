import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { initDatabase, SCHEMA_VERSION } from '../../src/persistence/schema.js';

describe('initDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'vecrank-db-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates missing parent directories', () => {
    const dbPath = path.join(dir, 'nested', 'store', 'embeddings.db');

    const db = initDatabase(dbPath);
    db.close();

    expect(existsSync(dbPath)).toBe(true);
  });

  it('enables WAL mode and records the schema version', () => {
    const db = initDatabase(path.join(dir, 'embeddings.db'));

    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
    db.close();
  });

  it('creates the documents table', () => {
    const db = initDatabase(':memory:');

    const columns = db.prepare('PRAGMA table_info(documents)').all() as { name: string }[];
    db.close();

    expect(columns.map((c) => c.name)).toEqual([
      'id',
      'question',
      'answer',
      'combined_text',
      'embedding',
      'embedding_dimensions',
      'created_at',
    ]);
  });

  it('can be opened twice without error', () => {
    const dbPath = path.join(dir, 'embeddings.db');

    initDatabase(dbPath).close();
    const db = initDatabase(dbPath);

    expect(db.prepare('SELECT COUNT(*) AS n FROM documents').get()).toEqual({ n: 0 });
    db.close();
  });
});
