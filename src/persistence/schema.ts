/**
 * SQLite schema definitions and database initialization.
 *
 * Provides schema creation and WAL mode configuration for the document
 * store read by the ranking engine and written by ingestion.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

/**
 * Current schema version, stored in PRAGMA user_version.
 */
export const SCHEMA_VERSION = 1;

/**
 * Default database file path (relative to the working directory).
 */
export const DEFAULT_DB_PATH = '.vecrank/embeddings.db';

/**
 * SQL schema for the documents table.
 *
 * Embeddings are stored as raw little-endian float32 blobs; the dimension
 * column lets readers detect a blob that does not match.
 */
const DOCUMENTS_TABLE_SCHEMA = `
CREATE TABLE IF NOT EXISTS documents (
  id INTEGER PRIMARY KEY,
  question TEXT NOT NULL,
  answer TEXT NOT NULL,
  combined_text TEXT NOT NULL,
  embedding BLOB NOT NULL,
  embedding_dimensions INTEGER NOT NULL,
  created_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now'))
);

CREATE INDEX IF NOT EXISTS idx_documents_created_at ON documents(created_at);
CREATE INDEX IF NOT EXISTS idx_documents_question ON documents(question);
`;

/**
 * Initializes the SQLite database with schema and WAL mode.
 *
 * Creates the parent directory if needed, opens (or creates) the database,
 * enables WAL so searches can read while ingestion writes, and creates the
 * documents table.
 *
 * Pass ':memory:' for a throwaway in-process database.
 *
 * @param dbPath - Path to database file (defaults to .vecrank/embeddings.db)
 * @returns Initialized database instance
 * @throws Error if the directory cannot be created or the database cannot be opened
 */
export function initDatabase(dbPath: string = DEFAULT_DB_PATH): Database.Database {
  if (dbPath !== ':memory:') {
    const parentDir = path.dirname(dbPath);
    try {
      if (!fs.existsSync(parentDir)) {
        fs.mkdirSync(parentDir, { recursive: true });
      }
    } catch (error) {
      throw new Error(
        `Failed to create database directory ${parentDir}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new Error(
      `Failed to open database at ${dbPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  db.pragma('journal_mode = WAL');

  try {
    db.exec(DOCUMENTS_TABLE_SCHEMA);
  } catch (error) {
    db.close();
    throw new Error(
      `Failed to create schema: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  db.pragma(`user_version = ${SCHEMA_VERSION}`);

  return db;
}
