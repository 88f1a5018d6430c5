/**
 * Database repository operations for embedded documents.
 *
 * Provides the read path the ranking engine consumes (listAll) and the
 * batch write path used by ingestion.
 */

import type Database from 'better-sqlite3';
import { InternalError } from '../errors.js';

/**
 * A document as stored in the database.
 */
export interface StoredDocument {
  id: number;
  question: string;
  answer: string;

  /** "question : answer" text the embedding was computed from */
  combinedText: string;

  /** Unit-length embedding */
  embedding: Float32Array;

  embeddingDimensions: number;
  createdAt: Date;
}

/**
 * Input for inserting a document (created_at is assigned by SQLite).
 */
export type NewDocument = Omit<StoredDocument, 'createdAt' | 'embeddingDimensions'>;

/**
 * Read-only document source consumed by the service layer.
 *
 * Each call returns a fresh array, which is the snapshot the ranking engine
 * scans.
 */
export interface DocumentStore {
  listAll(): StoredDocument[];
}

interface DocumentRowRecord {
  id: number;
  question: string;
  answer: string;
  combined_text: string;
  embedding: Buffer;
  embedding_dimensions: number;
  created_at: number;
}

/**
 * Serializes an embedding to a float32 blob.
 */
export function encodeEmbedding(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Deserializes a float32 blob.
 *
 * Copies the bytes so the result is aligned and independent of the
 * driver's buffer.
 *
 * @throws InternalError if the blob length disagrees with `dimensions`
 */
export function decodeEmbedding(blob: Buffer, dimensions: number): Float32Array {
  if (blob.byteLength !== dimensions * Float32Array.BYTES_PER_ELEMENT) {
    throw new InternalError(
      `Stored embedding holds ${blob.byteLength} bytes, expected ${dimensions} float32 values`,
    );
  }
  const copy = new Uint8Array(blob.byteLength);
  copy.set(blob);
  return new Float32Array(copy.buffer);
}

function toStoredDocument(row: DocumentRowRecord): StoredDocument {
  return {
    id: row.id,
    question: row.question,
    answer: row.answer,
    combinedText: row.combined_text,
    embedding: decodeEmbedding(row.embedding, row.embedding_dimensions),
    embeddingDimensions: row.embedding_dimensions,
    createdAt: new Date(row.created_at * 1000),
  };
}

function insertRows(db: Database.Database, documents: NewDocument[]): void {
  const insert = db.prepare(`
    INSERT INTO documents (
      id,
      question,
      answer,
      combined_text,
      embedding,
      embedding_dimensions
    ) VALUES (?, ?, ?, ?, ?, ?)
  `);

  for (const doc of documents) {
    insert.run(
      doc.id,
      doc.question,
      doc.answer,
      doc.combinedText,
      encodeEmbedding(doc.embedding),
      doc.embedding.length,
    );
  }
}

/**
 * Inserts multiple documents in a single transaction.
 *
 * After the commit, checkpoints the WAL so the -wal file does not grow
 * unbounded across large ingestion runs.
 *
 * @param db - Database instance
 * @param documents - Documents to insert
 */
export function insertDocumentsBatch(db: Database.Database, documents: NewDocument[]): void {
  if (documents.length === 0) return;

  db.transaction((docs: NewDocument[]) => insertRows(db, docs))(documents);
  db.pragma('wal_checkpoint(TRUNCATE)');
}

/**
 * Replaces every document with `documents` in one transaction.
 *
 * Used by full re-ingestion: readers see either the old set or the new one.
 *
 * @param db - Database instance
 * @param documents - New document set
 */
export function replaceAllDocuments(db: Database.Database, documents: NewDocument[]): void {
  db.transaction((docs: NewDocument[]) => {
    deleteAllDocuments(db);
    insertRows(db, docs);
  })(documents);
  db.pragma('wal_checkpoint(TRUNCATE)');
}

/**
 * Deletes all documents from the database.
 *
 * @param db - Database instance
 */
export function deleteAllDocuments(db: Database.Database): void {
  db.prepare('DELETE FROM documents').run();
}

/**
 * Retrieves all documents ordered by id.
 *
 * @param db - Database instance
 * @returns Array of all documents
 */
export function listAllDocuments(db: Database.Database): StoredDocument[] {
  const rows = db.prepare('SELECT * FROM documents ORDER BY id').all() as DocumentRowRecord[];
  return rows.map(toStoredDocument);
}

/**
 * Retrieves a document by id.
 *
 * @param db - Database instance
 * @param id - Document id
 * @returns Document if found, null otherwise
 */
export function getDocumentById(db: Database.Database, id: number): StoredDocument | null {
  const row = db.prepare('SELECT * FROM documents WHERE id = ?').get(id) as
    | DocumentRowRecord
    | undefined;
  return row ? toStoredDocument(row) : null;
}

/**
 * Counts stored documents.
 *
 * @param db - Database instance
 */
export function countDocuments(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) AS count FROM documents').get() as { count: number };
  return row.count;
}

/**
 * Exposes a database as the read-only DocumentStore collaborator.
 *
 * @param db - Database instance
 */
export function createSqliteDocumentStore(db: Database.Database): DocumentStore {
  return {
    listAll: () => listAllDocuments(db),
  };
}
