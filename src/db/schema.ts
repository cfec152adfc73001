import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { DB_PATH } from '../constants/dirs';
import { log } from '../utils/logger';
import { StoreUnavailableError, errorMessage } from '../utils/errors';

export type SqliteDatabase = Database.Database;

export const IN_MEMORY = ':memory:';

export function createSchema(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS documents (
      id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL,
      source TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending', 'processed', 'failed')),
      chunk_count INTEGER NOT NULL DEFAULT 0,
      error TEXT,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  // Embeddings live next to their chunk text, so a chunk row never exists
  // without its vector. AUTOINCREMENT keeps ids in insertion order.
  db.exec(`
    CREATE TABLE IF NOT EXISTS chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      document_id TEXT NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
      owner_id TEXT NOT NULL,
      chunk_index INTEGER NOT NULL,
      chunk_text TEXT NOT NULL,
      start_offset INTEGER NOT NULL,
      end_offset INTEGER NOT NULL,
      length INTEGER NOT NULL,
      token_estimate INTEGER NOT NULL,
      embedding BLOB NOT NULL,
      model_id TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      UNIQUE (document_id, chunk_index)
    )
  `);

  // Collection-wide settings: distance metric, active embedding model, dimensions
  db.exec(`
    CREATE TABLE IF NOT EXISTS collection_meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);

  db.exec(`CREATE INDEX IF NOT EXISTS idx_documents_owner ON documents(owner_id)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_chunks_owner ON chunks(owner_id)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id, chunk_index)`);
}

/**
 * Open (or create) the database, load the sqlite-vec extension for vector
 * distance functions and make sure the schema exists.
 */
export function initializeDatabase(path: string = DB_PATH): SqliteDatabase {
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }

    const db = new Database(path);
    if (path !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');

    sqliteVec.load(db);
    createSchema(db);

    log(`Database initialized at: ${path}`);
    return db;
  } catch (err) {
    throw new StoreUnavailableError(`Failed to open database at ${path}: ${errorMessage(err)}`, err);
  }
}
