/**
 * EmbeddingStore: persistent embedding cache in SQLite (better-sqlite3).
 *
 * Rows are keyed by (content hash, model) so vectors produced by one model are
 * never returned for another. Vectors are stored as Float64 BLOBs; what comes
 * back is bit-identical to what went in.
 */

import Database from 'better-sqlite3';
import { createLogger } from './logger';
import { ErrorCode, QAError } from '../../shared/types/errors';

const log = createLogger('EmbeddingStore');

export interface StoredEmbedding {
  hash: string;
  model: string;
  embedding: number[];
}

interface EmbeddingRow {
  embedding: Buffer;
  dimension: number;
}

export class EmbeddingStore {
  private readonly db: Database.Database;
  private readonly stmtGet: Database.Statement<[string, string], EmbeddingRow>;
  private readonly stmtPut: Database.Statement<[string, string, Buffer, number]>;
  private readonly stmtCount: Database.Statement<[], { count: number }>;
  private readonly stmtCountModel: Database.Statement<[string], { count: number }>;

  constructor(filePath = ':memory:') {
    try {
      this.db = new Database(filePath);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS embedding_cache (
          content_hash TEXT NOT NULL,
          model TEXT NOT NULL,
          embedding BLOB NOT NULL,
          dimension INTEGER NOT NULL,
          created_at TEXT NOT NULL DEFAULT (datetime('now')),
          PRIMARY KEY (content_hash, model)
        );
      `);
    } catch (err) {
      throw new QAError(`Failed to open embedding cache at ${filePath}`, ErrorCode.EMBEDDING_CACHE_ERROR, {
        severity: 'fatal',
        recoverable: false,
        originalError: err instanceof Error ? err : undefined,
      });
    }

    this.stmtGet = this.db.prepare<[string, string], EmbeddingRow>(
      'SELECT embedding, dimension FROM embedding_cache WHERE content_hash = ? AND model = ?',
    );
    this.stmtPut = this.db.prepare<[string, string, Buffer, number]>(
      'INSERT OR REPLACE INTO embedding_cache (content_hash, model, embedding, dimension) VALUES (?, ?, ?, ?)',
    );
    this.stmtCount = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM embedding_cache');
    this.stmtCountModel = this.db.prepare<[string], { count: number }>(
      'SELECT COUNT(*) AS count FROM embedding_cache WHERE model = ?',
    );
    log.info(`Embedding cache opened (${filePath}, ${this.count()} entries)`);
  }

  get(hash: string, model: string): number[] | null {
    try {
      const row = this.stmtGet.get(hash, model);
      if (!row) return null;
      // Copy into a fresh, aligned buffer before viewing it as Float64
      const bytes = new Uint8Array(row.embedding);
      return Array.from(new Float64Array(bytes.buffer, 0, row.dimension));
    } catch (err) {
      log.error(`Failed to read cached embedding ${hash}:`, err);
      return null;
    }
  }

  /** Bulk insert in a single transaction. */
  putMany(entries: StoredEmbedding[]): void {
    if (entries.length === 0) return;
    const insert = this.db.transaction((items: StoredEmbedding[]) => {
      for (const { hash, model, embedding } of items) {
        this.stmtPut.run(hash, model, Buffer.from(new Float64Array(embedding).buffer), embedding.length);
      }
    });
    try {
      insert(entries);
    } catch (err) {
      log.error(`Failed to cache ${entries.length} embeddings:`, err);
    }
  }

  count(model?: string): number {
    const row = model === undefined ? this.stmtCount.get() : this.stmtCountModel.get(model);
    return row?.count ?? 0;
  }

  clear(): void {
    this.db.exec('DELETE FROM embedding_cache');
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
