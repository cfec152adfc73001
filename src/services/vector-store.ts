import type { SqliteDatabase } from '../db/schema';
import { initializeDatabase } from '../db/schema';
import { DISTANCE_METRIC } from '../constants/rag';
import type {
  ChunkWithEmbedding,
  DistanceMetric,
  Document,
  DocumentStatus,
  OwnerFilter,
  StoredChunk,
  VectorMatch,
} from '../types/index';
import { debug, log } from '../utils/logger';
import { isFiniteVector, serializeVector } from '../utils/vectors';
import {
  ConfigurationError,
  StoreUnavailableError,
  ValidationError,
  errorMessage,
  validateOwnerId,
} from '../utils/errors';

export interface ActiveModel {
  modelId: string;
  dimensions: number;
}

export interface NewDocument {
  id: string;
  ownerId: string;
  source: string;
}

/**
 * Persistence for chunks and their embeddings. Every read takes an owner
 * filter and every write is checked against the document's owner.
 */
export interface VectorStore {
  readonly metric: DistanceMetric;
  registerDocument(document: NewDocument): Document;
  upsert(
    document: NewDocument,
    chunks: ChunkWithEmbedding[],
    modelId: string
  ): Document;
  markFailed(documentId: string, ownerId: string, message: string): void;
  query(vector: number[], k: number, filter: OwnerFilter, modelId: string): VectorMatch[];
  delete(documentId: string, scope: Pick<OwnerFilter, 'ownerId'>): boolean;
  getDocument(documentId: string, ownerId: string): Document | undefined;
  listDocuments(ownerId: string): Document[];
  countChunks(filter: OwnerFilter): number;
  activeModel(): ActiveModel | undefined;
  close(): void;
}

interface DocumentRow {
  id: string;
  owner_id: string;
  source: string;
  status: DocumentStatus;
  chunk_count: number;
  error: string | null;
  created_at: number;
  updated_at: number;
}

interface MatchRow {
  id: number;
  document_id: string;
  owner_id: string;
  source: string;
  chunk_index: number;
  chunk_text: string;
  start_offset: number;
  end_offset: number;
  length: number;
  token_estimate: number;
  model_id: string;
  distance: number;
}

const META_METRIC = 'distance_metric';
const META_MODEL = 'embedding_model';
const META_DIMENSIONS = 'embedding_dimensions';

const DISTANCE_FUNCTIONS: Record<DistanceMetric, string> = {
  cosine: 'vec_distance_cosine',
  l2: 'vec_distance_l2',
};

function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    ownerId: row.owner_id,
    source: row.source,
    status: row.status,
    chunkCount: row.chunk_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    ...(row.error !== null ? { error: row.error } : {}),
  };
}

function toStoredChunk(row: MatchRow): StoredChunk {
  return {
    id: row.id,
    documentId: row.document_id,
    ownerId: row.owner_id,
    source: row.source,
    index: row.chunk_index,
    text: row.chunk_text,
    startOffset: row.start_offset,
    endOffset: row.end_offset,
    length: row.length,
    tokenEstimate: row.token_estimate,
    modelId: row.model_id,
  };
}

function checkChunks(chunks: ChunkWithEmbedding[]): number | undefined {
  let dimensions: number | undefined;

  chunks.forEach((chunk, position) => {
    if (chunk.index !== position) {
      throw new ValidationError(
        `Chunk indices must be contiguous from 0 (position ${position} has index ${chunk.index})`
      );
    }
    if (!isFiniteVector(chunk.embedding)) {
      throw new ValidationError(`Chunk ${chunk.index} has an empty or non-numeric embedding`);
    }
    dimensions ??= chunk.embedding.length;
    if (chunk.embedding.length !== dimensions) {
      throw new ConfigurationError(
        `Chunk ${chunk.index} has ${chunk.embedding.length} dimensions, expected ${dimensions}`
      );
    }
  });

  return dimensions;
}

/**
 * Vector store on SQLite. Distances are computed with sqlite-vec's scalar
 * distance functions, so owner and document filters apply in the same
 * statement as the nearest-neighbour ordering.
 */
export class SqliteVectorStore implements VectorStore {
  readonly metric: DistanceMetric;

  constructor(
    private readonly db: SqliteDatabase,
    options: { metric?: DistanceMetric } = {}
  ) {
    const requested = options.metric ?? DISTANCE_METRIC;
    const recorded = this.readMeta(META_METRIC);

    if (recorded === undefined) {
      this.writeMeta(META_METRIC, requested);
    } else if (recorded !== requested) {
      throw new ConfigurationError(
        `Store was created with the ${recorded} distance metric and cannot be opened with ${requested}`
      );
    }
    this.metric = requested;
  }

  activeModel(): ActiveModel | undefined {
    return this.guard('activeModel', () => {
      const modelId = this.readMeta(META_MODEL);
      const dimensions = this.readMeta(META_DIMENSIONS);
      if (modelId === undefined || dimensions === undefined) return undefined;
      return { modelId, dimensions: Number(dimensions) };
    });
  }

  registerDocument(document: NewDocument): Document {
    validateOwnerId(document.ownerId);

    return this.guard('registerDocument', () =>
      this.db.transaction(() => {
        this.ensureDocument(document);
        this.db
          .prepare(`UPDATE documents SET status = 'pending', error = NULL, updated_at = ? WHERE id = ?`)
          .run(Date.now(), document.id);
        return this.requireDocument(document.id);
      })()
    );
  }

  /**
   * Replace every chunk of a document in one transaction. Queries see either
   * the previous chunks or the new ones, never a mix.
   */
  upsert(document: NewDocument, chunks: ChunkWithEmbedding[], modelId: string): Document {
    validateOwnerId(document.ownerId);
    const dimensions = checkChunks(chunks);

    return this.guard('upsert', () =>
      this.db.transaction(() => {
        if (dimensions !== undefined) {
          this.ensureModel(modelId, dimensions);
        }
        this.ensureDocument(document);

        this.db.prepare('DELETE FROM chunks WHERE document_id = ?').run(document.id);

        const now = Date.now();
        const insert = this.db.prepare(`
          INSERT INTO chunks (
            document_id, owner_id, chunk_index, chunk_text, start_offset, end_offset,
            length, token_estimate, embedding, model_id, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `);

        for (const chunk of chunks) {
          insert.run(
            document.id,
            document.ownerId,
            chunk.index,
            chunk.text,
            chunk.startOffset,
            chunk.endOffset,
            chunk.length,
            chunk.tokenEstimate,
            serializeVector(chunk.embedding),
            modelId,
            now
          );
        }

        this.db
          .prepare(
            `UPDATE documents SET status = 'processed', chunk_count = ?, error = NULL, updated_at = ? WHERE id = ?`
          )
          .run(chunks.length, now, document.id);

        log(`[upsert] Stored ${chunks.length} chunks for document ${document.id}`);
        return this.requireDocument(document.id);
      })()
    );
  }

  markFailed(documentId: string, ownerId: string, message: string): void {
    this.guard('markFailed', () => {
      this.db
        .prepare(
          `UPDATE documents SET status = 'failed', error = ?, updated_at = ? WHERE id = ? AND owner_id = ?`
        )
        .run(message, Date.now(), documentId, ownerId);
    });
  }

  /**
   * The `k` chunks nearest to `vector` within the owner's documents, ordered
   * by distance and then by insertion order.
   */
  query(vector: number[], k: number, filter: OwnerFilter, modelId: string): VectorMatch[] {
    validateOwnerId(filter.ownerId);
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError('k must be a positive integer');
    }
    if (filter.documentIds && filter.documentIds.length === 0) {
      return [];
    }

    return this.guard('query', () => {
      const active = this.activeModel();
      if (!active) {
        debug('[query] Collection is empty');
        return [];
      }
      if (active.modelId !== modelId) {
        throw new ConfigurationError(
          `Query embedding from model "${modelId}" cannot be compared with stored embeddings from "${active.modelId}"`
        );
      }
      if (vector.length !== active.dimensions) {
        throw new ConfigurationError(
          `Query vector has ${vector.length} dimensions, collection uses ${active.dimensions}`
        );
      }

      const documentClause = filter.documentIds
        ? 'AND c.document_id IN (SELECT value FROM json_each(?))'
        : '';

      const stmt = this.db.prepare<unknown[], MatchRow>(`
        SELECT
          c.id,
          c.document_id,
          c.owner_id,
          d.source,
          c.chunk_index,
          c.chunk_text,
          c.start_offset,
          c.end_offset,
          c.length,
          c.token_estimate,
          c.model_id,
          ${DISTANCE_FUNCTIONS[this.metric]}(c.embedding, ?) AS distance
        FROM chunks c
        INNER JOIN documents d ON d.id = c.document_id
        WHERE c.owner_id = ? AND d.owner_id = ? ${documentClause}
        ORDER BY distance ASC, c.id ASC
        LIMIT ?
      `);

      const params: unknown[] = [serializeVector(vector), filter.ownerId, filter.ownerId];
      if (filter.documentIds) params.push(JSON.stringify(filter.documentIds));
      params.push(k);

      return stmt.all(...params).map(row => ({
        chunk: toStoredChunk(row),
        distance: row.distance,
      }));
    });
  }

  /**
   * Remove a document and its chunks. Deleting an unknown id, or a document
   * of another owner, changes nothing and returns false.
   */
  delete(documentId: string, scope: Pick<OwnerFilter, 'ownerId'>): boolean {
    validateOwnerId(scope.ownerId);

    return this.guard('delete', () =>
      this.db.transaction(() => {
        const owned = this.db
          .prepare<[string, string], { id: string }>('SELECT id FROM documents WHERE id = ? AND owner_id = ?')
          .get(documentId, scope.ownerId);
        if (!owned) return false;

        this.db.prepare('DELETE FROM chunks WHERE document_id = ?').run(documentId);
        this.db.prepare('DELETE FROM documents WHERE id = ?').run(documentId);
        log(`[delete] Removed document ${documentId}`);
        return true;
      })()
    );
  }

  getDocument(documentId: string, ownerId: string): Document | undefined {
    return this.guard('getDocument', () => {
      const row = this.db
        .prepare<[string, string], DocumentRow>('SELECT * FROM documents WHERE id = ? AND owner_id = ?')
        .get(documentId, ownerId);
      return row ? toDocument(row) : undefined;
    });
  }

  listDocuments(ownerId: string): Document[] {
    validateOwnerId(ownerId);
    return this.guard('listDocuments', () =>
      this.db
        .prepare<[string], DocumentRow>(
          'SELECT * FROM documents WHERE owner_id = ? ORDER BY created_at DESC, id ASC'
        )
        .all(ownerId)
        .map(toDocument)
    );
  }

  countChunks(filter: OwnerFilter): number {
    validateOwnerId(filter.ownerId);
    if (filter.documentIds && filter.documentIds.length === 0) return 0;

    return this.guard('countChunks', () => {
      const documentClause = filter.documentIds
        ? 'AND document_id IN (SELECT value FROM json_each(?))'
        : '';
      const params: unknown[] = [filter.ownerId];
      if (filter.documentIds) params.push(JSON.stringify(filter.documentIds));

      const row = this.db
        .prepare<unknown[], { count: number }>(
          `SELECT COUNT(*) AS count FROM chunks WHERE owner_id = ? ${documentClause}`
        )
        .get(...params);
      return row?.count ?? 0;
    });
  }

  close(): void {
    this.db.close();
  }

  private ensureDocument(document: NewDocument): void {
    const existing = this.db
      .prepare<[string], { owner_id: string }>('SELECT owner_id FROM documents WHERE id = ?')
      .get(document.id);

    if (existing && existing.owner_id !== document.ownerId) {
      throw new ValidationError(`Document ${document.id} belongs to a different owner`);
    }

    const now = Date.now();
    if (!existing) {
      this.db
        .prepare(
          `INSERT INTO documents (id, owner_id, source, status, chunk_count, created_at, updated_at)
           VALUES (?, ?, ?, 'pending', 0, ?, ?)`
        )
        .run(document.id, document.ownerId, document.source, now, now);
    } else {
      this.db
        .prepare('UPDATE documents SET source = ?, updated_at = ? WHERE id = ?')
        .run(document.source, now, document.id);
    }
  }

  private ensureModel(modelId: string, dimensions: number): void {
    const active = this.activeModel();
    if (!active) {
      this.writeMeta(META_MODEL, modelId);
      this.writeMeta(META_DIMENSIONS, String(dimensions));
      log(`[upsert] Collection bound to embedding model ${modelId} (${dimensions} dimensions)`);
      return;
    }
    if (active.modelId !== modelId) {
      throw new ConfigurationError(
        `Collection holds embeddings from "${active.modelId}"; refusing to mix in "${modelId}"`
      );
    }
    if (active.dimensions !== dimensions) {
      throw new ConfigurationError(
        `Collection uses ${active.dimensions}-dimensional embeddings, got ${dimensions}`
      );
    }
  }

  private requireDocument(documentId: string): Document {
    const row = this.db
      .prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?')
      .get(documentId);
    if (!row) {
      throw new StoreUnavailableError(`Document ${documentId} disappeared during write`);
    }
    return toDocument(row);
  }

  private readMeta(key: string): string | undefined {
    return this.db
      .prepare<[string], { value: string }>('SELECT value FROM collection_meta WHERE key = ?')
      .get(key)?.value;
  }

  private writeMeta(key: string, value: string): void {
    this.db
      .prepare(
        'INSERT INTO collection_meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
      )
      .run(key, value);
  }

  /** Domain errors pass through; anything SQLite throws becomes StoreUnavailableError */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (
        err instanceof ConfigurationError ||
        err instanceof ValidationError ||
        err instanceof StoreUnavailableError
      ) {
        throw err;
      }
      throw new StoreUnavailableError(`Vector store ${operation} failed: ${errorMessage(err)}`, err);
    }
  }
}

export function openVectorStore(
  options: { path?: string; metric?: DistanceMetric } = {}
): SqliteVectorStore {
  return new SqliteVectorStore(initializeDatabase(options.path), { metric: options.metric });
}
