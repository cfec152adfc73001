import { createHash } from 'node:crypto';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { Embedder } from './embeddings';
import type { VectorStore } from './vector-store';
import { splitText, type ChunkOptions } from './chunker';
import { isSupportedFile, loadDocumentText, sourceName } from './loaders';
import type { Document, DocumentSource, IngestOptions, IngestResult } from '../types/index';
import { CHUNK_OVERLAP, CHUNK_SIZE } from '../constants/rag';
import { log, error } from '../utils/logger';
import { IngestionError, errorMessage, validateOwnerId } from '../utils/errors';

export interface ChunkingConfig extends ChunkOptions {
  chunkSize: number;
  overlap: number;
}

export interface IngestDependencies {
  store: VectorStore;
  embedder: Embedder;
  chunking?: ChunkingConfig;
}

/**
 * Stable document id for an owner's source, so re-ingesting the same file or
 * URL replaces the earlier version instead of duplicating it.
 */
export function documentIdFor(ownerId: string, source: string): string {
  const digest = createHash('sha256').update(JSON.stringify([ownerId, source])).digest('hex');
  return `doc_${digest.slice(0, 32)}`;
}

/**
 * Load, chunk, embed and store one document. Its chunks become visible to
 * queries all at once when the store commits; on failure the document is
 * marked failed and nothing new becomes visible.
 */
export async function ingestDocument(
  deps: IngestDependencies,
  source: DocumentSource,
  ownerId: string,
  options: IngestOptions = {}
): Promise<Document> {
  validateOwnerId(ownerId);

  const name = sourceName(source);
  const document = {
    id: options.documentId ?? documentIdFor(ownerId, name),
    ownerId,
    source: name,
  };
  const { chunkSize, overlap, ...chunkOptions } = deps.chunking ?? {
    chunkSize: CHUNK_SIZE,
    overlap: CHUNK_OVERLAP,
  };

  log(`[ingest] Processing ${name} as ${document.id}`);
  deps.store.registerDocument(document);

  try {
    const text = await loadDocumentText(source);
    const chunks = splitText(text, chunkSize, overlap, chunkOptions);
    log(`[ingest]   ${chunks.length} chunks from ${text.length} characters`);

    const embeddings = await deps.embedder.embed(chunks.map(chunk => chunk.text));
    const stored = deps.store.upsert(
      document,
      chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] })),
      deps.embedder.modelId
    );

    log(`[ingest] ✓ ${name}: ${stored.chunkCount} chunks stored`);
    return stored;
  } catch (err) {
    error(`[ingest] ✗ Error processing ${name}: ${errorMessage(err)}`);
    try {
      deps.store.markFailed(document.id, ownerId, errorMessage(err));
    } catch (markErr) {
      error(`[ingest] Could not mark ${document.id} as failed: ${errorMessage(markErr)}`);
    }
    throw err;
  }
}

async function listSupportedFiles(directoryPath: string): Promise<string[]> {
  const entries = await readdir(directoryPath, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const fullPath = join(directoryPath, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSupportedFiles(fullPath)));
    } else if (entry.isFile() && isSupportedFile(entry.name)) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Ingest every supported file under a directory for one owner. Per-file
 * failures are reported in the results rather than thrown.
 */
export async function ingestDirectory(
  deps: IngestDependencies,
  directoryPath: string,
  ownerId: string
): Promise<IngestResult[]> {
  let files: string[];
  try {
    files = await listSupportedFiles(directoryPath);
  } catch (err) {
    throw new IngestionError(`Cannot read directory ${directoryPath}: ${errorMessage(err)}`, err);
  }

  if (files.length === 0) {
    log('No supported files found in directory');
    return [];
  }

  log(`Found ${files.length} files to process\n`);

  const results: IngestResult[] = [];
  for (const path of files) {
    try {
      const document = await ingestDocument(deps, { kind: 'file', path }, ownerId);
      results.push({
        source: path,
        documentId: document.id,
        chunks_created: document.chunkCount,
        success: true,
      });
    } catch (err) {
      results.push({
        source: path,
        documentId: documentIdFor(ownerId, path),
        chunks_created: 0,
        success: false,
        error: errorMessage(err),
      });
    }
  }

  return results;
}
