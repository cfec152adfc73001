import type { DISTANCE_METRICS } from '../constants/rag';

export type DistanceMetric = (typeof DISTANCE_METRICS)[number];

export type DocumentStatus = 'pending' | 'processed' | 'failed';

export interface Document {
  id: string;
  /** Filename or URL the text came from */
  source: string;
  ownerId: string;
  status: DocumentStatus;
  chunkCount: number;
  /** Ingestion timestamp (epoch ms) */
  createdAt: number;
  updatedAt: number;
  error?: string;
}

/**
 * A segment of a document's text, as produced by the chunker. Offsets are
 * character positions in the source text (end exclusive).
 */
export interface Chunk {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  length: number;
  tokenEstimate: number;
}

export interface ChunkWithEmbedding extends Chunk {
  embedding: number[];
}

/** A chunk as persisted in the vector store */
export interface StoredChunk extends Chunk {
  id: number;
  documentId: string;
  ownerId: string;
  source: string;
  modelId: string;
}

/**
 * Mandatory scope for every store read. `ownerId` is always required;
 * `documentIds` narrows the search to specific documents of that owner.
 */
export interface OwnerFilter {
  ownerId: string;
  documentIds?: string[];
}

export interface VectorMatch {
  chunk: StoredChunk;
  distance: number;
}

export interface SearchResult {
  chunk: StoredChunk;
  /** Similarity in [0, 1], higher is more similar */
  score: number;
  distance: number;
}

export type DocumentSource =
  | { kind: 'text'; name: string; text: string }
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string };

export interface IngestOptions {
  /** Explicit document id; derived from owner and source when omitted */
  documentId?: string;
}

export interface IngestResult {
  source: string;
  documentId?: string;
  chunks_created: number;
  success: boolean;
  error?: string;
}

export type SessionState = 'awaiting_query' | 'retrieving' | 'awaiting_generation' | 'idle';

export interface ConversationTurn {
  sequence: number;
  userQuery: string;
  /** Present only when rewriting changed the user's query */
  standaloneQuery?: string;
  chunkIds: number[];
  answer: string;
  createdAt: number;
}

export interface Session {
  id: string;
  ownerId: string;
  state: SessionState;
  turns: readonly ConversationTurn[];
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerationRequest {
  systemPrompt?: string;
  context: string;
  history: ChatMessage[];
  query: string;
}

export interface AskSource {
  chunkId: number;
  documentId: string;
  source: string;
  chunkIndex: number;
  text: string;
  score: number;
}

export interface AskResult {
  answer: string;
  chunkIds: number[];
  standaloneQuery?: string;
  sources: AskSource[];
  took_ms: number;
}
