export { RagService, createRagService } from './services/rag';
export type { RagServiceDependencies, RagStatus, SearchOptions, SearchResponse } from './services/rag';
export { resolveRagConfig } from './config';
export type { RagConfig, QueryRewriterKind } from './config';

export { splitText, validateChunkParameters } from './services/chunker';
export type { ChunkOptions } from './services/chunker';
export { BatchingEmbedder, createAiSdkEmbedBatch, createEmbedder } from './services/embeddings';
export type { Embedder, EmbedBatchFn, EmbedderOptions, ProviderSettings } from './services/embeddings';
export { SqliteVectorStore, openVectorStore } from './services/vector-store';
export type { ActiveModel, NewDocument, VectorStore } from './services/vector-store';
export { Retriever, deduplicateResults } from './services/retriever';
export type { RetrieverOptions } from './services/retriever';
export { AiSdkGenerator } from './services/llm';
export type { Generator, GeneratorOptions } from './services/llm';
export { HeuristicQueryRewriter, LlmQueryRewriter } from './services/query-rewriter';
export type { QueryRewriter } from './services/query-rewriter';
export { ConversationManager, InMemorySessionStore, assembleContext } from './services/conversation';
export type {
  AskOptions,
  ConversationDependencies,
  ConversationOptions,
  SessionStore,
} from './services/conversation';
export { documentIdFor, ingestDirectory, ingestDocument } from './services/ingest';
export type { ChunkingConfig, IngestDependencies } from './services/ingest';
export { loadDocumentText } from './services/loaders';
export { initializeDatabase } from './db/schema';

export {
  ConfigurationError,
  EmbeddingServiceError,
  GenerationServiceError,
  IngestionError,
  RetryExhaustedError,
  StoreUnavailableError,
  ValidationError,
} from './utils/errors';
export type * from './types/index';
