import { resolveRagConfig, type RagConfig } from '../config';
import { createEmbedder, type Embedder } from './embeddings';
import { AiSdkGenerator, type Generator } from './llm';
import { HeuristicQueryRewriter, LlmQueryRewriter, type QueryRewriter } from './query-rewriter';
import {
  ConversationManager,
  InMemorySessionStore,
  type AskOptions,
  type SessionStore,
} from './conversation';
import { Retriever } from './retriever';
import { ingestDirectory, ingestDocument, type IngestDependencies } from './ingest';
import { openVectorStore, type ActiveModel, type VectorStore } from './vector-store';
import type {
  AskResult,
  Document,
  DocumentSource,
  IngestOptions,
  IngestResult,
  SearchResult,
  Session,
} from '../types/index';
import { log } from '../utils/logger';
import { validateOwnerId } from '../utils/errors';

export interface SearchOptions {
  topK?: number;
  documentIds?: string[];
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
  took_ms: number;
}

export interface RagStatus {
  status: 'online';
  documents: number;
  document_chunks: number;
  embedding_model: string;
  llm_model: string;
  distance_metric: string;
  /** Model the stored vectors were produced with, once anything is stored */
  stored_model?: ActiveModel;
}

export interface RagServiceDependencies {
  store: VectorStore;
  embedder: Embedder;
  generator: Generator;
  rewriter?: QueryRewriter;
  sessions?: SessionStore;
}

/**
 * Entry point tying ingestion, retrieval and conversation together. Every
 * operation is scoped to the ownerId it is given.
 */
export class RagService {
  private readonly store: VectorStore;
  private readonly embedder: Embedder;
  private readonly retriever: Retriever;
  private readonly conversations: ConversationManager;
  private readonly ingestDeps: IngestDependencies;

  constructor(
    deps: RagServiceDependencies,
    private readonly config: RagConfig = resolveRagConfig()
  ) {
    this.store = deps.store;
    this.embedder = deps.embedder;
    this.retriever = new Retriever(deps.embedder, deps.store, {
      minSimilarity: config.similarityThreshold,
    });
    this.conversations = new ConversationManager(
      {
        retriever: this.retriever,
        generator: deps.generator,
        ...(deps.rewriter ? { rewriter: deps.rewriter } : {}),
        sessions: deps.sessions ?? new InMemorySessionStore(config.maxSessions),
      },
      {
        topK: config.topK,
        maxContextLength: config.maxContextLength,
        maxHistoryTurns: config.maxHistoryTurns,
        ...(config.systemPrompt ? { systemPrompt: config.systemPrompt } : {}),
      }
    );
    this.ingestDeps = {
      store: deps.store,
      embedder: deps.embedder,
      chunking: {
        chunkSize: config.chunkSize,
        overlap: config.chunkOverlap,
        boundaryTolerance: config.boundaryTolerance,
      },
    };
  }

  ingest(source: DocumentSource, ownerId: string, options: IngestOptions = {}): Promise<Document> {
    return ingestDocument(this.ingestDeps, source, ownerId, options);
  }

  ingestDirectory(directoryPath: string, ownerId: string): Promise<IngestResult[]> {
    validateOwnerId(ownerId);
    return ingestDirectory(this.ingestDeps, directoryPath, ownerId);
  }

  ask(sessionId: string, message: string, ownerId: string, options: AskOptions = {}): Promise<AskResult> {
    return this.conversations.ask(sessionId, message, ownerId, options);
  }

  async search(query: string, ownerId: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const startTime = performance.now();
    const results = await this.retriever.retrieve(query, options.topK ?? this.config.topK, {
      ownerId,
      ...(options.documentIds ? { documentIds: options.documentIds } : {}),
    });

    return {
      query,
      results,
      took_ms: Math.round((performance.now() - startTime) * 100) / 100,
    };
  }

  deleteDocument(documentId: string, ownerId: string): boolean {
    const deleted = this.store.delete(documentId, { ownerId });
    log(`[delete] ${documentId}: ${deleted ? 'deleted' : 'not found'}`);
    return deleted;
  }

  getDocument(documentId: string, ownerId: string): Document | undefined {
    validateOwnerId(ownerId);
    return this.store.getDocument(documentId, ownerId);
  }

  listDocuments(ownerId: string): Document[] {
    validateOwnerId(ownerId);
    return this.store.listDocuments(ownerId);
  }

  getSession(ownerId: string, sessionId: string): Session | undefined {
    return this.conversations.getSession(ownerId, sessionId);
  }

  resetSession(ownerId: string, sessionId: string): boolean {
    return this.conversations.resetSession(ownerId, sessionId);
  }

  status(ownerId: string): RagStatus {
    validateOwnerId(ownerId);
    const storedModel = this.store.activeModel();

    return {
      status: 'online',
      documents: this.store.listDocuments(ownerId).length,
      document_chunks: this.store.countChunks({ ownerId }),
      embedding_model: this.embedder.modelId,
      llm_model: this.config.llmModel,
      distance_metric: this.store.metric,
      ...(storedModel ? { stored_model: storedModel } : {}),
    };
  }

  close(): void {
    this.store.close();
  }
}

/**
 * Build a service on the SQLite store and the AI SDK provider from the
 * environment, with any settings overridden.
 */
export function createRagService(overrides: Partial<RagConfig> = {}): RagService {
  const config = resolveRagConfig(overrides);
  const settings = { baseURL: config.baseURL, apiKey: config.apiKey };
  const retry = {
    maxAttempts: config.retryMaxAttempts,
    initialDelayMs: config.retryInitialDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
  };

  const store = openVectorStore({ path: config.dbPath, metric: config.metric });
  const embedder = createEmbedder(
    {
      modelId: config.embeddingModel,
      maxBatchSize: config.embeddingBatchSize,
      normalize: config.normalizeEmbeddings,
      retry,
    },
    settings
  );
  const generator = new AiSdkGenerator(
    { modelId: config.llmModel, temperature: config.generationTemperature, retry },
    settings
  );
  const rewriter =
    config.queryRewriter === 'llm'
      ? new LlmQueryRewriter(
          new AiSdkGenerator(
            { modelId: config.llmModel, temperature: config.rewriteTemperature, retry },
            settings
          ),
          config.maxHistoryTurns
        )
      : new HeuristicQueryRewriter();

  log(`[rag] Store ${config.dbPath} (${config.metric}), rewriter: ${config.queryRewriter}`);
  return new RagService({ store, embedder, generator, rewriter }, config);
}
