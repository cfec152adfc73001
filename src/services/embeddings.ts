import { embedMany } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { EMBEDDING_MODEL, AI_BASE_URL, AI_API_KEY } from '../constants/providers';
import {
  EMBEDDING_BATCH_SIZE,
  EMBEDDING_CACHE_SIZE,
  NORMALIZE_EMBEDDINGS,
  RETRY_INITIAL_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
} from '../constants/rag';
import { log, debug, error } from '../utils/logger';
import { isFiniteVector, normalizeVector } from '../utils/vectors';
import {
  withRetry,
  isTransientError,
  ConfigurationError,
  EmbeddingServiceError,
  RetryExhaustedError,
  errorMessage,
  type RetryConfig,
} from '../utils/errors';

/**
 * Turns text into fixed-length vectors. Output has the same length and order
 * as the input. `modelId` identifies the model/version that produced the
 * vectors; vectors from different models are never compared.
 */
export interface Embedder {
  readonly modelId: string;
  embed(texts: string[]): Promise<number[][]>;
}

/** A single request to the embedding service for one batch */
export type EmbedBatchFn = (batch: string[], modelId: string) => Promise<number[][]>;

export interface EmbedderOptions {
  modelId?: string;
  maxBatchSize?: number;
  normalize?: boolean;
  /** Number of texts kept in the in-process cache; 0 disables caching */
  cacheSize?: number;
  retry?: Partial<Omit<RetryConfig, 'shouldRetry'>>;
}

export interface ProviderSettings {
  baseURL?: string;
  apiKey?: string;
}

/**
 * Embedding service call through the AI SDK. SDK-level retries are disabled
 * so the embedder's own backoff policy is the only one in effect.
 */
export function createAiSdkEmbedBatch(settings: ProviderSettings = {}): EmbedBatchFn {
  let aiProvider: ReturnType<typeof createOpenAI> | null = null;

  return async (batch, modelId) => {
    if (!aiProvider) {
      const baseURL = settings.baseURL ?? AI_BASE_URL;
      log('Using AI SDK with embeddings model:', modelId);
      log('Base URL:', baseURL);
      aiProvider = createOpenAI({ baseURL, apiKey: settings.apiKey ?? AI_API_KEY });
    }

    const result = await embedMany({
      model: aiProvider.embedding(modelId),
      values: batch,
      maxRetries: 0,
    });
    return result.embeddings;
  };
}

/**
 * Embedder that splits input into bounded batches, retries transient service
 * failures with exponential backoff and caches vectors of texts it has seen.
 */
export class BatchingEmbedder implements Embedder {
  readonly modelId: string;
  private readonly maxBatchSize: number;
  private readonly normalize: boolean;
  private readonly cacheSize: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly embedBatch: EmbedBatchFn,
    options: EmbedderOptions = {}
  ) {
    this.modelId = options.modelId ?? EMBEDDING_MODEL;
    this.maxBatchSize = options.maxBatchSize ?? EMBEDDING_BATCH_SIZE;
    this.normalize = options.normalize ?? NORMALIZE_EMBEDDINGS;
    this.cacheSize = options.cacheSize ?? EMBEDDING_CACHE_SIZE;
    this.retry = {
      maxAttempts: RETRY_MAX_ATTEMPTS,
      initialDelayMs: RETRY_INITIAL_DELAY_MS,
      maxDelayMs: RETRY_MAX_DELAY_MS,
      ...options.retry,
    };

    if (!Number.isInteger(this.maxBatchSize) || this.maxBatchSize < 1) {
      throw new ConfigurationError(`maxBatchSize must be a positive integer (got ${this.maxBatchSize})`);
    }
    if (this.modelId.trim() === '') {
      throw new ConfigurationError('Embedding model id must not be empty');
    }
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors = new Map<string, number[]>();
    const pending: string[] = [];

    for (const text of texts) {
      if (vectors.has(text) || pending.includes(text)) continue;
      const cached = this.cache.get(text);
      if (cached) {
        vectors.set(text, cached);
      } else {
        pending.push(text);
      }
    }

    debug(
      `[embed] ${texts.length} texts, ${texts.length - pending.length} served from cache, ${pending.length} to embed`
    );

    let dimension: number | undefined;
    for (let i = 0; i < pending.length; i += this.maxBatchSize) {
      const batch = pending.slice(i, i + this.maxBatchSize);
      const embeddings = await this.embedWithRetry(batch);

      if (embeddings.length !== batch.length) {
        throw new EmbeddingServiceError(
          `Embedding service returned ${embeddings.length} vectors for ${batch.length} inputs`
        );
      }

      batch.forEach((text, offset) => {
        const raw = embeddings[offset];
        if (!isFiniteVector(raw)) {
          throw new EmbeddingServiceError(`Embedding service returned an invalid vector for input ${i + offset}`);
        }
        dimension ??= raw.length;
        if (raw.length !== dimension) {
          throw new EmbeddingServiceError(
            `Embedding service returned vectors of differing dimension (${raw.length} vs ${dimension})`
          );
        }
        const vector = this.normalize ? normalizeVector(raw) : raw;
        vectors.set(text, vector);
        this.remember(text, vector);
      });
    }

    return texts.map(text => {
      const vector = vectors.get(text);
      if (!vector) {
        throw new EmbeddingServiceError('Missing embedding for input text');
      }
      return vector;
    });
  }

  clearCache(): void {
    this.cache.clear();
    log('Embedding cache cleared');
  }

  private async embedWithRetry(batch: string[]): Promise<number[][]> {
    try {
      return await withRetry(() => this.embedBatch(batch, this.modelId), {
        ...this.retry,
        shouldRetry: isTransientError,
        label: 'embed',
      });
    } catch (err) {
      error('Error generating embeddings:', errorMessage(err));
      if (err instanceof RetryExhaustedError) {
        throw new EmbeddingServiceError(
          `Embedding service failed after ${err.attempts} attempts: ${err.lastError.message}`,
          err.lastError
        );
      }
      throw new EmbeddingServiceError(`Failed to generate embeddings: ${errorMessage(err)}`, err);
    }
  }

  private remember(text: string, vector: number[]): void {
    if (this.cacheSize <= 0) return;
    if (this.cache.size >= this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(text, vector);
  }
}

export function createEmbedder(
  options: EmbedderOptions = {},
  settings: ProviderSettings = {}
): BatchingEmbedder {
  return new BatchingEmbedder(createAiSdkEmbedBatch(settings), options);
}
