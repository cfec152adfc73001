import { AI_API_KEY, AI_BASE_URL, EMBEDDING_MODEL, LLM_MODEL } from './constants/providers';
import { DB_PATH } from './constants/dirs';
import {
  BOUNDARY_TOLERANCE,
  CHUNK_OVERLAP,
  CHUNK_SIZE,
  DEFAULT_TOP_K,
  DISTANCE_METRIC,
  DISTANCE_METRICS,
  EMBEDDING_BATCH_SIZE,
  GENERATION_TEMPERATURE,
  MAX_CONTEXT_LENGTH,
  MAX_HISTORY_TURNS,
  MAX_SESSIONS,
  MAX_TOP_K,
  NORMALIZE_EMBEDDINGS,
  QUERY_REWRITER,
  QUERY_REWRITERS,
  RETRY_INITIAL_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_MAX_DELAY_MS,
  REWRITE_TEMPERATURE,
  SIMILARITY_THRESHOLD,
} from './constants/rag';
import type { DistanceMetric } from './types/index';
import { validateChunkParameters } from './services/chunker';
import { ConfigurationError } from './utils/errors';

export type QueryRewriterKind = (typeof QUERY_REWRITERS)[number];

export interface RagConfig {
  dbPath: string;
  metric: DistanceMetric;

  chunkSize: number;
  chunkOverlap: number;
  boundaryTolerance: number;

  embeddingModel: string;
  embeddingBatchSize: number;
  normalizeEmbeddings: boolean;

  llmModel: string;
  generationTemperature: number;
  rewriteTemperature: number;
  queryRewriter: QueryRewriterKind;
  systemPrompt?: string;

  topK: number;
  similarityThreshold: number;
  maxContextLength: number;
  maxHistoryTurns: number;
  maxSessions: number;

  retryMaxAttempts: number;
  retryInitialDelayMs: number;
  retryMaxDelayMs: number;

  baseURL: string;
  apiKey: string;
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min} (got ${value})`);
  }
}

function requireRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ConfigurationError(`${name} must be between ${min} and ${max} (got ${value})`);
  }
}

/**
 * Merge overrides onto the environment-derived defaults and check the result.
 * Throws ConfigurationError on the first invalid setting.
 */
export function resolveRagConfig(overrides: Partial<RagConfig> = {}): RagConfig {
  const chunkSize = overrides.chunkSize ?? CHUNK_SIZE;
  const config: RagConfig = {
    dbPath: DB_PATH,
    metric: DISTANCE_METRIC,
    chunkSize,
    chunkOverlap: CHUNK_OVERLAP,
    // Follows an overridden chunk size unless set explicitly
    boundaryTolerance:
      overrides.chunkSize !== undefined ? Math.max(1, Math.floor(chunkSize / 4)) : BOUNDARY_TOLERANCE,
    embeddingModel: EMBEDDING_MODEL,
    embeddingBatchSize: EMBEDDING_BATCH_SIZE,
    normalizeEmbeddings: NORMALIZE_EMBEDDINGS,
    llmModel: LLM_MODEL,
    generationTemperature: GENERATION_TEMPERATURE,
    rewriteTemperature: REWRITE_TEMPERATURE,
    queryRewriter: QUERY_REWRITER,
    topK: DEFAULT_TOP_K,
    similarityThreshold: SIMILARITY_THRESHOLD,
    maxContextLength: MAX_CONTEXT_LENGTH,
    maxHistoryTurns: MAX_HISTORY_TURNS,
    maxSessions: MAX_SESSIONS,
    retryMaxAttempts: RETRY_MAX_ATTEMPTS,
    retryInitialDelayMs: RETRY_INITIAL_DELAY_MS,
    retryMaxDelayMs: RETRY_MAX_DELAY_MS,
    baseURL: AI_BASE_URL,
    apiKey: AI_API_KEY,
    ...overrides,
  };

  validateChunkParameters(config.chunkSize, config.chunkOverlap);
  // 0 means every chunk is cut hard at the target size
  requireInteger('boundaryTolerance', config.boundaryTolerance, 0);
  requireInteger('embeddingBatchSize', config.embeddingBatchSize, 1);
  requireInteger('topK', config.topK, 1);
  if (config.topK > MAX_TOP_K) {
    throw new ConfigurationError(`topK must be at most ${MAX_TOP_K} (got ${config.topK})`);
  }
  requireRange('similarityThreshold', config.similarityThreshold, 0, 1);
  requireInteger('maxContextLength', config.maxContextLength, 1);
  requireInteger('maxHistoryTurns', config.maxHistoryTurns, 0);
  requireInteger('maxSessions', config.maxSessions, 1);
  requireInteger('retryMaxAttempts', config.retryMaxAttempts, 1);
  requireInteger('retryInitialDelayMs', config.retryInitialDelayMs, 0);
  requireInteger('retryMaxDelayMs', config.retryMaxDelayMs, 0);
  requireRange('generationTemperature', config.generationTemperature, 0, 2);
  requireRange('rewriteTemperature', config.rewriteTemperature, 0, 2);

  if (!DISTANCE_METRICS.includes(config.metric)) {
    throw new ConfigurationError(`Unknown distance metric: ${config.metric}`);
  }
  if (!QUERY_REWRITERS.includes(config.queryRewriter)) {
    throw new ConfigurationError(`Unknown query rewriter: ${config.queryRewriter}`);
  }
  if (!config.embeddingModel.trim()) {
    throw new ConfigurationError('embeddingModel must not be empty');
  }
  if (!config.llmModel.trim()) {
    throw new ConfigurationError('llmModel must not be empty');
  }

  return config;
}
