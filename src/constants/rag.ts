import { envNumber, envChoice, envBoolean } from '../utils/env';

export { MAX_QUERY_LENGTH, MAX_TOP_K } from './limits';

// Chunking
export const CHUNK_SIZE = envNumber('CHUNK_SIZE', 1000);
export const CHUNK_OVERLAP = envNumber('CHUNK_OVERLAP', 200);
// Window (in characters) before the target size searched for a natural break
export const BOUNDARY_TOLERANCE = envNumber(
  'BOUNDARY_TOLERANCE',
  Math.max(1, Math.floor(CHUNK_SIZE / 4))
);

// Embeddings
export const EMBEDDING_BATCH_SIZE = envNumber('EMBEDDING_BATCH_SIZE', 16);
export const NORMALIZE_EMBEDDINGS = envBoolean('NORMALIZE_EMBEDDINGS', true);
export const EMBEDDING_CACHE_SIZE = 10000;

// Retry (embedding and generation calls only)
export const RETRY_MAX_ATTEMPTS = envNumber('RETRY_MAX_ATTEMPTS', 4);
export const RETRY_INITIAL_DELAY_MS = envNumber('RETRY_INITIAL_DELAY_MS', 500);
export const RETRY_MAX_DELAY_MS = envNumber('RETRY_MAX_DELAY_MS', 8000);

// Vector store
export const DISTANCE_METRICS = ['cosine', 'l2'] as const;
export const DISTANCE_METRIC = envChoice('DISTANCE_METRIC', DISTANCE_METRICS, 'cosine');

// Retrieval
export const DEFAULT_TOP_K = envNumber('DEFAULT_TOP_K', 5);
export const SIMILARITY_THRESHOLD = envNumber('SIMILARITY_THRESHOLD', 0.5);
export const CANDIDATE_MULTIPLIER = 3;
export const DEDUPLICATION_THRESHOLD = 0.9;

// Conversation
export const MAX_HISTORY_TURNS = envNumber('MAX_HISTORY_TURNS', 6);
export const MAX_CONTEXT_LENGTH = envNumber('MAX_CONTEXT_LENGTH', 12000);
// Sessions kept in memory before the least recently used one is dropped
export const MAX_SESSIONS = envNumber('MAX_SESSIONS', 1000);

// Generation
export const GENERATION_TEMPERATURE = 0.3;
export const REWRITE_TEMPERATURE = 0;

// Follow-up rewriting: 'heuristic' is rule-based, 'llm' asks the chat model
export const QUERY_REWRITERS = ['heuristic', 'llm'] as const;
export const QUERY_REWRITER = envChoice('QUERY_REWRITER', QUERY_REWRITERS, 'heuristic');
