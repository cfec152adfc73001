import { APICallError } from 'ai';
import { error as logError } from './logger';
import { MAX_QUERY_LENGTH, MAX_TOP_K } from '../constants/limits';

/**
 * Custom error types for better error handling
 */

/** Invalid chunking parameters or mismatched embedding model/dimension/metric. Never retried. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class EmbeddingServiceError extends Error {
  public readonly errorCause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'EmbeddingServiceError';
    this.errorCause = cause;
  }
}

export class GenerationServiceError extends Error {
  public readonly errorCause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'GenerationServiceError';
    this.errorCause = cause;
  }
}

export class StoreUnavailableError extends Error {
  public readonly errorCause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'StoreUnavailableError';
    this.errorCause = cause;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class IngestionError extends Error {
  public readonly errorCause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'IngestionError';
    this.errorCause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const TRANSIENT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const TRANSIENT_STATUS_CODES = new Set([408, 409, 429]);

/**
 * Decide whether a failed call to an external model service is worth retrying:
 * timeouts, dropped connections, rate limits and 5xx responses.
 */
export function isTransientError(err: unknown): boolean {
  if (APICallError.isInstance(err)) {
    if (err.isRetryable) return true;
    const status = err.statusCode;
    return status !== undefined && (TRANSIENT_STATUS_CODES.has(status) || status >= 500);
  }

  if (!(err instanceof Error)) return false;

  if (err.name === 'TimeoutError' || err.name === 'AbortError') return true;

  if ('code' in err && typeof err.code === 'string' && TRANSIENT_ERROR_CODES.has(err.code)) {
    return true;
  }

  // fetch() wraps socket failures as TypeError with the real error as cause
  if (err.cause !== undefined && err.cause !== err) {
    return isTransientError(err.cause);
  }

  return false;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Errors for which this returns false are rethrown immediately */
  shouldRetry?: (err: Error) => boolean;
  /** Label used in retry log lines */
  label?: string;
}

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
};

export class RetryExhaustedError extends Error {
  public readonly attempts: number;
  public readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Execute a function with exponential backoff retry.
 * Non-retryable errors propagate unchanged; running out of attempts on a
 * retryable one throws RetryExhaustedError.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const finalConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const label = finalConfig.label ?? 'withRetry';
  let lastError: Error = new Error('Retry failed without error');
  let delayMs = finalConfig.initialDelayMs;

  for (let attempt = 1; attempt <= finalConfig.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (finalConfig.shouldRetry && !finalConfig.shouldRetry(lastError)) {
        throw lastError;
      }

      // Don't retry on last attempt
      if (attempt === finalConfig.maxAttempts) {
        break;
      }

      logError(
        `[${label}] Attempt ${attempt}/${finalConfig.maxAttempts} failed: ${lastError.message}. Retrying in ${delayMs}ms...`
      );

      await new Promise(resolve => setTimeout(resolve, delayMs));

      delayMs = Math.min(delayMs * finalConfig.backoffMultiplier, finalConfig.maxDelayMs);
    }
  }

  throw new RetryExhaustedError(finalConfig.maxAttempts, lastError);
}

/**
 * Validate input parameters
 */
export function validateQueryInput(query: string, maxLength: number = MAX_QUERY_LENGTH): void {
  if (typeof query !== 'string' || query.trim().length === 0) {
    throw new ValidationError('Query must be a non-empty string');
  }
  if (query.length > maxLength) {
    throw new ValidationError(`Query too long: ${query.length} characters (max: ${maxLength})`);
  }
}

export function validateTopK(topK: number, maxK: number = MAX_TOP_K): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError('topK must be a positive integer');
  }
  if (topK > maxK) {
    throw new ValidationError(`topK too large: ${topK} (max: ${maxK})`);
  }
}

export function validateSimilarityThreshold(threshold: number): void {
  if (typeof threshold !== 'number' || Number.isNaN(threshold) || threshold < 0 || threshold > 1) {
    throw new ValidationError('Similarity threshold must be between 0 and 1');
  }
}

export function validateOwnerId(ownerId: string): void {
  if (typeof ownerId !== 'string' || ownerId.trim().length === 0) {
    throw new ValidationError('ownerId must be a non-empty string');
  }
}
