import { describe, it, expect, vi } from 'vitest';
import { APICallError } from 'ai';
import {
  RetryExhaustedError,
  ValidationError,
  isTransientError,
  validateOwnerId,
  validateQueryInput,
  validateSimilarityThreshold,
  validateTopK,
  withRetry,
} from './errors';

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

function apiError(statusCode: number, isRetryable = false): APICallError {
  return new APICallError({
    message: `HTTP ${statusCode}`,
    url: 'https://example.test/v1/embeddings',
    requestBodyValues: {},
    statusCode,
    isRetryable,
  });
}

describe('isTransientError', () => {
  it('retries timeouts, dropped connections and rate limits', () => {
    expect(isTransientError(withCode('timeout', 'ETIMEDOUT'))).toBe(true);
    expect(isTransientError(withCode('reset', 'ECONNRESET'))).toBe(true);
    expect(isTransientError(apiError(429))).toBe(true);
    expect(isTransientError(apiError(503))).toBe(true);
    expect(isTransientError(apiError(400, true))).toBe(true);
  });

  it('looks through a wrapping error to its cause', () => {
    const wrapped = new TypeError('fetch failed', { cause: withCode('refused', 'ECONNREFUSED') });

    expect(isTransientError(wrapped)).toBe(true);
  });

  it('does not retry client errors', () => {
    expect(isTransientError(apiError(401))).toBe(false);
    expect(isTransientError(new Error('bad request'))).toBe(false);
    expect(isTransientError('not an error')).toBe(false);
  });
});

describe('withRetry', () => {
  const fast = { initialDelayMs: 1, maxDelayMs: 1 };

  it('returns the first successful result', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    expect(await withRetry(fn, { ...fast, maxAttempts: 3 })).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('throws RetryExhaustedError with the last failure after the final attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('still down'));

    const failure = await withRetry(fn, { ...fast, maxAttempts: 2 }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(RetryExhaustedError);
    expect(failure).toMatchObject({ attempts: 2, lastError: { message: 'still down' } });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('rethrows errors the predicate rejects without retrying', async () => {
    const fatal = new Error('fatal');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(fatal);

    await expect(withRetry(fn, { ...fast, maxAttempts: 5, shouldRetry: () => false })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('validators', () => {
  it('reject bad caller input', () => {
    expect(() => validateQueryInput('')).toThrow(ValidationError);
    expect(() => validateQueryInput('x'.repeat(2001))).toThrow('Query too long: 2001 characters (max: 2000)');
    expect(() => validateTopK(0)).toThrow(ValidationError);
    expect(() => validateTopK(101)).toThrow('topK too large: 101 (max: 100)');
    expect(() => validateSimilarityThreshold(-0.1)).toThrow(ValidationError);
    expect(() => validateOwnerId(' ')).toThrow(ValidationError);
  });

  it('accept valid input', () => {
    expect(() => validateQueryInput('What color is the sky?')).not.toThrow();
    expect(() => validateTopK(5)).not.toThrow();
    expect(() => validateSimilarityThreshold(0)).not.toThrow();
    expect(() => validateOwnerId('alice')).not.toThrow();
  });
});
