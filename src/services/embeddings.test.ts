import { describe, it, expect, vi } from 'vitest';
import { BatchingEmbedder, type EmbedBatchFn } from './embeddings';
import { ConfigurationError, EmbeddingServiceError } from '../utils/errors';

const fastRetry = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1 };

function lengthEmbedding(): EmbedBatchFn {
  return vi.fn(async (batch: string[]) => batch.map(text => [text.length, 1]));
}

function transient(message = 'timeout'): Error {
  return Object.assign(new Error(message), { code: 'ETIMEDOUT' });
}

describe('BatchingEmbedder', () => {
  it('returns one vector per input in input order, split into bounded batches', async () => {
    const embedBatch = lengthEmbedding();
    const embedder = new BatchingEmbedder(embedBatch, {
      modelId: 'test-model',
      maxBatchSize: 2,
      normalize: false,
    });

    const vectors = await embedder.embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(vectors).toEqual([
      [1, 1],
      [2, 1],
      [3, 1],
      [4, 1],
      [5, 1],
    ]);
    expect(vi.mocked(embedBatch).mock.calls).toEqual([
      [['a', 'bb'], 'test-model'],
      [['ccc', 'dddd'], 'test-model'],
      [['eeeee'], 'test-model'],
    ]);
  });

  it('embeds repeated texts once and serves later calls from the cache', async () => {
    const embedBatch = lengthEmbedding();
    const embedder = new BatchingEmbedder(embedBatch, { normalize: false });

    const vectors = await embedder.embed(['same', 'same', 'other']);
    await embedder.embed(['same']);

    expect(vectors).toEqual([
      [4, 1],
      [4, 1],
      [5, 1],
    ]);
    expect(embedBatch).toHaveBeenCalledTimes(1);
    expect(vi.mocked(embedBatch).mock.calls[0][0]).toEqual(['same', 'other']);
  });

  it('calls the service again after the cache is cleared', async () => {
    const embedBatch = lengthEmbedding();
    const embedder = new BatchingEmbedder(embedBatch);

    await embedder.embed(['same']);
    embedder.clearCache();
    await embedder.embed(['same']);

    expect(embedBatch).toHaveBeenCalledTimes(2);
  });

  it('normalizes vectors to unit length', async () => {
    const embedder = new BatchingEmbedder(async batch => batch.map(() => [3, 4]), { normalize: true });

    const [vector] = await embedder.embed(['x']);

    expect(vector[0]).toBeCloseTo(0.6);
    expect(vector[1]).toBeCloseTo(0.8);
  });

  it('returns an empty list without calling the service', async () => {
    const embedBatch = lengthEmbedding();
    const embedder = new BatchingEmbedder(embedBatch);

    expect(await embedder.embed([])).toEqual([]);
    expect(embedBatch).not.toHaveBeenCalled();
  });

  it('retries transient failures', async () => {
    const embedBatch = vi
      .fn<EmbedBatchFn>()
      .mockRejectedValueOnce(transient())
      .mockResolvedValueOnce([[1, 2]]);
    const embedder = new BatchingEmbedder(embedBatch, { normalize: false, retry: fastRetry });

    expect(await embedder.embed(['x'])).toEqual([[1, 2]]);
    expect(embedBatch).toHaveBeenCalledTimes(2);
  });

  it('reports exhausted retries as an EmbeddingServiceError', async () => {
    const embedBatch = vi.fn<EmbedBatchFn>().mockRejectedValue(transient('socket timeout'));
    const embedder = new BatchingEmbedder(embedBatch, { retry: fastRetry });

    await expect(embedder.embed(['x'])).rejects.toThrow(
      'Embedding service failed after 3 attempts: socket timeout'
    );
    expect(embedBatch).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-transient failures', async () => {
    const embedBatch = vi.fn<EmbedBatchFn>().mockRejectedValue(new Error('invalid api key'));
    const embedder = new BatchingEmbedder(embedBatch, { retry: fastRetry });

    await expect(embedder.embed(['x'])).rejects.toBeInstanceOf(EmbeddingServiceError);
    expect(embedBatch).toHaveBeenCalledTimes(1);
  });

  it('rejects responses with the wrong number of vectors', async () => {
    const embedder = new BatchingEmbedder(async () => [[1, 2]], { cacheSize: 0 });

    await expect(embedder.embed(['a', 'b'])).rejects.toThrow(
      'Embedding service returned 1 vectors for 2 inputs'
    );
  });

  it('rejects vectors of differing dimension', async () => {
    const embedder = new BatchingEmbedder(async () => [[1, 2], [1, 2, 3]]);

    await expect(embedder.embed(['a', 'b'])).rejects.toBeInstanceOf(EmbeddingServiceError);
  });

  it('rejects an invalid batch size', () => {
    expect(() => new BatchingEmbedder(lengthEmbedding(), { maxBatchSize: 0 })).toThrow(ConfigurationError);
  });
});
