import { describe, it, expect } from 'vitest';
import { resolveRagConfig } from './config';
import { ConfigurationError } from './utils/errors';

describe('resolveRagConfig', () => {
  it('applies overrides on top of the defaults', () => {
    const config = resolveRagConfig({ chunkSize: 400, chunkOverlap: 50, topK: 8, metric: 'l2' });

    expect(config).toMatchObject({ chunkSize: 400, chunkOverlap: 50, topK: 8, metric: 'l2' });
  });

  it('derives the boundary tolerance from an overridden chunk size', () => {
    expect(resolveRagConfig({ chunkSize: 400, chunkOverlap: 50 }).boundaryTolerance).toBe(100);
    expect(resolveRagConfig({ chunkSize: 3, chunkOverlap: 1 }).boundaryTolerance).toBe(1);
    expect(
      resolveRagConfig({ chunkSize: 400, chunkOverlap: 50, boundaryTolerance: 20 }).boundaryTolerance
    ).toBe(20);
  });

  it('accepts a zero boundary tolerance, as the chunker does', () => {
    expect(resolveRagConfig({ boundaryTolerance: 0 }).boundaryTolerance).toBe(0);
  });

  it('rejects invalid settings', () => {
    expect(() => resolveRagConfig({ maxSessions: 0 })).toThrow('maxSessions must be an integer >= 1 (got 0)');
    expect(() => resolveRagConfig({ boundaryTolerance: -1 })).toThrow(
      'boundaryTolerance must be an integer >= 0 (got -1)'
    );
    expect(() => resolveRagConfig({ chunkSize: 100, chunkOverlap: 100 })).toThrow(ConfigurationError);
    expect(() => resolveRagConfig({ topK: 0 })).toThrow('topK must be an integer >= 1 (got 0)');
    expect(() => resolveRagConfig({ topK: 101 })).toThrow('topK must be at most 100 (got 101)');
    expect(() => resolveRagConfig({ similarityThreshold: 2 })).toThrow(
      'similarityThreshold must be between 0 and 1 (got 2)'
    );
    expect(() => resolveRagConfig({ embeddingBatchSize: 0 })).toThrow(ConfigurationError);
    expect(() => resolveRagConfig({ llmModel: ' ' })).toThrow('llmModel must not be empty');
  });
});
