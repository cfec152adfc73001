import type { Embedder } from './embeddings';
import type { VectorStore } from './vector-store';
import type { OwnerFilter, SearchResult } from '../types/index';
import {
  CANDIDATE_MULTIPLIER,
  DEDUPLICATION_THRESHOLD,
  SIMILARITY_THRESHOLD,
} from '../constants/rag';
import { log } from '../utils/logger';
import { distanceToSimilarity } from '../utils/vectors';
import { calculateJaccardSimilarity } from '../utils/text';
import {
  validateOwnerId,
  validateQueryInput,
  validateSimilarityThreshold,
  validateTopK,
} from '../utils/errors';

export interface RetrieverOptions {
  /** Results scoring below this similarity are dropped, even inside the top k */
  minSimilarity?: number;
  /** How many candidates to fetch per requested result, to survive deduplication */
  candidateMultiplier?: number;
  /** Jaccard overlap above which adjacent chunks of a document count as duplicates */
  dedupeThreshold?: number;
}

/**
 * Remove duplicate results: identical chunk text anywhere in the list, and
 * adjacent chunks of the same document whose token overlap reaches the
 * threshold. Results must arrive best-first; the first occurrence is kept.
 */
export function deduplicateResults(
  results: SearchResult[],
  threshold: number = DEDUPLICATION_THRESHOLD
): SearchResult[] {
  const kept: SearchResult[] = [];
  const seenTexts = new Set<string>();

  for (const result of results) {
    const text = result.chunk.text.trim();
    if (seenTexts.has(text)) continue;

    const nearDuplicate = kept.some(
      other =>
        other.chunk.documentId === result.chunk.documentId &&
        Math.abs(other.chunk.index - result.chunk.index) <= 1 &&
        calculateJaccardSimilarity(other.chunk.text, result.chunk.text) >= threshold
    );
    if (nearDuplicate) continue;

    seenTexts.add(text);
    kept.push(result);
  }

  return kept;
}

export class Retriever {
  private readonly minSimilarity: number;
  private readonly candidateMultiplier: number;
  private readonly dedupeThreshold: number;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    options: RetrieverOptions = {}
  ) {
    this.minSimilarity = options.minSimilarity ?? SIMILARITY_THRESHOLD;
    this.candidateMultiplier = options.candidateMultiplier ?? CANDIDATE_MULTIPLIER;
    this.dedupeThreshold = options.dedupeThreshold ?? DEDUPLICATION_THRESHOLD;
    validateSimilarityThreshold(this.minSimilarity);
  }

  /**
   * Ranked chunks relevant to `queryText` within the filter's scope, best
   * first. An empty result means nothing relevant was found.
   */
  async retrieve(queryText: string, k: number, filter: OwnerFilter): Promise<SearchResult[]> {
    validateQueryInput(queryText);
    validateTopK(k);
    validateOwnerId(filter.ownerId);

    const startTime = performance.now();

    if (this.store.countChunks(filter) === 0) {
      log('[retrieve] No documents in scope');
      return [];
    }

    const [queryVector] = await this.embedder.embed([queryText]);
    const candidateLimit = Math.max(k, k * this.candidateMultiplier);
    const matches = this.store.query(queryVector, candidateLimit, filter, this.embedder.modelId);

    // Matches arrive ordered by distance, ties by insertion order; keep that order
    const scored: SearchResult[] = matches
      .map(match => ({
        chunk: match.chunk,
        distance: match.distance,
        score: distanceToSimilarity(match.distance, this.store.metric),
      }))
      .filter(result => result.score >= this.minSimilarity);

    const results = deduplicateResults(scored, this.dedupeThreshold).slice(0, k);

    const tookMs = Math.round((performance.now() - startTime) * 100) / 100;
    log(
      `[retrieve] ${matches.length} candidates, ${scored.length} above threshold ${this.minSimilarity}, returning ${results.length} (took ${tookMs}ms)`
    );

    return results;
  }
}
