import type { Embedder } from '../services/embeddings';
import type { Generator } from '../services/llm';
import type { GenerationRequest } from '../types/index';

export const TEST_VOCABULARY = [
  'sky',
  'blue',
  'grass',
  'green',
  'color',
  'bananas',
  'yellow',
  'cherries',
  'red',
  'results',
  '2024',
  'question',
  'revenue',
  'cats',
  'dogs',
];

/**
 * Deterministic bag-of-words embedder: one dimension per vocabulary word
 * holding its count, plus a last dimension set only when no vocabulary word
 * occurs so that no vector is all zeros.
 */
export class VocabularyEmbedder implements Embedder {
  readonly calls: string[][] = [];

  constructor(
    readonly modelId: string = 'fake-embedding-v1',
    private readonly vocabulary: readonly string[] = TEST_VOCABULARY
  ) {}

  get dimensions(): number {
    return this.vocabulary.length + 1;
  }

  vectorFor(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
      const position = this.vocabulary.indexOf(word);
      if (position >= 0) vector[position] += 1;
    }
    if (vector.every((value): boolean => value === 0)) {
      vector[this.vocabulary.length] = 1;
    }
    return vector;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(text => this.vectorFor(text));
  }
}

/** Generator that answers from a function of the request and records every call */
export class FakeGenerator implements Generator {
  readonly requests: GenerationRequest[] = [];

  constructor(
    private readonly respond: (request: GenerationRequest) => string = request =>
      `Answer to: ${request.query}`
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/** Generator that fails its first `failures` calls, then delegates */
export class FlakyGenerator implements Generator {
  calls = 0;

  constructor(
    private failures: number,
    private readonly delegate: Generator = new FakeGenerator(),
    private readonly failure: () => Error = () => new Error('generation unavailable')
  ) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw this.failure();
    }
    return this.delegate.generate(request);
  }
}
