import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RagService } from './rag';
import { SqliteVectorStore } from './vector-store';
import { documentIdFor } from './ingest';
import { resolveRagConfig } from '../config';
import { initializeDatabase, IN_MEMORY } from '../db/schema';
import { FakeGenerator, TEST_VOCABULARY, VocabularyEmbedder } from '../test-utils/fakes';

const SKY = 'The sky is blue. The grass is green.';
const FRUIT = 'Bananas are yellow. Cherries are red.';

describe('RagService', () => {
  let rag: RagService;
  let generator: FakeGenerator;

  beforeEach(async () => {
    generator = new FakeGenerator();
    const config = resolveRagConfig({
      dbPath: IN_MEMORY,
      chunkSize: 200,
      chunkOverlap: 20,
      similarityThreshold: 0.1,
      llmModel: 'fake-chat-v1',
    });
    rag = new RagService(
      {
        store: new SqliteVectorStore(initializeDatabase(IN_MEMORY), { metric: 'cosine' }),
        embedder: new VocabularyEmbedder(),
        generator,
      },
      config
    );

    await rag.ingest({ kind: 'text', name: 'colors', text: SKY }, 'alice');
    await rag.ingest({ kind: 'text', name: 'fruit', text: FRUIT }, 'alice');
  });

  afterEach(() => {
    rag.close();
  });

  it('answers questions from the owner\'s documents', async () => {
    const result = await rag.ask('s1', 'What color is the sky?', 'alice');

    expect(result.answer).toBe('Answer to: What color is the sky?');
    expect(result.sources.map(s => [s.documentId, s.text])).toEqual([[documentIdFor('alice', 'colors'), SKY]]);
    expect(rag.getSession('alice', 's1')?.turns).toHaveLength(1);
  });

  it('searches within the owner and document scope', async () => {
    const all = await rag.search('What color is the sky?', 'alice');
    const fruitOnly = await rag.search('What color is the sky?', 'alice', {
      documentIds: [documentIdFor('alice', 'fruit')],
    });
    const bob = await rag.search('What color is the sky?', 'bob');

    expect(all.results.map(r => r.chunk.source)).toEqual(['colors']);
    expect(all.query).toBe('What color is the sky?');
    expect(fruitOnly.results).toEqual([]);
    expect(bob.results).toEqual([]);
  });

  it('lists and deletes documents per owner', async () => {
    const colorsId = documentIdFor('alice', 'colors');

    expect(rag.listDocuments('alice').map(d => d.source).sort()).toEqual(['colors', 'fruit']);
    expect(rag.listDocuments('bob')).toEqual([]);
    expect(rag.deleteDocument(colorsId, 'bob')).toBe(false);
    expect(rag.deleteDocument(colorsId, 'alice')).toBe(true);
    expect(rag.getDocument(colorsId, 'alice')).toBeUndefined();
    expect((await rag.search('What color is the sky?', 'alice')).results).toEqual([]);
  });

  it('reports status for the owner', () => {
    expect(rag.status('alice')).toEqual({
      status: 'online',
      documents: 2,
      document_chunks: 2,
      embedding_model: 'fake-embedding-v1',
      llm_model: 'fake-chat-v1',
      distance_metric: 'cosine',
      stored_model: { modelId: 'fake-embedding-v1', dimensions: TEST_VOCABULARY.length + 1 },
    });
    expect(rag.status('bob')).toMatchObject({ documents: 0, document_chunks: 0 });
  });

  it('forgets a session on reset', async () => {
    await rag.ask('s1', 'What color is the sky?', 'alice');

    expect(rag.resetSession('alice', 's1')).toBe(true);
    expect(rag.getSession('alice', 's1')).toBeUndefined();
    expect(generator.requests).toHaveLength(1);
  });

  it('keeps at most maxSessions sessions', async () => {
    const bounded = new RagService(
      {
        store: new SqliteVectorStore(initializeDatabase(IN_MEMORY), { metric: 'cosine' }),
        embedder: new VocabularyEmbedder(),
        generator: new FakeGenerator(),
      },
      resolveRagConfig({ similarityThreshold: 0.1, maxSessions: 1 })
    );

    await bounded.ask('s1', 'What color is the sky?', 'alice');
    await bounded.ask('s2', 'What color is the sky?', 'alice');

    expect(bounded.getSession('alice', 's1')).toBeUndefined();
    expect(bounded.getSession('alice', 's2')?.turns).toHaveLength(1);
    bounded.close();
  });
});
