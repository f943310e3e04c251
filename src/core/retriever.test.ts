import { beforeEach, describe, expect, it } from 'vitest';
import { Retriever } from './retriever';
import { DocumentManager } from './document-manager';
import { InMemoryVectorStore } from '../adapters/InMemoryVectorStore';
import { FailingEmbedder, KeywordEmbedder } from '../testing/fakes';
import { ProviderError, ValidationError } from '../errors';

describe('Retriever', () => {
  let store: InMemoryVectorStore;
  let embedder: KeywordEmbedder;
  let retriever: Retriever;

  beforeEach(() => {
    embedder = new KeywordEmbedder(['hello', 'world', 'cats', 'dogs']);
    store = new InMemoryVectorStore(embedder.dimensions);
    retriever = new Retriever(store, embedder);
  });

  const seed = async () => {
    const manager = new DocumentManager(store, embedder);
    await manager.ingest('cats cats', 'cats.txt');
    await manager.ingest('cats dogs', 'pets.txt');
    await manager.ingest('hello world', 'greeting.txt');
  };

  it('returns an empty list for an empty store', async () => {
    expect(await retriever.retrieve('unrelated question')).toEqual([]);
  });

  it('returns chunks above the threshold, most similar first', async () => {
    await seed();

    const results = await retriever.retrieve('cats', { similarityThreshold: 0.7 });

    expect(results.map((r) => r.chunk.metadata.filename)).toEqual(['cats.txt', 'pets.txt']);
    expect(results[0].similarity).toBe(1);
    expect(results[1].similarity).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it('applies the default threshold of 0.7', async () => {
    await seed();

    const results = await retriever.retrieve('cats dogs dogs');

    // [0,0,1,2]: cats.txt scores 1/sqrt(5) ~ 0.447, pets.txt 3/sqrt(10) ~ 0.949
    expect(results.map((r) => r.chunk.metadata.filename)).toEqual(['pets.txt']);
  });

  it('honours topK', async () => {
    await seed();

    const results = await retriever.retrieve('cats', { topK: 1, similarityThreshold: 0 });

    expect(results.map((r) => r.chunk.metadata.filename)).toEqual(['cats.txt']);
  });

  it('validates input before embedding the question', async () => {
    await expect(retriever.retrieve('  ')).rejects.toBeInstanceOf(ValidationError);
    await expect(retriever.retrieve('cats', { topK: 0 })).rejects.toThrow('topK must be a positive integer, got 0');
    await expect(retriever.retrieve('cats', { similarityThreshold: 1.5 })).rejects.toBeInstanceOf(ValidationError);
    expect(embedder.calls).toEqual([]);
  });

  it('propagates provider failures', async () => {
    const failing = new Retriever(store, new FailingEmbedder(4, new ProviderError('provider down')));

    await expect(failing.retrieve('cats')).rejects.toThrow('provider down');
  });
});
