import type { NewChunk, SearchOptions, SearchResult, StoredChunk, VectorStore } from '../ports/VectorStore';
import { StoreError } from '../errors';
import { assertDimensions, cosineSimilarity } from '../utils/vectors';

function copyChunk(chunk: StoredChunk): StoredChunk {
  return {
    ...chunk,
    embedding: [...chunk.embedding],
    metadata: { ...chunk.metadata },
  };
}

/**
 * Process-local store with brute-force cosine search. Nothing survives the
 * process, so it suits tests and programs that embed the pipeline.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly chunks = new Map<number, StoredChunk>();
  private nextId = 1;

  constructor(readonly dimensions: number, private readonly now: () => Date = () => new Date()) {}

  get size(): number {
    return this.chunks.size;
  }

  async migrate(): Promise<void> {}

  async insertChunk(chunk: NewChunk): Promise<number> {
    assertDimensions(chunk.embedding, this.dimensions);
    return this.store(chunk);
  }

  async replaceDocument(filename: string, chunks: NewChunk[]): Promise<number[]> {
    for (const chunk of chunks) {
      assertDimensions(chunk.embedding, this.dimensions);
      if (chunk.metadata.filename !== filename) {
        throw new StoreError(`Chunk filename "${chunk.metadata.filename}" does not match document "${filename}"`);
      }
    }

    this.removeWhere((chunk) => chunk.metadata.filename === filename);
    return chunks.map((chunk) => this.store(chunk));
  }

  async searchSimilar(queryEmbedding: number[], options: SearchOptions): Promise<SearchResult[]> {
    assertDimensions(queryEmbedding, this.dimensions);

    const scored: SearchResult[] = [];
    for (const chunk of this.chunks.values()) {
      // 1 - cosine distance
      const similarity = cosineSimilarity(queryEmbedding, chunk.embedding);
      if (similarity > options.similarityThreshold) {
        scored.push({ chunk: copyChunk(chunk), similarity });
      }
    }

    scored.sort((a, b) => b.similarity - a.similarity || a.chunk.id - b.chunk.id);
    return scored.slice(0, Math.max(0, options.limit));
  }

  async deleteByFilename(filename: string): Promise<number> {
    return this.removeWhere((chunk) => chunk.metadata.filename === filename);
  }

  async deleteAll(): Promise<number> {
    const count = this.chunks.size;
    this.chunks.clear();
    return count;
  }

  async listAll(): Promise<StoredChunk[]> {
    return [...this.chunks.values()].sort((a, b) => a.id - b.id).map(copyChunk);
  }

  async listByFilename(filename: string): Promise<StoredChunk[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.metadata.filename === filename)
      .sort((a, b) => a.metadata.chunk_index - b.metadata.chunk_index || a.id - b.id)
      .map(copyChunk);
  }

  async close(): Promise<void> {}

  private store(chunk: NewChunk): number {
    const id = this.nextId++;
    const timestamp = this.now();
    this.chunks.set(id, {
      id,
      content: chunk.content,
      embedding: [...chunk.embedding],
      metadata: { ...chunk.metadata },
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    return id;
  }

  private removeWhere(predicate: (chunk: StoredChunk) => boolean): number {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (predicate(chunk)) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }
}
