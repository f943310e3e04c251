import type { Embedder } from '../ports/Embedder';
import { type ChunkMetadata, type NewChunk, RESERVED_METADATA_KEYS, type StoredChunk, type VectorStore } from '../ports/VectorStore';
import { ProviderError, ValidationError } from '../errors';
import { type ChunkOptions, chunkText } from './chunker';
import { logger } from '../utils/logger';

interface CallerMetadata {
  extras: Record<string, unknown>;
  overrides: Partial<Record<'chunk_index' | 'total_chunks' | 'chunk_size', number>>;
}

export interface DocumentSummary {
  filename: string;
  chunkCount: number;
  createdAt: Date;
  /** Document-level metadata; per-chunk keys are removed. */
  metadata: Record<string, unknown>;
}

const isReservedKey = (key: string): boolean => RESERVED_METADATA_KEYS.some((reserved) => reserved === key);

function documentMetadata(chunk: StoredChunk): Record<string, unknown> {
  return Object.fromEntries(Object.entries(chunk.metadata).filter(([key]) => !isReservedKey(key)));
}

/**
 * Owns documents as a whole: ingestion writes every chunk of a file or none
 * of them, and deletion always removes a file's complete chunk set.
 *
 * Calls for the same filename are not serialized here. Concurrent ingest and
 * delete of one file race, so callers must serialize per filename.
 */
export class DocumentManager {
  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: Embedder,
    private readonly chunking: ChunkOptions = {}
  ) {}

  async ingest(content: string, filename: string, extraMetadata: Record<string, unknown> = {}): Promise<boolean> {
    if (!filename.trim()) {
      throw new ValidationError('Filename must not be empty');
    }
    if (!content.trim()) {
      throw new ValidationError(`Document ${filename} has no text`);
    }

    const chunks = await chunkText(content, this.chunking);
    logger.info(`📦 Created ${chunks.length} chunks from ${filename}`);

    const embeddings = await this.embedder.getEmbeddings(chunks);
    if (embeddings.length !== chunks.length) {
      throw new ProviderError(`Expected ${chunks.length} embeddings for ${filename}, got ${embeddings.length}`);
    }

    const { extras, overrides } = this.callerMetadata(extraMetadata, filename);
    const documentChunks: NewChunk[] = chunks.map((chunk, index) => {
      const metadata: ChunkMetadata = {
        ...extras,
        filename,
        chunk_index: overrides.chunk_index ?? index,
        total_chunks: overrides.total_chunks ?? chunks.length,
        chunk_size: overrides.chunk_size ?? chunk.length,
      };
      return { content: chunk, embedding: embeddings[index], metadata };
    });

    logger.info(`💾 Inserting ${documentChunks.length} chunks from ${filename}`);
    await this.vectorStore.replaceDocument(filename, documentChunks);
    logger.success(`✅ Successfully processed ${filename}`);
    return true;
  }

  /** One summary per document; `filter` keeps names containing it, ignoring case. */
  async listDocuments(filter?: string): Promise<DocumentSummary[]> {
    const documents = new Map<string, DocumentSummary>();
    const needle = filter?.trim().toLowerCase() ?? '';

    for (const chunk of await this.vectorStore.listAll()) {
      if (needle && !chunk.metadata.filename.toLowerCase().includes(needle)) continue;
      const existing = documents.get(chunk.metadata.filename);
      if (existing) {
        existing.chunkCount++;
        continue;
      }
      documents.set(chunk.metadata.filename, {
        filename: chunk.metadata.filename,
        chunkCount: 1,
        createdAt: chunk.createdAt,
        metadata: documentMetadata(chunk),
      });
    }

    return [...documents.values()];
  }

  async getDocument(filename: string): Promise<DocumentSummary | null> {
    const chunks = await this.vectorStore.listByFilename(filename);
    if (chunks.length === 0) return null;

    const createdAt = chunks.reduce(
      (earliest, chunk) => (chunk.createdAt < earliest ? chunk.createdAt : earliest),
      chunks[0].createdAt
    );
    return { filename, chunkCount: chunks.length, createdAt, metadata: documentMetadata(chunks[0]) };
  }

  async deleteDocument(filename: string): Promise<boolean> {
    const deleted = await this.vectorStore.deleteByFilename(filename);
    if (deleted > 0) {
      logger.info(`🗑️  Deleted ${filename} (${deleted} chunks)`);
    }
    return deleted > 0;
  }

  async deleteAllDocuments(): Promise<number> {
    const deleted = await this.vectorStore.deleteAll();
    logger.info(`🗑️  Deleted ${deleted} chunks`);
    return deleted;
  }

  /**
   * Split caller metadata into open extension fields and overrides of the
   * numeric per-chunk defaults. `filename` always comes from the argument.
   */
  private callerMetadata(extraMetadata: Record<string, unknown>, filename: string): CallerMetadata {
    const extras: Record<string, unknown> = {};
    const overrides: CallerMetadata['overrides'] = {};

    for (const [key, value] of Object.entries(extraMetadata)) {
      if (key === 'filename') {
        if (value !== filename) {
          logger.warning(`⚠️  Ignoring metadata filename "${String(value)}" for ${filename}`);
        }
      } else if (key === 'chunk_index' || key === 'total_chunks' || key === 'chunk_size') {
        if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
          overrides[key] = value;
        } else {
          logger.warning(`⚠️  Ignoring metadata ${key}=${String(value)} for ${filename}: expected a non-negative integer`);
        }
      } else {
        extras[key] = value;
      }
    }
    return { extras, overrides };
  }
}
