/** Metadata keys every stored chunk carries. Caller metadata cannot overwrite them. */
export const RESERVED_METADATA_KEYS = ['filename', 'chunk_index', 'total_chunks', 'chunk_size'] as const;

export type ReservedMetadataKey = (typeof RESERVED_METADATA_KEYS)[number];

export interface ChunkMetadata {
  filename: string;
  chunk_index: number;
  total_chunks: number;
  chunk_size: number;
  [key: string]: unknown;
}

export interface NewChunk {
  content: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface StoredChunk extends NewChunk {
  id: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SearchResult {
  chunk: StoredChunk;
  similarity: number;
}

export interface SearchOptions {
  limit: number;
  /** Only results with a similarity strictly above this value are returned. */
  similarityThreshold: number;
}

export interface VectorStore {
  readonly dimensions: number;
  insertChunk(chunk: NewChunk): Promise<number>;
  /** Atomically swaps every chunk of `filename` for `chunks`. */
  replaceDocument(filename: string, chunks: NewChunk[]): Promise<number[]>;
  searchSimilar(queryEmbedding: number[], options: SearchOptions): Promise<SearchResult[]>;
  deleteByFilename(filename: string): Promise<number>;
  deleteAll(): Promise<number>;
  listAll(): Promise<StoredChunk[]>;
  listByFilename(filename: string): Promise<StoredChunk[]>;
  migrate(): Promise<void>;
  close(): Promise<void>;
}
