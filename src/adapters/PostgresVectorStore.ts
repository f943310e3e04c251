import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { NewChunk, SearchOptions, SearchResult, StoredChunk, VectorStore } from '../ports/VectorStore';
import { AppError, StoreError, getErrorMessage } from '../errors';
import { assertDimensions } from '../utils/vectors';
import { type SqlClient, type SqlPool, parseVectorLiteral, toVectorLiteral, withTransaction } from './pg';

export const DOCUMENTS_SCHEMA_PATH = path.join(__dirname, '..', '..', 'sql', 'documents.sql');

const INSERT_BATCH_SIZE = 100;
const COLUMNS_PER_ROW = 4;

const metadataSchema = z
  .object({
    filename: z.string(),
    chunk_index: z.number().int(),
    total_chunks: z.number().int(),
    chunk_size: z.number().int(),
  })
  .passthrough();

const chunkRowSchema = z.object({
  id: z.coerce.number().int(),
  content: z.string(),
  embedding: z.union([z.string(), z.array(z.number())]).transform(parseVectorLiteral),
  metadata: z.union([z.string().transform((raw): unknown => JSON.parse(raw)), z.record(z.unknown())]).pipe(metadataSchema),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const searchRowSchema = chunkRowSchema.extend({
  similarity: z.coerce.number(),
});

const idRowSchema = z.object({ id: z.coerce.number().int() });

function toStoredChunk(row: z.infer<typeof chunkRowSchema>): StoredChunk {
  return {
    id: row.id,
    content: row.content,
    embedding: row.embedding,
    metadata: row.metadata,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const SELECT_COLUMNS = 'id, content, embedding::text AS embedding, metadata, created_at, updated_at';

export interface PostgresVectorStoreOptions {
  dimensions: number;
  /** HNSW candidate list size used for every search. */
  efSearch?: number;
}

export class PostgresVectorStore implements VectorStore {
  readonly dimensions: number;
  private readonly efSearch: number;

  constructor(private readonly pool: SqlPool, options: PostgresVectorStoreOptions) {
    this.dimensions = options.dimensions;
    this.efSearch = options.efSearch ?? 40;
  }

  async migrate(): Promise<void> {
    const template = await fs.readFile(DOCUMENTS_SCHEMA_PATH, 'utf8');
    const ddl = template.replace(/\{\{dimensions\}\}/g, String(this.dimensions));
    await this.run('migrate the documents table', () => this.pool.query(ddl));
  }

  async insertChunk(chunk: NewChunk): Promise<number> {
    assertDimensions(chunk.embedding, this.dimensions);

    return this.run('store chunk', async () => {
      const result = await this.pool.query(
        `INSERT INTO documents (filename, content, embedding, metadata)
         VALUES ($1, $2, $3::vector, $4::jsonb)
         RETURNING id`,
        [chunk.metadata.filename, chunk.content, toVectorLiteral(chunk.embedding), JSON.stringify(chunk.metadata)]
      );
      return idRowSchema.parse(result.rows[0]).id;
    });
  }

  async replaceDocument(filename: string, chunks: NewChunk[]): Promise<number[]> {
    for (const chunk of chunks) {
      assertDimensions(chunk.embedding, this.dimensions);
      if (chunk.metadata.filename !== filename) {
        throw new StoreError(`Chunk filename "${chunk.metadata.filename}" does not match document "${filename}"`);
      }
    }

    return this.run(`replace document ${filename}`, () =>
      withTransaction(this.pool, async (client) => {
        await client.query('DELETE FROM documents WHERE filename = $1', [filename]);

        const ids: number[] = [];
        for (let i = 0; i < chunks.length; i += INSERT_BATCH_SIZE) {
          ids.push(...(await this.insertBatch(client, chunks.slice(i, i + INSERT_BATCH_SIZE))));
        }
        return ids;
      })
    );
  }

  private async insertBatch(client: SqlClient, batch: NewChunk[]): Promise<number[]> {
    const values: unknown[] = [];
    const placeholders: string[] = [];

    batch.forEach((chunk, index) => {
      const base = index * COLUMNS_PER_ROW;
      placeholders.push(`($${base + 1}, $${base + 2}, $${base + 3}::vector, $${base + 4}::jsonb)`);
      values.push(chunk.metadata.filename, chunk.content, toVectorLiteral(chunk.embedding), JSON.stringify(chunk.metadata));
    });

    const result = await client.query(
      `INSERT INTO documents (filename, content, embedding, metadata)
       VALUES ${placeholders.join(', ')}
       RETURNING id`,
      values
    );
    return result.rows.map((row) => idRowSchema.parse(row).id);
  }

  async searchSimilar(queryEmbedding: number[], options: SearchOptions): Promise<SearchResult[]> {
    assertDimensions(queryEmbedding, this.dimensions);

    return this.run('search documents', async () => {
      const client = await this.pool.connect();
      try {
        await client.query(`SET hnsw.ef_search = ${Math.trunc(this.efSearch)}`);
        const result = await client.query(
          `SELECT ${SELECT_COLUMNS},
                  1 - (embedding <=> $1::vector) AS similarity
           FROM documents
           WHERE 1 - (embedding <=> $1::vector) > $2
           ORDER BY embedding <=> $1::vector, id
           LIMIT $3`,
          [toVectorLiteral(queryEmbedding), options.similarityThreshold, options.limit]
        );
        return result.rows.map((raw) => {
          const row = searchRowSchema.parse(raw);
          return { chunk: toStoredChunk(row), similarity: row.similarity };
        });
      } finally {
        client.release();
      }
    });
  }

  async deleteByFilename(filename: string): Promise<number> {
    const result = await this.run(`delete document ${filename}`, () =>
      withTransaction(this.pool, (client) => client.query('DELETE FROM documents WHERE filename = $1', [filename]))
    );
    return result.rowCount ?? 0;
  }

  async deleteAll(): Promise<number> {
    const result = await this.run('delete all documents', () =>
      withTransaction(this.pool, (client) => client.query('DELETE FROM documents'))
    );
    return result.rowCount ?? 0;
  }

  async listAll(): Promise<StoredChunk[]> {
    return this.run('list documents', async () => {
      const result = await this.pool.query(`SELECT ${SELECT_COLUMNS} FROM documents ORDER BY id`);
      return result.rows.map((row) => toStoredChunk(chunkRowSchema.parse(row)));
    });
  }

  async listByFilename(filename: string): Promise<StoredChunk[]> {
    return this.run(`list chunks of ${filename}`, async () => {
      const result = await this.pool.query(
        `SELECT ${SELECT_COLUMNS} FROM documents
         WHERE filename = $1
         ORDER BY (metadata->>'chunk_index')::int, id`,
        [filename]
      );
      return result.rows.map((row) => toStoredChunk(chunkRowSchema.parse(row)));
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<T>(action: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new StoreError(`Failed to ${action}: ${getErrorMessage(error)}`, error);
    }
  }
}
