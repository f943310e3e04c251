import { Pool } from 'pg';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../errors';

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  /** Passing an error discards the connection instead of returning it to the pool. */
  release(error?: Error): void;
}

/** The part of a pg pool the stores use; tests substitute an in-process fake. */
export interface SqlPool {
  connect(): Promise<SqlClient>;
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  end(): Promise<void>;
}

export interface PoolOptions {
  connectionString: string;
  max: number;
}

export function createPool(options: PoolOptions): SqlPool {
  const pool = new Pool({
    connectionString: options.connectionString,
    max: options.max,
    idleTimeoutMillis: 30000, // Close idle clients after 30 seconds
    connectionTimeoutMillis: 2000,
  });

  // An idle client losing its connection must not take the process down.
  pool.on('error', (error) => {
    logger.error(`❌ Idle database client error: ${getErrorMessage(error)}`);
  });

  return {
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (error) => client.release(error),
      };
    },
    query: (text, values) => pool.query(text, values),
    end: () => pool.end(),
  };
}

export async function withTransaction<T>(pool: SqlPool, work: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  let broken: Error | undefined;

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error(`❌ Rollback failed: ${getErrorMessage(rollbackError)}`);
      broken = rollbackError instanceof Error ? rollbackError : new Error(getErrorMessage(rollbackError));
    }
    throw error;
  } finally {
    client.release(broken);
  }
}

export function toVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(',')}]`;
}

export function parseVectorLiteral(value: string | number[]): number[] {
  if (Array.isArray(value)) return value;
  const parsed: unknown = JSON.parse(value);
  if (!Array.isArray(parsed) || !parsed.every((item) => typeof item === 'number')) {
    throw new Error(`Malformed vector value: ${value.slice(0, 40)}`);
  }
  return parsed;
}
