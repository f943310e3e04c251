import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type {
  ChatMessage,
  ChatSession,
  ChatSessionSummary,
  ChatSessionWithMessages,
  ChatStore,
  MessageRole,
} from '../ports/ChatStore';
import { AppError, StoreError, getErrorMessage } from '../errors';
import { type SqlPool, withTransaction } from './pg';

export const CHAT_SCHEMA_PATH = path.join(__dirname, '..', '..', 'sql', 'chat.sql');

const sessionRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const sessionSummaryRowSchema = sessionRowSchema.extend({
  message_count: z.coerce.number().int(),
});

const messageRowSchema = z.object({
  id: z.coerce.number().int(),
  session_id: z.coerce.number().int(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  metadata: z.union([z.string().transform((raw): unknown => JSON.parse(raw)), z.record(z.unknown())]).pipe(z.record(z.unknown())),
  created_at: z.coerce.date(),
});

const idRowSchema = z.object({ id: z.coerce.number().int() });

function toSession(row: z.infer<typeof sessionRowSchema>): ChatSession {
  return { id: row.id, name: row.name, createdAt: row.created_at, updatedAt: row.updated_at };
}

function toMessage(row: z.infer<typeof messageRowSchema>): ChatMessage {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    metadata: row.metadata,
    createdAt: row.created_at,
  };
}

export class PostgresChatStore implements ChatStore {
  constructor(private readonly pool: SqlPool) {}

  async migrate(): Promise<void> {
    const ddl = await fs.readFile(CHAT_SCHEMA_PATH, 'utf8');
    await this.run('migrate the chat tables', () => this.pool.query(ddl));
  }

  async createSession(name: string): Promise<number> {
    return this.run('create chat session', async () => {
      const result = await this.pool.query('INSERT INTO chat_sessions (name) VALUES ($1) RETURNING id', [name]);
      return idRowSchema.parse(result.rows[0]).id;
    });
  }

  async listSessions(): Promise<ChatSessionSummary[]> {
    return this.run('list chat sessions', async () => {
      const result = await this.pool.query(
        `SELECT s.id, s.name, s.created_at, s.updated_at, COUNT(m.id) AS message_count
         FROM chat_sessions s
         LEFT JOIN chat_messages m ON m.session_id = s.id
         GROUP BY s.id
         ORDER BY s.updated_at DESC, s.id DESC`
      );
      return result.rows.map((raw) => {
        const row = sessionSummaryRowSchema.parse(raw);
        return { ...toSession(row), messageCount: row.message_count };
      });
    });
  }

  async getSession(id: number): Promise<ChatSessionWithMessages | null> {
    return this.run(`load chat session ${id}`, async () => {
      const sessions = await this.pool.query(
        'SELECT id, name, created_at, updated_at FROM chat_sessions WHERE id = $1',
        [id]
      );
      if (sessions.rows.length === 0) return null;

      const messages = await this.pool.query(
        `SELECT id, session_id, role, content, metadata, created_at
         FROM chat_messages
         WHERE session_id = $1
         ORDER BY id`,
        [id]
      );
      return {
        ...toSession(sessionRowSchema.parse(sessions.rows[0])),
        messages: messages.rows.map((row) => toMessage(messageRowSchema.parse(row))),
      };
    });
  }

  async addMessage(
    sessionId: number,
    role: MessageRole,
    content: string,
    metadata: Record<string, unknown> = {}
  ): Promise<number> {
    return this.run(`add message to session ${sessionId}`, () =>
      withTransaction(this.pool, async (client) => {
        const touched = await client.query('UPDATE chat_sessions SET updated_at = now() WHERE id = $1', [sessionId]);
        if (!touched.rowCount) {
          throw new StoreError(`Chat session ${sessionId} does not exist`);
        }
        const result = await client.query(
          `INSERT INTO chat_messages (session_id, role, content, metadata)
           VALUES ($1, $2, $3, $4::jsonb)
           RETURNING id`,
          [sessionId, role, content, JSON.stringify(metadata)]
        );
        return idRowSchema.parse(result.rows[0]).id;
      })
    );
  }

  async renameSession(id: number, name: string): Promise<boolean> {
    const result = await this.run(`rename chat session ${id}`, () =>
      this.pool.query('UPDATE chat_sessions SET name = $2, updated_at = now() WHERE id = $1', [id, name])
    );
    return (result.rowCount ?? 0) > 0;
  }

  async deleteSession(id: number): Promise<boolean> {
    const result = await this.run(`delete chat session ${id}`, () =>
      this.pool.query('DELETE FROM chat_sessions WHERE id = $1', [id])
    );
    return (result.rowCount ?? 0) > 0;
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
