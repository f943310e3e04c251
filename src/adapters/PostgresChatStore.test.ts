import { beforeEach, describe, expect, it } from 'vitest';
import { PostgresChatStore } from './PostgresChatStore';
import { FakePool, rows } from '../testing/fake-pool';
import { StoreError } from '../errors';

const T1 = '2024-06-01T08:00:00.000Z';
const T2 = '2024-06-02T08:00:00.000Z';

describe('PostgresChatStore', () => {
  let pool: FakePool;
  let store: PostgresChatStore;

  beforeEach(() => {
    pool = new FakePool();
    store = new PostgresChatStore(pool);
  });

  it('creates a session', async () => {
    pool.reply(/^INSERT INTO chat_sessions/, rows({ id: 4 }));

    expect(await store.createSession('Research')).toBe(4);
    expect(pool.queries[0].values).toEqual(['Research']);
  });

  it('lists sessions newest first with message counts', async () => {
    pool.reply(/FROM chat_sessions s LEFT JOIN/, rows({ id: 2, name: 'Later', created_at: T1, updated_at: T2, message_count: '3' }));

    const sessions = await store.listSessions();

    expect(pool.statements[0]).toContain('ORDER BY s.updated_at DESC, s.id DESC');
    expect(sessions).toEqual([
      { id: 2, name: 'Later', createdAt: new Date(T1), updatedAt: new Date(T2), messageCount: 3 },
    ]);
  });

  it('returns null for a missing session', async () => {
    expect(await store.getSession(99)).toBeNull();
    expect(pool.queries).toHaveLength(1);
  });

  it('loads a session with its messages in order', async () => {
    pool
      .reply(/FROM chat_sessions WHERE id = \$1/, rows({ id: 1, name: 'Chat', created_at: T1, updated_at: T2 }))
      .reply(
        /FROM chat_messages/,
        rows(
          { id: 10, session_id: 1, role: 'user', content: 'Hi?', metadata: {}, created_at: T1 },
          { id: 11, session_id: 1, role: 'assistant', content: 'Hello.', metadata: '{"confidence":0.8}', created_at: T2 }
        )
      );

    const session = await store.getSession(1);

    expect(session).toEqual({
      id: 1,
      name: 'Chat',
      createdAt: new Date(T1),
      updatedAt: new Date(T2),
      messages: [
        { id: 10, sessionId: 1, role: 'user', content: 'Hi?', metadata: {}, createdAt: new Date(T1) },
        { id: 11, sessionId: 1, role: 'assistant', content: 'Hello.', metadata: { confidence: 0.8 }, createdAt: new Date(T2) },
      ],
    });
  });

  it('adds a message and touches the session in one transaction', async () => {
    pool.reply(/^UPDATE chat_sessions SET updated_at/, { rows: [], rowCount: 1 }).reply(/^INSERT INTO chat_messages/, rows({ id: 21 }));

    const id = await store.addMessage(1, 'assistant', 'Answer', { sources: [] });

    expect(id).toBe(21);
    expect(pool.statements.map((sql) => sql.split(' ').slice(0, 2).join(' '))).toEqual([
      'BEGIN',
      'UPDATE chat_sessions',
      'INSERT INTO',
      'COMMIT',
    ]);
    expect(pool.queries[2].values).toEqual([1, 'assistant', 'Answer', '{"sources":[]}']);
  });

  it('refuses to add a message to a missing session', async () => {
    await expect(store.addMessage(9, 'user', 'Hello?')).rejects.toThrow(new StoreError('Chat session 9 does not exist'));
    expect(pool.statements.at(-1)).toBe('ROLLBACK');
  });

  it('renames and deletes sessions, reporting whether one matched', async () => {
    pool.reply(/^UPDATE chat_sessions SET name/, { rows: [], rowCount: 1 });

    expect(await store.renameSession(1, 'Renamed')).toBe(true);
    expect(await store.deleteSession(1)).toBe(false);
  });

  it('wraps driver failures', async () => {
    pool.reply(/^DELETE FROM chat_sessions/, new Error('connection refused'));

    await expect(store.deleteSession(1)).rejects.toThrow('Failed to delete chat session 1: connection refused');
  });
});
