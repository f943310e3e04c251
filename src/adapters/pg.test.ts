import { describe, expect, it } from 'vitest';
import { parseVectorLiteral, toVectorLiteral, withTransaction } from './pg';
import { FakePool, rows } from '../testing/fake-pool';

describe('withTransaction', () => {
  it('commits and returns the connection to the pool', async () => {
    const pool = new FakePool().reply(/^SELECT 1/, rows({ one: 1 }));

    const result = await withTransaction(pool, async (client) => (await client.query('SELECT 1')).rows);

    expect(result).toEqual([{ one: 1 }]);
    expect(pool.statements).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(pool.released).toBe(1);
    expect(pool.discarded).toEqual([]);
  });

  it('rolls back and rethrows the failure', async () => {
    const pool = new FakePool().reply(/^UPDATE/, new Error('constraint violated'));

    await expect(withTransaction(pool, (client) => client.query('UPDATE t SET x = 1'))).rejects.toThrow(
      'constraint violated'
    );
    expect(pool.statements).toEqual(['BEGIN', 'UPDATE t SET x = 1', 'ROLLBACK']);
    expect(pool.discarded).toEqual([]);
  });

  it('keeps the original error and discards the connection when the rollback fails', async () => {
    const pool = new FakePool()
      .reply(/^UPDATE/, new Error('constraint violated'))
      .reply(/^ROLLBACK/, new Error('connection lost'));

    await expect(withTransaction(pool, (client) => client.query('UPDATE t SET x = 1'))).rejects.toThrow(
      'constraint violated'
    );
    expect(pool.released).toBe(1);
    expect(pool.discarded.map((error) => error.message)).toEqual(['connection lost']);
  });
});

describe('vector literals', () => {
  it('formats and parses pgvector text', () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe('[0.5,-1,2]');
    expect(parseVectorLiteral('[0.5,-1,2]')).toEqual([0.5, -1, 2]);
    expect(parseVectorLiteral([1, 2])).toEqual([1, 2]);
  });

  it('rejects malformed text', () => {
    expect(() => parseVectorLiteral('["a"]')).toThrow('Malformed vector value: ["a"]');
  });
});
