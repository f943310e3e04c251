import { describe, expect, it } from 'vitest';
import { chunkText } from './chunker';
import { ConfigurationError } from '../errors';

const tokens = (count: number) => Array.from({ length: count }, (_, i) => `token${i}`).join(' ');

// Longest suffix of `a` that is also a prefix of `b`.
function sharedBoundary(a: string, b: string): number {
  for (let k = Math.min(a.length, b.length); k > 0; k--) {
    if (a.endsWith(b.slice(0, k))) return k;
  }
  return 0;
}

describe('chunkText', () => {
  it('returns the trimmed input as a single chunk when it fits', async () => {
    expect(await chunkText('  hello world \n', { chunkSize: 100, chunkOverlap: 10 })).toEqual(['hello world']);
  });

  it('returns no chunks for blank input', async () => {
    expect(await chunkText('   \n\n  ')).toEqual([]);
  });

  it('keeps every chunk within chunkSize and never empty', async () => {
    const chunks = await chunkText(tokens(200), { chunkSize: 100, chunkOverlap: 20 });

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.length).toBeGreaterThan(0);
      expect(chunk.length).toBeLessThanOrEqual(100);
    }
  });

  it('overlaps neighbouring chunks by at most chunkOverlap characters', async () => {
    const chunks = await chunkText(tokens(200), { chunkSize: 100, chunkOverlap: 20 });

    for (let i = 0; i < chunks.length - 1; i++) {
      const shared = sharedBoundary(chunks[i], chunks[i + 1]);
      expect(shared).toBeGreaterThan(0);
      expect(shared).toBeLessThanOrEqual(20);
    }
  });

  it('prefers paragraph breaks', async () => {
    const a = 'a'.repeat(40);
    const b = 'b'.repeat(40);
    const c = 'c'.repeat(40);

    const chunks = await chunkText(`${a}\n\n${b}\n\n${c}`, { chunkSize: 90, chunkOverlap: 0 });

    expect(chunks).toEqual([`${a}\n\n${b}`, c]);
  });

  it('falls back to character boundaries for unbroken text', async () => {
    const chunks = await chunkText('x'.repeat(250), { chunkSize: 100, chunkOverlap: 10 });

    expect(chunks.every((chunk) => chunk.length <= 100)).toBe(true);
    expect(chunks.join('').length).toBeGreaterThanOrEqual(250);
  });

  it('is deterministic', async () => {
    const text = `${tokens(150)}\n\n${tokens(80)}\n${tokens(40)}`;
    const options = { chunkSize: 120, chunkOverlap: 30 };

    expect(await chunkText(text, options)).toEqual(await chunkText(text, options));
  });

  it('rejects an overlap that is not smaller than the chunk size', async () => {
    await expect(chunkText('anything', { chunkSize: 100, chunkOverlap: 100 })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(chunkText('anything', { chunkSize: 100, chunkOverlap: 150 })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a non-positive chunk size', async () => {
    await expect(chunkText('anything', { chunkSize: 0, chunkOverlap: 0 })).rejects.toThrow('chunkSize must be a positive integer');
  });
});
