import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.embedding).toEqual({ model: 'text-embedding-3-small', dimensions: 1536, batchSize: 100 });
    expect(config.chat).toEqual({ model: 'gpt-4o-mini', temperature: 0.1, maxTokens: 1000 });
    expect(config.chunking).toEqual({ chunkSize: 1000, chunkOverlap: 200 });
    expect(config.retrieval).toEqual({ topK: 5, similarityThreshold: 0.7 });
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('coerces numeric variables and treats blank values as unset', () => {
    const config = loadConfig({ CHUNK_SIZE: '500', CHUNK_OVERLAP: '50', TOP_K: ' 8 ', OPENAI_API_KEY: '  ' });

    expect(config.chunking).toEqual({ chunkSize: 500, chunkOverlap: 50 });
    expect(config.retrieval.topK).toBe(8);
    expect(config.openai.apiKey).toBeUndefined();
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ TOP_K: '0', SIMILARITY_THRESHOLD: '2' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ TOP_K: '0', SIMILARITY_THRESHOLD: '2' })).toThrow(/TOP_K: .*; SIMILARITY_THRESHOLD: /);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100' })).toThrow(
      'Invalid configuration: CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100)'
    );
  });

  it('accepts the log level in any case', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });
});
