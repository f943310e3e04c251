import OpenAI from 'openai';
import type { Embedder } from '../ports/Embedder';
import { ConfigurationError, ProviderError, getErrorMessage } from '../errors';

export interface OpenAiEmbedderOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  dimensions: number;
  batchSize: number;
  timeoutMs?: number;
  maxRetries?: number;
}

/** The slice of the OpenAI client this adapter calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

/**
 * Embeds through the OpenAI embeddings endpoint, or any server that speaks it
 * (`baseURL`). The client is created on first use, so commands that never
 * embed run without an API key.
 */
export class OpenAiEmbedder implements Embedder {
  readonly dimensions: number;
  private clientInstance?: EmbeddingsClient;

  constructor(private readonly options: OpenAiEmbedderOptions, client?: EmbeddingsClient) {
    this.dimensions = options.dimensions;
    this.clientInstance = client;
  }

  private get client(): EmbeddingsClient {
    if (!this.clientInstance) {
      if (!this.options.apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY is not set');
      }
      this.clientInstance = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseURL,
        timeout: this.options.timeoutMs,
        maxRetries: this.options.maxRetries,
      });
    }
    return this.clientInstance;
  }

  async getEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.request([text]);
    return embedding;
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += this.options.batchSize) {
      const batch = texts.slice(i, i + this.options.batchSize);
      embeddings.push(...(await this.request(batch)));
    }
    return embeddings;
  }

  private async request(input: string[]): Promise<number[][]> {
    const client = this.client;
    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await client.embeddings.create({
        model: this.options.model,
        input,
        dimensions: this.dimensions,
      });
    } catch (error) {
      throw new ProviderError(`Embedding request failed: ${getErrorMessage(error)}`, error);
    }

    if (!Array.isArray(response?.data) || response.data.length !== input.length) {
      throw new ProviderError(
        `Embedding provider returned ${Array.isArray(response?.data) ? response.data.length : 'no'} vectors for ${input.length} inputs`
      );
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return ordered.map(({ embedding }) => this.validate(embedding));
  }

  private validate(embedding: unknown): number[] {
    if (!Array.isArray(embedding) || !embedding.every((value) => typeof value === 'number' && Number.isFinite(value))) {
      throw new ProviderError('Embedding provider returned a malformed vector');
    }
    if (embedding.length !== this.dimensions) {
      throw new ProviderError(`Unexpected embedding dimension: ${embedding.length}, expected ${this.dimensions}`);
    }
    return embedding;
  }
}
