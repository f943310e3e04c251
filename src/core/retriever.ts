import type { Embedder } from '../ports/Embedder';
import type { SearchResult, VectorStore } from '../ports/VectorStore';
import { ValidationError } from '../errors';
import { logger } from '../utils/logger';

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.7;

export interface RetrieveOptions {
  topK?: number;
  similarityThreshold?: number;
}

/**
 * Embeds a question and asks the store for its nearest chunks. The store's
 * ranking is returned as is; `topK` and the threshold are enforced here so
 * every store sees the same policy.
 */
export class Retriever {
  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: Embedder,
    private readonly defaults: Required<RetrieveOptions> = {
      topK: DEFAULT_TOP_K,
      similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
    }
  ) {}

  async retrieve(question: string, options: RetrieveOptions = {}): Promise<SearchResult[]> {
    const topK = options.topK ?? this.defaults.topK;
    const similarityThreshold = options.similarityThreshold ?? this.defaults.similarityThreshold;

    if (!question.trim()) {
      throw new ValidationError('Question must not be empty');
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError(`topK must be a positive integer, got ${topK}`);
    }
    if (!Number.isFinite(similarityThreshold) || similarityThreshold < 0 || similarityThreshold > 1) {
      throw new ValidationError(`similarityThreshold must be between 0 and 1, got ${similarityThreshold}`);
    }

    const queryEmbedding = await this.embedder.getEmbedding(question);
    const results = await this.vectorStore.searchSimilar(queryEmbedding, { limit: topK, similarityThreshold });

    logger.debug(`🔍 ${results.length} chunk(s) above ${similarityThreshold} for "${question.slice(0, 60)}"`);
    return results.slice(0, topK);
  }
}
