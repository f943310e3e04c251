import { StoreError } from '../errors';

export function assertDimensions(embedding: number[], dimensions: number): void {
  if (embedding.length !== dimensions) {
    throw new StoreError(`Invalid embedding dimension: expected ${dimensions}, got ${embedding.length}`);
  }
  if (!embedding.every((value) => Number.isFinite(value))) {
    throw new StoreError('Invalid embedding: every component must be a finite number');
  }
}

/**
 * Cosine similarity of two equal-length vectors; 0 when either has zero norm.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;
  return dot / denominator;
}
