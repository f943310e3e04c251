export interface Embedder {
  /** Length of every vector this embedder returns. */
  readonly dimensions: number;
  getEmbedding: (text: string) => Promise<number[]>;
  /** One vector per input, in input order. */
  getEmbeddings: (texts: string[]) => Promise<number[][]>;
}
