import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { ConfigurationError } from '../errors';

/** Paragraph, line, word, then character boundaries. */
export const CHUNK_SEPARATORS = ['\n\n', '\n', ' ', ''];

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface ChunkOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

export function validateChunkOptions(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(`chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`);
  }
}

/**
 * Split text into chunks of at most `chunkSize` characters, preferring
 * paragraph and line breaks over word and character boundaries. Neighbouring
 * chunks repeat up to `chunkOverlap` characters of each other.
 */
export async function chunkText(text: string, options: ChunkOptions = {}): Promise<string[]> {
  const { chunkSize = DEFAULT_CHUNK_SIZE, chunkOverlap = DEFAULT_CHUNK_OVERLAP } = options;
  validateChunkOptions(chunkSize, chunkOverlap);

  const trimmed = text.trim();
  if (!trimmed) return [];
  if (trimmed.length <= chunkSize) return [trimmed];

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize,
    chunkOverlap,
    separators: CHUNK_SEPARATORS,
  });

  const chunks = await splitter.splitText(trimmed);
  return chunks.map((chunk) => chunk.trim()).filter((chunk) => chunk.length > 0);
}
