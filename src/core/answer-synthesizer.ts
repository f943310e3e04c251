import type { ChatTurn, LLM } from '../ports/LLM';
import type { SearchResult } from '../ports/VectorStore';
import { getErrorMessage } from '../errors';
import { logger } from '../utils/logger';

export const NO_CONTEXT_ANSWER = "I couldn't find any relevant information to answer your question.";
export const INSUFFICIENT_CONTEXT_ANSWER = "I don't have enough information to answer this question.";
export const FAILED_ANSWER = 'I encountered an error while processing your question.';
export const EXCERPT_LENGTH = 200;

export interface Source {
  filename: string;
  excerpt: string;
  similarity: number;
}

export type AnswerStatus = 'answered' | 'no_context' | 'failed';

export interface Answer {
  status: AnswerStatus;
  answer: string;
  sources: Source[];
  /** Mean similarity of the chunks used; a rough grounding signal, not a probability. */
  confidence: number;
  /** Underlying failure when status is 'failed'. */
  error?: string;
}

export function excerpt(content: string, length = EXCERPT_LENGTH): string {
  return content.length > length ? `${content.slice(0, length)}...` : content;
}

export function computeConfidence(similarities: number[]): number {
  if (similarities.length === 0) return 0;
  const mean = similarities.reduce((sum, value) => sum + value, 0) / similarities.length;
  return Math.min(1, Math.max(0, mean));
}

export function buildPrompt(question: string, retrieved: SearchResult[]): ChatTurn[] {
  const context = retrieved.map((result) => result.chunk.content).join('\n\n');

  return [
    {
      role: 'system',
      content:
        'You are a helpful assistant that answers questions using only the provided context. ' +
        `If the answer cannot be found in the context, say "${INSUFFICIENT_CONTEXT_ANSWER}"`,
    },
    {
      role: 'user',
      content: `Context:\n${context}\n\nQuestion: ${question}`,
    },
  ];
}

export class AnswerSynthesizer {
  constructor(private readonly llm: LLM) {}

  async synthesize(question: string, retrieved: SearchResult[]): Promise<Answer> {
    if (retrieved.length === 0) {
      return { status: 'no_context', answer: NO_CONTEXT_ANSWER, sources: [], confidence: 0 };
    }

    let answer: string;
    try {
      answer = await this.llm.generateCompletion(buildPrompt(question, retrieved));
    } catch (error) {
      logger.error(`❌ Failed to answer question: ${getErrorMessage(error)}`);
      return { status: 'failed', answer: FAILED_ANSWER, sources: [], confidence: 0, error: getErrorMessage(error) };
    }

    return {
      status: 'answered',
      answer: answer.trim(),
      sources: retrieved.map((result) => ({
        filename: result.chunk.metadata.filename,
        excerpt: excerpt(result.chunk.content),
        similarity: result.similarity,
      })),
      confidence: computeConfidence(retrieved.map((result) => result.similarity)),
    };
  }
}
