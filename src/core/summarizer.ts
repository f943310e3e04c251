import type { ChatTurn, LLM } from '../ports/LLM';
import type { VectorStore } from '../ports/VectorStore';
import { getErrorMessage } from '../errors';
import { type ChunkOptions, chunkText } from './chunker';
import { logger } from '../utils/logger';

export interface SummaryResult {
  success: boolean;
  summary: string;
  /** Per-window summaries fed into the final combine step. */
  partialSummaries: string[];
}

const SUMMARY_WINDOW: Required<ChunkOptions> = { chunkSize: 4000, chunkOverlap: 200 };

function mapPrompt(text: string): ChatTurn[] {
  return [{ role: 'user', content: `Write a concise summary of the following:\n\n"${text}"\n\nCONCISE SUMMARY:` }];
}

function reducePrompt(summaries: string[]): ChatTurn[] {
  return [
    {
      role: 'user',
      content:
        'The following are summaries of consecutive parts of one document:\n\n' +
        `${summaries.join('\n\n')}\n\n` +
        'Combine them into a single concise summary of the whole document.\n\nCONCISE SUMMARY:',
    },
  ];
}

/**
 * Map-reduce summary of a stored document: summarise each window of the
 * reassembled text, then merge the partial summaries in one more call.
 */
export class DocumentSummarizer {
  constructor(
    private readonly vectorStore: VectorStore,
    private readonly llm: LLM,
    private readonly window: Required<ChunkOptions> = SUMMARY_WINDOW
  ) {}

  async summarize(filename: string): Promise<SummaryResult> {
    const chunks = await this.vectorStore.listByFilename(filename);
    if (chunks.length === 0) {
      return { success: false, summary: `No document found with filename: ${filename}`, partialSummaries: [] };
    }

    const text = chunks.map((chunk) => chunk.content).join('\n\n');
    const windows = await chunkText(text, this.window);
    logger.debug(`🧾 Summarizing ${filename} in ${windows.length} part(s)`);

    try {
      const partialSummaries: string[] = [];
      for (const window of windows) {
        partialSummaries.push((await this.llm.generateCompletion(mapPrompt(window))).trim());
      }

      const summary =
        partialSummaries.length === 1
          ? partialSummaries[0]
          : (await this.llm.generateCompletion(reducePrompt(partialSummaries))).trim();

      return { success: true, summary, partialSummaries };
    } catch (error) {
      logger.error(`❌ Failed to summarize document ${filename}: ${getErrorMessage(error)}`);
      return { success: false, summary: `Failed to summarize document: ${getErrorMessage(error)}`, partialSummaries: [] };
    }
  }
}
