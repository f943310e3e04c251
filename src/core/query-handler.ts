import type { ChatStore } from '../ports/ChatStore';
import { ConfigurationError } from '../errors';
import { type Answer, AnswerSynthesizer } from './answer-synthesizer';
import { type RetrieveOptions, Retriever } from './retriever';

export interface AskOptions extends RetrieveOptions {
  /** When set, the question and the answer are appended to this chat session. */
  sessionId?: number;
}

export class QueryHandler {
  constructor(
    private readonly retriever: Retriever,
    private readonly synthesizer: AnswerSynthesizer,
    private readonly chatStore?: ChatStore
  ) {}

  async ask(question: string, options: AskOptions = {}): Promise<Answer> {
    const { sessionId, ...retrieveOptions } = options;

    const answer = await this.answer(question, retrieveOptions);
    if (sessionId !== undefined && this.chatStore) {
      await this.record(this.chatStore, sessionId, question, answer);
    }
    return answer;
  }

  /**
   * Answer a question and open a chat session named `sessionName` for it. The
   * session is only created once an answer exists.
   */
  async askInNewSession(
    question: string,
    sessionName: string,
    options: RetrieveOptions = {}
  ): Promise<{ answer: Answer; sessionId: number }> {
    if (!this.chatStore) {
      throw new ConfigurationError('No chat store is configured');
    }

    const answer = await this.answer(question, options);
    const sessionId = await this.chatStore.createSession(sessionName);
    await this.record(this.chatStore, sessionId, question, answer);
    return { answer, sessionId };
  }

  private async answer(question: string, options: RetrieveOptions): Promise<Answer> {
    const retrieved = await this.retriever.retrieve(question, options);
    return this.synthesizer.synthesize(question, retrieved);
  }

  private async record(chatStore: ChatStore, sessionId: number, question: string, answer: Answer): Promise<void> {
    await chatStore.addMessage(sessionId, 'user', question);
    await chatStore.addMessage(sessionId, 'assistant', answer.answer, {
      status: answer.status,
      confidence: answer.confidence,
      sources: answer.sources,
    });
  }

  /** Filenames of the answer's sources, first occurrence order. */
  static sourceFiles(answer: Answer): string[] {
    return [...new Set(answer.sources.map((source) => source.filename))];
  }
}
