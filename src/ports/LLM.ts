export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

export interface LLM {
  generateCompletion: (messages: ChatTurn[], options?: CompletionOptions) => Promise<string>;
}
