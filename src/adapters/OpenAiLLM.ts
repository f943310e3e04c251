import OpenAI from 'openai';
import type { ChatTurn, CompletionOptions, LLM } from '../ports/LLM';
import { ConfigurationError, ProviderError, getErrorMessage } from '../errors';

export interface OpenAiChatOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs?: number;
  maxRetries?: number;
}

export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
    };
  };
}

function toMessageParam(turn: ChatTurn): OpenAI.ChatCompletionMessageParam {
  switch (turn.role) {
    case 'system':
      return { role: 'system', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
    case 'user':
      return { role: 'user', content: turn.content };
  }
}

export class OpenAIChatAdapter implements LLM {
  private clientInstance?: ChatCompletionsClient;

  constructor(private readonly options: OpenAiChatOptions, client?: ChatCompletionsClient) {
    this.clientInstance = client;
  }

  private get client(): ChatCompletionsClient {
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

  async generateCompletion(messages: ChatTurn[], options?: CompletionOptions): Promise<string> {
    const client = this.client;
    let response: OpenAI.ChatCompletion;
    try {
      response = await client.chat.completions.create({
        model: this.options.model,
        messages: messages.map(toMessageParam),
        temperature: options?.temperature ?? this.options.temperature,
        max_tokens: options?.maxTokens ?? this.options.maxTokens,
      });
    } catch (error) {
      throw new ProviderError(`Completion request failed: ${getErrorMessage(error)}`, error);
    }

    const content = response.choices[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new ProviderError('Completion response contained no message content');
    }
    return content;
  }
}
