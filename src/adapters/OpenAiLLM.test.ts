import { describe, expect, it } from 'vitest';
import type OpenAI from 'openai';
import { type ChatCompletionsClient, OpenAIChatAdapter } from './OpenAiLLM';
import { ConfigurationError, ProviderError } from '../errors';

const OPTIONS = { apiKey: 'test-key', model: 'test-chat', temperature: 0.1, maxTokens: 1000 };

function completion(content: string | null): OpenAI.ChatCompletion {
  return {
    id: 'cmpl-1',
    object: 'chat.completion',
    created: 0,
    model: 'test-chat',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

function clientReturning(reply: OpenAI.ChatCompletion | Error) {
  const bodies: OpenAI.ChatCompletionCreateParamsNonStreaming[] = [];
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        create: async (body) => {
          bodies.push(body);
          if (reply instanceof Error) throw reply;
          return reply;
        },
      },
    },
  };
  return { client, bodies };
}

describe('OpenAIChatAdapter', () => {
  it('sends the conversation with the configured defaults', async () => {
    const { client, bodies } = clientReturning(completion('Paris'));
    const llm = new OpenAIChatAdapter(OPTIONS, client);

    const answer = await llm.generateCompletion([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Capital of France?' },
    ]);

    expect(answer).toBe('Paris');
    expect(bodies).toEqual([
      {
        model: 'test-chat',
        messages: [
          { role: 'system', content: 'Be brief.' },
          { role: 'user', content: 'Capital of France?' },
        ],
        temperature: 0.1,
        max_tokens: 1000,
      },
    ]);
  });

  it('lets a call override temperature and token limit', async () => {
    const { client, bodies } = clientReturning(completion('ok'));

    await new OpenAIChatAdapter(OPTIONS, client).generateCompletion([{ role: 'user', content: 'hi' }], {
      temperature: 0,
      maxTokens: 50,
    });

    expect(bodies[0]).toMatchObject({ temperature: 0, max_tokens: 50 });
  });

  it('rejects a reply without content', async () => {
    const { client } = clientReturning(completion(null));

    await expect(new OpenAIChatAdapter(OPTIONS, client).generateCompletion([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      new ProviderError('Completion response contained no message content')
    );
  });

  it('wraps request failures', async () => {
    const { client } = clientReturning(new Error('timeout'));

    await expect(new OpenAIChatAdapter(OPTIONS, client).generateCompletion([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      'Completion request failed: timeout'
    );
  });

  it('needs an API key only when it is used', async () => {
    const llm = new OpenAIChatAdapter({ ...OPTIONS, apiKey: undefined });

    await expect(llm.generateCompletion([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(ConfigurationError);
  });
});
