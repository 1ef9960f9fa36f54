import { describe, it, expect, vi } from 'vitest';
import { createOpenAIGenerator } from './openai.js';

const request = { system: 'You are a storyteller.', prompt: 'A rainy day', maxTokens: 1000, temperature: 0.7 };

describe('createOpenAIGenerator', () => {
  it('posts a chat completion and returns the first message', async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ choices: [{ message: { content: '{"name": "Rain"}' } }] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      })
    );
    const generator = createOpenAIGenerator('test-key', 'gpt-4o-mini', 'https://llm.example/v1/', fetchImpl);

    const text = await generator.complete(request);

    expect(text).toBe('{"name": "Rain"}');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://llm.example/v1/chat/completions');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      'Authorization': 'Bearer test-key',
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'You are a storyteller.' },
        { role: 'user', content: 'A rainy day' },
      ],
      max_tokens: 1000,
      temperature: 0.7,
    });
  });

  it('surfaces HTTP errors with the response body', async () => {
    const fetchImpl = vi.fn(async () => new Response('rate limited', { status: 429 }));
    const generator = createOpenAIGenerator('test-key', 'gpt-4o-mini', 'https://llm.example/v1', fetchImpl);

    await expect(generator.complete(request)).rejects.toThrow('OpenAI API error: 429 - rate limited');
  });

  it('rejects replies without content', async () => {
    const fetchImpl = vi.fn(async () => new Response(JSON.stringify({ choices: [] }), { status: 200 }));
    const generator = createOpenAIGenerator('test-key', 'gpt-4o-mini', 'https://llm.example/v1', fetchImpl);

    await expect(generator.complete(request)).rejects.toThrow('No content in OpenAI response');
  });
});
