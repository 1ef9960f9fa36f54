import { describe, it, expect, vi } from 'vitest';
import type { AIProvider } from '@branching-stories/shared';
import { routeGenerators } from '../router.js';
import type { CompletionRequest, TextGenerator } from '../types.js';
import { StoryGenerator } from './generator.js';
import type { GenerationSettings } from './types.js';

const settings: GenerationSettings = {
  temperature: 0.7,
  maxTokens: 1000,
  maxAttempts: 2,
  retryDelayMs: 10,
};

function scripted(provider: AIProvider, replies: Array<string | Error>): TextGenerator & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = [];
  let call = 0;
  return {
    provider,
    requests,
    async complete(request) {
      requests.push(request);
      const reply = replies[Math.min(call++, replies.length - 1)];
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

const LINEAR_STORY = JSON.stringify({
  name: 'Rainy Day',
  description: 'It rains.',
  children: [{ name: 'Umbrella', description: 'Found one.', children: [] }],
});

describe('StoryGenerator.generateInitialStory', () => {
  it('returns the parsed tree and the provider that produced it', async () => {
    const fake = scripted('openai', [LINEAR_STORY]);
    const generator = new StoryGenerator(routeGenerators('openai', [fake]), settings, async () => {});

    const outcome = await generator.generateInitialStory('A rainy day');

    expect(outcome.usedFallback).toBe(false);
    expect(outcome.provider).toBe('openai');
    expect(outcome.attempts).toBe(1);
    expect(outcome.result.children[0].name).toBe('Umbrella');
    expect(fake.requests[0].prompt).toBe('A rainy day');
    expect(fake.requests[0].system).toContain('EXACTLY 5 nodes');
    expect(fake.requests[0].maxTokens).toBe(1000);
    expect(fake.requests[0].temperature).toBe(0.7);
  });

  it('retries after unparseable output with exponential backoff', async () => {
    const fake = scripted('anthropic', ['I cannot do JSON today', LINEAR_STORY]);
    const sleep = vi.fn(async (_ms: number) => {});
    const generator = new StoryGenerator(routeGenerators('anthropic', [fake]), settings, sleep);

    const outcome = await generator.generateInitialStory('A rainy day');

    expect(outcome.usedFallback).toBe(false);
    expect(outcome.attempts).toBe(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it('falls back to the built-in story once every attempt fails', async () => {
    const fake = scripted('gemini', [new Error('quota exceeded')]);
    const generator = new StoryGenerator(
      routeGenerators('gemini', [fake]),
      { ...settings, maxAttempts: 3 },
      async () => {}
    );

    const outcome = await generator.generateInitialStory('A rainy day');

    expect(outcome.usedFallback).toBe(true);
    expect(outcome.provider).toBe('fallback');
    expect(fake.requests).toHaveLength(3);
    expect(outcome.result.name).toBe("Student's Day");
  });
});

describe('StoryGenerator.generateBranches', () => {
  const options = {
    prompt: 'Source node: Lunch',
    branchLength: 3,
    ending: 'merge' as const,
    achievements: true,
  };

  it('keeps only the first branch in single mode', async () => {
    const fake = scripted('openai', ['[{"name": "A"}, {"name": "B"}]']);
    const generator = new StoryGenerator(routeGenerators('openai', [fake]), settings, async () => {});

    const outcome = await generator.generateBranches({ ...options, mode: 'single' });

    expect(outcome.result.map(b => b.name)).toEqual(['A']);
    expect(fake.requests[0].system).toContain('SINGLE new branch');
    expect(fake.requests[0].system).toContain('EXACTLY 3 nodes');
    expect(fake.requests[0].system).toContain('"achievement"');
  });

  it('returns every option in multiple mode', async () => {
    const fake = scripted('openai', ['[{"name": "A"}, {"name": "B"}, {"name": "C"}]']);
    const generator = new StoryGenerator(routeGenerators('openai', [fake]), settings, async () => {});

    const outcome = await generator.generateBranches({ ...options, mode: 'multiple', achievements: false });

    expect(outcome.result).toHaveLength(3);
    expect(fake.requests[0].system).toContain('Create 2-3 interesting and clearly distinct options.');
    expect(fake.requests[0].system).not.toContain('"achievement"');
  });

  it('falls back to Option A and Option B chains', async () => {
    const fake = scripted('openai', ['{}']);
    const generator = new StoryGenerator(routeGenerators('openai', [fake]), settings, async () => {});

    const outcome = await generator.generateBranches({ ...options, mode: 'multiple' });

    expect(outcome.usedFallback).toBe(true);
    expect(outcome.result.map(b => b.name)).toEqual(['Option A', 'Option B']);
    expect(outcome.result[0].children[0].name).toBe('Node 2 in Branch');
    expect(outcome.result[0].children[0].children[0].name).toBe('Final Node in Branch');
  });

  it('reports availability from the router', () => {
    expect(new StoryGenerator(routeGenerators('openai', []), settings).isAvailable).toBe(false);
  });
});
