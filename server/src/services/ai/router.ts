/**
 * AI Router - orders the configured providers and falls back between them
 *
 * The provider named by AI_PROVIDER goes first; every other provider with an
 * API key follows in a fixed order. A failed call is logged and retried on the
 * next provider; only the last failure reaches the caller.
 */

import type { AIProvider } from '@branching-stories/shared';
import { config } from '../../config/index.js';
import logger from '../../utils/logger.js';
import { createAnthropicGenerator } from './anthropic.js';
import { createGeminiGenerator } from './gemini.js';
import { createOpenAIGenerator } from './openai.js';
import type { CompletionRequest, CompletionResult, TextGenerator } from './types.js';

const PROVIDER_ORDER: AIProvider[] = ['openai', 'anthropic', 'gemini'];

export interface ProviderRouter {
  readonly providers: AIProvider[];
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export function orderProviders(preferred: AIProvider, available: AIProvider[]): AIProvider[] {
  const rest = PROVIDER_ORDER.filter(p => p !== preferred && available.includes(p));
  return available.includes(preferred) ? [preferred, ...rest] : rest;
}

export function routeGenerators(preferred: AIProvider, generators: TextGenerator[]): ProviderRouter {
  const byProvider = new Map(generators.map(g => [g.provider, g] as const));
  const order = orderProviders(preferred, [...byProvider.keys()]);
  const ordered = order.flatMap(p => {
    const generator = byProvider.get(p);
    return generator ? [generator] : [];
  });

  return {
    providers: order,

    async complete(request: CompletionRequest): Promise<CompletionResult> {
      if (ordered.length === 0) {
        throw new Error('No AI provider configured');
      }

      let lastError: unknown;
      for (const generator of ordered) {
        try {
          const text = await generator.complete(request);
          logger.info('AI', `[AI Router] ${generator.provider} returned ${text.length} chars`);
          return { text, provider: generator.provider };
        } catch (error) {
          lastError = error;
          logger.warn('AI', `[AI Router] ${generator.provider} failed, trying next provider`, error);
        }
      }

      throw lastError;
    },
  };
}

// Build generators for every provider that has an API key
export function createProviderRouter(aiConfig: typeof config.ai = config.ai): ProviderRouter {
  const generators: TextGenerator[] = [];

  if (aiConfig.openai.apiKey) {
    generators.push(
      createOpenAIGenerator(aiConfig.openai.apiKey, aiConfig.openai.model, aiConfig.openai.baseUrl)
    );
  }
  if (aiConfig.anthropic.apiKey) {
    generators.push(createAnthropicGenerator(aiConfig.anthropic.apiKey, aiConfig.anthropic.model));
  }
  if (aiConfig.gemini.apiKey) {
    generators.push(createGeminiGenerator(aiConfig.gemini.apiKey, aiConfig.gemini.model));
  }

  const router = routeGenerators(aiConfig.provider, generators);
  if (router.providers.length === 0) {
    logger.warn('AI', 'No AI provider API key configured; story generation is disabled');
  } else {
    logger.info('AI', `Provider order: ${router.providers.join(' -> ')}`);
  }
  return router;
}
