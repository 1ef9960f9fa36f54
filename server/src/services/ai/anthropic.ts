/**
 * Anthropic provider - Messages API through the official SDK.
 */

import Anthropic from '@anthropic-ai/sdk';
import logger from '../../utils/logger.js';
import type { CompletionRequest, TextGenerator } from './types.js';

export function createAnthropicGenerator(apiKey: string, model: string): TextGenerator {
  const client = new Anthropic({ apiKey });

  return {
    provider: 'anthropic',

    async complete(request: CompletionRequest): Promise<string> {
      logger.debug('AI', `[Anthropic] ${model}, max_tokens ${request.maxTokens}`);

      const response = await client.messages.create({
        model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });

      const textBlock = response.content.find(block => block.type === 'text');
      if (!textBlock || textBlock.type !== 'text') {
        throw new Error('No text content in Anthropic response');
      }

      return textBlock.text;
    },
  };
}
