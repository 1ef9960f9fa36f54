/**
 * OpenAI-compatible provider - Chat Completions over fetch.
 *
 * Works against any endpoint that speaks the same protocol (OpenAI, xAI, a local
 * gateway) by changing OPENAI_BASE_URL.
 */

import { z } from 'zod';
import logger from '../../utils/logger.js';
import type { CompletionRequest, TextGenerator } from './types.js';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .default([]),
});

export function createOpenAIGenerator(
  apiKey: string,
  model: string,
  baseUrl: string,
  fetchImpl: typeof fetch = fetch
): TextGenerator {
  const url = `${baseUrl.replace(/\/+$/, '')}/chat/completions`;

  return {
    provider: 'openai',

    async complete(request: CompletionRequest): Promise<string> {
      logger.debug('AI', `[OpenAI] ${model} via ${url}`);

      const response = await fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`OpenAI API error: ${response.status} - ${errorText}`);
      }

      const data = chatCompletionSchema.parse(await response.json());
      const content = data.choices[0]?.message.content;

      if (!content) {
        throw new Error('No content in OpenAI response');
      }

      return content;
    },
  };
}
