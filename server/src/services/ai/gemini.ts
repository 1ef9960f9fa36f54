/**
 * Gemini provider - Google Generative AI SDK with a system instruction.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import logger from '../../utils/logger.js';
import type { CompletionRequest, TextGenerator } from './types.js';

export function createGeminiGenerator(apiKey: string, model: string): TextGenerator {
  const genAI = new GoogleGenerativeAI(apiKey);

  return {
    provider: 'gemini',

    async complete(request: CompletionRequest): Promise<string> {
      logger.debug('AI', `[Gemini] ${model}`);

      const generativeModel = genAI.getGenerativeModel({
        model,
        systemInstruction: request.system,
        generationConfig: {
          maxOutputTokens: request.maxTokens,
          temperature: request.temperature,
        },
      });

      const result = await generativeModel.generateContent(request.prompt);
      const content = result.response.text();

      if (!content) {
        throw new Error('No content in Gemini response');
      }

      return content;
    },
  };
}
