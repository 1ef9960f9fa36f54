import type { AIProvider } from '@branching-stories/shared';

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export interface TextGenerator {
  readonly provider: AIProvider;
  complete(request: CompletionRequest): Promise<string>;
}

export interface CompletionResult {
  text: string;
  provider: AIProvider;
}
