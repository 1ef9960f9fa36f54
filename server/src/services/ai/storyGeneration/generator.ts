import type { AIProvider, StoryNode } from '@branching-stories/shared';
import { countNodes } from '@branching-stories/shared';
import logger from '../../../utils/logger.js';
import type { ProviderRouter } from '../router.js';
import { fallbackBranches, fallbackInitialStory } from './fallback.js';
import { parseBranchesResponse, parseStoryResponse } from './parse.js';
import {
  buildBranchSystemPrompt,
  INITIAL_STORY_NODE_COUNT,
  INITIAL_STORY_SYSTEM_PROMPT,
} from './prompts.js';
import type {
  BranchesOutcome,
  BranchGenerationOptions,
  GenerationKind,
  GenerationSettings,
  InitialStoryOutcome,
} from './types.js';

// Helper to format duration
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

interface AttemptResult<T> {
  value: T;
  provider: AIProvider;
  attempts: number;
}

/**
 * Turns prompts into story trees.
 *
 * Each attempt is one provider call plus parsing; a parse failure counts as a
 * failed attempt. When every attempt fails the built-in fallback tree is
 * returned instead and flagged with `usedFallback`.
 */
export class StoryGenerator {
  constructor(
    private readonly router: ProviderRouter,
    private readonly settings: GenerationSettings,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  get isAvailable(): boolean {
    return this.router.providers.length > 0;
  }

  async generateInitialStory(prompt: string): Promise<InitialStoryOutcome> {
    try {
      const { value, provider, attempts } = await this.executeWithRetry('initial', async () => {
        const { text, provider } = await this.router.complete({
          system: INITIAL_STORY_SYSTEM_PROMPT,
          prompt,
          maxTokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
        });
        return { value: parseStoryResponse(text), provider };
      });

      const nodeCount = countNodes(value);
      if (nodeCount !== INITIAL_STORY_NODE_COUNT) {
        logger.warn('STORY_GEN', `Initial story has ${nodeCount} nodes, expected ${INITIAL_STORY_NODE_COUNT}`);
      }

      return { result: value, provider, usedFallback: false, attempts };
    } catch (error) {
      logger.error('STORY_GEN', 'Initial story generation failed, using fallback story', error);
      return {
        result: fallbackInitialStory(),
        provider: 'fallback',
        usedFallback: true,
        attempts: this.settings.maxAttempts,
      };
    }
  }

  async generateBranches(options: BranchGenerationOptions): Promise<BranchesOutcome> {
    const system = buildBranchSystemPrompt(options);

    try {
      const { value, provider, attempts } = await this.executeWithRetry('branches', async () => {
        const { text, provider } = await this.router.complete({
          system,
          prompt: options.prompt,
          maxTokens: this.settings.maxTokens,
          temperature: this.settings.temperature,
        });
        return { value: parseBranchesResponse(text), provider };
      });

      // A single-branch request that came back as several options keeps only the first
      const branches: StoryNode[] = options.mode === 'single' ? value.slice(0, 1) : value;
      return { result: branches, provider, usedFallback: false, attempts };
    } catch (error) {
      logger.error('STORY_GEN', 'Branch generation failed, using fallback branches', error);
      return {
        result: fallbackBranches(options.branchLength, options.mode),
        provider: 'fallback',
        usedFallback: true,
        attempts: this.settings.maxAttempts,
      };
    }
  }

  /**
   * Execute with exponential backoff: retryDelayMs, then double each time
   */
  private async executeWithRetry<T>(
    kind: GenerationKind,
    fn: () => Promise<{ value: T; provider: AIProvider }>
  ): Promise<AttemptResult<T>> {
    const maxAttempts = Math.max(1, this.settings.maxAttempts);
    let lastError: unknown = new Error(`Generation of ${kind} did not run`);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const startTime = Date.now();
      try {
        const { value, provider } = await fn();
        logger.info(
          'STORY_GEN',
          `Generated ${kind} with ${provider} (attempt ${attempt}/${maxAttempts}, ${formatDuration(Date.now() - startTime)})`
        );
        return { value, provider, attempts: attempt };
      } catch (error) {
        lastError = error;
        logger.warn('STORY_GEN', `Generation of ${kind} failed (attempt ${attempt}/${maxAttempts})`, error);

        if (attempt < maxAttempts) {
          const delay = this.settings.retryDelayMs * Math.pow(2, attempt - 1);
          logger.info('STORY_GEN', `Retrying in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }
}
