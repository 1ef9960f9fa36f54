import type { AIProvider, BranchEnding, BranchMode, StoryNode } from '@branching-stories/shared';

export type GenerationKind = 'initial' | 'branches';

export interface GenerationSettings {
  temperature: number;
  maxTokens: number;
  maxAttempts: number;
  retryDelayMs: number;
}

export interface BranchGenerationOptions {
  prompt: string;
  branchLength: number;
  mode: BranchMode;
  ending: BranchEnding['kind'];
  achievements: boolean;
}

export interface GenerationOutcome<T> {
  result: T;
  provider: AIProvider | 'fallback';
  usedFallback: boolean;
  attempts: number;
}

export type InitialStoryOutcome = GenerationOutcome<StoryNode>;
export type BranchesOutcome = GenerationOutcome<StoryNode[]>;
