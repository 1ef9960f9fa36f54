import type { StoryRecord } from '@branching-stories/shared';

export interface StoryRepository {
  get(id: string): Promise<StoryRecord | null>;
  list(): Promise<StoryRecord[]>;
  /**
   * Store a story. With `expectedUpdatedAt` the write only succeeds while the
   * stored copy still carries that timestamp; otherwise StoryConflictError.
   */
  put(story: StoryRecord, expectedUpdatedAt?: string): Promise<void>;
  delete(id: string): Promise<boolean>;
}

export class StoryConflictError extends Error {
  constructor(public readonly storyId: string) {
    super(`Story ${storyId} was changed by another request`);
    this.name = 'StoryConflictError';
  }
}

export function sortByRecent<T extends { updatedAt: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
}
