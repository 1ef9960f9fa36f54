import { cloneNode, type StoryRecord } from '@branching-stories/shared';
import { sortByRecent, StoryConflictError, type StoryRepository } from './storyRepository.js';

function copyRecord(story: StoryRecord): StoryRecord {
  return { ...story, root: cloneNode(story.root) };
}

// Process-local store; stories last as long as the server process
export class MemoryStoryRepository implements StoryRepository {
  private readonly stories = new Map<string, StoryRecord>();

  async get(id: string): Promise<StoryRecord | null> {
    const story = this.stories.get(id);
    return story ? copyRecord(story) : null;
  }

  async list(): Promise<StoryRecord[]> {
    return sortByRecent([...this.stories.values()].map(copyRecord));
  }

  async put(story: StoryRecord, expectedUpdatedAt?: string): Promise<void> {
    if (expectedUpdatedAt !== undefined && this.stories.get(story.id)?.updatedAt !== expectedUpdatedAt) {
      throw new StoryConflictError(story.id);
    }
    this.stories.set(story.id, copyRecord(story));
  }

  async delete(id: string): Promise<boolean> {
    return this.stories.delete(id);
  }
}
