import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import type {
  DeleteCommandInput,
  DeleteCommandOutput,
  GetCommandInput,
  GetCommandOutput,
  PutCommandInput,
  PutCommandOutput,
  ScanCommandInput,
  ScanCommandOutput,
} from '@aws-sdk/lib-dynamodb';
import type { StoryRecord } from '@branching-stories/shared';
import logger from '../utils/logger.js';
import { storyRecordSchema } from './schemas.js';
import { sortByRecent, StoryConflictError, type StoryRepository } from './storyRepository.js';

// The part of DynamoDBDocument the repository calls
export interface StoryTableClient {
  get(input: GetCommandInput): Promise<GetCommandOutput>;
  scan(input: ScanCommandInput): Promise<ScanCommandOutput>;
  put(input: PutCommandInput): Promise<PutCommandOutput>;
  delete(input: DeleteCommandInput): Promise<DeleteCommandOutput>;
}

/**
 * Stories table keyed by `storyId`. Each item is the whole story record,
 * tree included.
 */
export class DynamoStoryRepository implements StoryRepository {
  constructor(
    private readonly table: StoryTableClient,
    private readonly tableName: string
  ) {}

  async get(id: string): Promise<StoryRecord | null> {
    const result = await this.table.get({
      TableName: this.tableName,
      Key: { storyId: id },
    });
    if (!result.Item) return null;
    return this.toRecord(result.Item);
  }

  async list(): Promise<StoryRecord[]> {
    const stories: StoryRecord[] = [];
    let startKey: Record<string, unknown> | undefined;

    do {
      const page = await this.table.scan({
        TableName: this.tableName,
        ExclusiveStartKey: startKey,
      });
      for (const item of page.Items ?? []) {
        const story = this.toRecord(item);
        if (story) stories.push(story);
      }
      startKey = page.LastEvaluatedKey;
    } while (startKey);

    return sortByRecent(stories);
  }

  async put(story: StoryRecord, expectedUpdatedAt?: string): Promise<void> {
    const condition =
      expectedUpdatedAt === undefined
        ? {}
        : {
            ConditionExpression: '#updatedAt = :expectedUpdatedAt',
            ExpressionAttributeNames: { '#updatedAt': 'updatedAt' },
            ExpressionAttributeValues: { ':expectedUpdatedAt': expectedUpdatedAt },
          };

    try {
      await this.table.put({
        TableName: this.tableName,
        Item: { storyId: story.id, ...story },
        ...condition,
      });
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new StoryConflictError(story.id);
      }
      throw error;
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.table.delete({
      TableName: this.tableName,
      Key: { storyId: id },
      ReturnValues: 'ALL_OLD',
    });
    return result.Attributes !== undefined;
  }

  private toRecord(item: Record<string, unknown>): StoryRecord | null {
    const parsed = storyRecordSchema.safeParse(item);
    if (!parsed.success) {
      logger.warn('STORAGE', `Skipping malformed story item ${String(item.storyId)}`, parsed.error.issues);
      return null;
    }
    return parsed.data;
  }
}
