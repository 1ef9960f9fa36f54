import { beforeEach, describe, it, expect, vi } from 'vitest';
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
import { DynamoStoryRepository, type StoryTableClient } from './dynamoStoryRepository.js';
import { StoryConflictError } from './storyRepository.js';

function record(id: string, updatedAt: string): StoryRecord {
  return {
    id,
    title: `Story ${id}`,
    prompt: 'A prompt',
    root: { name: 'Start', description: '', children: [] },
    provider: 'openai',
    createdAt: '2024-05-01T09:00:00.000Z',
    updatedAt,
  };
}

function item(story: StoryRecord): Record<string, unknown> {
  return { storyId: story.id, ...story };
}

function fakeTable() {
  return {
    get: vi.fn<(input: GetCommandInput) => Promise<GetCommandOutput>>(),
    scan: vi.fn<(input: ScanCommandInput) => Promise<ScanCommandOutput>>(),
    put: vi.fn<(input: PutCommandInput) => Promise<PutCommandOutput>>(),
    delete: vi.fn<(input: DeleteCommandInput) => Promise<DeleteCommandOutput>>(),
  } satisfies StoryTableClient;
}

describe('DynamoStoryRepository', () => {
  let table: ReturnType<typeof fakeTable>;
  let repository: DynamoStoryRepository;

  beforeEach(() => {
    table = fakeTable();
    repository = new DynamoStoryRepository(table, 'stories-test');
  });

  it('reads a story by key and drops the key attribute', async () => {
    const story = record('a', '2024-05-01T10:00:00.000Z');
    table.get.mockResolvedValue({ Item: item(story), $metadata: {} });

    expect(await repository.get('a')).toEqual(story);
    expect(table.get).toHaveBeenCalledWith({ TableName: 'stories-test', Key: { storyId: 'a' } });
  });

  it('returns null for a missing story', async () => {
    table.get.mockResolvedValue({ $metadata: {} });

    expect(await repository.get('missing')).toBeNull();
  });

  it('returns null for an item that no longer matches the record shape', async () => {
    table.get.mockResolvedValue({ Item: { storyId: 'a', title: 5 }, $metadata: {} });

    expect(await repository.get('a')).toBeNull();
  });

  it('joins every scan page, skips malformed items and sorts newest first', async () => {
    const older = record('older', '2024-05-01T10:00:00.000Z');
    const newer = record('newer', '2024-05-02T10:00:00.000Z');
    table.scan
      .mockResolvedValueOnce({
        Items: [item(older), { storyId: 'bad', title: 5 }],
        LastEvaluatedKey: { storyId: 'bad' },
        $metadata: {},
      })
      .mockResolvedValueOnce({ Items: [item(newer)], $metadata: {} });

    const stories = await repository.list();

    expect(stories.map(story => story.id)).toEqual(['newer', 'older']);
    expect(table.scan).toHaveBeenCalledTimes(2);
    expect(table.scan).toHaveBeenNthCalledWith(1, { TableName: 'stories-test', ExclusiveStartKey: undefined });
    expect(table.scan).toHaveBeenNthCalledWith(2, {
      TableName: 'stories-test',
      ExclusiveStartKey: { storyId: 'bad' },
    });
  });

  it('writes unconditionally when no timestamp is expected', async () => {
    const story = record('a', '2024-05-01T10:00:00.000Z');
    table.put.mockResolvedValue({ $metadata: {} });

    await repository.put(story);

    expect(table.put).toHaveBeenCalledWith({ TableName: 'stories-test', Item: item(story) });
  });

  it('conditions the write on the timestamp the caller read', async () => {
    const story = record('a', '2024-05-01T11:00:00.000Z');
    table.put.mockResolvedValue({ $metadata: {} });

    await repository.put(story, '2024-05-01T10:00:00.000Z');

    expect(table.put).toHaveBeenCalledWith({
      TableName: 'stories-test',
      Item: item(story),
      ConditionExpression: '#updatedAt = :expectedUpdatedAt',
      ExpressionAttributeNames: { '#updatedAt': 'updatedAt' },
      ExpressionAttributeValues: { ':expectedUpdatedAt': '2024-05-01T10:00:00.000Z' },
    });
  });

  it('turns a failed condition into a conflict', async () => {
    table.put.mockRejectedValue(
      new ConditionalCheckFailedException({ message: 'The conditional request failed', $metadata: {} })
    );

    await expect(
      repository.put(record('a', '2024-05-01T11:00:00.000Z'), '2024-05-01T10:00:00.000Z')
    ).rejects.toBeInstanceOf(StoryConflictError);
  });

  it('passes other write errors through', async () => {
    table.put.mockRejectedValue(new Error('throttled'));

    await expect(repository.put(record('a', '2024-05-01T11:00:00.000Z'))).rejects.toThrow('throttled');
  });

  it('reports whether a delete removed an item', async () => {
    table.delete
      .mockResolvedValueOnce({ Attributes: item(record('a', '2024-05-01T10:00:00.000Z')), $metadata: {} })
      .mockResolvedValueOnce({ $metadata: {} });

    expect(await repository.delete('a')).toBe(true);
    expect(await repository.delete('a')).toBe(false);
    expect(table.delete).toHaveBeenCalledWith({
      TableName: 'stories-test',
      Key: { storyId: 'a' },
      ReturnValues: 'ALL_OLD',
    });
  });
});
