import { config } from '../config/index.js';
import logger from '../utils/logger.js';
import { createDocumentClient } from './db.js';
import { DynamoStoryRepository } from './dynamoStoryRepository.js';
import { MemoryStoryRepository } from './memoryStoryRepository.js';
import type { StoryRepository } from './storyRepository.js';

export { StoryConflictError, type StoryRepository } from './storyRepository.js';
export { MemoryStoryRepository } from './memoryStoryRepository.js';
export { DynamoStoryRepository, type StoryTableClient } from './dynamoStoryRepository.js';

export function createStoryRepository(storage: typeof config.storage = config.storage): StoryRepository {
  if (storage.driver === 'dynamodb') {
    logger.info('STORAGE', `Using DynamoDB table ${storage.tableName} (${storage.region})`);
    return new DynamoStoryRepository(createDocumentClient(storage), storage.tableName);
  }

  logger.info('STORAGE', 'Using in-memory story storage');
  return new MemoryStoryRepository();
}
