import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocument } from '@aws-sdk/lib-dynamodb';

export interface DynamoSettings {
  region: string;
  endpoint: string;
}

export function createDocumentClient(settings: DynamoSettings): DynamoDBDocument {
  const client = new DynamoDBClient({
    region: settings.region,
    // Empty endpoint means the regional AWS endpoint; set it for DynamoDB Local
    ...(settings.endpoint ? { endpoint: settings.endpoint } : {}),
  });

  return DynamoDBDocument.from(client, {
    marshallOptions: {
      removeUndefinedValues: true,
    },
  });
}
