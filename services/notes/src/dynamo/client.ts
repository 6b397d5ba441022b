import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { config } from '../config';

let client: DynamoDBDocumentClient | null = null;

export function getDynamo(): DynamoDBDocumentClient {
  if (!client) {
    const { region, endpoint } = config.store.dynamodb;
    client = DynamoDBDocumentClient.from(new DynamoDBClient({ region, endpoint }));
  }
  return client;
}

export function closeDynamo(): void {
  if (!client) return;
  client.destroy();
  client = null;
}
