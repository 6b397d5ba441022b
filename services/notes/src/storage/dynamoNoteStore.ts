import { DeleteCommand, PutCommand, QueryCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { getDynamo } from '../dynamo/client';
import { decodeNoteRecord } from '../codec/note';
import {
  alreadyExists,
  notFound,
  stored,
  storeUnavailable,
  type NoteStore,
  type StoreResult,
} from '../contracts/noteStore';
import type { NoteId, NoteRecord, NoteUpdate, Owner } from '../types';

const isConditionFailure = (err: unknown) =>
  err instanceof Error && err.name === 'ConditionalCheckFailedException';

/**
 * DynamoDB table with partition key `owner` and sort key `id`.
 * Existence is guarded with ConditionExpression so the check and the write are one request.
 */
export class DynamoNoteStore implements NoteStore {
  readonly backend = 'dynamodb';

  constructor(
    private readonly tableName: string,
    private readonly owner: Owner,
  ) {}

  async putIfAbsent(record: NoteRecord): Promise<StoreResult<void>> {
    try {
      await getDynamo().send(
        new PutCommand({
          TableName: this.tableName,
          Item: { ...record },
          ConditionExpression: 'attribute_not_exists(#id)',
          ExpressionAttributeNames: { '#id': 'id' },
        }),
      );
      return stored(undefined);
    } catch (err) {
      return isConditionFailure(err) ? alreadyExists() : storeUnavailable(err);
    }
  }

  async updateIfPresent(id: NoteId, fields: NoteUpdate): Promise<StoreResult<NoteRecord>> {
    let attributes: Record<string, unknown> | undefined;
    try {
      const res = await getDynamo().send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { owner: this.owner, id },
          UpdateExpression: 'SET #title = :title, #note = :note, #updated_at = :ts',
          ConditionExpression: 'attribute_exists(#id)',
          ExpressionAttributeNames: {
            '#id': 'id',
            '#title': 'title',
            '#note': 'note',
            '#updated_at': 'updated_at',
          },
          ExpressionAttributeValues: {
            ':title': fields.title,
            ':note': fields.note,
            ':ts': fields.updated_at,
          },
          ReturnValues: 'ALL_NEW',
        }),
      );
      attributes = res.Attributes;
    } catch (err) {
      return isConditionFailure(err) ? notFound() : storeUnavailable(err);
    }

    const record = decodeNoteRecord(attributes);
    if (!record) return storeUnavailable(new Error(`update of ${id} returned an incomplete note`));
    return stored(record);
  }

  async deleteIfPresent(id: NoteId): Promise<StoreResult<void>> {
    try {
      await getDynamo().send(
        new DeleteCommand({
          TableName: this.tableName,
          Key: { owner: this.owner, id },
          ConditionExpression: 'attribute_exists(#id)',
          ExpressionAttributeNames: { '#id': 'id' },
        }),
      );
      return stored(undefined);
    } catch (err) {
      return isConditionFailure(err) ? notFound() : storeUnavailable(err);
    }
  }

  async listByOwner(): Promise<StoreResult<NoteRecord[]>> {
    const items: NoteRecord[] = [];
    let startKey: Record<string, unknown> | undefined;
    try {
      do {
        const page = await getDynamo().send(
          new QueryCommand({
            TableName: this.tableName,
            KeyConditionExpression: '#owner = :owner',
            ExpressionAttributeNames: { '#owner': 'owner' },
            ExpressionAttributeValues: { ':owner': this.owner },
            ExclusiveStartKey: startKey,
          }),
        );
        for (const item of page.Items ?? []) {
          const record = decodeNoteRecord(item);
          if (!record) return storeUnavailable(new Error(`malformed note in ${this.tableName}`));
          items.push(record);
        }
        startKey = page.LastEvaluatedKey;
      } while (startKey);
    } catch (err) {
      return storeUnavailable(err);
    }
    return stored(items);
  }
}
