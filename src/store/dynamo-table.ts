import {
  CreateTableCommand,
  DeleteItemCommand,
  DescribeTableCommand,
  GetItemCommand,
  PutItemCommand,
  QueryCommand,
} from '@aws-sdk/client-dynamodb';
import type { AttributeValue, DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { UpstreamUnavailableError } from '../errors.js';

export const PK = 'pk'; // partition key: entity kind, e.g. "RULE"
export const SK = 'sk'; // sort key: entity id

export type Item = Record<string, AttributeValue>;

export interface Versioned<T> {
  value: T;
  version: number;
}

const MAX_CONFLICT_RETRIES = 5;

export function isConditionalFailure(err: unknown): boolean {
  return err instanceof Error && err.name === 'ConditionalCheckFailedException';
}

/**
 * Single-table access shared by the DynamoDB stores. Entities are stored as a
 * JSON `data` attribute with a numeric `version` for optimistic concurrency.
 */
export class DynamoTable {
  constructor(
    readonly client: DynamoDBClient,
    readonly tableName: string,
  ) {}

  async ensureTable(): Promise<void> {
    try {
      await this.client.send(new DescribeTableCommand({ TableName: this.tableName }));
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'ResourceNotFoundException') {
        await this.client.send(
          new CreateTableCommand({
            TableName: this.tableName,
            KeySchema: [
              { AttributeName: PK, KeyType: 'HASH' },
              { AttributeName: SK, KeyType: 'RANGE' },
            ],
            AttributeDefinitions: [
              { AttributeName: PK, AttributeType: 'S' },
              { AttributeName: SK, AttributeType: 'S' },
            ],
            BillingMode: 'PAY_PER_REQUEST',
          }),
        );
      } else {
        throw new UpstreamUnavailableError(`DynamoDB table ${this.tableName}`, err);
      }
    }
  }

  /** Send a command, mapping transport failures to UpstreamUnavailableError. */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isConditionalFailure(err)) throw err;
      if (err instanceof Error && err.name === 'TransactionCanceledException') throw err;
      throw new UpstreamUnavailableError(`DynamoDB table ${this.tableName}`, err);
    }
  }

  async getItem(pk: string, sk: string): Promise<Item | undefined> {
    const result = await this.call(() =>
      this.client.send(
        new GetItemCommand({
          TableName: this.tableName,
          Key: { [PK]: { S: pk }, [SK]: { S: sk } },
          ConsistentRead: true,
        }),
      ),
    );
    return result.Item;
  }

  async deleteItem(pk: string, sk: string): Promise<boolean> {
    const result = await this.call(() =>
      this.client.send(
        new DeleteItemCommand({
          TableName: this.tableName,
          Key: { [PK]: { S: pk }, [SK]: { S: sk } },
          ReturnValues: 'ALL_OLD',
        }),
      ),
    );
    return result.Attributes !== undefined;
  }

  async queryAll(pk: string): Promise<Item[]> {
    const items: Item[] = [];
    let startKey: Item | undefined;
    do {
      const result = await this.call(() =>
        this.client.send(
          new QueryCommand({
            TableName: this.tableName,
            KeyConditionExpression: `${PK} = :pk`,
            ExpressionAttributeValues: { ':pk': { S: pk } },
            ExclusiveStartKey: startKey,
          }),
        ),
      );
      items.push(...(result.Items ?? []));
      startKey = result.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  entityItem<T>(pk: string, sk: string, value: T, version: number, extra: Item = {}): Item {
    return {
      [PK]: { S: pk },
      [SK]: { S: sk },
      data: { S: JSON.stringify(value) },
      version: { N: String(version) },
      ...extra,
    };
  }

  readEntity<T>(item: Item, parse: (raw: unknown) => T): Versioned<T> {
    const raw = item.data?.S;
    if (raw === undefined) {
      throw new UpstreamUnavailableError(`DynamoDB table ${this.tableName}`, 'item without data');
    }
    return { value: parse(JSON.parse(raw)), version: Number(item.version?.N ?? '0') };
  }

  async getEntity<T>(pk: string, sk: string, parse: (raw: unknown) => T): Promise<Versioned<T> | undefined> {
    const item = await this.getItem(pk, sk);
    return item ? this.readEntity(item, parse) : undefined;
  }

  async listEntities<T>(pk: string, parse: (raw: unknown) => T): Promise<T[]> {
    const items = await this.queryAll(pk);
    return items.map((item) => this.readEntity(item, parse).value);
  }

  async putNew<T>(pk: string, sk: string, value: T, extra: Item = {}): Promise<void> {
    await this.call(() =>
      this.client.send(
        new PutItemCommand({
          TableName: this.tableName,
          Item: this.entityItem(pk, sk, value, 1, extra),
          ConditionExpression: `attribute_not_exists(${PK})`,
        }),
      ),
    );
  }

  /**
   * Optimistic read-modify-write. `fn` sees the current value and returns the
   * replacement; a concurrent writer causes a re-read and another attempt.
   * Returns undefined when the item does not exist.
   */
  async mutate<T>(
    pk: string,
    sk: string,
    parse: (raw: unknown) => T,
    fn: (current: T) => T,
    extra: (next: T) => Item = () => ({}),
  ): Promise<T | undefined> {
    for (let attempt = 1; ; attempt++) {
      const current = await this.getEntity(pk, sk, parse);
      if (!current) return undefined;
      const next = fn(current.value);
      try {
        await this.call(() =>
          this.client.send(
            new PutItemCommand({
              TableName: this.tableName,
              Item: this.entityItem(pk, sk, next, current.version + 1, extra(next)),
              ConditionExpression: '#v = :v',
              ExpressionAttributeNames: { '#v': 'version' },
              ExpressionAttributeValues: { ':v': { N: String(current.version) } },
            }),
          ),
        );
        return next;
      } catch (err) {
        if (!isConditionalFailure(err)) throw err;
        if (attempt >= MAX_CONFLICT_RETRIES) {
          throw new UpstreamUnavailableError(
            `DynamoDB table ${this.tableName}`,
            `too much write contention on ${pk}/${sk}`,
          );
        }
      }
    }
  }
}
