import { PutItemCommand, QueryCommand } from '@aws-sdk/client-dynamodb';
import type { AttributeValue, DynamoDBClient, QueryCommandInput } from '@aws-sdk/client-dynamodb';
import { DynamoTable, PK, SK } from '../store/dynamo-table.js';
import type { Item } from '../store/dynamo-table.js';
import { AuditEntrySchema } from './types.js';
import type { AuditEntry, AuditQuery } from './types.js';
import type { AuditStore } from './store.js';

const AUDIT = 'AUDIT'; // sk: "<timestamp>#<id>"

function toEntry(item: Item): AuditEntry {
  const detail = item.detail?.S;
  return AuditEntrySchema.parse({
    id: item.id?.S,
    timestamp: item.timestamp?.S,
    action: item.action?.S,
    actor: item.actor?.S,
    ruleId: item.ruleId?.S,
    alertId: item.alertId?.S,
    channelId: item.channelId?.S,
    detail: detail ? JSON.parse(detail) : undefined,
    success: item.success?.BOOL ?? true,
    error: item.error?.S,
  });
}

export class DynamoAuditStore implements AuditStore {
  private readonly table: DynamoTable;

  constructor(client: DynamoDBClient, tableName: string) {
    this.table = new DynamoTable(client, tableName);
  }

  async ensureTable(): Promise<void> {
    await this.table.ensureTable();
  }

  async append(entry: AuditEntry): Promise<void> {
    const item: Record<string, AttributeValue> = {
      [PK]: { S: AUDIT },
      [SK]: { S: `${entry.timestamp}#${entry.id}` },
      id: { S: entry.id },
      timestamp: { S: entry.timestamp },
      action: { S: entry.action },
      actor: { S: entry.actor },
      success: { BOOL: entry.success },
    };

    if (entry.ruleId) item.ruleId = { S: entry.ruleId };
    if (entry.alertId) item.alertId = { S: entry.alertId };
    if (entry.channelId) item.channelId = { S: entry.channelId };
    if (entry.error) item.error = { S: entry.error };
    if (entry.detail) item.detail = { S: JSON.stringify(entry.detail) };

    await this.table.call(() =>
      this.table.client.send(new PutItemCommand({ TableName: this.table.tableName, Item: item })),
    );
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    const values: Record<string, AttributeValue> = { ':pk': { S: AUDIT } };
    let keyCondition = `${PK} = :pk`;
    if (query.since) {
      keyCondition += ` AND ${SK} >= :since`;
      values[':since'] = { S: query.since };
    }

    const filters: string[] = [];
    if (query.action) {
      filters.push('#act = :action');
      values[':action'] = { S: query.action };
    }
    if (query.ruleId) {
      filters.push('ruleId = :ruleId');
      values[':ruleId'] = { S: query.ruleId };
    }
    if (query.alertId) {
      filters.push('alertId = :alertId');
      values[':alertId'] = { S: query.alertId };
    }

    const params: QueryCommandInput = {
      TableName: this.table.tableName,
      KeyConditionExpression: keyCondition,
      ExpressionAttributeValues: values,
      ScanIndexForward: false, // newest first
      ...(filters.length > 0 ? { FilterExpression: filters.join(' AND ') } : {}),
      ...(query.action ? { ExpressionAttributeNames: { '#act': 'action' } } : {}),
    };

    // Limit applies before FilterExpression, so page until enough entries match.
    const entries: AuditEntry[] = [];
    let startKey: Item | undefined;
    do {
      const result = await this.table.call(() =>
        this.table.client.send(new QueryCommand({ ...params, ExclusiveStartKey: startKey })),
      );
      entries.push(...(result.Items ?? []).map(toEntry));
      startKey = result.LastEvaluatedKey;
    } while (startKey && entries.length < query.limit);

    return entries.slice(0, query.limit);
  }

  async get(id: string): Promise<AuditEntry | undefined> {
    // The sort key is timestamp-first, so look the id up with a filter
    const items = await this.table.queryAll(AUDIT);
    const item = items.find((i) => i.id?.S === id);
    return item ? toEntry(item) : undefined;
  }
}
