import type { Config } from '../types/index.js';
import { createDynamoDBClient } from '../aws/clients.js';
import { DynamoTable } from './dynamo-table.js';
import {
  DynamoAlertStore,
  DynamoChannelStore,
  DynamoRuleStore,
  DynamoWatermarkStore,
} from './dynamo-store.js';
import { JsonAlertStore, JsonChannelStore, JsonRuleStore, JsonWatermarkStore } from './json-store.js';
import type { AlertingStores } from './store.js';

/** Build the store set for the configured backend. */
export async function createStores(config: Config, dir?: string): Promise<AlertingStores> {
  if (config.storage === 'dynamodb') {
    const client = createDynamoDBClient(config);
    const table = new DynamoTable(client, `${config.dynamoTablePrefix}-alerting`);
    await table.ensureTable();
    const rules = new DynamoRuleStore(table);
    return {
      rules,
      channels: new DynamoChannelStore(table, rules),
      alerts: new DynamoAlertStore(table),
      watermark: new DynamoWatermarkStore(table),
    };
  }

  const rules = new JsonRuleStore(dir);
  return {
    rules,
    channels: new JsonChannelStore(rules, dir),
    alerts: new JsonAlertStore(dir),
    watermark: new JsonWatermarkStore(dir),
  };
}
