export { JsonFile } from './json-file.js';
export {
  JsonRuleStore,
  JsonChannelStore,
  JsonAlertStore,
  JsonWatermarkStore,
  filterAlerts,
} from './json-store.js';
export { DynamoTable } from './dynamo-table.js';
export {
  DynamoRuleStore,
  DynamoChannelStore,
  DynamoAlertStore,
  DynamoWatermarkStore,
} from './dynamo-store.js';
export { createStores } from './factory.js';
export type {
  AlertingStores,
  AlertStore,
  ChannelStore,
  NotificationRecord,
  ResolvedRuleInput,
  RuleStore,
  WatermarkStore,
} from './store.js';
