export { audit, getAuditStore, setAuditStore } from './logger.js';
export { JsonAuditStore } from './json-store.js';
export { DynamoAuditStore } from './dynamo-store.js';
export type { AuditStore } from './store.js';
export { AuditAction, AuditEntrySchema, AuditQuerySchema } from './types.js';
export type { AuditEntry, AuditQuery } from './types.js';
