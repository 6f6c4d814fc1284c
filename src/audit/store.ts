import type { AuditEntry, AuditQuery } from './types.js';

/**
 * Append-only record of rule, channel and alert actions, written by both the
 * dispatcher and operators. JsonAuditStore keeps it beside the other state
 * files; DynamoAuditStore uses its own `<prefix>-audit` table.
 */
export interface AuditStore {
  append(entry: AuditEntry): Promise<void>;

  /** Newest first, at most `query.limit` entries. */
  query(query: AuditQuery): Promise<AuditEntry[]>;

  get(id: string): Promise<AuditEntry | undefined>;
}
