import { randomUUID } from 'node:crypto';
import { getLogger } from '../logging/index.js';
import { errorMessage } from '../errors.js';
import { JsonAuditStore } from './json-store.js';
import type { AuditStore } from './store.js';
import type { AuditAction, AuditEntry } from './types.js';

let _store: AuditStore | undefined;

export function getAuditStore(): AuditStore {
  if (!_store) {
    _store = new JsonAuditStore();
  }
  return _store;
}

export function setAuditStore(store: AuditStore): void {
  _store = store;
}

/**
 * Log an audit event. Never throws; a failed write is reported as a warning.
 */
export async function audit(
  action: AuditAction,
  opts: {
    ruleId?: string;
    alertId?: string;
    channelId?: string;
    detail?: Record<string, unknown>;
    success?: boolean;
    error?: string;
    actor?: string;
  } = {},
): Promise<void> {
  const entry: AuditEntry = {
    id: randomUUID(),
    timestamp: new Date().toISOString(),
    action,
    actor: opts.actor ?? 'system',
    ruleId: opts.ruleId,
    alertId: opts.alertId,
    channelId: opts.channelId,
    detail: opts.detail,
    success: opts.success ?? true,
    error: opts.error,
  };

  try {
    await getAuditStore().append(entry);
  } catch (err) {
    // Audit logging should never break the main flow
    getLogger('audit').warn(`Failed to record ${action}`, { error: errorMessage(err) });
  }
}
