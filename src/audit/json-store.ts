import { z } from 'zod';
import { JsonFile } from '../store/json-file.js';
import { AuditEntrySchema } from './types.js';
import type { AuditEntry, AuditQuery } from './types.js';
import type { AuditStore } from './store.js';

const AuditFileSchema = z.array(AuditEntrySchema);

export class JsonAuditStore implements AuditStore {
  private readonly file: JsonFile<AuditEntry[]>;

  constructor(dir?: string) {
    this.file = new JsonFile('audit.json', (raw) => AuditFileSchema.parse(raw), () => [], dir);
  }

  async append(entry: AuditEntry): Promise<void> {
    await this.file.update((entries) => ({ next: [...entries, entry], result: undefined }));
  }

  async query(query: AuditQuery): Promise<AuditEntry[]> {
    let entries = await this.file.read();

    if (query.action) {
      entries = entries.filter((e) => e.action === query.action);
    }
    if (query.ruleId) {
      entries = entries.filter((e) => e.ruleId === query.ruleId);
    }
    if (query.alertId) {
      entries = entries.filter((e) => e.alertId === query.alertId);
    }
    const since = query.since;
    if (since) {
      entries = entries.filter((e) => e.timestamp >= since);
    }

    // Most recent first
    entries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));

    return entries.slice(0, query.limit);
  }

  async get(id: string): Promise<AuditEntry | undefined> {
    const entries = await this.file.read();
    return entries.find((e) => e.id === id);
  }
}
