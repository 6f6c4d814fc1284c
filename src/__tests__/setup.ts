import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach } from 'vitest';
import { setAuditStore } from '../audit/index.js';
import { MemoryAuditStore } from './helpers.js';

// Keep tests away from the real ~/.alertctl
process.env.ALERTCTL_HOME = mkdtempSync(join(tmpdir(), 'alertctl-home-'));
process.env.ALERTCTL_LOG_LEVEL = 'silent';

beforeEach(() => {
  setAuditStore(new MemoryAuditStore());
});
