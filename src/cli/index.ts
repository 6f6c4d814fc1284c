#!/usr/bin/env node

import { Command } from 'commander';
import { createMonitorCommand } from './commands/monitor.js';
import { createRulesCommand } from './commands/rules.js';
import { createAlertsCommand } from './commands/alerts.js';
import { createChannelsCommand } from './commands/channels.js';
import { createRateLimitCommand } from './commands/ratelimit.js';
import { createAuditCommand } from './commands/audit.js';
import { createConfigCommand } from './commands/config.js';

const program = new Command('alertctl')
  .description('Anomaly alert rules, alert lifecycle and notification dispatch')
  .version('0.1.0');

program.addCommand(createMonitorCommand());
program.addCommand(createRulesCommand());
program.addCommand(createAlertsCommand());
program.addCommand(createChannelsCommand());
program.addCommand(createRateLimitCommand());
program.addCommand(createAuditCommand());
program.addCommand(createConfigCommand());

await program.parseAsync();
