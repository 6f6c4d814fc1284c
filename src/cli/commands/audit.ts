import { Command } from 'commander';
import chalk from 'chalk';
import { AuditAction, getAuditStore } from '../../audit/index.js';
import { ValidationError } from '../../errors.js';
import { formatTable, parseNumber, withRuntime } from '../shared.js';

export function createAuditCommand(): Command {
  const auditCmd = new Command('audit').description('Read the audit log');

  auditCmd
    .command('list')
    .description('List audit entries, newest first')
    .option('--action <action>', 'Filter by action, e.g. alert.suppressed')
    .option('--rule <id>', 'Filter by rule ID')
    .option('--alert <id>', 'Filter by alert ID')
    .option('--since <iso>', 'Only entries at or after this time')
    .option('--limit <n>', 'Maximum entries', '50')
    .option('--json', 'Output as JSON')
    .action(
      async (opts: {
        action?: string;
        rule?: string;
        alert?: string;
        since?: string;
        limit: string;
        json?: boolean;
      }) => {
        // The runtime selects the audit backend
        await withRuntime(async () => {
          let action: AuditAction | undefined;
          if (opts.action) {
            const parsed = AuditAction.safeParse(opts.action);
            if (!parsed.success) {
              throw new ValidationError(`Unknown action: ${opts.action}`, [
                `expected one of ${AuditAction.options.join(', ')}`,
              ]);
            }
            action = parsed.data;
          }
          const entries = await getAuditStore().query({
            action,
            ruleId: opts.rule,
            alertId: opts.alert,
            since: opts.since,
            limit: parseNumber(opts.limit, 'limit'),
          });
          if (opts.json) {
            console.log(JSON.stringify(entries, null, 2));
            return;
          }
          if (entries.length === 0) {
            console.log('No audit entries.');
            return;
          }
          const header = ['TIME', 'ACTION', 'ACTOR', 'SUBJECT', 'OK'];
          const plain = entries.map((e) => [
            e.timestamp,
            e.action,
            e.actor,
            e.alertId ?? e.ruleId ?? e.channelId ?? '-',
            e.success ? 'yes' : 'no',
          ]);
          const colored = entries.map((e, i) => {
            const row = [...plain[i]];
            row[4] = e.success ? chalk.green('yes') : chalk.red('no');
            return row;
          });
          console.log(formatTable(header, plain, colored));
        });
      },
    );

  return auditCmd;
}
