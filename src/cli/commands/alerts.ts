import { Command } from 'commander';
import chalk from 'chalk';
import { AlertStatus } from '../../types/index.js';
import type { Alert } from '../../types/index.js';
import type { DispatchResult } from '../../dispatch/index.js';
import { ValidationError } from '../../errors.js';
import { formatTable, parseNumber, severityChalk, withRuntime } from '../shared.js';

function statusChalk(status: AlertStatus): (s: string) => string {
  switch (status) {
    case 'OPEN':
      return chalk.red;
    case 'ACKNOWLEDGED':
      return chalk.yellow;
    case 'RESOLVED':
      return chalk.green;
    case 'FALSE_POSITIVE':
      return chalk.dim;
  }
}

function printAlert(a: Alert): void {
  console.log(chalk.bold(a.title));
  console.log(`  ID:        ${a.id}`);
  console.log(`  Rule:      ${a.alertRuleName} (${a.alertRuleId})`);
  console.log(`  Severity:  ${severityChalk(a.severity)(a.severity)}`);
  console.log(`  Status:    ${statusChalk(a.status)(a.status)}`);
  console.log(`  Service:   ${a.service ?? 'N/A'}`);
  console.log(`  Created:   ${a.createdAt}`);
  if (a.anomalyDetectionId) console.log(`  Anomaly:   ${a.anomalyDetectionId}`);
  if (a.acknowledgedAt) console.log(`  Acked:     ${a.acknowledgedAt} by ${a.acknowledgedBy ?? '?'}`);
  if (a.resolvedAt) console.log(`  Resolved:  ${a.resolvedAt} by ${a.resolvedBy ?? '?'}`);
  if (a.notes) console.log(`  Notes:     ${a.notes}`);
  const notified = a.notificationSent ? chalk.green('sent') : chalk.yellow('not sent');
  console.log(`  Notified:  ${notified}${a.notificationFailureCount > 0 ? ` (${a.notificationFailureCount} failures)` : ''}`);
  if (a.lastNotificationError) console.log(`  Last error: ${chalk.red(a.lastNotificationError)}`);
  console.log('');
  console.log(a.description.replace(/^/gm, '  '));
}

export function printDispatch(result: DispatchResult): void {
  const status =
    result.status === 'created'
      ? chalk.green(result.status)
      : result.status === 'created_with_failures'
        ? chalk.yellow(result.status)
        : chalk.dim(result.status);
  console.log(`Dispatch: ${status}${result.alertId ? ` alert ${result.alertId}` : ''}`);
  if (result.suppression) console.log(`  Suppressed by ${result.suppression}`);
  for (const o of result.outcomes) {
    const mark = o.success ? chalk.green('✓') : chalk.red('✗');
    const detail = o.error ? chalk.red(` ${o.error}`) : '';
    console.log(`  ${mark} ${o.channelName} (${o.channelType}, ${o.attempts} attempt(s))${detail}`);
  }
}

export function createAlertsCommand(): Command {
  const alerts = new Command('alerts').description('Inspect and act on alerts');

  alerts
    .command('list')
    .description('List alerts, newest first')
    .option('--status <status>', 'OPEN, ACKNOWLEDGED, RESOLVED or FALSE_POSITIVE')
    .option('--rule <id>', 'Only alerts for this rule ID')
    .option('--service <name>', 'Only alerts for this service')
    .option('--limit <n>', 'Maximum alerts to show', '50')
    .option('--json', 'Output as JSON')
    .action(
      async (opts: { status?: string; rule?: string; service?: string; limit: string; json?: boolean }) => {
        await withRuntime(async ({ alerts: service }) => {
          let status: AlertStatus | undefined;
          if (opts.status) {
            const parsed = AlertStatus.safeParse(opts.status.toUpperCase());
            if (!parsed.success) throw new ValidationError(`Unknown status: ${opts.status}`);
            status = parsed.data;
          }
          const list = await service.list({
            status,
            alertRuleId: opts.rule,
            service: opts.service,
            limit: parseNumber(opts.limit, 'limit'),
          });
          if (opts.json) {
            console.log(JSON.stringify(list, null, 2));
            return;
          }
          if (list.length === 0) {
            console.log('No alerts.');
            return;
          }
          const header = ['ID', 'SEVERITY', 'STATUS', 'RULE', 'SERVICE', 'CREATED'];
          const plain = list.map((a) => [
            a.id,
            a.severity,
            a.status,
            a.alertRuleName,
            a.service ?? '-',
            a.createdAt,
          ]);
          const colored = list.map((a, i) => {
            const row = [...plain[i]];
            row[1] = severityChalk(a.severity)(a.severity);
            row[2] = statusChalk(a.status)(a.status);
            return row;
          });
          console.log(formatTable(header, plain, colored));
        });
      },
    );

  alerts
    .command('show')
    .description('Show one alert')
    .argument('<id>', 'Alert ID')
    .option('--json', 'Output as JSON')
    .action(async (id: string, opts: { json?: boolean }) => {
      await withRuntime(async ({ alerts: service }) => {
        const alert = await service.get(id);
        if (opts.json) {
          console.log(JSON.stringify(alert, null, 2));
        } else {
          printAlert(alert);
        }
      });
    });

  alerts
    .command('create')
    .description('Raise a manual alert against a rule and notify its channels')
    .requiredOption('--rule <rule>', 'Rule ID or name')
    .requiredOption('--title <title>', 'Alert title')
    .option('--description <text>', 'Alert description', '')
    .option('--service <name>', 'Affected service')
    .option('--by <actor>', 'Who is raising the alert', 'cli')
    .action(
      async (opts: { rule: string; title: string; description: string; service?: string; by: string }) => {
        await withRuntime(async ({ dispatcher }) => {
          const result = await dispatcher.createManualAlert(opts.rule, {
            title: opts.title,
            description: opts.description,
            service: opts.service,
            actor: opts.by,
          });
          printDispatch(result);
        });
      },
    );

  alerts
    .command('ack')
    .description('Acknowledge an open alert')
    .argument('<id>', 'Alert ID')
    .option('--by <actor>', 'Who is acknowledging', 'cli')
    .action(async (id: string, opts: { by: string }) => {
      await withRuntime(async ({ alerts: service }) => {
        const alert = await service.acknowledge(id, opts.by);
        console.log(chalk.green(`Alert ${alert.id} acknowledged by ${opts.by}.`));
      });
    });

  alerts
    .command('resolve')
    .description('Resolve an alert')
    .argument('<id>', 'Alert ID')
    .option('--by <actor>', 'Who is resolving', 'cli')
    .option('--notes <text>', 'Resolution notes')
    .action(async (id: string, opts: { by: string; notes?: string }) => {
      await withRuntime(async ({ alerts: service }) => {
        const alert = await service.resolve(id, opts.by, opts.notes);
        console.log(chalk.green(`Alert ${alert.id} resolved by ${opts.by}.`));
      });
    });

  alerts
    .command('false-positive')
    .description('Mark an alert as a false positive')
    .argument('<id>', 'Alert ID')
    .option('--by <actor>', 'Who is marking it', 'cli')
    .option('--notes <text>', 'Why it is a false positive')
    .action(async (id: string, opts: { by: string; notes?: string }) => {
      await withRuntime(async ({ alerts: service }) => {
        const alert = await service.markFalsePositive(id, opts.by, opts.notes);
        console.log(chalk.green(`Alert ${alert.id} marked as false positive.`));
      });
    });

  alerts
    .command('stats')
    .description('Count alerts by status')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async ({ alerts: service }) => {
        const stats = await service.statistics();
        if (opts.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }
        console.log(`Total: ${chalk.bold(String(stats.total))}`);
        for (const status of AlertStatus.options) {
          console.log(`  ${statusChalk(status)(status.padEnd(15))} ${stats.byStatus[status]}`);
        }
      });
    });

  alerts
    .command('retry')
    .description('Re-send notifications for an alert whose fan-out failed')
    .argument('<id>', 'Alert ID')
    .action(async (id: string) => {
      await withRuntime(async ({ dispatcher }) => {
        const result = await dispatcher.retryNotifications(id);
        if (result.outcomes.length === 0) {
          console.log('Nothing to retry.');
          return;
        }
        printDispatch(result);
        if (result.status === 'created_with_failures') process.exitCode = 1;
      });
    });

  return alerts;
}
