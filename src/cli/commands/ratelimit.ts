import { Command } from 'commander';
import chalk from 'chalk';
import { NotFoundError } from '../../errors.js';
import { formatTable, withRuntime } from '../shared.js';

export function createRateLimitCommand(): Command {
  const ratelimit = new Command('ratelimit').description('Inspect per-rule rate limiting');

  ratelimit
    .command('status')
    .description('Show rate-limit settings and each rule\'s alert count in the current window')
    .argument('[rule]', 'Limit output to one rule (ID or name)')
    .option('--json', 'Output as JSON')
    .action(async (ref: string | undefined, opts: { json?: boolean }) => {
      await withRuntime(async ({ stores, limiter }) => {
        let rules = await stores.rules.list();
        if (ref) {
          const rule = await stores.rules.findById(ref);
          if (!rule) throw new NotFoundError('Rule', ref);
          rules = [rule];
        }
        const config = limiter.getConfiguration();
        const statuses = rules.map((r) => ({ rule: r, status: limiter.getStatus(r.id) }));

        if (opts.json) {
          const rows = statuses.map((s) => ({ name: s.rule.name, ...s.status }));
          console.log(JSON.stringify({ configuration: config, rules: rows }, null, 2));
          return;
        }

        console.log(`Rate limiting: ${config.enabled ? chalk.green('enabled') : chalk.dim('disabled')}`);
        console.log(
          `  ${config.maxAlertsPerRule} alerts per rule per ${config.timeWindowMinutes}m, ` +
            `${config.cooldownMinutes}m cooldown`,
        );
        if (statuses.length === 0) return;
        console.log('');
        const header = ['RULE', 'IN WINDOW', 'LIMIT'];
        const plain = statuses.map((s) => [
          s.rule.name,
          String(s.status.alertsInWindow),
          String(s.status.maxAlertsPerRule),
        ]);
        const colored = statuses.map((s, i) => {
          const row = [...plain[i]];
          if (s.status.alertsInWindow >= s.status.maxAlertsPerRule) row[1] = chalk.red(row[1]);
          return row;
        });
        console.log(formatTable(header, plain, colored));
        console.log(chalk.dim('\nCooldowns live in the running monitor process and are not shown here.'));
      });
    });

  return ratelimit;
}
