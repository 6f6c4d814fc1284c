import { Command } from 'commander';
import chalk from 'chalk';
import { resolveRuleInput } from '../../rules/index.js';
import type { EvaluationTrace } from '../../rules/index.js';
import { audit } from '../../audit/index.js';
import { NotFoundError } from '../../errors.js';
import {
  formatTable,
  parseNumber,
  readAnomaly,
  severityChalk,
  splitList,
  withAnomalyOptions,
  withRuntime,
} from '../shared.js';
import type { AnomalyOptions } from '../shared.js';

function printTrace(trace: EvaluationTrace): void {
  const verdict = trace.triggered ? chalk.green('✓ TRIGGERED') : chalk.red('✗ NOT TRIGGERED');
  console.log(`${verdict}  rule ${chalk.bold(trace.ruleName)}, anomaly ${trace.anomalyId}`);
  for (const c of trace.checks) {
    const mark = c.passed ? chalk.green('✓') : chalk.red('✗');
    console.log(`  ${mark} ${c.check.padEnd(12)} expected ${c.expected}, got ${c.actual}`);
  }
}

export function createRulesCommand(): Command {
  const rules = new Command('rules').description('Manage alert rules');

  rules
    .command('list')
    .description('List alert rules')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async ({ stores }) => {
        const list = await stores.rules.list();
        if (opts.json) {
          console.log(JSON.stringify(list, null, 2));
          return;
        }
        if (list.length === 0) {
          console.log('No rules defined. Use "alertctl rules add" to create one.');
          return;
        }
        const header = ['ID', 'NAME', 'TYPE', 'SEVERITY', 'THRESHOLD', 'ENABLED', 'TRIGGERS'];
        const plain = list.map((r) => [
          r.id,
          r.name,
          r.type,
          r.severity,
          r.anomalyThreshold !== undefined ? r.anomalyThreshold.toFixed(2) : '-',
          r.enabled ? 'yes' : 'no',
          String(r.triggerCount),
        ]);
        const colored = list.map((r, i) => {
          const row = [...plain[i]];
          row[3] = severityChalk(r.severity)(r.severity);
          row[5] = r.enabled ? chalk.green('yes') : chalk.dim('no');
          return row;
        });
        console.log(formatTable(header, plain, colored));
      });
    });

  rules
    .command('add')
    .description('Create an alert rule')
    .requiredOption('--name <name>', 'Rule name')
    .option('--type <type>', 'Rule type', 'ANOMALY_DETECTION')
    .option('--severity <severity>', 'CRITICAL, HIGH, MEDIUM, LOW or INFO (default depends on type)')
    .option('--threshold <n>', 'Minimum anomaly confidence (0-1)')
    .option('--services <list>', 'Comma-separated service names to match')
    .option('--levels <list>', 'Comma-separated log levels to match')
    .option('--cooldown <minutes>', 'Minutes between alerts for this rule')
    .option('--channels <ids>', 'Comma-separated channel IDs to notify')
    .option('--description <text>', 'What the rule is for')
    .option('--disabled', 'Create the rule disabled')
    .action(
      async (opts: {
        name: string;
        type: string;
        severity?: string;
        threshold?: string;
        services?: string;
        levels?: string;
        cooldown?: string;
        channels?: string;
        description?: string;
        disabled?: boolean;
      }) => {
        await withRuntime(async ({ stores, config }) => {
          // Channels may be given by name; rules store ids
          const channelIds: string[] = [];
          for (const ref of splitList(opts.channels)) {
            const channel = await stores.channels.findById(ref);
            if (!channel) throw new NotFoundError('Channel', ref);
            channelIds.push(channel.id);
          }
          // Enum values are checked by the schema inside resolveRuleInput
          const input = resolveRuleInput(
            {
              name: opts.name,
              type: opts.type.toUpperCase(),
              severity: opts.severity?.toUpperCase(),
              anomalyThreshold:
                opts.threshold !== undefined ? parseNumber(opts.threshold, 'threshold') : undefined,
              services: splitList(opts.services),
              logLevels: splitList(opts.levels),
              cooldownMinutes:
                opts.cooldown !== undefined ? parseNumber(opts.cooldown, 'cooldown') : undefined,
              channelIds,
              description: opts.description,
              enabled: !opts.disabled,
            },
            config.rules,
          );
          const rule = await stores.rules.create(input);
          console.log(`Rule created: ${rule.name} (${rule.id})`);
          await audit('rule.add', { ruleId: rule.id, actor: 'cli', detail: { name: rule.name } });
        });
      },
    );

  withAnomalyOptions(
    rules.command('match').description('Dry run: which enabled rules would trigger for an anomaly'),
  ).action(async (opts: AnomalyOptions) => {
    await withRuntime(async ({ service }) => {
      const anomaly = await readAnomaly(opts);
      const matched = await service.getMatchingRules(anomaly);
      if (matched.length === 0) {
        console.log('No rules match.');
        return;
      }
      for (const r of matched) {
        console.log(`  ${chalk.bold(r.name)} ${severityChalk(r.severity)(r.severity)} ${chalk.dim(r.id)}`);
      }
    });
  });

  withAnomalyOptions(
    rules
      .command('test')
      .description('Explain how a rule evaluates an anomaly, check by check')
      .argument('<rule>', 'Rule ID or name'),
  ).action(async (ruleId: string, opts: AnomalyOptions) => {
    await withRuntime(async ({ stores, service }) => {
      const rule = await stores.rules.findById(ruleId);
      if (!rule) throw new NotFoundError('Rule', ruleId);
      printTrace(service.testRule(rule, await readAnomaly(opts)));
    });
  });

  for (const [name, enabled] of [
    ['enable', true],
    ['disable', false],
  ] as const) {
    rules
      .command(name)
      .description(`${enabled ? 'Enable' : 'Disable'} a rule`)
      .argument('<rule>', 'Rule ID or name')
      .action(async (ref: string) => {
        await withRuntime(async ({ stores }) => {
          const rule = await stores.rules.findById(ref);
          if (!rule) throw new NotFoundError('Rule', ref);
          await stores.rules.update(rule.id, { enabled });
          console.log(`Rule ${rule.name} ${enabled ? chalk.green('enabled') : chalk.yellow('disabled')}.`);
          await audit('rule.update', { ruleId: rule.id, actor: 'cli', detail: { enabled } });
        });
      });
  }

  rules
    .command('remove')
    .description('Delete a rule (its alerts are kept)')
    .argument('<rule>', 'Rule ID or name')
    .action(async (ref: string) => {
      await withRuntime(async ({ stores }) => {
        const rule = await stores.rules.findById(ref);
        if (!rule || !(await stores.rules.remove(rule.id))) throw new NotFoundError('Rule', ref);
        console.log(`Rule removed: ${rule.name}`);
        await audit('rule.remove', { ruleId: rule.id, actor: 'cli', detail: { name: rule.name } });
      });
    });

  return rules;
}
