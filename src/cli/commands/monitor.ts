import { Command } from 'commander';
import chalk from 'chalk';
import type { TickSummary } from '../../monitor/index.js';
import { withRuntime } from '../shared.js';

function printSummary(s: TickSummary): void {
  const state = s.aborted ? chalk.red('aborted') : chalk.green('ok');
  console.log(`Tick ${state}  ${chalk.dim(`${s.startedAt} -> ${s.finishedAt}`)}`);
  console.log(`  Since:      ${s.since}`);
  console.log(`  Fetched:    ${s.fetched} (${s.critical} critical)`);
  console.log(`  Processed:  ${s.processed}`);
  console.log(`  Alerts:     ${s.alertsCreated}`);
  console.log(`  Suppressed: ${s.suppressed}`);
  console.log(`  Duplicates: ${s.duplicates}`);
  if (s.notificationFailures > 0) {
    console.log(`  ${chalk.yellow(`Notification failures: ${s.notificationFailures}`)}`);
  }
  if (s.errors > 0) console.log(`  ${chalk.red(`Errors: ${s.errors}`)}`);
  if (s.error) console.log(`  ${chalk.red(s.error)}`);
  console.log(`  Watermark:  ${s.watermark ?? chalk.dim('(none)')}`);
}

export function createMonitorCommand(): Command {
  const monitor = new Command('monitor').description('Run and inspect the anomaly monitor');

  monitor
    .command('run')
    .description('Poll the anomaly feed until interrupted')
    .action(async () => {
      await withRuntime(async ({ scheduler, log }) => {
        const stopped = new Promise<void>((resolve) => {
          const shutdown = (signal: string): void => {
            log.info(`Received ${signal}, shutting down`);
            scheduler
              .stop()
              .then(resolve)
              .catch((err: unknown) => {
                log.error('Shutdown failed', { error: String(err) });
                process.exitCode = 1;
                resolve();
              });
          };
          process.once('SIGINT', () => shutdown('SIGINT'));
          process.once('SIGTERM', () => shutdown('SIGTERM'));
        });
        scheduler.start();
        if (!scheduler.running) {
          console.error(chalk.yellow('Monitoring is disabled in config (monitoring.enabled).'));
          process.exitCode = 1;
          return;
        }
        await stopped;
      });
    });

  monitor
    .command('tick')
    .description('Run a single monitoring pass and print a summary')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async ({ scheduler }) => {
        const summary = await scheduler.tick();
        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printSummary(summary);
        }
        if (summary.aborted) process.exitCode = 1;
      });
    });

  monitor
    .command('status')
    .description('Show monitor configuration and watermark')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async ({ scheduler }) => {
        const status = await scheduler.getStatus();
        if (opts.json) {
          console.log(JSON.stringify(status, null, 2));
          return;
        }
        console.log(`Monitoring: ${status.enabled ? chalk.green('enabled') : chalk.dim('disabled')}`);
        console.log(`  Interval:  ${status.intervalMs}ms`);
        console.log(`  Lookback:  ${status.lookbackMinutes}m`);
        console.log(`  Batch:     ${status.batchSize}`);
        console.log(`  Watermark: ${status.watermark ?? chalk.dim('(not started)')}`);
      });
    });

  monitor
    .command('reset')
    .description('Rewind the watermark to one lookback window before now')
    .option('--by <actor>', 'Who is resetting', 'cli')
    .action(async (opts: { by: string }) => {
      await withRuntime(async ({ scheduler }) => {
        const to = await scheduler.resetWatermark(new Date(), opts.by);
        console.log(chalk.green(`Watermark reset to ${to}`));
      });
    });

  return monitor;
}
