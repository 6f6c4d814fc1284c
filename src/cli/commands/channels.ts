import { Command } from 'commander';
import chalk from 'chalk';
import { ChannelConfigSchema } from '../../types/index.js';
import type { ChannelConfig } from '../../types/index.js';
import { audit } from '../../audit/index.js';
import { ValidationError } from '../../errors.js';
import { formatTable, splitList, withRuntime } from '../shared.js';

interface AddOptions {
  name: string;
  type: string;
  recipients?: string;
  url?: string;
  method: string;
  headers?: string;
  retry?: boolean;
  disabled?: boolean;
}

function rawChannelConfig(opts: AddOptions): Record<string, unknown> {
  switch (opts.type.toUpperCase()) {
    case 'EMAIL':
      return { type: 'EMAIL', recipients: splitList(opts.recipients) };
    case 'SLACK':
      return { type: 'SLACK', webhookUrl: opts.url };
    case 'WEBHOOK':
      return {
        type: 'WEBHOOK',
        url: opts.url,
        method: opts.method.toUpperCase(),
        headers: opts.headers,
        retryOnFailure: opts.retry,
      };
    default:
      throw new ValidationError(`Unknown channel type: ${opts.type} (expected EMAIL, SLACK or WEBHOOK)`);
  }
}

function target(cfg: ChannelConfig): string {
  switch (cfg.type) {
    case 'EMAIL':
      return cfg.recipients.join(', ') || '-';
    case 'SLACK':
      return cfg.webhookUrl ?? '-';
    case 'WEBHOOK':
      return cfg.url ? `${cfg.method} ${cfg.url}` : '-';
  }
}

export function createChannelsCommand(): Command {
  const channels = new Command('channels').description('Manage notification channels');

  channels
    .command('list')
    .description('List notification channels')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async ({ stores }) => {
        const list = await stores.channels.list();
        if (opts.json) {
          console.log(JSON.stringify(list, null, 2));
          return;
        }
        if (list.length === 0) {
          console.log('No channels defined. Use "alertctl channels add" to create one.');
          return;
        }
        const header = ['ID', 'NAME', 'TYPE', 'ENABLED', 'TARGET'];
        const plain = list.map((c) => [c.id, c.name, c.type, c.enabled ? 'yes' : 'no', target(c.configuration)]);
        const colored = list.map((c, i) => {
          const row = [...plain[i]];
          row[3] = c.enabled ? chalk.green('yes') : chalk.dim('no');
          return row;
        });
        console.log(formatTable(header, plain, colored));
      });
    });

  channels
    .command('add')
    .description('Create a notification channel')
    .requiredOption('--name <name>', 'Channel name')
    .requiredOption('--type <type>', 'EMAIL, SLACK or WEBHOOK')
    .option('--recipients <list>', 'Comma-separated email addresses (EMAIL)')
    .option('--url <url>', 'Webhook URL (SLACK, WEBHOOK)')
    .option('--method <method>', 'POST, PUT or PATCH (WEBHOOK)', 'POST')
    .option('--headers <json>', 'Custom headers as a JSON object (WEBHOOK)')
    .option('--no-retry', 'Do not retry failed sends (WEBHOOK)')
    .option('--disabled', 'Create the channel disabled')
    .action(async (opts: AddOptions) => {
      await withRuntime(async ({ stores }) => {
        const configuration = ChannelConfigSchema.safeParse(rawChannelConfig(opts));
        if (!configuration.success) throw ValidationError.fromZod('channel configuration', configuration.error);
        const channel = await stores.channels.create({
          name: opts.name,
          enabled: !opts.disabled,
          configuration: configuration.data,
        });
        console.log(`Channel created: ${channel.name} (${channel.id})`);
        await audit('channel.add', { channelId: channel.id, actor: 'cli', detail: { type: channel.type } });
      });
    });

  channels
    .command('test')
    .description('Send a test message through a channel')
    .argument('<channel>', 'Channel ID or name')
    .action(async (ref: string) => {
      await withRuntime(async ({ service }) => {
        const ok = await service.testChannel(ref, 'cli');
        if (ok) {
          console.log(chalk.green('✓ Test message delivered.'));
        } else {
          console.log(chalk.red('✗ Test failed. Check the channel configuration and logs.'));
          process.exitCode = 1;
        }
      });
    });

  channels
    .command('stats')
    .description('Show delivery counters per channel')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      await withRuntime(async ({ stores }) => {
        const list = await stores.channels.list();
        const rows = list.map((c) => ({
          id: c.id,
          name: c.name,
          type: c.type,
          successCount: c.successCount,
          failureCount: c.failureCount,
          lastSuccessAt: c.lastSuccessAt,
          lastFailureAt: c.lastFailureAt,
        }));
        if (opts.json) {
          console.log(JSON.stringify(rows, null, 2));
          return;
        }
        if (rows.length === 0) {
          console.log('No channels defined.');
          return;
        }
        const header = ['NAME', 'TYPE', 'OK', 'FAILED', 'LAST OK', 'LAST FAILURE'];
        const plain = rows.map((r) => [
          r.name,
          r.type,
          String(r.successCount),
          String(r.failureCount),
          r.lastSuccessAt ?? '-',
          r.lastFailureAt ?? '-',
        ]);
        const colored = rows.map((r, i) => {
          const row = [...plain[i]];
          row[2] = chalk.green(row[2]);
          if (r.failureCount > 0) row[3] = chalk.red(row[3]);
          return row;
        });
        console.log(formatTable(header, plain, colored));
      });
    });

  return channels;
}
