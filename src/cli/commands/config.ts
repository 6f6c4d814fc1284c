import { Command } from 'commander';
import { getConfigPath } from '../../config/index.js';
import { withRuntime } from '../shared.js';

const REDACTED = '********';

export function createConfigCommand(): Command {
  const config = new Command('config').description('Show configuration');

  config
    .command('show')
    .description('Print the effective configuration (file plus environment overrides)')
    .action(async () => {
      await withRuntime(async ({ config: cfg }) => {
        const shown = structuredClone(cfg);
        if (shown.notification.email.smtp.pass) shown.notification.email.smtp.pass = REDACTED;
        console.log(JSON.stringify(shown, null, 2));
      });
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(getConfigPath());
    });

  return config;
}
