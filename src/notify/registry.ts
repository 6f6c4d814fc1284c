import type { ChannelType, NotificationConfig } from '../types/index.js';
import type { Logger } from '../logging/index.js';
import { EmailDriver } from './email.js';
import type { MailTransport } from './email.js';
import { SlackDriver } from './slack.js';
import { WebhookDriver } from './webhook.js';
import type { NotificationDriver, Sleep } from './types.js';

export type DriverRegistry = ReadonlyMap<ChannelType, NotificationDriver>;

export interface DriverDeps {
  log: Logger;
  fetchFn?: typeof fetch;
  sleep?: Sleep;
  mailTransport?: MailTransport;
}

export function createDrivers(config: NotificationConfig, deps: DriverDeps): DriverRegistry {
  const drivers: NotificationDriver[] = [
    new EmailDriver(config.email, { transport: deps.mailTransport, log: deps.log }),
    new SlackDriver(config.slack, { fetchFn: deps.fetchFn, log: deps.log }),
    new WebhookDriver(config.webhook, {
      retry: config.retry,
      fetchFn: deps.fetchFn,
      sleep: deps.sleep,
      log: deps.log,
    }),
  ];
  return new Map(drivers.map((d): [ChannelType, NotificationDriver] => [d.type, d]));
}
