import type { Alert, AlertRule, ChannelType, NotificationChannel } from '../types/index.js';
import type { NotificationError } from '../errors.js';

export type SendResult =
  | { success: true; attempts: number }
  | { success: false; attempts: number; error: NotificationError };

/**
 * One implementation per channel type, chosen by the channel's `type` tag.
 * `send` reports failures in its result instead of throwing.
 */
export interface NotificationDriver {
  readonly type: ChannelType;
  isEnabled(): boolean;
  send(alert: Alert, rule: AlertRule, channel: NotificationChannel): Promise<SendResult>;
  /** Minimal synthetic message. Never touches channel counters. */
  testConnection(channel: NotificationChannel): Promise<boolean>;
}

export type Sleep = (ms: number) => Promise<void>;
