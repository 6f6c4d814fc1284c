export { createDrivers } from './registry.js';
export type { DriverRegistry, DriverDeps } from './registry.js';
export { EmailDriver, buildEmailHtml, buildEmailSubject } from './email.js';
export type { MailTransport, EmailDriverOptions } from './email.js';
export { SlackDriver, buildSlackMessage } from './slack.js';
export type { SlackMessage, SlackBlock, SlackDriverOptions } from './slack.js';
export { WebhookDriver, buildWebhookPayload, parseHeaders } from './webhook.js';
export type { WebhookPayload, WebhookDriverOptions } from './webhook.js';
export { severityEmoji, severityColor, summaryLine } from './format.js';
export { sendJson } from './http.js';
export type { NotificationDriver, SendResult, Sleep } from './types.js';
