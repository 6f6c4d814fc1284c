import type { ZodError } from 'zod';
import type { AlertStatus, ChannelType } from './types/index.js';

export type AlertingErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'NOTIFICATION_FAILED'
  | 'TRANSPORT_TIMEOUT'
  | 'UPSTREAM_UNAVAILABLE'
  | 'DUPLICATE_ALERT';

export class AlertingError extends Error {
  readonly code: AlertingErrorCode;

  constructor(code: AlertingErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed rule, channel or config input. Rejected, never coerced. */
export class ValidationError extends AlertingError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }

  static fromZod(what: string, err: ZodError): ValidationError {
    return new ValidationError(
      `Invalid ${what}`,
      err.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)),
    );
  }
}

export class NotFoundError extends AlertingError {
  constructor(kind: string, id: string) {
    super('NOT_FOUND', `${kind} not found: ${id}`);
  }
}

export class InvalidTransitionError extends AlertingError {
  readonly from: AlertStatus;
  readonly to: AlertStatus;

  constructor(from: AlertStatus, to: AlertStatus, alertId?: string) {
    super(
      'INVALID_TRANSITION',
      `Cannot transition alert${alertId ? ` ${alertId}` : ''} from ${from} to ${to}`,
    );
    this.from = from;
    this.to = to;
  }
}

export class NotificationError extends AlertingError {
  readonly channelType: ChannelType;
  readonly retryable: boolean;

  constructor(
    channelType: ChannelType,
    message: string,
    opts: { retryable?: boolean; cause?: unknown; code?: AlertingErrorCode } = {},
  ) {
    super(opts.code ?? 'NOTIFICATION_FAILED', message, { cause: opts.cause });
    this.channelType = channelType;
    this.retryable = opts.retryable ?? false;
  }
}

export class TransportTimeoutError extends NotificationError {
  constructor(channelType: ChannelType, timeoutMs: number) {
    super(channelType, `Request timed out after ${timeoutMs}ms`, {
      retryable: true,
      code: 'TRANSPORT_TIMEOUT',
    });
  }
}

/** The anomaly feed or a store could not be reached. Ticks abort on this. */
export class UpstreamUnavailableError extends AlertingError {
  constructor(what: string, cause?: unknown) {
    super('UPSTREAM_UNAVAILABLE', `${what} unavailable: ${errorMessage(cause)}`, { cause });
  }
}

export class DuplicateAlertError extends AlertingError {
  readonly existingAlertId: string;

  constructor(ruleId: string, anomalyId: string, existingAlertId: string) {
    super('DUPLICATE_ALERT', `Alert already exists for rule ${ruleId} and anomaly ${anomalyId}`);
    this.existingAlertId = existingAlertId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
