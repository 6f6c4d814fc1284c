import type { ChannelType } from '../types/index.js';
import { NotificationError, TransportTimeoutError, errorMessage } from '../errors.js';

export interface HttpSendOptions {
  method?: 'POST' | 'PUT' | 'PATCH';
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * Send a JSON body and require a 2xx response. Timeouts become
 * TransportTimeoutError; other failures become retryable NotificationErrors.
 */
export async function sendJson(
  channelType: ChannelType,
  url: string,
  body: unknown,
  opts: HttpSendOptions,
): Promise<number> {
  const fetchFn = opts.fetchFn ?? fetch;
  let res: Response;
  try {
    res = await fetchFn(url, {
      method: opts.method ?? 'POST',
      headers: { 'Content-Type': 'application/json', ...opts.headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (err) {
    if (isTimeout(err)) throw new TransportTimeoutError(channelType, opts.timeoutMs);
    throw new NotificationError(channelType, `Request failed: ${errorMessage(err)}`, {
      retryable: true,
      cause: err,
    });
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new NotificationError(
      channelType,
      `HTTP ${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`,
      { retryable: true },
    );
  }
  return res.status;
}

export function toNotificationError(channelType: ChannelType, err: unknown): NotificationError {
  if (err instanceof NotificationError) return err;
  return new NotificationError(channelType, errorMessage(err), { cause: err });
}
