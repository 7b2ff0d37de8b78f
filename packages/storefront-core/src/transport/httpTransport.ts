/**
 * HTTP message gateway client.
 *
 * POST {baseUrl}/messages with `{ user_id, message }`. 2xx is delivered;
 * 403/404/410 mean the user blocked us or no longer exists; 408, 429, 5xx
 * and network failures are transient.
 */

import { errorMessage } from '../errors';
import type { OutboundMessage, SendResult } from '../types/index';
import { logger } from '../utils/logger';
import type { Transport } from './types';

const BLOCKED_STATUSES = new Set([403, 404, 410]);

export interface HttpTransportOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class HttpTransport implements Transport {
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpTransportOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/messages`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(userId: string, message: OutboundMessage): Promise<SendResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ user_id: userId, message }),
        signal: controller.signal,
      });

      if (res.ok) return { status: 'delivered' };

      const detail = `Transport responded ${res.status}`;
      if (BLOCKED_STATUSES.has(res.status)) {
        return { status: 'blocked', error: detail };
      }
      return { status: 'transient_error', error: detail };
    } catch (error) {
      logger.debug('[Transport] Send failed', { userId, error: errorMessage(error) });
      return { status: 'transient_error', error: errorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}
