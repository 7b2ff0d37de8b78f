/**
 * Best-effort notifications to buyers and owners.
 *
 * Each message gets the bounded retry policy; a permanent failure marks the
 * recipient blocked. Nothing here throws into the caller.
 */

import { errorMessage, PermanentDeliveryError } from '../errors';
import type { RecipientStore } from '../stores/types';
import { isTransientDeliveryError, sendOrThrow } from '../transport/send';
import type { Transport } from '../transport/types';
import type { OutboundMessage } from '../types/index';
import { logger } from '../utils/logger';
import { retryWithBackoff } from '../utils/retry';
import type { RetryPolicy } from '../utils/retry';

export type NotifyOutcome = 'delivered' | 'blocked' | 'failed';

export class Notifier {
  private readonly pending = new Set<Promise<NotifyOutcome>>();

  constructor(
    private readonly transport: Transport,
    private readonly recipients: RecipientStore,
    private readonly policy: RetryPolicy
  ) {}

  async send(userId: string, message: OutboundMessage): Promise<NotifyOutcome> {
    try {
      await retryWithBackoff(() => sendOrThrow(this.transport, userId, message), {
        ...this.policy,
        isRetryable: isTransientDeliveryError,
        label: `notify:${userId}`,
      });
      return 'delivered';
    } catch (error) {
      if (error instanceof PermanentDeliveryError) {
        await this.markBlocked(userId);
        return 'blocked';
      }
      logger.warn('[Notifier] Message not delivered', { userId, error: errorMessage(error) });
      return 'failed';
    }
  }

  /** Sends in the background; `drain()` waits for everything posted so far. */
  post(userId: string, message: OutboundMessage): void {
    const delivery: Promise<NotifyOutcome> = this.send(userId, message).finally(() => {
      this.pending.delete(delivery);
    });
    this.pending.add(delivery);
  }

  postAll(userIds: readonly string[], message: OutboundMessage): void {
    for (const userId of userIds) {
      this.post(userId, message);
    }
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async markBlocked(userId: string): Promise<void> {
    try {
      await this.recipients.markBlocked(userId);
      logger.info('[Notifier] Recipient marked blocked', { userId });
    } catch (error) {
      logger.error('[Notifier] Failed to mark recipient blocked', { userId, error: errorMessage(error) });
    }
  }
}
