/**
 * Artifact delivery after approval.
 *
 * Each attempt re-reads the order and only sends while it is still
 * `approved`. Success moves the order to `fulfilled`; a spent retry budget
 * or a blocked buyer leaves it `approved`, records the failure, and alerts
 * the owners so the order shows up in the manual queue.
 */

import { errorMessage, NotFoundError, InvalidTransitionError, PermanentDeliveryError } from '../errors';
import { fulfillmentCaption, manualFulfillmentAlert } from '../messages/templates';
import type { Notifier } from '../notifications/notifier';
import type { OwnerAllowList } from '../approval/owners';
import type { OrderLedger, RecipientStore } from '../stores/types';
import { contentTypeForRef, fileNameForRef } from '../transport/blobStore';
import { isTransientDeliveryError, sendOrThrow } from '../transport/send';
import type { BlobStore, Transport } from '../transport/types';
import type { ActorType, Order } from '../types/index';
import { logger } from '../utils/logger';
import { retryWithBackoff, RetryExhaustedError } from '../utils/retry';
import type { RetryPolicy } from '../utils/retry';

export type FulfillmentResult =
  | { status: 'fulfilled'; order: Order }
  | { status: 'manual'; order: Order; error: string }
  | { status: 'skipped'; order: Order | null };

export interface FulfillmentDelivererDeps {
  ledger: OrderLedger;
  recipients: RecipientStore;
  blobs: BlobStore;
  transport: Transport;
  notifier: Notifier;
  owners: OwnerAllowList;
  retry: RetryPolicy;
}

// Thrown from inside an attempt once the order has left `approved`.
class NoLongerApprovedError extends Error {
  constructor(public readonly order: Order | null) {
    super('Order is no longer approved');
    this.name = 'NoLongerApprovedError';
  }
}

// Not worth retrying: the artifact itself is missing.
class MissingArtifactError extends Error {
  constructor(ref: string) {
    super(`Artifact ${ref} not found`);
    this.name = 'MissingArtifactError';
  }
}

export class FulfillmentDeliverer {
  private readonly inFlight = new Map<string, Promise<FulfillmentResult>>();

  constructor(private readonly deps: FulfillmentDelivererDeps) {}

  /** Starts delivery in the background unless one is already running for the order. */
  schedule(order: Order): void {
    if (this.inFlight.has(order.id)) return;
    this.track(order.id, 'system');
  }

  /** Delivers now and waits for the outcome. Joins a delivery already in flight. */
  deliver(orderId: string, actor: ActorType = 'system'): Promise<FulfillmentResult> {
    return this.inFlight.get(orderId) ?? this.track(orderId, actor);
  }

  /** An owner retrying an order from the manual queue. */
  async retryManual(orderId: string, ownerId: string): Promise<FulfillmentResult> {
    this.deps.owners.assertOwner(ownerId);

    const order = await this.deps.ledger.get(orderId);
    if (!order) throw new NotFoundError(`Order ${orderId} not found`);
    if (order.status !== 'approved') {
      throw new InvalidTransitionError(`Order ${orderId} is ${order.status}, only approved orders can be fulfilled`);
    }

    logger.info('[Fulfillment] Manual retry requested', { orderId, ownerId });
    return this.deliver(orderId, 'owner');
  }

  listManualQueue(): Promise<Order[]> {
    return this.deps.ledger.listAwaitingManualFulfillment();
  }

  /** Re-drives approved orders that have not failed over to the manual queue. */
  async resumePending(): Promise<number> {
    const approved = await this.deps.ledger.listByStatus('approved');
    const pending = approved.filter((order) => order.fulfillment_failed_at === null);
    for (const order of pending) {
      this.schedule(order);
    }
    if (pending.length > 0) {
      logger.info('[Fulfillment] Resumed pending deliveries', { count: pending.length });
    }
    return pending.length;
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()]);
    }
  }

  private track(orderId: string, actor: ActorType): Promise<FulfillmentResult> {
    const run = this.run(orderId, actor)
      .catch((error: unknown): FulfillmentResult => {
        // Storage failure mid-delivery: the order stays approved and is picked up on the next resume.
        logger.error('[Fulfillment] Delivery interrupted', { orderId, error: errorMessage(error) });
        return { status: 'skipped', order: null };
      })
      .finally(() => {
        this.inFlight.delete(orderId);
      });
    this.inFlight.set(orderId, run);
    return run;
  }

  private async run(orderId: string, actor: ActorType): Promise<FulfillmentResult> {
    // Written from inside the retried operation.
    const progress: { attempts: number; buyerId: string | null } = { attempts: 0, buyerId: null };

    try {
      await retryWithBackoff(
        async (attempt) => {
          const order = await this.deps.ledger.get(orderId);
          if (!order || order.status !== 'approved') {
            throw new NoLongerApprovedError(order);
          }

          const artifact = await this.deps.blobs.get(order.artifact_ref);
          if (!artifact) throw new MissingArtifactError(order.artifact_ref);

          progress.attempts = attempt;
          progress.buyerId = order.buyer_id;
          await sendOrThrow(this.deps.transport, order.buyer_id, {
            kind: 'document',
            data: artifact.toString('base64'),
            content_type: contentTypeForRef(order.artifact_ref),
            filename: fileNameForRef(order.artifact_ref),
            caption: fulfillmentCaption(order),
          });
        },
        {
          ...this.deps.retry,
          isRetryable: isTransientDeliveryError,
          label: `fulfillment:${orderId}`,
          onRetry: (attempt, error) => {
            logger.fulfillment.attemptFailed(orderId, attempt, errorMessage(error));
          },
        }
      );
    } catch (error) {
      if (error instanceof NoLongerApprovedError) {
        return { status: 'skipped', order: error.order };
      }
      if (error instanceof PermanentDeliveryError && progress.buyerId !== null) {
        await this.deps.recipients.markBlocked(progress.buyerId);
      }
      const reason = error instanceof RetryExhaustedError ? errorMessage(error.lastError) : errorMessage(error);
      return this.failOver(orderId, progress.attempts, reason);
    }

    const result = await this.deps.ledger.compareAndTransition(orderId, 'approved', 'fulfilled', {
      actor_type: actor,
      actor_id: actor === 'system' ? 'fulfillment' : 'manual',
    });

    if (result.status === 'committed') {
      logger.fulfillment.delivered(orderId, result.order.buyer_id, progress.attempts);
      return { status: 'fulfilled', order: result.order };
    }

    // Sent, but someone else already moved the order on.
    return { status: 'skipped', order: result.status === 'precondition_failed' ? result.order : null };
  }

  private async failOver(orderId: string, attempts: number, reason: string): Promise<FulfillmentResult> {
    const recorded = await this.deps.ledger.recordFulfillmentFailure(orderId, attempts, reason);
    const order = await this.deps.ledger.get(orderId);
    if (!recorded || !order) {
      return { status: 'skipped', order };
    }

    logger.fulfillment.exhausted(orderId, attempts, reason);
    this.deps.notifier.postAll(this.deps.owners.ids, manualFulfillmentAlert(order, reason));
    return { status: 'manual', order, error: reason };
  }
}
