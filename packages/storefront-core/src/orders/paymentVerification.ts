/**
 * Payment verification flow on the buyer side: placing an order, issuing
 * the payment reference, accepting evidence and expiring orders whose
 * evidence never arrived. Owner decisions live in the approval coordinator.
 */

import { randomBytes } from 'crypto';
import { z } from 'zod';
import type { ApprovalCoordinator } from '../approval/coordinator';
import { errorMessage, StorageError, ValidationError } from '../errors';
import { cancellationNotice, evidenceReceived, paymentInstructions } from '../messages/templates';
import type { Notifier } from '../notifications/notifier';
import type { OrderLedger, ProductCatalogStore } from '../stores/types';
import type { BlobStore, PaymentCodeEncoder } from '../transport/types';
import type { InboundAttachment, Order, OutboundMessage, Product } from '../types/index';
import { logger } from '../utils/logger';

const EVIDENCE_EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'application/pdf': 'pdf',
};

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export const inboundAttachmentSchema = z.object({
  content_type: z.string().min(1),
  data: z.string().min(1),
  filename: z.string().max(255).optional(),
});

export interface PaymentVerificationDeps {
  ledger: OrderLedger;
  catalog: ProductCatalogStore;
  blobs: BlobStore;
  paymentCodes: PaymentCodeEncoder;
  notifier: Notifier;
  coordinator: ApprovalCoordinator;
  maxEvidenceBytes: number;
  evidenceTimeoutMinutes: number;
  clock?: () => Date;
}

export function generatePaymentRef(): string {
  return `PAY-${randomBytes(5).toString('hex').toUpperCase()}`;
}

/** Decodes and checks an evidence upload; returns the bytes and file extension. */
export function decodeEvidence(
  attachment: InboundAttachment,
  maxBytes: number
): { bytes: Buffer; extension: string } {
  const extension = EVIDENCE_EXTENSIONS[attachment.content_type.toLowerCase()];
  if (!extension) {
    throw new ValidationError(`Unsupported evidence type '${attachment.content_type}'; send an image or a PDF`);
  }

  const data = attachment.data.replace(/\s+/g, '');
  if (data.length === 0 || data.length % 4 !== 0 || !BASE64_PATTERN.test(data)) {
    throw new ValidationError('Evidence is not valid base64');
  }

  const bytes = Buffer.from(data, 'base64');
  if (bytes.length === 0) {
    throw new ValidationError('Evidence is empty');
  }
  if (bytes.length > maxBytes) {
    throw new ValidationError(`Evidence exceeds ${maxBytes} bytes`);
  }

  return { bytes, extension };
}

export class PaymentVerificationService {
  private readonly clock: () => Date;

  constructor(private readonly deps: PaymentVerificationDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Creates the order, moves it straight to `awaiting_evidence` and sends
   * the buyer the payment code with instructions.
   */
  async placeOrder(buyerId: string, productId: string): Promise<Order> {
    const product = await this.deps.catalog.get(productId);
    if (!product || product.archived) {
      throw new ValidationError(`Unknown product '${productId}'`, 'UNKNOWN_PRODUCT');
    }

    const created = await this.deps.ledger.create({
      buyer_id: buyerId,
      product_id: product.id,
      amount: product.price,
      artifact_ref: product.artifact_ref,
      payment_ref: generatePaymentRef(),
    });
    logger.order.created(created.id, buyerId, product.id, product.price);

    const issued = await this.deps.ledger.compareAndTransition(created.id, 'created', 'awaiting_evidence', {
      actor_type: 'system',
      actor_id: 'payments',
      note: `payment_ref=${created.payment_ref}`,
    });
    if (issued.status !== 'committed') {
      throw new StorageError(`open order ${created.id} for payment`);
    }

    const order = issued.order;
    this.deps.notifier.post(buyerId, await this.instructionsFor(order, product));
    return order;
  }

  /**
   * Stores the buyer's evidence and moves the order to review. Without an
   * explicit order id the buyer's most recent open order is used.
   */
  async submitEvidence(buyerId: string, attachment: InboundAttachment, orderId?: string): Promise<Order> {
    const parsed = inboundAttachmentSchema.safeParse(attachment);
    if (!parsed.success) {
      throw new ValidationError('Malformed evidence attachment');
    }

    const order = orderId
      ? await this.deps.ledger.get(orderId)
      : await this.deps.ledger.findOpenOrderForBuyer(buyerId);

    if (!order || order.buyer_id !== buyerId || order.status !== 'awaiting_evidence') {
      throw new ValidationError('No order is waiting for payment evidence', 'NO_OPEN_ORDER');
    }

    const { bytes, extension } = decodeEvidence(parsed.data, this.deps.maxEvidenceBytes);
    const evidenceRef = `evidence/${order.id}.${extension}`;
    await this.deps.blobs.put(evidenceRef, bytes);

    const result = await this.deps.ledger.compareAndTransition(order.id, 'awaiting_evidence', 'under_review', {
      actor_type: 'buyer',
      actor_id: buyerId,
      evidence_ref: evidenceRef,
    });

    if (result.status !== 'committed') {
      // Cancelled by the timeout worker in the meantime.
      throw new ValidationError('No order is waiting for payment evidence', 'NO_OPEN_ORDER');
    }

    this.deps.notifier.post(buyerId, evidenceReceived(result.order));
    await this.deps.coordinator.requestReview(result.order);
    return result.order;
  }

  /** Cancels every order that has waited for evidence longer than the timeout. */
  async expireStaleOrders(): Promise<number> {
    const cutoff = new Date(this.clock().getTime() - this.deps.evidenceTimeoutMinutes * 60_000);
    const stale = await this.deps.ledger.listByStatus('awaiting_evidence', { olderThan: cutoff, limit: 100 });

    let cancelled = 0;
    for (const order of stale) {
      const result = await this.deps.ledger.compareAndTransition(order.id, 'awaiting_evidence', 'cancelled', {
        actor_type: 'system',
        actor_id: 'evidence-timeout',
        note: 'evidence_timeout',
      });
      if (result.status !== 'committed') continue;

      logger.order.cancelled(order.id, 'evidence_timeout');
      this.deps.notifier.post(order.buyer_id, cancellationNotice(result.order));
      cancelled++;
    }
    return cancelled;
  }

  private async instructionsFor(order: Order, product: Product): Promise<OutboundMessage> {
    const caption = paymentInstructions(order, product);
    try {
      const code = await this.deps.paymentCodes.encode(order.payment_ref);
      if (code) {
        return { kind: 'photo', data: code.data.toString('base64'), content_type: code.content_type, caption };
      }
    } catch (error) {
      logger.warn('[Payments] Payment code unavailable, sending text instructions', {
        orderId: order.id,
        error: errorMessage(error),
      });
    }
    return { kind: 'text', text: caption };
  }
}
