/**
 * Dual-owner approval.
 *
 * Both owners get the same review prompt. Decisions race at the ledger's
 * compare-and-transition from `under_review`; the first commit wins and any
 * later decision, from either owner, comes back as `superseded` naming the
 * owner and verdict that won.
 */

import { errorMessage, NotFoundError, ValidationError } from '../errors';
import {
  decisionNotice,
  notReviewableNotice,
  rejectionNotice,
  approvalNotice,
  reviewPrompt,
  supersededNotice,
} from '../messages/templates';
import type { Notifier } from '../notifications/notifier';
import { isDecidedStatus } from '../state-machine/stateMachine';
import type { OrderLedger, ProductCatalogStore } from '../stores/types';
import { contentTypeForRef, fileNameForRef } from '../transport/blobStore';
import type { BlobStore } from '../transport/types';
import type {
  DecisionOutcome,
  Order,
  OrderStatus,
  OutboundMessage,
  OwnerDecision,
  Verdict,
} from '../types/index';
import { logger } from '../utils/logger';
import type { OwnerAllowList } from './owners';

export interface ApprovalCoordinatorDeps {
  ledger: OrderLedger;
  catalog: ProductCatalogStore;
  blobs: BlobStore;
  notifier: Notifier;
  owners: OwnerAllowList;
  /** Called once per committed approval. */
  onApproved: (order: Order) => void;
  clock?: () => Date;
}

const VERDICT_STATUS: Record<Verdict, OrderStatus> = {
  approve: 'approved',
  reject: 'rejected',
};

/** The verdict a decided order carries, read back from its status. */
export function verdictForStatus(status: OrderStatus): Verdict | null {
  if (!isDecidedStatus(status)) return null;
  return status === 'rejected' ? 'reject' : 'approve';
}

export class ApprovalCoordinator {
  private readonly clock: () => Date;

  constructor(private readonly deps: ApprovalCoordinatorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Sends one identical prompt, with the evidence attached when readable, to every owner. */
  async requestReview(order: Order): Promise<void> {
    const product = await this.deps.catalog.get(order.product_id);
    const caption = reviewPrompt(order, product);
    const message = await this.withEvidence(order, caption);
    this.deps.notifier.postAll(this.deps.owners.ids, message);
  }

  approve(orderId: string, ownerId: string): Promise<DecisionOutcome> {
    return this.decide({ order_id: orderId, owner_id: ownerId, verdict: 'approve', submitted_at: this.clock() });
  }

  reject(orderId: string, ownerId: string, reason: string): Promise<DecisionOutcome> {
    return this.decide({
      order_id: orderId,
      owner_id: ownerId,
      verdict: 'reject',
      reason,
      submitted_at: this.clock(),
    });
  }

  async decide(decision: OwnerDecision): Promise<DecisionOutcome> {
    const { order_id: orderId, owner_id: ownerId, verdict } = decision;
    this.deps.owners.assertOwner(ownerId);

    const reason = decision.reason?.trim();
    if (verdict === 'reject' && !reason) {
      throw new ValidationError('A rejection needs a reason');
    }

    const result = await this.deps.ledger.compareAndTransition(orderId, 'under_review', VERDICT_STATUS[verdict], {
      actor_type: 'owner',
      actor_id: ownerId,
      decided_by: ownerId,
      decision_reason: reason,
    });

    if (result.status === 'not_found') {
      throw new NotFoundError(`Order ${orderId} not found`);
    }

    if (result.status === 'committed') {
      const order = result.order;
      logger.decision.committed(order.id, ownerId, verdict);
      this.deps.notifier.postAll(this.deps.owners.ids, decisionNotice(order, ownerId, verdict));

      if (verdict === 'approve') {
        this.deps.notifier.post(order.buyer_id, approvalNotice(order));
        this.deps.onApproved(order);
      } else {
        this.deps.notifier.post(order.buyer_id, rejectionNotice(order));
      }
      return { status: 'committed', order, verdict };
    }

    const current = result.order;
    const decidedVerdict = verdictForStatus(current.status);
    if (decidedVerdict === null) {
      this.deps.notifier.post(ownerId, notReviewableNotice(current));
      return { status: 'not_reviewable', order: current };
    }

    logger.decision.superseded(current.id, ownerId, current.decided_by, current.status);
    this.deps.notifier.post(ownerId, supersededNotice(current, current.decided_by, decidedVerdict));
    return { status: 'superseded', order: current, decided_by: current.decided_by, verdict: decidedVerdict };
  }

  private async withEvidence(order: Order, caption: string): Promise<OutboundMessage> {
    if (!order.evidence_ref) return { kind: 'text', text: caption };

    try {
      const evidence = await this.deps.blobs.get(order.evidence_ref);
      if (!evidence) return { kind: 'text', text: caption };

      const contentType = contentTypeForRef(order.evidence_ref);
      const data = evidence.toString('base64');
      if (contentType.startsWith('image/')) {
        return { kind: 'photo', data, content_type: contentType, caption };
      }
      return {
        kind: 'document',
        data,
        content_type: contentType,
        filename: fileNameForRef(order.evidence_ref),
        caption,
      };
    } catch (error) {
      logger.warn('[Approval] Evidence not attached to review prompt', {
        orderId: order.id,
        error: errorMessage(error),
      });
      return { kind: 'text', text: caption };
    }
  }
}
