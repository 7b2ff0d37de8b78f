/**
 * Shared rules for a committed transition: which columns an edge writes and
 * which metadata it requires. Both ledger drivers build their writes from
 * `buildTransitionPatch`, so they cannot drift apart.
 */

import { InvalidTransitionError, ValidationError } from '../errors';
import { validateTransition } from '../state-machine/stateMachine';
import type { ActorType, NewOrder, Order, OrderStatus, Product, TransitionMetadata } from '../types/index';

export interface TransitionPatch {
  status: OrderStatus;
  updated_at: Date;
  evidence_ref?: string;
  decided_by?: string;
  decided_at?: Date;
  decision_reason?: string | null;
  fulfilled_at?: Date;
  cancelled_at?: Date;
}

/**
 * Reject edges that are not in the graph for this actor before touching
 * the store. A caller asking for one is a programming error, not a race.
 */
export function assertEdge(
  expectedStatus: OrderStatus,
  newStatus: OrderStatus,
  actorType: ActorType
): void {
  const validation = validateTransition(expectedStatus, newStatus, actorType);
  if (!validation.valid) {
    throw new InvalidTransitionError(validation.error || 'Invalid status transition');
  }
}

export function buildTransitionPatch(
  order: Order,
  newStatus: OrderStatus,
  metadata: TransitionMetadata,
  now: Date
): TransitionPatch {
  const patch: TransitionPatch = { status: newStatus, updated_at: now };

  switch (newStatus) {
    case 'under_review':
      if (!metadata.evidence_ref) {
        throw new ValidationError('Evidence reference is required to enter review');
      }
      patch.evidence_ref = metadata.evidence_ref;
      break;
    case 'approved':
    case 'rejected':
      if (!metadata.decided_by) {
        throw new ValidationError('A decision must name the deciding owner');
      }
      // decided_by/decided_at are written once
      if (order.decided_by !== null) {
        throw new InvalidTransitionError(`Order ${order.id} already decided by ${order.decided_by}`);
      }
      patch.decided_by = metadata.decided_by;
      patch.decided_at = now;
      patch.decision_reason = metadata.decision_reason ?? null;
      break;
    case 'fulfilled':
      patch.fulfilled_at = now;
      break;
    case 'cancelled':
      patch.cancelled_at = now;
      break;
    default:
      break;
  }

  return patch;
}

export function transitionEventMetadata(metadata: TransitionMetadata): Record<string, unknown> {
  const eventMetadata: Record<string, unknown> = {};
  if (metadata.evidence_ref) eventMetadata.evidence_ref = metadata.evidence_ref;
  if (metadata.decided_by) eventMetadata.decided_by = metadata.decided_by;
  if (metadata.decision_reason) eventMetadata.decision_reason = metadata.decision_reason;
  if (metadata.note) eventMetadata.note = metadata.note;
  return eventMetadata;
}

/**
 * An order snapshots its product's price and artifact. Drivers call this
 * with the product re-read in the same atomic step as the insert, so an
 * order never references a product whose artifact changed under it.
 */
export function assertOrderable(
  product: Pick<Product, 'archived' | 'price' | 'artifact_ref'> | null | undefined,
  order: NewOrder
): void {
  if (!product || product.archived) {
    throw new ValidationError(`Unknown product '${order.product_id}'`, 'UNKNOWN_PRODUCT');
  }
  if (product.artifact_ref !== order.artifact_ref || product.price !== order.amount) {
    throw new ValidationError('This product changed while the order was placed; please try again', 'PRODUCT_CHANGED');
  }
}
