/**
 * Order State Machine
 *
 * Defines all order statuses and the edges between them, together with the
 * party allowed to fire each edge. The ledger checks every write against
 * this table; nothing else moves an order.
 *
 *   created ─▶ awaiting_evidence ─▶ under_review ─▶ approved ─▶ fulfilled
 *                      │                   │
 *                      ▼                   ▼
 *                  cancelled            rejected
 */

import { OrderStatus, ActorType } from '../types/index';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'created',
  'awaiting_evidence',
  'under_review',
  'approved',
  'rejected',
  'fulfilled',
  'cancelled',
] as const;

interface TransitionRule {
  to: OrderStatus;
  allowedActors: ActorType[];
}

export const ALLOWED_TRANSITIONS: Record<OrderStatus, TransitionRule[]> = {
  created: [
    { to: 'awaiting_evidence', allowedActors: ['system'] },
  ],
  awaiting_evidence: [
    { to: 'under_review', allowedActors: ['buyer'] },
    { to: 'cancelled', allowedActors: ['system'] }, // evidence timeout
  ],
  under_review: [
    { to: 'approved', allowedActors: ['owner'] },
    { to: 'rejected', allowedActors: ['owner'] },
  ],
  approved: [
    // system for automatic delivery, owner for a manual retry
    { to: 'fulfilled', allowedActors: ['system', 'owner'] },
  ],
  rejected: [],
  fulfilled: [],
  cancelled: [],
};

export const TERMINAL_STATUSES: readonly OrderStatus[] = [
  'fulfilled',
  'rejected',
  'cancelled',
];

// Statuses that mean an owner decision was committed
export const DECIDED_STATUSES: readonly OrderStatus[] = [
  'approved',
  'rejected',
  'fulfilled',
];

export interface TransitionValidation {
  valid: boolean;
  error?: string;
}

/**
 * Validate a status transition for the acting party.
 */
export function validateTransition(
  currentStatus: OrderStatus,
  newStatus: OrderStatus,
  actorType: ActorType
): TransitionValidation {
  if (currentStatus === newStatus) {
    return {
      valid: false,
      error: `Order is already in '${currentStatus}' status`,
    };
  }

  if (isTerminalStatus(currentStatus)) {
    return {
      valid: false,
      error: `Cannot transition from terminal status '${currentStatus}'`,
    };
  }

  const allowedTransitions = ALLOWED_TRANSITIONS[currentStatus];
  const transitionRule = allowedTransitions.find(t => t.to === newStatus);
  if (!transitionRule) {
    const allowedTargets = allowedTransitions.map(t => t.to).join(', ');
    return {
      valid: false,
      error: `Transition from '${currentStatus}' to '${newStatus}' is not allowed. Allowed targets: ${allowedTargets}`,
    };
  }

  if (!transitionRule.allowedActors.includes(actorType)) {
    return {
      valid: false,
      error: `Actor type '${actorType}' is not allowed to transition from '${currentStatus}' to '${newStatus}'`,
    };
  }

  return { valid: true };
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isDecidedStatus(status: OrderStatus): boolean {
  return DECIDED_STATUSES.includes(status);
}

export function isOrderStatus(value: string): value is OrderStatus {
  return (ORDER_STATUSES as readonly string[]).includes(value);
}

/**
 * Event type recorded in order_events for a committed transition
 */
export function getTransitionEventType(
  oldStatus: OrderStatus,
  newStatus: OrderStatus
): string {
  const eventTypes: Partial<Record<OrderStatus, string>> = {
    awaiting_evidence: 'payment_code_issued',
    under_review: 'evidence_submitted',
    approved: 'order_approved',
    rejected: 'order_rejected',
    fulfilled: 'order_fulfilled',
    cancelled: oldStatus === 'awaiting_evidence' ? 'evidence_timeout' : 'order_cancelled',
  };

  return eventTypes[newStatus] || `status_changed_to_${newStatus}`;
}
