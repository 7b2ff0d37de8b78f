// Shared types for the storefront core. Row shapes mirror the Postgres tables
// (snake_case) so stores can hand rows straight through.

export type OrderStatus =
  | 'created'
  | 'awaiting_evidence'
  | 'under_review'
  | 'approved'
  | 'rejected'
  | 'fulfilled'
  | 'cancelled';

export type ActorType = 'buyer' | 'owner' | 'system';

export type Verdict = 'approve' | 'reject';

export interface Product {
  id: string;
  category: string;
  title: string;
  description: string;
  price: string;
  artifact_ref: string;
  archived: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface NewProduct {
  category: string;
  title: string;
  description: string;
  price: string;
  artifact_ref: string;
}

export type ProductPatch = Partial<Pick<Product, 'category' | 'title' | 'description' | 'price' | 'artifact_ref'>>;

/** Products ever sold are archived, the rest deleted. */
export type ProductRemoval = 'deleted' | 'archived';

export interface Order {
  id: string;
  order_number: number;
  buyer_id: string;
  product_id: string;
  status: OrderStatus;
  amount: string;
  artifact_ref: string;
  payment_ref: string;
  evidence_ref: string | null;
  created_at: Date;
  updated_at: Date;
  decided_by: string | null;
  decided_at: Date | null;
  decision_reason: string | null;
  fulfilled_at: Date | null;
  cancelled_at: Date | null;
  fulfillment_attempts: number;
  fulfillment_error: string | null;
  fulfillment_failed_at: Date | null;
  order_version: number;
}

export interface NewOrder {
  buyer_id: string;
  product_id: string;
  amount: string;
  artifact_ref: string;
  payment_ref: string;
}

export interface OrderEvent {
  id: string;
  order_id: string;
  event_type: string;
  actor_type: ActorType;
  actor_id: string;
  old_status: OrderStatus;
  new_status: OrderStatus;
  metadata: Record<string, unknown>;
  created_at: Date;
}

/**
 * Fields written together with a status change. `decided_by` and
 * `evidence_ref` are only honoured on the edges that own them.
 */
export interface TransitionMetadata {
  actor_type: ActorType;
  actor_id: string;
  evidence_ref?: string;
  decided_by?: string;
  decision_reason?: string;
  note?: string;
}

export type TransitionResult =
  | { status: 'committed'; order: Order }
  | { status: 'precondition_failed'; order: Order }
  | { status: 'not_found' };

export interface OwnerDecision {
  order_id: string;
  owner_id: string;
  verdict: Verdict;
  reason?: string;
  submitted_at: Date;
}

export type DecisionOutcome =
  | { status: 'committed'; order: Order; verdict: Verdict }
  | {
      status: 'superseded';
      order: Order;
      decided_by: string | null;
      verdict: Verdict | null;
    }
  | { status: 'not_reviewable'; order: Order };

export interface Recipient {
  user_id: string;
  display_name: string | null;
  blocked: boolean;
  first_seen: Date;
  last_seen: Date;
}

// Per-recipient broadcast progress. `delivered`, `blocked`, `failed` and
// `skipped` are terminal within a job.
export type RecipientDeliveryStatus =
  | 'pending'
  | 'retrying'
  | 'delivered'
  | 'blocked'
  | 'failed'
  | 'skipped';

export interface RecipientProgress {
  user_id: string;
  status: RecipientDeliveryStatus;
  attempts: number;
  last_error: string | null;
  updated_at: Date;
}

export type BroadcastTarget = { kind: 'all' } | { kind: 'users'; user_ids: string[] };

export interface BroadcastJob {
  id: string;
  payload: OutboundMessage;
  created_by: string;
  created_at: Date;
  completed: boolean;
  cancelled: boolean;
  completed_at: Date | null;
  recipients: RecipientProgress[];
}

export interface BroadcastSummary {
  job_id: string;
  total: number;
  delivered: number;
  blocked: number;
  failed: number;
  skipped: number;
  pending: number;
  completed: boolean;
  cancelled: boolean;
}

// Transport payloads
export type OutboundMessage =
  | { kind: 'text'; text: string }
  | { kind: 'photo'; data: string; content_type: string; caption?: string }
  | { kind: 'document'; data: string; content_type: string; filename: string; caption?: string };

export type SendResult =
  | { status: 'delivered' }
  | { status: 'blocked'; error: string }
  | { status: 'transient_error'; error: string };

export interface InboundAttachment {
  content_type: string;
  data: string;
  filename?: string;
}

export interface InboundMessage {
  user_id: string;
  payload: string;
  display_name?: string;
  attachment?: InboundAttachment;
}

export interface StoreStats {
  recipients: number;
  blocked_recipients: number;
  products: number;
  orders_by_status: Partial<Record<OrderStatus, number>>;
}
