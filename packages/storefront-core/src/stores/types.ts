/**
 * Store contracts. Each has a Postgres implementation and an in-memory one
 * (STORE_DRIVER=memory) with identical semantics.
 */

import type {
  BroadcastJob,
  BroadcastTarget,
  NewOrder,
  NewProduct,
  Order,
  OrderEvent,
  OrderStatus,
  OutboundMessage,
  Product,
  ProductPatch,
  ProductRemoval,
  Recipient,
  RecipientDeliveryStatus,
  TransitionMetadata,
  TransitionResult,
} from '../types/index';

/**
 * Single source of truth for orders. Every status change goes through
 * `compareAndTransition`, which writes status and metadata together or not
 * at all. Orders are never deleted.
 */
export interface OrderLedger {
  /**
   * Inserts a `created` order. Re-reads the product in the same atomic step
   * and throws UNKNOWN_PRODUCT or PRODUCT_CHANGED when it no longer matches
   * the order's snapshot.
   */
  create(order: NewOrder): Promise<Order>;
  get(id: string): Promise<Order | null>;
  compareAndTransition(
    id: string,
    expectedStatus: OrderStatus,
    newStatus: OrderStatus,
    metadata: TransitionMetadata
  ): Promise<TransitionResult>;

  /** Records a failed delivery round; false when the order is no longer approved. */
  recordFulfillmentFailure(id: string, attempts: number, error: string): Promise<boolean>;

  listByStatus(status: OrderStatus, options?: { olderThan?: Date; limit?: number }): Promise<Order[]>;
  findOpenOrderForBuyer(buyerId: string): Promise<Order | null>;
  listAwaitingManualFulfillment(): Promise<Order[]>;
  countByStatus(): Promise<Partial<Record<OrderStatus, number>>>;
  getEvents(id: string): Promise<OrderEvent[]>;
}

export interface ProductCatalogStore {
  get(id: string): Promise<Product | null>;
  list(options?: { category?: string; includeArchived?: boolean }): Promise<Product[]>;
  create(product: NewProduct): Promise<Product>;
  /**
   * Applies the patch. Changing the artifact of a product any order
   * references throws ProductLockedError; the check and the write are one
   * atomic step.
   */
  update(id: string, patch: ProductPatch): Promise<Product | null>;
  /** Archives a referenced product and deletes any other; null when unknown. */
  remove(id: string): Promise<ProductRemoval | null>;
}

export interface RecipientStore {
  touch(userId: string, displayName?: string): Promise<Recipient>;
  get(userId: string): Promise<Recipient | null>;
  markBlocked(userId: string): Promise<void>;
  /** Non-blocked recipients matching the target, in first-seen order. */
  snapshot(target: BroadcastTarget): Promise<string[]>;
  count(): Promise<{ total: number; blocked: number }>;
  /** Non-blocked recipients in first-seen order. */
  list(options?: { limit?: number }): Promise<Recipient[]>;
}

export interface RecipientOutcome {
  status: RecipientDeliveryStatus;
  attempts: number;
  last_error: string | null;
}

/**
 * Durable broadcast progress. One writer per job: the dispatcher instance
 * running it.
 */
export interface BroadcastJobStore {
  create(payload: OutboundMessage, createdBy: string, recipients: string[]): Promise<BroadcastJob>;
  get(id: string): Promise<BroadcastJob | null>;
  saveRecipient(jobId: string, userId: string, outcome: RecipientOutcome): Promise<void>;
  /** Marks every recipient not yet terminal as `skipped`. Returns how many changed. */
  skipRemaining(jobId: string): Promise<number>;
  finish(jobId: string, cancelled: boolean): Promise<void>;
  listIncomplete(): Promise<BroadcastJob[]>;
}

export interface SettingsStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
}

export interface Stores {
  ledger: OrderLedger;
  catalog: ProductCatalogStore;
  recipients: RecipientStore;
  broadcasts: BroadcastJobStore;
  settings: SettingsStore;
}

export const TERMINAL_RECIPIENT_STATUSES: readonly RecipientDeliveryStatus[] = [
  'delivered',
  'blocked',
  'failed',
  'skipped',
];

export function isTerminalRecipientStatus(status: RecipientDeliveryStatus): boolean {
  return TERMINAL_RECIPIENT_STATUSES.includes(status);
}
