import { randomUUID } from 'crypto';
import { getTransitionEventType } from '../../state-machine/stateMachine';
import { assertEdge, assertOrderable, buildTransitionPatch, transitionEventMetadata } from '../../ledger/transition';
import type {
  NewOrder,
  Order,
  OrderEvent,
  OrderStatus,
  TransitionMetadata,
  TransitionResult,
} from '../../types/index';
import { logger } from '../../utils/logger';
import type { OrderLedger } from '../types';
import type { MemoryProductCatalog } from './catalog';

/**
 * In-process ledger. Each compare-and-transition runs without an await
 * between the read and the write, which makes it atomic on the event loop.
 * With a catalog attached, `create` checks the product in the same tick.
 */
export class MemoryOrderLedger implements OrderLedger {
  private readonly orders = new Map<string, Order>();
  private readonly events: OrderEvent[] = [];
  private nextOrderNumber = 1;

  private catalog: MemoryProductCatalog | null = null;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  attachCatalog(catalog: MemoryProductCatalog): void {
    this.catalog = catalog;
  }

  async create(input: NewOrder): Promise<Order> {
    if (this.catalog) {
      assertOrderable(this.catalog.peek(input.product_id), input);
    }
    const now = this.clock();
    const order: Order = {
      id: randomUUID(),
      order_number: this.nextOrderNumber++,
      buyer_id: input.buyer_id,
      product_id: input.product_id,
      status: 'created',
      amount: input.amount,
      artifact_ref: input.artifact_ref,
      payment_ref: input.payment_ref,
      evidence_ref: null,
      created_at: now,
      updated_at: now,
      decided_by: null,
      decided_at: null,
      decision_reason: null,
      fulfilled_at: null,
      cancelled_at: null,
      fulfillment_attempts: 0,
      fulfillment_error: null,
      fulfillment_failed_at: null,
      order_version: 1,
    };
    this.orders.set(order.id, order);
    return { ...order };
  }

  async get(id: string): Promise<Order | null> {
    const order = this.orders.get(id);
    return order ? { ...order } : null;
  }

  async compareAndTransition(
    id: string,
    expectedStatus: OrderStatus,
    newStatus: OrderStatus,
    metadata: TransitionMetadata
  ): Promise<TransitionResult> {
    assertEdge(expectedStatus, newStatus, metadata.actor_type);

    const current = this.orders.get(id);
    if (!current) return { status: 'not_found' };
    if (current.status !== expectedStatus) {
      return { status: 'precondition_failed', order: { ...current } };
    }

    const now = this.clock();
    const patch = buildTransitionPatch(current, newStatus, metadata, now);
    const updated: Order = {
      ...current,
      ...patch,
      order_version: current.order_version + 1,
    };

    this.orders.set(id, updated);
    this.events.push({
      id: randomUUID(),
      order_id: id,
      event_type: getTransitionEventType(expectedStatus, newStatus),
      actor_type: metadata.actor_type,
      actor_id: metadata.actor_id,
      old_status: expectedStatus,
      new_status: newStatus,
      metadata: transitionEventMetadata(metadata),
      created_at: now,
    });

    logger.order.statusChanged(id, expectedStatus, newStatus, metadata.actor_type, metadata.actor_id);

    return { status: 'committed', order: { ...updated } };
  }

  async recordFulfillmentFailure(id: string, attempts: number, error: string): Promise<boolean> {
    const current = this.orders.get(id);
    if (!current || current.status !== 'approved') return false;
    const now = this.clock();
    this.orders.set(id, {
      ...current,
      fulfillment_attempts: current.fulfillment_attempts + attempts,
      fulfillment_error: error,
      fulfillment_failed_at: now,
      updated_at: now,
      order_version: current.order_version + 1,
    });
    return true;
  }

  async listByStatus(
    status: OrderStatus,
    options: { olderThan?: Date; limit?: number } = {}
  ): Promise<Order[]> {
    const { olderThan, limit } = options;
    const matches = [...this.orders.values()]
      .filter((o) => o.status === status)
      .filter((o) => !olderThan || o.created_at.getTime() < olderThan.getTime())
      .sort((a, b) => a.order_number - b.order_number)
      .map((o) => ({ ...o }));
    return limit === undefined ? matches : matches.slice(0, limit);
  }

  async findOpenOrderForBuyer(buyerId: string): Promise<Order | null> {
    const open = [...this.orders.values()]
      .filter((o) => o.buyer_id === buyerId && o.status === 'awaiting_evidence')
      .sort((a, b) => b.order_number - a.order_number);
    return open[0] ? { ...open[0] } : null;
  }

  async listAwaitingManualFulfillment(): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((o) => o.status === 'approved' && o.fulfillment_failed_at !== null)
      .sort((a, b) => a.order_number - b.order_number)
      .map((o) => ({ ...o }));
  }

  async countByStatus(): Promise<Partial<Record<OrderStatus, number>>> {
    const counts: Partial<Record<OrderStatus, number>> = {};
    for (const order of this.orders.values()) {
      counts[order.status] = (counts[order.status] ?? 0) + 1;
    }
    return counts;
  }

  referencesProduct(productId: string): boolean {
    for (const order of this.orders.values()) {
      if (order.product_id === productId) return true;
    }
    return false;
  }

  async getEvents(id: string): Promise<OrderEvent[]> {
    return this.events.filter((e) => e.order_id === id).map((e) => ({ ...e }));
  }
}
