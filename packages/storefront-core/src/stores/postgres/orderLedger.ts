/**
 * Postgres order ledger
 *
 * compareAndTransition locks the order row, re-checks the expected status
 * and writes the new status, its metadata, the version bump and the
 * order_events row in ONE transaction. A failed write rolls all of it back.
 *
 * create holds the product row FOR SHARE while inserting, which orders it
 * against the catalog's FOR UPDATE artifact check.
 */

import { query, queryOne, queryRows, transaction } from '../../db/client';
import { assertEdge, assertOrderable, buildTransitionPatch, transitionEventMetadata } from '../../ledger/transition';
import { getTransitionEventType } from '../../state-machine/stateMachine';
import type {
  NewOrder,
  Order,
  OrderEvent,
  OrderStatus,
  Product,
  TransitionMetadata,
  TransitionResult,
} from '../../types/index';
import { logger } from '../../utils/logger';
import type { OrderLedger } from '../types';
import { guarded, isUuid } from './guarded';

export class PgOrderLedger implements OrderLedger {
  async create(input: NewOrder): Promise<Order> {
    if (!isUuid(input.product_id)) {
      assertOrderable(null, input);
    }

    return guarded('create order', () =>
      transaction(async (client) => {
        const products = await queryRows<Pick<Product, 'archived' | 'price' | 'artifact_ref'>>(
          client,
          'SELECT archived, price, artifact_ref FROM products WHERE id = $1 FOR SHARE',
          [input.product_id]
        );
        assertOrderable(products[0], input);

        const rows = await queryRows<Order>(
          client,
          `INSERT INTO orders (buyer_id, product_id, status, amount, artifact_ref, payment_ref)
           VALUES ($1, $2, 'created', $3, $4, $5)
           RETURNING *`,
          [input.buyer_id, input.product_id, input.amount, input.artifact_ref, input.payment_ref]
        );
        const order = rows[0];
        if (!order) throw new Error('INSERT returned no row');
        return order;
      })
    );
  }

  async get(id: string): Promise<Order | null> {
    if (!isUuid(id)) return null;
    return guarded('get order', () => queryOne<Order>('SELECT * FROM orders WHERE id = $1', [id]));
  }

  async compareAndTransition(
    id: string,
    expectedStatus: OrderStatus,
    newStatus: OrderStatus,
    metadata: TransitionMetadata
  ): Promise<TransitionResult> {
    assertEdge(expectedStatus, newStatus, metadata.actor_type);
    if (!isUuid(id)) return { status: 'not_found' };

    return guarded(`transition ${expectedStatus} -> ${newStatus}`, () =>
      transaction<TransitionResult>(async (client) => {
        const locked = await queryRows<Order>(client, 'SELECT * FROM orders WHERE id = $1 FOR UPDATE', [id]);
        const current = locked[0];

        if (!current) {
          return { status: 'not_found' };
        }

        if (current.status !== expectedStatus) {
          return { status: 'precondition_failed', order: current };
        }

        const patch = buildTransitionPatch(current, newStatus, metadata, new Date());

        const updatedRows = await queryRows<Order>(
          client,
          `UPDATE orders
           SET status = $2,
               updated_at = $3,
               evidence_ref = COALESCE($4, evidence_ref),
               decided_by = COALESCE($5, decided_by),
               decided_at = COALESCE($6, decided_at),
               decision_reason = COALESCE($7, decision_reason),
               fulfilled_at = COALESCE($8, fulfilled_at),
               cancelled_at = COALESCE($9, cancelled_at),
               order_version = order_version + 1
           WHERE id = $1 AND status = $10
           RETURNING *`,
          [
            id,
            patch.status,
            patch.updated_at,
            patch.evidence_ref ?? null,
            patch.decided_by ?? null,
            patch.decided_at ?? null,
            patch.decision_reason ?? null,
            patch.fulfilled_at ?? null,
            patch.cancelled_at ?? null,
            expectedStatus,
          ]
        );

        const updated = updatedRows[0];
        if (!updated) {
          // Row lock makes this unreachable; abort rather than commit a partial write
          throw new Error('ORDER_UPDATE_LOST');
        }

        await client.query(
          `INSERT INTO order_events (order_id, event_type, actor_type, actor_id, old_status, new_status, metadata)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [
            id,
            getTransitionEventType(expectedStatus, newStatus),
            metadata.actor_type,
            metadata.actor_id,
            expectedStatus,
            newStatus,
            JSON.stringify(transitionEventMetadata(metadata)),
          ]
        );

        logger.order.statusChanged(id, expectedStatus, newStatus, metadata.actor_type, metadata.actor_id);

        return { status: 'committed', order: updated };
      })
    );
  }

  async recordFulfillmentFailure(id: string, attempts: number, error: string): Promise<boolean> {
    if (!isUuid(id)) return false;
    return guarded('record fulfillment failure', async () => {
      const rows = await query<{ id: string }>(
        `UPDATE orders
         SET fulfillment_attempts = fulfillment_attempts + $2,
             fulfillment_error = $3,
             fulfillment_failed_at = NOW(),
             updated_at = NOW(),
             order_version = order_version + 1
         WHERE id = $1 AND status = 'approved'
         RETURNING id`,
        [id, attempts, error]
      );
      return rows.length > 0;
    });
  }

  async listByStatus(
    status: OrderStatus,
    options: { olderThan?: Date; limit?: number } = {}
  ): Promise<Order[]> {
    return guarded('list orders', () =>
      query<Order>(
        `SELECT * FROM orders
         WHERE status = $1
           AND ($2::timestamptz IS NULL OR created_at < $2)
         ORDER BY order_number ASC
         LIMIT $3`,
        [status, options.olderThan ?? null, options.limit ?? 500]
      )
    );
  }

  async findOpenOrderForBuyer(buyerId: string): Promise<Order | null> {
    return guarded('find open order', () =>
      queryOne<Order>(
        `SELECT * FROM orders
         WHERE buyer_id = $1 AND status = 'awaiting_evidence'
         ORDER BY order_number DESC
         LIMIT 1`,
        [buyerId]
      )
    );
  }

  async listAwaitingManualFulfillment(): Promise<Order[]> {
    return guarded('list manual fulfillment', () =>
      query<Order>(
        `SELECT * FROM orders
         WHERE status = 'approved' AND fulfillment_failed_at IS NOT NULL
         ORDER BY order_number ASC`
      )
    );
  }

  async countByStatus(): Promise<Partial<Record<OrderStatus, number>>> {
    return guarded('count orders', async () => {
      const rows = await query<{ status: OrderStatus; count: string }>(
        'SELECT status, COUNT(*)::text AS count FROM orders GROUP BY status'
      );
      const counts: Partial<Record<OrderStatus, number>> = {};
      for (const row of rows) {
        counts[row.status] = parseInt(row.count, 10);
      }
      return counts;
    });
  }

  async getEvents(id: string): Promise<OrderEvent[]> {
    if (!isUuid(id)) return [];
    return guarded('get order events', () =>
      query<OrderEvent>(
        'SELECT * FROM order_events WHERE order_id = $1 ORDER BY created_at ASC',
        [id]
      )
    );
  }
}
