/**
 * Administrator order routes: owner decisions, order reads and the manual
 * fulfillment queue.
 */
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import { isOrderStatus, NotFoundError } from 'storefront-core';
import type { DecisionOutcome, FulfillmentResult, Storefront } from 'storefront-core';
import { requireOwner } from '../hooks/auth';

const idParams = z.object({ id: z.string().uuid() });

const rejectBody = z.object({
  reason: z.string().trim().min(1, 'reason is required').max(1000),
});

const listQuery = z.object({
  status: z.string().refine(isOrderStatus, 'unknown status'),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

function sendDecision(reply: FastifyReply, outcome: DecisionOutcome) {
  switch (outcome.status) {
    case 'committed':
      return reply.send({
        success: true,
        data: { status: 'committed', verdict: outcome.verdict, order: outcome.order },
      });
    case 'superseded':
      return reply.status(409).send({
        success: false,
        error: `Order already ${outcome.verdict === 'approve' ? 'approved' : 'rejected'} by ${outcome.decided_by ?? 'another owner'}`,
        code: 'SUPERSEDED',
        data: { decided_by: outcome.decided_by, verdict: outcome.verdict, order: outcome.order },
      });
    case 'not_reviewable':
      return reply.status(409).send({
        success: false,
        error: `Order is ${outcome.order.status} and cannot be reviewed`,
        code: 'NOT_REVIEWABLE',
        data: { order: outcome.order },
      });
  }
}

function sendFulfillment(reply: FastifyReply, result: FulfillmentResult) {
  switch (result.status) {
    case 'fulfilled':
      return reply.send({ success: true, data: result });
    case 'manual':
      return reply.status(502).send({
        success: false,
        error: result.error,
        code: 'DELIVERY_FAILED',
        data: { order: result.order },
      });
    case 'skipped':
      return reply.status(409).send({
        success: false,
        error: 'Order is no longer approved',
        code: 'NOT_APPROVED',
        data: { order: result.order },
      });
  }
}

export interface OrderRoutesOptions {
  storefront: Storefront;
}

export const orderRoutes: FastifyPluginAsync<OrderRoutesOptions> = async (fastify, opts) => {
  const { storefront } = opts;
  const { ledger } = storefront.stores;

  // POST /v1/orders/:id/approve
  fastify.post('/orders/:id/approve', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const outcome = await storefront.coordinator.approve(id, requireOwner(request));
    return sendDecision(reply, outcome);
  });

  // POST /v1/orders/:id/reject
  fastify.post('/orders/:id/reject', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const { reason } = rejectBody.parse(request.body);
    const outcome = await storefront.coordinator.reject(id, requireOwner(request), reason);
    return sendDecision(reply, outcome);
  });

  // GET /v1/orders/:id
  fastify.get('/orders/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const order = await ledger.get(id);
    if (!order) throw new NotFoundError(`Order ${id} not found`);

    const events = await ledger.getEvents(id);
    return reply.send({ success: true, data: { ...order, events } });
  });

  // GET /v1/orders?status=under_review
  fastify.get('/orders', async (request, reply) => {
    const { status, limit } = listQuery.parse(request.query);
    const orders = await ledger.listByStatus(status, { limit });
    return reply.send({ success: true, data: orders });
  });

  // GET /v1/fulfillment/manual
  fastify.get('/fulfillment/manual', async (_request, reply) => {
    const orders = await storefront.fulfillment.listManualQueue();
    return reply.send({ success: true, data: orders });
  });

  // POST /v1/orders/:id/fulfill
  fastify.post('/orders/:id/fulfill', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const result = await storefront.fulfillment.retryManual(id, requireOwner(request));
    return sendFulfillment(reply, result);
  });
};
