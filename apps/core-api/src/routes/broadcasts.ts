/**
 * Administrator broadcast routes. Starting a job returns 202 at once; the
 * dispatcher sends in the background and its progress is read back here.
 */
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Storefront } from 'storefront-core';
import { requireOwner } from '../hooks/auth';

const outboundSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('text'), text: z.string().min(1).max(4096) }),
  z.object({
    kind: z.literal('photo'),
    data: z.string().min(1),
    content_type: z.string().regex(/^image\//, 'photo needs an image content type'),
    caption: z.string().max(1024).optional(),
  }),
  z.object({
    kind: z.literal('document'),
    data: z.string().min(1),
    content_type: z.string().min(1),
    filename: z.string().min(1).max(255),
    caption: z.string().max(1024).optional(),
  }),
]);

const targetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('all') }),
  z.object({ kind: z.literal('users'), user_ids: z.array(z.string().min(1)).min(1).max(100000) }),
]);

const startBody = z.object({
  payload: z.union([z.string().min(1).max(4096), outboundSchema]),
  target: targetSchema.default({ kind: 'all' }),
});

const idParams = z.object({ id: z.string().uuid() });

export interface BroadcastRoutesOptions {
  storefront: Storefront;
}

export const broadcastRoutes: FastifyPluginAsync<BroadcastRoutesOptions> = async (fastify, opts) => {
  const { dispatcher } = opts.storefront;

  // POST /v1/broadcasts
  fastify.post('/broadcasts', async (request, reply) => {
    const body = startBody.parse(request.body);
    const payload = typeof body.payload === 'string' ? { kind: 'text' as const, text: body.payload } : body.payload;

    const job = await dispatcher.start(payload, body.target, requireOwner(request));
    return reply.status(202).send({
      success: true,
      data: { job_id: job.id, recipients: job.recipients.length },
    });
  });

  // GET /v1/broadcasts/:id
  fastify.get('/broadcasts/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const summary = await dispatcher.getSummary(id);
    return reply.send({ success: true, data: { ...summary, running: dispatcher.isRunning(id) } });
  });

  // POST /v1/broadcasts/:id/cancel
  fastify.post('/broadcasts/:id/cancel', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const summary = await dispatcher.cancel(id, requireOwner(request));
    return reply.send({ success: true, data: summary });
  });
};
