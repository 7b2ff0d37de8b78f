import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { Storefront } from 'storefront-core';

const bioBody = z.object({ bio: z.string().min(1).max(4000) });

const paymentCodeBody = z.object({
  content_type: z.string().min(1),
  data: z.string().min(1),
});

const recipientsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export interface SettingsRoutesOptions {
  storefront: Storefront;
}

export const settingsRoutes: FastifyPluginAsync<SettingsRoutesOptions> = async (fastify, opts) => {
  const { catalog } = opts.storefront;

  fastify.get('/settings/bio', async (_request, reply) => {
    return reply.send({ success: true, data: { bio: await catalog.getBio() } });
  });

  fastify.put('/settings/bio', async (request, reply) => {
    const { bio } = bioBody.parse(request.body);
    return reply.send({ success: true, data: { bio: await catalog.setBio(bio) } });
  });

  fastify.put('/settings/payment-code', async (request, reply) => {
    const { content_type, data } = paymentCodeBody.parse(request.body);
    await catalog.setPaymentCode(content_type, data);
    return reply.status(204).send();
  });

  fastify.get('/stats', async (_request, reply) => {
    return reply.send({ success: true, data: await catalog.stats() });
  });

  // GET /v1/recipients?limit=50
  fastify.get('/recipients', async (request, reply) => {
    const { limit } = recipientsQuery.parse(request.query);
    return reply.send({ success: true, data: await catalog.listRecipients(limit) });
  });
};
