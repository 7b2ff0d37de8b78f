/**
 * Inbound transport webhook. The transport presents the shared secret in
 * `x-webhook-secret`; the message is handed to the chat command router.
 */
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { AuthenticationError } from 'storefront-core';
import type { Storefront } from 'storefront-core';
import { secretsMatch } from '../hooks/auth';

const inboundSchema = z.object({
  user_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  payload: z.string().max(8192).default(''),
  display_name: z.string().max(200).optional(),
  attachment: z
    .object({
      content_type: z.string().min(1),
      data: z.string().min(1),
      filename: z.string().max(255).optional(),
    })
    .optional(),
});

export interface WebhookRoutesOptions {
  storefront: Storefront;
}

export const webhookRoutes: FastifyPluginAsync<WebhookRoutesOptions> = async (fastify, opts) => {
  const { storefront } = opts;

  fastify.post('/webhook', async (request, reply) => {
    if (!secretsMatch(request.headers['x-webhook-secret'], storefront.config.webhookSecret)) {
      throw new AuthenticationError('Invalid webhook secret');
    }

    const message = inboundSchema.parse(request.body);
    const outcome = await storefront.router.handle(message);

    return reply.send({ success: true, data: outcome });
  });
};
