import type { FastifyPluginAsync } from 'fastify';

export interface HealthRoutesOptions {
  checkStore: () => Promise<boolean>;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, opts) => {
  fastify.get('/health', async (_request, reply) => {
    const storeOk = await opts.checkStore();
    return reply.status(storeOk ? 200 : 503).send({
      ok: storeOk,
      service: 'storefront-api',
      store: storeOk ? 'up' : 'down',
      timestamp: new Date().toISOString(),
    });
  });
};
