/**
 * Builds the Fastify instance: CORS, one error handler for every route,
 * the public webhook and health routes, and the token-guarded /v1 routes.
 */
import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import { StorefrontError } from 'storefront-core';
import type { Storefront } from 'storefront-core';
import { adminAuthHook } from './hooks/auth';
import { broadcastRoutes } from './routes/broadcasts';
import { healthRoutes } from './routes/health';
import { orderRoutes } from './routes/orders';
import { productRoutes } from './routes/products';
import { settingsRoutes } from './routes/settings';
import { webhookRoutes } from './routes/webhook';

export interface BuildAppOptions {
  storefront: Storefront;
  checkStore: () => Promise<boolean>;
  logger?: boolean;
}

// base64 inflates uploads by a third; leave room for the JSON envelope
function bodyLimitFor(maxEvidenceBytes: number): number {
  return Math.ceil(maxEvidenceBytes * 1.4) + 64 * 1024;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { storefront } = options;
  const { config } = storefront;

  const fastify = Fastify({
    logger: options.logger === false ? false : { level: config.server.logLevel },
    bodyLimit: bodyLimitFor(config.maxEvidenceBytes),
  });

  fastify.decorateRequest('ownerId', null);

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
        code: 'VALIDATION_FAILED',
      });
    }

    if (error instanceof StorefrontError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, 'Storefront operation failed');
      }
      return reply.status(error.statusCode).send({
        success: false,
        error: error.message,
        code: error.code,
      });
    }

    // Fastify's own 4xx errors: malformed JSON, body too large
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        success: false,
        error: error.message,
        code: error.code,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      success: false,
      error: 'Internal server error',
      code: 'INTERNAL',
    });
  });

  await fastify.register(cors, {
    origin: config.server.corsOrigin,
    credentials: true,
  });

  await fastify.register(healthRoutes, { checkStore: options.checkStore });
  await fastify.register(webhookRoutes, { storefront });

  await fastify.register(
    async (admin) => {
      admin.addHook('onRequest', adminAuthHook(config.adminApiToken, storefront.owners));
      await admin.register(orderRoutes, { storefront });
      await admin.register(broadcastRoutes, { storefront });
      await admin.register(productRoutes, { storefront });
      await admin.register(settingsRoutes, { storefront });
    },
    { prefix: '/v1' }
  );

  return fastify;
}
