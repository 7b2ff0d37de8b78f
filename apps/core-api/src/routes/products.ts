import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { newProductSchema, productPatchSchema } from 'storefront-core';
import type { Storefront } from 'storefront-core';

const idParams = z.object({ id: z.string().uuid() });

const listQuery = z.object({
  category: z.string().min(1).optional(),
  include_archived: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export interface ProductRoutesOptions {
  storefront: Storefront;
}

export const productRoutes: FastifyPluginAsync<ProductRoutesOptions> = async (fastify, opts) => {
  const { catalog } = opts.storefront;

  fastify.get('/products', async (request, reply) => {
    const { category, include_archived } = listQuery.parse(request.query);
    const products = await catalog.listProducts({ category, includeArchived: include_archived });
    return reply.send({ success: true, data: products });
  });

  fastify.get('/products/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    return reply.send({ success: true, data: await catalog.getProduct(id) });
  });

  fastify.post('/products', async (request, reply) => {
    const product = await catalog.addProduct(newProductSchema.parse(request.body));
    return reply.status(201).send({ success: true, data: product });
  });

  fastify.patch('/products/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const product = await catalog.updateProduct(id, productPatchSchema.parse(request.body));
    return reply.send({ success: true, data: product });
  });

  // Sold products are archived, never deleted
  fastify.delete('/products/:id', async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const removal = await catalog.removeProduct(id);
    return reply.send({ success: true, data: { id, removal } });
  });
};
