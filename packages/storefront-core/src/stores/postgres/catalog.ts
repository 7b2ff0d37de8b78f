import type { PoolClient } from 'pg';
import { query, queryOne, queryRows, transaction } from '../../db/client';
import { ProductLockedError } from '../../errors';
import type { NewProduct, Product, ProductPatch, ProductRemoval } from '../../types/index';
import type { ProductCatalogStore, SettingsStore } from '../types';
import { guarded, isUuid } from './guarded';

const PATCHABLE_COLUMNS = ['category', 'title', 'description', 'price', 'artifact_ref'] as const;

// Call with the product row held FOR UPDATE; order creation takes FOR SHARE on it.
async function isReferenced(client: PoolClient, id: string): Promise<boolean> {
  const rows = await queryRows<{ referenced: boolean }>(
    client,
    'SELECT EXISTS (SELECT 1 FROM orders WHERE product_id = $1) AS referenced',
    [id]
  );
  return rows[0]?.referenced === true;
}

async function lockProduct(client: PoolClient, id: string): Promise<Product | null> {
  const locked = await queryRows<Product>(client, 'SELECT * FROM products WHERE id = $1 FOR UPDATE', [id]);
  return locked[0] ?? null;
}

export class PgProductCatalog implements ProductCatalogStore {
  async get(id: string): Promise<Product | null> {
    if (!isUuid(id)) return null;
    return guarded('get product', () => queryOne<Product>('SELECT * FROM products WHERE id = $1', [id]));
  }

  async list(options: { category?: string; includeArchived?: boolean } = {}): Promise<Product[]> {
    return guarded('list products', () =>
      query<Product>(
        `SELECT * FROM products
         WHERE ($1::text IS NULL OR category = $1)
           AND ($2 OR archived = false)
         ORDER BY created_at ASC`,
        [options.category ?? null, options.includeArchived ?? false]
      )
    );
  }

  async create(input: NewProduct): Promise<Product> {
    return guarded('create product', async () => {
      const rows = await query<Product>(
        `INSERT INTO products (category, title, description, price, artifact_ref)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING *`,
        [input.category, input.title, input.description, input.price, input.artifact_ref]
      );
      const product = rows[0];
      if (!product) throw new Error('INSERT returned no row');
      return product;
    });
  }

  async update(id: string, patch: ProductPatch): Promise<Product | null> {
    if (!isUuid(id)) return null;
    return guarded('update product', () =>
      transaction(async (client) => {
        const current = await lockProduct(client, id);
        if (!current) return null;

        if (
          patch.artifact_ref !== undefined &&
          patch.artifact_ref !== current.artifact_ref &&
          (await isReferenced(client, id))
        ) {
          throw new ProductLockedError(id);
        }

        const sets: string[] = [];
        const params: unknown[] = [id];
        for (const column of PATCHABLE_COLUMNS) {
          const value = patch[column];
          if (value !== undefined) {
            params.push(value);
            sets.push(`${column} = $${params.length}`);
          }
        }
        if (sets.length === 0) return current;

        const updated = await queryRows<Product>(
          client,
          `UPDATE products SET ${sets.join(', ')}, updated_at = NOW() WHERE id = $1 RETURNING *`,
          params
        );
        return updated[0] ?? null;
      })
    );
  }

  async remove(id: string): Promise<ProductRemoval | null> {
    if (!isUuid(id)) return null;
    return guarded('remove product', () =>
      transaction<ProductRemoval | null>(async (client) => {
        const current = await lockProduct(client, id);
        if (!current) return null;

        if (await isReferenced(client, id)) {
          await client.query('UPDATE products SET archived = true, updated_at = NOW() WHERE id = $1', [id]);
          return 'archived';
        }
        await client.query('DELETE FROM products WHERE id = $1', [id]);
        return 'deleted';
      })
    );
  }
}

export class PgSettingsStore implements SettingsStore {
  async get(key: string): Promise<string | null> {
    return guarded('get setting', async () => {
      const row = await queryOne<{ value: string }>('SELECT value FROM settings WHERE key = $1', [key]);
      return row ? row.value : null;
    });
  }

  async set(key: string, value: string): Promise<void> {
    await guarded('set setting', () =>
      query(
        `INSERT INTO settings (key, value) VALUES ($1, $2)
         ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value`,
        [key, value]
      )
    );
  }
}
