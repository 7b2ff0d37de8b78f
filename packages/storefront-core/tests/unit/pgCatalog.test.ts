/**
 * Unit Tests for the Postgres product catalog
 *
 * pg is mocked; the artifact lock and archive-or-delete decisions must run
 * inside the transaction that holds the product row.
 */

jest.mock('pg', () => ({
  Pool: jest.fn(),
}));

import { Pool } from 'pg';
import { closePool, initPool } from '../../src/db/client';
import { ProductLockedError } from '../../src/errors';
import { PgProductCatalog } from '../../src/stores/postgres/catalog';
import { testConfig } from '../helpers';

const PRODUCT_ID = '8a2b4c6d-1e3f-4a5b-8c7d-9e0f1a2b3c4d';

const PRODUCT_ROW = {
  id: PRODUCT_ID,
  category: 'Premium Files',
  title: 'Sample Pack',
  description: '',
  price: '10.00',
  artifact_ref: 'artifacts/sample-pack.zip',
  archived: false,
};

function createMockClient(state: { productRow?: Record<string, unknown>; referenced?: boolean }) {
  const queries: { text: string; params: unknown[] }[] = [];

  return {
    queries,
    release: jest.fn(),
    query: jest.fn(async (text: string, params?: unknown[]) => {
      queries.push({ text, params: params || [] });

      if (text.includes('FROM products WHERE id') && text.includes('FOR UPDATE')) {
        return { rows: state.productRow ? [{ ...state.productRow }] : [] };
      }
      if (text.includes('SELECT EXISTS')) {
        return { rows: [{ referenced: state.referenced === true }] };
      }
      if (text.startsWith('UPDATE products SET category') || text.startsWith('UPDATE products SET title')) {
        return { rows: [{ ...state.productRow, title: params?.[1] }] };
      }
      return { rows: [] };
    }),
  };
}

function keywords(client: ReturnType<typeof createMockClient>): string[] {
  return client.queries.map((q) => q.text.trim().split(/\s+/)[0] ?? '');
}

describe('PgProductCatalog', () => {
  let client = createMockClient({});
  const catalog = new PgProductCatalog();

  beforeAll(() => {
    (Pool as unknown as jest.Mock).mockImplementation(() => ({
      on: jest.fn(),
      connect: jest.fn(async () => client),
      query: jest.fn(async (text: string, params?: unknown[]) => client.query(text, params)),
      end: jest.fn(async () => undefined),
    }));
    initPool(testConfig());
  });

  afterAll(async () => {
    await closePool();
  });

  it('treats a malformed id as an unknown product without querying', async () => {
    client = createMockClient({ productRow: PRODUCT_ROW });

    expect(await catalog.get('foo')).toBeNull();
    expect(await catalog.update('foo', { title: 'Renamed' })).toBeNull();
    expect(await catalog.remove('foo')).toBeNull();
    expect(client.queries).toEqual([]);
  });

  it('checks for referencing orders while holding the row lock', async () => {
    client = createMockClient({ productRow: PRODUCT_ROW, referenced: true });

    await expect(catalog.update(PRODUCT_ID, { artifact_ref: 'artifacts/v2.zip' })).rejects.toThrow(
      new ProductLockedError(PRODUCT_ID)
    );

    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'SELECT', 'ROLLBACK']);
    expect(client.queries[2]?.text).toBe('SELECT EXISTS (SELECT 1 FROM orders WHERE product_id = $1) AS referenced');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('skips the reference check when the artifact is untouched', async () => {
    client = createMockClient({ productRow: PRODUCT_ROW, referenced: true });

    const updated = await catalog.update(PRODUCT_ID, { title: 'Renamed' });

    expect(updated?.title).toBe('Renamed');
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'COMMIT']);
  });

  it('archives a referenced product instead of deleting it', async () => {
    client = createMockClient({ productRow: PRODUCT_ROW, referenced: true });

    expect(await catalog.remove(PRODUCT_ID)).toBe('archived');
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'SELECT', 'UPDATE', 'COMMIT']);
  });

  it('deletes a product nobody ordered', async () => {
    client = createMockClient({ productRow: PRODUCT_ROW, referenced: false });

    expect(await catalog.remove(PRODUCT_ID)).toBe('deleted');
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'SELECT', 'DELETE', 'COMMIT']);
  });

  it('answers null for an unknown product', async () => {
    client = createMockClient({});

    expect(await catalog.remove(PRODUCT_ID)).toBeNull();
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'COMMIT']);
  });
});
