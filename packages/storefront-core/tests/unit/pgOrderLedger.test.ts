/**
 * Unit Tests for the Postgres order ledger
 *
 * pg is mocked; the real transaction helper runs against a recording client
 * so BEGIN/COMMIT/ROLLBACK ordering is checked too.
 */

jest.mock('pg', () => ({
  Pool: jest.fn(),
}));

import { Pool } from 'pg';
import { closePool, initPool } from '../../src/db/client';
import { InvalidTransitionError, StorageError } from '../../src/errors';
import { PgOrderLedger } from '../../src/stores/postgres/orderLedger';
import { testConfig } from '../helpers';

// ─── Mock pg client builder ────────────────────────────────────────────

const ORDER_ID = '3f1c9a52-7d4e-4b8a-9c21-5e6f7a8b9c0d';
const PRODUCT_ID = '8a2b4c6d-1e3f-4a5b-8c7d-9e0f1a2b3c4d';
const MISSING_ID = '00000000-0000-4000-8000-000000000000';

interface MockState {
  orderRow?: Record<string, unknown>;
  productRow?: Record<string, unknown>;
  failOn?: string;
}

function createMockClient(state: MockState) {
  const queries: { text: string; params: unknown[] }[] = [];

  return {
    queries,
    release: jest.fn(),
    query: jest.fn(async (text: string, params?: unknown[]) => {
      queries.push({ text, params: params || [] });

      if (state.failOn && text.includes(state.failOn)) {
        throw new Error('connection reset');
      }
      if (text.includes('FROM orders WHERE id') && text.includes('FOR UPDATE')) {
        return { rows: state.orderRow ? [{ ...state.orderRow }] : [] };
      }
      if (text.includes('FROM products WHERE id') && text.includes('FOR SHARE')) {
        return { rows: state.productRow ? [{ ...state.productRow }] : [] };
      }
      if (text.includes('INSERT INTO orders')) {
        return { rows: [{ id: ORDER_ID, buyer_id: params?.[0], product_id: params?.[1], status: 'created' }] };
      }
      if (text.includes('UPDATE orders')) {
        return {
          rows: [{
            ...state.orderRow,
            status: params?.[1],
            decided_by: params?.[4],
            decision_reason: params?.[6],
            order_version: 3,
          }],
        };
      }
      return { rows: [] };
    }),
  };
}

function keywords(client: ReturnType<typeof createMockClient>): string[] {
  return client.queries.map((q) => q.text.trim().split(/\s+/)[0] ?? '');
}

const REVIEW_ROW = {
  id: ORDER_ID,
  order_number: 7,
  buyer_id: 'buyer-1',
  product_id: PRODUCT_ID,
  status: 'under_review',
  amount: '10',
  artifact_ref: 'artifacts/sample-pack.zip',
  payment_ref: 'PAY-0000000001',
  evidence_ref: 'evidence/order-1.png',
  decided_by: null,
  decided_at: null,
  decision_reason: null,
  order_version: 2,
};

describe('PgOrderLedger.compareAndTransition', () => {
  let client = createMockClient({});
  const ledger = new PgOrderLedger();

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

  it('locks the row, writes status and event, then commits', async () => {
    client = createMockClient({ orderRow: REVIEW_ROW });

    const result = await ledger.compareAndTransition(ORDER_ID, 'under_review', 'approved', {
      actor_type: 'owner',
      actor_id: 'owner-a',
      decided_by: 'owner-a',
    });

    expect(result.status).toBe('committed');
    if (result.status !== 'committed') return;
    expect(result.order.status).toBe('approved');
    expect(result.order.decided_by).toBe('owner-a');

    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'INSERT', 'COMMIT']);

    const update = client.queries[2];
    expect(update?.params[0]).toBe(ORDER_ID);
    expect(update?.params[1]).toBe('approved');
    expect(update?.params[4]).toBe('owner-a');
    expect(update?.params[9]).toBe('under_review');

    const event = client.queries[3];
    expect(event?.params).toEqual([
      ORDER_ID,
      'order_approved',
      'owner',
      'owner-a',
      'under_review',
      'approved',
      '{"decided_by":"owner-a"}',
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('returns the current row when the status already moved on', async () => {
    client = createMockClient({ orderRow: { ...REVIEW_ROW, status: 'rejected', decided_by: 'owner-b' } });

    const result = await ledger.compareAndTransition(ORDER_ID, 'under_review', 'approved', {
      actor_type: 'owner',
      actor_id: 'owner-a',
      decided_by: 'owner-a',
    });

    expect(result.status).toBe('precondition_failed');
    if (result.status !== 'precondition_failed') return;
    expect(result.order.status).toBe('rejected');
    expect(result.order.decided_by).toBe('owner-b');
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'COMMIT']);
  });

  it('returns not_found when no row is locked', async () => {
    client = createMockClient({});

    const result = await ledger.compareAndTransition(MISSING_ID, 'under_review', 'rejected', {
      actor_type: 'owner',
      actor_id: 'owner-b',
      decided_by: 'owner-b',
      decision_reason: 'no payment',
    });

    expect(result).toEqual({ status: 'not_found' });
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'COMMIT']);
  });

  it('returns not_found for an id that is not a UUID without querying', async () => {
    client = createMockClient({ orderRow: REVIEW_ROW });

    const result = await ledger.compareAndTransition('foo', 'under_review', 'approved', {
      actor_type: 'owner',
      actor_id: 'owner-a',
      decided_by: 'owner-a',
    });

    expect(result).toEqual({ status: 'not_found' });
    expect(client.queries).toEqual([]);
  });

  it('rolls back and raises StorageError when the event insert fails', async () => {
    client = createMockClient({ orderRow: REVIEW_ROW, failOn: 'INSERT INTO order_events' });

    await expect(
      ledger.compareAndTransition(ORDER_ID, 'under_review', 'approved', {
        actor_type: 'owner',
        actor_id: 'owner-a',
        decided_by: 'owner-a',
      })
    ).rejects.toThrow(new StorageError('transition under_review -> approved', new Error('connection reset')));

    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'UPDATE', 'INSERT', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rejects an edge outside the graph before touching the database', async () => {
    client = createMockClient({ orderRow: REVIEW_ROW });

    await expect(
      ledger.compareAndTransition(ORDER_ID, 'under_review', 'fulfilled', {
        actor_type: 'system',
        actor_id: 'fulfillment',
      })
    ).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(client.queries).toEqual([]);
  });
});

describe('PgOrderLedger reads and create', () => {
  let client = createMockClient({});
  const ledger = new PgOrderLedger();

  const NEW_ORDER = {
    buyer_id: 'buyer-1',
    product_id: PRODUCT_ID,
    amount: '10.00',
    artifact_ref: 'artifacts/sample-pack.zip',
    payment_ref: 'PAY-0000000001',
  };

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

  it('answers null and no events for a malformed id without querying', async () => {
    client = createMockClient({ orderRow: REVIEW_ROW });

    expect(await ledger.get('foo')).toBeNull();
    expect(await ledger.getEvents('foo')).toEqual([]);
    expect(await ledger.recordFulfillmentFailure('foo', 1, 'timeout')).toBe(false);
    expect(client.queries).toEqual([]);
  });

  it('inserts under a share lock on the product row', async () => {
    client = createMockClient({
      productRow: { archived: false, price: '10.00', artifact_ref: 'artifacts/sample-pack.zip' },
    });

    const order = await ledger.create(NEW_ORDER);

    expect(order).toMatchObject({ id: ORDER_ID, product_id: PRODUCT_ID, status: 'created' });
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'INSERT', 'COMMIT']);
    expect(client.queries[1]?.text).toBe('SELECT archived, price, artifact_ref FROM products WHERE id = $1 FOR SHARE');
  });

  it('rolls back when the artifact changed since the buyer read the product', async () => {
    client = createMockClient({
      productRow: { archived: false, price: '10.00', artifact_ref: 'artifacts/v2.zip' },
    });

    await expect(ledger.create(NEW_ORDER)).rejects.toMatchObject({ code: 'PRODUCT_CHANGED', statusCode: 400 });
    expect(keywords(client)).toEqual(['BEGIN', 'SELECT', 'ROLLBACK']);
  });

  it('reports a malformed product id as an unknown product', async () => {
    client = createMockClient({});

    await expect(ledger.create({ ...NEW_ORDER, product_id: 'foo' })).rejects.toMatchObject({
      code: 'UNKNOWN_PRODUCT',
      message: "Unknown product 'foo'",
    });
    expect(client.queries).toEqual([]);
  });
});
