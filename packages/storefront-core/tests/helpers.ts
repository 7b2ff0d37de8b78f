/**
 * Shared fixtures: a scripted in-process transport and a storefront wired
 * to memory stores with zero retry delays.
 */

import { loadConfig } from '../src/config';
import type { StorefrontConfig } from '../src/config';
import { ALLOWED_TRANSITIONS } from '../src/state-machine/stateMachine';
import { createStorefront } from '../src/storefront';
import type { Storefront } from '../src/storefront';
import { createMemoryStores } from '../src/stores';
import type { Stores } from '../src/stores/types';
import { MemoryBlobStore } from '../src/transport/blobStore';
import type { Transport } from '../src/transport/types';
import type { NewProduct, OrderStatus, OutboundMessage, Product, SendResult } from '../src/types/index';

export const OWNER_A = 'owner-a';
export const OWNER_B = 'owner-b';

export const TEST_ENV: NodeJS.ProcessEnv = {
  NODE_ENV: 'test',
  STORE_DRIVER: 'memory',
  OWNER_IDS: `${OWNER_A},${OWNER_B}`,
  ADMIN_API_TOKEN: 'test-admin-token',
  WEBHOOK_SECRET: 'test-webhook-secret',
  TRANSPORT_URL: 'http://transport.test',
  RETRY_BASE_DELAY_MS: '0',
  RETRY_MAX_DELAY_MS: '0',
};

export function testConfig(env: NodeJS.ProcessEnv = {}): StorefrontConfig {
  return loadConfig({ ...TEST_ENV, ...env });
}

interface Gate {
  reached: Promise<void>;
  release: (result?: SendResult) => void;
}

export class ScriptedTransport implements Transport {
  readonly sent: { userId: string; message: OutboundMessage }[] = [];
  private readonly queued = new Map<string, SendResult[]>();
  private readonly fallback = new Map<string, SendResult>();
  private readonly gates = new Map<string, { onReach: () => void; released: Promise<SendResult | undefined> }>();
  private readonly active: string[] = [];
  // who else was mid-send whenever a send started
  private readonly overlaps: string[][] = [];

  /** Results for the next sends to `userId`, in order. */
  script(userId: string, ...results: SendResult[]): void {
    this.queued.set(userId, [...(this.queued.get(userId) ?? []), ...results]);
  }

  /** Result for every send to `userId` once the script is used up. */
  always(userId: string, result: SendResult): void {
    this.fallback.set(userId, result);
  }

  /** Holds the next send to `userId` until released. */
  hold(userId: string): Gate {
    let onReach: () => void = () => undefined;
    const reached = new Promise<void>((resolve) => {
      onReach = resolve;
    });
    let release: (result?: SendResult) => void = () => undefined;
    const released = new Promise<SendResult | undefined>((resolve) => {
      release = resolve;
    });
    this.gates.set(userId, { onReach, released });
    return { reached, release };
  }

  async send(userId: string, message: OutboundMessage): Promise<SendResult> {
    this.sent.push({ userId, message });
    this.active.push(userId);
    this.overlaps.push([...this.active]);
    try {
      const gate = this.gates.get(userId);
      if (gate) {
        this.gates.delete(userId);
        gate.onReach();
        const forced = await gate.released;
        if (forced) return forced;
      } else {
        // let other workers interleave
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
      const next = this.queued.get(userId)?.shift();
      return next ?? this.fallback.get(userId) ?? { status: 'delivered' };
    } finally {
      this.active.splice(this.active.indexOf(userId), 1);
    }
  }

  /** Most sends to `userIds` that were ever in flight at once. */
  peakConcurrency(userIds: readonly string[]): number {
    const wanted = new Set(userIds);
    return Math.max(0, ...this.overlaps.map((ids) => ids.filter((id) => wanted.has(id)).length));
  }

  sentTo(userId: string): OutboundMessage[] {
    return this.sent.filter((entry) => entry.userId === userId).map((entry) => entry.message);
  }

  textsTo(userId: string): string[] {
    return this.sentTo(userId).flatMap((message) => {
      if (message.kind === 'text') return [message.text];
      return message.caption !== undefined ? [message.caption] : [];
    });
  }
}

export interface TestStorefront {
  storefront: Storefront;
  transport: ScriptedTransport;
  blobs: MemoryBlobStore;
  stores: Stores;
  config: StorefrontConfig;
}

export function buildTestStorefront(
  options: { env?: NodeJS.ProcessEnv; clock?: () => Date; stores?: Stores } = {}
): TestStorefront {
  const config = testConfig(options.env);
  const stores = options.stores ?? createMemoryStores();
  const transport = new ScriptedTransport();
  const blobs = new MemoryBlobStore();
  const storefront = createStorefront(config, { stores, transport, blobs, clock: options.clock });
  return { storefront, transport, blobs, stores, config };
}

export const SAMPLE_PRODUCT: NewProduct = {
  category: 'Premium Files',
  title: 'Sample Pack',
  description: 'A test artifact',
  price: '10',
  artifact_ref: 'artifacts/sample-pack.zip',
};

export async function seedProduct(t: TestStorefront, product: NewProduct = SAMPLE_PRODUCT): Promise<Product> {
  await t.blobs.put(product.artifact_ref, Buffer.from('artifact-bytes'));
  return t.stores.catalog.create(product);
}

// 1x1 transparent PNG
export const PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==';

/** Places an order and submits evidence so it sits in `under_review`. */
export async function orderUnderReview(t: TestStorefront, buyerId = 'buyer-1') {
  const product = await seedProduct(t);
  await t.stores.recipients.touch(buyerId);
  const placed = await t.storefront.payments.placeOrder(buyerId, product.id);
  const order = await t.storefront.payments.submitEvidence(buyerId, {
    content_type: 'image/png',
    data: PNG_BASE64,
  });
  return { product, placed, order };
}

/** Whether `later` can be reached from `earlier` by following allowed edges. */
export function isReachable(earlier: OrderStatus, later: OrderStatus): boolean {
  if (earlier === later) return true;
  const seen = new Set<OrderStatus>();
  const frontier: OrderStatus[] = [earlier];
  while (frontier.length > 0) {
    const current = frontier.pop();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    for (const rule of ALLOWED_TRANSITIONS[current]) {
      if (rule.to === later) return true;
      frontier.push(rule.to);
    }
  }
  return false;
}
