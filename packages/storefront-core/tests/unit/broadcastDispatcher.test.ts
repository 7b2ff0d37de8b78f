/**
 * Unit Tests for the broadcast dispatcher
 */

import { StorageError, UnauthorizedOwnerError } from 'storefront-core';
import type { OutboundMessage } from 'storefront-core';
import { buildTestStorefront, OWNER_A } from '../helpers';
import type { TestStorefront } from '../helpers';

const SALE: OutboundMessage = { kind: 'text', text: 'Weekend sale: 20% off everything' };

async function withRecipients(t: TestStorefront, ids: string[]): Promise<void> {
  for (const id of ids) {
    await t.stores.recipients.touch(id);
  }
}

describe('BroadcastDispatcher', () => {
  it('skips a blocked recipient and marks them blocked', async () => {
    const t = buildTestStorefront();
    await withRecipients(t, ['U1', 'U2', 'U3']);
    t.transport.always('U2', { status: 'blocked', error: 'bot was blocked by the user' });

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await t.storefront.drain();

    expect(await t.storefront.dispatcher.getSummary(job.id)).toEqual({
      job_id: job.id,
      total: 3,
      delivered: 2,
      blocked: 1,
      failed: 0,
      skipped: 0,
      pending: 0,
      completed: true,
      cancelled: false,
    });
    expect(t.transport.sentTo('U2')).toHaveLength(1);
    expect((await t.stores.recipients.get('U2'))?.blocked).toBe(true);
    expect(t.transport.textsTo(OWNER_A)).toEqual([
      `Broadcast ${job.id} started for 3 recipient(s).`,
      `Broadcast ${job.id} finished\nDelivered: 2\nBlocked: 1\nFailed: 0\nSkipped: 0`,
    ]);
  });

  it('leaves blocked users out of the next snapshot', async () => {
    const t = buildTestStorefront();
    await withRecipients(t, ['U1', 'U2', 'U3']);
    await t.stores.recipients.markBlocked('U2');

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await t.storefront.drain();

    expect(job.recipients.map((r) => r.user_id)).toEqual(['U1', 'U3']);
    expect(t.transport.sentTo('U2')).toEqual([]);
  });

  it('sends only to the listed users for a users target', async () => {
    const t = buildTestStorefront();
    await withRecipients(t, ['U1', 'U2', 'U3']);

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'users', user_ids: ['U3', 'U9'] }, OWNER_A);
    await t.storefront.drain();

    expect(job.recipients.map((r) => r.user_id)).toEqual(['U3']);
    expect(t.transport.sentTo('U3')).toEqual([SALE]);
    expect(t.transport.sentTo('U1')).toEqual([]);
  });

  it('retries a transient failure and records the attempts', async () => {
    const t = buildTestStorefront();
    await withRecipients(t, ['U1']);
    t.transport.script('U1', { status: 'transient_error', error: '503 from upstream' });

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await t.storefront.drain();

    const stored = await t.stores.broadcasts.get(job.id);
    expect(stored?.recipients[0]).toMatchObject({ user_id: 'U1', status: 'delivered', attempts: 2, last_error: null });
    expect(t.transport.sentTo('U1')).toHaveLength(2);
  });

  it('marks a recipient failed once the attempt budget is spent', async () => {
    const t = buildTestStorefront();
    await withRecipients(t, ['U1', 'U2']);
    t.transport.always('U1', { status: 'transient_error', error: 'timeout' });

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await t.storefront.drain();

    const stored = await t.stores.broadcasts.get(job.id);
    expect(stored?.recipients[0]).toMatchObject({ user_id: 'U1', status: 'failed', attempts: 3, last_error: 'timeout' });
    expect(stored?.recipients[1]).toMatchObject({ user_id: 'U2', status: 'delivered', attempts: 1 });
    expect(t.transport.sentTo('U1')).toHaveLength(3);
    expect((await t.stores.recipients.get('U1'))?.blocked).toBe(false);
  });

  it('never has more sends in flight than the configured concurrency', async () => {
    const t = buildTestStorefront({ env: { BROADCAST_CONCURRENCY: '2' } });
    const ids = ['U1', 'U2', 'U3', 'U4', 'U5', 'U6'];
    await withRecipients(t, ids);

    await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await t.storefront.drain();

    expect(t.transport.peakConcurrency(ids)).toBe(2);
    for (const id of ids) {
      expect(t.transport.sentTo(id)).toEqual([SALE]);
    }
  });

  it('finishes in-flight sends and skips the rest when cancelled', async () => {
    const t = buildTestStorefront({ env: { BROADCAST_CONCURRENCY: '1' } });
    await withRecipients(t, ['U1', 'U2', 'U3', 'U4', 'U5']);
    const gate = t.transport.hold('U2');

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await gate.reached;

    const cancelled = t.storefront.dispatcher.cancel(job.id, OWNER_A);
    gate.release();
    const summary = await cancelled;

    expect(summary).toMatchObject({ delivered: 2, skipped: 3, pending: 0, completed: true, cancelled: true });
    expect(t.transport.sentTo('U3')).toEqual([]);

    await t.storefront.drain();
    expect(t.transport.textsTo(OWNER_A).pop()).toBe(
      `Broadcast ${job.id} cancelled\nDelivered: 2\nBlocked: 0\nFailed: 0\nSkipped: 3`
    );
  });

  it('closes a job that is not running when cancelled', async () => {
    const t = buildTestStorefront();
    const job = await t.stores.broadcasts.create(SALE, OWNER_A, ['U1', 'U2', 'U3']);
    await t.stores.broadcasts.saveRecipient(job.id, 'U1', { status: 'delivered', attempts: 1, last_error: null });

    const summary = await t.storefront.dispatcher.cancel(job.id, OWNER_A);

    expect(summary).toMatchObject({ total: 3, delivered: 1, skipped: 2, completed: true, cancelled: true });
    expect(await t.storefront.dispatcher.cancel(job.id, OWNER_A)).toEqual(summary);
  });

  it('resumes after a restart without resending to finished recipients', async () => {
    const before = buildTestStorefront();
    const job = await before.stores.broadcasts.create(SALE, OWNER_A, ['U1', 'U2', 'U3']);
    await before.stores.broadcasts.saveRecipient(job.id, 'U1', { status: 'delivered', attempts: 1, last_error: null });
    await before.stores.broadcasts.saveRecipient(job.id, 'U2', {
      status: 'blocked',
      attempts: 1,
      last_error: 'bot was blocked by the user',
    });

    const after = buildTestStorefront({ stores: before.stores });
    expect(await after.storefront.recover()).toEqual({ broadcasts: 1, deliveries: 0 });
    await after.storefront.drain();

    expect(after.transport.sentTo('U1')).toEqual([]);
    expect(after.transport.sentTo('U2')).toEqual([]);
    expect(after.transport.sentTo('U3')).toEqual([SALE]);
    expect(await after.storefront.dispatcher.getSummary(job.id)).toMatchObject({
      delivered: 2,
      blocked: 1,
      completed: true,
      cancelled: false,
    });
    expect(await after.stores.broadcasts.listIncomplete()).toEqual([]);
  });

  it('carries prior attempts of a retrying recipient into the budget', async () => {
    const t = buildTestStorefront();
    const job = await t.stores.broadcasts.create(SALE, OWNER_A, ['U1']);
    await t.stores.broadcasts.saveRecipient(job.id, 'U1', { status: 'retrying', attempts: 2, last_error: 'timeout' });
    t.transport.always('U1', { status: 'transient_error', error: 'timeout' });

    await t.storefront.dispatcher.resumeIncomplete();
    await t.storefront.drain();

    const stored = await t.stores.broadcasts.get(job.id);
    expect(stored?.recipients[0]).toMatchObject({ status: 'failed', attempts: 3 });
    expect(t.transport.sentTo('U1')).toHaveLength(1);
  });

  it('stops every worker when a progress write fails and keeps the job registered until they do', async () => {
    const t = buildTestStorefront({ env: { BROADCAST_CONCURRENCY: '2' } });
    await withRecipients(t, ['U1', 'U2', 'U3', 'U4', 'U5', 'U6']);

    const saveRecipient = t.stores.broadcasts.saveRecipient.bind(t.stores.broadcasts);
    let signalFailure: () => void = () => undefined;
    const saveFailed = new Promise<void>((resolve) => {
      signalFailure = resolve;
    });
    jest.spyOn(t.stores.broadcasts, 'saveRecipient').mockImplementation(async (jobId, userId, outcome) => {
      if (userId === 'U1') {
        signalFailure();
        throw new StorageError('save broadcast progress', new Error('connection reset'));
      }
      return saveRecipient(jobId, userId, outcome);
    });
    const gate = t.transport.hold('U2');

    const job = await t.storefront.dispatcher.start(SALE, { kind: 'all' }, OWNER_A);
    await gate.reached;
    await saveFailed;
    await new Promise<void>((resolve) => setImmediate(resolve));

    // U2 is still in flight, so the job must still count as running.
    expect(t.storefront.dispatcher.isRunning(job.id)).toBe(true);

    gate.release();
    await t.storefront.drain();

    expect(t.storefront.dispatcher.isRunning(job.id)).toBe(false);
    for (const userId of ['U3', 'U4', 'U5', 'U6']) {
      expect(t.transport.sentTo(userId)).toEqual([]);
    }
    expect(await t.storefront.dispatcher.getSummary(job.id)).toMatchObject({
      delivered: 1,
      pending: 5,
      completed: false,
    });

    expect(await t.storefront.dispatcher.cancel(job.id, OWNER_A)).toEqual({
      job_id: job.id,
      total: 6,
      delivered: 1,
      blocked: 0,
      failed: 0,
      skipped: 5,
      pending: 0,
      completed: true,
      cancelled: true,
    });
    await t.storefront.drain();
    for (const userId of ['U3', 'U4', 'U5', 'U6']) {
      expect(t.transport.sentTo(userId)).toEqual([]);
    }
  });

  it('only lets owners start a broadcast', async () => {
    const t = buildTestStorefront();
    await expect(t.storefront.dispatcher.start(SALE, { kind: 'all' }, 'U1')).rejects.toBeInstanceOf(
      UnauthorizedOwnerError
    );
    expect(await t.stores.broadcasts.listIncomplete()).toEqual([]);
  });
});
