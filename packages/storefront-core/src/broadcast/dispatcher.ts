/**
 * Broadcast Dispatcher
 *
 * Sends one payload to a recipient snapshot with a fixed number of workers.
 * Every recipient outcome is written to the job store before the worker
 * takes the next recipient, so a restarted process resumes with exactly the
 * recipients that are not yet terminal.
 *
 * Cancelling stops workers from taking new recipients; sends already in
 * flight finish and are recorded, everything left becomes `skipped`. A
 * worker failure (a progress write that fails) halts the other workers the
 * same way; the job stays registered until every worker has stopped.
 */

import { errorMessage, NotFoundError, PermanentDeliveryError } from '../errors';
import { broadcastStarted, broadcastSummary } from '../messages/templates';
import type { Notifier } from '../notifications/notifier';
import type { OwnerAllowList } from '../approval/owners';
import { isTerminalRecipientStatus } from '../stores/types';
import type { BroadcastJobStore, RecipientOutcome, RecipientStore } from '../stores/types';
import { isTransientDeliveryError, sendOrThrow } from '../transport/send';
import type { Transport } from '../transport/types';
import type {
  BroadcastJob,
  BroadcastSummary,
  BroadcastTarget,
  OutboundMessage,
  RecipientProgress,
} from '../types/index';
import { logger } from '../utils/logger';
import { retryWithBackoff, RetryAbortedError, RetryExhaustedError } from '../utils/retry';
import type { RetryPolicy } from '../utils/retry';

export interface BroadcastDispatcherDeps {
  jobs: BroadcastJobStore;
  recipients: RecipientStore;
  transport: Transport;
  notifier: Notifier;
  owners: OwnerAllowList;
  concurrency: number;
  retry: RetryPolicy;
}

interface RunningJob {
  cancelled: boolean;
  failed: boolean;
  done: Promise<void>;
}

const halted = (state: RunningJob): boolean => state.cancelled || state.failed;

export function summarize(job: BroadcastJob): BroadcastSummary {
  const summary: BroadcastSummary = {
    job_id: job.id,
    total: job.recipients.length,
    delivered: 0,
    blocked: 0,
    failed: 0,
    skipped: 0,
    pending: 0,
    completed: job.completed,
    cancelled: job.cancelled,
  };

  for (const recipient of job.recipients) {
    switch (recipient.status) {
      case 'delivered':
        summary.delivered++;
        break;
      case 'blocked':
        summary.blocked++;
        break;
      case 'failed':
        summary.failed++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
      case 'pending':
      case 'retrying':
        summary.pending++;
        break;
    }
  }

  return summary;
}

export class BroadcastDispatcher {
  private readonly running = new Map<string, RunningJob>();

  constructor(private readonly deps: BroadcastDispatcherDeps) {}

  /** Snapshots the audience, persists the job and starts sending in the background. */
  async start(payload: OutboundMessage, target: BroadcastTarget, ownerId: string): Promise<BroadcastJob> {
    this.deps.owners.assertOwner(ownerId);

    const audience = await this.deps.recipients.snapshot(target);
    const job = await this.deps.jobs.create(payload, ownerId, audience);

    logger.broadcast.started(job.id, job.recipients.length, this.deps.concurrency);
    this.deps.notifier.post(ownerId, broadcastStarted(job.id, job.recipients.length));
    this.launch(job);
    return job;
  }

  /**
   * Stops a job. A job running here is flagged at once; with `wait` (the
   * default) this resolves after its in-flight sends settle. A job nobody is
   * running is closed directly.
   */
  async cancel(jobId: string, ownerId: string, options: { wait?: boolean } = {}): Promise<BroadcastSummary> {
    this.deps.owners.assertOwner(ownerId);

    const active = this.running.get(jobId);
    if (active) {
      if (!active.cancelled) logger.broadcast.cancelled(jobId, ownerId);
      active.cancelled = true;
      if (!(options.wait ?? true)) return this.getSummary(jobId);
      await active.done;
    }

    const job = await this.deps.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Broadcast ${jobId} not found`);
    if (job.completed) return summarize(job);

    // Not running here, or its run was interrupted before closing it.
    if (!active) logger.broadcast.cancelled(jobId, ownerId);
    await this.deps.jobs.skipRemaining(jobId);
    await this.deps.jobs.finish(jobId, true);
    return this.getSummary(jobId);
  }

  /** Picks up every incomplete job that is not already running in this process. */
  async resumeIncomplete(): Promise<number> {
    const jobs = await this.deps.jobs.listIncomplete();
    let resumed = 0;
    for (const job of jobs) {
      if (this.running.has(job.id)) continue;
      logger.info('[Broadcast] Resuming job', { jobId: job.id, ...summarize(job) });
      this.launch(job);
      resumed++;
    }
    return resumed;
  }

  async getSummary(jobId: string): Promise<BroadcastSummary> {
    const job = await this.deps.jobs.get(jobId);
    if (!job) throw new NotFoundError(`Broadcast ${jobId} not found`);
    return summarize(job);
  }

  isRunning(jobId: string): boolean {
    return this.running.has(jobId);
  }

  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map((job) => job.done));
    }
  }

  private launch(job: BroadcastJob): void {
    const state: RunningJob = { cancelled: false, failed: false, done: Promise.resolve() };
    state.done = this.run(job, state)
      .catch((error: unknown) => {
        // Progress so far is stored; the job stays incomplete and resumes on restart.
        logger.error('[Broadcast] Job interrupted', { jobId: job.id, error: errorMessage(error) });
      })
      .finally(() => {
        this.running.delete(job.id);
      });
    this.running.set(job.id, state);
  }

  private async run(job: BroadcastJob, state: RunningJob): Promise<void> {
    const queue = job.recipients.filter((recipient) => !isTerminalRecipientStatus(recipient.status));
    let next = 0;

    const worker = async (): Promise<void> => {
      while (!halted(state) && next < queue.length) {
        const recipient = queue[next++];
        if (recipient) {
          try {
            await this.deliverTo(job, recipient, state);
          } catch (error) {
            state.failed = true;
            throw error;
          }
        }
      }
    };

    const workerCount = Math.max(1, Math.min(this.deps.concurrency, queue.length));
    const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));
    const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }

    if (state.cancelled) {
      await this.deps.jobs.skipRemaining(job.id);
    }
    await this.deps.jobs.finish(job.id, state.cancelled);

    const summary = await this.getSummary(job.id);
    logger.broadcast.completed(job.id, { ...summary });
    this.deps.notifier.post(job.created_by, broadcastSummary(summary));
  }

  private async deliverTo(job: BroadcastJob, recipient: RecipientProgress, state: RunningJob): Promise<void> {
    const priorAttempts = recipient.attempts;
    const budget = Math.max(1, this.deps.retry.maxAttempts - priorAttempts);
    const progress = { attempts: priorAttempts };

    let outcome: RecipientOutcome;
    try {
      await retryWithBackoff(
        async (attempt) => {
          progress.attempts = priorAttempts + attempt;
          await sendOrThrow(this.deps.transport, recipient.user_id, job.payload);
        },
        {
          ...this.deps.retry,
          maxAttempts: budget,
          isRetryable: isTransientDeliveryError,
          shouldContinue: () => !halted(state),
          label: `broadcast:${job.id}:${recipient.user_id}`,
          onRetry: async (_attempt, error) => {
            await this.deps.jobs.saveRecipient(job.id, recipient.user_id, {
              status: 'retrying',
              attempts: progress.attempts,
              last_error: errorMessage(error),
            });
          },
        }
      );
      outcome = { status: 'delivered', attempts: progress.attempts, last_error: null };
    } catch (error) {
      if (error instanceof RetryAbortedError) {
        // Halted between retries; the recipient stays open for skipRemaining or a resume.
        return;
      }
      if (error instanceof PermanentDeliveryError) {
        outcome = { status: 'blocked', attempts: progress.attempts, last_error: error.message };
        await this.deps.recipients.markBlocked(recipient.user_id);
      } else if (error instanceof RetryExhaustedError) {
        outcome = { status: 'failed', attempts: progress.attempts, last_error: errorMessage(error.lastError) };
      } else {
        throw error;
      }
    }

    await this.deps.jobs.saveRecipient(job.id, recipient.user_id, outcome);
    logger.broadcast.recipient(job.id, recipient.user_id, outcome.status, outcome.attempts);
  }
}
