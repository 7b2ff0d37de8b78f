import { randomUUID } from 'crypto';
import type { BroadcastJob, OutboundMessage, RecipientProgress } from '../../types/index';
import { isTerminalRecipientStatus } from '../types';
import type { BroadcastJobStore, RecipientOutcome } from '../types';

function cloneJob(job: BroadcastJob): BroadcastJob {
  return { ...job, recipients: job.recipients.map((r) => ({ ...r })) };
}

export class MemoryBroadcastJobStore implements BroadcastJobStore {
  private readonly jobs = new Map<string, BroadcastJob>();

  async create(payload: OutboundMessage, createdBy: string, recipients: string[]): Promise<BroadcastJob> {
    const now = new Date();
    const unique = [...new Set(recipients)];
    const job: BroadcastJob = {
      id: randomUUID(),
      payload,
      created_by: createdBy,
      created_at: now,
      completed: false,
      cancelled: false,
      completed_at: null,
      recipients: unique.map<RecipientProgress>((userId) => ({
        user_id: userId,
        status: 'pending',
        attempts: 0,
        last_error: null,
        updated_at: now,
      })),
    };
    this.jobs.set(job.id, job);
    return cloneJob(job);
  }

  async get(id: string): Promise<BroadcastJob | null> {
    const job = this.jobs.get(id);
    return job ? cloneJob(job) : null;
  }

  async saveRecipient(jobId: string, userId: string, outcome: RecipientOutcome): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) return;
    const entry = job.recipients.find((r) => r.user_id === userId);
    // terminal statuses never change again
    if (!entry || isTerminalRecipientStatus(entry.status)) return;
    entry.status = outcome.status;
    entry.attempts = outcome.attempts;
    entry.last_error = outcome.last_error;
    entry.updated_at = new Date();
  }

  async skipRemaining(jobId: string): Promise<number> {
    const job = this.jobs.get(jobId);
    if (!job) return 0;
    let skipped = 0;
    const now = new Date();
    for (const entry of job.recipients) {
      if (!isTerminalRecipientStatus(entry.status)) {
        entry.status = 'skipped';
        entry.updated_at = now;
        skipped++;
      }
    }
    return skipped;
  }

  async finish(jobId: string, cancelled: boolean): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job || job.completed) return;
    job.completed = true;
    job.cancelled = cancelled;
    job.completed_at = new Date();
  }

  async listIncomplete(): Promise<BroadcastJob[]> {
    return [...this.jobs.values()].filter((j) => !j.completed).map(cloneJob);
  }
}
