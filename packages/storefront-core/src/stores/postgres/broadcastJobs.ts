/**
 * Postgres broadcast job store. The recipient snapshot is written with the
 * job in one transaction; afterwards each recipient row is updated on its
 * own, and never once it reaches a terminal status.
 */

import { query, queryOne, queryRows, transaction } from '../../db/client';
import type { BroadcastJob, OutboundMessage, RecipientProgress } from '../../types/index';
import type { BroadcastJobStore, RecipientOutcome } from '../types';
import { guarded, isUuid } from './guarded';

type JobRow = Omit<BroadcastJob, 'recipients'>;

const NON_TERMINAL = `('pending', 'retrying')`;

async function loadRecipients(jobId: string): Promise<RecipientProgress[]> {
  return query<RecipientProgress>(
    `SELECT user_id, status, attempts, last_error, updated_at
     FROM broadcast_recipients
     WHERE job_id = $1
     ORDER BY position ASC`,
    [jobId]
  );
}

export class PgBroadcastJobStore implements BroadcastJobStore {
  async create(payload: OutboundMessage, createdBy: string, recipients: string[]): Promise<BroadcastJob> {
    const unique = [...new Set(recipients)];

    return guarded('create broadcast job', () =>
      transaction(async (client) => {
        const inserted = await queryRows<JobRow>(
          client,
          `INSERT INTO broadcast_jobs (payload, created_by)
           VALUES ($1, $2)
           RETURNING *`,
          [JSON.stringify(payload), createdBy]
        );
        const job = inserted[0];
        if (!job) throw new Error('INSERT returned no row');

        if (unique.length > 0) {
          await client.query(
            `INSERT INTO broadcast_recipients (job_id, user_id, position, status)
             SELECT $1, user_id, position - 1, 'pending'
             FROM unnest($2::text[]) WITH ORDINALITY AS t(user_id, position)`,
            [job.id, unique]
          );
        }

        const now = new Date();
        return {
          ...job,
          recipients: unique.map<RecipientProgress>((userId) => ({
            user_id: userId,
            status: 'pending',
            attempts: 0,
            last_error: null,
            updated_at: now,
          })),
        };
      })
    );
  }

  async get(id: string): Promise<BroadcastJob | null> {
    if (!isUuid(id)) return null;
    return guarded('get broadcast job', async () => {
      const job = await queryOne<JobRow>('SELECT * FROM broadcast_jobs WHERE id = $1', [id]);
      if (!job) return null;
      return { ...job, recipients: await loadRecipients(id) };
    });
  }

  async saveRecipient(jobId: string, userId: string, outcome: RecipientOutcome): Promise<void> {
    await guarded('save broadcast progress', () =>
      query(
        `UPDATE broadcast_recipients
         SET status = $3, attempts = $4, last_error = $5, updated_at = NOW()
         WHERE job_id = $1 AND user_id = $2 AND status IN ${NON_TERMINAL}`,
        [jobId, userId, outcome.status, outcome.attempts, outcome.last_error]
      )
    );
  }

  async skipRemaining(jobId: string): Promise<number> {
    return guarded('skip broadcast recipients', async () => {
      const rows = await query<{ user_id: string }>(
        `UPDATE broadcast_recipients
         SET status = 'skipped', updated_at = NOW()
         WHERE job_id = $1 AND status IN ${NON_TERMINAL}
         RETURNING user_id`,
        [jobId]
      );
      return rows.length;
    });
  }

  async finish(jobId: string, cancelled: boolean): Promise<void> {
    await guarded('finish broadcast job', () =>
      query(
        `UPDATE broadcast_jobs
         SET completed = true, cancelled = $2, completed_at = NOW()
         WHERE id = $1 AND completed = false`,
        [jobId, cancelled]
      )
    );
  }

  async listIncomplete(): Promise<BroadcastJob[]> {
    return guarded('list incomplete broadcasts', async () => {
      const jobs = await query<JobRow>(
        'SELECT * FROM broadcast_jobs WHERE completed = false ORDER BY created_at ASC'
      );
      const result: BroadcastJob[] = [];
      for (const job of jobs) {
        result.push({ ...job, recipients: await loadRecipients(job.id) });
      }
      return result;
    });
  }
}
