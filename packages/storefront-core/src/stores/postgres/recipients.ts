import { query, queryOne } from '../../db/client';
import type { BroadcastTarget, Recipient } from '../../types/index';
import type { RecipientStore } from '../types';
import { guarded } from './guarded';

export class PgRecipientStore implements RecipientStore {
  async touch(userId: string, displayName?: string): Promise<Recipient> {
    return guarded('touch recipient', async () => {
      const rows = await query<Recipient>(
        `INSERT INTO recipients (user_id, display_name)
         VALUES ($1, $2)
         ON CONFLICT (user_id) DO UPDATE
           SET last_seen = NOW(),
               display_name = COALESCE(EXCLUDED.display_name, recipients.display_name)
         RETURNING *`,
        [userId, displayName ?? null]
      );
      const recipient = rows[0];
      if (!recipient) throw new Error('UPSERT returned no row');
      return recipient;
    });
  }

  async get(userId: string): Promise<Recipient | null> {
    return guarded('get recipient', () =>
      queryOne<Recipient>('SELECT * FROM recipients WHERE user_id = $1', [userId])
    );
  }

  async markBlocked(userId: string): Promise<void> {
    await guarded('block recipient', () =>
      query(
        `INSERT INTO recipients (user_id, blocked) VALUES ($1, true)
         ON CONFLICT (user_id) DO UPDATE SET blocked = true`,
        [userId]
      )
    );
  }

  async snapshot(target: BroadcastTarget): Promise<string[]> {
    return guarded('snapshot recipients', async () => {
      const rows = target.kind === 'all'
        ? await query<{ user_id: string }>(
            'SELECT user_id FROM recipients WHERE blocked = false ORDER BY first_seen ASC, user_id ASC'
          )
        : await query<{ user_id: string }>(
            `SELECT user_id FROM recipients
             WHERE blocked = false AND user_id = ANY($1::text[])
             ORDER BY first_seen ASC, user_id ASC`,
            [target.user_ids]
          );
      return rows.map((row) => row.user_id);
    });
  }

  async count(): Promise<{ total: number; blocked: number }> {
    return guarded('count recipients', async () => {
      const row = await queryOne<{ total: string; blocked: string }>(
        `SELECT COUNT(*)::text AS total,
                COUNT(*) FILTER (WHERE blocked)::text AS blocked
         FROM recipients`
      );
      return {
        total: row ? parseInt(row.total, 10) : 0,
        blocked: row ? parseInt(row.blocked, 10) : 0,
      };
    });
  }

  async list(options: { limit?: number } = {}): Promise<Recipient[]> {
    return guarded('list recipients', () =>
      query<Recipient>(
        `SELECT * FROM recipients
         WHERE blocked = false
         ORDER BY first_seen ASC, user_id ASC
         LIMIT $1`,
        [options.limit ?? 100]
      )
    );
  }
}
