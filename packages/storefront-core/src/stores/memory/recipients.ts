import type { BroadcastTarget, Recipient } from '../../types/index';
import type { RecipientStore } from '../types';

export class MemoryRecipientStore implements RecipientStore {
  private readonly recipients = new Map<string, Recipient>();

  async touch(userId: string, displayName?: string): Promise<Recipient> {
    const now = new Date();
    const existing = this.recipients.get(userId);
    const recipient: Recipient = existing
      ? { ...existing, display_name: displayName ?? existing.display_name, last_seen: now }
      : { user_id: userId, display_name: displayName ?? null, blocked: false, first_seen: now, last_seen: now };
    this.recipients.set(userId, recipient);
    return { ...recipient };
  }

  async get(userId: string): Promise<Recipient | null> {
    const recipient = this.recipients.get(userId);
    return recipient ? { ...recipient } : null;
  }

  async markBlocked(userId: string): Promise<void> {
    const existing = this.recipients.get(userId);
    const now = new Date();
    this.recipients.set(
      userId,
      existing
        ? { ...existing, blocked: true }
        : { user_id: userId, display_name: null, blocked: true, first_seen: now, last_seen: now }
    );
  }

  async snapshot(target: BroadcastTarget): Promise<string[]> {
    const active = [...this.recipients.values()].filter((r) => !r.blocked);
    if (target.kind === 'all') {
      return active.map((r) => r.user_id);
    }
    const wanted = new Set(target.user_ids);
    return active.filter((r) => wanted.has(r.user_id)).map((r) => r.user_id);
  }

  async count(): Promise<{ total: number; blocked: number }> {
    let blocked = 0;
    for (const recipient of this.recipients.values()) {
      if (recipient.blocked) blocked++;
    }
    return { total: this.recipients.size, blocked };
  }

  async list(options: { limit?: number } = {}): Promise<Recipient[]> {
    return [...this.recipients.values()]
      .filter((r) => !r.blocked)
      .slice(0, options.limit ?? 100)
      .map((r) => ({ ...r }));
  }
}
