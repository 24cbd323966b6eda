import crypto from 'crypto';
import type { ActivityEntry } from '@tokenboard/shared';
import type { Db } from '../lib/db.js';

interface ActivityRow {
  id: string;
  user_id: string | null;
  message: string;
  created_at: string;
}

function toActivityEntry(row: ActivityRow): ActivityEntry {
  return {
    id: row.id,
    userId: row.user_id,
    message: row.message,
    createdAt: row.created_at,
  };
}

export const activityMessages = {
  acceptedOne: (amount: number, senderName: string) => `Accepted ${amount} tokens from ${senderName}`,
  acceptedAll: (total: number, count: number) =>
    `Accepted ${total} tokens from ${count} pending transfer${count === 1 ? '' : 's'}`,
  sent: (senderName: string, amount: number, recipientName: string) =>
    `${senderName} sent ${amount} tokens to ${recipientName}`,
};

/**
 * Append-only narrative log, for display. The core never edits or deletes
 * entries.
 */
export class ActivityLog {
  private readonly insertOne;
  private readonly selectRecent;
  private readonly selectRecentForUser;

  constructor(db: Db) {
    this.insertOne = db.prepare<ActivityRow>(
      `INSERT INTO activities (id, user_id, message, created_at) VALUES (@id, @user_id, @message, @created_at)`
    );
    this.selectRecent = db.prepare<{ limit: number }, ActivityRow>(
      `SELECT * FROM activities ORDER BY created_at DESC, rowid DESC LIMIT @limit`
    );
    this.selectRecentForUser = db.prepare<{ limit: number; userId: string }, ActivityRow>(
      `SELECT * FROM activities WHERE user_id = @userId ORDER BY created_at DESC, rowid DESC LIMIT @limit`
    );
  }

  append(userId: string | null, message: string, at: Date): ActivityEntry {
    const row: ActivityRow = {
      id: crypto.randomUUID(),
      user_id: userId,
      message,
      created_at: at.toISOString(),
    };
    this.insertOne.run(row);
    return toActivityEntry(row);
  }

  /** Newest first */
  listRecent(options: { limit: number; userId?: string }): ActivityEntry[] {
    const rows =
      options.userId === undefined
        ? this.selectRecent.all({ limit: options.limit })
        : this.selectRecentForUser.all({ limit: options.limit, userId: options.userId });
    return rows.map(toActivityEntry);
  }
}
