import crypto from 'crypto';
import { ERROR_CODES, transferAmountSchema, type PendingTransfer } from '@tokenboard/shared';
import type { Db } from '../lib/db.js';
import type { AccountStore } from './accountStore.js';
import { LedgerError, unknownAccount } from './errors.js';

interface PendingRow {
  id: string;
  recipient_id: string;
  sender_id: string;
  sender_name: string;
  amount: number;
  note: string | null;
  created_at: string;
}

function toPendingTransfer(row: PendingRow): PendingTransfer {
  return {
    id: row.id,
    recipientId: row.recipient_id,
    senderId: row.sender_id,
    senderName: row.sender_name,
    amount: row.amount,
    note: row.note,
    createdAt: row.created_at,
  };
}

export interface EnqueueInput {
  recipientId: string;
  senderId: string;
  senderName: string;
  amount: number;
  note?: string | null;
}

export function assertValidAmount(amount: number): void {
  const parsed = transferAmountSchema.safeParse(amount);
  if (!parsed.success) {
    throw new LedgerError(
      ERROR_CODES.INVALID_AMOUNT,
      parsed.error.issues[0]?.message ?? 'Invalid amount',
      { amount }
    );
  }
}

/**
 * Offered-but-unaccepted transfers, keyed by recipient.
 *
 * Rows are only ever inserted or deleted. `take` and `takeAll` delete and
 * return in a single statement, which is what keeps a transfer from being
 * settled twice.
 */
export class PendingTransferQueue {
  private readonly insertOne;
  private readonly sumForRecipient;
  private readonly listForRecipient;
  private readonly deleteById;
  private readonly deleteByIdForRecipient;
  private readonly deleteAllForRecipient;

  constructor(
    db: Db,
    private readonly accounts: AccountStore
  ) {
    this.insertOne = db.prepare<PendingRow>(
      `INSERT INTO pending_transfers (id, recipient_id, sender_id, sender_name, amount, note, created_at)
       VALUES (@id, @recipient_id, @sender_id, @sender_name, @amount, @note, @created_at)`
    );
    this.sumForRecipient = db.prepare<{ recipientId: string }, { total: number }>(
      `SELECT COALESCE(SUM(amount), 0) AS total FROM pending_transfers WHERE recipient_id = @recipientId`
    );
    // Oldest first; rowid breaks ties between rows created in the same millisecond
    this.listForRecipient = db.prepare<{ recipientId: string }, PendingRow>(
      `SELECT * FROM pending_transfers WHERE recipient_id = @recipientId ORDER BY created_at ASC, rowid ASC`
    );
    this.deleteById = db.prepare<{ id: string }, PendingRow>(
      `DELETE FROM pending_transfers WHERE id = @id RETURNING *`
    );
    this.deleteByIdForRecipient = db.prepare<{ id: string; recipientId: string }, PendingRow>(
      `DELETE FROM pending_transfers WHERE id = @id AND recipient_id = @recipientId RETURNING *`
    );
    this.deleteAllForRecipient = db.prepare<{ recipientId: string }, PendingRow>(
      `DELETE FROM pending_transfers WHERE recipient_id = @recipientId RETURNING *`
    );
  }

  /**
   * Record a transfer offer. No counter changes until it is settled.
   */
  enqueue(input: EnqueueInput, at: Date): PendingTransfer {
    assertValidAmount(input.amount);
    if (!this.accounts.exists(input.recipientId)) throw unknownAccount(input.recipientId);
    if (!this.accounts.exists(input.senderId)) throw unknownAccount(input.senderId);

    const row: PendingRow = {
      id: crypto.randomUUID(),
      recipient_id: input.recipientId,
      sender_id: input.senderId,
      sender_name: input.senderName,
      amount: input.amount,
      note: input.note ?? null,
      created_at: at.toISOString(),
    };
    this.insertOne.run(row);
    return toPendingTransfer(row);
  }

  /** Live sum of the recipient's pending amounts; never cached */
  totalPending(recipientId: string): number {
    return this.sumForRecipient.get({ recipientId })?.total ?? 0;
  }

  listPending(recipientId: string): PendingTransfer[] {
    return this.listForRecipient.all({ recipientId }).map(toPendingTransfer);
  }

  /**
   * Locate and remove one transfer in the same step. With a recipient the
   * delete only matches transfers addressed to it. Null when nothing matched.
   */
  take(transferId: string, recipientId?: string): PendingTransfer | null {
    const row =
      recipientId === undefined
        ? this.deleteById.get({ id: transferId })
        : this.deleteByIdForRecipient.get({ id: transferId, recipientId });
    return row ? toPendingTransfer(row) : null;
  }

  /** Remove and return every transfer addressed to the recipient */
  takeAll(recipientId: string): PendingTransfer[] {
    return this.deleteAllForRecipient.all({ recipientId }).map(toPendingTransfer);
  }
}
