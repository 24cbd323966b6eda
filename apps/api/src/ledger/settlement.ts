import { ERROR_CODES, type AcceptAllResult, type AcceptOneResult, type PeriodBoundaries } from '@tokenboard/shared';
import type { Db } from '../lib/db.js';
import type { AccountStore } from './accountStore.js';
import { activityMessages, type ActivityLog } from './activityLog.js';
import { LedgerError, unknownAccount } from './errors.js';
import type { PendingTransferQueue } from './pendingQueue.js';
import { ensureCurrent } from './rollover.js';
import { runAtomically } from './transaction.js';

export interface SettlementDeps {
  db: Db;
  accounts: AccountStore;
  queue: PendingTransferQueue;
  activity: ActivityLog;
}

export interface AcceptOneOptions {
  /** Only settle the transfer if it is addressed to this account */
  recipientId?: string;
}

/**
 * Moves pending transfers into the recipient's permanent counters.
 *
 * Each entry point is one transaction: remove -> rollover -> increment ->
 * log. Sender "given" counters are not touched here.
 */
export class SettlementEngine {
  constructor(private readonly deps: SettlementDeps) {}

  acceptOne(
    transferId: string,
    boundaries: PeriodBoundaries,
    at: Date,
    options: AcceptOneOptions = {}
  ): AcceptOneResult {
    const { db, accounts, queue, activity } = this.deps;

    return runAtomically(db, () => {
      const transfer = queue.take(transferId, options.recipientId);
      if (!transfer) {
        throw new LedgerError(ERROR_CODES.TRANSFER_NOT_FOUND, 'Transfer not found or already accepted', {
          transferId,
        });
      }

      ensureCurrent(accounts, transfer.recipientId, boundaries, at);
      accounts.incrementReceived(transfer.recipientId, transfer.amount, at);
      activity.append(transfer.recipientId, activityMessages.acceptedOne(transfer.amount, transfer.senderName), at);

      return { amount: transfer.amount, fromName: transfer.senderName };
    });
  }

  acceptAll(recipientId: string, boundaries: PeriodBoundaries, at: Date): AcceptAllResult {
    const { db, accounts, queue, activity } = this.deps;

    return runAtomically(db, () => {
      if (!accounts.exists(recipientId)) throw unknownAccount(recipientId);

      // Sum exactly the rows removed, so nothing is swept up or lost
      const taken = queue.takeAll(recipientId);
      if (taken.length === 0) {
        throw new LedgerError(ERROR_CODES.NO_PENDING_TRANSFERS, 'No pending transfers to accept', {
          recipientId,
        });
      }
      const totalAmount = taken.reduce((acc, t) => acc + t.amount, 0);

      ensureCurrent(accounts, recipientId, boundaries, at);
      accounts.incrementReceived(recipientId, totalAmount, at);
      activity.append(recipientId, activityMessages.acceptedAll(totalAmount, taken.length), at);

      return { totalAmount, count: taken.length };
    });
  }
}
