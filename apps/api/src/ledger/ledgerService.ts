import type { Logger } from 'pino';
import {
  ERROR_CODES,
  type Account,
  type AccountSeed,
  type AcceptAllResult,
  type AcceptOneResult,
  type ActivityEntry,
  type PendingTransfer,
  type PeriodBoundaries,
  type RankingEntry,
  type RankingPeriod,
} from '@tokenboard/shared';
import type { Db } from '../lib/db.js';
import { logger as rootLogger } from '../lib/logger.js';
import { AccountStore } from './accountStore.js';
import { ActivityLog, activityMessages } from './activityLog.js';
import { LedgerError, unknownAccount } from './errors.js';
import { getPeriodBoundaries } from './periodClock.js';
import { PendingTransferQueue, assertValidAmount, type EnqueueInput } from './pendingQueue.js';
import { rankAccounts } from './rankings.js';
import { ensureAllCurrent, ensureCurrent } from './rollover.js';
import { SettlementEngine, type AcceptOneOptions } from './settlement.js';
import { runAtomically } from './transaction.js';

export interface LedgerServiceOptions {
  db: Db;
  /** IANA zone whose calendar decides day/week/month boundaries */
  timeZone: string;
  /** Clock; injectable for tests */
  now?: () => Date;
  logger?: Logger;
}

export interface SendInput {
  toUserId: string;
  amount: number;
  note?: string | null;
}

/**
 * Core-facing ledger API. Every operation that reads or writes period
 * counters rolls the affected accounts over first, inside the same
 * transaction.
 */
export class LedgerService {
  readonly accounts: AccountStore;
  private readonly queue: PendingTransferQueue;
  private readonly activity: ActivityLog;
  private readonly settlement: SettlementEngine;
  private readonly db: Db;
  private readonly timeZone: string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: LedgerServiceOptions) {
    this.db = options.db;
    this.timeZone = options.timeZone;
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ module: 'ledger' });

    this.accounts = new AccountStore(this.db);
    this.queue = new PendingTransferQueue(this.db, this.accounts);
    this.activity = new ActivityLog(this.db);
    this.settlement = new SettlementEngine({
      db: this.db,
      accounts: this.accounts,
      queue: this.queue,
      activity: this.activity,
    });
  }

  private clock(): { at: Date; boundaries: PeriodBoundaries } {
    const at = this.now();
    return { at, boundaries: getPeriodBoundaries(at, this.timeZone) };
  }

  boundaries(): PeriodBoundaries {
    return this.clock().boundaries;
  }

  /**
   * Create an account if the id is free. Returns false if it already existed.
   */
  async provision(seed: AccountSeed): Promise<boolean> {
    const { at, boundaries } = this.clock();
    return this.accounts.provision(seed, boundaries, at);
  }

  /** Current snapshot with stale period counters already reset */
  async getAccount(userId: string): Promise<Account> {
    const { at, boundaries } = this.clock();
    return runAtomically(this.db, () => ensureCurrent(this.accounts, userId, boundaries, at));
  }

  async enqueue(input: EnqueueInput): Promise<string> {
    const { at } = this.clock();
    const transfer = runAtomically(this.db, () => this.queue.enqueue(input, at));
    this.log.debug({ transferId: transfer.id, to: transfer.recipientId, amount: transfer.amount }, 'transfer enqueued');
    return transfer.id;
  }

  /**
   * Transfer initiation: charge the sender's "given" counters and queue the
   * offer for the recipient, atomically.
   */
  async send(senderId: string, input: SendInput): Promise<PendingTransfer> {
    const { at, boundaries } = this.clock();

    const transfer = runAtomically(this.db, () => {
      assertValidAmount(input.amount);
      const recipient = this.accounts.findById(input.toUserId);
      if (!recipient) throw unknownAccount(input.toUserId);
      if (senderId === input.toUserId) {
        throw new LedgerError(ERROR_CODES.SELF_TRANSFER, 'Cannot send tokens to yourself', { userId: senderId });
      }

      const sender = ensureCurrent(this.accounts, senderId, boundaries, at);
      this.accounts.incrementGiven(senderId, input.amount, at);
      const queued = this.queue.enqueue(
        {
          recipientId: recipient.userId,
          senderId,
          senderName: sender.name,
          amount: input.amount,
          note: input.note,
        },
        at
      );
      this.activity.append(senderId, activityMessages.sent(sender.name, input.amount, recipient.name), at);
      return queued;
    });

    this.log.info({ transferId: transfer.id, from: senderId, to: transfer.recipientId, amount: transfer.amount }, 'transfer sent');
    return transfer;
  }

  async acceptOne(transferId: string, options: AcceptOneOptions = {}): Promise<AcceptOneResult> {
    const { at, boundaries } = this.clock();
    const result = this.settlement.acceptOne(transferId, boundaries, at, options);
    this.log.info({ transferId, amount: result.amount, from: result.fromName }, 'transfer accepted');
    return result;
  }

  async acceptAll(recipientId: string): Promise<AcceptAllResult> {
    const { at, boundaries } = this.clock();
    const result = this.settlement.acceptAll(recipientId, boundaries, at);
    this.log.info({ recipientId, totalAmount: result.totalAmount, count: result.count }, 'pending transfers accepted');
    return result;
  }

  async pendingTotal(userId: string): Promise<number> {
    if (!this.accounts.exists(userId)) throw unknownAccount(userId);
    return this.queue.totalPending(userId);
  }

  async listPending(userId: string): Promise<PendingTransfer[]> {
    if (!this.accounts.exists(userId)) throw unknownAccount(userId);
    return this.queue.listPending(userId);
  }

  async rankings(period: RankingPeriod): Promise<RankingEntry[]> {
    const { at, boundaries } = this.clock();
    const accounts = runAtomically(this.db, () => ensureAllCurrent(this.accounts, boundaries, at));
    return rankAccounts(accounts, period);
  }

  async recentActivity(options: { limit: number; userId?: string }): Promise<ActivityEntry[]> {
    return this.activity.listRecent(options);
  }

  /** Database round trip, for health checks */
  ping(): void {
    this.db.prepare('SELECT 1').get();
  }

  close(): void {
    this.db.close();
  }
}
