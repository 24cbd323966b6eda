import { ERROR_CODES, type Account, type AccountSeed, type PeriodBoundaries } from '@tokenboard/shared';
import type { Db } from '../lib/db.js';
import { LedgerError, unknownAccount } from './errors.js';

interface AccountRow {
  user_id: string;
  name: string;
  product: string | null;
  all_time_received: number;
  all_time_given: number;
  daily_received: number;
  daily_given: number;
  weekly_received: number;
  weekly_given: number;
  monthly_received: number;
  monthly_given: number;
  last_daily_reset: string | null;
  last_weekly_reset: string | null;
  last_monthly_reset: string | null;
  created_at: string;
  updated_at: string;
}

type AccountWrite = Omit<AccountRow, 'created_at'>;

function toAccount(row: AccountRow): Account {
  return {
    userId: row.user_id,
    name: row.name,
    product: row.product,
    allTimeReceived: row.all_time_received,
    allTimeGiven: row.all_time_given,
    dailyReceived: row.daily_received,
    dailyGiven: row.daily_given,
    weeklyReceived: row.weekly_received,
    weeklyGiven: row.weekly_given,
    monthlyReceived: row.monthly_received,
    monthlyGiven: row.monthly_given,
    lastDailyReset: row.last_daily_reset,
    lastWeeklyReset: row.last_weekly_reset,
    lastMonthlyReset: row.last_monthly_reset,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Period counters never exceed the all-time counter, so checking the all-time
 * sum covers all four.
 */
function assertExactTotal(current: number, amount: number, userId: string): void {
  if (!Number.isSafeInteger(amount) || !Number.isSafeInteger(current + amount)) {
    throw new LedgerError(ERROR_CODES.INVALID_AMOUNT, 'Amount would overflow the account counters', {
      userId,
      amount,
    });
  }
}

type CounterUpdate = {
  userId: string;
  amount: number;
  updatedAt: string;
};

/**
 * Durable per-user ledger records.
 *
 * Every write goes through this class and stamps `updated_at`; nothing else
 * touches the accounts table. Callers that need a consistent
 * read-modify-write use `modify`, which runs inside a transaction.
 */
export class AccountStore {
  private readonly selectOne;
  private readonly selectAll;
  private readonly insertOne;
  private readonly updateOne;
  private readonly addReceived;
  private readonly addGiven;

  constructor(private readonly db: Db) {
    this.selectOne = db.prepare<{ userId: string }, AccountRow>(
      `SELECT * FROM accounts WHERE user_id = @userId`
    );
    this.selectAll = db.prepare<[], AccountRow>(`SELECT * FROM accounts ORDER BY user_id ASC`);
    this.insertOne = db.prepare<{
      userId: string;
      name: string;
      product: string | null;
      day: string;
      week: string;
      month: string;
      at: string;
    }>(
      `INSERT OR IGNORE INTO accounts (
        user_id, name, product, last_daily_reset, last_weekly_reset, last_monthly_reset, created_at, updated_at
      ) VALUES (@userId, @name, @product, @day, @week, @month, @at, @at)`
    );
    this.updateOne = db.prepare<AccountWrite>(
      `UPDATE accounts SET
        name = @name,
        product = @product,
        all_time_received = @all_time_received,
        all_time_given = @all_time_given,
        daily_received = @daily_received,
        daily_given = @daily_given,
        weekly_received = @weekly_received,
        weekly_given = @weekly_given,
        monthly_received = @monthly_received,
        monthly_given = @monthly_given,
        last_daily_reset = @last_daily_reset,
        last_weekly_reset = @last_weekly_reset,
        last_monthly_reset = @last_monthly_reset,
        updated_at = @updated_at
      WHERE user_id = @user_id`
    );
    this.addReceived = db.prepare<CounterUpdate>(
      `UPDATE accounts SET
        all_time_received = all_time_received + @amount,
        daily_received = daily_received + @amount,
        weekly_received = weekly_received + @amount,
        monthly_received = monthly_received + @amount,
        updated_at = @updatedAt
      WHERE user_id = @userId`
    );
    this.addGiven = db.prepare<CounterUpdate>(
      `UPDATE accounts SET
        all_time_given = all_time_given + @amount,
        daily_given = daily_given + @amount,
        weekly_given = weekly_given + @amount,
        monthly_given = monthly_given + @amount,
        updated_at = @updatedAt
      WHERE user_id = @userId`
    );
  }

  findById(userId: string): Account | null {
    const row = this.selectOne.get({ userId });
    return row ? toAccount(row) : null;
  }

  /** Like findById, but a missing account is an UNKNOWN_ACCOUNT error */
  get(userId: string): Account {
    const account = this.findById(userId);
    if (!account) throw unknownAccount(userId);
    return account;
  }

  exists(userId: string): boolean {
    return this.selectOne.get({ userId }) !== undefined;
  }

  findAll(): Account[] {
    return this.selectAll.all().map(toAccount);
  }

  /**
   * Create an account with zero counters whose reset markers are already at
   * the current boundaries. Returns false if the id was taken.
   */
  provision(seed: AccountSeed, boundaries: PeriodBoundaries, at: Date): boolean {
    const result = this.insertOne.run({
      userId: seed.userId,
      name: seed.name,
      product: seed.product ?? null,
      day: boundaries.day,
      week: boundaries.week,
      month: boundaries.month,
      at: at.toISOString(),
    });
    return result.changes > 0;
  }

  /**
   * Atomic read-modify-write. `fn` returns the next state, or null to leave
   * the row (and its updatedAt) untouched.
   */
  modify(userId: string, at: Date, fn: (current: Account) => Account | null): Account {
    return this.db.transaction(() => {
      const current = this.get(userId);
      const next = fn(current);
      if (!next) return current;
      return this.write({ ...next, userId: current.userId, createdAt: current.createdAt }, at);
    })();
  }

  /** Add to the all-time and every period "received" counter in one statement */
  incrementReceived(userId: string, amount: number, at: Date): Account {
    assertExactTotal(this.get(userId).allTimeReceived, amount, userId);
    const result = this.addReceived.run({ userId, amount, updatedAt: at.toISOString() });
    if (result.changes === 0) throw unknownAccount(userId);
    return this.get(userId);
  }

  /** Add to the all-time and every period "given" counter in one statement */
  incrementGiven(userId: string, amount: number, at: Date): Account {
    assertExactTotal(this.get(userId).allTimeGiven, amount, userId);
    const result = this.addGiven.run({ userId, amount, updatedAt: at.toISOString() });
    if (result.changes === 0) throw unknownAccount(userId);
    return this.get(userId);
  }

  private write(account: Account, at: Date): Account {
    const updatedAt = at.toISOString();
    const result = this.updateOne.run({
      user_id: account.userId,
      name: account.name,
      product: account.product,
      all_time_received: account.allTimeReceived,
      all_time_given: account.allTimeGiven,
      daily_received: account.dailyReceived,
      daily_given: account.dailyGiven,
      weekly_received: account.weeklyReceived,
      weekly_given: account.weeklyGiven,
      monthly_received: account.monthlyReceived,
      monthly_given: account.monthlyGiven,
      last_daily_reset: account.lastDailyReset,
      last_weekly_reset: account.lastWeeklyReset,
      last_monthly_reset: account.lastMonthlyReset,
      updated_at: updatedAt,
    });
    if (result.changes === 0) throw unknownAccount(account.userId);
    return { ...account, updatedAt };
  }
}
