import type { Account, PeriodBoundaries } from '@tokenboard/shared';
import type { AccountStore } from './accountStore.js';

export interface RolloverResult {
  account: Account;
  /** Which periods were reset by this call */
  reset: { daily: boolean; weekly: boolean; monthly: boolean };
  changed: boolean;
}

function isStale(marker: string | null, boundary: string): boolean {
  // YYYY-MM-DD strings order the same way as the dates they name
  return marker === null || marker < boundary;
}

/**
 * Zero every period whose last-reset marker is missing or earlier than the
 * current boundary, and move the marker to that boundary. The three periods
 * are checked independently. Pure.
 */
export function applyRollover(account: Account, boundaries: PeriodBoundaries): RolloverResult {
  const next: Account = { ...account };
  const reset = { daily: false, weekly: false, monthly: false };

  if (isStale(account.lastDailyReset, boundaries.day)) {
    next.dailyReceived = 0;
    next.dailyGiven = 0;
    next.lastDailyReset = boundaries.day;
    reset.daily = true;
  }

  if (isStale(account.lastWeeklyReset, boundaries.week)) {
    next.weeklyReceived = 0;
    next.weeklyGiven = 0;
    next.lastWeeklyReset = boundaries.week;
    reset.weekly = true;
  }

  if (isStale(account.lastMonthlyReset, boundaries.month)) {
    next.monthlyReceived = 0;
    next.monthlyGiven = 0;
    next.lastMonthlyReset = boundaries.month;
    reset.monthly = true;
  }

  const changed = reset.daily || reset.weekly || reset.monthly;
  return { account: changed ? next : account, reset, changed };
}

/**
 * Bring one stored account's period counters up to date. Writes only when a
 * period actually rolled over, so a second call for the same boundaries is a
 * no-op. Throws UNKNOWN_ACCOUNT for a missing id.
 */
export function ensureCurrent(
  store: AccountStore,
  userId: string,
  boundaries: PeriodBoundaries,
  at: Date
): Account {
  return store.modify(userId, at, (current) => {
    const result = applyRollover(current, boundaries);
    return result.changed ? result.account : null;
  });
}

/**
 * ensureCurrent for every account; returns the up-to-date accounts ordered by
 * user id.
 */
export function ensureAllCurrent(store: AccountStore, boundaries: PeriodBoundaries, at: Date): Account[] {
  return store.findAll().map((account) => {
    const result = applyRollover(account, boundaries);
    return result.changed ? ensureCurrent(store, account.userId, boundaries, at) : account;
  });
}
