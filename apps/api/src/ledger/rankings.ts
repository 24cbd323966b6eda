import type { Account, RankingEntry, RankingPeriod } from '@tokenboard/shared';

function countersFor(account: Account, period: RankingPeriod): { received: number; given: number } {
  switch (period) {
    case 'total':
      return { received: account.allTimeReceived, given: account.allTimeGiven };
    case 'daily':
      return { received: account.dailyReceived, given: account.dailyGiven };
    case 'weekly':
      return { received: account.weeklyReceived, given: account.weeklyGiven };
    case 'monthly':
      return { received: account.monthlyReceived, given: account.monthlyGiven };
  }
}

/**
 * Leaderboard for one period: received descending, ties by user id.
 * Accounts must already be rolled over, or stale period counters leak in.
 */
export function rankAccounts(accounts: Account[], period: RankingPeriod): RankingEntry[] {
  return accounts
    .map((account) => ({ account, ...countersFor(account, period) }))
    .sort((a, b) => b.received - a.received || (a.account.userId < b.account.userId ? -1 : a.account.userId > b.account.userId ? 1 : 0))
    .map((row, i) => ({
      rank: i + 1,
      userId: row.account.userId,
      name: row.account.name,
      product: row.account.product,
      received: row.received,
      given: row.given,
    }));
}
