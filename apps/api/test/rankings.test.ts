import { describe, expect, test } from 'vitest';
import { createTestLedger, provisionPeople } from './helpers.js';

async function playWeek() {
  const ctx = createTestLedger();
  const { ledger, clock } = ctx;
  await provisionPeople(ledger);

  await ledger.send('alice', { toUserId: 'bob', amount: 50 });
  await ledger.send('dave', { toUserId: 'carol', amount: 50 });
  await ledger.send('bob', { toUserId: 'alice', amount: 20 });
  for (const id of ['alice', 'bob', 'carol']) {
    await ledger.acceptAll(id);
  }

  // Monday of the next week, same month
  clock.set('2026-10-26T09:00:00.000Z');
  await ledger.send('carol', { toUserId: 'alice', amount: 5 });
  await ledger.acceptAll('alice');

  return ctx;
}

describe('rankings', () => {
  test('weekly only counts the current week', async () => {
    const { ledger } = await playWeek();

    const weekly = await ledger.rankings('weekly');

    expect(weekly).toEqual([
      { rank: 1, userId: 'alice', name: 'Alice', product: null, received: 5, given: 0 },
      { rank: 2, userId: 'bob', name: 'Bob', product: null, received: 0, given: 0 },
      { rank: 3, userId: 'carol', name: 'Carol', product: null, received: 0, given: 5 },
      { rank: 4, userId: 'dave', name: 'Dave', product: null, received: 0, given: 0 },
    ]);
  });

  test('monthly and total break ties by user id', async () => {
    const { ledger } = await playWeek();

    const monthly = await ledger.rankings('monthly');
    expect(monthly.map((e) => [e.userId, e.received])).toEqual([
      ['bob', 50],
      ['carol', 50],
      ['alice', 25],
      ['dave', 0],
    ]);

    const total = await ledger.rankings('total');
    expect(total.map((e) => [e.rank, e.userId, e.received, e.given])).toEqual([
      [1, 'bob', 50, 20],
      [2, 'carol', 50, 5],
      [3, 'alice', 25, 50],
      [4, 'dave', 0, 50],
    ]);
  });

  test('daily ignores amounts settled on earlier days', async () => {
    const { ledger } = await playWeek();

    const daily = await ledger.rankings('daily');

    expect(daily.map((e) => [e.userId, e.received])).toEqual([
      ['alice', 5],
      ['bob', 0],
      ['carol', 0],
      ['dave', 0],
    ]);
  });

  test('accounts not touched this period are rolled over before ranking', async () => {
    const { ledger } = await playWeek();
    expect(ledger.accounts.findById('dave')?.lastWeeklyReset).toBe('2026-10-19');

    await ledger.rankings('weekly');

    expect(ledger.accounts.findById('dave')).toMatchObject({
      weeklyGiven: 0,
      lastWeeklyReset: '2026-10-26',
      lastDailyReset: '2026-10-26',
      allTimeGiven: 50,
    });
  });

  test('an empty ledger has empty rankings', async () => {
    const { ledger } = createTestLedger();
    await expect(ledger.rankings('total')).resolves.toEqual([]);
  });
});
