import { describe, expect, test } from 'vitest';
import { createTestLedger, ledgerErrorCode, provisionPeople } from './helpers.js';

describe('pending transfer queue', () => {
  test.each([0, -5, 1.5, Number.NaN])('enqueue rejects amount %s and stores nothing', async (amount) => {
    const { ledger } = createTestLedger();
    await provisionPeople(ledger, ['alice', 'bob']);

    const code = await ledgerErrorCode(
      ledger.enqueue({ recipientId: 'bob', senderId: 'alice', senderName: 'Alice', amount })
    );

    expect(code).toBe('INVALID_AMOUNT');
    expect(await ledger.pendingTotal('bob')).toBe(0);
    expect(await ledger.listPending('bob')).toEqual([]);
  });

  test('enqueue rejects unknown recipients and senders', async () => {
    const { ledger } = createTestLedger();
    await provisionPeople(ledger, ['alice', 'bob']);

    expect(
      await ledgerErrorCode(ledger.enqueue({ recipientId: 'zed', senderId: 'alice', senderName: 'Alice', amount: 5 }))
    ).toBe('UNKNOWN_ACCOUNT');
    expect(
      await ledgerErrorCode(ledger.enqueue({ recipientId: 'bob', senderId: 'zed', senderName: 'Zed', amount: 5 }))
    ).toBe('UNKNOWN_ACCOUNT');
    expect(await ledger.pendingTotal('bob')).toBe(0);
  });

  test('enqueue does not touch any counter', async () => {
    const { ledger } = createTestLedger();
    await provisionPeople(ledger, ['alice', 'bob']);

    await ledger.enqueue({ recipientId: 'bob', senderId: 'alice', senderName: 'Alice', amount: 25 });

    const bob = await ledger.getAccount('bob');
    const alice = await ledger.getAccount('alice');
    expect(bob.allTimeReceived).toBe(0);
    expect(bob.dailyReceived).toBe(0);
    expect(alice.allTimeGiven).toBe(0);
  });

  test('pending total is the live sum per recipient', async () => {
    const { ledger } = createTestLedger();
    await provisionPeople(ledger, ['alice', 'bob', 'carol']);

    await ledger.enqueue({ recipientId: 'bob', senderId: 'alice', senderName: 'Alice', amount: 10 });
    await ledger.enqueue({ recipientId: 'bob', senderId: 'carol', senderName: 'Carol', amount: 20 });
    const third = await ledger.enqueue({ recipientId: 'bob', senderId: 'alice', senderName: 'Alice', amount: 30 });
    await ledger.enqueue({ recipientId: 'carol', senderId: 'alice', senderName: 'Alice', amount: 7 });

    expect(await ledger.pendingTotal('bob')).toBe(60);
    expect(await ledger.pendingTotal('carol')).toBe(7);
    expect(await ledger.pendingTotal('alice')).toBe(0);

    await ledger.acceptOne(third);
    expect(await ledger.pendingTotal('bob')).toBe(30);
  });

  test('listPending is oldest first', async () => {
    const { ledger, clock } = createTestLedger();
    await provisionPeople(ledger, ['alice', 'bob', 'carol']);

    clock.set('2026-10-21T09:00:00.000Z');
    const first = await ledger.enqueue({ recipientId: 'bob', senderId: 'alice', senderName: 'Alice', amount: 1, note: 'coffee' });
    // Same instant: insertion order decides
    const second = await ledger.enqueue({ recipientId: 'bob', senderId: 'carol', senderName: 'Carol', amount: 2 });
    clock.set('2026-10-21T10:00:00.000Z');
    const third = await ledger.enqueue({ recipientId: 'bob', senderId: 'alice', senderName: 'Alice', amount: 3 });

    const pending = await ledger.listPending('bob');

    expect(pending.map((t) => t.id)).toEqual([first, second, third]);
    expect(pending[0]).toEqual({
      id: first,
      recipientId: 'bob',
      senderId: 'alice',
      senderName: 'Alice',
      amount: 1,
      note: 'coffee',
      createdAt: '2026-10-21T09:00:00.000Z',
    });
    expect(pending[1]?.note).toBeNull();
  });

  test('pending queries on an unknown account fail', async () => {
    const { ledger } = createTestLedger();
    expect(await ledgerErrorCode(ledger.pendingTotal('nobody'))).toBe('UNKNOWN_ACCOUNT');
    expect(await ledgerErrorCode(ledger.listPending('nobody'))).toBe('UNKNOWN_ACCOUNT');
  });
});
