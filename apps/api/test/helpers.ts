import pino from 'pino';
import { openDatabase, type Db } from '../src/lib/db.js';
import { LedgerError } from '../src/ledger/errors.js';
import { LedgerService } from '../src/ledger/ledgerService.js';

export const silentLogger = pino({ level: 'silent' });

export interface TestClock {
  now: () => Date;
  set: (iso: string) => void;
}

export function createClock(startIso: string): TestClock {
  let current = new Date(startIso);
  return {
    now: () => new Date(current.getTime()),
    set: (iso) => {
      current = new Date(iso);
    },
  };
}

// Wednesday; the week started Monday 2026-10-19
export const WEDNESDAY = '2026-10-21T09:00:00.000Z';

export function createTestLedger(
  options: { startIso?: string; timeZone?: string; db?: Db } = {}
): { ledger: LedgerService; db: Db; clock: TestClock } {
  const clock = createClock(options.startIso ?? WEDNESDAY);
  const db = options.db ?? openDatabase(':memory:');
  const ledger = new LedgerService({
    db,
    timeZone: options.timeZone ?? 'UTC',
    now: clock.now,
    logger: silentLogger,
  });
  return { ledger, db, clock };
}

export const PEOPLE = {
  alice: 'Alice',
  bob: 'Bob',
  carol: 'Carol',
  dave: 'Dave',
} as const;

export async function provisionPeople(ledger: LedgerService, ids: (keyof typeof PEOPLE)[] = ['alice', 'bob', 'carol', 'dave']) {
  for (const id of ids) {
    await ledger.provision({ userId: id, name: PEOPLE[id], product: null });
  }
}

/** Resolves to the rejection reason; fails if the promise resolves */
export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

/** The LedgerError code a promise rejects with; rethrows anything else */
export async function ledgerErrorCode(promise: Promise<unknown>): Promise<string> {
  const err = await captureError(promise);
  if (err instanceof LedgerError) return err.code;
  throw err;
}
