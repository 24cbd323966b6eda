import { ERROR_CODES } from '@tokenboard/shared';
import { isBusyError, type Db } from '../lib/db.js';
import { LedgerError } from './errors.js';

/**
 * Run `fn` as one write transaction (BEGIN IMMEDIATE). Everything `fn` does
 * commits together or rolls back together; `fn` must not await.
 *
 * If another connection holds the write lock past the busy timeout the
 * operation fails with CONCURRENCY_CONFLICT and nothing is applied.
 */
export function runAtomically<T>(db: Db, fn: () => T): T {
  try {
    return db.transaction(fn).immediate();
  } catch (err) {
    if (isBusyError(err)) {
      throw new LedgerError(ERROR_CODES.CONCURRENCY_CONFLICT, 'Ledger is busy, retry the operation', {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    throw err;
  }
}
