import { ERROR_CODES } from '@tokenboard/shared';

export type LedgerErrorCode =
  | typeof ERROR_CODES.UNKNOWN_ACCOUNT
  | typeof ERROR_CODES.INVALID_AMOUNT
  | typeof ERROR_CODES.SELF_TRANSFER
  | typeof ERROR_CODES.TRANSFER_NOT_FOUND
  | typeof ERROR_CODES.NO_PENDING_TRANSFERS
  | typeof ERROR_CODES.CONCURRENCY_CONFLICT;

/**
 * LedgerError is the single error type thrown by the ledger core.
 *
 * - `code` is stable and shared with clients (see ERROR_CODES)
 * - `details` carries the ids involved, for logs
 *
 * Every code is recoverable by the caller; CONCURRENCY_CONFLICT means the
 * whole operation can be retried.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.details = details;
  }
}

export function unknownAccount(userId: string): LedgerError {
  return new LedgerError(ERROR_CODES.UNKNOWN_ACCOUNT, `Account not found: ${userId}`, { userId });
}
