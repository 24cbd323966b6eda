// ============================================
// System Constants for Tokenboard
// ============================================

// -------------------- Token Economics --------------------

/** Minimum token amount for any transfer */
export const MIN_TRANSFER_AMOUNT = 1;

/** Maximum token amount for a single transfer */
export const MAX_TRANSFER_AMOUNT = 10_000;

// -------------------- Periods --------------------

/** Period counters that roll over; 'total' is the never-reset all-time view */
export const RANKING_PERIODS = ['total', 'daily', 'weekly', 'monthly'] as const;

/** Reference time zone used when none is configured */
export const DEFAULT_TIME_ZONE = 'UTC';

// -------------------- Rate Limits --------------------

export const RATE_LIMITS = {
  /** Max API requests per minute */
  API_REQUESTS_PER_MINUTE: 100,
} as const;

// -------------------- Validation --------------------

export const VALIDATION = {
  /** User id constraints (external identifiers) */
  USER_ID_MAX_LENGTH: 64,
  USER_ID_PATTERN: /^[a-z0-9_-]+$/,
  /** Path segments the account routes claim for themselves */
  RESERVED_USER_IDS: new Set<string>(['me']),

  /** Note constraints */
  NOTE_MAX_LENGTH: 280,

  /** Activity feed page size */
  ACTIVITY_DEFAULT_LIMIT: 20,
  ACTIVITY_MAX_LIMIT: 100,
} as const;

// -------------------- Error Codes --------------------

export const ERROR_CODES = {
  // Identity
  UNAUTHORIZED: 'UNAUTHORIZED',

  // Ledger
  UNKNOWN_ACCOUNT: 'UNKNOWN_ACCOUNT',
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  SELF_TRANSFER: 'SELF_TRANSFER',
  TRANSFER_NOT_FOUND: 'TRANSFER_NOT_FOUND',
  NO_PENDING_TRANSFERS: 'NO_PENDING_TRANSFERS',
  CONCURRENCY_CONFLICT: 'CONCURRENCY_CONFLICT',

  // Rate limit errors
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',

  // General errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  NOT_FOUND: 'NOT_FOUND',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
