import { z } from 'zod';
import { VALIDATION, MIN_TRANSFER_AMOUNT, MAX_TRANSFER_AMOUNT, RANKING_PERIODS } from '../constants/index.js';

// ============================================
// Zod Schemas for Tokenboard
// Used for validation on both client and server
// ============================================

// -------------------- Identity --------------------

export const userIdSchema = z
  .string()
  .min(1, 'User id is required')
  .max(VALIDATION.USER_ID_MAX_LENGTH, `User id must be at most ${VALIDATION.USER_ID_MAX_LENGTH} characters`)
  .regex(VALIDATION.USER_ID_PATTERN, 'User id can only contain lowercase letters, numbers, dashes and underscores')
  .refine((id) => !VALIDATION.RESERVED_USER_IDS.has(id), (id) => ({ message: `User id "${id}" is reserved` }));

// -------------------- Transfer --------------------

export const noteSchema = z
  .string()
  .max(VALIDATION.NOTE_MAX_LENGTH, `Note must be at most ${VALIDATION.NOTE_MAX_LENGTH} characters`)
  .optional()
  .nullable();

/** Semantic amount rule; the ledger core applies it and reports INVALID_AMOUNT */
export const transferAmountSchema = z
  .number()
  .int('Amount must be a whole number')
  .min(MIN_TRANSFER_AMOUNT, `Minimum transfer is ${MIN_TRANSFER_AMOUNT} token`)
  .max(MAX_TRANSFER_AMOUNT, `Maximum transfer is ${MAX_TRANSFER_AMOUNT} tokens`);

export const sendTransferSchema = z.object({
  toUserId: userIdSchema,
  // Shape only here: the ledger owns the amount rule
  amount: z.number(),
  note: noteSchema,
});

export const transferParamsSchema = z.object({
  id: z.string().uuid('Transfer id must be a UUID'),
});

// -------------------- Queries --------------------

export const accountParamsSchema = z.object({
  userId: userIdSchema,
});

export const rankingParamsSchema = z.object({
  period: z.enum(RANKING_PERIODS),
});

export const activityQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(VALIDATION.ACTIVITY_MAX_LIMIT)
    .default(VALIDATION.ACTIVITY_DEFAULT_LIMIT),
  userId: userIdSchema.optional(),
});

// -------------------- Type Exports --------------------

export type SendTransferInput = z.infer<typeof sendTransferSchema>;
export type TransferParams = z.infer<typeof transferParamsSchema>;
export type AccountParams = z.infer<typeof accountParamsSchema>;
export type RankingParams = z.infer<typeof rankingParamsSchema>;
export type ActivityQueryInput = z.infer<typeof activityQuerySchema>;
