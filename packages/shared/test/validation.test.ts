import { describe, expect, test } from 'vitest';
import {
  activityQuerySchema,
  rankingParamsSchema,
  sendTransferSchema,
  transferAmountSchema,
  userIdSchema,
} from '../src/index.js';

describe('userIdSchema', () => {
  test('accepts lowercase slugs', () => {
    expect(userIdSchema.safeParse('alice_01').success).toBe(true);
    expect(userIdSchema.safeParse('team-lead').success).toBe(true);
  });

  test.each(['', 'Alice', 'bob smith', 'me', 'a'.repeat(65)])('rejects %j', (value) => {
    expect(userIdSchema.safeParse(value).success).toBe(false);
  });
});

describe('transferAmountSchema', () => {
  test('positive whole numbers only', () => {
    expect(transferAmountSchema.safeParse(1).success).toBe(true);
    expect(transferAmountSchema.safeParse(0).success).toBe(false);
    expect(transferAmountSchema.safeParse(-3).success).toBe(false);
    expect(transferAmountSchema.safeParse(1.5).success).toBe(false);
  });
});

describe('sendTransferSchema', () => {
  test('checks only the shape of the amount', () => {
    expect(sendTransferSchema.parse({ toUserId: 'bob', amount: 0 })).toEqual({ toUserId: 'bob', amount: 0 });
    expect(sendTransferSchema.safeParse({ toUserId: 'bob', amount: '10' }).success).toBe(false);
  });

  test('limits the note length', () => {
    expect(sendTransferSchema.safeParse({ toUserId: 'bob', amount: 1, note: 'x'.repeat(281) }).success).toBe(false);
    expect(sendTransferSchema.safeParse({ toUserId: 'bob', amount: 1, note: null }).success).toBe(true);
  });
});

describe('query schemas', () => {
  test('activity limit is coerced and defaulted', () => {
    expect(activityQuerySchema.parse({})).toEqual({ limit: 20 });
    expect(activityQuerySchema.parse({ limit: '5', userId: 'bob' })).toEqual({ limit: 5, userId: 'bob' });
    expect(activityQuerySchema.safeParse({ limit: '500' }).success).toBe(false);
  });

  test('ranking period must be a known period', () => {
    expect(rankingParamsSchema.parse({ period: 'weekly' })).toEqual({ period: 'weekly' });
    expect(rankingParamsSchema.safeParse({ period: 'yearly' }).success).toBe(false);
  });
});
