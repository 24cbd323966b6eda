import type { RANKING_PERIODS } from '../constants/index.js';

// ============================================
// Core Domain Types for Tokenboard
// ============================================

// -------------------- Periods --------------------

/** Calendar date in the ledger's reference time zone, formatted YYYY-MM-DD */
export type CalendarDate = string;

export interface PeriodBoundaries {
  day: CalendarDate;
  /** Monday on or before `day` */
  week: CalendarDate;
  /** First day of `day`'s month */
  month: CalendarDate;
}

export type RankingPeriod = (typeof RANKING_PERIODS)[number];

// -------------------- Account --------------------

export interface Account {
  userId: string;
  name: string;
  product: string | null;

  // All-time, never reset
  allTimeReceived: number;
  allTimeGiven: number;

  // Reset at period boundaries
  dailyReceived: number;
  dailyGiven: number;
  weeklyReceived: number;
  weeklyGiven: number;
  monthlyReceived: number;
  monthlyGiven: number;

  lastDailyReset: CalendarDate | null;
  lastWeeklyReset: CalendarDate | null;
  lastMonthlyReset: CalendarDate | null;

  createdAt: string;
  updatedAt: string;
}

export interface AccountSeed {
  userId: string;
  name: string;
  product?: string | null;
}

// -------------------- Pending Transfer --------------------

export interface PendingTransfer {
  id: string;
  recipientId: string;
  senderId: string;
  /** Sender's display name when the transfer was created */
  senderName: string;
  amount: number; // Always positive integer
  note: string | null;
  createdAt: string;
}

// -------------------- Settlement --------------------

export interface AcceptOneResult {
  amount: number;
  fromName: string;
}

export interface AcceptAllResult {
  totalAmount: number;
  count: number;
}

// -------------------- Activity --------------------

export interface ActivityEntry {
  id: string;
  userId: string | null;
  message: string;
  createdAt: string;
}

// -------------------- Rankings --------------------

export interface RankingEntry {
  rank: number;
  userId: string;
  name: string;
  product: string | null;
  received: number;
  given: number;
}
