import { describe, expect, test } from 'vitest';
import { getPeriodBoundaries } from '../src/ledger/periodClock.js';

describe('getPeriodBoundaries', () => {
  test('midweek date maps to its Monday and the first of the month', () => {
    expect(getPeriodBoundaries(new Date('2026-10-21T09:00:00Z'), 'UTC')).toEqual({
      day: '2026-10-21',
      week: '2026-10-19',
      month: '2026-10-01',
    });
  });

  test('Monday starts its own week and Sunday still belongs to the previous one', () => {
    expect(getPeriodBoundaries(new Date('2026-10-19T00:00:00Z'), 'UTC').week).toBe('2026-10-19');
    expect(getPeriodBoundaries(new Date('2026-10-25T23:59:59Z'), 'UTC').week).toBe('2026-10-19');
    expect(getPeriodBoundaries(new Date('2026-10-26T00:00:00Z'), 'UTC').week).toBe('2026-10-26');
  });

  test('the calendar date follows the reference time zone', () => {
    const instant = new Date('2026-10-20T15:30:00Z');
    expect(getPeriodBoundaries(instant, 'UTC').day).toBe('2026-10-20');
    expect(getPeriodBoundaries(instant, 'Asia/Seoul').day).toBe('2026-10-21');
  });

  test('a local month change moves month but not week when it falls on a Sunday', () => {
    // 2026-11-01 05:00 in Seoul, a Sunday
    expect(getPeriodBoundaries(new Date('2026-10-31T20:00:00Z'), 'Asia/Seoul')).toEqual({
      day: '2026-11-01',
      week: '2026-10-26',
      month: '2026-11-01',
    });
  });

  test('weeks span year boundaries', () => {
    expect(getPeriodBoundaries(new Date('2027-01-01T12:00:00Z'), 'UTC')).toEqual({
      day: '2027-01-01',
      week: '2026-12-28',
      month: '2027-01-01',
    });
  });

  test('zones behind UTC can still be on the previous day', () => {
    // 23:30 on Saturday 2026-10-31 in Los Angeles (PDT)
    expect(getPeriodBoundaries(new Date('2026-11-01T06:30:00Z'), 'America/Los_Angeles')).toEqual({
      day: '2026-10-31',
      week: '2026-10-26',
      month: '2026-10-01',
    });
  });
});
