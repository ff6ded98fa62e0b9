// tests/date-buckets.spec.ts
// Daily bucketing: gap filling, timezone day boundaries, validation

import { test, expect } from '@playwright/test';
import {
  aggregate,
  assertBucketInvariants,
  enumerateWindow,
  hasAnyData,
  resolveWindow,
  sumCategory,
  toLocalDate,
  windowLength,
} from '../src/services/dateBuckets';
import { ValidationError } from '../src/services/errors';
import { buildReportTable, formatQuantity } from '../src/services/reportAssembler';
import { TZ, at, record } from './helpers/fakes';

const WEEK = { start: '2024-01-01', end: '2024-01-07' };

test.describe('aggregate', () => {
  test('fills the window with one bucket per day, zeros included', () => {
    const buckets = aggregate(
      [record('mpasi', '2024-01-01', 120, 80), record('mpasi', '2024-01-03', 150, 95)],
      WEEK,
      TZ
    );

    expect(buckets.map((b) => b.date)).toEqual([
      '2024-01-01',
      '2024-01-02',
      '2024-01-03',
      '2024-01-04',
      '2024-01-05',
      '2024-01-06',
      '2024-01-07',
    ]);
    expect(buckets[0].totals.mpasi).toBe(120);
    expect(buckets[1].totals.mpasi).toBe(0);
    expect(buckets[2].totals.mpasi).toBe(150);
    expect(sumCategory(buckets, 'mpasi')).toBe(270);
    expect(sumCategory(buckets, 'mpasi', 'calorieTotals')).toBe(175);
  });

  test('averages divide by the full window length', () => {
    const buckets = aggregate(
      [record('mpasi', '2024-01-01', 120), record('mpasi', '2024-01-03', 150)],
      WEEK,
      TZ
    );
    const { summary } = buildReportTable(buckets);

    expect(summary.windowDays).toBe(7);
    expect(summary.averages.quantities.mpasi).toBeCloseTo(38.571, 3);
    expect(formatQuantity(summary.averages.quantities.mpasi ?? 0)).toBe('38.6');
  });

  test('empty input gives all-zero buckets', () => {
    const buckets = aggregate([], WEEK, TZ);

    expect(buckets).toHaveLength(7);
    expect(hasAnyData(buckets)).toBe(false);
    for (const b of buckets) {
      expect(Object.values(b.totals).every((v) => v === 0)).toBe(true);
      expect(Object.values(b.calorieTotals).every((v) => v === 0)).toBe(true);
    }
  });

  test('records on the same timestamp both count', () => {
    const buckets = aggregate(
      [record('milk', '2024-01-05', 90, 60, '08:00'), record('milk', '2024-01-05', 90, 60, '08:00')],
      WEEK,
      TZ
    );

    expect(buckets[4].totals.milk).toBe(180);
    expect(buckets[4].calorieTotals.milk).toBe(120);
  });

  test('null calorie estimates count as zero calories', () => {
    const buckets = aggregate([record('milk', '2024-01-02', 100, null)], WEEK, TZ);

    expect(buckets[1].totals.milk).toBe(100);
    expect(buckets[1].calorieTotals.milk).toBe(0);
  });

  test('records outside the window are left out', () => {
    const buckets = aggregate(
      [record('mpasi', '2023-12-31', 50), record('mpasi', '2024-01-08', 70), record('mpasi', '2024-01-04', 30)],
      WEEK,
      TZ
    );

    expect(sumCategory(buckets, 'mpasi')).toBe(30);
  });

  test('the day boundary is local midnight in the given timezone', () => {
    // 00:30 on Jan 2 in Jakarta is still Jan 1 in UTC
    const early = { timestamp: at('2024-01-02', '00:30'), category: 'milk', quantity: 60, calorieEstimate: null };

    const local = aggregate([early], WEEK, TZ);
    const utc = aggregate([early], WEEK, 'UTC');

    expect(local[1].totals.milk).toBe(60);
    expect(utc[0].totals.milk).toBe(60);
  });

  test('rejects unknown categories instead of dropping them', () => {
    const bad = { timestamp: at('2024-01-02'), category: 'sleep', quantity: 1, calorieEstimate: null };

    expect(() => aggregate([bad], WEEK, TZ)).toThrow(ValidationError);
  });

  test('rejects negative quantities', () => {
    const bad = { timestamp: at('2024-01-02'), category: 'milk', quantity: -5, calorieEstimate: null };

    expect(() => aggregate([bad], WEEK, TZ)).toThrow(ValidationError);
  });

  test('rejects an unknown timezone', () => {
    expect(() => aggregate([], WEEK, 'Mars/Olympus_Mons')).toThrow(ValidationError);
  });

  test('rejects a window whose start is after its end', () => {
    expect(() => aggregate([], { start: '2024-01-07', end: '2024-01-01' }, TZ)).toThrow(ValidationError);
  });
});

test.describe('windows', () => {
  test('resolveWindow ends on today in the reference timezone', () => {
    // 20:00 UTC on Jan 7 is 03:00 on Jan 8 in Jakarta
    const now = new Date('2024-01-07T20:00:00Z');

    expect(resolveWindow(now, 7, TZ)).toEqual({ start: '2024-01-02', end: '2024-01-08' });
    expect(resolveWindow(now, 7, 'UTC')).toEqual({ start: '2024-01-01', end: '2024-01-07' });
  });

  test('resolveWindow of one day is just today', () => {
    expect(resolveWindow(new Date('2024-03-10T05:00:00Z'), 1, TZ)).toEqual({
      start: '2024-03-10',
      end: '2024-03-10',
    });
  });

  test('resolveWindow rejects non-positive lengths', () => {
    expect(() => resolveWindow(new Date(), 0, TZ)).toThrow(ValidationError);
    expect(() => resolveWindow(new Date(), 2.5, TZ)).toThrow(ValidationError);
  });

  test('enumerateWindow crosses month and leap-day boundaries', () => {
    expect(enumerateWindow({ start: '2024-02-28', end: '2024-03-01' })).toEqual([
      '2024-02-28',
      '2024-02-29',
      '2024-03-01',
    ]);
    expect(windowLength({ start: '2023-12-30', end: '2024-01-02' })).toBe(4);
  });

  test('enumerateWindow rejects malformed dates', () => {
    expect(() => enumerateWindow({ start: '2024-1-1', end: '2024-01-07' })).toThrow(ValidationError);
    expect(() => enumerateWindow({ start: '2024-02-30', end: '2024-03-01' })).toThrow(ValidationError);
  });

  test('toLocalDate follows the timezone', () => {
    const instant = new Date('2024-06-30T18:00:00Z');

    expect(toLocalDate(instant, TZ)).toBe('2024-07-01');
    expect(toLocalDate(instant, 'America/New_York')).toBe('2024-06-30');
  });
});

test.describe('assertBucketInvariants', () => {
  test('accepts aggregated output', () => {
    expect(() => assertBucketInvariants(aggregate([], WEEK, TZ))).not.toThrow();
  });

  test('rejects a gap in the dates', () => {
    const buckets = aggregate([], WEEK, TZ);
    buckets.splice(3, 1);

    expect(() => assertBucketInvariants(buckets)).toThrow('contiguous');
  });

  test('rejects an empty sequence', () => {
    expect(() => assertBucketInvariants([])).toThrow(ValidationError);
  });
});
