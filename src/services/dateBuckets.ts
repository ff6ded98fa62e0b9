// src/services/dateBuckets.ts
// Turns irregular, timestamped intake records into one bucket per calendar day.

import { DateTime, IANAZone } from 'luxon';
import { z } from 'zod';
import {
  CategoryTotals,
  DailyBucket,
  DateWindow,
  INTAKE_CATEGORIES,
  IntakeCategory,
  IntakeRecord,
} from '../types/intake';
import { ValidationError } from './errors';

/**
 * Shape accepted from storage: the category is still an unchecked string.
 */
export type IntakeRecordInput = Omit<IntakeRecord, 'category'> & { category: string };

const intakeRecordSchema = z.object({
  timestamp: z.date({ invalid_type_error: 'timestamp must be a Date' }),
  category: z.enum(INTAKE_CATEGORIES),
  quantity: z.number().finite().nonnegative(),
  calorieEstimate: z.number().finite().nonnegative().nullable(),
});

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function assertTimezone(timezone: string): void {
  if (!IANAZone.isValidZone(timezone)) {
    throw new ValidationError(`Unknown timezone: ${timezone}`);
  }
}

function isoDate(dt: DateTime): string {
  const iso = dt.toISODate();
  if (!iso) {
    throw new ValidationError(`Invalid date: ${dt.invalidExplanation ?? 'unknown reason'}`);
  }
  return iso;
}

function parseCalendarDate(value: string, field: string): DateTime {
  const dt = DateTime.fromISO(value, { zone: 'utc' });
  if (!ISO_DATE.test(value) || !dt.isValid) {
    throw new ValidationError(`${field} must be a yyyy-MM-dd date, got "${value}"`);
  }
  return dt;
}

/**
 * Calendar date of an instant in the given timezone (day boundary = local midnight).
 */
export function toLocalDate(timestamp: Date, timezone: string): string {
  return isoDate(DateTime.fromJSDate(timestamp, { zone: timezone }));
}

/**
 * Window of `days` calendar days ending on "today" in the timezone.
 */
export function resolveWindow(now: Date, days: number, timezone: string): DateWindow {
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError(`Window length must be a positive whole number of days, got ${days}`);
  }
  assertTimezone(timezone);

  const today = DateTime.fromJSDate(now, { zone: timezone }).startOf('day');
  return {
    start: isoDate(today.minus({ days: days - 1 })),
    end: isoDate(today),
  };
}

/**
 * Every date of the inclusive window, ascending.
 */
export function enumerateWindow(window: DateWindow): string[] {
  const start = parseCalendarDate(window.start, 'window start');
  const end = parseCalendarDate(window.end, 'window end');

  if (start.toMillis() > end.toMillis()) {
    throw new ValidationError(`Window start ${window.start} is after window end ${window.end}`);
  }

  const dates: string[] = [];
  for (let day = start; day.toMillis() <= end.toMillis(); day = day.plus({ days: 1 })) {
    dates.push(isoDate(day));
  }
  return dates;
}

export function windowLength(window: DateWindow): number {
  return enumerateWindow(window).length;
}

export function zeroTotals(): CategoryTotals {
  return { mpasi: 0, milk: 0, weight: 0, height: 0, head_circumference: 0, pump: 0, bowel: 0 };
}

function emptyBucket(date: string): DailyBucket {
  return { date, totals: zeroTotals(), calorieTotals: zeroTotals() };
}

/**
 * Validates raw records. Unknown categories and negative or non-finite
 * numbers are rejected, never dropped.
 */
export function parseIntakeRecords(records: ReadonlyArray<IntakeRecordInput>): IntakeRecord[] {
  const problems: string[] = [];
  const parsed: IntakeRecord[] = [];

  records.forEach((raw, index) => {
    const result = intakeRecordSchema.safeParse(raw);
    if (!result.success) {
      for (const issue of result.error.errors) {
        problems.push(`record ${index}: ${issue.path.join('.') || 'record'} ${issue.message}`);
      }
      return;
    }
    parsed.push(result.data);
  });

  if (problems.length > 0) {
    throw new ValidationError('Invalid intake records', problems);
  }
  return parsed;
}

/**
 * Aggregates records into one bucket per date of the window.
 *
 * Days with no records still get a bucket with zero totals, so series built
 * from the result stay positionally aligned. Records whose local date falls
 * outside the window are skipped; duplicates all count.
 */
export function aggregate(
  records: ReadonlyArray<IntakeRecordInput>,
  window: DateWindow,
  timezone: string
): DailyBucket[] {
  assertTimezone(timezone);
  const valid = parseIntakeRecords(records);

  const buckets = enumerateWindow(window).map(emptyBucket);
  const byDate = new Map(buckets.map((b) => [b.date, b]));

  for (const record of valid) {
    const bucket = byDate.get(toLocalDate(record.timestamp, timezone));
    if (!bucket) continue;

    bucket.totals[record.category] += record.quantity;
    bucket.calorieTotals[record.category] += record.calorieEstimate ?? 0;
  }

  return buckets;
}

export function sumCategory(
  buckets: ReadonlyArray<DailyBucket>,
  category: IntakeCategory,
  field: 'totals' | 'calorieTotals' = 'totals'
): number {
  return buckets.reduce((sum, b) => sum + b[field][category], 0);
}

export function hasAnyData(
  buckets: ReadonlyArray<DailyBucket>,
  categories: ReadonlyArray<IntakeCategory> = INTAKE_CATEGORIES
): boolean {
  return buckets.some((b) =>
    categories.some((c) => b.totals[c] > 0 || b.calorieTotals[c] > 0)
  );
}

/**
 * Checks that buckets are contiguous, ascending and non-negative.
 */
export function assertBucketInvariants(buckets: ReadonlyArray<DailyBucket>): void {
  if (buckets.length === 0) {
    throw new ValidationError('Bucket sequence is empty');
  }

  const expected = enumerateWindow({
    start: buckets[0].date,
    end: buckets[buckets.length - 1].date,
  });

  if (expected.length !== buckets.length || expected.some((d, i) => buckets[i].date !== d)) {
    throw new ValidationError('Bucket dates must be contiguous and strictly increasing');
  }

  for (const bucket of buckets) {
    for (const category of INTAKE_CATEGORIES) {
      const qty = bucket.totals[category];
      const kcal = bucket.calorieTotals[category];
      if (!(qty >= 0) || !(kcal >= 0)) {
        throw new ValidationError(`Negative or invalid total for ${category} on ${bucket.date}`);
      }
    }
  }
}
