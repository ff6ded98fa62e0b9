// src/services/chartSpecs.ts
// Builds ChartSpecs from daily buckets (intake) and raw measurements (growth).

import {
  CATEGORY_LABELS,
  CATEGORY_UNITS,
  ChartSpec,
  DailyBucket,
  DateWindow,
  FEEDING_CATEGORIES,
  GROWTH_CATEGORIES,
  IntakeCategory,
  IntakeRecord,
  SeriesDef,
} from '../types/intake';
import { CHART_COLORS } from './chartComposer';
import { hasAnyData, toLocalDate } from './dateBuckets';
import { DataUnavailable, ValidationError } from './errors';

const BAR_COLORS: Partial<Record<IntakeCategory, string>> = {
  mpasi: CHART_COLORS.mpasi,
  milk: CHART_COLORS.milk,
};

const CALORIE_COLORS: Partial<Record<IntakeCategory, string>> = {
  mpasi: CHART_COLORS.mpasiKcal,
  milk: CHART_COLORS.milkKcal,
};

const GROWTH_COLORS: Partial<Record<IntakeCategory, string>> = {
  weight: CHART_COLORS.weight,
  height: CHART_COLORS.height,
  head_circumference: CHART_COLORS.headCircumference,
};

const GROWTH_SET: ReadonlySet<IntakeCategory> = new Set(GROWTH_CATEGORIES);

export function insufficientDataNotice(window: DateWindow): string {
  return `Insufficient data: no intake logged from ${window.start} to ${window.end}`;
}

export interface IntakeChartOptions {
  subject: string;
  categories?: ReadonlyArray<IntakeCategory>;
}

/**
 * Stacked volume bars (one segment per category) with calorie lines on the
 * secondary axis. One x position per bucket. An all-zero window carries the
 * insufficient-data notice.
 */
export function buildIntakeChartSpec(
  buckets: ReadonlyArray<DailyBucket>,
  options: IntakeChartOptions
): ChartSpec {
  if (buckets.length === 0) {
    throw new ValidationError('Cannot chart an empty bucket sequence');
  }

  const categories = options.categories ?? FEEDING_CATEGORIES;
  const start = buckets[0].date;
  const end = buckets[buckets.length - 1].date;

  const bars: SeriesDef[] = categories.map((c) => ({
    label: `${CATEGORY_LABELS[c]} (${CATEGORY_UNITS[c]})`,
    values: buckets.map((b) => b.totals[c]),
    renderStyle: 'stacked_bar',
    axis: 'primary',
    color: BAR_COLORS[c],
    unit: CATEGORY_UNITS[c],
  }));

  const lines: SeriesDef[] = categories.map((c) => ({
    label: `${CATEGORY_LABELS[c]} calories`,
    values: buckets.map((b) => Math.round(b.calorieTotals[c] * 10) / 10),
    renderStyle: 'line',
    axis: 'secondary',
    color: CALORIE_COLORS[c],
    unit: 'kcal',
  }));

  const label = categories.map((c) => CATEGORY_LABELS[c]).join(' & ');

  return {
    ...(hasAnyData(buckets, categories) ? {} : { notice: insufficientDataNotice({ start, end }) }),
    title: `${label} Intake`,
    subtitle: `${options.subject} | ${start} to ${end}`,
    labels: buckets.map((b) => b.date),
    window: { start, end },
    series: [...bars, ...lines],
    layout: 'combined',
    axisTitles: {
      primary: `Quantity (${[...new Set(categories.map((c) => CATEGORY_UNITS[c]))].join(', ')})`,
      secondary: 'Calories (kcal)',
    },
  };
}

/**
 * One line panel per growth measurement, x positions = measurement dates.
 * Several measurements on one day keep the latest; a missing measurement is a gap.
 */
export function buildGrowthChartSpec(
  records: ReadonlyArray<IntakeRecord>,
  timezone: string,
  subject: string
): ChartSpec {
  const growth = records
    .filter((r) => GROWTH_SET.has(r.category))
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());

  if (growth.length === 0) {
    throw new DataUnavailable('No growth measurements recorded yet');
  }

  const latest = new Map<string, Map<IntakeCategory, number>>();
  for (const record of growth) {
    const date = toLocalDate(record.timestamp, timezone);
    const day = latest.get(date) ?? new Map<IntakeCategory, number>();
    day.set(record.category, record.quantity);
    latest.set(date, day);
  }

  const labels = [...latest.keys()].sort();
  const present = GROWTH_CATEGORIES.filter((c) => growth.some((r) => r.category === c));

  const series: SeriesDef[] = present.map((c) => ({
    label: CATEGORY_LABELS[c],
    values: labels.map((d) => latest.get(d)?.get(c) ?? null),
    renderStyle: 'line',
    axis: 'primary',
    color: GROWTH_COLORS[c],
    unit: CATEGORY_UNITS[c],
  }));

  return {
    title: `Growth Chart - ${subject}`,
    subtitle: `${labels[0]} to ${labels[labels.length - 1]} | ${growth.length} measurements`,
    labels,
    window: { start: labels[0], end: labels[labels.length - 1] },
    series,
    layout: 'panels',
    axisTitles: { primary: 'Measurement' },
  };
}
