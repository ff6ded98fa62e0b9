// tests/chart-specs.spec.ts

import { test, expect } from '@playwright/test';
import { buildGrowthChartSpec, buildIntakeChartSpec } from '../src/services/chartSpecs';
import { aggregate } from '../src/services/dateBuckets';
import { DataUnavailable, ValidationError } from '../src/services/errors';
import { TZ, record } from './helpers/fakes';

const WINDOW = { start: '2024-01-01', end: '2024-01-03' };

test.describe('buildIntakeChartSpec', () => {
  test('stacks volumes and overlays calories on the secondary axis', () => {
    const buckets = aggregate(
      [record('mpasi', '2024-01-01', 120, 80), record('milk', '2024-01-02', 100, 67)],
      WINDOW,
      TZ
    );
    const spec = buildIntakeChartSpec(buckets, { subject: 'Ayu' });

    expect(spec.layout).toBe('combined');
    expect(spec.labels).toEqual(['2024-01-01', '2024-01-02', '2024-01-03']);
    expect(spec.subtitle).toBe('Ayu | 2024-01-01 to 2024-01-03');
    expect(spec.axisTitles).toEqual({ primary: 'Quantity (ml)', secondary: 'Calories (kcal)' });
    expect(spec.series.map((s) => [s.label, s.renderStyle, s.axis])).toEqual([
      ['MPASI (ml)', 'stacked_bar', 'primary'],
      ['Milk (ml)', 'stacked_bar', 'primary'],
      ['MPASI calories', 'line', 'secondary'],
      ['Milk calories', 'line', 'secondary'],
    ]);
    expect(spec.series[0].values).toEqual([120, 0, 0]);
    expect(spec.series[1].values).toEqual([0, 100, 0]);
    expect(spec.series[3].values).toEqual([0, 67, 0]);
  });

  test('rounds calorie points to one decimal', () => {
    const buckets = aggregate([record('milk', '2024-01-01', 95, 63.66)], WINDOW, TZ);
    const spec = buildIntakeChartSpec(buckets, { subject: 'Ayu' });

    expect(spec.series[3].values[0]).toBe(63.7);
  });

  test('an all-zero window carries the insufficient-data notice', () => {
    const spec = buildIntakeChartSpec(aggregate([], WINDOW, TZ), { subject: 'Ayu' });

    expect(spec.notice).toBe('Insufficient data: no intake logged from 2024-01-01 to 2024-01-03');
  });

  test('a window with intake has no notice', () => {
    const buckets = aggregate([record('milk', '2024-01-02', 100, 67)], WINDOW, TZ);

    expect(buildIntakeChartSpec(buckets, { subject: 'Ayu' }).notice).toBeUndefined();
  });

  test('rejects an empty bucket sequence', () => {
    expect(() => buildIntakeChartSpec([], { subject: 'Ayu' })).toThrow(ValidationError);
  });
});

test.describe('buildGrowthChartSpec', () => {
  test('one panel per measured series, latest value per day, gaps as null', () => {
    const spec = buildGrowthChartSpec(
      [
        record('weight', '2024-02-05', 7.6),
        record('weight', '2024-01-05', 7.1, null, '08:00'),
        record('weight', '2024-01-05', 7.2, null, '18:00'),
        record('height', '2024-01-05', 65),
        record('milk', '2024-01-05', 120),
      ],
      TZ,
      'Ayu'
    );

    expect(spec.layout).toBe('panels');
    expect(spec.title).toBe('Growth Chart - Ayu');
    expect(spec.labels).toEqual(['2024-01-05', '2024-02-05']);
    expect(spec.subtitle).toBe('2024-01-05 to 2024-02-05 | 4 measurements');
    expect(spec.series.map((s) => s.label)).toEqual(['Weight', 'Height']);
    expect(spec.series[0].values).toEqual([7.2, 7.6]);
    expect(spec.series[1].values).toEqual([65, null]);
  });

  test('no measurements is DataUnavailable', () => {
    expect(() => buildGrowthChartSpec([], TZ, 'Ayu')).toThrow(DataUnavailable);
    expect(() => buildGrowthChartSpec([record('milk', '2024-01-05', 120)], TZ, 'Ayu')).toThrow(DataUnavailable);
  });
});
