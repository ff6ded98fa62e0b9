// tests/report-assembler.spec.ts
// Report table, window statistics, pagination and the PDF itself

import { test, expect } from '@playwright/test';
import sharp from 'sharp';
import { aggregate } from '../src/services/dateBuckets';
import { RenderingFailure, ValidationError } from '../src/services/errors';
import {
  MAX_FIRST_PAGE_ROWS,
  MAX_ROWS_PER_PAGE,
  assemble,
  buildReportTable,
  layoutReport,
  summarizeWindow,
} from '../src/services/reportAssembler';
import { ReportRow } from '../src/types/intake';
import { TZ, record } from './helpers/fakes';

const WEEK = { start: '2024-01-01', end: '2024-01-07' };

function weekBuckets() {
  return aggregate(
    [
      record('mpasi', '2024-01-01', 120, 80),
      record('mpasi', '2024-01-03', 150, 95),
      record('milk', '2024-01-03', 200, 134),
    ],
    WEEK,
    TZ
  );
}

function rows(count: number): ReportRow[] {
  return Array.from({ length: count }, (_, i) => ({
    date: `row-${i}`,
    quantities: {},
    calories: {},
    totalCalories: 0,
  }));
}

function pdfPageCount(pdf: Buffer): number {
  return (pdf.toString('latin1').match(/\/Type \/Page\b/g) ?? []).length;
}

function tinyPng(): Promise<Buffer> {
  return sharp({ create: { width: 30, height: 20, channels: 3, background: '#ffffff' } }).png().toBuffer();
}

test.describe('buildReportTable', () => {
  test('one row per day with totals and per-day means', () => {
    const { rows: table, summary } = buildReportTable(weekBuckets());

    expect(table).toHaveLength(7);
    expect(table[2]).toEqual({
      date: '2024-01-03',
      quantities: { mpasi: 150, milk: 200 },
      calories: { mpasi: 95, milk: 134 },
      totalCalories: 229,
    });
    expect(table[1].totalCalories).toBe(0);

    expect(summary.totals).toEqual({
      quantities: { mpasi: 270, milk: 200 },
      calories: { mpasi: 175, milk: 134 },
      totalCalories: 309,
    });
    expect(summary.averages.quantities.milk).toBeCloseTo(200 / 7, 10);
    expect(summary.averages.totalCalories).toBeCloseTo(309 / 7, 10);
  });
});

test.describe('summarizeWindow', () => {
  test('counts active days and compares window halves', () => {
    const stats = summarizeWindow(weekBuckets());

    expect(stats.windowDays).toBe(7);
    expect(stats.daysWithData).toEqual({ mpasi: 2, milk: 1 });
    expect(stats.totalCalories).toBe(309);
    // first half: Jan 1-3 (80, 0, 229), second half: Jan 4-7 (all zero)
    expect(stats.calorieTrend).toBe('decreasing');
    expect(stats.trendMagnitude).toBeCloseTo(103, 10);
  });

  test('equal halves are stable', () => {
    const stats = summarizeWindow(aggregate([], WEEK, TZ));

    expect(stats.calorieTrend).toBe('stable');
    expect(stats.trendMagnitude).toBe(0);
  });

  test('a single day cannot show a trend', () => {
    const stats = summarizeWindow(aggregate([], { start: '2024-01-01', end: '2024-01-01' }, TZ));

    expect(stats.calorieTrend).toBe('insufficient_data');
  });
});

test.describe('layoutReport', () => {
  test('a short table fits on the first page with its summary', () => {
    const layout = layoutReport(rows(7), { firstPageRows: 12, rowsPerPage: 28 });

    expect(layout.pages).toHaveLength(1);
    expect(layout.pages[0].rows).toHaveLength(7);
    expect(layout.pages[0].includesSummary).toBe(true);
  });

  test('the summary is never left alone on a page', () => {
    const layout = layoutReport(rows(12), { firstPageRows: 12, rowsPerPage: 28 });

    expect(layout.pages.map((p) => p.rows.length)).toEqual([10, 2]);
    expect(layout.pages.map((p) => p.includesSummary)).toEqual([false, true]);
  });

  test('long tables continue with rowsPerPage rows per page', () => {
    const layout = layoutReport(rows(31), { firstPageRows: 12, rowsPerPage: 28 });

    expect(layout.pages.map((p) => p.rows.length)).toEqual([12, 19]);
    expect(layout.pages[1].includesSummary).toBe(true);
  });

  test('keeps every row exactly once, in order', () => {
    const input = rows(45);
    const layout = layoutReport(input, { firstPageRows: 5, rowsPerPage: 10 });

    const flattened = layout.pages.flatMap((p) => p.rows.map((r) => r.date));
    expect(flattened).toEqual(input.map((r) => r.date));
    expect(layout.pages.filter((p) => p.includesSummary)).toHaveLength(1);
    expect(layout.pages[layout.pages.length - 1].includesSummary).toBe(true);
    layout.pages.forEach((page, i) => {
      const capacity = i === 0 ? 5 : 10;
      expect(page.rows.length + (page.includesSummary ? 2 : 0)).toBeLessThanOrEqual(capacity);
    });
  });

  test('rejects a page too small for the summary rows', () => {
    expect(() => layoutReport(rows(3), { firstPageRows: 12, rowsPerPage: 2 })).toThrow(ValidationError);
  });

  test('page capacities come from the A4 geometry', () => {
    expect(MAX_FIRST_PAGE_ROWS).toBe(15);
    expect(MAX_ROWS_PER_PAGE).toBe(40);
  });

  test('rejects more rows than fit on a page', () => {
    expect(() => layoutReport(rows(90), { firstPageRows: 12, rowsPerPage: 41 })).toThrow(ValidationError);
    expect(() => layoutReport(rows(90), { firstPageRows: 16, rowsPerPage: 28 })).toThrow(ValidationError);
  });

  test('notes share the summary page when they fit', () => {
    const layout = layoutReport(rows(7), { firstPageRows: 12, rowsPerPage: 28 });

    expect(layout.pages.map((p) => p.includesNotes)).toEqual([true]);
  });

  test('notes get their own page when the summary page is full', () => {
    const layout = layoutReport(rows(13), { firstPageRows: 15, rowsPerPage: 28 });

    expect(layout.pages.map((p) => p.rows.length)).toEqual([13, 0]);
    expect(layout.pages.map((p) => p.includesSummary)).toEqual([true, false]);
    expect(layout.pages.map((p) => p.includesNotes)).toEqual([false, true]);
  });
});

test.describe('assemble', () => {
  test('produces a PDF alongside the table it was built from', async () => {
    const { pdf, report, layout } = await assemble(await tinyPng(), weekBuckets(), {
      subject: 'Ayu',
      window: WEEK,
      generatedAt: new Date('2024-01-07T10:00:00Z'),
      timezone: TZ,
      rowsPerPage: 28,
    });

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(report.categories).toEqual(['mpasi', 'milk']);
    expect(report.tableRows).toHaveLength(7);
    expect(report.summaryRow.totals.totalCalories).toBe(309);
    expect(layout.pages).toHaveLength(1);
  });

  test('writes one PDF page per layout page', async () => {
    const cases = [
      { window: WEEK, rowsPerPage: 28, firstPageRows: undefined, pages: 1 },
      { window: { start: '2024-01-01', end: '2024-01-13' }, rowsPerPage: 28, firstPageRows: 15, pages: 2 },
      { window: { start: '2024-01-01', end: '2024-02-29' }, rowsPerPage: 40, firstPageRows: undefined, pages: 3 },
    ];

    for (const c of cases) {
      const { pdf, layout } = await assemble(await tinyPng(), aggregate([], c.window, TZ), {
        subject: 'Ayu',
        window: c.window,
        generatedAt: new Date('2024-03-01T10:00:00Z'),
        timezone: TZ,
        rowsPerPage: c.rowsPerPage,
        firstPageRows: c.firstPageRows,
        notice: `Insufficient data: no intake logged from ${c.window.start} to ${c.window.end}`,
      });

      expect(layout.pages).toHaveLength(c.pages);
      expect(pdfPageCount(pdf)).toBe(c.pages);
    }
  });

  test('a chart that is not an image is a RenderingFailure', async () => {
    await expect(
      assemble(Buffer.from('not an image'), weekBuckets(), {
        subject: 'Ayu',
        window: WEEK,
        generatedAt: new Date('2024-01-07T10:00:00Z'),
        timezone: TZ,
        rowsPerPage: 28,
      })
    ).rejects.toBeInstanceOf(RenderingFailure);
  });
});
