// src/services/reportAssembler.ts
// Chart + daily buckets -> paginated PDF report (pdfkit)

import PDFDocument from 'pdfkit';
import { DateTime } from 'luxon';
import {
  CATEGORY_LABELS,
  CATEGORY_UNITS,
  DailyBucket,
  DateWindow,
  FEEDING_CATEGORIES,
  IntakeCategory,
  ReportRow,
  ReportSpec,
  ReportSummary,
  WindowStatistics,
} from '../types/intake';
import { assertBucketInvariants, sumCategory, windowLength } from './dateBuckets';
import { RenderingFailure, ValidationError, errMessage } from './errors';

// A4 in PDF points
const PAGE = { width: 595.28, height: 841.89, margin: 50 };
const CONTENT_WIDTH = PAGE.width - PAGE.margin * 2;
const BODY_BOTTOM = PAGE.height - PAGE.margin;
const ROW_HEIGHT = 18;
const DATE_COLUMN_WIDTH = 95;
const CHART_HEIGHT = CONTENT_WIDTH / 1.5;

// Page 1 table starts below the header block, the chart and the table heading
const FIRST_PAGE_TABLE_TOP = 500;

/** Table rows (header row excluded) that fit between `top` and the bottom margin. */
function rowCapacity(top: number): number {
  return Math.floor((BODY_BOTTOM - top - ROW_HEIGHT) / ROW_HEIGHT);
}

export const MAX_FIRST_PAGE_ROWS = rowCapacity(FIRST_PAGE_TABLE_TOP);
export const MAX_ROWS_PER_PAGE = rowCapacity(PAGE.margin);
export const DEFAULT_FIRST_PAGE_ROWS = 12;

const SUMMARY_ROW_COUNT = 2;

// Height of the notes section, in table rows
const NOTES_ROW_COUNT = 5;

const NOTES: ReadonlyArray<[string, string]> = [
  ['MPASI', 'Makanan Pendamping ASI (complementary feeding).'],
  ['Chart', 'Daily quantities as stacked bars, calories as lines.'],
  ['Calories', 'Breast milk is estimated per ml; formula uses the logged calories.'],
  ['Recommendations', 'Consult your pediatrician for appropriate intake levels.'],
];

// ==========================================================================
// Table + statistics
// ==========================================================================

export interface ReportTable {
  rows: ReportRow[];
  summary: ReportSummary;
}

function pick(
  source: Record<IntakeCategory, number>,
  categories: ReadonlyArray<IntakeCategory>
): Partial<Record<IntakeCategory, number>> {
  const out: Partial<Record<IntakeCategory, number>> = {};
  for (const c of categories) out[c] = source[c];
  return out;
}

/**
 * One row per bucket plus column totals and per-day means. Means divide by
 * the full window length, days without records included.
 */
export function buildReportTable(
  buckets: ReadonlyArray<DailyBucket>,
  categories: ReadonlyArray<IntakeCategory> = FEEDING_CATEGORIES
): ReportTable {
  assertBucketInvariants(buckets);

  const rows: ReportRow[] = buckets.map((b) => ({
    date: b.date,
    quantities: pick(b.totals, categories),
    calories: pick(b.calorieTotals, categories),
    totalCalories: categories.reduce((sum, c) => sum + b.calorieTotals[c], 0),
  }));

  const totals: Omit<ReportRow, 'date'> = { quantities: {}, calories: {}, totalCalories: 0 };
  for (const c of categories) {
    totals.quantities[c] = sumCategory(buckets, c);
    totals.calories[c] = sumCategory(buckets, c, 'calorieTotals');
  }
  totals.totalCalories = rows.reduce((sum, r) => sum + r.totalCalories, 0);

  const days = windowLength({ start: buckets[0].date, end: buckets[buckets.length - 1].date });
  const averages: Omit<ReportRow, 'date'> = {
    quantities: {},
    calories: {},
    totalCalories: totals.totalCalories / days,
  };
  for (const c of categories) {
    averages.quantities[c] = (totals.quantities[c] ?? 0) / days;
    averages.calories[c] = (totals.calories[c] ?? 0) / days;
  }

  return { rows, summary: { totals, averages, windowDays: days } };
}

/**
 * Active days per category and a calorie trend comparing the mean of the
 * first half of the window with the second half.
 */
export function summarizeWindow(
  buckets: ReadonlyArray<DailyBucket>,
  categories: ReadonlyArray<IntakeCategory> = FEEDING_CATEGORIES
): WindowStatistics {
  const daily = buckets.map((b) => categories.reduce((sum, c) => sum + b.calorieTotals[c], 0));
  const totalCalories = daily.reduce((a, b) => a + b, 0);

  const daysWithData: Partial<Record<IntakeCategory, number>> = {};
  for (const c of categories) {
    daysWithData[c] = buckets.filter((b) => b.totals[c] > 0).length;
  }

  const stats: WindowStatistics = {
    windowDays: buckets.length,
    daysWithData,
    totalCalories,
    averageCaloriesPerDay: buckets.length > 0 ? totalCalories / buckets.length : 0,
    calorieTrend: 'insufficient_data',
    trendMagnitude: 0,
  };

  if (daily.length < 2) return stats;

  const mid = Math.floor(daily.length / 2);
  const mean = (xs: number[]) => xs.reduce((a, b) => a + b, 0) / xs.length;
  const first = mean(daily.slice(0, mid));
  const second = mean(daily.slice(mid));

  stats.calorieTrend = second > first ? 'increasing' : second < first ? 'decreasing' : 'stable';
  stats.trendMagnitude = Math.abs(second - first);
  return stats;
}

// ==========================================================================
// Pagination
// ==========================================================================

export interface ReportPage {
  rows: ReportRow[];
  includesSummary: boolean;
  includesNotes: boolean;
}

export interface ReportLayout {
  pages: ReportPage[];
}

export interface PaginationOptions {
  firstPageRows: number;
  rowsPerPage: number;
}

/**
 * Splits rows across pages, one PDF page per layout page. The TOTAL and
 * AVERAGE rows always sit on the page holding the last data row; if they do
 * not fit there, trailing rows move to a new page with them. The notes
 * follow the summary, on a page of their own when the summary page is full.
 */
export function layoutReport(rows: ReadonlyArray<ReportRow>, options: PaginationOptions): ReportLayout {
  const { firstPageRows, rowsPerPage } = options;
  if (!Number.isInteger(firstPageRows) || firstPageRows < 1 || firstPageRows > MAX_FIRST_PAGE_ROWS) {
    throw new ValidationError(
      `firstPageRows must be an integer between 1 and ${MAX_FIRST_PAGE_ROWS}, got ${firstPageRows}`
    );
  }
  if (!Number.isInteger(rowsPerPage) || rowsPerPage < SUMMARY_ROW_COUNT + 1 || rowsPerPage > MAX_ROWS_PER_PAGE) {
    throw new ValidationError(
      `rowsPerPage must be an integer between ${SUMMARY_ROW_COUNT + 1} and ${MAX_ROWS_PER_PAGE}, got ${rowsPerPage}`
    );
  }

  const pages: ReportPage[] = [];
  let cursor = 0;
  do {
    const capacity = pages.length === 0 ? firstPageRows : rowsPerPage;
    pages.push({ rows: rows.slice(cursor, cursor + capacity), includesSummary: false, includesNotes: false });
    cursor += capacity;
  } while (cursor < rows.length);

  const last = pages[pages.length - 1];
  const lastCapacity = pages.length === 1 ? firstPageRows : rowsPerPage;
  const overflow = last.rows.length + SUMMARY_ROW_COUNT - lastCapacity;

  let summaryPage = last;
  if (overflow > 0) {
    const moved = Math.min(last.rows.length, Math.max(1, overflow));
    const carried = last.rows.splice(last.rows.length - moved, moved);
    summaryPage = { rows: carried, includesSummary: true, includesNotes: false };
    pages.push(summaryPage);
  } else {
    last.includesSummary = true;
  }

  const room = pages.length === 1 ? MAX_FIRST_PAGE_ROWS : MAX_ROWS_PER_PAGE;
  if (summaryPage.rows.length + SUMMARY_ROW_COUNT + NOTES_ROW_COUNT <= room) {
    summaryPage.includesNotes = true;
  } else {
    pages.push({ rows: [], includesSummary: false, includesNotes: true });
  }

  return { pages };
}

// ==========================================================================
// PDF
// ==========================================================================

export interface AssembleOptions {
  subject: string;
  window: DateWindow;
  generatedAt: Date;
  timezone: string;
  rowsPerPage: number;
  firstPageRows?: number;
  categories?: ReadonlyArray<IntakeCategory>;
  /** Printed under the header, e.g. for a window without any logged intake. */
  notice?: string;
}

export interface AssembledReport {
  pdf: Buffer;
  report: ReportSpec;
  layout: ReportLayout;
}

export function formatQuantity(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}

function columnHeaders(categories: ReadonlyArray<IntakeCategory>): string[] {
  const headers = ['Date'];
  for (const c of categories) {
    headers.push(`${CATEGORY_LABELS[c]} (${CATEGORY_UNITS[c]})`, `${CATEGORY_LABELS[c]} kcal`);
  }
  headers.push('Total kcal');
  return headers;
}

function rowCells(
  label: string,
  row: Omit<ReportRow, 'date'>,
  categories: ReadonlyArray<IntakeCategory>,
  format: (n: number) => string
): string[] {
  const cells = [label];
  for (const c of categories) {
    cells.push(format(row.quantities[c] ?? 0), format(row.calories[c] ?? 0));
  }
  cells.push(format(row.totalCalories));
  return cells;
}

interface RowStyle {
  fill?: string;
  textColor: string;
  font: 'Helvetica' | 'Helvetica-Bold';
}

function drawRow(doc: PDFKit.PDFDocument, y: number, cells: string[], style: RowStyle): number {
  const valueWidth = (CONTENT_WIDTH - DATE_COLUMN_WIDTH) / (cells.length - 1);
  let x = PAGE.margin;

  if (style.fill) {
    doc.rect(PAGE.margin, y, CONTENT_WIDTH, ROW_HEIGHT).fill(style.fill);
  }

  doc.font(style.font).fontSize(9).fillColor(style.textColor);
  cells.forEach((cell, i) => {
    const width = i === 0 ? DATE_COLUMN_WIDTH : valueWidth;
    doc.rect(x, y, width, ROW_HEIGHT).lineWidth(0.5).stroke('#000000');
    doc.text(cell, x + 2, y + 5, { width: width - 4, align: 'center', lineBreak: false });
    x += width;
  });

  return y + ROW_HEIGHT;
}

function drawHeader(doc: PDFKit.PDFDocument, options: AssembleOptions): void {
  const generated = DateTime.fromJSDate(options.generatedAt, { zone: options.timezone }).toFormat(
    'yyyy-MM-dd HH:mm'
  );

  doc.font('Helvetica-Bold').fontSize(18).fillColor('#2c3e50');
  doc.text('MPASI & Milk Intake Report', { align: 'center' });
  doc.moveDown(0.5);

  doc.font('Helvetica').fontSize(10).fillColor('#000000');
  doc.text(`Child: ${options.subject}`);
  doc.text(`Period: ${options.window.start} to ${options.window.end}`);
  doc.text(`Generated: ${generated}`);
  if (options.notice) {
    doc.font('Helvetica-Bold').fillColor('#d63031').text(options.notice);
    doc.font('Helvetica').fillColor('#000000');
  }
  doc.moveDown(0.5);
}

function drawNotes(doc: PDFKit.PDFDocument, stats: WindowStatistics): void {
  doc.x = PAGE.margin;
  doc.moveDown(1);
  doc.font('Helvetica-Bold').fontSize(12).fillColor('#2c3e50').text('Notes');
  doc.moveDown(0.3);

  doc.fontSize(9).fillColor('#000000');
  for (const [label, text] of NOTES) {
    doc.font('Helvetica-Bold').text(`${label}: `, { continued: true });
    doc.font('Helvetica').text(text);
  }
  doc
    .font('Helvetica-Bold')
    .text('Calorie trend: ', { continued: true })
    .font('Helvetica')
    .text(
      stats.calorieTrend === 'insufficient_data'
        ? 'not enough days to compare.'
        : `${stats.calorieTrend} (${formatQuantity(Math.round(stats.trendMagnitude * 10) / 10)} kcal/day between window halves).`
    );
}

function renderPdf(
  chart: Buffer,
  table: ReportTable,
  layout: ReportLayout,
  stats: WindowStatistics,
  categories: ReadonlyArray<IntakeCategory>,
  options: AssembleOptions
): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({
      size: 'A4',
      margin: PAGE.margin,
      info: {
        Title: `MPASI & Milk Intake Report - ${options.subject}`,
        CreationDate: options.generatedAt,
      },
    });

    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    drawHeader(doc, options);
    doc.image(chart, PAGE.margin, doc.y, { fit: [CONTENT_WIDTH, CHART_HEIGHT], align: 'center' });

    doc.font('Helvetica-Bold').fontSize(12).fillColor('#2c3e50');
    doc.text('Summary Table', PAGE.margin, FIRST_PAGE_TABLE_TOP - 20);
    doc.y = FIRST_PAGE_TABLE_TOP;

    const headers = columnHeaders(categories);
    const plain: RowStyle = { textColor: '#000000', font: 'Helvetica' };

    layout.pages.forEach((page, index) => {
      if (index > 0) doc.addPage();

      if (page.rows.length === 0 && !page.includesSummary) {
        if (page.includesNotes) drawNotes(doc, stats);
        return;
      }

      let y = drawRow(doc, doc.y, headers, { fill: '#808080', textColor: '#f5f5f5', font: 'Helvetica-Bold' });
      for (const row of page.rows) {
        y = drawRow(doc, y, rowCells(row.date, row, categories, formatQuantity), plain);
      }

      if (page.includesSummary) {
        const { totals, averages } = table.summary;
        y = drawRow(doc, y, rowCells('TOTAL', totals, categories, formatQuantity), {
          fill: '#add8e6',
          textColor: '#000000',
          font: 'Helvetica-Bold',
        });
        y = drawRow(doc, y, rowCells('AVERAGE', averages, categories, (n) => n.toFixed(1)), {
          fill: '#90ee90',
          textColor: '#000000',
          font: 'Helvetica-Bold',
        });
      }
      doc.y = y;
      if (page.includesNotes) drawNotes(doc, stats);
    });

    doc.end();
  });
}

/**
 * Builds the report table, lays it out and writes the PDF. The chart PNG goes
 * above the table on the first page.
 */
export async function assemble(
  chart: Buffer,
  buckets: ReadonlyArray<DailyBucket>,
  options: AssembleOptions
): Promise<AssembledReport> {
  const categories = options.categories ?? FEEDING_CATEGORIES;
  const table = buildReportTable(buckets, categories);
  const stats = summarizeWindow(buckets, categories);
  const layout = layoutReport(table.rows, {
    firstPageRows: options.firstPageRows ?? DEFAULT_FIRST_PAGE_ROWS,
    rowsPerPage: options.rowsPerPage,
  });

  const report: ReportSpec = {
    chart,
    categories: [...categories],
    tableRows: table.rows,
    summaryRow: table.summary,
  };

  try {
    const pdf = await renderPdf(chart, table, layout, stats, categories, options);
    return { pdf, report, layout };
  } catch (err) {
    console.error('[ReportAssembler] PDF generation failed:', errMessage(err));
    throw new RenderingFailure('Could not generate the PDF report', err);
  }
}
