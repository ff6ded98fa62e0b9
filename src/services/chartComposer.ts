// src/services/chartComposer.ts
// Chart rendering: ChartSpec -> SVG scene -> PNG (sharp / libvips).
//
// Two layouts:
//   combined - stacked bars on the primary axis, calorie lines on a secondary axis
//   panels   - one single-series line chart per series (growth measurements)

import sharp from 'sharp';
import { ChartSpec, SeriesDef } from '../types/intake';
import { RenderingFailure, ValidationError } from './errors';

export const CHART_COLORS = {
  mpasi: '#74b9ff',
  milk: '#fdcb6e',
  mpasiKcal: '#0984e3',
  milkKcal: '#e17055',
  weight: '#2e86ab',
  height: '#a23b72',
  headCircumference: '#3b8b5a',
} as const;

const FALLBACK_PALETTE = ['#74b9ff', '#fdcb6e', '#0984e3', '#e17055', '#2e86ab', '#a23b72', '#6c5ce7'];

const FONT = 'Helvetica, Arial, sans-serif';
const TEXT = '#2d3436';
const MUTED = '#636e72';
const GRID = '#dfe6e9';
const NOTICE = '#d63031';

const COMBINED = {
  width: 1200,
  height: 800,
  margin: { top: 120, right: 110, bottom: 150, left: 110 },
};

const PANELS = {
  width: 1000,
  header: 110,
  panelHeight: 320,
  footer: 40,
  margin: { left: 100, right: 50 },
};

// ==========================================================================
// Scales
// ==========================================================================

export interface AxisScale {
  min: number;
  max: number;
  step: number;
  ticks: number[];
}

function niceNum(range: number, round: boolean): number {
  const exponent = Math.floor(Math.log10(range));
  const fraction = range / 10 ** exponent;
  let nice: number;
  if (round) {
    nice = fraction < 1.5 ? 1 : fraction < 3 ? 2 : fraction < 7 ? 5 : 10;
  } else {
    nice = fraction <= 1 ? 1 : fraction <= 2 ? 2 : fraction <= 5 ? 5 : 10;
  }
  return nice * 10 ** exponent;
}

/**
 * Axis bounds rounded outwards to 1/2/5 steps.
 */
export function niceScale(min: number, max: number, maxTicks = 6): AxisScale {
  let lo = Math.min(min, max);
  let hi = Math.max(min, max);

  if (hi === lo) {
    if (hi === 0) {
      hi = 1;
    } else {
      const pad = Math.abs(hi) * 0.05;
      lo -= pad;
      hi += pad;
    }
  }

  const range = niceNum(hi - lo, false);
  const step = niceNum(range / (maxTicks - 1), true);
  const niceMin = Math.floor(lo / step) * step;
  const niceMax = Math.ceil(hi / step) * step;

  const ticks: number[] = [];
  const count = Math.round((niceMax - niceMin) / step);
  for (let i = 0; i <= count; i++) {
    ticks.push(Number((niceMin + i * step).toFixed(10)));
  }

  return { min: ticks[0], max: ticks[ticks.length - 1], step, ticks };
}

export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return value.toFixed(Math.abs(value) >= 10 ? 0 : 1);
}

function formatTick(value: number, step: number): string {
  const decimals = step >= 1 ? 0 : Math.min(4, Math.ceil(-Math.log10(step)));
  return value.toFixed(decimals);
}

/** "2024-01-03" -> "01/03" */
export function formatDateLabel(isoDate: string): string {
  const [, month, day] = isoDate.split('-');
  return month && day ? `${month}/${day}` : isoDate;
}

// ==========================================================================
// SVG helpers
// ==========================================================================

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function r(n: number): string {
  return Number(n.toFixed(2)).toString();
}

interface TextOptions {
  size?: number;
  anchor?: 'start' | 'middle' | 'end';
  weight?: 'normal' | 'bold';
  color?: string;
  rotate?: number;
}

function text(x: number, y: number, content: string, opts: TextOptions = {}): string {
  const { size = 14, anchor = 'start', weight = 'normal', color = TEXT, rotate } = opts;
  const transform = rotate ? ` transform="rotate(${rotate} ${r(x)} ${r(y)})"` : '';
  return (
    `<text x="${r(x)}" y="${r(y)}" font-family="${FONT}" font-size="${size}" ` +
    `font-weight="${weight}" fill="${color}" text-anchor="${anchor}"${transform}>` +
    `${escapeXml(content)}</text>`
  );
}

function line(x1: number, y1: number, x2: number, y2: number, color: string, width = 1): string {
  return `<line x1="${r(x1)}" y1="${r(y1)}" x2="${r(x2)}" y2="${r(y2)}" stroke="${color}" stroke-width="${width}"/>`;
}

function marker(x: number, y: number, color: string, shape: 'circle' | 'square'): string {
  if (shape === 'circle') {
    return `<circle cx="${r(x)}" cy="${r(y)}" r="5" fill="${color}" stroke="#ffffff" stroke-width="1.5"/>`;
  }
  return `<rect x="${r(x - 5)}" y="${r(y - 5)}" width="10" height="10" fill="${color}" stroke="#ffffff" stroke-width="1.5"/>`;
}

/**
 * Polylines for a series; null values split the line.
 */
function linePath(points: Array<{ x: number; y: number } | null>, color: string): string {
  const segments: string[][] = [];
  let current: string[] = [];
  for (const p of points) {
    if (p === null) {
      if (current.length) segments.push(current);
      current = [];
      continue;
    }
    current.push(`${r(p.x)},${r(p.y)}`);
  }
  if (current.length) segments.push(current);

  return segments
    .filter((s) => s.length > 1)
    .map((s) => `<polyline points="${s.join(' ')}" fill="none" stroke="${color}" stroke-width="2.5"/>`)
    .join('');
}

function seriesColor(series: SeriesDef, index: number): string {
  return series.color ?? FALLBACK_PALETTE[index % FALLBACK_PALETTE.length];
}

function header(spec: ChartSpec, width: number): string[] {
  const parts = [text(width / 2, 45, spec.title, { size: 26, anchor: 'middle', weight: 'bold' })];
  if (spec.subtitle) {
    parts.push(text(width / 2, 78, spec.subtitle, { size: 16, anchor: 'middle', color: MUTED }));
  }
  if (spec.notice) {
    parts.push(text(width / 2, 104, spec.notice, { size: 16, anchor: 'middle', weight: 'bold', color: NOTICE }));
  }
  return parts;
}

interface LegendItem {
  label: string;
  color: string;
  kind: 'bar' | 'line';
}

function legend(items: LegendItem[], y: number, width: number): string[] {
  const widths = items.map((i) => 34 + i.label.length * 8);
  const total = widths.reduce((a, b) => a + b, 0);
  let x = Math.max(20, (width - total) / 2);

  const parts: string[] = [];
  items.forEach((item, i) => {
    if (item.kind === 'bar') {
      parts.push(`<rect x="${r(x)}" y="${r(y - 12)}" width="16" height="16" fill="${item.color}"/>`);
    } else {
      parts.push(line(x, y - 4, x + 18, y - 4, item.color, 3));
    }
    parts.push(text(x + 24, y + 2, item.label, { size: 14 }));
    x += widths[i];
  });
  return parts;
}

// ==========================================================================
// Validation
// ==========================================================================

export function validateChartSpec(spec: ChartSpec): void {
  const problems: string[] = [];

  if (spec.labels.length === 0) problems.push('chart has no x-axis labels');
  if (spec.series.length === 0) problems.push('chart has no series');

  for (const s of spec.series) {
    if (s.values.length !== spec.labels.length) {
      problems.push(`series "${s.label}" has ${s.values.length} values for ${spec.labels.length} dates`);
    }
    if (s.values.some((v) => v !== null && !Number.isFinite(v))) {
      problems.push(`series "${s.label}" contains a non-finite value`);
    }
    if (spec.layout === 'panels' && (s.renderStyle !== 'line' || s.axis !== 'primary')) {
      problems.push(`series "${s.label}" must be a primary-axis line in the panels layout`);
    }
    if (s.renderStyle === 'stacked_bar' && s.axis !== 'primary') {
      problems.push(`stacked bar series "${s.label}" must use the primary axis`);
    }
    if (s.renderStyle === 'stacked_bar' && s.values.some((v) => v !== null && v < 0)) {
      problems.push(`stacked bar series "${s.label}" contains a negative value`);
    }
  }

  if (problems.length > 0) {
    throw new ValidationError('Invalid chart spec', problems);
  }
}

// ==========================================================================
// Combined layout
// ==========================================================================

function renderCombined(spec: ChartSpec): string {
  const { width, height, margin } = COMBINED;
  const plotW = width - margin.left - margin.right;
  const plotH = height - margin.top - margin.bottom;
  const plotBottom = margin.top + plotH;
  const n = spec.labels.length;
  const band = plotW / n;
  const centerX = (i: number) => margin.left + band * (i + 0.5);

  const bars = spec.series.filter((s) => s.renderStyle === 'stacked_bar');
  const primaryLines = spec.series.filter((s) => s.renderStyle === 'line' && s.axis === 'primary');
  const secondaryLines = spec.series.filter((s) => s.renderStyle === 'line' && s.axis === 'secondary');

  let primaryMax = 0;
  for (let i = 0; i < n; i++) {
    const stacked = bars.reduce((sum, s) => sum + (s.values[i] ?? 0), 0);
    const lineMax = Math.max(0, ...primaryLines.map((s) => s.values[i] ?? 0));
    primaryMax = Math.max(primaryMax, stacked, lineMax);
  }
  const primary = niceScale(0, primaryMax);
  const yPrimary = (v: number) => plotBottom - ((v - primary.min) / (primary.max - primary.min)) * plotH;

  const secondaryMax = Math.max(0, ...secondaryLines.flatMap((s) => s.values.map((v) => v ?? 0)));
  const secondary = niceScale(0, secondaryMax);
  const ySecondary = (v: number) => plotBottom - ((v - secondary.min) / (secondary.max - secondary.min)) * plotH;

  const parts: string[] = [
    `<rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff"/>`,
    ...header(spec, width),
  ];

  // Grid + primary axis
  for (const tick of primary.ticks) {
    const y = yPrimary(tick);
    parts.push(line(margin.left, y, margin.left + plotW, y, GRID));
    parts.push(text(margin.left - 10, y + 5, formatTick(tick, primary.step), { size: 13, anchor: 'end', color: MUTED }));
  }
  parts.push(line(margin.left, margin.top, margin.left, plotBottom, TEXT, 1.5));
  parts.push(line(margin.left, plotBottom, margin.left + plotW, plotBottom, TEXT, 1.5));
  parts.push(
    text(35, margin.top + plotH / 2, spec.axisTitles.primary, { size: 15, anchor: 'middle', rotate: -90 })
  );

  // Secondary axis
  if (secondaryLines.length > 0) {
    const axisX = margin.left + plotW;
    parts.push(line(axisX, margin.top, axisX, plotBottom, TEXT, 1.5));
    for (const tick of secondary.ticks) {
      const y = ySecondary(tick);
      parts.push(line(axisX, y, axisX + 6, y, TEXT));
      parts.push(text(axisX + 10, y + 5, formatTick(tick, secondary.step), { size: 13, color: '#d63031' }));
    }
    parts.push(
      text(width - 30, margin.top + plotH / 2, spec.axisTitles.secondary ?? 'Calories', {
        size: 15,
        anchor: 'middle',
        rotate: 90,
        color: '#d63031',
      })
    );
  }

  // Stacked bars
  const barW = band * 0.6;
  for (let i = 0; i < n; i++) {
    let base = 0;
    bars.forEach((s) => {
      const value = s.values[i] ?? 0;
      if (value <= 0) return;
      const yTop = yPrimary(base + value);
      const h = yPrimary(base) - yTop;
      const color = seriesColor(s, spec.series.indexOf(s));
      parts.push(
        `<rect x="${r(centerX(i) - barW / 2)}" y="${r(yTop)}" width="${r(barW)}" height="${r(h)}" ` +
          `fill="${color}" fill-opacity="0.85"/>`
      );
      if (h >= 18) {
        parts.push(text(centerX(i), yTop + h / 2 + 5, formatNumber(value), { size: 12, anchor: 'middle', weight: 'bold' }));
      }
      base += value;
    });
  }

  // Lines
  const lines = [...primaryLines, ...secondaryLines];
  lines.forEach((s, li) => {
    const scale = s.axis === 'secondary' ? ySecondary : yPrimary;
    const color = seriesColor(s, spec.series.indexOf(s));
    const points = s.values.map((v, i) => (v === null ? null : { x: centerX(i), y: scale(v) }));
    parts.push(linePath(points, color));
    for (const p of points) {
      if (p) parts.push(marker(p.x, p.y, color, li % 2 === 0 ? 'circle' : 'square'));
    }
  });

  // X axis labels: every date of the window
  spec.labels.forEach((label, i) => {
    const x = centerX(i);
    parts.push(line(x, plotBottom, x, plotBottom + 6, TEXT));
    parts.push(text(x + 4, plotBottom + 24, formatDateLabel(label), { size: 13, anchor: 'end', rotate: -45 }));
  });

  parts.push(
    ...legend(
      spec.series.map((s, i): LegendItem => ({
        label: s.label,
        color: seriesColor(s, i),
        kind: s.renderStyle === 'stacked_bar' ? 'bar' : 'line',
      })),
      height - 35,
      width
    )
  );

  return wrap(width, height, parts);
}

// ==========================================================================
// Panels layout
// ==========================================================================

function renderPanels(spec: ChartSpec): string {
  const { width, header: headerH, panelHeight, footer, margin } = PANELS;
  const height = headerH + spec.series.length * panelHeight + footer;
  const plotW = width - margin.left - margin.right;
  const n = spec.labels.length;
  const band = plotW / n;
  const centerX = (i: number) => margin.left + band * (i + 0.5);

  const parts: string[] = [
    `<rect x="0" y="0" width="${width}" height="${height}" fill="#ffffff"/>`,
    ...header(spec, width),
  ];

  spec.series.forEach((s, si) => {
    const top = headerH + si * panelHeight;
    const plotTop = top + 45;
    const plotBottom = top + panelHeight - 75;
    const plotH = plotBottom - plotTop;
    const color = seriesColor(s, si);

    const present = s.values.filter((v): v is number => v !== null);
    const scale = present.length > 0 ? niceScale(Math.min(...present), Math.max(...present), 5) : niceScale(0, 1, 5);
    const y = (v: number) => plotBottom - ((v - scale.min) / (scale.max - scale.min)) * plotH;

    const unit = s.unit ? ` (${s.unit})` : '';
    parts.push(text(margin.left, top + 25, `${s.label}${unit}`, { size: 18, weight: 'bold' }));

    for (const tick of scale.ticks) {
      parts.push(line(margin.left, y(tick), margin.left + plotW, y(tick), GRID));
      parts.push(text(margin.left - 10, y(tick) + 5, formatTick(tick, scale.step), { size: 13, anchor: 'end', color: MUTED }));
    }
    parts.push(line(margin.left, plotTop, margin.left, plotBottom, TEXT, 1.5));
    parts.push(line(margin.left, plotBottom, margin.left + plotW, plotBottom, TEXT, 1.5));

    const points = s.values.map((v, i) => (v === null ? null : { x: centerX(i), y: y(v) }));
    parts.push(linePath(points, color));
    points.forEach((p, i) => {
      if (!p) return;
      parts.push(marker(p.x, p.y, color, si % 2 === 0 ? 'circle' : 'square'));
      const v = s.values[i];
      if (v !== null) {
        parts.push(text(p.x, p.y - 12, formatNumber(v), { size: 12, anchor: 'middle', color: MUTED }));
      }
    });

    spec.labels.forEach((label, i) => {
      parts.push(text(centerX(i) + 4, plotBottom + 22, formatDateLabel(label), { size: 12, anchor: 'end', rotate: -45 }));
    });
  });

  return wrap(width, height, parts);
}

function wrap(width: number, height: number, parts: string[]): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" ` +
    `viewBox="0 0 ${width} ${height}">${parts.join('')}</svg>`
  );
}

// ==========================================================================
// Public API
// ==========================================================================

/**
 * SVG scene for a chart. Depends only on the spec.
 */
export function renderChartSvg(spec: ChartSpec): string {
  validateChartSpec(spec);
  return spec.layout === 'panels' ? renderPanels(spec) : renderCombined(spec);
}

/**
 * Renders a chart to PNG bytes. Does not write files.
 */
export async function compose(spec: ChartSpec): Promise<Buffer> {
  const svg = renderChartSvg(spec);

  try {
    return await sharp(Buffer.from(svg)).flatten({ background: '#ffffff' }).png().toBuffer();
  } catch (err) {
    throw new RenderingFailure('Chart rasterization failed', err);
  }
}

export type ChartRenderer = typeof compose;
