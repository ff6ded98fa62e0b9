// src/types/intake.ts
// Intake log types shared by the aggregation, chart and report pipeline

export const INTAKE_CATEGORIES = [
  'mpasi',              // Complementary (solid) food, ml
  'milk',               // Breast milk + formula, ml
  'weight',             // kg
  'height',             // cm
  'head_circumference', // cm
  'pump',               // Pumped breast milk, ml
  'bowel',              // Bowel movements, count
] as const;

export type IntakeCategory = (typeof INTAKE_CATEGORIES)[number];

/** Categories drawn as daily volumes on the intake chart and report. */
export const FEEDING_CATEGORIES = ['mpasi', 'milk'] as const satisfies readonly IntakeCategory[];

/** Longitudinal measurements, charted per measurement date rather than per day. */
export const GROWTH_CATEGORIES = ['weight', 'height', 'head_circumference'] as const satisfies readonly IntakeCategory[];

export const CATEGORY_UNITS: Record<IntakeCategory, string> = {
  mpasi: 'ml',
  milk: 'ml',
  weight: 'kg',
  height: 'cm',
  head_circumference: 'cm',
  pump: 'ml',
  bowel: 'x',
};

export const CATEGORY_LABELS: Record<IntakeCategory, string> = {
  mpasi: 'MPASI',
  milk: 'Milk',
  weight: 'Weight',
  height: 'Height',
  head_circumference: 'Head circumference',
  pump: 'Pumping',
  bowel: 'Bowel movements',
};

export interface IntakeRecord {
  readonly timestamp: Date;
  readonly category: IntakeCategory;
  readonly quantity: number;
  readonly calorieEstimate: number | null;
}

export type CategoryTotals = Record<IntakeCategory, number>;

export interface DailyBucket {
  date: string; // yyyy-MM-dd in the reference timezone
  totals: CategoryTotals;
  calorieTotals: CategoryTotals;
}

export interface DateWindow {
  start: string; // yyyy-MM-dd, inclusive
  end: string;   // yyyy-MM-dd, inclusive
}

export interface SubjectProfile {
  name: string | null;
  gender: string | null;
  dateOfBirth: string | null;
}

// ==========================================================================
// Charts
// ==========================================================================

export type RenderStyle = 'stacked_bar' | 'line';
export type ChartAxis = 'primary' | 'secondary';

export interface SeriesDef {
  label: string;
  values: Array<number | null>; // null leaves a gap in a line
  renderStyle: RenderStyle;
  axis: ChartAxis;
  color?: string;
  unit?: string;
}

export type ChartLayout =
  | 'combined'  // Stacked bars + line overlays on a secondary axis
  | 'panels';   // One single-series line panel per series

export interface ChartSpec {
  title: string;
  subtitle?: string;
  labels: string[];
  window: DateWindow;
  series: SeriesDef[];
  layout: ChartLayout;
  axisTitles: {
    primary: string;
    secondary?: string;
  };
  /** Shown under the subtitle, e.g. when every bucket of the window is zero. */
  notice?: string;
}

// ==========================================================================
// Reports
// ==========================================================================

export interface ReportRow {
  date: string;
  quantities: Partial<CategoryTotals>;
  calories: Partial<CategoryTotals>;
  totalCalories: number;
}

export interface ReportSummary {
  totals: Omit<ReportRow, 'date'>;
  averages: Omit<ReportRow, 'date'>;
  windowDays: number;
}

export interface ReportSpec {
  chart: Buffer;
  categories: IntakeCategory[];
  tableRows: ReportRow[];
  summaryRow: ReportSummary;
}

export type CalorieTrend = 'increasing' | 'decreasing' | 'stable' | 'insufficient_data';

export interface WindowStatistics {
  windowDays: number;
  daysWithData: Partial<Record<IntakeCategory, number>>;
  totalCalories: number;
  averageCaloriesPerDay: number;
  calorieTrend: CalorieTrend;
  trendMagnitude: number;
}

// ==========================================================================
// Access + export
// ==========================================================================

export type AccessReason = 'premium_active' | 'free_tier' | 'feature_disabled';

export interface AccessDecision {
  allowed: boolean;
  reason: AccessReason;
}

export type ArtifactKind = 'intake_chart' | 'intake_report' | 'growth_chart';

export interface ArtifactReference {
  fileName: string;
  filePath: string;
  url: string;
}
