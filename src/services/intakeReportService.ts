// src/services/intakeReportService.ts
// Orchestrates: identity -> access gate -> records -> buckets -> chart -> report -> export

import {
  ArtifactKind,
  ArtifactReference,
  DailyBucket,
  DateWindow,
  FEEDING_CATEGORIES,
  GROWTH_CATEGORIES,
  IntakeRecord,
  WindowStatistics,
} from '../types/intake';
import { AccessGate, FeatureKey, upsellMessage } from './accessGate';
import { ChartRenderer, compose } from './chartComposer';
import { buildGrowthChartSpec, buildIntakeChartSpec, insufficientDataNotice } from './chartSpecs';
import { aggregate, hasAnyData, resolveWindow } from './dateBuckets';
import { RenderingFailure, ValidationError } from './errors';
import { ARTIFACT_CONTENT_TYPES } from './fileExporter';
import { normalizeIdentity } from './identity';
import { RecordStore } from './recordStore';
import { RenderCapabilities } from './renderCapabilities';
import { assemble, summarizeWindow } from './reportAssembler';

export const INTAKE_CHART_FEATURE: FeatureKey = 'basic_analytics';
export const REPORT_FEATURE: FeatureKey = 'pdf_reports';
export const GROWTH_CHART_FEATURE: FeatureKey = 'advanced_charts';

export interface ArtifactExporter {
  export(artifact: Buffer, identity: string, kind: ArtifactKind): Promise<ArtifactReference>;
}

export interface ReportingConfig {
  timezone: string;
  defaultWindowDays: number;
  maxWindowDays: number;
  rowsPerPage: number;
  /** Public base URL of this service, used for share links. */
  baseUrl: string;
}

export interface IntakeReportDeps {
  records: RecordStore;
  gate: AccessGate;
  exporter: ArtifactExporter;
  capabilities: RenderCapabilities;
  config: ReportingConfig;
  now?: () => Date;
  renderChart?: ChartRenderer;
  assembleReport?: typeof assemble;
}

export interface ArtifactResult {
  status: 'artifact';
  kind: ArtifactKind;
  contentType: string;
  body: Buffer;
  reference: ArtifactReference;
  window: DateWindow | null;
  /** Every bucket of the window is zero; the artifact is still rendered. */
  insufficientData: boolean;
}

export interface UpsellResult {
  status: 'upsell';
  featureKey: FeatureKey;
  reason: 'free_tier' | 'feature_disabled';
  message: string;
}

export type ReportResult = ArtifactResult | UpsellResult;

export interface ShareLinks {
  identity: string;
  window: DateWindow;
  chartUrl: string | null;
  chartLocked: boolean;
  reportUrl: string | null;
  reportLocked: boolean;
  statistics: WindowStatistics;
  /** Set when nothing was logged in the window. */
  notice: string | null;
  message: string;
}

const DEFAULT_SUBJECT = 'Your child';

export class IntakeReportService {
  private readonly now: () => Date;
  private readonly renderChart: ChartRenderer;
  private readonly assembleReport: typeof assemble;

  constructor(private readonly deps: IntakeReportDeps) {
    this.now = deps.now ?? (() => new Date());
    this.renderChart = deps.renderChart ?? compose;
    this.assembleReport = deps.assembleReport ?? assemble;
  }

  /**
   * Stacked MPASI/milk volumes with calorie lines for the last `days` days.
   */
  async getIntakeChart(rawIdentity: string, days?: number): Promise<ReportResult> {
    const identity = normalizeIdentity(rawIdentity);
    const denied = await this.checkAccess(identity, INTAKE_CHART_FEATURE);
    if (denied) return denied;
    this.requireCapabilities('intake_chart');

    const started = Date.now();
    const { window, buckets, subject } = await this.loadWindow(identity, days);
    const chart = await this.renderChart(buildIntakeChartSpec(buckets, { subject }));
    const reference = await this.deps.exporter.export(chart, identity, 'intake_chart');

    console.log(
      `[IntakeChart] ${identity} ${window.start}..${window.end} rendered in ${Date.now() - started}ms`
    );
    return this.artifact('intake_chart', chart, reference, window, buckets);
  }

  /**
   * PDF report: header, the intake chart, daily table with TOTAL and AVERAGE rows, notes.
   */
  async getIntakeReport(rawIdentity: string, days?: number): Promise<ReportResult> {
    const identity = normalizeIdentity(rawIdentity);
    const denied = await this.checkAccess(identity, REPORT_FEATURE);
    if (denied) return denied;
    this.requireCapabilities('intake_report');

    const started = Date.now();
    const { window, buckets, subject } = await this.loadWindow(identity, days);
    const spec = buildIntakeChartSpec(buckets, { subject });
    const chart = await this.renderChart(spec);
    const { pdf, layout } = await this.assembleReport(chart, buckets, {
      subject,
      window,
      generatedAt: this.now(),
      timezone: this.deps.config.timezone,
      rowsPerPage: this.deps.config.rowsPerPage,
      notice: spec.notice,
    });
    const reference = await this.deps.exporter.export(pdf, identity, 'intake_report');

    console.log(
      `[IntakeReport] ${identity} ${window.start}..${window.end} ` +
        `${layout.pages.length} page(s) in ${Date.now() - started}ms`
    );
    return this.artifact('intake_report', pdf, reference, window, buckets);
  }

  /**
   * Weight, height and head circumference panels over the whole measurement
   * history. Throws DataUnavailable when nothing was measured yet.
   */
  async getGrowthChart(rawIdentity: string): Promise<ReportResult> {
    const identity = normalizeIdentity(rawIdentity);
    const denied = await this.checkAccess(identity, GROWTH_CHART_FEATURE);
    if (denied) return denied;
    this.requireCapabilities('growth_chart');

    const [profile, histories] = await Promise.all([
      this.deps.records.getSubjectProfile(identity),
      Promise.all(GROWTH_CATEGORIES.map((c) => this.deps.records.getHistory(identity, c))),
    ]);
    const records: IntakeRecord[] = histories.flat();

    const spec = buildGrowthChartSpec(records, this.deps.config.timezone, profile?.name ?? DEFAULT_SUBJECT);
    const chart = await this.renderChart(spec);
    const reference = await this.deps.exporter.export(chart, identity, 'growth_chart');

    console.log(`[GrowthChart] ${identity} ${records.length} measurements, ${spec.labels.length} dates`);
    return this.artifact('growth_chart', chart, reference, null, null);
  }

  /**
   * Links to the chart and report endpoints plus the window statistics.
   * A link is withheld when its feature is locked for the user.
   */
  async getShareLinks(rawIdentity: string, days?: number): Promise<ShareLinks> {
    const identity = normalizeIdentity(rawIdentity);
    const { window, buckets } = await this.loadWindow(identity, days);
    const [chart, report] = await Promise.all([
      this.deps.gate.decide(identity, INTAKE_CHART_FEATURE),
      this.deps.gate.decide(identity, REPORT_FEATURE),
    ]);

    const query = days === undefined ? '' : `?days=${days}`;
    const pathId = encodeURIComponent(identity.replace(/^whatsapp:/, ''));
    const base = this.deps.config.baseUrl;
    const chartUrl = chart.allowed ? `${base}/mpasi-milk-graph/${pathId}${query}` : null;
    const reportUrl = report.allowed ? `${base}/report-mpasi-milk/${pathId}${query}` : null;
    const notice = hasAnyData(buckets, FEEDING_CATEGORIES) ? null : insufficientDataNotice(window);

    const lines = [
      'MPASI & Milk Intake',
      '',
      chartUrl ? `Chart: ${chartUrl}` : upsellMessage(INTAKE_CHART_FEATURE),
      reportUrl ? `PDF report: ${reportUrl}` : upsellMessage(REPORT_FEATURE),
      '',
      `Covers ${window.start} to ${window.end}: MPASI volume (ml), milk volume (ml) and estimated calories.`,
      ...(notice ? [`${notice}.`] : []),
      'Share this link with your partner or pediatrician.',
    ];

    return {
      identity,
      window,
      chartUrl,
      chartLocked: !chart.allowed,
      reportUrl,
      reportLocked: !report.allowed,
      statistics: summarizeWindow(buckets),
      notice,
      message: lines.join('\n'),
    };
  }

  private async checkAccess(identity: string, featureKey: FeatureKey): Promise<UpsellResult | null> {
    const decision = await this.deps.gate.decide(identity, featureKey);
    if (decision.allowed) return null;

    console.log(`[AccessGate] ${featureKey} denied for ${identity} (${decision.reason})`);
    return {
      status: 'upsell',
      featureKey,
      reason: decision.reason === 'feature_disabled' ? 'feature_disabled' : 'free_tier',
      message: upsellMessage(featureKey),
    };
  }

  private requireCapabilities(kind: ArtifactKind): void {
    const { charts, pdf, details } = this.deps.capabilities;
    if (!charts) {
      throw new RenderingFailure(`Chart rendering is unavailable: ${details.sharp}`);
    }
    if (kind === 'intake_report' && !pdf) {
      throw new RenderingFailure(`PDF rendering is unavailable: ${details.pdfkit}`);
    }
  }

  private resolveDays(days: number | undefined): number {
    const { defaultWindowDays, maxWindowDays } = this.deps.config;
    const value = days ?? defaultWindowDays;
    if (!Number.isInteger(value) || value < 1 || value > maxWindowDays) {
      throw new ValidationError(`days must be a whole number between 1 and ${maxWindowDays}`);
    }
    return value;
  }

  private async loadWindow(
    identity: string,
    days: number | undefined
  ): Promise<{ window: DateWindow; buckets: DailyBucket[]; subject: string }> {
    const { timezone } = this.deps.config;
    const window = resolveWindow(this.now(), this.resolveDays(days), timezone);

    const [profile, histories] = await Promise.all([
      this.deps.records.getSubjectProfile(identity),
      Promise.all(
        FEEDING_CATEGORIES.map((c) => this.deps.records.getHistory(identity, c, { since: window.start }))
      ),
    ]);

    return {
      window,
      buckets: aggregate(histories.flat(), window, timezone),
      subject: profile?.name ?? DEFAULT_SUBJECT,
    };
  }

  private artifact(
    kind: ArtifactKind,
    body: Buffer,
    reference: ArtifactReference,
    window: DateWindow | null,
    buckets: DailyBucket[] | null
  ): ArtifactResult {
    const insufficientData = buckets !== null && !hasAnyData(buckets, FEEDING_CATEGORIES);
    if (insufficientData) {
      console.log(`[IntakeChart] ${reference.fileName}: no intake logged in window`);
    }
    return {
      status: 'artifact',
      kind,
      contentType: ARTIFACT_CONTENT_TYPES[kind],
      body,
      reference,
      window,
      insufficientData,
    };
  }
}
