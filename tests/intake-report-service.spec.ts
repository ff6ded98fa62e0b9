// tests/intake-report-service.spec.ts

import { test, expect } from '@playwright/test';
import sharp from 'sharp';
import { AccessGate } from '../src/services/accessGate';
import { ArtifactExporter, IntakeReportService } from '../src/services/intakeReportService';
import { AssembleOptions, assemble } from '../src/services/reportAssembler';
import { ALL_CAPABILITIES, FakeRecordStore, FakeSubscriptionStore, TZ, record } from './helpers/fakes';

const USER = 'whatsapp:+628111111111';
const NOW = new Date('2024-01-07T05:00:00Z');

const exporter: ArtifactExporter = {
  async export(_artifact, identity, kind) {
    return { fileName: `${kind}.bin`, filePath: `/tmp/${kind}.bin`, url: `http://localhost:8000/static/${identity}` };
  },
};

function serviceWith(records: FakeRecordStore, seen: AssembleOptions[]): IntakeReportService {
  return new IntakeReportService({
    records,
    gate: new AccessGate(new FakeSubscriptionStore(new Set([USER]))),
    exporter,
    capabilities: ALL_CAPABILITIES,
    config: { timezone: TZ, defaultWindowDays: 7, maxWindowDays: 31, rowsPerPage: 28, baseUrl: 'http://localhost:8000' },
    now: () => NOW,
    renderChart: async () => Buffer.from('chart'),
    assembleReport: async (_chart, buckets, options) => {
      seen.push(options);
      return assemble(await blankPng(), buckets, options);
    },
  });
}

function blankPng(): Promise<Buffer> {
  return sharp({ create: { width: 30, height: 20, channels: 3, background: '#ffffff' } }).png().toBuffer();
}

test.describe('IntakeReportService.getIntakeReport', () => {
  test('prints the insufficient-data notice for an empty window', async () => {
    const seen: AssembleOptions[] = [];
    const result = await serviceWith(new FakeRecordStore(), seen).getIntakeReport(USER);

    expect(result.status).toBe('artifact');
    expect(seen.map((o) => o.notice)).toEqual(['Insufficient data: no intake logged from 2024-01-01 to 2024-01-07']);
  });

  test('a window with intake has no notice', async () => {
    const seen: AssembleOptions[] = [];
    const records = new FakeRecordStore({ [USER]: [record('milk', '2024-01-03', 200, 134)] });
    await serviceWith(records, seen).getIntakeReport(USER);

    expect(seen.map((o) => o.notice)).toEqual([undefined]);
  });
});
