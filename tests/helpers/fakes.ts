// tests/helpers/fakes.ts
// In-memory stand-ins for the Postgres-backed stores.

import { DateTime } from 'luxon';
import { AppConfig } from '../../src/env';
import { SubscriptionStore } from '../../src/services/accessGate';
import { HistoryQuery, RecordStore } from '../../src/services/recordStore';
import { RenderCapabilities } from '../../src/services/renderCapabilities';
import { IntakeCategory, IntakeRecord, SubjectProfile } from '../../src/types/intake';

export const TZ = 'Asia/Jakarta';

/** Local wall-clock time in Asia/Jakarta -> instant. */
export function at(date: string, time = '12:00'): Date {
  return DateTime.fromISO(`${date}T${time}`, { zone: TZ }).toJSDate();
}

export function record(
  category: IntakeCategory,
  date: string,
  quantity: number,
  calorieEstimate: number | null = null,
  time = '12:00'
): IntakeRecord {
  return { timestamp: at(date, time), category, quantity, calorieEstimate };
}

export class FakeRecordStore implements RecordStore {
  readonly queries: Array<{ identity: string; category: IntakeCategory; query: HistoryQuery }> = [];

  constructor(
    private readonly records: Record<string, IntakeRecord[]> = {},
    private readonly profiles: Record<string, SubjectProfile> = {}
  ) {}

  async getHistory(identity: string, category: IntakeCategory, query: HistoryQuery = {}): Promise<IntakeRecord[]> {
    this.queries.push({ identity, category, query });
    return (this.records[identity] ?? []).filter((r) => r.category === category);
  }

  async getSubjectProfile(identity: string): Promise<SubjectProfile | null> {
    return this.profiles[identity] ?? null;
  }
}

export class FakeSubscriptionStore implements SubscriptionStore {
  calls = 0;
  failing = false;

  constructor(private readonly premium: Set<string> = new Set()) {}

  async hasFeature(identity: string): Promise<boolean> {
    this.calls += 1;
    if (this.failing) {
      throw new Error('subscription database unreachable');
    }
    return this.premium.has(identity);
  }
}

export const ALL_CAPABILITIES: RenderCapabilities = {
  charts: true,
  pdf: true,
  details: { sharp: 'ok', pdfkit: 'ok' },
};

export function testConfig(exportDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    nodeEnv: 'test',
    allowedOrigins: [],
    databaseUrl: undefined,
    export: {
      rootDir: exportDir,
      baseUrl: 'http://localhost:8000',
      publicPath: '/static',
    },
    reporting: {
      timezone: TZ,
      defaultWindowDays: 7,
      maxWindowDays: 31,
      rowsPerPage: 28,
      asiKcalPerMl: 0.67,
    },
    disabledFeatures: [],
    ...overrides,
  };
}
