// src/services/recordStore.ts
// Read side of the feeding / growth logs. Rows are mapped to IntakeRecords here
// and nowhere else.

import { Pool, QueryResultRow } from 'pg';
import { DateTime } from 'luxon';
import { IntakeCategory, IntakeRecord, SubjectProfile } from '../types/intake';
import { ValidationError } from './errors';

export interface HistoryQuery {
  /** Most recent N records. */
  limit?: number;
  /** yyyy-MM-dd, inclusive lower bound on the logged date. */
  since?: string;
}

export interface RecordStore {
  getHistory(identity: string, category: IntakeCategory, query?: HistoryQuery): Promise<IntakeRecord[]>;
  getSubjectProfile(identity: string): Promise<SubjectProfile | null>;
}

// ==========================================================================
// Row shapes (dates and times selected as text, numerics may arrive as strings)
// ==========================================================================

type Numeric = number | string;

export type MpasiRow = {
  date: string;
  time: string | null;
  volume_ml: Numeric | null;
  est_calories: Numeric | null;
};

export type MilkRow = {
  date: string;
  time: string | null;
  volume_ml: Numeric | null;
  milk_type: string;
  sufor_calorie: Numeric | null;
};

export type GrowthRow = {
  date: string;
  weight_kg: Numeric | null;
  height_cm: Numeric | null;
  head_circum_cm: Numeric | null;
};

export type PumpRow = {
  date: string;
  time: string | null;
  left_ml: Numeric | null;
  right_ml: Numeric | null;
};

export type PoopRow = {
  date: string;
  time: string | null;
};

export type ChildRow = {
  name: string | null;
  gender: string | null;
  dob: string | null;
};

function toNumber(value: Numeric | null): number | null {
  if (value === null) return null;
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Local date + optional HH:mm in the reference timezone -> instant.
 * Rows without a time are placed at local midnight.
 */
export function localTimestamp(date: string, time: string | null, timezone: string): Date {
  const clock = time ? time.slice(0, 5) : '00:00';
  const dt = DateTime.fromISO(`${date}T${clock}`, { zone: timezone });
  if (!dt.isValid) {
    throw new ValidationError(`Unreadable log timestamp "${date} ${time ?? ''}"`.trim());
  }
  return dt.toJSDate();
}

export function mapMpasiRow(row: MpasiRow, timezone: string): IntakeRecord {
  return {
    timestamp: localTimestamp(row.date, row.time, timezone),
    category: 'mpasi',
    quantity: toNumber(row.volume_ml) ?? 0,
    calorieEstimate: toNumber(row.est_calories),
  };
}

/**
 * Breast milk (asi) calories are estimated per ml; formula (sufor) carries
 * the calories logged with it. Mixed feeds use the logged value when there
 * is one.
 */
export function mapMilkRow(row: MilkRow, timezone: string, asiKcalPerMl: number): IntakeRecord {
  const volume = toNumber(row.volume_ml) ?? 0;
  const logged = toNumber(row.sufor_calorie);

  let calories: number | null;
  switch (row.milk_type) {
    case 'asi':
      calories = volume * asiKcalPerMl;
      break;
    case 'sufor':
      calories = logged;
      break;
    default:
      calories = logged ?? volume * asiKcalPerMl;
  }

  return {
    timestamp: localTimestamp(row.date, row.time, timezone),
    category: 'milk',
    quantity: volume,
    calorieEstimate: calories,
  };
}

const GROWTH_COLUMNS = {
  weight: 'weight_kg',
  height: 'height_cm',
  head_circumference: 'head_circum_cm',
} as const;

export type GrowthCategory = keyof typeof GROWTH_COLUMNS;

/** A measurement row only yields a record for the columns it has. */
export function mapGrowthRow(row: GrowthRow, category: GrowthCategory, timezone: string): IntakeRecord | null {
  const value = toNumber(row[GROWTH_COLUMNS[category]]);
  if (value === null) return null;
  return {
    timestamp: localTimestamp(row.date, null, timezone),
    category,
    quantity: value,
    calorieEstimate: null,
  };
}

export function mapPumpRow(row: PumpRow, timezone: string): IntakeRecord {
  return {
    timestamp: localTimestamp(row.date, row.time, timezone),
    category: 'pump',
    quantity: (toNumber(row.left_ml) ?? 0) + (toNumber(row.right_ml) ?? 0),
    calorieEstimate: null,
  };
}

export function mapPoopRow(row: PoopRow, timezone: string): IntakeRecord {
  return {
    timestamp: localTimestamp(row.date, row.time, timezone),
    category: 'bowel',
    quantity: 1,
    calorieEstimate: null,
  };
}

// ==========================================================================
// Postgres
// ==========================================================================

export interface PgRecordStoreOptions {
  timezone: string;
  /** Used when the user has no calorie_setting row. */
  asiKcalPerMl: number;
}

const DATE_TEXT = `to_char(date, 'YYYY-MM-DD') AS date`;
const TIME_TEXT = `to_char(time, 'HH24:MI') AS time`;

export class PgRecordStore implements RecordStore {
  constructor(
    private readonly pool: Pool,
    private readonly options: PgRecordStoreOptions
  ) {}

  async getHistory(identity: string, category: IntakeCategory, query: HistoryQuery = {}): Promise<IntakeRecord[]> {
    const tz = this.options.timezone;

    switch (category) {
      case 'mpasi': {
        const rows = await this.select<MpasiRow>(
          'mpasi_log',
          `${DATE_TEXT}, ${TIME_TEXT}, volume_ml, est_calories`,
          identity,
          query
        );
        return rows.map((r) => mapMpasiRow(r, tz));
      }
      case 'milk': {
        const [rows, asiKcal] = await Promise.all([
          this.select<MilkRow>(
            'milk_intake_log',
            `${DATE_TEXT}, ${TIME_TEXT}, volume_ml, milk_type, sufor_calorie`,
            identity,
            query
          ),
          this.getAsiKcalPerMl(identity),
        ]);
        return rows.map((r) => mapMilkRow(r, tz, asiKcal));
      }
      case 'weight':
      case 'height':
      case 'head_circumference': {
        const rows = await this.select<GrowthRow>(
          'timbang_log',
          `${DATE_TEXT}, weight_kg, height_cm, head_circum_cm`,
          identity,
          query,
          'date DESC, created_at DESC'
        );
        return rows
          .map((r) => mapGrowthRow(r, category, tz))
          .filter((r): r is IntakeRecord => r !== null);
      }
      case 'pump': {
        const rows = await this.select<PumpRow>(
          'pumping_log',
          `${DATE_TEXT}, ${TIME_TEXT}, left_ml, right_ml`,
          identity,
          query
        );
        return rows.map((r) => mapPumpRow(r, tz));
      }
      case 'bowel': {
        const rows = await this.select<PoopRow>('poop_log', `${DATE_TEXT}, ${TIME_TEXT}`, identity, query);
        return rows.map((r) => mapPoopRow(r, tz));
      }
    }
  }

  async getSubjectProfile(identity: string): Promise<SubjectProfile | null> {
    const result = await this.pool.query<ChildRow>(
      `SELECT name, gender, to_char(dob, 'YYYY-MM-DD') AS dob
       FROM child
       WHERE user_phone = $1
       ORDER BY created_at DESC
       LIMIT 1`,
      [identity]
    );
    const row = result.rows[0];
    return row ? { name: row.name, gender: row.gender, dateOfBirth: row.dob } : null;
  }

  async getAsiKcalPerMl(identity: string): Promise<number> {
    const result = await this.pool.query<{ asi_kcal: Numeric | null }>(
      'SELECT asi_kcal FROM calorie_setting WHERE user_phone = $1',
      [identity]
    );
    return toNumber(result.rows[0]?.asi_kcal ?? null) ?? this.options.asiKcalPerMl;
  }

  private async select<Row extends QueryResultRow>(
    table: string,
    columns: string,
    identity: string,
    query: HistoryQuery,
    orderBy = 'date DESC, time DESC'
  ): Promise<Row[]> {
    const params: Array<string | number> = [identity];
    let sql = `SELECT ${columns} FROM ${table} WHERE user_phone = $1`;

    if (query.since) {
      params.push(query.since);
      sql += ` AND date >= $${params.length}`;
    }
    sql += ` ORDER BY ${orderBy}`;
    if (query.limit !== undefined) {
      params.push(query.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const result = await this.pool.query<Row>(sql, params);
    return result.rows;
  }
}
