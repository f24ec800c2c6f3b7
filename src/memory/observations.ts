import type Database from 'better-sqlite3';
import { z } from 'zod';

import { InvalidRangeError, StorageCorruptError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { CANONICAL_HOUR, HOUR_MS } from '../ingest/normalize.js';
import { categorize } from '../scoring/categories.js';
import type { AppendResult, ObservationRecord } from '../types/index.js';
import { openDatabase } from './db.js';

export const DEFAULT_MAX_HISTORY_HOURS = 24 * 14;

const ObservationRowSchema = z.object({
  timestamp: z.string().regex(CANONICAL_HOUR),
  zone: z.string().min(1),
  price: z.number(),
  load: z.number(),
  sentiment_score: z.number().nullable(),
  sentiment_category: z.enum(['GREEN', 'YELLOW', 'RED']).nullable(),
});

const CountSchema = z.object({ count: z.number() });
const ZoneSchema = z.object({ zone: z.string() });

const SELECT_COLUMNS = `timestamp, zone, price, load, sentiment_score, sentiment_category`;

export type WriteAction = 'insert' | 'replace' | 'skip';

export interface ObservationStoreOptions {
  maxHistoryHours?: number;
  logger?: Logger;
}

function sameMeasurements(a: ObservationRecord, b: ObservationRecord): boolean {
  return a.price === b.price && a.load === b.load;
}

/**
 * Decide what an incoming record does to the stored row with the same (timestamp, zone).
 * A raw rewrite of a scored row with unchanged measurements is dropped, so re-submitting a
 * batch never erases scores.
 */
export function resolveWrite(existing: ObservationRecord | null, incoming: ObservationRecord): WriteAction {
  if (!existing) return 'insert';

  const measurementsEqual = sameMeasurements(existing, incoming);
  if (
    measurementsEqual &&
    existing.sentimentScore === incoming.sentimentScore &&
    existing.sentimentCategory === incoming.sentimentCategory
  ) {
    return 'skip';
  }
  if (measurementsEqual && incoming.sentimentScore === null && existing.sentimentScore !== null) {
    return 'skip';
  }
  return 'replace';
}

export function assertValidRecord(record: ObservationRecord): void {
  const label = `${record.zone} @ ${record.timestamp}`;
  if (!record.zone) {
    throw new Error(`Invalid observation ${label}: zone is empty`);
  }
  if (!CANONICAL_HOUR.test(record.timestamp)) {
    throw new Error(`Invalid observation ${label}: timestamp must be a UTC hour (YYYY-MM-DDTHH:00:00.000Z)`);
  }
  if (!Number.isFinite(record.price)) {
    throw new Error(`Invalid observation ${label}: price must be finite`);
  }
  if (!Number.isFinite(record.load) || record.load < 0) {
    throw new Error(`Invalid observation ${label}: load must be a finite non-negative number`);
  }
  if (record.sentimentScore === null) {
    if (record.sentimentCategory !== null) {
      throw new Error(`Invalid observation ${label}: category set without a score`);
    }
    return;
  }
  if (!Number.isFinite(record.sentimentScore) || record.sentimentScore < 0 || record.sentimentScore > 100) {
    throw new Error(`Invalid observation ${label}: score must lie in [0, 100]`);
  }
  if (record.sentimentCategory !== categorize(record.sentimentScore)) {
    throw new Error(`Invalid observation ${label}: category does not match score ${record.sentimentScore}`);
  }
}

function toInstant(value: Date | string): number {
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new InvalidRangeError(`Invalid reference time: ${String(value)}`);
  }
  return ms;
}

/**
 * Append-only, deduplicated table of hourly observations keyed by (timestamp, zone).
 * Every `append` call is one transaction.
 */
export class ObservationStore {
  private readonly maxHistoryHours: number;
  private readonly logger: Logger;
  private readonly selectOne: Database.Statement;
  private readonly upsert: Database.Statement;

  constructor(
    private readonly db: Database.Database,
    options: ObservationStoreOptions = {}
  ) {
    this.maxHistoryHours = options.maxHistoryHours ?? DEFAULT_MAX_HISTORY_HOURS;
    this.logger = options.logger ?? new Logger('info');
    this.selectOne = db.prepare(
      `SELECT ${SELECT_COLUMNS} FROM observations WHERE zone = ? AND timestamp = ?`
    );
    this.upsert = db.prepare(
      `
        INSERT INTO observations (
          timestamp,
          zone,
          price,
          load,
          sentiment_score,
          sentiment_category
        ) VALUES (
          @timestamp,
          @zone,
          @price,
          @load,
          @sentimentScore,
          @sentimentCategory
        )
        ON CONFLICT(zone, timestamp) DO UPDATE SET
          price = excluded.price,
          load = excluded.load,
          sentiment_score = excluded.sentiment_score,
          sentiment_category = excluded.sentiment_category
      `
    );
  }

  static open(dbPath: string, options: ObservationStoreOptions = {}): ObservationStore {
    return new ObservationStore(openDatabase(dbPath), options);
  }

  get path(): string {
    return this.db.name;
  }

  append(records: readonly ObservationRecord[]): AppendResult {
    for (const record of records) {
      assertValidRecord(record);
    }

    const apply = this.db.transaction((batch: readonly ObservationRecord[]): AppendResult => {
      const result: AppendResult = { inserted: 0, replaced: 0, skipped: 0, written: [] };
      for (const record of batch) {
        const existing = this.parseRow(this.selectOne.get(record.zone, record.timestamp));
        const action = resolveWrite(existing, record);
        if (action === 'skip') {
          result.skipped += 1;
          continue;
        }
        this.upsert.run({
          timestamp: record.timestamp,
          zone: record.zone,
          price: record.price,
          load: record.load,
          sentimentScore: record.sentimentScore,
          sentimentCategory: record.sentimentCategory,
        });
        if (action === 'insert') {
          result.inserted += 1;
        } else {
          result.replaced += 1;
        }
        result.written.push({ timestamp: record.timestamp, zone: record.zone });
      }
      return result;
    });

    const result = apply(records);
    this.logger.debug(
      `append: ${result.inserted} inserted, ${result.replaced} replaced, ${result.skipped} skipped`
    );
    return result;
  }

  latest(zone: string): ObservationRecord | null {
    const row = this.db
      .prepare(
        `SELECT ${SELECT_COLUMNS} FROM observations WHERE zone = ? ORDER BY timestamp DESC LIMIT 1`
      )
      .get(zone);
    return this.parseRow(row);
  }

  /**
   * Records with timestamp in [now - hours, now], ascending. `hours` above the cap is
   * clamped; negative or fractional values are refused.
   */
  history(zone: string, hours: number, now: Date | string = new Date()): ObservationRecord[] {
    if (!Number.isInteger(hours) || hours < 0) {
      throw new InvalidRangeError(`hours must be a non-negative integer, got ${hours}`);
    }
    const capped = Math.min(hours, this.maxHistoryHours);
    const nowMs = toInstant(now);
    const from = new Date(nowMs - capped * HOUR_MS).toISOString();
    const to = new Date(nowMs).toISOString();

    const rows = this.db
      .prepare(
        `
          SELECT ${SELECT_COLUMNS}
          FROM observations
          WHERE zone = ? AND timestamp >= ? AND timestamp <= ?
          ORDER BY timestamp ASC
        `
      )
      .all(zone, from, to);
    return this.parseRows(rows);
  }

  /** Half-open scan over [from, to), ascending. */
  range(zone: string, from: string, to: string): ObservationRecord[] {
    const rows = this.db
      .prepare(
        `
          SELECT ${SELECT_COLUMNS}
          FROM observations
          WHERE zone = ? AND timestamp >= ? AND timestamp < ?
          ORDER BY timestamp ASC
        `
      )
      .all(zone, from, to);
    return this.parseRows(rows);
  }

  listUnscored(zone: string): ObservationRecord[] {
    const rows = this.db
      .prepare(
        `
          SELECT ${SELECT_COLUMNS}
          FROM observations
          WHERE zone = ? AND sentiment_score IS NULL
          ORDER BY timestamp ASC
        `
      )
      .all(zone);
    return this.parseRows(rows);
  }

  allZones(): string[] {
    const rows = this.db.prepare('SELECT DISTINCT zone FROM observations ORDER BY zone ASC').all();
    return rows.map((row) => this.parseWith(ZoneSchema, row).zone);
  }

  count(zone?: string): number {
    const row = zone
      ? this.db.prepare('SELECT COUNT(*) AS count FROM observations WHERE zone = ?').get(zone)
      : this.db.prepare('SELECT COUNT(*) AS count FROM observations').get();
    return this.parseWith(CountSchema, row).count;
  }

  close(): void {
    this.db.close();
  }

  private parseRows(rows: unknown[]): ObservationRecord[] {
    const records: ObservationRecord[] = [];
    for (const row of rows) {
      const record = this.parseRow(row);
      if (record) records.push(record);
    }
    return records;
  }

  private parseRow(row: unknown): ObservationRecord | null {
    if (row === undefined) return null;
    const parsed = this.parseWith(ObservationRowSchema, row);
    return {
      timestamp: parsed.timestamp,
      zone: parsed.zone,
      price: parsed.price,
      load: parsed.load,
      sentimentScore: parsed.sentiment_score,
      sentimentCategory: parsed.sentiment_category,
    };
  }

  private parseWith<T>(schema: z.ZodType<T>, row: unknown): T {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new StorageCorruptError(this.path, `malformed row: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }
}
