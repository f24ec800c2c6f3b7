import { z } from 'zod';

import type { ObservationRecord, Rejection } from '../types/index.js';
import type { ZoneNormalizer } from './zones.js';

export const HOUR_MS = 60 * 60 * 1000;

/** Stored form of an hour: four-digit year, UTC, minutes and below zeroed. */
export const CANONICAL_HOUR = /^\d{4}-\d{2}-\d{2}T\d{2}:00:00\.000Z$/;

// ISO-8601 date-time that carries `Z` or a numeric offset.
const OffsetDateTimeSchema = z.string().datetime({
  offset: true,
  message: 'expected an ISO-8601 instant with an explicit offset',
});

const RawObservationSchema = z
  .object({
    timestamp: z.union([OffsetDateTimeSchema, z.date()]),
    zoneRaw: z.string().optional(),
    // Collector files written by hand tend to say `zone`.
    zone: z.string().optional(),
    price: z.number().finite(),
    load: z.number().finite().nonnegative(),
  })
  .refine((row) => row.zoneRaw !== undefined || row.zone !== undefined, {
    message: 'zoneRaw is required',
    path: ['zoneRaw'],
  });

export interface NormalizedBatch {
  records: ObservationRecord[];
  rejections: Rejection[];
}

export function floorToHour(ms: number): string {
  return new Date(Math.floor(ms / HOUR_MS) * HOUR_MS).toISOString();
}

/**
 * Parse a timestamp into epoch milliseconds. Strings without an explicit offset are refused:
 * a naive wall-clock time cannot be placed on the UTC axis.
 */
export function parseInstant(value: string | Date): number | null {
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isNaN(ms) ? null : ms;
  }
  if (!OffsetDateTimeSchema.safeParse(value).success) {
    return null;
  }
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function extractZoneRaw(value: unknown): string | null {
  if (typeof value !== 'object' || value === null) return null;
  if ('zoneRaw' in value && typeof value.zoneRaw === 'string') return value.zoneRaw;
  if ('zone' in value && typeof value.zone === 'string') return value.zone;
  return null;
}

interface Bucket {
  zone: string;
  timestamp: string;
  priceSum: number;
  loadSum: number;
  rows: Array<{ index: number; zoneRaw: string }>;
}

/**
 * Validate raw rows, canonicalize zones and floor timestamps to the hour. Rows landing in
 * the same (zone, hour) are averaged. Output is sorted by zone, then timestamp.
 */
export function normalizeBatch(raw: readonly unknown[], normalizeZone: ZoneNormalizer): NormalizedBatch {
  const rejections: Rejection[] = [];
  const buckets = new Map<string, Bucket>();

  raw.forEach((value, index) => {
    const parsed = RawObservationSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      rejections.push({
        index,
        zoneRaw: extractZoneRaw(value),
        reason: 'invalid',
        message: issue ? `${issue.path.join('.') || 'row'}: ${issue.message}` : 'invalid row',
      });
      return;
    }

    const row = parsed.data;
    const zoneRaw = row.zoneRaw ?? row.zone ?? '';
    const ms = parseInstant(row.timestamp);
    if (ms === null) {
      rejections.push({
        index,
        zoneRaw,
        reason: 'invalid',
        message: 'timestamp: expected an ISO-8601 instant with an explicit offset',
      });
      return;
    }

    const zone = normalizeZone(zoneRaw);
    if (!zone) {
      rejections.push({
        index,
        zoneRaw,
        reason: 'unknown_zone',
        message: `Unknown zone '${zoneRaw}'`,
      });
      return;
    }

    const timestamp = floorToHour(ms);
    if (!CANONICAL_HOUR.test(timestamp)) {
      rejections.push({
        index,
        zoneRaw,
        reason: 'invalid',
        message: `timestamp: ${timestamp} is outside years 0000-9999`,
      });
      return;
    }

    const key = `${zone}|${timestamp}`;
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.priceSum += row.price;
      bucket.loadSum += row.load;
      bucket.rows.push({ index, zoneRaw });
    } else {
      buckets.set(key, { zone, timestamp, priceSum: row.price, loadSum: row.load, rows: [{ index, zoneRaw }] });
    }
  });

  const records: ObservationRecord[] = [];
  for (const bucket of buckets.values()) {
    const price = bucket.priceSum / bucket.rows.length;
    const load = bucket.loadSum / bucket.rows.length;
    // Sums of near-limit values overflow; every row of the hour is refused together.
    const overflowed = !Number.isFinite(price) ? 'price' : !Number.isFinite(load) ? 'load' : null;
    if (overflowed) {
      for (const { index, zoneRaw } of bucket.rows) {
        rejections.push({
          index,
          zoneRaw,
          reason: 'invalid',
          message: `${overflowed}: hourly average for ${bucket.zone} @ ${bucket.timestamp} is not finite`,
        });
      }
      continue;
    }
    records.push({
      timestamp: bucket.timestamp,
      zone: bucket.zone,
      price,
      load,
      sentimentScore: null,
      sentimentCategory: null,
    });
  }

  rejections.sort((a, b) => a.index - b.index);
  records.sort((a, b) =>
    a.zone === b.zone ? a.timestamp.localeCompare(b.timestamp) : a.zone.localeCompare(b.zone)
  );

  return { records, rejections };
}

/**
 * Keep records within `hours` of the newest record in the batch.
 */
export function selectLookback(
  records: readonly ObservationRecord[],
  hours: number
): { kept: ObservationRecord[]; dropped: number } {
  if (records.length === 0) {
    return { kept: [], dropped: 0 };
  }
  const newest = records.reduce(
    (max, record) => Math.max(max, Date.parse(record.timestamp)),
    Number.NEGATIVE_INFINITY
  );
  const cutoff = newest - hours * HOUR_MS;
  const kept = records.filter((record) => Date.parse(record.timestamp) >= cutoff);
  return { kept, dropped: records.length - kept.length };
}
