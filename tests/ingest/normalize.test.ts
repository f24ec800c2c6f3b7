import { describe, expect, it } from 'vitest';

import { floorToHour, normalizeBatch, parseInstant, selectLookback } from '../../src/ingest/normalize.js';
import { normalizeZone } from '../../src/ingest/zones.js';
import type { ObservationRecord } from '../../src/types/index.js';

const HOUR = 60 * 60 * 1000;
const BASE = Date.UTC(2024, 2, 1);

describe('ingest/normalize', () => {
  it('floors timestamps to the hour in UTC', () => {
    expect(floorToHour(Date.parse('2024-03-01T05:42:17.250Z'))).toBe('2024-03-01T05:00:00.000Z');
  });

  it('requires an explicit offset on string timestamps', () => {
    expect(parseInstant('2024-03-01T05:00:00')).toBeNull();
    expect(parseInstant('2024-03-01T05:00:00Z')).toBe(Date.parse('2024-03-01T05:00:00.000Z'));
    expect(parseInstant('2024-03-01T00:30:00-06:00')).toBe(Date.parse('2024-03-01T06:30:00.000Z'));
    expect(parseInstant(new Date('invalid'))).toBeNull();
  });

  it('refuses date-only and partial strings that end in something offset-like', () => {
    expect(parseInstant('2024-03-01')).toBeNull();
    expect(parseInstant('2024-03')).toBeNull();
    expect(parseInstant('3-01')).toBeNull();
    expect(parseInstant('2024-03-01T05:00:00+05:30')).toBe(Date.parse('2024-02-29T23:30:00.000Z'));
  });

  it('canonicalizes zones and converts offsets to UTC hours', () => {
    const { records, rejections } = normalizeBatch(
      [
        { timestamp: '2024-03-01T05:42:00Z', zoneRaw: 'LZ_NORTH', price: 30, load: 40000 },
        { timestamp: '2024-03-01T00:30:00-06:00', zoneRaw: 'houston zone', price: -5.5, load: 12000 },
      ],
      normalizeZone
    );

    expect(rejections).toEqual([]);
    expect(records).toEqual([
      {
        timestamp: '2024-03-01T06:00:00.000Z',
        zone: 'HOUSTON',
        price: -5.5,
        load: 12000,
        sentimentScore: null,
        sentimentCategory: null,
      },
      {
        timestamp: '2024-03-01T05:00:00.000Z',
        zone: 'NORTH',
        price: 30,
        load: 40000,
        sentimentScore: null,
        sentimentCategory: null,
      },
    ]);
  });

  it('averages rows that fall into the same zone and hour', () => {
    const { records } = normalizeBatch(
      [
        { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'NORTH', price: 30, load: 100 },
        { timestamp: '2024-03-01T05:30:00Z', zone: 'north', price: 40, load: 200 },
        { timestamp: new Date('2024-03-01T06:15:00Z'), zoneRaw: 'NORTH', price: 50, load: 300 },
      ],
      normalizeZone
    );

    expect(records.map((record) => [record.timestamp, record.price, record.load])).toEqual([
      ['2024-03-01T05:00:00.000Z', 35, 150],
      ['2024-03-01T06:00:00.000Z', 50, 300],
    ]);
  });

  it('reports unknown zones and invalid rows without dropping the rest', () => {
    const { records, rejections } = normalizeBatch(
      [
        { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'MARS', price: 30, load: 100 },
        { timestamp: '2024-03-01T05:00:00', zoneRaw: 'NORTH', price: 30, load: 100 },
        { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'NORTH', price: 30, load: -1 },
        'not a row',
        { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'SOUTH', price: 30, load: 100 },
      ],
      normalizeZone
    );

    expect(records).toHaveLength(1);
    expect(records[0]?.zone).toBe('SOUTH');
    expect(rejections.map((rejection) => [rejection.index, rejection.reason, rejection.zoneRaw])).toEqual([
      [0, 'unknown_zone', 'MARS'],
      [1, 'invalid', 'NORTH'],
      [2, 'invalid', 'NORTH'],
      [3, 'invalid', null],
    ]);
    expect(rejections[0]?.message).toBe("Unknown zone 'MARS'");
  });

  it('rejects date-only timestamps in a batch', () => {
    const { records, rejections } = normalizeBatch(
      [
        { timestamp: '2024-03-01', zoneRaw: 'NORTH', price: 30, load: 100 },
        { timestamp: '3-01', zoneRaw: 'NORTH', price: 30, load: 100 },
      ],
      normalizeZone
    );

    expect(records).toEqual([]);
    expect(rejections.map((rejection) => [rejection.index, rejection.reason])).toEqual([
      [0, 'invalid'],
      [1, 'invalid'],
    ]);
  });

  it('refuses an hour whose average overflows', () => {
    const { records, rejections } = normalizeBatch(
      [
        { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'NORTH', price: 30, load: 100 },
        { timestamp: '2024-03-01T06:00:00Z', zoneRaw: 'SOUTH', price: 1.5e308, load: 100 },
        { timestamp: '2024-03-01T06:20:00Z', zoneRaw: 'LZ_SOUTH', price: 1.5e308, load: 100 },
      ],
      normalizeZone
    );

    expect(records.map((record) => record.zone)).toEqual(['NORTH']);
    expect(rejections).toEqual([
      {
        index: 1,
        zoneRaw: 'SOUTH',
        reason: 'invalid',
        message: 'price: hourly average for SOUTH @ 2024-03-01T06:00:00.000Z is not finite',
      },
      {
        index: 2,
        zoneRaw: 'LZ_SOUTH',
        reason: 'invalid',
        message: 'price: hourly average for SOUTH @ 2024-03-01T06:00:00.000Z is not finite',
      },
    ]);
  });

  it('refuses instants outside four-digit years', () => {
    const { records, rejections } = normalizeBatch(
      [
        { timestamp: new Date(Date.UTC(10000, 0, 1)), zoneRaw: 'NORTH', price: 30, load: 100 },
        { timestamp: '+010000-01-01T00:00:00Z', zoneRaw: 'NORTH', price: 30, load: 100 },
        { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'NORTH', price: 30, load: 100 },
      ],
      normalizeZone
    );

    expect(records.map((record) => record.timestamp)).toEqual(['2024-03-01T05:00:00.000Z']);
    expect(rejections.map((rejection) => [rejection.index, rejection.reason])).toEqual([
      [0, 'invalid'],
      [1, 'invalid'],
    ]);
    expect(rejections[0]?.message).toBe('timestamp: +010000-01-01T00:00:00.000Z is outside years 0000-9999');
  });

  it('keeps only records within the lookback of the newest one', () => {
    const records: ObservationRecord[] = Array.from({ length: 11 }, (_, i) => ({
      timestamp: new Date(BASE + i * HOUR).toISOString(),
      zone: 'NORTH',
      price: 30,
      load: 100,
      sentimentScore: null,
      sentimentCategory: null,
    }));

    const { kept, dropped } = selectLookback(records, 4);
    expect(dropped).toBe(6);
    expect(kept.map((record) => record.timestamp)).toEqual([
      '2024-03-01T06:00:00.000Z',
      '2024-03-01T07:00:00.000Z',
      '2024-03-01T08:00:00.000Z',
      '2024-03-01T09:00:00.000Z',
      '2024-03-01T10:00:00.000Z',
    ]);
    expect(selectLookback([], 4)).toEqual({ kept: [], dropped: 0 });
  });
});
