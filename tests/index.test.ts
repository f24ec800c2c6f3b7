import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { GridSentiment, parseConfig, UnknownZoneError } from '../src/index.js';
import type { RawObservation } from '../src/index.js';

const HOUR = 60 * 60 * 1000;
const BASE = Date.UTC(2024, 2, 1);

const hour = (i: number): string => new Date(BASE + i * HOUR).toISOString();

function rawRow(i: number): RawObservation {
  return { timestamp: hour(i), zoneRaw: 'north central', price: 40 + (i % 3), load: 52000 };
}

describe('GridSentiment', () => {
  let grid: GridSentiment;

  beforeEach(() => {
    grid = new GridSentiment({
      config: parseConfig({
        storage: { dbPath: ':memory:' },
        scoring: { minSamples: 4 },
        zones: { aliases: { 'North Central': 'north' } },
        logging: { level: 'error' },
      }),
    });
  });

  afterEach(() => {
    grid.close();
  });

  it('ingests, scores and serves a batch through configured aliases', () => {
    const report = grid.submit(Array.from({ length: 10 }, (_, i) => rawRow(i)));

    expect(report).toMatchObject({ fetched: 10, inserted: 10, scored: 6, unscorable: 4, rejected: 0 });
    expect(grid.allZones()).toEqual(['NORTH']);
    expect(grid.store.count('NORTH')).toBe(10);

    const latest = grid.latest('NORTH_CENTRAL');
    expect(latest?.timestamp).toBe(hour(9));
    expect(latest?.sentimentScore).not.toBeNull();

    expect(grid.history('north', 3).map((row) => row.timestamp)).toEqual([6, 7, 8, 9].map(hour));
  });

  it('rescores pending rows by zone name', () => {
    grid.submit(Array.from({ length: 10 }, (_, i) => rawRow(i)));

    expect(grid.rescore()).toEqual({ scored: 0, unscorable: 4 });
    expect(grid.rescore(['lz_north'])).toEqual({ scored: 0, unscorable: 4 });
    expect(() => grid.rescore(['MARS'])).toThrow(UnknownZoneError);
  });
});
