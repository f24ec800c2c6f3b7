import { InvalidRangeError, UnknownZoneError } from '../core/errors.js';
import { normalizeZone as defaultNormalizeZone, type ZoneNormalizer } from '../ingest/zones.js';
import type { ObservationStore } from '../memory/observations.js';
import type { ObservationRecord } from '../types/index.js';

export const DEFAULT_HISTORY_HOURS = 24;

export interface QueryServiceOptions {
  store: ObservationStore;
  normalizeZone?: ZoneNormalizer;
}

/**
 * Read side for dashboards and the HTTP layer. Zone names are normalized here; a known zone
 * with no rows yields null / [] rather than an error.
 */
export class ObservationQueryService {
  private readonly store: ObservationStore;
  private readonly normalizeZone: ZoneNormalizer;

  constructor(options: QueryServiceOptions) {
    this.store = options.store;
    this.normalizeZone = options.normalizeZone ?? defaultNormalizeZone;
  }

  resolveZone(zone: string): string {
    const canonical = this.normalizeZone(zone);
    if (!canonical) {
      throw new UnknownZoneError(zone);
    }
    return canonical;
  }

  latest(zone: string): ObservationRecord | null {
    return this.store.latest(this.resolveZone(zone));
  }

  /**
   * Without `now`, the window ends at the zone's latest record, so a collector that fell
   * behind still returns its last `hours` of data.
   */
  history(zone: string, hours: number = DEFAULT_HISTORY_HOURS, now?: Date | string): ObservationRecord[] {
    if (!Number.isInteger(hours) || hours < 0) {
      throw new InvalidRangeError(`hours must be a non-negative integer, got ${hours}`);
    }
    const canonical = this.resolveZone(zone);
    if (now !== undefined) {
      return this.store.history(canonical, hours, now);
    }
    const latest = this.store.latest(canonical);
    if (!latest) {
      return [];
    }
    return this.store.history(canonical, hours, latest.timestamp);
  }

  allZones(): string[] {
    return this.store.allZones();
  }
}
