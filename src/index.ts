/**
 * grid-sentiment - hourly electricity market sentiment
 *
 * Main entry point for the grid-sentiment library.
 */

import { loadConfig, type AppConfig } from './core/config.js';
import { Logger } from './core/logger.js';
import { createZoneNormalizer } from './ingest/zones.js';
import { ObservationStore } from './memory/observations.js';
import { ObservationQueryService } from './query/service.js';
import { ScoringPipeline, type ScoringSummary, type SubmitOptions } from './scoring/pipeline.js';
import type { ObservationRecord, PipelineReport } from './types/index.js';

// Re-export types
export * from './types/index.js';

export { loadConfig, parseConfig, type AppConfig, type ScoringConfig } from './core/config.js';
export { Logger, type LogLevel } from './core/logger.js';
export { InvalidRangeError, StorageCorruptError, UnknownZoneError } from './core/errors.js';
export { CANONICAL_ZONES, createZoneNormalizer, normalizeZone, type ZoneNormalizer } from './ingest/zones.js';
export { normalizeBatch, selectLookback } from './ingest/normalize.js';
export { openDatabase } from './memory/db.js';
export { ObservationStore, resolveWrite } from './memory/observations.js';
export { computeBaseline, median, medianAbsoluteDeviation } from './scoring/baseline.js';
export {
  CATEGORY_THRESHOLDS,
  DEFAULT_WEIGHTS,
  categorize,
  scoreObservation,
  squash,
} from './scoring/sentiment.js';
export { ScoringPipeline } from './scoring/pipeline.js';
export { ObservationQueryService } from './query/service.js';

// Version
export const VERSION = '0.1.0';

export interface GridSentimentOptions {
  configPath?: string;
  config?: AppConfig;
  logger?: Logger;
}

/**
 * One store handle plus the pipeline and query service built on it.
 *
 * @example
 * ```typescript
 * import { GridSentiment } from 'grid-sentiment';
 *
 * const grid = new GridSentiment({ configPath: '~/.grid-sentiment/config.yaml' });
 *
 * const report = grid.submit([
 *   { timestamp: '2024-03-01T05:00:00Z', zoneRaw: 'LZ_NORTH', price: 31.2, load: 41250 },
 * ]);
 *
 * const latest = grid.latest('north');
 * grid.close();
 * ```
 */
export class GridSentiment {
  readonly config: AppConfig;
  readonly store: ObservationStore;
  readonly pipeline: ScoringPipeline;
  readonly query: ObservationQueryService;
  private readonly logger: Logger;

  constructor(options: GridSentimentOptions = {}) {
    this.config = options.config ?? loadConfig(options.configPath);
    this.logger = options.logger ?? new Logger(this.config.logging.level);

    const normalizeZone = createZoneNormalizer(this.config.zones.aliases);
    this.store = ObservationStore.open(this.config.storage.dbPath, {
      maxHistoryHours: this.config.query.maxHistoryHours,
      logger: this.logger.child('store'),
    });
    this.pipeline = new ScoringPipeline({
      store: this.store,
      normalizeZone,
      scoring: this.config.scoring,
      logger: this.logger.child('pipeline'),
    });
    this.query = new ObservationQueryService({ store: this.store, normalizeZone });
  }

  submit(raw: readonly unknown[], options: SubmitOptions = {}): PipelineReport {
    return this.pipeline.submit(raw, options);
  }

  rescore(zones?: readonly string[]): ScoringSummary {
    return this.pipeline.rescorePending(zones?.map((zone) => this.query.resolveZone(zone)));
  }

  latest(zone: string): ObservationRecord | null {
    return this.query.latest(zone);
  }

  history(zone: string, hours?: number, now?: Date | string): ObservationRecord[] {
    return this.query.history(zone, hours, now);
  }

  allZones(): string[] {
    return this.query.allZones();
  }

  close(): void {
    this.store.close();
  }
}
