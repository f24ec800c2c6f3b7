import { Logger } from '../core/logger.js';
import { HOUR_MS, normalizeBatch, selectLookback } from '../ingest/normalize.js';
import { normalizeZone as defaultNormalizeZone, type ZoneNormalizer } from '../ingest/zones.js';
import type { ObservationStore } from '../memory/observations.js';
import type { ObservationRecord, PipelineReport, ScoreOutcome } from '../types/index.js';
import { computeBaseline, DEFAULT_BASELINE_OPTIONS, type BaselineOptions } from './baseline.js';
import {
  assertValidWeights,
  DEFAULT_SENTIMENT_OPTIONS,
  scoreObservation,
  type SentimentOptions,
} from './sentiment.js';

export type ScoringSettings = BaselineOptions & SentimentOptions;

export const DEFAULT_SCORING_SETTINGS: ScoringSettings = {
  ...DEFAULT_BASELINE_OPTIONS,
  ...DEFAULT_SENTIMENT_OPTIONS,
};

export interface ScoringPipelineOptions {
  store: ObservationStore;
  normalizeZone?: ZoneNormalizer;
  scoring?: Partial<ScoringSettings>;
  logger?: Logger;
}

export interface SubmitOptions {
  /** Drop records older than this many hours before the newest record of the batch. */
  lookbackHours?: number;
}

export interface ScoringSummary {
  scored: number;
  unscorable: number;
}

/**
 * Batch update: normalize raw rows, append them, then score every row still waiting for a
 * score in the zones the batch touched. Re-running with the same input changes nothing.
 */
export class ScoringPipeline {
  private readonly store: ObservationStore;
  private readonly normalizeZone: ZoneNormalizer;
  private readonly settings: ScoringSettings;
  private readonly logger: Logger;

  constructor(options: ScoringPipelineOptions) {
    this.store = options.store;
    this.normalizeZone = options.normalizeZone ?? defaultNormalizeZone;
    this.settings = {
      ...DEFAULT_SCORING_SETTINGS,
      ...options.scoring,
      minSpread: { ...DEFAULT_SCORING_SETTINGS.minSpread, ...options.scoring?.minSpread },
    };
    this.logger = options.logger ?? new Logger('info');
    assertValidWeights(this.settings.weights);
  }

  submit(raw: readonly unknown[], options: SubmitOptions = {}): PipelineReport {
    this.logger.info(`Submitting ${raw.length} raw observation(s)`);

    const { records, rejections } = normalizeBatch(raw, this.normalizeZone);
    for (const rejection of rejections) {
      this.logger.warn(`Rejected row ${rejection.index} (${rejection.reason}): ${rejection.message}`);
    }

    let accepted = records;
    let outsideLookback = 0;
    if (options.lookbackHours !== undefined) {
      const selected = selectLookback(records, options.lookbackHours);
      accepted = selected.kept;
      outsideLookback = selected.dropped;
    }

    const appended = this.store.append(accepted);
    this.logger.info(
      `Stored ${appended.inserted} new, ${appended.replaced} replaced, ${appended.skipped} duplicate row(s)`
    );

    const zones = Array.from(new Set(accepted.map((record) => record.zone))).sort();
    const summary = this.scorePending(zones);

    return {
      fetched: raw.length,
      accepted: accepted.length,
      outsideLookback,
      inserted: appended.inserted,
      duplicated: appended.skipped,
      replaced: appended.replaced,
      scored: summary.scored,
      unscorable: summary.unscorable,
      rejected: rejections.filter((rejection) => rejection.reason === 'unknown_zone').length,
      invalid: rejections.filter((rejection) => rejection.reason === 'invalid').length,
      rejections,
    };
  }

  /** Retry every unscored row, across all zones unless a subset is given. */
  rescorePending(zones: readonly string[] = this.store.allZones()): ScoringSummary {
    return this.scorePending(zones);
  }

  scoreRecord(record: ObservationRecord, history: readonly ObservationRecord[]): ScoreOutcome {
    const priceBaseline = computeBaseline(history, 'price', record.timestamp, this.settings);
    const loadBaseline = computeBaseline(history, 'load', record.timestamp, this.settings);
    return scoreObservation(record, priceBaseline, loadBaseline, this.settings);
  }

  private scorePending(zones: readonly string[]): ScoringSummary {
    const summary: ScoringSummary = { scored: 0, unscorable: 0 };

    for (const zone of zones) {
      const pending = this.store.listUnscored(zone);
      const updates: ObservationRecord[] = [];

      for (const record of pending) {
        const from = new Date(Date.parse(record.timestamp) - this.settings.windowHours * HOUR_MS).toISOString();
        const history = this.store.range(zone, from, record.timestamp);
        const outcome = this.scoreRecord(record, history);
        if (outcome.status === 'scored') {
          updates.push({
            ...record,
            sentimentScore: outcome.result.score,
            sentimentCategory: outcome.result.category,
          });
          summary.scored += 1;
        } else {
          summary.unscorable += 1;
          this.logger.debug(`${zone} @ ${record.timestamp} left pending: ${outcome.reason}`);
        }
      }

      if (updates.length > 0) {
        this.store.append(updates);
      }
      this.logger.info(`${zone}: scored ${updates.length} of ${pending.length} pending row(s)`);
    }

    return summary;
  }
}
