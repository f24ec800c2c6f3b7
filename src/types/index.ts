/**
 * Core type definitions for grid-sentiment
 */

// ============================================================================
// Observation Types
// ============================================================================

export type SentimentCategory = 'GREEN' | 'YELLOW' | 'RED';

export type Metric = 'price' | 'load';

export interface ObservationRecord {
  /** UTC ISO-8601 instant floored to the hour, e.g. `2024-03-01T05:00:00.000Z`. */
  timestamp: string;
  /** Canonical zone key. */
  zone: string;
  price: number;
  load: number;
  sentimentScore: number | null;
  sentimentCategory: SentimentCategory | null;
}

export interface ObservationKey {
  timestamp: string;
  zone: string;
}

/**
 * A row as handed over by the fetch collaborator, before zone normalization.
 * String timestamps must carry an explicit offset.
 */
export interface RawObservation {
  timestamp: string | Date;
  zoneRaw: string;
  price: number;
  load: number;
}

// ============================================================================
// Store Types
// ============================================================================

export interface AppendResult {
  inserted: number;
  replaced: number;
  skipped: number;
  written: ObservationKey[];
}

// ============================================================================
// Scoring Types
// ============================================================================

export interface Baseline {
  center: number;
  spread: number;
  sampleCount: number;
}

export type BaselineOutcome =
  | { status: 'ok'; baseline: Baseline }
  | { status: 'insufficient'; sampleCount: number; required: number };

export interface ScoredResult {
  score: number;
  category: SentimentCategory;
  priceScore: number;
  loadScore: number;
  priceZ: number;
  loadZ: number;
}

export type ScoreOutcome =
  | { status: 'scored'; result: ScoredResult }
  | { status: 'unscorable'; reason: string };

// ============================================================================
// Pipeline Types
// ============================================================================

export type RejectionReason = 'unknown_zone' | 'invalid';

export interface Rejection {
  /** Position of the row in the submitted batch. */
  index: number;
  zoneRaw: string | null;
  reason: RejectionReason;
  message: string;
}

export interface PipelineReport {
  fetched: number;
  /** Records left after normalization, per-hour aggregation and the lookback cut. */
  accepted: number;
  /** Records older than the lookback window relative to the newest record in the batch. */
  outsideLookback: number;
  inserted: number;
  duplicated: number;
  replaced: number;
  scored: number;
  unscorable: number;
  rejected: number;
  invalid: number;
  rejections: Rejection[];
}
