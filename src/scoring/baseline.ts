import type { BaselineOutcome, Metric, ObservationRecord } from '../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

export interface BaselineOptions {
  windowHours: number;
  minSamples: number;
  madScale: number;
  /** Lower bound on the spread per metric, in the metric's unit. */
  minSpread: Record<Metric, number>;
}

export const DEFAULT_BASELINE_OPTIONS: BaselineOptions = {
  windowHours: 168,
  minSamples: 24,
  madScale: 1.4826,
  minSpread: { price: 1, load: 100 },
};

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('median of an empty sample');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[mid];
  }
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

export function medianAbsoluteDeviation(values: readonly number[], center = median(values)): number {
  return median(values.map((value) => Math.abs(value - center)));
}

/**
 * Window samples for `metric`: records with asOf - windowHours <= timestamp < asOf and a
 * finite value. The record being scored sits at `asOf` and is never part of its own window.
 */
export function windowSamples(
  history: readonly ObservationRecord[],
  metric: Metric,
  asOf: string,
  windowHours: number
): number[] {
  const end = Date.parse(asOf);
  const start = end - windowHours * HOUR_MS;
  const samples: number[] = [];
  for (const record of history) {
    const ts = Date.parse(record.timestamp);
    if (ts < start || ts >= end) continue;
    const value = record[metric];
    if (Number.isFinite(value)) {
      samples.push(value);
    }
  }
  return samples;
}

/**
 * Robust baseline for `metric` as of the hour `asOf`: median center and MAD-based spread,
 * floored at `minSpread[metric]` so a flat window cannot blow up the z-score.
 */
export function computeBaseline(
  history: readonly ObservationRecord[],
  metric: Metric,
  asOf: string,
  options: Partial<BaselineOptions> = {}
): BaselineOutcome {
  const opts: BaselineOptions = {
    ...DEFAULT_BASELINE_OPTIONS,
    ...options,
    minSpread: { ...DEFAULT_BASELINE_OPTIONS.minSpread, ...options.minSpread },
  };

  const samples = windowSamples(history, metric, asOf, opts.windowHours);
  if (samples.length === 0 || samples.length < opts.minSamples) {
    return { status: 'insufficient', sampleCount: samples.length, required: opts.minSamples };
  }

  const center = median(samples);
  const scaledMad = medianAbsoluteDeviation(samples, center) * opts.madScale;
  const floor = opts.minSpread[metric];

  return {
    status: 'ok',
    baseline: {
      center,
      spread: scaledMad < floor ? floor : scaledMad,
      sampleCount: samples.length,
    },
  };
}
