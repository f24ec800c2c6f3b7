import type {
  BaselineOutcome,
  ObservationRecord,
  ScoreOutcome,
} from '../types/index.js';
import { categorize } from './categories.js';

export { CATEGORY_THRESHOLDS, categorize } from './categories.js';

export interface SentimentWeights {
  price: number;
  load: number;
}

export interface SentimentOptions {
  weights: SentimentWeights;
  /** Logistic steepness applied to z before squashing. */
  steepness: number;
}

/** Equal weighting of the price and load sub-scores. */
export const DEFAULT_WEIGHTS: SentimentWeights = { price: 0.5, load: 0.5 };

export const DEFAULT_SENTIMENT_OPTIONS: SentimentOptions = {
  weights: DEFAULT_WEIGHTS,
  steepness: 1,
};

const WEIGHT_TOLERANCE = 1e-9;

export function assertValidWeights(weights: SentimentWeights): void {
  const { price, load } = weights;
  if (!Number.isFinite(price) || !Number.isFinite(load) || price < 0 || load < 0) {
    throw new Error(`Sentiment weights must be finite and non-negative (price=${price}, load=${load})`);
  }
  if (Math.abs(price + load - 1) > WEIGHT_TOLERANCE) {
    throw new Error(`Sentiment weights must sum to 1 (price=${price}, load=${load})`);
  }
}

/**
 * Logistic favorability: 50 at z = 0, toward 100 for z far below baseline and toward 0 far
 * above it. squash(-z) = 100 - squash(z). Infinite z saturates at the bounds.
 */
export function squash(z: number, steepness = 1): number {
  if (Number.isNaN(z)) {
    throw new Error('Cannot squash NaN');
  }
  const value = 100 / (1 + Math.exp(steepness * z));
  return Math.min(100, Math.max(0, value));
}

function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

/**
 * Score one observation against its price and load baselines. Pure; the caller persists
 * the outcome.
 */
export function scoreObservation(
  observation: Pick<ObservationRecord, 'price' | 'load'>,
  priceBaseline: BaselineOutcome,
  loadBaseline: BaselineOutcome,
  options: Partial<SentimentOptions> = {}
): ScoreOutcome {
  const weights = options.weights ?? DEFAULT_SENTIMENT_OPTIONS.weights;
  const steepness = options.steepness ?? DEFAULT_SENTIMENT_OPTIONS.steepness;
  assertValidWeights(weights);

  if (priceBaseline.status === 'insufficient') {
    return {
      status: 'unscorable',
      reason: `price baseline has ${priceBaseline.sampleCount}/${priceBaseline.required} samples`,
    };
  }
  if (loadBaseline.status === 'insufficient') {
    return {
      status: 'unscorable',
      reason: `load baseline has ${loadBaseline.sampleCount}/${loadBaseline.required} samples`,
    };
  }

  const priceZ = (observation.price - priceBaseline.baseline.center) / priceBaseline.baseline.spread;
  const loadZ = (observation.load - loadBaseline.baseline.center) / loadBaseline.baseline.spread;
  const priceScore = squash(priceZ, steepness);
  const loadScore = squash(loadZ, steepness);
  const score = clampScore(weights.price * priceScore + weights.load * loadScore);

  return {
    status: 'scored',
    result: {
      score,
      category: categorize(score),
      priceScore,
      loadScore,
      priceZ,
      loadZ,
    },
  };
}
