import { describe, expect, it } from 'vitest';

import {
  assertValidWeights,
  categorize,
  CATEGORY_THRESHOLDS,
  scoreObservation,
  squash,
} from '../../src/scoring/sentiment.js';
import type { BaselineOutcome } from '../../src/types/index.js';

const priceBaseline: BaselineOutcome = {
  status: 'ok',
  baseline: { center: 50, spread: 10, sampleCount: 168 },
};
const loadBaseline: BaselineOutcome = {
  status: 'ok',
  baseline: { center: 40000, spread: 500, sampleCount: 168 },
};
const insufficient: BaselineOutcome = { status: 'insufficient', sampleCount: 12, required: 24 };

describe('squash', () => {
  it('maps the baseline to exactly 50', () => {
    expect(squash(0)).toBe(50);
    expect(squash(0, 3)).toBe(50);
  });

  it('is symmetric and decreasing', () => {
    for (const z of [0.25, 1, 2.5, 7]) {
      expect(squash(-z) + squash(z)).toBeCloseTo(100, 10);
      expect(squash(-z)).toBeGreaterThan(squash(0));
      expect(squash(z)).toBeLessThan(squash(0));
    }
    expect(squash(1)).toBeGreaterThan(squash(2));
  });

  it('saturates instead of diverging', () => {
    expect(squash(1e6)).toBe(0);
    expect(squash(-1e6)).toBe(100);
    expect(squash(Number.POSITIVE_INFINITY)).toBe(0);
    expect(squash(Number.NEGATIVE_INFINITY)).toBe(100);
    expect(() => squash(Number.NaN)).toThrow();
  });
});

describe('categorize', () => {
  it('applies inclusive lower bounds', () => {
    expect(CATEGORY_THRESHOLDS).toEqual({ green: 70, yellow: 40 });
    expect(categorize(100)).toBe('GREEN');
    expect(categorize(70)).toBe('GREEN');
    expect(categorize(69.999)).toBe('YELLOW');
    expect(categorize(40)).toBe('YELLOW');
    expect(categorize(39.999)).toBe('RED');
    expect(categorize(0)).toBe('RED');
  });
});

describe('scoreObservation', () => {
  it('scores 50 / YELLOW at the baseline', () => {
    const outcome = scoreObservation({ price: 50, load: 40000 }, priceBaseline, loadBaseline);
    expect(outcome).toEqual({
      status: 'scored',
      result: { score: 50, category: 'YELLOW', priceScore: 50, loadScore: 50, priceZ: 0, loadZ: 0 },
    });
  });

  it('is unscorable when either baseline is insufficient', () => {
    expect(scoreObservation({ price: 50, load: 40000 }, insufficient, loadBaseline)).toEqual({
      status: 'unscorable',
      reason: 'price baseline has 12/24 samples',
    });
    expect(scoreObservation({ price: 50, load: 40000 }, priceBaseline, insufficient)).toEqual({
      status: 'unscorable',
      reason: 'load baseline has 12/24 samples',
    });
  });

  it('rewards prices and load below baseline', () => {
    const cheap = scoreObservation({ price: 20, load: 38500 }, priceBaseline, loadBaseline);
    const stressed = scoreObservation({ price: 80, load: 41500 }, priceBaseline, loadBaseline);
    expect(cheap.status === 'scored' && cheap.result.category).toBe('GREEN');
    expect(stressed.status === 'scored' && stressed.result.category).toBe('RED');
    if (cheap.status !== 'scored' || stressed.status !== 'scored') return;
    expect(cheap.result.priceZ).toBe(-3);
    expect(cheap.result.score).toBeCloseTo(100 / (1 + Math.exp(-3)), 10);
    expect(stressed.result.score).toBeCloseTo(100 / (1 + Math.exp(3)), 10);
  });

  it('stays within [0, 100] with a consistent category', () => {
    const zs = [-1e6, -50, -3, -0.5, 0, 0.5, 3, 50, 1e6];
    for (const pz of zs) {
      for (const lz of zs) {
        const outcome = scoreObservation(
          { price: 50 + pz * 10, load: 40000 + lz * 500 },
          priceBaseline,
          loadBaseline
        );
        expect(outcome.status).toBe('scored');
        if (outcome.status !== 'scored') continue;
        const { score, category } = outcome.result;
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
        expect(category).toBe(categorize(score));
      }
    }
  });

  it('applies the configured weights', () => {
    const outcome = scoreObservation({ price: 0, load: 90000 }, priceBaseline, loadBaseline, {
      weights: { price: 1, load: 0 },
    });
    expect(outcome.status === 'scored' && outcome.result.score).toBeCloseTo(100 / (1 + Math.exp(-5)), 10);
  });

  it('rejects weights that do not sum to 1', () => {
    expect(() => assertValidWeights({ price: 0.6, load: 0.6 })).toThrow(/sum to 1/);
    expect(() => assertValidWeights({ price: -0.5, load: 1.5 })).toThrow(/non-negative/);
    expect(() =>
      scoreObservation({ price: 50, load: 40000 }, priceBaseline, loadBaseline, {
        weights: { price: 0.2, load: 0.2 },
      })
    ).toThrow(/sum to 1/);
  });
});
