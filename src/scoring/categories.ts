import type { SentimentCategory } from '../types/index.js';

/** `score >= green` is GREEN, `yellow <= score < green` is YELLOW, anything lower is RED. */
export const CATEGORY_THRESHOLDS = {
  green: 70,
  yellow: 40,
} as const;

export function categorize(score: number): SentimentCategory {
  if (score >= CATEGORY_THRESHOLDS.green) return 'GREEN';
  if (score >= CATEGORY_THRESHOLDS.yellow) return 'YELLOW';
  return 'RED';
}
