import { DataQualityError } from '../errors.js';
import type { PriceAnalysis, PriceSnapshot, PriceStats, TrendDirection } from '../types.js';

export const DEFAULT_TREND_WINDOW = 5;

const RELATIVE_THRESHOLD = 0.01;
const MIN_THRESHOLD = 0.01;

export function analyzePrice(currentPrice: number, targetPrice: number): PriceAnalysis {
  const difference = currentPrice - targetPrice;
  return {
    belowOrEqual: difference <= 0,
    currentPrice,
    targetPrice,
    difference,
  };
}

export function computeStats(history: readonly PriceSnapshot[]): PriceStats | null {
  if (history.length === 0) return null;

  let min = Infinity;
  let max = -Infinity;
  let total = 0;
  for (const snapshot of history) {
    min = Math.min(min, snapshot.price);
    max = Math.max(max, snapshot.price);
    total += snapshot.price;
  }

  return { min, max, avg: total / history.length, count: history.length };
}

/**
 * Classifies the recent movement of a price.
 *
 * `history` may come in any order; it is sorted by `observed_at`, then `id`.
 * The oldest and newest prices of the last `window` snapshots are compared
 * against a 1% band of the oldest price, never narrower than 0.01.
 */
export function trendDirection(
  history: readonly PriceSnapshot[],
  window: number = DEFAULT_TREND_WINDOW
): TrendDirection {
  const size = window <= 1 ? 2 : window;
  const recent = [...history].sort(newestFirst).slice(0, size);

  const newest = recent[0];
  const oldest = recent[recent.length - 1];
  if (recent.length < 2 || !newest || !oldest) return 'stable';

  const delta = newest.price - oldest.price;
  const threshold = Math.max(Math.abs(oldest.price) * RELATIVE_THRESHOLD, MIN_THRESHOLD);

  if (delta > threshold) return 'up';
  if (delta < -threshold) return 'down';
  return 'stable';
}

function newestFirst(a: PriceSnapshot, b: PriceSnapshot): number {
  if (a.observed_at !== b.observed_at) {
    return a.observed_at < b.observed_at ? 1 : -1;
  }
  return b.id - a.id;
}

/**
 * Accepts finite, non-negative numbers and numeric strings; anything else is
 * a {@link DataQualityError}.
 */
export function coercePrice(value: unknown): number {
  const price =
    typeof value === 'number' ? value
    : typeof value === 'string' && value.trim() !== '' ? Number(value)
    : NaN;

  if (!Number.isFinite(price) || price < 0) {
    throw new DataQualityError(value);
  }
  return price;
}
