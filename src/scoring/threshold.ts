/**
 * Band scoring primitives
 * All sub-scores are on a 0-10 scale using the bands 0/2/4/7/10
 */

import type { BandScore, Thresholds } from './types';

/**
 * Score for a metric that is unavailable (stored as 0). Missing data should
 * neither reward nor punish a stock, so it lands mid-scale instead of at 0.
 */
export const NEUTRAL_SCORE = 5;

export function scoreByThreshold(
  value: number,
  thresholds: Thresholds,
  higherIsBetter: boolean
): BandScore {
  if (value === 0) {
    return NEUTRAL_SCORE;
  }

  const [t0, t1, t2, t3, t4] = thresholds;

  if (!higherIsBetter) {
    // Lower is better (e.g., P/E, Debt/Equity); a tie falls into the worse band
    if (value >= t4) return 0;
    if (value >= t3) return 2;
    if (value >= t2) return 4;
    if (value >= t1) return 7;
    return 10;
  }

  // Higher is better (e.g., ROE, Margin)
  if (value <= t0) return 0;
  if (value <= t1) return 2;
  if (value <= t2) return 4;
  if (value <= t3) return 7;
  return 10;
}

/**
 * Beta close to 1 tracks the market; far from 1 lowers confidence but never to 0.
 */
export function scoreBeta(beta: number): BandScore {
  if (beta >= 0.8 && beta <= 1.2) return 10;
  if (beta >= 0.5 && beta <= 1.5) return 7;
  return NEUTRAL_SCORE;
}

export function roundScore(score: number, decimals: number = 2): number {
  const factor = Math.pow(10, decimals);
  return Math.round(score * factor) / factor;
}
