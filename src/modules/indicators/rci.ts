/**
 * RANK CORRELATION INDEX (3-line)
 * ===============================
 *
 * RCI = (1 − 6·Σd² / (n³ − n)) × 100, where d is the difference between
 * the time rank (oldest = 1) and the price rank (lowest = 1, ties share the
 * lowest rank) over the trailing n closes.
 */

import { InsufficientDataError } from '../../common/errors.js';
import { absent, absentFrom, present, type Reading } from '../../common/reading.js';
import { assertFiniteValues } from './series.validator.js';
import type { RciTriple, RciExhaustion } from './indicator.types.js';

function minRanks(values: readonly number[]): number[] {
  return values.map((v) => 1 + values.filter((other) => other < v).length);
}

export function computeRci(closes: readonly number[], period: number): Reading<number> {
  assertFiniteValues(closes, 'closes');
  if (period < 2) {
    return absent(`RCI period must be at least 2, got ${period}`);
  }
  if (closes.length < period) {
    return absentFrom(new InsufficientDataError(`RCI(${period})`, period, closes.length));
  }

  const window = closes.slice(-period);
  if (window.every((v) => v === window[0])) {
    return present(0);
  }

  const priceRanks = minRanks(window);
  let dSquared = 0;
  for (let i = 0; i < period; i++) {
    const d = priceRanks[i] - (i + 1);
    dSquared += d * d;
  }

  const rci = (1 - (6 * dSquared) / (period ** 3 - period)) * 100;
  return present(Math.max(-100, Math.min(100, rci)));
}

export function computeRci3(
  closes: readonly number[],
  periods: readonly [number, number, number] = [9, 26, 52]
): Reading<RciTriple> {
  const [s, m, l] = periods;
  const short = computeRci(closes, s);
  const medium = computeRci(closes, m);
  const long = computeRci(closes, l);

  if (short.status !== 'PRESENT') return short;
  if (medium.status !== 'PRESENT') return medium;
  if (long.status !== 'PRESENT') return long;

  return present({ short: short.value, medium: medium.value, long: long.value });
}

export interface RciExhaustionThresholds {
  overbought: number;
  exhaustionSpread: number;
  weakeningSpread: number;
}

/**
 * Trend exhaustion from the three lines.
 *
 * EXHAUSTION: all three lines above overbought, or the long line
 * still non-negative while the short line sits `exhaustionSpread` below it.
 * WEAKENING: two lines above overbought, or the same divergence at
 * `weakeningSpread`.
 */
export function assessRciExhaustion(rci: RciTriple, t: RciExhaustionThresholds): RciExhaustion {
  const lines = [rci.short, rci.medium, rci.long];
  const overboughtCount = lines.filter((v) => v > t.overbought).length;
  const divergence = rci.long >= 0 ? rci.long - rci.short : 0;

  if (overboughtCount === 3 || divergence >= t.exhaustionSpread) return 'EXHAUSTION';
  if (overboughtCount >= 2 || divergence >= t.weakeningSpread) return 'WEAKENING';
  return 'NONE';
}
