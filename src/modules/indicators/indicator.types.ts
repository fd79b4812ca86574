/**
 * INDICATOR LIBRARY: Types
 * ==========================
 */

import type { Reading } from '../../common/reading.js';

// ═══════════════════════════════════════════════════════════════
// PRICE SERIES
// ═══════════════════════════════════════════════════════════════

export interface PricePoint {
  ts: number;          // ms epoch
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Ordered by strictly increasing `ts`; never mutated once built. */
export type PriceSeries = ReadonlyArray<Readonly<PricePoint>>;

// ═══════════════════════════════════════════════════════════════
// INDICATOR VALUES
// ═══════════════════════════════════════════════════════════════

export type MacdCrossover = 'BULLISH_CROSS' | 'BEARISH_CROSS' | 'NONE';

export interface MacdValue {
  macd: number;
  signal: number;
  histogram: number;
  /** MACD line against its signal line over the last two points. */
  crossover: MacdCrossover;
}

export type MaCrossover = 'GOLDEN_CROSS' | 'DEATH_CROSS' | 'NONE';

export interface MovingAveragesValue {
  short: number;
  long: number;
  crossover: MaCrossover;
}

export interface PiCycleValue {
  ma111: number;
  ma350x2: number;
  ratio: number;            // ma111 / (2 * ma350)
  aboveTrigger: boolean;    // ratio >= 1
  crossedUp: boolean;       // ratio went from < 1 to >= 1 on the last point
}

export interface RciTriple {
  short: number;            // [-100, 100]
  medium: number;
  long: number;
}

export type RciExhaustion = 'EXHAUSTION' | 'WEAKENING' | 'NONE';

export interface BollingerValue {
  upper: number;
  middle: number;
  lower: number;
}

export interface StochasticValue {
  k: number;
  d: number;
}

// ═══════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════

export interface IndicatorSnapshot {
  assetId: string;
  ts: number | null;
  points: number;
  lastClose: Reading<number>;
  rsi: Reading<number>;
  macd: Reading<MacdValue>;
  movingAverages: Reading<MovingAveragesValue>;
  piCycle: Reading<PiCycleValue>;
  rci: Reading<RciTriple>;
  bollinger: Reading<BollingerValue>;
  stochastic: Reading<StochasticValue>;
}
