/**
 * INDICATOR CALCULATORS
 * =====================
 *
 * RSI, MACD, SMA + crossover, Bollinger Bands, Stochastic.
 *
 * Thin wrappers over `technicalindicators` that turn short input into an
 * ABSENT reading and reject non-finite values up front.
 */

import { RSI, MACD, SMA, BollingerBands, Stochastic } from 'technicalindicators';

import { InsufficientDataError } from '../../common/errors.js';
import { absent, absentFrom, present, type Reading } from '../../common/reading.js';
import { assertFiniteValues } from './series.validator.js';
import type {
  MacdCrossover,
  MacdValue,
  MaCrossover,
  MovingAveragesValue,
  BollingerValue,
  StochasticValue,
} from './indicator.types.js';

const NEUTRAL_RSI = 50;
const NEUTRAL_STOCH = 50;

function last<T>(values: readonly T[]): T | undefined {
  return values.length > 0 ? values[values.length - 1] : undefined;
}

// ═══════════════════════════════════════════════════════════════
// MOMENTUM
// ═══════════════════════════════════════════════════════════════

/**
 * Wilder RSI. Needs `period + 1` closes. A series with no price change at
 * all has no defined gain/loss ratio and reads 50.
 */
export function computeRsi(closes: readonly number[], period = 14): Reading<number> {
  assertFiniteValues(closes, 'closes');
  const required = period + 1;
  if (closes.length < required) {
    return absentFrom(new InsufficientDataError(`RSI(${period})`, required, closes.length));
  }

  let moved = false;
  for (let i = 1; i < closes.length; i++) {
    if (closes[i] !== closes[i - 1]) {
      moved = true;
      break;
    }
  }
  if (!moved) return present(NEUTRAL_RSI);

  const rsi = last(RSI.calculate({ values: [...closes], period }));
  if (rsi === undefined || !Number.isFinite(rsi)) {
    return absent(`RSI(${period}) produced no value`, required, closes.length);
  }
  return present(Math.min(100, Math.max(0, rsi)));
}

export function computeMacd(
  closes: readonly number[],
  fast = 12,
  slow = 26,
  signal = 9
): Reading<MacdValue> {
  assertFiniteValues(closes, 'closes');
  const required = slow + signal - 1;
  if (closes.length < required) {
    return absentFrom(new InsufficientDataError(`MACD(${fast},${slow},${signal})`, required, closes.length));
  }

  const formed = MACD.calculate({
    values: [...closes],
    fastPeriod: fast,
    slowPeriod: slow,
    signalPeriod: signal,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
  }).filter(
    (o): o is { MACD: number; signal: number; histogram: number } =>
      o.MACD !== undefined && o.signal !== undefined && o.histogram !== undefined
  );

  const cur = last(formed);
  if (!cur) {
    return absent('MACD signal line not yet formed', required, closes.length);
  }
  const prev = formed.length > 1 ? formed[formed.length - 2] : undefined;

  let crossover: MacdCrossover = 'NONE';
  if (prev && prev.MACD <= prev.signal && cur.MACD > cur.signal) crossover = 'BULLISH_CROSS';
  else if (prev && prev.MACD >= prev.signal && cur.MACD < cur.signal) crossover = 'BEARISH_CROSS';

  return present({ macd: cur.MACD, signal: cur.signal, histogram: cur.histogram, crossover });
}

// ═══════════════════════════════════════════════════════════════
// TREND
// ═══════════════════════════════════════════════════════════════

/** Full SMA series; element i covers closes[i .. i + period - 1]. */
export function smaSeries(closes: readonly number[], period: number): number[] {
  if (closes.length < period) return [];
  return SMA.calculate({ period, values: [...closes] });
}

export function computeSma(closes: readonly number[], period: number): Reading<number> {
  assertFiniteValues(closes, 'closes');
  const value = last(smaSeries(closes, period));
  if (value === undefined) {
    return absentFrom(new InsufficientDataError(`SMA(${period})`, period, closes.length));
  }
  return present(value);
}

/**
 * Compares short-vs-long on the previous and current point:
 * short crossing above long is a golden cross, below a death cross.
 */
export function detectMaCrossover(
  closes: readonly number[],
  shortPeriod = 50,
  longPeriod = 200
): Reading<MovingAveragesValue> {
  assertFiniteValues(closes, 'closes');
  const required = longPeriod + 1;
  if (closes.length < required) {
    return absentFrom(new InsufficientDataError(`MA(${shortPeriod}/${longPeriod}) crossover`, required, closes.length));
  }

  const shortMa = smaSeries(closes, shortPeriod);
  const longMa = smaSeries(closes, longPeriod);

  const sCur = shortMa[shortMa.length - 1];
  const sPrev = shortMa[shortMa.length - 2];
  const lCur = longMa[longMa.length - 1];
  const lPrev = longMa[longMa.length - 2];

  let crossover: MaCrossover = 'NONE';
  if (sPrev <= lPrev && sCur > lCur) crossover = 'GOLDEN_CROSS';
  else if (sPrev >= lPrev && sCur < lCur) crossover = 'DEATH_CROSS';

  return present({ short: sCur, long: lCur, crossover });
}

// ═══════════════════════════════════════════════════════════════
// VOLATILITY / OSCILLATORS
// ═══════════════════════════════════════════════════════════════

export function computeBollinger(
  closes: readonly number[],
  period = 20,
  stdDev = 2
): Reading<BollingerValue> {
  assertFiniteValues(closes, 'closes');
  if (closes.length < period) {
    return absentFrom(new InsufficientDataError(`Bollinger(${period})`, period, closes.length));
  }
  const band = last(BollingerBands.calculate({ period, values: [...closes], stdDev }));
  if (!band) return absent(`Bollinger(${period}) produced no value`, period, closes.length);
  return present({ upper: band.upper, middle: band.middle, lower: band.lower });
}

/**
 * %K/%D stochastic. %D is the mean of the last `signalPeriod` %K values.
 * A window whose high equals its low has no defined %K and reads 50.
 */
export function computeStochastic(
  high: readonly number[],
  low: readonly number[],
  close: readonly number[],
  period = 14,
  signalPeriod = 3
): Reading<StochasticValue> {
  assertFiniteValues(high, 'high');
  assertFiniteValues(low, 'low');
  assertFiniteValues(close, 'close');
  const required = period + signalPeriod - 1;
  if (close.length < required) {
    return absentFrom(new InsufficientDataError(`Stochastic(${period},${signalPeriod})`, required, close.length));
  }

  const raw = Stochastic.calculate({
    high: [...high],
    low: [...low],
    close: [...close],
    period,
    signalPeriod,
  });
  // raw[j] covers the window ending at close index j + period - 1
  const kSeries = raw.map((out, j) => {
    const range = Math.max(...high.slice(j, j + period)) - Math.min(...low.slice(j, j + period));
    return range > 0 && Number.isFinite(out.k) ? out.k : NEUTRAL_STOCH;
  });
  if (kSeries.length < signalPeriod) {
    return absent('Stochastic %D not yet formed', required, close.length);
  }

  const recent = kSeries.slice(-signalPeriod);
  const d = recent.reduce((sum, v) => sum + v, 0) / signalPeriod;
  return present({ k: recent[recent.length - 1], d });
}
