/**
 * Indicator snapshot for one asset at the last point of its series.
 */

import { absent, present } from '../../common/reading.js';
import type { EngineConfig } from '../../config/engine.config.js';
import { validateSeries } from './series.validator.js';
import {
  computeRsi,
  computeMacd,
  detectMaCrossover,
  computeBollinger,
  computeStochastic,
} from './indicator.calculators.js';
import { computePiCycle } from './pi-cycle.js';
import { computeRci3 } from './rci.js';
import type { IndicatorSnapshot, PriceSeries } from './indicator.types.js';

/**
 * Throws InvalidInputError for a malformed series; short series only
 * produce ABSENT readings.
 */
export function buildIndicatorSnapshot(
  assetId: string,
  series: PriceSeries,
  cfg: EngineConfig['indicators']
): IndicatorSnapshot {
  validateSeries(series, assetId);

  const closes = series.map((p) => p.close);
  const highs = series.map((p) => p.high);
  const lows = series.map((p) => p.low);
  const lastPoint = series.length > 0 ? series[series.length - 1] : undefined;

  return Object.freeze({
    assetId,
    ts: lastPoint ? lastPoint.ts : null,
    points: series.length,
    lastClose: lastPoint ? present(lastPoint.close) : absent<number>('empty series', 1, 0),
    rsi: computeRsi(closes, cfg.rsiPeriod),
    macd: computeMacd(closes, cfg.macdFast, cfg.macdSlow, cfg.macdSignal),
    movingAverages: detectMaCrossover(closes, cfg.maShort, cfg.maLong),
    piCycle: computePiCycle(closes, cfg.piCycleShort, cfg.piCycleLong),
    rci: computeRci3(closes, cfg.rciPeriods),
    bollinger: computeBollinger(closes, cfg.bollingerPeriod, cfg.bollingerStdDev),
    stochastic: computeStochastic(highs, lows, closes, cfg.stochasticPeriod, cfg.stochasticSignal),
  });
}
