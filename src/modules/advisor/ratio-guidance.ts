/**
 * BTC/ETH RATIO GUIDANCE
 * ======================
 *
 * Swap timing between the two base assets from the ETH/BTC ratio, both
 * assets' RSI and their distance from the long moving average.
 *
 *   ratio < low:   BTC RSI > btcRsiStrong, ETH RSI < ethRsiWeak      → SWAP_BTC_TO_ETH (HIGH)
 *                  BTC > btcOverextendedPct over MA, ETH under MA    → SWAP_BTC_TO_ETH (MEDIUM)
 *   ratio > high:  ETH RSI > ethRsiHot, BTC RSI < btcRsiSoft         → SWAP_ETH_TO_BTC (HIGH)
 *                  ratio > extremeHigh                               → SWAP_ETH_TO_BTC (HIGH)
 *   otherwise:     BTC RSI > momentumRsi, ETH RSI < laggingRsi → FAVOR_ETH; mirrored → FAVOR_BTC
 *
 * Defaults: 60 / 40 / 20 % / 70 / 50 / 80 / 40.
 *
 * An RSI or MA that is not available never satisfies a condition.
 */

import { absent, present, type Reading } from '../../common/reading.js';
import type { EngineConfig } from '../../config/engine.config.js';
import type { IndicatorSnapshot } from '../indicators/indicator.types.js';
import type {
  RatioAction,
  RatioConfidence,
  RatioGuidance,
  RatioPosition,
  RatioSignal,
} from './advisory.types.js';

export interface RatioGuidanceInput {
  ratio: number | null;
  btc: IndicatorSnapshot | null;
  eth: IndicatorSnapshot | null;
}

function rsiOf(s: IndicatorSnapshot | null): number | null {
  return s && s.rsi.status === 'PRESENT' ? s.rsi.value : null;
}

/** Percent distance of the last close from the long moving average. */
export function distanceFromLongMa(s: IndicatorSnapshot | null): number | null {
  if (!s || s.lastClose.status !== 'PRESENT' || s.movingAverages.status !== 'PRESENT') return null;
  const ma = s.movingAverages.value.long;
  if (!(ma > 0)) return null;
  return (s.lastClose.value / ma - 1) * 100;
}

const gt = (v: number | null, limit: number): boolean => v !== null && v > limit;
const lt = (v: number | null, limit: number): boolean => v !== null && v < limit;

export function computeRatioGuidance(
  input: RatioGuidanceInput,
  cfg: EngineConfig['ratioGuidance']
): Reading<RatioGuidance> {
  const { ratio } = input;
  if (ratio === null || !Number.isFinite(ratio) || ratio <= 0) {
    return absent('ETH/BTC ratio unavailable');
  }

  const btcRsi = rsiOf(input.btc);
  const ethRsi = rsiOf(input.eth);
  const btcVsMa = distanceFromLongMa(input.btc);
  const ethVsMa = distanceFromLongMa(input.eth);

  const signals: RatioSignal[] = [];
  let action: RatioAction = 'HOLD_RATIO';
  let confidence: RatioConfidence = 'LOW';

  if (ratio < cfg.low) {
    if (gt(btcRsi, cfg.btcRsiStrong) && lt(ethRsi, cfg.ethRsiWeak)) {
      signals.push('ETH_OVERSOLD_VS_BTC');
      action = 'SWAP_BTC_TO_ETH';
      confidence = 'HIGH';
    } else if (gt(btcVsMa, cfg.btcOverextendedPct) && lt(ethVsMa, 0)) {
      signals.push('BTC_OVEREXTENDED_ETH_LAGGING');
      action = 'SWAP_BTC_TO_ETH';
      confidence = 'MEDIUM';
    }
  } else if (ratio > cfg.high) {
    if (gt(ethRsi, cfg.ethRsiHot) && lt(btcRsi, cfg.btcRsiSoft)) {
      signals.push('ETH_OVERBOUGHT_VS_BTC');
      action = 'SWAP_ETH_TO_BTC';
      confidence = 'HIGH';
    } else if (ratio > cfg.extremeHigh) {
      signals.push('ETH_EXTREMELY_EXPENSIVE');
      action = 'SWAP_ETH_TO_BTC';
      confidence = 'HIGH';
    }
  }

  if (gt(btcRsi, cfg.momentumRsi) && lt(ethRsi, cfg.laggingRsi)) {
    signals.push('BTC_MOMENTUM_ETH_LAGGING');
    if (action === 'HOLD_RATIO') {
      action = 'FAVOR_ETH';
      confidence = 'MEDIUM';
    }
  } else if (gt(ethRsi, cfg.momentumRsi) && lt(btcRsi, cfg.laggingRsi)) {
    signals.push('ETH_MOMENTUM_BTC_LAGGING');
    if (action === 'HOLD_RATIO') {
      action = 'FAVOR_BTC';
      confidence = 'MEDIUM';
    }
  }

  let position: RatioPosition = 'NORMAL';
  if (ratio < cfg.low) position = 'LOW';
  else if (ratio > cfg.high) position = 'HIGH';

  return present({
    ratio,
    position,
    action,
    confidence,
    signals,
    btcRsi,
    ethRsi,
    btcVsMaPct: btcVsMa,
    ethVsMaPct: ethVsMa,
  });
}
