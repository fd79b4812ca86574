/**
 * TECHNICAL SIGNALS
 * =================
 *
 * Per-asset alert conditions read off one indicator snapshot:
 *
 *   RSI          > rsiOverbought / < rsiOversold
 *   MACD         line crossed its signal on the last point
 *   MA           50/200 golden or death cross on the last point
 *   RCI          two or more lines beyond rci.overbought / rci.oversold
 *   Bollinger    last close outside the bands
 *   Stochastic   %K and %D both beyond the stochastic bounds
 *
 * EXIT_TO_STABLECOIN fires only when RSI is hot, MACD sits under its
 * signal line, BTC dominance is high and Fear & Greed is extreme.
 *
 * An indicator that is not PRESENT never fires; it is listed in `missing`.
 */

import type { EngineConfig } from '../../config/engine.config.js';
import { sentimentValue, type MarketSentiment } from '../../contracts/market.types.js';
import type { IndicatorSnapshot } from '../indicators/indicator.types.js';
import {
  BEARISH_SIGNALS,
  type SignalBias,
  type SignalSource,
  type TechnicalSignal,
  type TechnicalSignalsResult,
} from './technical-signals.types.js';

type SignalsConfig = Pick<EngineConfig, 'technicalSignals' | 'rci'>;

function countBeyond(lines: readonly number[], beyond: (v: number) => boolean): number {
  return lines.filter(beyond).length;
}

function exitToStablecoin(snap: IndicatorSnapshot, sentiment: MarketSentiment, cfg: SignalsConfig): boolean {
  const t = cfg.technicalSignals.exitToStablecoin;
  const dominance = sentimentValue(sentiment, 'btcDominance');
  const fearGreed = sentimentValue(sentiment, 'fearGreed');
  return (
    snap.rsi.status === 'PRESENT' &&
    snap.rsi.value > t.rsiAbove &&
    snap.macd.status === 'PRESENT' &&
    snap.macd.value.macd < snap.macd.value.signal &&
    dominance !== null &&
    dominance > t.dominanceAbove &&
    fearGreed !== null &&
    fearGreed >= t.fearGreedMin
  );
}

export function evaluateTechnicalSignals(
  snap: IndicatorSnapshot,
  sentiment: MarketSentiment,
  cfg: SignalsConfig
): TechnicalSignalsResult {
  const t = cfg.technicalSignals;
  const signals: TechnicalSignal[] = [];
  const missing: SignalSource[] = [];

  if (snap.rsi.status === 'PRESENT') {
    if (snap.rsi.value > t.rsiOverbought) signals.push('RSI_OVERBOUGHT');
    else if (snap.rsi.value < t.rsiOversold) signals.push('RSI_OVERSOLD');
  } else {
    missing.push('RSI');
  }

  if (snap.macd.status === 'PRESENT') {
    if (snap.macd.value.crossover === 'BULLISH_CROSS') signals.push('MACD_BULLISH_CROSS');
    else if (snap.macd.value.crossover === 'BEARISH_CROSS') signals.push('MACD_BEARISH_CROSS');
  } else {
    missing.push('MACD');
  }

  if (snap.movingAverages.status === 'PRESENT') {
    const cross = snap.movingAverages.value.crossover;
    if (cross !== 'NONE') signals.push(cross);
  } else {
    missing.push('MOVING_AVERAGES');
  }

  if (snap.rci.status === 'PRESENT') {
    const { short, medium, long } = snap.rci.value;
    const lines = [short, medium, long];
    if (countBeyond(lines, (v) => v > cfg.rci.overbought) >= 2) signals.push('RCI_OVERBOUGHT');
    else if (countBeyond(lines, (v) => v < cfg.rci.oversold) >= 2) signals.push('RCI_OVERSOLD');
  } else {
    missing.push('RCI');
  }

  if (snap.bollinger.status === 'PRESENT' && snap.lastClose.status === 'PRESENT') {
    const close = snap.lastClose.value;
    if (close > snap.bollinger.value.upper) signals.push('ABOVE_UPPER_BAND');
    else if (close < snap.bollinger.value.lower) signals.push('BELOW_LOWER_BAND');
  } else {
    missing.push('BOLLINGER');
  }

  if (snap.stochastic.status === 'PRESENT') {
    const { k, d } = snap.stochastic.value;
    if (k > t.stochasticOverbought && d > t.stochasticOverbought) signals.push('STOCHASTIC_OVERBOUGHT');
    else if (k < t.stochasticOversold && d < t.stochasticOversold) signals.push('STOCHASTIC_OVERSOLD');
  } else {
    missing.push('STOCHASTIC');
  }

  if (exitToStablecoin(snap, sentiment, cfg)) signals.push('EXIT_TO_STABLECOIN');

  const bearish = signals.filter((s) => BEARISH_SIGNALS.has(s)).length;
  const bullish = signals.length - bearish;
  let bias: SignalBias = 'NEUTRAL';
  if (bearish > bullish) bias = 'BEARISH';
  else if (bullish > bearish) bias = 'BULLISH';

  return { assetId: snap.assetId, signals, bias, bullish, bearish, missing };
}
