/**
 * ALTSEASON DETECTOR
 * ==================
 *
 * score = clamp(dominanceScore + momentumWeight × momentumScore, 0, 100)
 *
 * dominanceScore is 100 at or below the low dominance bound, 0 at or above
 * the high one, linear in between. momentumScore comes from the relative
 * ETH/BTC change against the previous snapshot, which is passed in by the
 * caller; without one it is zero.
 */

import { MissingSentimentError } from '../../common/errors.js';
import { absentFrom, present, type Reading } from '../../common/reading.js';
import type { EngineConfig } from '../../config/engine.config.js';
import { sentimentValue, type MarketSentiment } from '../../contracts/market.types.js';
import type { AltseasonResult, AltseasonState } from './altseason.types.js';

type AltseasonConfig = EngineConfig['altseason'];

export function dominanceScore(dominance: number, cfg: AltseasonConfig): number {
  const low = cfg.dominanceExtremeLow;
  const high = cfg.dominanceExtremeHigh;
  if (dominance <= low) return 100;
  if (dominance >= high) return 0;
  return ((high - dominance) / (high - low)) * 100;
}

export function momentumScore(change: number, cfg: AltseasonConfig): number {
  const magnitude = Math.abs(change);
  let score = 0;
  if (magnitude >= cfg.momentumVeryStrong) score = 100;
  else if (magnitude >= cfg.momentumStrong) score = 60;
  else if (magnitude >= cfg.momentumWeak) score = 25;
  return change < 0 ? -score : score;
}

export function classifyAltseason(score: number, cfg: AltseasonConfig): AltseasonState {
  if (score > cfg.altseasonAbove) return 'ALTSEASON';
  if (score < cfg.transitionMin) return 'BTC_DOMINANCE';
  return 'TRANSITION';
}

function ratioChange(current: MarketSentiment, previous: MarketSentiment | undefined): number | null {
  const now = sentimentValue(current, 'ethBtcRatio');
  const before = previous ? sentimentValue(previous, 'ethBtcRatio') : null;
  if (now === null || before === null) return null;
  return (now - before) / before;
}

export function detectAltseason(
  current: MarketSentiment,
  previous: MarketSentiment | undefined,
  cfg: AltseasonConfig
): Reading<AltseasonResult> {
  const dominance = sentimentValue(current, 'btcDominance');
  if (dominance === null) {
    return absentFrom(new MissingSentimentError(['btcDominance']));
  }

  const domScore = dominanceScore(dominance, cfg);
  const change = ratioChange(current, previous);
  const momScore = change === null ? 0 : momentumScore(change, cfg);
  const score = Math.max(0, Math.min(100, domScore + cfg.momentumWeight * momScore));

  return present({
    score,
    state: classifyAltseason(score, cfg),
    dominanceScore: domScore,
    momentumScore: momScore,
    ratioChange: change,
  });
}
