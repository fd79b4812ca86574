/**
 * PARTIAL EXIT ADVISOR
 * ====================
 *
 * local = clamp(global risk + RSI tier + RCI exhaustion + altseason, 0, 100)
 *
 *   local < 60        →  0 %
 *   60 ≤ local < 75   → 10 %
 *   75 ≤ local < 85   → 25 %
 *   local ≥ 85        → 50 %
 *
 * A holding at a loss drops `lossSuppression.tiers` tiers ('ALL' = to 0 %)
 * unless global risk has reached `lossSuppression.overrideMinRisk`.
 */

import type { EngineConfig } from '../../config/engine.config.js';
import { assessRciExhaustion } from '../indicators/rci.js';
import {
  EXIT_FRACTIONS,
  type ExitAdjustment,
  type ExitInput,
  type ExitRecommendation,
  type ExitTier,
} from './partial-exit.types.js';

type ExitConfig = Pick<EngineConfig, 'partialExit' | 'riskThresholds' | 'rci'>;

const TIER_ORDER: readonly ExitTier[] = ['NONE', 'LIGHT', 'MEDIUM', 'HEAVY'];

export function exitTierFor(score: number, bands: EngineConfig['partialExit']['bands']): ExitTier {
  if (score >= bands.heavy) return 'HEAVY';
  if (score >= bands.medium) return 'MEDIUM';
  if (score >= bands.light) return 'LIGHT';
  return 'NONE';
}

export function lowerTier(tier: ExitTier, steps: number | 'ALL'): ExitTier {
  if (steps === 'ALL') return 'NONE';
  return TIER_ORDER[Math.max(0, TIER_ORDER.indexOf(tier) - steps)];
}

function collectAdjustments(input: ExitInput, cfg: ExitConfig, missing: string[]): ExitAdjustment[] {
  const adj = cfg.partialExit.adjustments;
  const out: ExitAdjustment[] = [];
  const snap = input.snapshot;

  if (!snap) {
    missing.push('indicators');
  } else {
    if (snap.rsi.status === 'PRESENT') {
      if (snap.rsi.value > cfg.riskThresholds.rsiExtreme) out.push({ source: 'RSI_EXTREME', points: adj.rsiExtreme });
      else if (snap.rsi.value > cfg.riskThresholds.rsiOverbought) {
        out.push({ source: 'RSI_OVERBOUGHT', points: adj.rsiOverbought });
      }
    } else {
      missing.push('rsi');
    }

    if (snap.rci.status === 'PRESENT') {
      const signal = assessRciExhaustion(snap.rci.value, cfg.rci);
      if (signal === 'EXHAUSTION') out.push({ source: 'RCI_EXHAUSTION', points: adj.rciExhaustion });
      else if (signal === 'WEAKENING') out.push({ source: 'RCI_WEAKENING', points: adj.rciWeakening });
    } else {
      missing.push('rci');
    }
  }

  if (input.altseason.status === 'PRESENT') {
    if (input.altseason.value.state === 'ALTSEASON') out.push({ source: 'ALTSEASON', points: adj.altseason });
  } else {
    missing.push('altseason');
  }

  return out;
}

export function adviseExit(input: ExitInput, cfg: ExitConfig): ExitRecommendation {
  const missing: string[] = [];
  const adjustments = collectAdjustments(input, cfg, missing);
  const raw = input.globalRisk + adjustments.reduce((sum, a) => sum + a.points, 0);
  const localScore = Math.max(0, Math.min(100, raw));

  const scoreTier = exitTierFor(localScore, cfg.partialExit.bands);
  const { pnlPct } = input.holding;
  const policy = cfg.partialExit.lossSuppression;

  const atLoss = pnlPct !== null && pnlPct < 0;
  const suppress = policy.enabled && atLoss && input.globalRisk < policy.overrideMinRisk && scoreTier !== 'NONE';
  const tier = suppress ? lowerTier(scoreTier, policy.tiers) : scoreTier;

  if (pnlPct === null) missing.push('price');

  return {
    assetId: input.holding.assetId,
    symbol: input.holding.symbol,
    globalRisk: input.globalRisk,
    localScore,
    adjustments,
    scoreTier,
    tier,
    fractionPct: EXIT_FRACTIONS[tier],
    pnlPct,
    suppressedByLoss: suppress,
    missing,
  };
}
