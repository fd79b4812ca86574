/**
 * CYCLE-TOP RISK SCORER
 * =====================
 *
 * Weighted sum over independently toggleable factors. Each factor
 * contributes at most one tier (its highest applicable one) and only when
 * its input is available. Unavailable inputs are listed as excluded.
 *
 * Weights are non-negative, so raising any single factor never lowers the
 * total. The total is clamped, not normalised.
 */

import type { Reading } from '../../common/reading.js';
import type { EngineConfig } from '../../config/engine.config.js';
import { inSentimentRange } from '../../contracts/market.types.js';
import { assessRciExhaustion } from '../indicators/rci.js';
import type {
  RiskCategory,
  RiskContribution,
  RiskFactorId,
  RiskInput,
  RiskScore,
  ExcludedFactor,
} from './cycle-risk.types.js';

type RiskConfig = Pick<EngineConfig, 'riskWeights' | 'riskThresholds' | 'riskFactors' | 'rci' | 'altseason'>;

type FactorOutcome =
  | { kind: 'FIRED'; contribution: RiskContribution }
  | { kind: 'QUIET' }
  | { kind: 'EXCLUDED'; reason: string };

const QUIET: FactorOutcome = { kind: 'QUIET' };

function excludedFrom<T>(r: Reading<T>): FactorOutcome {
  return { kind: 'EXCLUDED', reason: r.status === 'PRESENT' ? 'unavailable' : r.reason };
}

function fired(
  factor: RiskFactorId,
  tier: RiskContribution['tier'],
  points: number,
  topTier: boolean,
  observed: number
): FactorOutcome {
  return { kind: 'FIRED', contribution: { factor, tier, points, topTier, observed } };
}

// ═══════════════════════════════════════════════════════════════
// CATEGORY
// ═══════════════════════════════════════════════════════════════

export function categorizeRisk(score: number): RiskCategory {
  if (score <= 20) return 'MINIMAL';
  if (score <= 40) return 'LOW';
  if (score <= 60) return 'MODERATE';
  if (score <= 80) return 'HIGH';
  return 'CRITICAL';
}

// ═══════════════════════════════════════════════════════════════
// FACTORS
// ═══════════════════════════════════════════════════════════════

function piCycleFactor(input: RiskInput, cfg: RiskConfig): FactorOutcome {
  const pi = input.snapshot?.piCycle;
  if (!pi) return { kind: 'EXCLUDED', reason: 'no BTC indicator snapshot' };
  if (pi.status !== 'PRESENT') return excludedFrom(pi);

  const { ratio } = pi.value;
  const t = cfg.riskThresholds;
  if (ratio >= t.piCycleTrigger) {
    return fired('PI_CYCLE', 'PI_TRIGGERED', cfg.riskWeights.piCycleTriggered, true, ratio);
  }
  if (ratio >= t.piCycleApproach) {
    return fired('PI_CYCLE', 'PI_APPROACHING', cfg.riskWeights.piCycleApproaching, false, ratio);
  }
  return QUIET;
}

function rsiFactor(input: RiskInput, cfg: RiskConfig): FactorOutcome {
  const rsi = input.snapshot?.rsi;
  if (!rsi) return { kind: 'EXCLUDED', reason: 'no BTC indicator snapshot' };
  if (rsi.status !== 'PRESENT') return excludedFrom(rsi);

  const t = cfg.riskThresholds;
  if (rsi.value > t.rsiExtreme) {
    return fired('RSI', 'RSI_EXTREME', cfg.riskWeights.rsiExtreme, true, rsi.value);
  }
  if (rsi.value > t.rsiOverbought) {
    return fired('RSI', 'RSI_OVERBOUGHT', cfg.riskWeights.rsiOverbought, false, rsi.value);
  }
  return QUIET;
}

function rciFactor(input: RiskInput, cfg: RiskConfig): FactorOutcome {
  const rci = input.snapshot?.rci;
  if (!rci) return { kind: 'EXCLUDED', reason: 'no BTC indicator snapshot' };
  if (rci.status !== 'PRESENT') return excludedFrom(rci);

  const signal = assessRciExhaustion(rci.value, cfg.rci);
  if (signal === 'EXHAUSTION') {
    return fired('RCI', 'RCI_EXHAUSTION', cfg.riskWeights.rciExhaustion, true, rci.value.short);
  }
  if (signal === 'WEAKENING') {
    return fired('RCI', 'RCI_WEAKENING', cfg.riskWeights.rciWeakening, false, rci.value.short);
  }
  return QUIET;
}

function altseasonFactor(input: RiskInput, cfg: RiskConfig): FactorOutcome {
  const alt = input.altseasonScore;
  if (alt.status !== 'PRESENT') return excludedFrom(alt);
  if (alt.value > cfg.altseason.altseasonAbove) {
    return fired('ALTSEASON', 'ALTSEASON_PEAK', cfg.riskWeights.altseasonPeak, true, alt.value);
  }
  return QUIET;
}

function fearGreedFactor(input: RiskInput, cfg: RiskConfig): FactorOutcome {
  const fg = input.sentiment.fearGreed;
  if (fg === null) return { kind: 'EXCLUDED', reason: 'fear & greed index unavailable' };
  if (!inSentimentRange('fearGreed', fg)) {
    return { kind: 'EXCLUDED', reason: `fear & greed index out of range: ${fg}` };
  }

  const t = cfg.riskThresholds;
  if (fg > t.fearGreedExtreme) {
    return fired('FEAR_GREED', 'FG_EXTREME', cfg.riskWeights.fearGreedExtreme, true, fg);
  }
  if (fg > t.fearGreedHigh) {
    return fired('FEAR_GREED', 'FG_HIGH', cfg.riskWeights.fearGreedHigh, false, fg);
  }
  return QUIET;
}

const BASE_FACTORS: ReadonlyArray<{
  id: RiskFactorId;
  key: keyof EngineConfig['riskFactors'];
  evaluate: (input: RiskInput, cfg: RiskConfig) => FactorOutcome;
}> = [
  { id: 'PI_CYCLE', key: 'piCycle', evaluate: piCycleFactor },
  { id: 'RSI', key: 'rsi', evaluate: rsiFactor },
  { id: 'RCI', key: 'rci', evaluate: rciFactor },
  { id: 'ALTSEASON', key: 'altseason', evaluate: altseasonFactor },
  { id: 'FEAR_GREED', key: 'fearGreed', evaluate: fearGreedFactor },
];

// ═══════════════════════════════════════════════════════════════
// SCORE
// ═══════════════════════════════════════════════════════════════

export function scoreCycleTopRisk(input: RiskInput, cfg: RiskConfig): RiskScore {
  const contributions: RiskContribution[] = [];
  const excluded: ExcludedFactor[] = [];

  for (const factor of BASE_FACTORS) {
    if (!cfg.riskFactors[factor.key]) {
      excluded.push({ factor: factor.id, reason: 'disabled' });
      continue;
    }
    const outcome = factor.evaluate(input, cfg);
    if (outcome.kind === 'FIRED') contributions.push(outcome.contribution);
    else if (outcome.kind === 'EXCLUDED') excluded.push({ factor: factor.id, reason: outcome.reason });
  }

  if (cfg.riskFactors.confluence) {
    const topTiers = contributions.filter((c) => c.topTier).length;
    if (topTiers >= cfg.riskThresholds.confluenceMinFactors) {
      contributions.push({
        factor: 'CONFLUENCE',
        tier: 'CONFLUENCE',
        points: cfg.riskWeights.confluence,
        topTier: true,
        observed: topTiers,
      });
    }
  } else {
    excluded.push({ factor: 'CONFLUENCE', reason: 'disabled' });
  }

  const raw = contributions.reduce((sum, c) => sum + c.points, 0);
  const score = Math.max(0, Math.min(100, Math.round(raw)));

  return {
    score,
    category: categorizeRisk(score),
    contributions,
    excluded,
  };
}
