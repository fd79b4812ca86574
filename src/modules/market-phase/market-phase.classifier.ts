/**
 * MARKET PHASE: Classifier
 *
 * Fixed-priority decision table over Fear & Greed, BTC dominance and the
 * ETH/BTC ratio. First match wins. A rule whose inputs are missing or out of
 * range cannot match; evaluation continues down the table and the result
 * records which fields were missing.
 */

import type { SentimentField } from '../../common/errors.js';
import { sentimentValue, type MarketSentiment } from '../../contracts/market.types.js';
import type { MarketPhase, PhaseAction, PhaseClassification } from './market-phase.types.js';

export const PHASE_ACTIONS: Readonly<Record<MarketPhase, PhaseAction>> = Object.freeze({
  CAPITULATION: 'AGGRESSIVE_ACCUMULATION',
  BUY_ZONE: 'ACCUMULATE',
  EUPHORIA_RISK: 'DISTRIBUTE',
  SELL_ZONE: 'TAKE_PARTIAL_PROFITS',
  ALTSEASON_ACTIVE: 'ROTATE_ALT_PROFITS',
  FEAR: 'DCA_ACCUMULATE',
  GREED: 'HOLD_TIGHTEN',
  NEUTRAL: 'HOLD',
});

interface PhaseInputs {
  fg: number;
  dom: number;
  ratio: number;
}

interface PhaseRule {
  phase: MarketPhase;
  needs: ReadonlyArray<SentimentField>;
  when: (s: PhaseInputs) => boolean;
}

const RULES: ReadonlyArray<PhaseRule> = [
  { phase: 'CAPITULATION', needs: ['fearGreed', 'btcDominance'], when: (s) => s.fg <= 20 && s.dom > 60 },
  { phase: 'BUY_ZONE', needs: ['fearGreed', 'btcDominance'], when: (s) => s.fg <= 30 && s.dom > 55 },
  { phase: 'EUPHORIA_RISK', needs: ['fearGreed', 'btcDominance'], when: (s) => s.fg >= 80 && s.dom < 45 },
  { phase: 'SELL_ZONE', needs: ['fearGreed'], when: (s) => s.fg >= 75 },
  { phase: 'ALTSEASON_ACTIVE', needs: ['btcDominance', 'ethBtcRatio'], when: (s) => s.dom < 45 && s.ratio > 0.07 },
  { phase: 'FEAR', needs: ['fearGreed'], when: (s) => s.fg <= 35 },
  { phase: 'GREED', needs: ['fearGreed'], when: (s) => s.fg >= 65 },
];

export function classifyMarketPhase(sentiment: MarketSentiment): PhaseClassification {
  const fg = sentimentValue(sentiment, 'fearGreed');
  const dom = sentimentValue(sentiment, 'btcDominance');
  const ratio = sentimentValue(sentiment, 'ethBtcRatio');
  const available: Record<SentimentField, boolean> = {
    fearGreed: fg !== null,
    btcDominance: dom !== null,
    ethBtcRatio: ratio !== null,
  };
  // Unavailable values are never read: every rule checks `needs` first.
  const inputs: PhaseInputs = {
    fg: fg ?? Number.NaN,
    dom: dom ?? Number.NaN,
    ratio: ratio ?? Number.NaN,
  };

  const missing: SentimentField[] = [];
  for (let i = 0; i < RULES.length; i++) {
    const rule = RULES[i];
    const gaps = rule.needs.filter((f) => !available[f]);
    if (gaps.length > 0) {
      for (const g of gaps) if (!missing.includes(g)) missing.push(g);
      continue;
    }
    if (rule.when(inputs)) {
      return { phase: rule.phase, action: PHASE_ACTIONS[rule.phase], rule: i + 1, missing, degraded: missing.length > 0 };
    }
  }

  return { phase: 'NEUTRAL', action: PHASE_ACTIONS.NEUTRAL, rule: RULES.length + 1, missing, degraded: missing.length > 0 };
}
