/**
 * CYCLE-TOP RISK: Types
 */

import type { Reading } from '../../common/reading.js';
import type { IndicatorSnapshot } from '../indicators/indicator.types.js';
import type { MarketSentiment } from '../../contracts/market.types.js';

export type RiskCategory = 'MINIMAL' | 'LOW' | 'MODERATE' | 'HIGH' | 'CRITICAL';

export type RiskFactorId =
  | 'PI_CYCLE'
  | 'RSI'
  | 'RCI'
  | 'ALTSEASON'
  | 'FEAR_GREED'
  | 'CONFLUENCE';

export type RiskTier =
  | 'PI_TRIGGERED'
  | 'PI_APPROACHING'
  | 'RSI_EXTREME'
  | 'RSI_OVERBOUGHT'
  | 'RCI_EXHAUSTION'
  | 'RCI_WEAKENING'
  | 'ALTSEASON_PEAK'
  | 'FG_EXTREME'
  | 'FG_HIGH'
  | 'CONFLUENCE';

export interface RiskContribution {
  factor: RiskFactorId;
  tier: RiskTier;
  points: number;
  /** Highest tier of its factor; counted toward confluence. */
  topTier: boolean;
  observed: number;
}

export interface ExcludedFactor {
  factor: RiskFactorId;
  reason: string;
}

export interface RiskScore {
  score: number;            // integer 0..100
  category: RiskCategory;
  contributions: RiskContribution[];
  excluded: ExcludedFactor[];
}

export interface RiskInput {
  /** BTC indicator snapshot; null when BTC could not be analysed. */
  snapshot: IndicatorSnapshot | null;
  sentiment: MarketSentiment;
  altseasonScore: Reading<number>;
}
