/**
 * MARKET PHASE: Types
 */

import type { SentimentField } from '../../common/errors.js';

export type MarketPhase =
  | 'CAPITULATION'
  | 'BUY_ZONE'
  | 'EUPHORIA_RISK'
  | 'SELL_ZONE'
  | 'ALTSEASON_ACTIVE'
  | 'FEAR'
  | 'GREED'
  | 'NEUTRAL';

export type PhaseAction =
  | 'AGGRESSIVE_ACCUMULATION'
  | 'ACCUMULATE'
  | 'DISTRIBUTE'
  | 'TAKE_PARTIAL_PROFITS'
  | 'ROTATE_ALT_PROFITS'
  | 'DCA_ACCUMULATE'
  | 'HOLD_TIGHTEN'
  | 'HOLD';

export interface PhaseClassification {
  phase: MarketPhase;
  action: PhaseAction;
  /** 1-based priority of the matching rule; 8 is the fallback. */
  rule: number;
  /** Inputs some earlier rule needed but did not get. */
  missing: SentimentField[];
  degraded: boolean;
}
