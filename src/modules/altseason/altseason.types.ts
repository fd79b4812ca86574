/**
 * ALTSEASON: Types
 */

export type AltseasonState = 'BTC_DOMINANCE' | 'TRANSITION' | 'ALTSEASON';

export interface AltseasonResult {
  /** Combined score, 0..100. */
  score: number;
  state: AltseasonState;
  dominanceScore: number;     // 0..100
  momentumScore: number;      // -100..100, before weighting
  /** Relative ETH/BTC change vs the previous snapshot; null without one. */
  ratioChange: number | null;
}
