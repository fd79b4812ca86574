/**
 * PARTIAL EXIT: Types
 */

import type { Reading } from '../../common/reading.js';
import type { AltseasonResult } from '../altseason/altseason.types.js';
import type { IndicatorSnapshot } from '../indicators/indicator.types.js';
import type { HoldingPnl } from '../portfolio/portfolio.types.js';

export type ExitTier = 'NONE' | 'LIGHT' | 'MEDIUM' | 'HEAVY';

export const EXIT_FRACTIONS: Readonly<Record<ExitTier, number>> = Object.freeze({
  NONE: 0,
  LIGHT: 10,
  MEDIUM: 25,
  HEAVY: 50,
});

export type ExitAdjustmentSource =
  | 'RSI_EXTREME'
  | 'RSI_OVERBOUGHT'
  | 'RCI_EXHAUSTION'
  | 'RCI_WEAKENING'
  | 'ALTSEASON';

export interface ExitAdjustment {
  source: ExitAdjustmentSource;
  points: number;
}

export interface ExitInput {
  holding: HoldingPnl;
  globalRisk: number;
  /** Per-asset snapshot; null when the asset's series was dropped. */
  snapshot: IndicatorSnapshot | null;
  altseason: Reading<AltseasonResult>;
}

export interface ExitRecommendation {
  assetId: string;
  symbol: string;
  globalRisk: number;
  localScore: number;
  adjustments: ExitAdjustment[];
  /** Tier before loss suppression. */
  scoreTier: ExitTier;
  tier: ExitTier;
  fractionPct: number;
  pnlPct: number | null;
  suppressedByLoss: boolean;
  /** Signals that could not be read for this holding. */
  missing: string[];
}
