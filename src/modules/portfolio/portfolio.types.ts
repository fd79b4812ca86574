/**
 * PORTFOLIO: Types
 */

import type { Reading } from '../../common/reading.js';
import type { Holding, Targets } from '../../contracts/market.types.js';

export type AchievementAction = 'GOAL_REACHABLE' | 'NEAR_GOAL' | 'KEEP_ACCUMULATING';

export interface HoldingPnl {
  assetId: string;
  symbol: string;
  quantity: number;
  avgBuyPrice: number;
  currentPrice: number | null;
  /** quantity × currentPrice; null without a price. */
  marketValue: number | null;
  /** (current − avg) / avg × 100; null without a price. */
  pnlPct: number | null;
  pnlUsd: number | null;
}

export interface AchievementInput {
  holdings: readonly Holding[];
  btcPrice: number | null;
  ethPrice: number | null;
  targets: Targets;
}

export interface PortfolioAchievement {
  /** Sum of market values of priced altcoin holdings. */
  altcoinValue: number;
  goalCost: Reading<number>;
  /** altcoinValue / goalCost × 100, uncapped. */
  achievementPct: Reading<number>;
  btcEquivalent: Reading<number>;
  action: Reading<AchievementAction>;
  /** Altcoin holdings in input order. */
  holdings: HoldingPnl[];
  /** Altcoins left out of altcoinValue for want of a price. */
  unpriced: string[];
  /** Base assets (BTC, ETH) removed from the liquidation set. */
  baseAssets: string[];
}
