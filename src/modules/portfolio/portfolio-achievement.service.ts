/**
 * PORTFOLIO ACHIEVEMENT
 * =====================
 *
 * How much of the BTC/ETH goal the altcoin bag would buy if sold today.
 * Aggregates use market value only; cost basis feeds the per-holding P&L
 * and nothing else.
 */

import { absent, invalid, present, type Reading } from '../../common/reading.js';
import type { EngineConfig } from '../../config/engine.config.js';
import type { Holding } from '../../contracts/market.types.js';
import type {
  AchievementAction,
  AchievementInput,
  HoldingPnl,
  PortfolioAchievement,
} from './portfolio.types.js';

function isPrice(v: number | null): v is number {
  return v !== null && Number.isFinite(v) && v > 0;
}

export function computePnlPct(avgBuyPrice: number, currentPrice: number | null): number | null {
  if (!isPrice(currentPrice) || !(avgBuyPrice > 0)) return null;
  return ((currentPrice - avgBuyPrice) / avgBuyPrice) * 100;
}

export function holdingPnl(h: Holding): HoldingPnl {
  const priced = isPrice(h.currentPrice);
  return {
    assetId: h.assetId,
    symbol: h.symbol,
    quantity: h.quantity,
    avgBuyPrice: h.avgBuyPrice,
    currentPrice: h.currentPrice,
    marketValue: priced && h.currentPrice !== null ? h.quantity * h.currentPrice : null,
    pnlPct: computePnlPct(h.avgBuyPrice, h.currentPrice),
    pnlUsd: priced && h.currentPrice !== null ? (h.currentPrice - h.avgBuyPrice) * h.quantity : null,
  };
}

export function achievementAction(pct: number, nearGoalPct: number): AchievementAction {
  if (pct >= 100) return 'GOAL_REACHABLE';
  if (pct >= nearGoalPct) return 'NEAR_GOAL';
  return 'KEEP_ACCUMULATING';
}

export function calculatePortfolioAchievement(
  input: AchievementInput,
  cfg: EngineConfig['portfolio']
): PortfolioAchievement {
  const base = new Set([cfg.btcAssetId, cfg.ethAssetId]);
  const baseAssets = input.holdings.filter((h) => base.has(h.assetId)).map((h) => h.assetId);
  const holdings = input.holdings.filter((h) => !base.has(h.assetId)).map(holdingPnl);

  const unpriced: string[] = [];
  let altcoinValue = 0;
  for (const h of holdings) {
    if (h.marketValue === null) unpriced.push(h.assetId);
    else altcoinValue += h.marketValue;
  }

  const { targetBtc, targetEth } = input.targets;
  let goalCost: Reading<number>;
  if ((targetBtc > 0 && !isPrice(input.btcPrice)) || (targetEth > 0 && !isPrice(input.ethPrice))) {
    goalCost = absent('BTC or ETH price unavailable');
  } else {
    const btcCost = targetBtc > 0 && isPrice(input.btcPrice) ? targetBtc * input.btcPrice : 0;
    const ethCost = targetEth > 0 && isPrice(input.ethPrice) ? targetEth * input.ethPrice : 0;
    goalCost = present(btcCost + ethCost);
  }

  let achievementPct: Reading<number>;
  if (goalCost.status !== 'PRESENT') achievementPct = goalCost;
  else if (goalCost.value <= 0) achievementPct = invalid('goal cost is zero');
  else achievementPct = present((altcoinValue / goalCost.value) * 100);

  const btcEquivalent: Reading<number> = isPrice(input.btcPrice)
    ? present(altcoinValue / input.btcPrice)
    : absent('BTC price unavailable');

  const action: Reading<AchievementAction> =
    achievementPct.status === 'PRESENT'
      ? present(achievementAction(achievementPct.value, cfg.nearGoalPct))
      : achievementPct.status === 'ABSENT'
        ? absent(achievementPct.reason)
        : invalid(achievementPct.reason);

  return { altcoinValue, goalCost, achievementPct, btcEquivalent, action, holdings, unpriced, baseAssets };
}
