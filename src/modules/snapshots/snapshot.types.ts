import type { MarketSentiment } from '../../contracts/market.types.js';

/** What one cycle leaves behind for the next. */
export interface AnalysisSnapshot {
  ts: number;                       // ms epoch of the cycle
  sentiment: MarketSentiment;
  riskScore: number | null;
  altseasonScore: number | null;
}
