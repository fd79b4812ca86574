import type { MarketSentiment } from '../../contracts/market.types.js';
import type { PriceSeries } from '../indicators/indicator.types.js';
import type { AssetRef } from './market-data.types.js';

/**
 * Everything the advisory cycle needs from the market. Implementations
 * degrade instead of throwing where they can: a sentiment field they
 * cannot read is null, a spot price they cannot read is left out.
 */
export interface MarketDataPort {
  /** Daily candles, oldest first. Rejects when the asset has no data at all. */
  getPriceSeries(asset: AssetRef, lookback: number): Promise<PriceSeries>;
  getSentiment(): Promise<MarketSentiment>;
  getSpotPrices(assetIds: readonly string[]): Promise<Record<string, number>>;
}
