/**
 * In-process MarketDataPort for cycle and route tests.
 */

import { AppError } from '../../common/errors.js';
import type { MarketSentiment } from '../../contracts/market.types.js';
import type { PriceSeries } from '../../modules/indicators/indicator.types.js';
import type { MarketDataPort } from '../../modules/market-data/market-data.port.js';
import type { AssetRef } from '../../modules/market-data/market-data.types.js';

export class FakeMarketData implements MarketDataPort {
  readonly requested: string[] = [];

  constructor(
    private readonly series: Record<string, PriceSeries>,
    private readonly sentiment: MarketSentiment | Error,
    private readonly prices: Record<string, number> = {}
  ) {}

  async getPriceSeries(asset: AssetRef, _lookback: number): Promise<PriceSeries> {
    this.requested.push(asset.assetId);
    const s = this.series[asset.assetId];
    if (!s) throw new AppError('MARKET_DATA_UNAVAILABLE', `No daily candles for ${asset.assetId}`, 502);
    return s;
  }

  async getSentiment(): Promise<MarketSentiment> {
    if (this.sentiment instanceof Error) throw this.sentiment;
    return this.sentiment;
  }

  async getSpotPrices(assetIds: readonly string[]): Promise<Record<string, number>> {
    const out: Record<string, number> = {};
    for (const id of assetIds) {
      const p = this.prices[id];
      if (p !== undefined) out[id] = p;
    }
    return out;
  }
}
