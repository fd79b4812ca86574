/**
 * MARKET DATA SERVICE
 * ===================
 *
 * Live MarketDataPort over the public providers:
 *   price series  → Binance daily klines
 *   fear & greed  → Alternative.me
 *   dominance     → CoinGecko global
 *   ETH/BTC       → Binance ETHBTC ticker
 *   spot prices   → CoinGecko simple/price
 */

import { AppError } from '../../common/errors.js';
import type { MarketSentiment } from '../../contracts/market.types.js';
import type { PriceSeries } from '../indicators/indicator.types.js';
import type { MarketDataPort } from './market-data.port.js';
import type { AssetRef } from './market-data.types.js';
import { fetchDailyKlines, fetchTickerPrice, toBinancePair } from './providers/binance.provider.js';
import { fetchSpotPrices } from './providers/coingecko.provider.js';
import { fetchDominance } from './providers/dominance.provider.js';
import { fetchFearGreed } from './providers/feargreed.provider.js';

const ETH_BTC_PAIR = 'ETHBTC';

export class LiveMarketDataService implements MarketDataPort {
  async getPriceSeries(asset: AssetRef, lookback: number): Promise<PriceSeries> {
    const pair = toBinancePair(asset.symbol);
    const result = await fetchDailyKlines(pair, lookback);
    if (!result.data || result.data.length === 0) {
      throw new AppError('MARKET_DATA_UNAVAILABLE', `No daily candles for ${asset.assetId} (${pair})`, 502);
    }
    return result.data;
  }

  async getSentiment(): Promise<MarketSentiment> {
    const [fearGreed, dominance, ethBtc] = await Promise.all([
      fetchFearGreed(),
      fetchDominance(),
      fetchTickerPrice(ETH_BTC_PAIR),
    ]);

    return {
      fearGreed: fearGreed.data?.value ?? null,
      btcDominance: dominance.data?.btcPct ?? null,
      ethBtcRatio: ethBtc.data,
      ts: Date.now(),
    };
  }

  async getSpotPrices(assetIds: readonly string[]): Promise<Record<string, number>> {
    const result = await fetchSpotPrices(assetIds);
    return result.data ?? {};
  }
}
