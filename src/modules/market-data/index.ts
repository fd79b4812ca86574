export * from './market-data.types.js';
export type { MarketDataPort } from './market-data.port.js';
export { LiveMarketDataService } from './market-data.service.js';
export { fetchFearGreed, clearFearGreedCache } from './providers/feargreed.provider.js';
export { fetchDominance, clearDominanceCache } from './providers/dominance.provider.js';
export { fetchDailyKlines, fetchTickerPrice, clearBinanceCache, toBinancePair } from './providers/binance.provider.js';
export { fetchSpotPrices } from './providers/coingecko.provider.js';
