import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockGet } = vi.hoisted(() => ({ mockGet: vi.fn() }));

vi.mock('axios', () => ({
  default: { get: mockGet, isAxiosError: () => false },
}));

import { LiveMarketDataService } from '../market-data.service.js';
import { clearFearGreedCache } from '../providers/feargreed.provider.js';
import { clearDominanceCache } from '../providers/dominance.provider.js';
import { clearBinanceCache } from '../providers/binance.provider.js';
import { AppError } from '../../../common/errors.js';

const FNG = 'https://api.alternative.me/fng/';
const GLOBAL = 'https://api.coingecko.com/api/v3/global';
const TICKER = 'https://api.binance.com/api/v3/ticker/price';

function routes(table: Record<string, unknown>): void {
  mockGet.mockImplementation(async (url: string) => {
    const body = table[url];
    if (body === undefined) throw new Error(`unexpected GET ${url}`);
    return { data: body };
  });
}

describe('LiveMarketDataService', () => {
  let service: LiveMarketDataService;

  beforeEach(() => {
    mockGet.mockReset();
    clearFearGreedCache();
    clearDominanceCache();
    clearBinanceCache();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    service = new LiveMarketDataService();
  });

  it('should assemble sentiment from the three providers', async () => {
    routes({
      [FNG]: { name: 'fng', data: [{ value: '64', value_classification: 'Greed', timestamp: '1717200000' }], metadata: { error: null } },
      [GLOBAL]: { data: { market_cap_percentage: { btc: 54.2, eth: 16.8 }, updated_at: 1_717_200_000 } },
      [TICKER]: { symbol: 'ETHBTC', price: '0.0550' },
    });

    const sentiment = await service.getSentiment();

    expect(sentiment.fearGreed).toBe(64);
    expect(sentiment.btcDominance).toBe(54.2);
    expect(sentiment.ethBtcRatio).toBe(0.055);
    expect(typeof sentiment.ts).toBe('number');
  });

  it('should leave a field null when its provider fails', async () => {
    routes({
      [GLOBAL]: { data: { market_cap_percentage: { btc: 54.2 }, updated_at: 1_717_200_000 } },
      [TICKER]: { symbol: 'ETHBTC', price: '0.0550' },
    });

    const sentiment = await service.getSentiment();

    expect(sentiment.fearGreed).toBeNull();
    expect(sentiment.btcDominance).toBe(54.2);
  });

  it('should reject with MARKET_DATA_UNAVAILABLE when an asset has no candles', async () => {
    mockGet.mockResolvedValueOnce({ data: [] });

    const error = await service.getPriceSeries({ assetId: 'pepe', symbol: 'PEPE' }, 400).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error instanceof AppError && error.code).toBe('MARKET_DATA_UNAVAILABLE');
    expect(error instanceof AppError && error.message).toBe('No daily candles for pepe (PEPEUSDT)');
  });

  it('should return an empty quote map when the price API fails', async () => {
    mockGet.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(service.getSpotPrices(['bitcoin'])).resolves.toEqual({});
  });
});
