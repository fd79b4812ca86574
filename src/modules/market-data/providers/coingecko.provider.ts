/**
 * CoinGecko Spot Price Provider
 *
 * Endpoint: https://api.coingecko.com/api/v3/simple/price
 */

import axios from 'axios';
import { errorMessage } from '../../../common/errors.js';
import type { ProviderResult } from '../market-data.types.js';

const COINGECKO_PRICE_URL = 'https://api.coingecko.com/api/v3/simple/price';

type SimplePriceResponse = Record<string, { usd?: number } | undefined>;

/** USD quotes keyed by CoinGecko id; ids without a usable quote are listed as missing. */
export async function fetchSpotPrices(ids: readonly string[]): Promise<ProviderResult<Record<string, number>>> {
  if (ids.length === 0) return { data: {}, quality: { mode: 'LIVE', missing: [] } };

  try {
    const startMs = Date.now();
    const response = await axios.get<SimplePriceResponse>(COINGECKO_PRICE_URL, {
      timeout: 15000,
      params: { ids: ids.join(','), vs_currencies: 'usd' },
      headers: { Accept: 'application/json' },
    });
    const latencyMs = Date.now() - startMs;

    const prices: Record<string, number> = {};
    const missing: string[] = [];
    for (const id of ids) {
      const usd = response.data?.[id]?.usd;
      if (usd !== undefined && Number.isFinite(usd) && usd > 0) prices[id] = usd;
      else missing.push(id);
    }

    return {
      data: prices,
      quality: { mode: missing.length === ids.length ? 'NO_DATA' : 'LIVE', latencyMs, missing },
    };
  } catch (error) {
    if (axios.isAxiosError(error) && error.response?.status === 429) {
      console.warn('[CoinGecko] Rate limited on simple/price');
    } else {
      console.error('[CoinGecko] Price fetch error:', errorMessage(error));
    }
    return { data: null, quality: { mode: 'NO_DATA', missing: [...ids] } };
  }
}
