/**
 * Market Dominance Provider
 * Source: CoinGecko API (public, rate limited)
 *
 * Endpoint: https://api.coingecko.com/api/v3/global
 */

import axios from 'axios';
import { errorMessage } from '../../../common/errors.js';
import type { DominanceReading, ProviderResult } from '../market-data.types.js';

const COINGECKO_GLOBAL_URL = 'https://api.coingecko.com/api/v3/global';
const CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

interface CoinGeckoGlobalResponse {
  data: {
    market_cap_percentage: {
      btc?: number;
      eth?: number;
      [key: string]: number | undefined;
    };
    updated_at: number;
  };
}

// In-memory cache
let cachedDominance: DominanceReading | null = null;
let cacheTimestamp = 0;

function degraded(latencyMs?: number): ProviderResult<DominanceReading> {
  return {
    data: cachedDominance,
    quality: { mode: cachedDominance ? 'DEGRADED' : 'NO_DATA', latencyMs, missing: ['dominance'] },
  };
}

export async function fetchDominance(): Promise<ProviderResult<DominanceReading>> {
  const now = Date.now();

  if (cachedDominance && now - cacheTimestamp < CACHE_TTL_MS) {
    return {
      data: cachedDominance,
      quality: {
        mode: 'CACHED',
        ttlSec: Math.floor((CACHE_TTL_MS - (now - cacheTimestamp)) / 1000),
        missing: [],
      },
    };
  }

  try {
    const startMs = Date.now();
    const response = await axios.get<CoinGeckoGlobalResponse>(COINGECKO_GLOBAL_URL, {
      timeout: 15000,
      headers: { Accept: 'application/json' },
    });
    const latencyMs = Date.now() - startMs;

    const btcPct = response.data?.data?.market_cap_percentage?.btc;
    if (btcPct === undefined || !Number.isFinite(btcPct) || btcPct < 0 || btcPct > 100) {
      return degraded(latencyMs);
    }

    const ethPct = response.data.data.market_cap_percentage.eth;
    const reading: DominanceReading = {
      btcPct,
      ethPct: ethPct !== undefined && Number.isFinite(ethPct) ? ethPct : null,
      timestamp: response.data.data.updated_at * 1000,
    };

    cachedDominance = reading;
    cacheTimestamp = now;

    console.log(`[Dominance] Fetched: BTC=${btcPct.toFixed(2)}%, latency=${latencyMs}ms`);

    return {
      data: reading,
      quality: { mode: 'LIVE', latencyMs, ttlSec: Math.floor(CACHE_TTL_MS / 1000), missing: [] },
    };
  } catch (error) {
    if (axios.isAxiosError(error) && error.response?.status === 429) {
      console.warn('[Dominance] Rate limited by CoinGecko, using cache');
    } else {
      console.error('[Dominance] Fetch error:', errorMessage(error));
    }
    return degraded();
  }
}

// Clear cache (for testing)
export function clearDominanceCache(): void {
  cachedDominance = null;
  cacheTimestamp = 0;
}
