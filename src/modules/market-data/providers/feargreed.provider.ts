/**
 * Fear & Greed Index Provider
 * Source: Alternative.me API (public, no key required)
 *
 * Endpoint: https://api.alternative.me/fng/
 */

import axios from 'axios';
import { errorMessage } from '../../../common/errors.js';
import type { FearGreedReading, ProviderResult } from '../market-data.types.js';

const ALTERNATIVE_ME_URL = 'https://api.alternative.me/fng/';
const CACHE_TTL_MS = 5 * 60 * 1000; // 5 minutes

interface AlternativeMeResponse {
  name: string;
  data: Array<{
    value: string;
    value_classification: string;
    timestamp: string;
  }>;
  metadata: {
    error: null | string;
  };
}

// In-memory cache
let cachedData: FearGreedReading | null = null;
let cacheTimestamp = 0;

function degraded(latencyMs?: number): ProviderResult<FearGreedReading> {
  return {
    data: cachedData,
    quality: { mode: cachedData ? 'DEGRADED' : 'NO_DATA', latencyMs, missing: ['fearGreed'] },
  };
}

export async function fetchFearGreed(): Promise<ProviderResult<FearGreedReading>> {
  const now = Date.now();

  if (cachedData && now - cacheTimestamp < CACHE_TTL_MS) {
    return {
      data: cachedData,
      quality: {
        mode: 'CACHED',
        ttlSec: Math.floor((CACHE_TTL_MS - (now - cacheTimestamp)) / 1000),
        missing: [],
      },
    };
  }

  try {
    const startMs = Date.now();
    const response = await axios.get<AlternativeMeResponse>(ALTERNATIVE_ME_URL, {
      timeout: 10000,
      params: { limit: 1 },
    });
    const latencyMs = Date.now() - startMs;

    if (response.data?.metadata?.error) {
      console.error('[FearGreed] API error:', response.data.metadata.error);
      return degraded(latencyMs);
    }

    const today = response.data?.data?.[0];
    if (!today) return degraded(latencyMs);

    const value = parseInt(today.value, 10);
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      console.error(`[FearGreed] Value out of range: ${today.value}`);
      return degraded(latencyMs);
    }

    const reading: FearGreedReading = {
      value,
      classification: today.value_classification,
      timestamp: parseInt(today.timestamp, 10) * 1000,
    };

    cachedData = reading;
    cacheTimestamp = now;

    console.log(`[FearGreed] Fetched: ${value} (${reading.classification}), latency=${latencyMs}ms`);

    return {
      data: reading,
      quality: { mode: 'LIVE', latencyMs, ttlSec: Math.floor(CACHE_TTL_MS / 1000), missing: [] },
    };
  } catch (error) {
    console.error('[FearGreed] Fetch error:', errorMessage(error));
    return degraded();
  }
}

// Clear cache (for testing)
export function clearFearGreedCache(): void {
  cachedData = null;
  cacheTimestamp = 0;
}
