/**
 * Binance Spot Provider
 * Daily klines for price series, ticker price for ETH/BTC.
 *
 * Endpoints: /api/v3/klines, /api/v3/ticker/price (public, no key required)
 */

import axios from 'axios';
import { errorMessage } from '../../../common/errors.js';
import type { PricePoint } from '../../indicators/indicator.types.js';
import type { ProviderResult } from '../market-data.types.js';

const BINANCE_API = 'https://api.binance.com';
const MAX_CANDLES_PER_REQUEST = 1000;
const KLINES_CACHE_TTL_MS = 10 * 60 * 1000;   // 10 minutes
const TICKER_CACHE_TTL_MS = 60 * 1000;        // 1 minute

/** [openTime, open, high, low, close, volume, closeTime, ...] */
type BinanceKline = [number, string, string, string, string, string, number, ...unknown[]];

interface BinanceTickerPrice {
  symbol: string;
  price: string;
}

interface CacheEntry<T> {
  data: T;
  at: number;
}

const klinesCache = new Map<string, CacheEntry<PricePoint[]>>();
const tickerCache = new Map<string, CacheEntry<number>>();

export function toBinancePair(symbol: string): string {
  return `${symbol.toUpperCase()}USDT`;
}

/** Closed candles only; the still-open daily candle is dropped. */
export function parseKlines(rows: readonly BinanceKline[], now: number): PricePoint[] {
  const points: PricePoint[] = [];
  for (const row of rows) {
    if (row[6] > now) continue;
    points.push({
      ts: row[0],
      open: parseFloat(row[1]),
      high: parseFloat(row[2]),
      low: parseFloat(row[3]),
      close: parseFloat(row[4]),
      volume: parseFloat(row[5]),
    });
  }
  return points;
}

export async function fetchDailyKlines(pair: string, limit: number): Promise<ProviderResult<PricePoint[]>> {
  const now = Date.now();
  const key = `${pair}:${limit}`;
  const cached = klinesCache.get(key);

  if (cached && now - cached.at < KLINES_CACHE_TTL_MS) {
    return {
      data: cached.data,
      quality: { mode: 'CACHED', ttlSec: Math.floor((KLINES_CACHE_TTL_MS - (now - cached.at)) / 1000), missing: [] },
    };
  }

  try {
    const startMs = Date.now();
    // +1 for the open candle that parseKlines drops
    const response = await axios.get<BinanceKline[]>(`${BINANCE_API}/api/v3/klines`, {
      timeout: 15000,
      params: { symbol: pair, interval: '1d', limit: Math.min(limit + 1, MAX_CANDLES_PER_REQUEST) },
    });
    const latencyMs = Date.now() - startMs;

    const rows = Array.isArray(response.data) ? response.data : [];
    const points = parseKlines(rows, now).slice(-limit);
    if (points.length === 0) {
      return {
        data: cached?.data ?? null,
        quality: { mode: cached ? 'DEGRADED' : 'NO_DATA', latencyMs, missing: [pair] },
      };
    }

    klinesCache.set(key, { data: points, at: now });
    console.log(`[Binance] Fetched ${points.length} candles for ${pair}, latency=${latencyMs}ms`);

    return {
      data: points,
      quality: { mode: 'LIVE', latencyMs, ttlSec: Math.floor(KLINES_CACHE_TTL_MS / 1000), missing: [] },
    };
  } catch (error) {
    console.error(`[Binance] Klines error for ${pair}:`, errorMessage(error));
    return {
      data: cached?.data ?? null,
      quality: { mode: cached ? 'DEGRADED' : 'NO_DATA', missing: [pair] },
    };
  }
}

export async function fetchTickerPrice(pair: string): Promise<ProviderResult<number>> {
  const now = Date.now();
  const cached = tickerCache.get(pair);

  if (cached && now - cached.at < TICKER_CACHE_TTL_MS) {
    return { data: cached.data, quality: { mode: 'CACHED', missing: [] } };
  }

  try {
    const startMs = Date.now();
    const response = await axios.get<BinanceTickerPrice>(`${BINANCE_API}/api/v3/ticker/price`, {
      timeout: 10000,
      params: { symbol: pair },
    });
    const latencyMs = Date.now() - startMs;

    const price = parseFloat(response.data?.price);
    if (!Number.isFinite(price) || price <= 0) {
      return {
        data: cached?.data ?? null,
        quality: { mode: cached ? 'DEGRADED' : 'NO_DATA', latencyMs, missing: [pair] },
      };
    }

    tickerCache.set(pair, { data: price, at: now });
    return { data: price, quality: { mode: 'LIVE', latencyMs, missing: [] } };
  } catch (error) {
    console.error(`[Binance] Ticker error for ${pair}:`, errorMessage(error));
    return {
      data: cached?.data ?? null,
      quality: { mode: cached ? 'DEGRADED' : 'NO_DATA', missing: [pair] },
    };
  }
}

// Clear caches (for testing)
export function clearBinanceCache(): void {
  klinesCache.clear();
  tickerCache.clear();
}
