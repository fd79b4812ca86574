/**
 * MARKET DATA: Types
 */

export type DataMode = 'LIVE' | 'CACHED' | 'DEGRADED' | 'NO_DATA';

export interface DataQuality {
  mode: DataMode;
  latencyMs?: number;
  ttlSec?: number;
  missing: string[];
}

export interface ProviderResult<T> {
  data: T | null;
  quality: DataQuality;
}

export interface FearGreedReading {
  value: number;            // 0..100
  classification: string;   // upstream label, e.g. "Greed"
  timestamp: number;        // ms
}

export interface DominanceReading {
  btcPct: number;
  ethPct: number | null;
  timestamp: number;        // ms
}

/** Asset as the data layer addresses it: CoinGecko id plus exchange ticker. */
export interface AssetRef {
  assetId: string;
  symbol: string;
}
