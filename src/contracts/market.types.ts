/**
 * MARKET CONTRACTS
 * ================
 *
 * Shapes exchanged between the data collaborators and the scoring engine.
 * A null field means the collaborator could not supply it this cycle.
 */

import type { SentimentField } from '../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// SENTIMENT
// ═══════════════════════════════════════════════════════════════

export interface MarketSentiment {
  fearGreed: number | null;     // 0..100 integer
  btcDominance: number | null;  // % of total market cap
  ethBtcRatio: number | null;   // ETH price in BTC
  ts: number | null;            // ms epoch of the reading
}

export const EMPTY_SENTIMENT: MarketSentiment = Object.freeze({
  fearGreed: null,
  btcDominance: null,
  ethBtcRatio: null,
  ts: null,
});

const SENTIMENT_RANGES: Readonly<Record<SentimentField, (v: number) => boolean>> = {
  fearGreed: (v) => v >= 0 && v <= 100,
  btcDominance: (v) => v >= 0 && v <= 100,
  ethBtcRatio: (v) => v > 0,
};

export function inSentimentRange(field: SentimentField, v: number): boolean {
  return Number.isFinite(v) && SENTIMENT_RANGES[field](v);
}

/** The field when present and in range; out-of-range readings count as missing. */
export function sentimentValue(sentiment: MarketSentiment, field: SentimentField): number | null {
  const v = sentiment[field];
  return v !== null && inSentimentRange(field, v) ? v : null;
}

// ═══════════════════════════════════════════════════════════════
// PORTFOLIO
// ═══════════════════════════════════════════════════════════════

export interface Holding {
  assetId: string;              // CoinGecko-style id, e.g. "solana"
  symbol: string;               // display ticker, e.g. "SOL"
  quantity: number;
  avgBuyPrice: number;          // USD
  currentPrice: number | null;  // USD, null when no quote
}

export interface Targets {
  targetBtc: number;
  targetEth: number;
}

/** A holding as configured, before it is priced. */
export type Position = Omit<Holding, 'currentPrice'>;

export interface PortfolioDefinition {
  holdings: Position[];
  targets: Targets;
}
