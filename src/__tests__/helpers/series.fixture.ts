/**
 * Synthetic daily price series for tests.
 */

import type { PricePoint } from '../../modules/indicators/indicator.types.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_TS = Date.UTC(2024, 0, 1);

export function seriesFromCloses(closes: readonly number[], startTs = START_TS): PricePoint[] {
  return closes.map((close, i) => ({
    ts: startTs + i * DAY_MS,
    open: close,
    high: close * 1.01,
    low: close * 0.99,
    close,
    volume: 1000,
  }));
}

export function linearCloses(count: number, start = 100, step = 1): number[] {
  return Array.from({ length: count }, (_, i) => start + i * step);
}

export function flatCloses(count: number, value = 100): number[] {
  return Array.from({ length: count }, () => value);
}

/** `value` repeated `count` times, concatenated in order. */
export function steps(...parts: Array<[value: number, count: number]>): number[] {
  return parts.flatMap(([value, count]) => flatCloses(count, value));
}
