/**
 * Price series validation.
 *
 * Rejects the whole series on the first defect; nothing is coerced.
 */

import { InvalidInputError } from '../../common/errors.js';
import type { PriceSeries } from './indicator.types.js';

const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const;

export function validateSeries(series: PriceSeries, assetId?: string): void {
  let prevTs = -Infinity;

  for (let i = 0; i < series.length; i++) {
    const p = series[i];

    if (!Number.isFinite(p.ts)) {
      throw new InvalidInputError(`point ${i} has a non-finite timestamp`, assetId);
    }
    if (p.ts <= prevTs) {
      throw new InvalidInputError(`timestamps not strictly increasing at point ${i}`, assetId);
    }
    prevTs = p.ts;

    for (const field of PRICE_FIELDS) {
      const v = p[field];
      if (!Number.isFinite(v)) {
        throw new InvalidInputError(`point ${i} has non-finite ${field}`, assetId);
      }
      if (v <= 0) {
        throw new InvalidInputError(`point ${i} has non-positive ${field}`, assetId);
      }
    }

    if (!Number.isFinite(p.volume) || p.volume < 0) {
      throw new InvalidInputError(`point ${i} has invalid volume`, assetId);
    }
  }
}

/** Finite-number guard for bare close arrays handed to the calculators. */
export function assertFiniteValues(values: readonly number[], label: string): void {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) {
      throw new InvalidInputError(`${label}[${i}] is not a finite number`);
    }
  }
}
