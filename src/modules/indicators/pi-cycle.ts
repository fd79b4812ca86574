/**
 * PI CYCLE TOP
 * ============
 *
 * ratio = SMA(111) / (2 × SMA(350)). The indicator "fires" when the ratio
 * crosses from below 1 to at or above 1. It cannot fire again until the
 * ratio has dropped back below 1.
 */

import { InsufficientDataError } from '../../common/errors.js';
import { absent, absentFrom, present, type Reading } from '../../common/reading.js';
import { assertFiniteValues } from './series.validator.js';
import { smaSeries } from './indicator.calculators.js';
import type { PiCycleValue } from './indicator.types.js';

const TRIGGER = 1;

/**
 * Ratio series aligned to the end of `closes`: element j belongs to
 * closes[j + longPeriod - 1].
 */
export function piCycleRatioSeries(
  closes: readonly number[],
  shortPeriod = 111,
  longPeriod = 350
): number[] {
  if (closes.length < longPeriod) return [];
  const shortMa = smaSeries(closes, shortPeriod);
  const longMa = smaSeries(closes, longPeriod);
  const offset = longPeriod - shortPeriod;
  return longMa.map((l, j) => shortMa[j + offset] / (2 * l));
}

/**
 * Indexes into `closes` where the ratio crossed up through the trigger.
 * Consecutive points above the trigger do not retrigger.
 */
export function findPiCycleTriggers(
  closes: readonly number[],
  shortPeriod = 111,
  longPeriod = 350
): number[] {
  assertFiniteValues(closes, 'closes');
  const ratios = piCycleRatioSeries(closes, shortPeriod, longPeriod);
  const triggers: number[] = [];
  for (let j = 1; j < ratios.length; j++) {
    if (ratios[j - 1] < TRIGGER && ratios[j] >= TRIGGER) {
      triggers.push(j + longPeriod - 1);
    }
  }
  return triggers;
}

export function computePiCycle(
  closes: readonly number[],
  shortPeriod = 111,
  longPeriod = 350
): Reading<PiCycleValue> {
  assertFiniteValues(closes, 'closes');
  if (closes.length < longPeriod) {
    return absentFrom(new InsufficientDataError('Pi Cycle', longPeriod, closes.length));
  }

  const shortMa = smaSeries(closes, shortPeriod);
  const longMa = smaSeries(closes, longPeriod);
  const ma111 = shortMa[shortMa.length - 1];
  const ma350x2 = 2 * longMa[longMa.length - 1];
  const ratio = ma111 / ma350x2;

  if (!Number.isFinite(ratio)) {
    return absent('Pi Cycle ratio undefined for this series');
  }

  let crossedUp = false;
  if (longMa.length >= 2) {
    const prevRatio = shortMa[shortMa.length - 2] / (2 * longMa[longMa.length - 2]);
    crossedUp = prevRatio < TRIGGER && ratio >= TRIGGER;
  }

  return present({
    ma111,
    ma350x2,
    ratio,
    aboveTrigger: ratio >= TRIGGER,
    crossedUp,
  });
}
