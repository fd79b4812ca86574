import { describe, it, expect } from 'vitest';
import { buildIndicatorSnapshot } from '../indicator-snapshot.service.js';
import { validateSeries } from '../series.validator.js';
import { InvalidInputError } from '../../../common/errors.js';
import { DEFAULT_ENGINE_CONFIG } from '../../../config/engine.config.js';
import { linearCloses, seriesFromCloses, START_TS } from '../../../__tests__/helpers/series.fixture.js';

const cfg = DEFAULT_ENGINE_CONFIG.indicators;

describe('buildIndicatorSnapshot', () => {
  it('should compute every indicator with a full history', () => {
    const series = seriesFromCloses(linearCloses(400));
    const snap = buildIndicatorSnapshot('bitcoin', series, cfg);

    expect(snap.assetId).toBe('bitcoin');
    expect(snap.points).toBe(400);
    expect(snap.ts).toBe(series[399].ts);
    expect(snap.lastClose).toEqual({ status: 'PRESENT', value: 499 });
    expect(snap.rsi).toEqual({ status: 'PRESENT', value: 100 });
    expect(snap.rci).toEqual({ status: 'PRESENT', value: { short: 100, medium: 100, long: 100 } });
    expect(snap.piCycle.status).toBe('PRESENT');
    expect(snap.macd.status).toBe('PRESENT');
    expect(snap.movingAverages.status).toBe('PRESENT');
    expect(snap.bollinger.status).toBe('PRESENT');
    expect(snap.stochastic.status).toBe('PRESENT');
  });

  it('should leave long-window indicators ABSENT on a short history', () => {
    const snap = buildIndicatorSnapshot('bitcoin', seriesFromCloses(linearCloses(100)), cfg);

    expect(snap.piCycle).toEqual({
      status: 'ABSENT',
      reason: 'Pi Cycle needs 350 points',
      code: 'INSUFFICIENT_DATA',
      required: 350,
      actual: 100,
    });
    expect(snap.movingAverages.status).toBe('ABSENT');
    expect(snap.rsi.status).toBe('PRESENT');
    expect(snap.rci.status).toBe('PRESENT');
  });

  it('should mark everything ABSENT for an empty series', () => {
    const snap = buildIndicatorSnapshot('ethereum', [], cfg);
    expect(snap.ts).toBeNull();
    expect(snap.points).toBe(0);
    expect(snap.lastClose.status).toBe('ABSENT');
    expect(snap.rsi.status).toBe('ABSENT');
  });

  it('should be frozen', () => {
    const snap = buildIndicatorSnapshot('bitcoin', seriesFromCloses(linearCloses(20)), cfg);
    expect(Object.isFrozen(snap)).toBe(true);
  });

  it('should reject a malformed series with the asset id', () => {
    const series = seriesFromCloses(linearCloses(20));
    series[5] = { ...series[5], ts: series[4].ts };
    expect(() => buildIndicatorSnapshot('solana', series, cfg)).toThrow(
      'solana: timestamps not strictly increasing at point 5'
    );
  });
});

describe('validateSeries', () => {
  const point = { ts: START_TS, open: 1, high: 1, low: 1, close: 1, volume: 0 };

  it('should accept a well-formed series', () => {
    expect(() => validateSeries(seriesFromCloses(linearCloses(10)))).not.toThrow();
  });

  it('should reject non-positive prices', () => {
    expect(() => validateSeries([{ ...point, low: 0 }])).toThrow('point 0 has non-positive low');
  });

  it('should reject non-finite prices', () => {
    expect(() => validateSeries([{ ...point, close: Number.NaN }])).toThrow(InvalidInputError);
  });

  it('should reject negative volume', () => {
    expect(() => validateSeries([{ ...point, volume: -1 }])).toThrow('point 0 has invalid volume');
  });
});
