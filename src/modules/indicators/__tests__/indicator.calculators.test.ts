import { describe, it, expect } from 'vitest';
import {
  computeRsi,
  computeMacd,
  computeSma,
  detectMaCrossover,
  computeBollinger,
  computeStochastic,
} from '../indicator.calculators.js';
import { InvalidInputError } from '../../../common/errors.js';
import { flatCloses, linearCloses } from '../../../__tests__/helpers/series.fixture.js';

describe('computeRsi', () => {
  it('should read 50 for a perfectly flat series', () => {
    expect(computeRsi(flatCloses(30))).toEqual({ status: 'PRESENT', value: 50 });
  });

  it('should read 100 for a strictly rising series', () => {
    expect(computeRsi(linearCloses(30))).toEqual({ status: 'PRESENT', value: 100 });
  });

  it('should read 0 for a strictly falling series', () => {
    expect(computeRsi(linearCloses(30, 200, -1))).toEqual({ status: 'PRESENT', value: 0 });
  });

  it('should stay within [0, 100] for a noisy series', () => {
    const closes = Array.from({ length: 120 }, (_, i) => 100 + 10 * Math.sin(i / 3) + (i % 7));
    const rsi = computeRsi(closes);
    expect(rsi.status).toBe('PRESENT');
    if (rsi.status === 'PRESENT') {
      expect(rsi.value).toBeGreaterThanOrEqual(0);
      expect(rsi.value).toBeLessThanOrEqual(100);
    }
  });

  it('should be ABSENT with period points or fewer', () => {
    expect(computeRsi(linearCloses(14))).toEqual({
      status: 'ABSENT',
      reason: 'RSI(14) needs 15 points',
      code: 'INSUFFICIENT_DATA',
      required: 15,
      actual: 14,
    });
  });

  it('should reject non-finite input', () => {
    expect(() => computeRsi([...linearCloses(20), Number.NaN])).toThrow(InvalidInputError);
    expect(() => computeRsi([Number.POSITIVE_INFINITY, ...linearCloses(20)])).toThrow(
      'closes[0] is not a finite number'
    );
  });
});

describe('computeMacd', () => {
  it('should be ABSENT before the signal line forms', () => {
    const macd = computeMacd(linearCloses(33));
    expect(macd.status).toBe('ABSENT');
    if (macd.status === 'ABSENT') {
      expect(macd.required).toBe(34);
      expect(macd.actual).toBe(33);
    }
  });

  it('should report histogram as macd minus signal', () => {
    const macd = computeMacd(linearCloses(60, 100, 2));
    expect(macd.status).toBe('PRESENT');
    if (macd.status === 'PRESENT') {
      expect(macd.value.macd).toBeGreaterThan(0);
      expect(macd.value.histogram).toBeCloseTo(macd.value.macd - macd.value.signal, 6);
    }
  });

  it('should report no crossover on a flat series', () => {
    const macd = computeMacd(flatCloses(60));
    expect(macd).toEqual({ status: 'PRESENT', value: { macd: 0, signal: 0, histogram: 0, crossover: 'NONE' } });
  });

  it('should detect a bullish crossover when price jumps on the last point', () => {
    const macd = computeMacd([...flatCloses(60), 110]);
    expect(macd.status === 'PRESENT' && macd.value.crossover).toBe('BULLISH_CROSS');
  });

  it('should detect a bearish crossover when price drops on the last point', () => {
    const macd = computeMacd([...flatCloses(60), 90]);
    expect(macd.status === 'PRESENT' && macd.value.crossover).toBe('BEARISH_CROSS');
  });
});

describe('computeSma', () => {
  it('should average the trailing window', () => {
    expect(computeSma([1, 2, 3, 4, 5], 2)).toEqual({ status: 'PRESENT', value: 4.5 });
  });

  it('should be ABSENT when shorter than the period', () => {
    expect(computeSma([1, 2], 3).status).toBe('ABSENT');
  });
});

describe('detectMaCrossover', () => {
  it('should detect a golden cross on the last point', () => {
    const ma = detectMaCrossover([4, 4, 4, 4, 1, 9], 2, 4);
    expect(ma).toEqual({ status: 'PRESENT', value: { short: 5, long: 4.5, crossover: 'GOLDEN_CROSS' } });
  });

  it('should detect a death cross on the last point', () => {
    const ma = detectMaCrossover([4, 4, 4, 4, 6, 0.5], 2, 4);
    expect(ma.status).toBe('PRESENT');
    if (ma.status === 'PRESENT') {
      expect(ma.value.crossover).toBe('DEATH_CROSS');
      expect(ma.value.short).toBe(3.25);
      expect(ma.value.long).toBe(3.625);
    }
  });

  it('should report NONE when the averages never cross', () => {
    const ma = detectMaCrossover(flatCloses(10), 2, 4);
    expect(ma.status === 'PRESENT' && ma.value.crossover).toBe('NONE');
  });

  it('should need long + 1 points', () => {
    const ma = detectMaCrossover(linearCloses(200));
    expect(ma.status).toBe('ABSENT');
    if (ma.status === 'ABSENT') expect(ma.required).toBe(201);
  });
});

describe('computeBollinger', () => {
  it('should collapse the bands on a flat series', () => {
    expect(computeBollinger(flatCloses(25, 50))).toEqual({
      status: 'PRESENT',
      value: { upper: 50, middle: 50, lower: 50 },
    });
  });
});

describe('computeStochastic', () => {
  it('should need period + signal - 1 points', () => {
    const flat = flatCloses(15);
    expect(computeStochastic(flat, flat, flat)).toEqual({
      status: 'ABSENT',
      reason: 'Stochastic(14,3) needs 16 points',
      code: 'INSUFFICIENT_DATA',
      required: 16,
      actual: 15,
    });
  });

  it('should form %D as soon as the window requirement is met', () => {
    const high = [10, 12, 14, 16];
    const low = [8, 9, 10, 11];
    const close = [9, 11, 13, 12];

    const stoch = computeStochastic(high, low, close, 3, 2);

    expect(stoch.status).toBe('PRESENT');
    if (stoch.status !== 'PRESENT') return;
    // windows end at 13 (range 8..14) and 12 (range 9..16)
    expect(stoch.value.k).toBeCloseTo(300 / 7, 9);
    expect(stoch.value.d).toBeCloseTo((250 / 3 + 300 / 7) / 2, 9);
  });

  it('should read 50 for a window with no range', () => {
    const flat = flatCloses(16);
    expect(computeStochastic(flat, flat, flat)).toEqual({ status: 'PRESENT', value: { k: 50, d: 50 } });
  });

  it('should average a flat last window as 50 into %D', () => {
    const stoch = computeStochastic([14, 10, 10, 10], [8, 10, 10, 10], [11, 10, 10, 10], 3, 2);

    expect(stoch.status).toBe('PRESENT');
    if (stoch.status !== 'PRESENT') return;
    expect(stoch.value.k).toBe(50);
    expect(stoch.value.d).toBeCloseTo((100 / 3 + 50) / 2, 9);
  });
});
