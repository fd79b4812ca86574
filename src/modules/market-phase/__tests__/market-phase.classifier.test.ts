import { describe, it, expect } from 'vitest';
import { classifyMarketPhase } from '../market-phase.classifier.js';
import { actionText } from '../../advisor/advisory.labels.js';
import type { MarketSentiment } from '../../../contracts/market.types.js';

function sentiment(fearGreed: number | null, btcDominance: number | null, ethBtcRatio: number | null = 0.05): MarketSentiment {
  return { fearGreed, btcDominance, ethBtcRatio, ts: null };
}

describe('classifyMarketPhase', () => {
  it('should yield CAPITULATION for F&G 15 and dominance 65', () => {
    const result = classifyMarketPhase(sentiment(15, 65));
    expect(result.phase).toBe('CAPITULATION');
    expect(result.rule).toBe(1);
    expect(result.degraded).toBe(false);
  });

  it('should recommend aggressive accumulation at F&G 8 and dominance 62', () => {
    const result = classifyMarketPhase(sentiment(8, 62));
    expect(result.phase).toBe('CAPITULATION');
    expect(result.action).toBe('AGGRESSIVE_ACCUMULATION');
    expect(actionText(result.action)).toBe('aggressive accumulation');
  });

  it.each([
    [25, 58, 0.05, 'BUY_ZONE'],
    [85, 42, 0.05, 'EUPHORIA_RISK'],
    [78, 50, 0.05, 'SELL_ZONE'],
    [50, 44, 0.075, 'ALTSEASON_ACTIVE'],
    [33, 50, 0.05, 'FEAR'],
    [66, 50, 0.05, 'GREED'],
    [50, 50, 0.05, 'NEUTRAL'],
  ])('should classify F&G %d, dominance %d, ratio %s as %s', (fg, dom, ratio, phase) => {
    expect(classifyMarketPhase(sentiment(fg, dom, ratio)).phase).toBe(phase);
  });

  it('should apply rules in priority order', () => {
    // Matches both EUPHORIA_RISK (3) and SELL_ZONE (4) and GREED (7)
    expect(classifyMarketPhase(sentiment(90, 40, 0.09)).phase).toBe('EUPHORIA_RISK');
    // Matches SELL_ZONE (4) before ALTSEASON_ACTIVE (5)
    expect(classifyMarketPhase(sentiment(76, 46, 0.09)).phase).toBe('SELL_ZONE');
    // Fear at 20 with low dominance skips CAPITULATION and BUY_ZONE
    expect(classifyMarketPhase(sentiment(20, 50)).phase).toBe('FEAR');
  });

  it('should fall through to NEUTRAL when every input is missing', () => {
    expect(classifyMarketPhase(sentiment(null, null, null))).toEqual({
      phase: 'NEUTRAL',
      action: 'HOLD',
      rule: 8,
      missing: ['fearGreed', 'btcDominance', 'ethBtcRatio'],
      degraded: true,
    });
  });

  it('should still apply fear & greed rules when dominance is missing', () => {
    const result = classifyMarketPhase(sentiment(10, null));
    expect(result.phase).toBe('FEAR');
    expect(result.missing).toEqual(['btcDominance']);
    expect(result.degraded).toBe(true);
  });

  it('should still detect altseason when fear & greed is missing', () => {
    const result = classifyMarketPhase(sentiment(null, 40, 0.08));
    expect(result.phase).toBe('ALTSEASON_ACTIVE');
    expect(result.missing).toEqual(['fearGreed']);
  });

  it('should treat an out-of-range fear & greed reading as missing', () => {
    const result = classifyMarketPhase(sentiment(150, 40, 0.08));
    expect(result.phase).toBe('ALTSEASON_ACTIVE');
    expect(result.missing).toEqual(['fearGreed']);
    expect(result.degraded).toBe(true);
  });

  it('should treat out-of-range dominance and ratio as missing', () => {
    expect(classifyMarketPhase(sentiment(50, 120, -0.05))).toEqual({
      phase: 'NEUTRAL',
      action: 'HOLD',
      rule: 8,
      missing: ['btcDominance', 'ethBtcRatio'],
      degraded: true,
    });
  });
});
