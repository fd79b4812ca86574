import { describe, it, expect } from 'vitest';
import { adviseExit, exitTierFor, lowerTier } from '../partial-exit.advisor.js';
import type { ExitInput } from '../partial-exit.types.js';
import type { AltseasonResult } from '../../altseason/altseason.types.js';
import { absent, present } from '../../../common/reading.js';
import { DEFAULT_ENGINE_CONFIG, parseEngineConfig } from '../../../config/engine.config.js';
import { holdingPnl } from '../../portfolio/portfolio-achievement.service.js';
import { snapshotWith, type SnapshotValues } from '../../../__tests__/helpers/snapshot.fixture.js';

const cfg = DEFAULT_ENGINE_CONFIG;

function exitInput(globalRisk: number, pnlPct: number | null, values: SnapshotValues = {}, altScore?: number): ExitInput {
  const currentPrice = pnlPct === null ? null : 100 * (1 + pnlPct / 100);
  return {
    holding: holdingPnl({ assetId: 'solana', symbol: 'SOL', quantity: 10, avgBuyPrice: 100, currentPrice }),
    globalRisk,
    snapshot: snapshotWith(values, 'solana'),
    altseason:
      altScore === undefined
        ? absent('no dominance')
        : present<AltseasonResult>({
            score: altScore,
            state: altScore > 66 ? 'ALTSEASON' : 'TRANSITION',
            dominanceScore: altScore,
            momentumScore: 0,
            ratioChange: null,
          }),
  };
}

describe('exitTierFor', () => {
  it('should map band edges to tiers', () => {
    const bands = cfg.partialExit.bands;
    expect([0, 59, 60, 74, 75, 84, 85, 100].map((s) => exitTierFor(s, bands))).toEqual([
      'NONE', 'NONE', 'LIGHT', 'LIGHT', 'MEDIUM', 'MEDIUM', 'HEAVY', 'HEAVY',
    ]);
  });
});

describe('lowerTier', () => {
  it('should step down and floor at NONE', () => {
    expect(lowerTier('HEAVY', 1)).toBe('MEDIUM');
    expect(lowerTier('LIGHT', 2)).toBe('NONE');
    expect(lowerTier('HEAVY', 'ALL')).toBe('NONE');
  });
});

describe('adviseExit', () => {
  it('should recommend nothing for a losing holding scored 70 below CRITICAL risk', () => {
    const rec = adviseExit(exitInput(70, -20), cfg);
    expect(rec.localScore).toBe(70);
    expect(rec.scoreTier).toBe('LIGHT');
    expect(rec.fractionPct).toBe(0);
    expect(rec.suppressedByLoss).toBe(true);
  });

  it('should keep a losing holding at 0% for any local score below the override', () => {
    const rec = adviseExit(exitInput(84, -5, { rsi: 90 }), cfg);
    expect(rec.localScore).toBe(94);
    expect(rec.fractionPct).toBe(0);
  });

  it('should let CRITICAL global risk override loss suppression', () => {
    const rec = adviseExit(exitInput(85, -20), cfg);
    expect(rec.tier).toBe('HEAVY');
    expect(rec.fractionPct).toBe(50);
    expect(rec.suppressedByLoss).toBe(false);
  });

  it('should drop a single tier when configured to', () => {
    const oneTier = parseEngineConfig({ partialExit: { lossSuppression: { tiers: 1 } } });
    expect(adviseExit(exitInput(80, -10), oneTier).fractionPct).toBe(10);
    expect(adviseExit(exitInput(70, -10), oneTier).fractionPct).toBe(0);
  });

  it('should not suppress when the policy is disabled', () => {
    const off = parseEngineConfig({ partialExit: { lossSuppression: { enabled: false } } });
    expect(adviseExit(exitInput(70, -20), off).fractionPct).toBe(10);
  });

  it('should map a profitable holding straight through the bands', () => {
    expect(adviseExit(exitInput(50, 40), cfg).fractionPct).toBe(0);
    expect(adviseExit(exitInput(60, 40), cfg).fractionPct).toBe(10);
    expect(adviseExit(exitInput(75, 40), cfg).fractionPct).toBe(25);
    expect(adviseExit(exitInput(90, 40), cfg).fractionPct).toBe(50);
  });

  it('should add per-asset RSI, RCI and altseason adjustments', () => {
    const rec = adviseExit(
      exitInput(55, 40, { rsi: 75, rci: { short: 90, medium: 85, long: 82 } }, 70),
      cfg
    );
    expect(rec.adjustments).toEqual([
      { source: 'RSI_OVERBOUGHT', points: 5 },
      { source: 'RCI_EXHAUSTION', points: 10 },
      { source: 'ALTSEASON', points: 5 },
    ]);
    expect(rec.localScore).toBe(75);
    expect(rec.fractionPct).toBe(25);
  });

  it('should clamp the local score at 100', () => {
    const rec = adviseExit(exitInput(95, 40, { rsi: 90, rci: { short: 90, medium: 90, long: 90 } }, 80), cfg);
    expect(rec.localScore).toBe(100);
  });

  it('should list signals it could not read', () => {
    const rec = adviseExit(exitInput(65, null), cfg);
    expect(rec.missing).toEqual(['rsi', 'rci', 'altseason', 'price']);
    expect(rec.fractionPct).toBe(10);
  });

  it('should work without a per-asset snapshot', () => {
    const rec = adviseExit({ ...exitInput(62, 10), snapshot: null }, cfg);
    expect(rec.missing).toEqual(['indicators', 'altseason']);
    expect(rec.localScore).toBe(62);
  });
});
