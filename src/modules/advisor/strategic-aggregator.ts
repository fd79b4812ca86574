/**
 * STRATEGIC AGGREGATOR
 * ====================
 *
 * Pure composition of the engine components into one AdvisoryReport, in a
 * fixed section order:
 *
 *   PORTFOLIO → MARKET_PHASE → CYCLE_TOP_RISK → ALTSEASON → BTC_ETH_RATIO
 *   → one EXIT section per altcoin holding
 *
 * Each EXIT section also carries the holding's technical signals.
 *
 * A component that throws or lacks inputs turns its section's action into
 * INSUFFICIENT_DATA; the section is still emitted. Same input, same report.
 */

import { deepFreeze } from '../../common/freeze.js';
import { absent, attemptReading as attempt, mapReading, present, type Reading } from '../../common/reading.js';
import type { EngineConfig } from '../../config/engine.config.js';
import type { Holding, MarketSentiment } from '../../contracts/market.types.js';
import { detectAltseason, type AltseasonResult, type AltseasonState } from '../altseason/index.js';
import { scoreCycleTopRisk, type RiskCategory, type RiskScore } from '../cycle-risk/index.js';
import type { IndicatorSnapshot } from '../indicators/index.js';
import { classifyMarketPhase, type PhaseClassification } from '../market-phase/index.js';
import { adviseExit, type ExitTier } from '../partial-exit/index.js';
import { calculatePortfolioAchievement, type HoldingPnl, type PortfolioAchievement } from '../portfolio/index.js';
import { evaluateTechnicalSignals, type TechnicalSignalsResult } from '../technical-signals/index.js';
import { sectionTitle } from './advisory.labels.js';
import { computeRatioGuidance } from './ratio-guidance.js';
import {
  INSUFFICIENT_DATA,
  type AdvisoryReport,
  type AdvisorySection,
  type AggregatorInput,
  type AltseasonAction,
  type AltseasonSection,
  type CycleRiskSection,
  type ExitAction,
  type ExitSection,
  type MarketPhaseSection,
  type PortfolioSection,
  type RatioGuidance,
  type RatioSection,
  type RiskAction,
  type SectionKind,
} from './advisory.types.js';

// ═══════════════════════════════════════════════════════════════
// ACTION MAPS
// ═══════════════════════════════════════════════════════════════

const RISK_ACTIONS: Readonly<Record<RiskCategory, RiskAction>> = {
  CRITICAL: 'MAJOR_PROFIT_TAKING',
  HIGH: 'PARTIAL_PROFIT_TAKING',
  MODERATE: 'LIGHT_PROFIT_TAKING',
  LOW: 'HOLD_POSITIONS',
  MINIMAL: 'ACCUMULATE_POSITIONS',
};

const ALTSEASON_ACTIONS: Readonly<Record<AltseasonState, AltseasonAction>> = {
  ALTSEASON: 'TAKE_ALT_PROFITS',
  TRANSITION: 'WATCH_ROTATION',
  BTC_DOMINANCE: 'FAVOR_BTC_EXPOSURE',
};

const EXIT_ACTIONS: Readonly<Record<ExitTier, ExitAction>> = {
  NONE: 'NO_EXIT',
  LIGHT: 'SELL_10_PCT',
  MEDIUM: 'SELL_25_PCT',
  HEAVY: 'SELL_50_PCT',
};

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function reasonOf<T>(r: Reading<T>): string {
  return r.status === 'PRESENT' ? '' : r.reason;
}

function insufficient(kind: Exclude<SectionKind, 'EXIT'>, id: string, title: string, notes: string[]): AdvisorySection {
  const base = { id, title, status: 'INSUFFICIENT_DATA' as const, analysis: null, action: INSUFFICIENT_DATA, notes };
  switch (kind) {
    case 'PORTFOLIO': return { kind, ...base };
    case 'MARKET_PHASE': return { kind, ...base };
    case 'CYCLE_TOP_RISK': return { kind, ...base };
    case 'ALTSEASON': return { kind, ...base };
    case 'BTC_ETH_RATIO': return { kind, ...base };
  }
}

function insufficientExit(
  id: string,
  title: string,
  notes: string[],
  technicals: Reading<TechnicalSignalsResult>
): ExitSection {
  return { kind: 'EXIT', id, title, status: 'INSUFFICIENT_DATA', analysis: null, action: INSUFFICIENT_DATA, notes, technicals };
}

function technicalsFor(
  snapshot: IndicatorSnapshot | null,
  sentiment: MarketSentiment,
  cfg: EngineConfig
): Reading<TechnicalSignalsResult> {
  if (!snapshot) return absent('no indicator snapshot');
  return attempt(() => present(evaluateTechnicalSignals(snapshot, sentiment, cfg)));
}

function isQuote(v: number | undefined): v is number {
  return v !== undefined && Number.isFinite(v) && v > 0;
}

/** Risk the exit advisor can lean on: at least one factor was evaluated. */
function usableRisk(risk: Reading<RiskScore>, cfg: EngineConfig): boolean {
  if (risk.status !== 'PRESENT') return false;
  const enabled = Object.entries(cfg.riskFactors).filter(([key, on]) => key !== 'confluence' && on).length;
  const unavailable = risk.value.excluded.filter((e) => e.reason !== 'disabled').length;
  return risk.value.contributions.length > 0 || unavailable < enabled;
}

// ═══════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════

function portfolioSection(r: Reading<PortfolioAchievement>): AdvisorySection {
  const title = sectionTitle('PORTFOLIO');
  if (r.status !== 'PRESENT') return insufficient('PORTFOLIO', 'PORTFOLIO', title, [r.reason]);

  const a = r.value;
  const notes = a.unpriced.length > 0 ? [`no price for ${a.unpriced.join(', ')}`] : [];
  if (a.action.status !== 'PRESENT') {
    const section: PortfolioSection = {
      kind: 'PORTFOLIO', id: 'PORTFOLIO', title, status: 'INSUFFICIENT_DATA',
      analysis: a, action: INSUFFICIENT_DATA, notes: [a.action.reason, ...notes],
    };
    return section;
  }
  const section: PortfolioSection = {
    kind: 'PORTFOLIO', id: 'PORTFOLIO', title, status: notes.length > 0 ? 'DEGRADED' : 'OK',
    analysis: a, action: a.action.value, notes,
  };
  return section;
}

function phaseSection(r: Reading<PhaseClassification>): AdvisorySection {
  const title = sectionTitle('MARKET_PHASE');
  if (r.status !== 'PRESENT') return insufficient('MARKET_PHASE', 'MARKET_PHASE', title, [r.reason]);

  const p = r.value;
  const section: MarketPhaseSection = {
    kind: 'MARKET_PHASE', id: 'MARKET_PHASE', title, status: p.degraded ? 'DEGRADED' : 'OK',
    analysis: p, action: p.action,
    notes: p.missing.length > 0 ? [`missing ${p.missing.join(', ')}`] : [],
  };
  return section;
}

function riskSection(r: Reading<RiskScore>, usable: boolean, previousScore: number | null): AdvisorySection {
  const title = sectionTitle('CYCLE_TOP_RISK');
  if (r.status !== 'PRESENT') return insufficient('CYCLE_TOP_RISK', 'CYCLE_TOP_RISK', title, [r.reason]);

  const risk = r.value;
  const notes = risk.excluded.filter((e) => e.reason !== 'disabled').map((e) => `${e.factor}: ${e.reason}`);
  const analysis = {
    ...risk,
    previousScore,
    delta: previousScore === null ? null : risk.score - previousScore,
  };
  const section: CycleRiskSection = {
    kind: 'CYCLE_TOP_RISK', id: 'CYCLE_TOP_RISK', title,
    status: !usable ? 'INSUFFICIENT_DATA' : notes.length > 0 ? 'DEGRADED' : 'OK',
    analysis,
    action: usable ? RISK_ACTIONS[risk.category] : INSUFFICIENT_DATA,
    notes,
  };
  return section;
}

function altseasonSection(r: Reading<AltseasonResult>): AdvisorySection {
  const title = sectionTitle('ALTSEASON');
  if (r.status !== 'PRESENT') return insufficient('ALTSEASON', 'ALTSEASON', title, [r.reason]);

  const section: AltseasonSection = {
    kind: 'ALTSEASON', id: 'ALTSEASON', title, status: 'OK',
    analysis: r.value, action: ALTSEASON_ACTIONS[r.value.state],
    notes: r.value.ratioChange === null ? ['no previous ETH/BTC reading; dominance only'] : [],
  };
  return section;
}

function ratioSection(r: Reading<RatioGuidance>): AdvisorySection {
  const title = sectionTitle('BTC_ETH_RATIO');
  if (r.status !== 'PRESENT') return insufficient('BTC_ETH_RATIO', 'BTC_ETH_RATIO', title, [r.reason]);

  const g = r.value;
  const gaps: string[] = [];
  if (g.btcRsi === null) gaps.push('BTC RSI');
  if (g.ethRsi === null) gaps.push('ETH RSI');
  if (g.btcVsMaPct === null) gaps.push('BTC long MA');
  if (g.ethVsMaPct === null) gaps.push('ETH long MA');

  const section: RatioSection = {
    kind: 'BTC_ETH_RATIO', id: 'BTC_ETH_RATIO', title, status: gaps.length > 0 ? 'DEGRADED' : 'OK',
    analysis: g, action: g.action,
    notes: gaps.length > 0 ? [`missing ${gaps.join(', ')}`] : [],
  };
  return section;
}

function exitSection(
  holding: HoldingPnl,
  risk: Reading<RiskScore>,
  usable: boolean,
  snapshot: IndicatorSnapshot | null,
  altseason: Reading<AltseasonResult>,
  technicals: Reading<TechnicalSignalsResult>,
  cfg: EngineConfig
): AdvisorySection {
  const id = `EXIT:${holding.assetId}`;
  const title = `${sectionTitle('EXIT')} ${holding.symbol}`;
  if (risk.status !== 'PRESENT' || !usable) {
    const reason = `cycle-top risk unavailable${risk.status === 'PRESENT' ? '' : `: ${risk.reason}`}`;
    return insufficientExit(id, title, [reason], technicals);
  }

  const globalRisk = risk.value.score;
  const rec = attempt(() => present(adviseExit({ holding, globalRisk, snapshot, altseason }, cfg)));
  if (rec.status !== 'PRESENT') return insufficientExit(id, title, [reasonOf(rec)], technicals);

  const notes = rec.value.missing.map((m) => `missing ${m}`);
  if (rec.value.pnlPct === null) {
    const section: ExitSection = {
      kind: 'EXIT', id, title, status: 'INSUFFICIENT_DATA',
      analysis: rec.value, action: INSUFFICIENT_DATA, notes, technicals,
    };
    return section;
  }
  const section: ExitSection = {
    kind: 'EXIT', id, title, status: notes.length > 0 ? 'DEGRADED' : 'OK',
    analysis: rec.value, action: EXIT_ACTIONS[rec.value.tier], notes, technicals,
  };
  return section;
}

// ═══════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════

export function buildAdvisoryReport(input: AggregatorInput, cfg: EngineConfig): AdvisoryReport {
  const { btcAssetId, ethAssetId } = cfg.portfolio;
  const snapshotOf = (assetId: string): IndicatorSnapshot | null => input.snapshots[assetId] ?? null;

  const priceOf = (assetId: string): number | null => {
    const quote = input.spotPrices[assetId];
    if (isQuote(quote)) return quote;
    const last = snapshotOf(assetId)?.lastClose;
    return last && last.status === 'PRESENT' ? last.value : null;
  };

  const btcSnap = snapshotOf(btcAssetId);
  const ethSnap = snapshotOf(ethAssetId);
  const btcPrice = priceOf(btcAssetId);
  const ethPrice = priceOf(ethAssetId);

  const altseason = attempt(() => detectAltseason(input.sentiment, input.previousSentiment, cfg.altseason));
  const risk = attempt(() =>
    present(
      scoreCycleTopRisk(
        { snapshot: btcSnap, sentiment: input.sentiment, altseasonScore: mapReading(altseason, (a) => a.score) },
        cfg
      )
    )
  );
  const riskUsable = usableRisk(risk, cfg);
  const phase = attempt(() => present(classifyMarketPhase(input.sentiment)));

  const holdings: Holding[] = input.positions.map((p) => ({ ...p, currentPrice: priceOf(p.assetId) }));
  const achievement = attempt(() =>
    present(calculatePortfolioAchievement({ holdings, btcPrice, ethPrice, targets: input.targets }, cfg.portfolio))
  );

  const ratio =
    input.sentiment.ethBtcRatio ?? (btcPrice !== null && ethPrice !== null ? ethPrice / btcPrice : null);
  const guidance = attempt(() => computeRatioGuidance({ ratio, btc: btcSnap, eth: ethSnap }, cfg.ratioGuidance));

  const sections: AdvisorySection[] = [
    portfolioSection(achievement),
    phaseSection(phase),
    riskSection(risk, riskUsable, input.previousRiskScore ?? null),
    altseasonSection(altseason),
    ratioSection(guidance),
  ];

  if (achievement.status === 'PRESENT') {
    for (const h of achievement.value.holdings) {
      const snapshot = snapshotOf(h.assetId);
      const technicals = technicalsFor(snapshot, input.sentiment, cfg);
      sections.push(exitSection(h, risk, riskUsable, snapshot, altseason, technicals, cfg));
    }
  } else {
    const base = new Set([btcAssetId, ethAssetId]);
    for (const p of input.positions.filter((pos) => !base.has(pos.assetId))) {
      const technicals = technicalsFor(snapshotOf(p.assetId), input.sentiment, cfg);
      sections.push(
        insufficientExit(`EXIT:${p.assetId}`, `${sectionTitle('EXIT')} ${p.symbol}`, [reasonOf(achievement)], technicals)
      );
    }
  }

  const report: AdvisoryReport = {
    asOf: input.asOf.toISOString(),
    summary: {
      riskScore: riskUsable && risk.status === 'PRESENT' ? risk.value.score : null,
      riskCategory: riskUsable && risk.status === 'PRESENT' ? risk.value.category : null,
      phase: phase.status === 'PRESENT' ? phase.value.phase : null,
      altseason: altseason.status === 'PRESENT' ? altseason.value.state : null,
    },
    sections,
    droppedAssets: (input.droppedAssets ?? []).map((d) => ({ ...d })),
  };

  return deepFreeze(report);
}
