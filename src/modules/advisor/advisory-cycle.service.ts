/**
 * ADVISORY CYCLE
 * ==============
 *
 * One analysis cycle end to end:
 *   1. load portfolio (positions + BTC/ETH targets)
 *   2. fetch series, sentiment, spot prices and the previous snapshot concurrently
 *   3. validate each series and build its indicator snapshot; a bad series drops its asset only
 *   4. run the engine
 *   5. persist the new snapshot (best effort)
 */

import { AppError, CycleFailureError, errorMessage } from '../../common/errors.js';
import type { EngineConfig } from '../../config/engine.config.js';
import { EMPTY_SENTIMENT, type MarketSentiment, type Position, type Targets } from '../../contracts/market.types.js';
import { buildIndicatorSnapshot } from '../indicators/indicator-snapshot.service.js';
import type { IndicatorSnapshot, PriceSeries } from '../indicators/indicator.types.js';
import type { MarketDataPort } from '../market-data/market-data.port.js';
import type { AssetRef } from '../market-data/market-data.types.js';
import type { PortfolioSource } from '../portfolio/portfolio.source.js';
import type { SnapshotRepository } from '../snapshots/snapshot.repository.js';
import type { AnalysisSnapshot } from '../snapshots/snapshot.types.js';
import { buildAdvisoryReport } from './strategic-aggregator.js';
import type { AdvisoryReport, AssetIssue } from './advisory.types.js';

export interface AdvisoryCycleDeps {
  marketData: MarketDataPort;
  portfolio: PortfolioSource;
  snapshots: SnapshotRepository;
}

export interface AssetDiagnostic {
  assetId: string;
  status: 'OK' | 'DROPPED';
  points: number;
  issue?: AssetIssue;
}

export interface AdvisoryCycleResult {
  report: AdvisoryReport;
  diagnostics: AssetDiagnostic[];
  persisted: boolean;
}

export type SeriesOutcome =
  | { assetId: string; ok: true; series: PriceSeries }
  | { assetId: string; ok: false; issue: AssetIssue };

// ═══════════════════════════════════════════════════════════════
// SNAPSHOTS
// ═══════════════════════════════════════════════════════════════

function issueFrom(assetId: string, err: unknown, fallbackCode: string): AssetIssue {
  return {
    assetId,
    code: err instanceof AppError ? err.code : fallbackCode,
    message: errorMessage(err),
  };
}

/**
 * Indicator snapshots for every series that validates. Failures are
 * collected, never thrown.
 */
export function buildSnapshots(
  outcomes: readonly SeriesOutcome[],
  cfg: EngineConfig['indicators']
): { snapshots: Record<string, IndicatorSnapshot>; diagnostics: AssetDiagnostic[] } {
  const snapshots: Record<string, IndicatorSnapshot> = {};
  const diagnostics: AssetDiagnostic[] = [];

  for (const outcome of outcomes) {
    const { assetId } = outcome;
    if (!outcome.ok) {
      diagnostics.push({ assetId, status: 'DROPPED', points: 0, issue: outcome.issue });
      continue;
    }
    if (outcome.series.length === 0) {
      diagnostics.push({
        assetId,
        status: 'DROPPED',
        points: 0,
        issue: { assetId, code: 'NO_DATA', message: `${assetId}: empty price series` },
      });
      continue;
    }
    try {
      snapshots[assetId] = buildIndicatorSnapshot(assetId, outcome.series, cfg);
      diagnostics.push({ assetId, status: 'OK', points: outcome.series.length });
    } catch (err) {
      diagnostics.push({ assetId, status: 'DROPPED', points: outcome.series.length, issue: issueFrom(assetId, err, 'INVALID_INPUT') });
    }
  }

  return { snapshots, diagnostics };
}

/** A cycle without a single usable series has nothing to advise on. */
function requireAnySnapshot(snapshots: Record<string, IndicatorSnapshot>, assetCount: number): void {
  if (Object.keys(snapshots).length > 0) return;
  throw new CycleFailureError(
    assetCount === 0 ? 'No price series submitted' : `No price data for any of ${assetCount} assets`
  );
}

export function droppedIssues(diagnostics: readonly AssetDiagnostic[]): AssetIssue[] {
  const issues: AssetIssue[] = [];
  for (const d of diagnostics) if (d.issue) issues.push(d.issue);
  return issues;
}

/** BTC, ETH, then each other position once, in portfolio order. */
export function trackedAssets(positions: readonly Position[], cfg: EngineConfig['portfolio']): AssetRef[] {
  const assets: AssetRef[] = [
    { assetId: cfg.btcAssetId, symbol: 'BTC' },
    { assetId: cfg.ethAssetId, symbol: 'ETH' },
  ];
  const seen = new Set(assets.map((a) => a.assetId));
  for (const p of positions) {
    if (seen.has(p.assetId)) continue;
    seen.add(p.assetId);
    assets.push({ assetId: p.assetId, symbol: p.symbol });
  }
  return assets;
}

// ═══════════════════════════════════════════════════════════════
// PURE EVALUATION
// ═══════════════════════════════════════════════════════════════

export interface EvaluationInput {
  series: Record<string, PriceSeries>;
  sentiment: MarketSentiment;
  previousSentiment?: MarketSentiment;
  previousRiskScore?: number | null;
  positions: Position[];
  targets: Targets;
  spotPrices?: Record<string, number>;
}

/** Engine run on caller-supplied data; no I/O. */
export function evaluateAdvisory(
  input: EvaluationInput,
  cfg: EngineConfig,
  asOf: Date
): { report: AdvisoryReport; diagnostics: AssetDiagnostic[] } {
  const outcomes: SeriesOutcome[] = Object.entries(input.series).map(
    ([assetId, series]): SeriesOutcome => ({ assetId, ok: true, series })
  );
  const { snapshots, diagnostics } = buildSnapshots(outcomes, cfg.indicators);
  requireAnySnapshot(snapshots, outcomes.length);

  const report = buildAdvisoryReport(
    {
      asOf,
      snapshots,
      sentiment: input.sentiment,
      previousSentiment: input.previousSentiment,
      previousRiskScore: input.previousRiskScore ?? null,
      positions: input.positions,
      targets: input.targets,
      spotPrices: input.spotPrices ?? {},
      droppedAssets: droppedIssues(diagnostics),
    },
    cfg
  );
  return { report, diagnostics };
}

// ═══════════════════════════════════════════════════════════════
// LIVE CYCLE
// ═══════════════════════════════════════════════════════════════

async function fetchSeries(marketData: MarketDataPort, asset: AssetRef, lookback: number): Promise<SeriesOutcome> {
  try {
    const series = await marketData.getPriceSeries(asset, lookback);
    return { assetId: asset.assetId, ok: true, series };
  } catch (err) {
    console.error(`[Advisor] Series fetch failed for ${asset.assetId}:`, errorMessage(err));
    return { assetId: asset.assetId, ok: false, issue: issueFrom(asset.assetId, err, 'FETCH_FAILED') };
  }
}

async function fetchSentiment(marketData: MarketDataPort): Promise<MarketSentiment> {
  try {
    return await marketData.getSentiment();
  } catch (err) {
    console.error('[Advisor] Sentiment fetch failed:', errorMessage(err));
    return EMPTY_SENTIMENT;
  }
}

async function fetchSpotPrices(marketData: MarketDataPort, ids: readonly string[]): Promise<Record<string, number>> {
  try {
    return await marketData.getSpotPrices(ids);
  } catch (err) {
    console.error('[Advisor] Spot price fetch failed:', errorMessage(err));
    return {};
  }
}

async function fetchPrevious(snapshots: SnapshotRepository): Promise<AnalysisSnapshot | null> {
  try {
    return await snapshots.getLatest();
  } catch (err) {
    console.error('[Advisor] Previous snapshot unavailable:', errorMessage(err));
    return null;
  }
}

function altseasonScoreOf(report: AdvisoryReport): number | null {
  for (const s of report.sections) {
    if (s.kind === 'ALTSEASON') return s.analysis ? s.analysis.score : null;
  }
  return null;
}

export async function runAdvisoryCycle(
  deps: AdvisoryCycleDeps,
  cfg: EngineConfig,
  asOf: Date = new Date()
): Promise<AdvisoryCycleResult> {
  const startMs = Date.now();
  const { holdings: positions, targets } = await deps.portfolio.loadPortfolio();
  const assets = trackedAssets(positions, cfg.portfolio);
  const lookback = cfg.portfolio.lookbackDays;

  const [outcomes, sentiment, spotPrices, previous] = await Promise.all([
    Promise.all(assets.map((a) => fetchSeries(deps.marketData, a, lookback))),
    fetchSentiment(deps.marketData),
    fetchSpotPrices(deps.marketData, assets.map((a) => a.assetId)),
    fetchPrevious(deps.snapshots),
  ]);

  const { snapshots, diagnostics } = buildSnapshots(outcomes, cfg.indicators);
  requireAnySnapshot(snapshots, assets.length);

  const report = buildAdvisoryReport(
    {
      asOf,
      snapshots,
      sentiment,
      previousSentiment: previous?.sentiment,
      previousRiskScore: previous?.riskScore ?? null,
      positions,
      targets,
      spotPrices,
      droppedAssets: droppedIssues(diagnostics),
    },
    cfg
  );

  let persisted = false;
  try {
    await deps.snapshots.save({
      ts: asOf.getTime(),
      sentiment,
      riskScore: report.summary.riskScore,
      altseasonScore: altseasonScoreOf(report),
    });
    persisted = true;
  } catch (err) {
    console.error('[Advisor] Snapshot save failed:', errorMessage(err));
  }

  console.log(
    `[Advisor] Cycle done: risk=${report.summary.riskScore ?? 'n/a'}, ` +
      `assets=${Object.keys(snapshots).length}/${assets.length}, ${Date.now() - startMs}ms`
  );

  return { report, diagnostics, persisted };
}
