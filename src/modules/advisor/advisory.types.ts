/**
 * STRATEGIC ADVISOR: Types
 * =========================
 *
 * The report is structured data. Every section carries typed analysis
 * facts and exactly one action from its component's closed vocabulary;
 * display text lives in advisory.labels.ts only.
 */

import type { AltseasonResult, AltseasonState } from '../altseason/altseason.types.js';
import type { RiskCategory, RiskScore } from '../cycle-risk/cycle-risk.types.js';
import type { PhaseAction, PhaseClassification } from '../market-phase/market-phase.types.js';
import type { ExitRecommendation } from '../partial-exit/partial-exit.types.js';
import type { AchievementAction, PortfolioAchievement } from '../portfolio/portfolio.types.js';
import type { IndicatorSnapshot } from '../indicators/indicator.types.js';
import type { TechnicalSignalsResult } from '../technical-signals/technical-signals.types.js';
import type { Reading } from '../../common/reading.js';
import type { MarketSentiment, Position, Targets } from '../../contracts/market.types.js';

// ═══════════════════════════════════════════════════════════════
// ACTION VOCABULARIES
// ═══════════════════════════════════════════════════════════════

export type InsufficientData = 'INSUFFICIENT_DATA';
export const INSUFFICIENT_DATA: InsufficientData = 'INSUFFICIENT_DATA';

export type RiskAction =
  | 'MAJOR_PROFIT_TAKING'
  | 'PARTIAL_PROFIT_TAKING'
  | 'LIGHT_PROFIT_TAKING'
  | 'HOLD_POSITIONS'
  | 'ACCUMULATE_POSITIONS';

export type AltseasonAction = 'TAKE_ALT_PROFITS' | 'WATCH_ROTATION' | 'FAVOR_BTC_EXPOSURE';

export type RatioAction = 'SWAP_BTC_TO_ETH' | 'SWAP_ETH_TO_BTC' | 'FAVOR_ETH' | 'FAVOR_BTC' | 'HOLD_RATIO';

export type ExitAction = 'NO_EXIT' | 'SELL_10_PCT' | 'SELL_25_PCT' | 'SELL_50_PCT';

export type ReportAction =
  | AchievementAction
  | PhaseAction
  | RiskAction
  | AltseasonAction
  | RatioAction
  | ExitAction
  | InsufficientData;

// ═══════════════════════════════════════════════════════════════
// RATIO GUIDANCE
// ═══════════════════════════════════════════════════════════════

export type RatioConfidence = 'HIGH' | 'MEDIUM' | 'LOW';
export type RatioPosition = 'LOW' | 'NORMAL' | 'HIGH';

export type RatioSignal =
  | 'ETH_OVERSOLD_VS_BTC'
  | 'BTC_OVEREXTENDED_ETH_LAGGING'
  | 'ETH_OVERBOUGHT_VS_BTC'
  | 'ETH_EXTREMELY_EXPENSIVE'
  | 'BTC_MOMENTUM_ETH_LAGGING'
  | 'ETH_MOMENTUM_BTC_LAGGING';

export interface RatioGuidance {
  ratio: number;
  position: RatioPosition;
  action: RatioAction;
  confidence: RatioConfidence;
  signals: RatioSignal[];
  btcRsi: number | null;
  ethRsi: number | null;
  btcVsMaPct: number | null;
  ethVsMaPct: number | null;
}

// ═══════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════

export type SectionStatus = 'OK' | 'DEGRADED' | 'INSUFFICIENT_DATA';

interface SectionBase<K extends string, A, F> {
  kind: K;
  id: string;
  title: string;
  status: SectionStatus;
  /** Null only when the section's component failed outright. */
  analysis: F | null;
  action: A | InsufficientData;
  /** Why the section is degraded or insufficient. */
  notes: string[];
}

export interface RiskAnalysis extends RiskScore {
  previousScore: number | null;
  delta: number | null;
}

export type PortfolioSection = SectionBase<'PORTFOLIO', AchievementAction, PortfolioAchievement>;
export type MarketPhaseSection = SectionBase<'MARKET_PHASE', PhaseAction, PhaseClassification>;
export type CycleRiskSection = SectionBase<'CYCLE_TOP_RISK', RiskAction, RiskAnalysis>;
export type AltseasonSection = SectionBase<'ALTSEASON', AltseasonAction, AltseasonResult>;
export type RatioSection = SectionBase<'BTC_ETH_RATIO', RatioAction, RatioGuidance>;
export interface ExitSection extends SectionBase<'EXIT', ExitAction, ExitRecommendation> {
  /** Alert conditions on the holding's own indicators; ABSENT without a snapshot. */
  technicals: Reading<TechnicalSignalsResult>;
}

export type AdvisorySection =
  | PortfolioSection
  | MarketPhaseSection
  | CycleRiskSection
  | AltseasonSection
  | RatioSection
  | ExitSection;

export type SectionKind = AdvisorySection['kind'];

// ═══════════════════════════════════════════════════════════════
// REPORT
// ═══════════════════════════════════════════════════════════════

export interface AssetIssue {
  assetId: string;
  code: string;
  message: string;
}

export interface ReportSummary {
  riskScore: number | null;
  riskCategory: RiskCategory | null;
  phase: PhaseClassification['phase'] | null;
  altseason: AltseasonState | null;
}

export interface AdvisoryReport {
  asOf: string;   // ISO-8601
  summary: ReportSummary;
  sections: AdvisorySection[];
  droppedAssets: AssetIssue[];
}

export interface AggregatorInput {
  asOf: Date;
  /** Snapshots of every asset whose series validated, keyed by asset id. */
  snapshots: Readonly<Record<string, IndicatorSnapshot>>;
  sentiment: MarketSentiment;
  previousSentiment?: MarketSentiment;
  previousRiskScore?: number | null;
  positions: readonly Position[];
  targets: Targets;
  /** Spot quotes in USD; a missing quote falls back to the snapshot's last close. */
  spotPrices: Readonly<Record<string, number>>;
  droppedAssets?: readonly AssetIssue[];
}
