/**
 * Display text for every closed enumeration in the report.
 */

import type { MarketPhase } from '../market-phase/market-phase.types.js';
import type { AltseasonState } from '../altseason/altseason.types.js';
import type { RiskCategory } from '../cycle-risk/cycle-risk.types.js';
import type { SignalBias, TechnicalSignal } from '../technical-signals/technical-signals.types.js';
import type { ReportAction, RatioSignal, SectionKind } from './advisory.types.js';

const ACTION_TEXT: Readonly<Record<ReportAction, string>> = {
  // portfolio
  GOAL_REACHABLE: 'goal reachable: liquidating alts covers the BTC/ETH target',
  NEAR_GOAL: 'near goal: keep alts and watch for the final push',
  KEEP_ACCUMULATING: 'keep accumulating',
  // market phase
  AGGRESSIVE_ACCUMULATION: 'aggressive accumulation',
  ACCUMULATE: 'accumulate',
  DISTRIBUTE: 'distribute into strength',
  TAKE_PARTIAL_PROFITS: 'take partial profits',
  ROTATE_ALT_PROFITS: 'rotate alt profits into BTC/ETH',
  DCA_ACCUMULATE: 'dollar-cost average in',
  HOLD_TIGHTEN: 'hold, tighten stops',
  HOLD: 'hold',
  // cycle-top risk
  MAJOR_PROFIT_TAKING: 'major profit taking',
  PARTIAL_PROFIT_TAKING: 'partial profit taking',
  LIGHT_PROFIT_TAKING: 'light profit taking',
  HOLD_POSITIONS: 'hold positions',
  ACCUMULATE_POSITIONS: 'accumulate positions',
  // altseason
  TAKE_ALT_PROFITS: 'take profits on alts',
  WATCH_ROTATION: 'watch for rotation into alts',
  FAVOR_BTC_EXPOSURE: 'favor BTC exposure',
  // BTC/ETH ratio
  SWAP_BTC_TO_ETH: 'swap part of BTC into ETH',
  SWAP_ETH_TO_BTC: 'swap part of ETH into BTC',
  FAVOR_ETH: 'favor ETH on new buys',
  FAVOR_BTC: 'favor BTC on new buys',
  HOLD_RATIO: 'keep the current BTC/ETH split',
  // exits
  NO_EXIT: 'no exit',
  SELL_10_PCT: 'sell 10%',
  SELL_25_PCT: 'sell 25%',
  SELL_50_PCT: 'sell 50%',
  INSUFFICIENT_DATA: 'insufficient data',
};

const SECTION_TITLES: Readonly<Record<SectionKind, string>> = {
  PORTFOLIO: 'Portfolio',
  MARKET_PHASE: 'Market Phase',
  CYCLE_TOP_RISK: 'Cycle-Top Risk',
  ALTSEASON: 'Altseason',
  BTC_ETH_RATIO: 'BTC/ETH Ratio',
  EXIT: 'Exit',
};

const PHASE_TEXT: Readonly<Record<MarketPhase, string>> = {
  CAPITULATION: 'capitulation',
  BUY_ZONE: 'buy zone',
  EUPHORIA_RISK: 'euphoria risk',
  SELL_ZONE: 'sell zone',
  ALTSEASON_ACTIVE: 'altseason active',
  FEAR: 'fear',
  GREED: 'greed',
  NEUTRAL: 'neutral',
};

const ALTSEASON_TEXT: Readonly<Record<AltseasonState, string>> = {
  BTC_DOMINANCE: 'BTC dominance',
  TRANSITION: 'transition',
  ALTSEASON: 'altseason',
};

const RISK_TEXT: Readonly<Record<RiskCategory, string>> = {
  MINIMAL: 'minimal',
  LOW: 'low',
  MODERATE: 'moderate',
  HIGH: 'high',
  CRITICAL: 'critical',
};

const SIGNAL_TEXT: Readonly<Record<RatioSignal, string>> = {
  ETH_OVERSOLD_VS_BTC: 'ETH heavily oversold vs BTC',
  BTC_OVEREXTENDED_ETH_LAGGING: 'BTC overextended, ETH lagging',
  ETH_OVERBOUGHT_VS_BTC: 'ETH overbought vs BTC',
  ETH_EXTREMELY_EXPENSIVE: 'ETH extremely expensive vs BTC',
  BTC_MOMENTUM_ETH_LAGGING: 'strong BTC momentum, ETH lagging',
  ETH_MOMENTUM_BTC_LAGGING: 'strong ETH momentum, BTC lagging',
};

const TECHNICAL_TEXT: Readonly<Record<TechnicalSignal, string>> = {
  RSI_OVERBOUGHT: 'RSI overbought',
  RSI_OVERSOLD: 'RSI oversold',
  MACD_BULLISH_CROSS: 'MACD bullish crossover',
  MACD_BEARISH_CROSS: 'MACD bearish crossover',
  GOLDEN_CROSS: 'golden cross',
  DEATH_CROSS: 'death cross',
  RCI_OVERBOUGHT: 'RCI lines overbought',
  RCI_OVERSOLD: 'RCI lines oversold',
  ABOVE_UPPER_BAND: 'close above upper Bollinger band',
  BELOW_LOWER_BAND: 'close below lower Bollinger band',
  STOCHASTIC_OVERBOUGHT: 'stochastic overbought',
  STOCHASTIC_OVERSOLD: 'stochastic oversold',
  EXIT_TO_STABLECOIN: 'exit to stablecoin',
};

const BIAS_TEXT: Readonly<Record<SignalBias, string>> = {
  BULLISH: 'bullish',
  BEARISH: 'bearish',
  NEUTRAL: 'mixed',
};

export const actionText = (a: ReportAction): string => ACTION_TEXT[a];
export const sectionTitle = (k: SectionKind): string => SECTION_TITLES[k];
export const phaseText = (p: MarketPhase): string => PHASE_TEXT[p];
export const altseasonText = (s: AltseasonState): string => ALTSEASON_TEXT[s];
export const riskText = (c: RiskCategory): string => RISK_TEXT[c];
export const signalText = (s: RatioSignal): string => SIGNAL_TEXT[s];
export const technicalText = (s: TechnicalSignal): string => TECHNICAL_TEXT[s];
export const biasText = (b: SignalBias): string => BIAS_TEXT[b];
