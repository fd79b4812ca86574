/**
 * TECHNICAL SIGNALS: Types
 */

export type TechnicalSignal =
  | 'RSI_OVERBOUGHT'
  | 'RSI_OVERSOLD'
  | 'MACD_BULLISH_CROSS'
  | 'MACD_BEARISH_CROSS'
  | 'GOLDEN_CROSS'
  | 'DEATH_CROSS'
  | 'RCI_OVERBOUGHT'
  | 'RCI_OVERSOLD'
  | 'ABOVE_UPPER_BAND'
  | 'BELOW_LOWER_BAND'
  | 'STOCHASTIC_OVERBOUGHT'
  | 'STOCHASTIC_OVERSOLD'
  | 'EXIT_TO_STABLECOIN';

export type SignalBias = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export type SignalSource = 'RSI' | 'MACD' | 'MOVING_AVERAGES' | 'RCI' | 'BOLLINGER' | 'STOCHASTIC';

export const BEARISH_SIGNALS: ReadonlySet<TechnicalSignal> = new Set<TechnicalSignal>([
  'RSI_OVERBOUGHT',
  'MACD_BEARISH_CROSS',
  'DEATH_CROSS',
  'RCI_OVERBOUGHT',
  'ABOVE_UPPER_BAND',
  'STOCHASTIC_OVERBOUGHT',
  'EXIT_TO_STABLECOIN',
]);

export interface TechnicalSignalsResult {
  assetId: string;
  /** In evaluation order: RSI, MACD, MA, RCI, Bollinger, stochastic, exit. */
  signals: TechnicalSignal[];
  bias: SignalBias;
  bullish: number;
  bearish: number;
  /** Indicators that were not available and could not fire. */
  missing: SignalSource[];
}
