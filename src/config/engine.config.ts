/**
 * ENGINE CONFIG: Typed thresholds
 * =================================
 *
 * Every threshold the scoring engine recognises, with its default.
 * Loaded from JSON and validated once at startup; the engine only ever
 * sees the parsed, frozen result.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { ConfigValidationError } from '../common/errors.js';

// ═══════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════

const period = z.number().int().min(2);
const points = z.number().int().nonnegative();

const IndicatorsSchema = z
  .object({
    rsiPeriod: period.default(14),
    macdFast: period.default(12),
    macdSlow: period.default(26),
    macdSignal: period.default(9),
    maShort: period.default(50),
    maLong: period.default(200),
    piCycleShort: period.default(111),
    piCycleLong: period.default(350),
    rciPeriods: z.tuple([period, period, period]).default([9, 26, 52]),
    bollingerPeriod: period.default(20),
    bollingerStdDev: z.number().positive().default(2),
    stochasticPeriod: period.default(14),
    stochasticSignal: period.default(3),
  })
  .refine((c) => c.macdFast < c.macdSlow, { message: 'macdFast must be below macdSlow' })
  .refine((c) => c.maShort < c.maLong, { message: 'maShort must be below maLong' })
  .refine((c) => c.piCycleShort < c.piCycleLong, { message: 'piCycleShort must be below piCycleLong' })
  .refine((c) => c.rciPeriods[0] < c.rciPeriods[1] && c.rciPeriods[1] < c.rciPeriods[2], {
    message: 'rciPeriods must be ascending (short, medium, long)',
  });

const RiskWeightsSchema = z.object({
  piCycleTriggered: points.default(30),
  piCycleApproaching: points.default(15),
  rsiExtreme: points.default(25),
  rsiOverbought: points.default(15),
  rciExhaustion: points.default(20),
  rciWeakening: points.default(10),
  altseasonPeak: points.default(15),
  fearGreedExtreme: points.default(20),
  fearGreedHigh: points.default(10),
  confluence: points.default(10),
});

const RiskThresholdsSchema = z
  .object({
    piCycleApproach: z.number().positive().default(0.9),
    piCycleTrigger: z.number().positive().default(1.0),
    rsiExtreme: z.number().min(0).max(100).default(80),
    rsiOverbought: z.number().min(0).max(100).default(70),
    fearGreedExtreme: z.number().min(0).max(100).default(80),
    fearGreedHigh: z.number().min(0).max(100).default(70),
    confluenceMinFactors: z.number().int().min(2).default(3),
  })
  .refine((c) => c.piCycleApproach < c.piCycleTrigger, { message: 'piCycleApproach must be below piCycleTrigger' })
  .refine((c) => c.rsiOverbought < c.rsiExtreme, { message: 'rsiOverbought must be below rsiExtreme' })
  .refine((c) => c.fearGreedHigh < c.fearGreedExtreme, { message: 'fearGreedHigh must be below fearGreedExtreme' });

const RiskFactorsSchema = z.object({
  piCycle: z.boolean().default(true),
  rsi: z.boolean().default(true),
  rci: z.boolean().default(true),
  altseason: z.boolean().default(true),
  fearGreed: z.boolean().default(true),
  confluence: z.boolean().default(true),
});

const RciSchema = z
  .object({
    overbought: z.number().min(0).max(100).default(80),
    oversold: z.number().min(-100).max(0).default(-80),
    exhaustionSpread: z.number().positive().max(200).default(60),
    weakeningSpread: z.number().positive().max(200).default(30),
  })
  .refine((c) => c.weakeningSpread < c.exhaustionSpread, {
    message: 'weakeningSpread must be below exhaustionSpread',
  });

const AltseasonSchema = z
  .object({
    dominanceExtremeLow: z.number().min(0).max(100).default(40),
    dominanceExtremeHigh: z.number().min(0).max(100).default(60),
    momentumVeryStrong: z.number().positive().default(0.05),
    momentumStrong: z.number().positive().default(0.02),
    momentumWeak: z.number().positive().default(0.005),
    momentumWeight: z.number().min(0).max(1).default(0.3),
    transitionMin: z.number().min(0).max(100).default(33),
    altseasonAbove: z.number().min(0).max(100).default(66),
  })
  .refine((c) => c.dominanceExtremeLow < c.dominanceExtremeHigh, {
    message: 'dominanceExtremeLow must be below dominanceExtremeHigh',
  })
  .refine((c) => c.momentumWeak < c.momentumStrong && c.momentumStrong < c.momentumVeryStrong, {
    message: 'momentum thresholds must ascend weak < strong < veryStrong',
  })
  .refine((c) => c.transitionMin < c.altseasonAbove, { message: 'transitionMin must be below altseasonAbove' });

const PartialExitSchema = z
  .object({
    bands: z
      .object({
        light: z.number().min(0).max(100).default(60),
        medium: z.number().min(0).max(100).default(75),
        heavy: z.number().min(0).max(100).default(85),
      })
      .default({}),
    adjustments: z
      .object({
        rsiExtreme: points.default(10),
        rsiOverbought: points.default(5),
        rciExhaustion: points.default(10),
        rciWeakening: points.default(5),
        altseason: points.default(5),
      })
      .default({}),
    lossSuppression: z
      .object({
        enabled: z.boolean().default(true),
        tiers: z.union([z.number().int().min(1).max(3), z.literal('ALL')]).default('ALL'),
        overrideMinRisk: z.number().int().min(0).max(100).default(85),
      })
      .default({}),
  })
  .refine((c) => c.bands.light < c.bands.medium && c.bands.medium < c.bands.heavy, {
    message: 'partial exit bands must ascend light < medium < heavy',
  });

const RatioGuidanceSchema = z
  .object({
    low: z.number().positive().default(0.04),
    high: z.number().positive().default(0.08),
    extremeHigh: z.number().positive().default(0.1),
    btcOverextendedPct: z.number().positive().default(20),
    btcRsiStrong: z.number().min(0).max(100).default(60),
    btcRsiSoft: z.number().min(0).max(100).default(50),
    ethRsiWeak: z.number().min(0).max(100).default(40),
    ethRsiHot: z.number().min(0).max(100).default(70),
    momentumRsi: z.number().min(0).max(100).default(80),
    laggingRsi: z.number().min(0).max(100).default(40),
  })
  .refine((c) => c.low < c.high && c.high < c.extremeHigh, {
    message: 'ratio guidance thresholds must ascend low < high < extremeHigh',
  });

const TechnicalSignalsSchema = z
  .object({
    rsiOverbought: z.number().min(0).max(100).default(70),
    rsiOversold: z.number().min(0).max(100).default(30),
    stochasticOverbought: z.number().min(0).max(100).default(80),
    stochasticOversold: z.number().min(0).max(100).default(20),
    exitToStablecoin: z
      .object({
        rsiAbove: z.number().min(0).max(100).default(70),
        dominanceAbove: z.number().min(0).max(100).default(50),
        fearGreedMin: z.number().min(0).max(100).default(80),
      })
      .default({}),
  })
  .refine((c) => c.rsiOversold < c.rsiOverbought && c.stochasticOversold < c.stochasticOverbought, {
    message: 'oversold bounds must sit below overbought bounds',
  });

const PortfolioSchema = z.object({
  btcAssetId: z.string().min(1).default('bitcoin'),
  ethAssetId: z.string().min(1).default('ethereum'),
  nearGoalPct: z.number().positive().default(80),
  lookbackDays: z.number().int().min(2).default(400),
});

export const EngineConfigSchema = z.object({
  indicators: IndicatorsSchema.default({}),
  riskWeights: RiskWeightsSchema.default({}),
  riskThresholds: RiskThresholdsSchema.default({}),
  riskFactors: RiskFactorsSchema.default({}),
  rci: RciSchema.default({}),
  altseason: AltseasonSchema.default({}),
  partialExit: PartialExitSchema.default({}),
  ratioGuidance: RatioGuidanceSchema.default({}),
  technicalSignals: TechnicalSignalsSchema.default({}),
  portfolio: PortfolioSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ═══════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

export function parseEngineConfig(raw: unknown, source = 'engine config'): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(source, formatIssues(result.error));
  }
  return Object.freeze(result.data);
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = parseEngineConfig({}, 'defaults');

/**
 * Read and validate a JSON engine config. A missing path means defaults.
 */
export function loadEngineConfig(path?: string): EngineConfig {
  if (!path) return DEFAULT_ENGINE_CONFIG;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(path, [`cannot read JSON: ${message}`]);
  }

  const config = parseEngineConfig(raw, path);
  console.log(`[Config] Engine config loaded from ${path}`);
  return config;
}
