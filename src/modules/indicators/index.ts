/**
 * INDICATOR LIBRARY
 */

export * from './indicator.types.js';
export { validateSeries, assertFiniteValues } from './series.validator.js';
export {
  computeRsi,
  computeMacd,
  computeSma,
  smaSeries,
  detectMaCrossover,
  computeBollinger,
  computeStochastic,
} from './indicator.calculators.js';
export { computePiCycle, findPiCycleTriggers, piCycleRatioSeries } from './pi-cycle.js';
export { computeRci, computeRci3, assessRciExhaustion, type RciExhaustionThresholds } from './rci.js';
export { buildIndicatorSnapshot } from './indicator-snapshot.service.js';
