export * from './market-phase.types.js';
export { classifyMarketPhase, PHASE_ACTIONS } from './market-phase.classifier.js';
