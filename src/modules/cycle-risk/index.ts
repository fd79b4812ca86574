export * from './cycle-risk.types.js';
export { scoreCycleTopRisk, categorizeRisk } from './cycle-risk.scorer.js';
