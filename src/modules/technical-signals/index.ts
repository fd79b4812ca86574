export * from './technical-signals.types.js';
export { evaluateTechnicalSignals } from './technical-signals.evaluator.js';
