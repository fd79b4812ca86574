export * from './altseason.types.js';
export { detectAltseason, dominanceScore, momentumScore, classifyAltseason } from './altseason.detector.js';
