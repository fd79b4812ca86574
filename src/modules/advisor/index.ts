export * from './advisory.types.js';
export { buildAdvisoryReport } from './strategic-aggregator.js';
export { computeRatioGuidance, distanceFromLongMa } from './ratio-guidance.js';
export { renderReportText, renderReportTelegramHtml, escapeHtml, TELEGRAM_MESSAGE_LIMIT } from './advisory.renderer.js';
export { actionText, sectionTitle } from './advisory.labels.js';
export {
  runAdvisoryCycle,
  evaluateAdvisory,
  buildSnapshots,
  trackedAssets,
  type AdvisoryCycleDeps,
  type AdvisoryCycleResult,
  type AssetDiagnostic,
} from './advisory-cycle.service.js';
export { advisorRoutes, type AdvisorRouteOptions } from './advisor.routes.js';
