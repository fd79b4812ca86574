export * from './portfolio.types.js';
export {
  calculatePortfolioAchievement,
  computePnlPct,
  holdingPnl,
  achievementAction,
} from './portfolio-achievement.service.js';
export {
  FilePortfolioSource,
  StaticPortfolioSource,
  parsePortfolio,
  PortfolioFileSchema,
  type PortfolioSource,
} from './portfolio.source.js';
