export * from './partial-exit.types.js';
export { adviseExit, exitTierFor, lowerTier } from './partial-exit.advisor.js';
