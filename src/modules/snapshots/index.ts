export type { AnalysisSnapshot } from './snapshot.types.js';
export type { SnapshotRepository } from './snapshot.repository.js';
export { MongoSnapshotRepository, InMemorySnapshotRepository } from './snapshot.repository.js';
export { AnalysisSnapshotModel } from './snapshot.model.js';
