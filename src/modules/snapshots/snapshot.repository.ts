/**
 * SNAPSHOT REPOSITORY
 *
 * Only the most recent snapshot is ever read back: it supplies the
 * previous ETH/BTC ratio for altseason momentum and the previous risk
 * score for the trend delta.
 */

import type { AnalysisSnapshot } from './snapshot.types.js';
import { AnalysisSnapshotModel } from './snapshot.model.js';

export interface SnapshotRepository {
  getLatest(): Promise<AnalysisSnapshot | null>;
  save(snapshot: AnalysisSnapshot): Promise<void>;
}

interface LeanSnapshot {
  ts: Date;
  fearGreed: number | null;
  btcDominance: number | null;
  ethBtcRatio: number | null;
  sentimentTs: Date | null;
  riskScore: number | null;
  altseasonScore: number | null;
}

function fromDocument(doc: LeanSnapshot): AnalysisSnapshot {
  return {
    ts: doc.ts.getTime(),
    sentiment: {
      fearGreed: doc.fearGreed ?? null,
      btcDominance: doc.btcDominance ?? null,
      ethBtcRatio: doc.ethBtcRatio ?? null,
      ts: doc.sentimentTs ? doc.sentimentTs.getTime() : null,
    },
    riskScore: doc.riskScore ?? null,
    altseasonScore: doc.altseasonScore ?? null,
  };
}

export class MongoSnapshotRepository implements SnapshotRepository {
  async getLatest(): Promise<AnalysisSnapshot | null> {
    const doc: LeanSnapshot | null = await AnalysisSnapshotModel.findOne()
      .sort({ ts: -1 })
      .lean<LeanSnapshot>()
      .exec();
    return doc ? fromDocument(doc) : null;
  }

  async save(snapshot: AnalysisSnapshot): Promise<void> {
    const { sentiment } = snapshot;
    await AnalysisSnapshotModel.create({
      ts: new Date(snapshot.ts),
      fearGreed: sentiment.fearGreed,
      btcDominance: sentiment.btcDominance,
      ethBtcRatio: sentiment.ethBtcRatio,
      sentimentTs: sentiment.ts !== null ? new Date(sentiment.ts) : null,
      riskScore: snapshot.riskScore,
      altseasonScore: snapshot.altseasonScore,
    });
  }
}

/** Process-local store for runs without MONGO_URL, and for tests. Holds the newest snapshot only. */
export class InMemorySnapshotRepository implements SnapshotRepository {
  private latest: AnalysisSnapshot | null = null;

  async getLatest(): Promise<AnalysisSnapshot | null> {
    return this.latest ? structuredClone(this.latest) : null;
  }

  async save(snapshot: AnalysisSnapshot): Promise<void> {
    if (this.latest && snapshot.ts < this.latest.ts) return;
    this.latest = structuredClone(snapshot);
  }

  get size(): number {
    return this.latest ? 1 : 0;
  }
}
