/**
 * ANALYSIS SNAPSHOT MODEL: MongoDB Storage
 *
 * One document per advisory cycle.
 * Collection: advisor_snapshots
 */

import mongoose, { Schema, Document } from 'mongoose';

export interface IAnalysisSnapshot extends Document {
  ts: Date;
  fearGreed: number | null;
  btcDominance: number | null;
  ethBtcRatio: number | null;
  sentimentTs: Date | null;
  riskScore: number | null;
  altseasonScore: number | null;
  createdAt: Date;
  updatedAt: Date;
}

const AnalysisSnapshotSchema = new Schema<IAnalysisSnapshot>({
  ts: { type: Date, required: true },
  fearGreed: { type: Number, default: null },
  btcDominance: { type: Number, default: null },
  ethBtcRatio: { type: Number, default: null },
  sentimentTs: { type: Date, default: null },
  riskScore: { type: Number, default: null },
  altseasonScore: { type: Number, default: null },
}, {
  timestamps: true,
  collection: 'advisor_snapshots'
});

AnalysisSnapshotSchema.index({ ts: -1 });

export const AnalysisSnapshotModel = mongoose.model<IAnalysisSnapshot>('AnalysisSnapshot', AnalysisSnapshotSchema);
