/**
 * MongoDB connection (mongoose)
 */

import mongoose from 'mongoose';
import { env } from '../config/env.js';

let connected = false;

export function isMongoConnected(): boolean {
  return connected;
}

/** Connects when MONGO_URL is set; returns false when running without a database. */
export async function connectMongo(): Promise<boolean> {
  if (connected) return true;
  if (!env.MONGO_URL) {
    console.log('[DB] MONGO_URL not set, snapshots stay in memory');
    return false;
  }

  await mongoose.connect(env.MONGO_URL, {
    dbName: env.DB_NAME,
    serverSelectionTimeoutMS: 10000,
  });
  connected = true;
  console.log(`[DB] Connected to MongoDB (${env.DB_NAME})`);
  return true;
}

export async function disconnectMongo(): Promise<void> {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
  console.log('[DB] Disconnected from MongoDB');
}
