/**
 * MongoDB connection (Mongoose)
 */

import mongoose from 'mongoose';
import { logger } from '../common/logger.js';

let connected = false;

export async function connectMongo(url: string, dbName: string): Promise<void> {
  if (connected) return;
  await mongoose.connect(url, { dbName });
  connected = true;
  logger.info({ dbName }, '[Mongo] Connected');
}

export async function disconnectMongo(): Promise<void> {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
  logger.info('[Mongo] Disconnected');
}

export function isMongoConnected(): boolean {
  return connected && mongoose.connection.readyState === 1;
}
