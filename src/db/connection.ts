import mongoose from 'mongoose';
import type { AppConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';

const redact = (url: string) => url.replace(/\/\/[^:]+:[^@]+@/, '//***:***@');

export async function connectDatabase(config: AppConfig, log: Logger): Promise<void> {
  if (config.dbProvider === 'local') {
    log.info('Running in local mode (in-memory store, nothing persisted)');
    return;
  }
  const url = config.mongoUrl || 'mongodb://localhost:27017/holocron';
  log.info(`Connecting to MongoDB: ${redact(url)}`);
  await mongoose.connect(url);
  log.info('MongoDB connected');
}

export async function disconnectDatabase(config: AppConfig): Promise<void> {
  if (config.dbProvider === 'mongo') {
    await mongoose.disconnect();
  }
}
