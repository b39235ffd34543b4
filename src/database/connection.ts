import mongoose from 'mongoose';
import { createModuleLogger } from '../utils/logger.js';

const log = createModuleLogger('database');

export async function connectDatabase(uri: string): Promise<void> {
  mongoose.connection.on('error', (error) => {
    log.error({ err: error }, 'MongoDB connection error');
  });
  mongoose.connection.on('disconnected', () => {
    log.warn('MongoDB disconnected');
  });

  await mongoose.connect(uri);
  log.info('Connected to MongoDB');
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
  log.info('Disconnected from MongoDB');
}
