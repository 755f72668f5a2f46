import mongoose from 'mongoose';
import ReportRequest from '@/models/ReportRequest';
import { logger } from '@/utils/logger';

export interface DatabaseConfig {
  uri: string;
  options?: mongoose.ConnectOptions;
}

/**
 * Connects and builds the ledger indexes; the unique index on interval_start
 * must exist before the first get-or-create.
 */
export const connectDB = async (config: DatabaseConfig): Promise<typeof mongoose> => {
  await mongoose.connect(config.uri, config.options);
  await ReportRequest.syncIndexes();
  return mongoose;
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

mongoose.connection.on('connected', () => {
  logger.info('MongoDB connected');
});

mongoose.connection.on('error', (err: Error) => {
  logger.error('MongoDB connection error', { error: err.message });
});

mongoose.connection.on('disconnected', () => {
  logger.info('MongoDB disconnected');
});
