import mongoose, { type Connection } from 'mongoose';
import { logger } from '../lib/logger.js';

const dbLogger = logger.child({ module: 'mongodb' });

mongoose.connection.on('error', error => dbLogger.error({ error }, 'MongoDB connection error'));
mongoose.connection.on('disconnected', () => dbLogger.warn('MongoDB disconnected'));

/**
 * Open the shared Mongoose connection used by the content store.
 *
 * Index creation is left to `MongoContentStore.ensureIndexes()`; the store
 * registers no Mongoose models, so `autoIndex` stays off.
 */
export async function connectDatabase(uri: string): Promise<Connection> {
  await mongoose.connect(uri, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000,
    autoIndex: false
  });
  dbLogger.info({ database: mongoose.connection.name }, 'MongoDB connected');
  return mongoose.connection;
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}
