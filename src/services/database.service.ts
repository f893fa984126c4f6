import mongoose from 'mongoose';
import {AppConfig} from '../config/env';
import {logger} from '../config/pino.config';
import WAITLIST from '../models/waitlist.model';

export interface DatabaseProbe {
  list_collection_names(): Promise<string[]>;
}

export const mongo_database_probe: DatabaseProbe = {
  async list_collection_names() {
    const db = mongoose.connection.db;

    if (!db) {
      throw Error('Database connection is not established');
    }

    const collections = await db
      .listCollections({}, {nameOnly: true})
      .toArray();

    return collections.map(collection => collection.name);
  },
};

mongoose.connection.on('error', error => {
  logger.error({err: error}, 'MongoDB runtime error');
});

mongoose.connection.on('disconnected', () => {
  logger.warn('MongoDB disconnected');
});

/**
 * Connects mongoose when a database URL is configured. Returns false when the
 * service has to run without a database, either because none is configured or
 * because the first connection attempt failed. A failed index build is logged
 * but does not take the connection away.
 */
export async function connect_db(config: AppConfig): Promise<boolean> {
  if (!config.databaseUrl) {
    logger.warn('DATABASE_URL not set, running without a database');
    return false;
  }

  try {
    logger.info('Connecting to DB');
    await mongoose.connect(config.databaseUrl, {
      dbName: config.databaseName,
      serverSelectionTimeoutMS: 5000,
    });
    logger.info({db: mongoose.connection.name}, 'DB connection established');
  } catch (error) {
    logger.error({err: error}, 'MongoDB connection error');
    return false;
  }

  try {
    // createIndexes only adds missing indexes, it never drops foreign ones
    await WAITLIST.createIndexes();
  } catch (error) {
    // e.g. duplicate emails already stored block the unique index
    logger.error({err: error}, 'Could not build waitlist indexes');
  }

  return true;
}
