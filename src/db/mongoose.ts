/**
 * MongoDB connection (Mongoose)
 */

import mongoose from 'mongoose';

export { mongoose };

export interface MongoOptions {
  url: string;
  dbName: string;
}

export async function connectMongo({ url, dbName }: MongoOptions): Promise<void> {
  if (mongoose.connection.readyState === 1) {
    return;
  }

  mongoose.set('strictQuery', true);

  await mongoose.connect(url, {
    dbName,
    serverSelectionTimeoutMS: 5000,
  });

  console.log(`[DB] Connected to MongoDB (${dbName})`);
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) {
    return;
  }

  await mongoose.disconnect();
  console.log('[DB] Disconnected from MongoDB');
}
