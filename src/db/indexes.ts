/**
 * Database Indexes
 * Run this on startup or via migration script
 */

import { mongoose } from './mongoose.js';
import { CalculationModel } from '../modules/calculations/storage/calculation.model.js';
import { UserModel } from '../modules/users/storage/user.model.js';
import { RevokedTokenModel } from '../modules/auth/storage/revoked-token.model.js';

const MODELS = [CalculationModel, UserModel, RevokedTokenModel] as const;

export async function ensureIndexes(): Promise<void> {
  if (!mongoose.connection.db) {
    console.log('[DB] No database connection, skipping indexes');
    return;
  }

  for (const model of MODELS) {
    try {
      await model.createIndexes();
      console.log(`[DB] ${model.collection.collectionName} indexes created`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.log(`[DB] ${model.collection.collectionName} indexes already exist or error:`, message);
    }
  }

  console.log('[DB] Indexes ensured');
}
