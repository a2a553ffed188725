/**
 * Storage wiring
 *
 * mongo  - Mongoose repositories (requires connectMongo first)
 * memory - process-local maps; for local runs and tests
 */

import { v4 as uuidv4 } from 'uuid';
import {
  MemoryTokenBlacklist,
  MongoTokenBlacklist,
  type TokenBlacklist,
} from '../modules/auth/storage/token-blacklist.js';
import {
  MemoryCalculationRepository,
  MongoCalculationRepository,
  type CalculationRepository,
} from '../modules/calculations/storage/calculation.repository.js';
import {
  MemoryUserRepository,
  MongoUserRepository,
  type UserRepository,
} from '../modules/users/storage/user.repository.js';

export type StorageDriver = 'mongo' | 'memory';

export interface Storage {
  calculations: CalculationRepository;
  users: UserRepository;
  blacklist: TokenBlacklist;
}

export function createMemoryStorage(newId: () => string = uuidv4): Storage {
  return {
    calculations: new MemoryCalculationRepository(newId),
    users: new MemoryUserRepository(newId),
    blacklist: new MemoryTokenBlacklist(),
  };
}

export function createMongoStorage(): Storage {
  return {
    calculations: new MongoCalculationRepository(),
    users: new MongoUserRepository(),
    blacklist: new MongoTokenBlacklist(),
  };
}

export function createStorage(driver: StorageDriver): Storage {
  return driver === 'memory' ? createMemoryStorage() : createMongoStorage();
}
