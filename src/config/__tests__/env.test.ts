import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('should fall back to defaults', () => {
    expect(loadEnv({})).toMatchObject({
      NODE_ENV: 'development',
      PORT: 8000,
      STORAGE_DRIVER: 'mongo',
      MONGO_DB: 'calculations',
      ACCESS_TOKEN_EXPIRE_MINUTES: 30,
      REFRESH_TOKEN_EXPIRE_DAYS: 7,
    });
  });

  it('should coerce numeric settings', () => {
    const env = loadEnv({ PORT: '3001', ACCESS_TOKEN_EXPIRE_MINUTES: '5' });

    expect(env.PORT).toBe(3001);
    expect(env.ACCESS_TOKEN_EXPIRE_MINUTES).toBe(5);
  });

  it('should fail on malformed values', () => {
    expect(() => loadEnv({ STORAGE_DRIVER: 'redis' })).toThrow(/^\[Config\] Invalid environment: STORAGE_DRIVER/);
  });

  it('should require an explicit JWT secret in production', () => {
    expect(() => loadEnv({ NODE_ENV: 'production' })).toThrow('[Config] JWT_SECRET must be set in production');
    expect(loadEnv({ NODE_ENV: 'production', JWT_SECRET: 'test-secret' }).JWT_SECRET).toBe('test-secret');
  });
});
