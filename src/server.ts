/**
 * Calculations API - server entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import { env } from './config/env.js';
import { buildApp } from './app.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';
import { createStorage } from './db/storage.js';

async function main(): Promise<void> {
  console.log(`[Boot] Storage driver: ${env.STORAGE_DRIVER}`);

  if (env.STORAGE_DRIVER === 'mongo') {
    await connectMongo({ url: env.MONGO_URL, dbName: env.MONGO_DB });
    await ensureIndexes();
  }

  const app = buildApp({ storage: createStorage(env.STORAGE_DRIVER) });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Boot] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Boot] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[Boot] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  ✅ Calculations API started on port ${env.PORT}`);
  console.log('═══════════════════════════════════════════════════════════════');
}

main().catch((err) => {
  console.error('[Boot] Failed to start:', err);
  process.exit(1);
});
