/**
 * Forecast dashboard data server
 *
 * Boots the Fastify app, listens on HOST:PORT and shuts down cleanly
 * on SIGTERM/SIGINT (which also closes the forecast client).
 */

import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    await app.close();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => {
      console.error('[Server] Shutdown failed:', err);
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => {
      console.error('[Server] Shutdown failed:', err);
      process.exit(1);
    });
  });

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  Forecast data server started on ${env.HOST}:${env.PORT}`);
  console.log(`  Backend API: ${env.FORECAST_API_BASE_URL} (format=${env.FORECAST_API_FORMAT})`);
  console.log(`  Cache: ${env.CACHE_ENABLED ? `enabled, ${env.CACHE_TIMEOUT}s` : 'disabled'}`);
  console.log('═══════════════════════════════════════════════════════════════');
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
