/**
 * News Impact Engine: HTTP entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[BOOT] ${signal} received, closing server...`);
    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((err) => {
      console.error('[BOOT] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal('SIGINT'));
  process.on('SIGTERM', onSignal('SIGTERM'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[BOOT] ✅ News Impact Engine listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err) => {
  console.error('[BOOT] Failed to start server:', err);
  process.exit(1);
});
