/**
 * Process entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import { buildApp } from './app.js';
import { env } from './config/env.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => {
        app.log.error(err, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ host: env.HOST, port: env.PORT });
}

main().catch(err => {
  console.error('[BOOT] Failed to start:', err);
  process.exit(1);
});
