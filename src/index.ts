/**
 * Application Entry Point
 *
 * Starts the Express HTTP server and the BullMQ worker in a single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Load category routes (a malformed file is fatal)
 * 3. Start Express server on configured port
 * 4. Start the approval worker
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop accepting new HTTP connections
 * 2. Close the worker (finish current jobs, stop accepting new)
 * 3. Close the queue connection and SMTP transport
 * 4. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createApp } from './webhook/server.js';
import { createWorker, closeWorker, loadCategoryRoutes } from './webhook/worker.js';
import { closeQueue } from './webhook/queue.js';
import { closeSmtpTransport } from './email/index.js';
import { appConfig } from './config.js';

async function main() {
  console.log('[startup] Approval mail bridge starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Kill switch:', appConfig.killSwitch ? 'ACTIVE' : 'inactive');
  if (appConfig.mail.recipientOverride) {
    console.log('[startup] All notifications redirected to recipient override');
  }

  // Fail fast on a bad routes file, before accepting events
  loadCategoryRoutes();

  // Start Express server
  const app = createApp();
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  // Start BullMQ worker
  createWorker();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[shutdown] Received ${signal} — shutting down gracefully...`);

    // Stop accepting new connections
    server.close(() => {
      console.log('[shutdown] HTTP server closed');
    });

    await closeWorker();
    console.log('[shutdown] Worker closed');

    await closeQueue();
    console.log('[shutdown] Queue closed');

    closeSmtpTransport();
    console.log('[shutdown] SMTP transport closed');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      console.error('[shutdown] Error during shutdown:', err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
