// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadSettings } from './config/settings.js';
import { createServer } from './server.js';
import { createLogger, errorForLog } from './utils/logger.js';

async function main(): Promise<void> {
  const settings = loadSettings();
  const { app } = await createServer(settings);

  // This helper closes the server so in-flight requests finish before the process exits.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ signal }, 'shutdown_started');
    await app.close();
    app.log.info({ signal }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await app.listen({ host: settings.host, port: settings.port });
  app.log.info({ host: settings.host, port: settings.port, endpoint: settings.endpoint }, 'server_started');
}

main().catch((error: unknown) => {
  createLogger().error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
  process.exit(1);
});
