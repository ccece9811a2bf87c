import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createRuntime } from './bootstrap.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const runtime = createRuntime(config, logger);

  const app = await createApp({
    orchestrator: runtime.orchestrator,
    storageDriver: runtime.store.driver,
    corsOrigins: config.corsOrigins,
    logLevel: config.logLevel,
  });

  await app.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port }, 'Discharge clearance API listening');

  function shutdown(signal: string) {
    logger.info({ signal }, 'Shutting down gracefully');
    Promise.all([app.close(), runtime.close()])
      .then(() => {
        logger.info('Server closed');
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  }

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
