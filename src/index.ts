import { loadEnv } from './config/env.js';
import { loadFilters } from './config/filters.js';
import { createLogger } from './lib/logger.js';
import { createAppContext } from './app/context.js';
import { buildHealthServer, startHealthServer, stopHealthServer } from './health/server.js';
import { createScheduler } from './scheduler/index.js';

async function main() {
  // 1. Load and validate environment
  const env = loadEnv();

  // 2. Initialize logger
  const logger = createLogger(env);
  logger.info({ sourceBaseUrl: env.SOURCE_BASE_URL, parseMode: env.SOURCE_PARSE_MODE }, 'Car watch worker starting');

  // 3. Filters
  const filters = loadFilters(env.FILTERS_FILE);
  logger.info({ filters: [...filters.keys()] }, 'Filters loaded');

  // 4. Services (database pool, source, notifier, engines)
  const context = createAppContext(env, logger, filters);

  // 5. Scheduler and health server
  const scheduler = createScheduler(context);
  const server = buildHealthServer(context, { scheduler });
  await startHealthServer(server, env.WORKER_HEALTH_PORT);
  logger.info({ port: env.WORKER_HEALTH_PORT }, 'Health check server started');

  scheduler.start();
  logger.info('Scheduler started');

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutdown signal received');

    try {
      await scheduler.stop();

      await stopHealthServer(server);
      logger.info('Health server stopped');

      await context.close();
      logger.info('Services closed');

      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception; shutting down');
    void shutdown('uncaughtException');
  });
}

main().catch((err) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
