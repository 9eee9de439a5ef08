import { config } from './config/index.js';
import { createPool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { createServices } from './container.js';
import { createLogger } from './services/logger/index.js';

const logger = createLogger('server');

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${String(reason)}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info('Configuration validated');

  // Step 2: Test database connection
  const pool = createPool(config.DATABASE_URL);
  logger.info('Connecting to database...');
  await pool.query('SELECT 1');
  logger.info('Database connected');

  // Step 3: Run migrations
  await runMigrations(config.DATABASE_URL);

  // Step 4: Start Express
  const app = createApp(createServices(pool, config));
  const server = app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error closing database pool');
          process.exit(1);
        },
      );
    });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
