import { runner } from 'node-pg-migrate';
import path from 'node:path';
import { createLogger } from '../services/logger/index.js';

const logger = createLogger('migrate');

export async function runMigrations(databaseUrl: string): Promise<void> {
  logger.info('Running database migrations...');

  await runner({
    databaseUrl,
    dir: path.resolve('migrations'),
    direction: 'up',
    migrationsTable: 'pgmigrations',
    log: (msg: string) => logger.info(msg),
  });

  logger.info('Migrations completed successfully');
}

// Allow running as standalone script: npm run migrate
if (process.argv[1]?.endsWith('migrate.ts')) {
  const { config } = await import('../config/index.js');
  runMigrations(config.DATABASE_URL)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
