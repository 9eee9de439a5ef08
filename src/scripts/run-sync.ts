/**
 * Catalog import driver.
 *
 * Usage:
 *   npm run sync -- --sets
 *   npm run sync -- --set neo
 *   npm run sync -- --all
 *   npm run sync -- --bulk
 *
 * Ctrl-C stops the run between cards; everything stored so far stays.
 */
import { Command } from 'commander';
import { config } from '../config/index.js';
import { createServices } from '../container.js';
import { createPool } from '../db/pool.js';
import { createLogger } from '../services/logger/index.js';

const logger = createLogger('run-sync');

interface SyncCliOptions {
  sets?: boolean;
  set?: string;
  all?: boolean;
  bulk?: boolean;
}

async function main(): Promise<void> {
  const program = new Command()
    .name('run-sync')
    .description('Import sets and cards from the Scryfall catalog')
    .option('--sets', 'fetch and store every set')
    .option('--set <code>', 'fetch and store every printing in one set')
    .option('--all', 'fetch and store the cards of every stored set, one set at a time')
    .option('--bulk', 'load the default_cards bulk file');
  program.parse();

  const options = program.opts<SyncCliOptions>();
  if (!options.sets && !options.set && !options.all && !options.bulk) {
    program.help();
  }

  const pool = createPool(config.DATABASE_URL);
  const { sync } = createServices(pool, config);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted, finishing the current card and stopping');
    controller.abort();
  });
  const signal = controller.signal;

  try {
    if (options.sets) {
      logger.info(await sync.syncSets(), 'Set sync finished');
    }
    if (options.set && !signal.aborted) {
      logger.info(await sync.syncSetCards(options.set.toLowerCase(), { signal }), 'Set card sync finished');
    }
    if (options.all && !signal.aborted) {
      logger.info(await sync.syncAllSetCards({ signal }), 'All-set card sync finished');
    }
    if (options.bulk && !signal.aborted) {
      logger.info(await sync.syncBulk({ signal }), 'Bulk sync finished');
    }
  } catch (error) {
    logger.error({ err: error }, 'Sync failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Sync driver crashed');
  process.exitCode = 1;
});
