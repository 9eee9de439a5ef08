import pg from 'pg';
import { createLogger } from '../services/logger/index.js';

const logger = createLogger('db');

/**
 * The subset of pg.Pool / pg.PoolClient the stores use, so a store can run
 * either on the pool or on a client inside a transaction.
 */
export interface Queryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[],
  ): Promise<pg.QueryResult<R>>;
}

export interface DbClient extends Queryable {
  release(err?: Error | boolean): void;
}

/** A pool that can hand out a dedicated client. pg.Pool satisfies it. */
export interface Database extends Queryable {
  connect(): Promise<DbClient>;
}

export function createPool(connectionString: string): pg.Pool {
  const pool = new pg.Pool({ connectionString, max: 10 });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle database client');
  });

  return pool;
}

export async function withClient<T>(db: Database, fn: (client: DbClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client. Any throw rolls the
 * whole unit back before it propagates.
 */
export async function withTransaction<T>(db: Database, fn: (client: Queryable) => Promise<T>): Promise<T> {
  return withClient(db, async (client) => {
    await client.query('BEGIN');
    try {
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        logger.error({ err: rollbackErr }, 'Rollback failed');
      });
      throw err;
    }
  });
}
