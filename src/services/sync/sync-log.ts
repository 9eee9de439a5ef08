import { z } from 'zod';
import type { Queryable } from '../../db/pool.js';
import type { SyncContext } from '../logger/correlation.js';

export type SyncStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export interface SyncCounts {
  processed: number;
  stored: number;
  skipped: number;
  failed: number;
}

/** One row per sync run, so the last outcome survives a restart. */
export interface SyncRunLog {
  start(ctx: SyncContext): Promise<number>;
  finish(runId: number, status: 'completed' | 'cancelled', counts: SyncCounts): Promise<void>;
  fail(runId: number, errorMessage: string, counts: SyncCounts): Promise<void>;
}

const idSchema = z.object({ id: z.number().int() });

export class PgSyncRunLog implements SyncRunLog {
  constructor(private readonly db: Queryable) {}

  async start(ctx: SyncContext): Promise<number> {
    const { rows } = await this.db.query(
      `INSERT INTO sync_log (sync_type, set_code, status) VALUES ($1, $2, 'running') RETURNING id`,
      [ctx.syncType, ctx.setCode ?? null],
    );
    return idSchema.parse(rows[0]).id;
  }

  async finish(runId: number, status: 'completed' | 'cancelled', counts: SyncCounts): Promise<void> {
    await this.db.query(
      `UPDATE sync_log
       SET status = $2, completed_at = NOW(), processed = $3, stored = $4, skipped = $5, failed = $6
       WHERE id = $1`,
      [runId, status, counts.processed, counts.stored, counts.skipped, counts.failed],
    );
  }

  async fail(runId: number, errorMessage: string, counts: SyncCounts): Promise<void> {
    await this.db.query(
      `UPDATE sync_log
       SET status = 'failed', completed_at = NOW(), processed = $2, stored = $3, skipped = $4, failed = $5,
           error_message = $6
       WHERE id = $1`,
      [runId, counts.processed, counts.stored, counts.skipped, counts.failed, errorMessage],
    );
  }
}
