import type pino from 'pino';
import { MissingIdentifierError, getErrorMessage } from '../../utils/errors.js';
import type { CardRow, SetRow } from '../catalog/normalizer.js';
import { normalizeSet } from '../catalog/normalizer.js';
import { createSyncContext, type SyncContext } from '../logger/correlation.js';
import { createLogger } from '../logger/index.js';
import type { SyncCounts, SyncRunLog } from './sync-log.js';

const logger = createLogger('sync');

function memUsage(): string {
  const mem = process.memoryUsage();
  return `rss=${Math.round(mem.rss / 1024 / 1024)}MB heap=${Math.round(mem.heapUsed / 1024 / 1024)}/${Math.round(mem.heapTotal / 1024 / 1024)}MB`;
}

/** What the pipeline reads from. ScryfallClient satisfies it. */
export interface CatalogSource {
  listSets(): Promise<unknown[]>;
  listSetCards(setCode: string): AsyncIterable<unknown[]>;
  downloadBulkCards(): Promise<unknown[]>;
}

/** What the pipeline writes to. CardStore satisfies it. */
export interface CatalogSink {
  upsertSets(sets: SetRow[]): Promise<number>;
  storeRawCard(raw: unknown, fallbackSetCode?: string): Promise<CardRow>;
  listSets(): Promise<SetRow[]>;
}

export interface SyncResult extends SyncCounts {
  /** The run stopped early on its abort signal. Items stored so far stay stored. */
  cancelled: boolean;
}

export interface AllSetsSyncResult extends SyncResult {
  sets: number;
  failedSets: string[];
}

export interface SyncOptions {
  signal?: AbortSignal;
}

function emptyCounts(): SyncCounts {
  return { processed: 0, stored: 0, skipped: 0, failed: 0 };
}

/**
 * Drives catalog ingestion: fetch, normalize, store. A bad record is logged
 * and counted, never fatal to the batch.
 */
export class SyncService {
  constructor(
    private readonly source: CatalogSource,
    private readonly sink: CatalogSink,
    private readonly runLog: SyncRunLog,
  ) {}

  async syncSets(): Promise<SyncResult> {
    return this.track(createSyncContext('sets'), async (log, counts) => {
      const rawSets = await this.source.listSets();
      const rows: SetRow[] = [];

      for (const raw of rawSets) {
        counts.processed++;
        try {
          rows.push(normalizeSet(raw));
        } catch (err) {
          this.countFailure(err, counts, log, {});
        }
      }

      await this.sink.upsertSets(rows);
      counts.stored += rows.length;
      log.info({ fetched: rawSets.length, stored: rows.length }, 'Sets upserted');
      return { ...counts, cancelled: false };
    });
  }

  async syncSetCards(setCode: string, opts: SyncOptions = {}): Promise<SyncResult> {
    return this.track(createSyncContext('set_cards', setCode), async (log, counts) => {
      const cancelled = await this.storeSetCards(setCode, counts, log, opts.signal);
      return { ...counts, cancelled };
    });
  }

  /**
   * Walk sets one after another. A set that fails to fetch is logged and
   * skipped; the signal is honoured between sets and between cards.
   */
  async syncAllSetCards(opts: SyncOptions & { setCodes?: string[] } = {}): Promise<AllSetsSyncResult> {
    return this.track(createSyncContext('all_set_cards'), async (log, counts) => {
      const setCodes = opts.setCodes ?? (await this.sink.listSets()).map((s) => s.code);
      const failedSets: string[] = [];
      let sets = 0;
      let cancelled = false;

      for (let i = 0; i < setCodes.length; i++) {
        const setCode = setCodes[i];
        if (opts.signal?.aborted) {
          cancelled = true;
          break;
        }

        try {
          cancelled = await this.storeSetCards(setCode, counts, log.child({ setCode }), opts.signal);
          sets++;
        } catch (err) {
          failedSets.push(setCode);
          log.error({ setCode, error: getErrorMessage(err) }, 'Set failed, continuing with the next one');
        }

        log.info({ progress: `${i + 1}/${setCodes.length}`, setCode, stored: counts.stored, mem: memUsage() }, 'Set done');
        if (cancelled) break;
      }

      return { ...counts, cancelled, sets, failedSets };
    });
  }

  /** Store the whole bulk corpus through the same per-card path. */
  async syncBulk(opts: SyncOptions = {}): Promise<SyncResult> {
    return this.track(createSyncContext('bulk'), async (log, counts) => {
      const cards = await this.source.downloadBulkCards();
      let cancelled = false;

      for (const raw of cards) {
        if (opts.signal?.aborted) {
          cancelled = true;
          break;
        }
        await this.storeCard(raw, '', counts, log);

        if (counts.processed % 1000 === 0) {
          log.info({ processed: counts.processed, total: cards.length, mem: memUsage() }, 'Bulk progress');
        }
      }

      return { ...counts, cancelled };
    });
  }

  // --- internals ---

  /** Returns true when the signal stopped the walk. */
  private async storeSetCards(
    setCode: string,
    counts: SyncCounts,
    log: pino.Logger,
    signal?: AbortSignal,
  ): Promise<boolean> {
    for await (const page of this.source.listSetCards(setCode)) {
      for (const raw of page) {
        if (signal?.aborted) return true;
        await this.storeCard(raw, setCode, counts, log);
      }
      log.debug({ setCode, stored: counts.stored }, 'Page stored');
    }
    return false;
  }

  private async storeCard(raw: unknown, fallbackSetCode: string, counts: SyncCounts, log: pino.Logger): Promise<void> {
    counts.processed++;
    try {
      await this.sink.storeRawCard(raw, fallbackSetCode);
      counts.stored++;
    } catch (err) {
      this.countFailure(err, counts, log, { setCode: fallbackSetCode || undefined });
    }
  }

  private countFailure(err: unknown, counts: SyncCounts, log: pino.Logger, fields: Record<string, unknown>): void {
    if (err instanceof MissingIdentifierError) {
      counts.skipped++;
      log.warn({ ...fields, ...err.context }, 'Skipping record without id');
    } else {
      counts.failed++;
      log.error({ ...fields, error: getErrorMessage(err) }, 'Failed to store record');
    }
  }

  /** Record the run in sync_log and bind its correlation id to every log line. */
  private async track<T extends SyncResult>(
    ctx: SyncContext,
    work: (log: pino.Logger, counts: SyncCounts) => Promise<T>,
  ): Promise<T> {
    const log = logger.child({ ...ctx });
    const counts = emptyCounts();
    const runId = await this.runLog.start(ctx);
    log.info('Sync started');

    try {
      const result = await work(log, counts);
      await this.runLog.finish(runId, result.cancelled ? 'cancelled' : 'completed', counts);
      log.info(
        {
          processed: result.processed,
          stored: result.stored,
          skipped: result.skipped,
          failed: result.failed,
          cancelled: result.cancelled,
        },
        result.cancelled ? 'Sync cancelled' : 'Sync complete',
      );
      return result;
    } catch (err) {
      log.error({ error: getErrorMessage(err), ...counts }, 'Sync failed');
      await this.runLog.fail(runId, getErrorMessage(err), counts).catch((logErr: unknown) => {
        log.error({ error: getErrorMessage(logErr) }, 'Could not record sync failure');
      });
      throw err;
    }
  }
}
