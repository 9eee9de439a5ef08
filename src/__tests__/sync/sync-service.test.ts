import { beforeEach, describe, expect, it } from 'vitest';
import type { CardRow, SetRow } from '../../services/catalog/normalizer.js';
import { normalizeCard, normalizeSet } from '../../services/catalog/normalizer.js';
import type { SyncContext } from '../../services/logger/correlation.js';
import type { SyncCounts, SyncRunLog } from '../../services/sync/sync-log.js';
import { SyncService, type CatalogSink, type CatalogSource } from '../../services/sync/sync-service.js';
import { ExternalFetchError } from '../../utils/errors.js';

class FakeSource implements CatalogSource {
  sets: unknown[] = [];
  pages = new Map<string, unknown[][]>();
  bulk: unknown[] = [];
  brokenSets = new Set<string>();

  async listSets(): Promise<unknown[]> {
    return this.sets;
  }

  async *listSetCards(setCode: string): AsyncIterable<unknown[]> {
    if (this.brokenSets.has(setCode)) {
      throw new ExternalFetchError('Scryfall', 'HTTP 503');
    }
    for (const page of this.pages.get(setCode) ?? []) {
      yield page;
    }
  }

  async downloadBulkCards(): Promise<unknown[]> {
    return this.bulk;
  }
}

class FakeSink implements CatalogSink {
  readonly sets: SetRow[] = [];
  readonly cards: CardRow[] = [];
  onStore?: (row: CardRow) => void;

  async upsertSets(sets: SetRow[]): Promise<number> {
    this.sets.push(...sets);
    return sets.length;
  }

  async storeRawCard(raw: unknown, fallbackSetCode = ''): Promise<CardRow> {
    const row = normalizeCard(raw, fallbackSetCode);
    if (row.id === 'broken') {
      throw new Error('duplicate key value');
    }
    this.cards.push(row);
    this.onStore?.(row);
    return row;
  }

  async listSets(): Promise<SetRow[]> {
    return this.sets;
  }
}

interface RunEntry {
  ctx: SyncContext;
  status: string;
  counts?: SyncCounts;
  error?: string;
}

class FakeRunLog implements SyncRunLog {
  readonly runs: RunEntry[] = [];
  failWrites = false;

  async start(ctx: SyncContext): Promise<number> {
    this.runs.push({ ctx, status: 'running' });
    return this.runs.length;
  }

  async finish(runId: number, status: 'completed' | 'cancelled', counts: SyncCounts): Promise<void> {
    Object.assign(this.runs[runId - 1], { status, counts });
  }

  async fail(runId: number, errorMessage: string, counts: SyncCounts): Promise<void> {
    if (this.failWrites) throw new Error('sync_log unavailable');
    Object.assign(this.runs[runId - 1], { status: 'failed', counts, error: errorMessage });
  }
}

const card = (id: string, set = 'neo') => ({ id, name: `Card ${id}`, set, collector_number: id });

describe('SyncService', () => {
  let source: FakeSource;
  let sink: FakeSink;
  let runLog: FakeRunLog;
  let sync: SyncService;

  beforeEach(() => {
    source = new FakeSource();
    sink = new FakeSink();
    runLog = new FakeRunLog();
    sync = new SyncService(source, sink, runLog);
  });

  it('upserts sets and skips those without an id', async () => {
    source.sets = [
      { id: 's1', code: 'neo', name: 'Kamigawa: Neon Dynasty' },
      { code: 'xxx' },
      { id: 's2', code: 'dmu', name: 'Dominaria United' },
    ];

    const result = await sync.syncSets();

    expect(result).toEqual({ processed: 3, stored: 2, skipped: 1, failed: 0, cancelled: false });
    expect(sink.sets.map((s) => s.code)).toEqual(['neo', 'dmu']);
    expect(runLog.runs).toEqual([
      {
        ctx: expect.objectContaining({ syncType: 'sets' }),
        status: 'completed',
        counts: { processed: 3, stored: 2, skipped: 1, failed: 0 },
      },
    ]);
  });

  it('stores every page of a set and keeps going past bad cards', async () => {
    source.pages.set('neo', [
      [card('1'), { name: 'No Id' }],
      [card('broken'), card('2')],
    ]);

    const result = await sync.syncSetCards('neo');

    expect(result).toEqual({ processed: 4, stored: 2, skipped: 1, failed: 1, cancelled: false });
    expect(sink.cards.map((c) => c.id)).toEqual(['1', '2']);
    expect(runLog.runs[0].ctx).toMatchObject({ syncType: 'set_cards', setCode: 'neo' });
  });

  it('fills a missing set code from the set being synced', async () => {
    source.pages.set('neo', [[{ id: 'a', name: 'Loose Card' }]]);

    await sync.syncSetCards('neo');

    expect(sink.cards[0].set_code).toBe('neo');
  });

  it('stops between cards when aborted and keeps what was stored', async () => {
    const controller = new AbortController();
    source.pages.set('neo', [[card('1'), card('2'), card('3')], [card('4')]]);
    sink.onStore = (row) => {
      if (row.id === '2') controller.abort();
    };

    const result = await sync.syncSetCards('neo', { signal: controller.signal });

    expect(result).toEqual({ processed: 2, stored: 2, skipped: 0, failed: 0, cancelled: true });
    expect(runLog.runs[0].status).toBe('cancelled');
  });

  it('walks every known set and reports the ones that failed', async () => {
    sink.sets.push(
      normalizeSet({ id: 's1', code: 'neo' }),
      normalizeSet({ id: 's2', code: 'dmu' }),
      normalizeSet({ id: 's3', code: 'one' }),
    );
    source.pages.set('neo', [[card('1', 'neo')]]);
    source.brokenSets.add('dmu');
    source.pages.set('one', [[card('2', 'one'), card('3', 'one')]]);

    const result = await sync.syncAllSetCards();

    expect(result).toEqual({
      processed: 3,
      stored: 3,
      skipped: 0,
      failed: 0,
      cancelled: false,
      sets: 2,
      failedSets: ['dmu'],
    });
  });

  it('only walks the requested set codes', async () => {
    source.pages.set('neo', [[card('1')]]);
    source.pages.set('dmu', [[card('2', 'dmu')]]);

    const result = await sync.syncAllSetCards({ setCodes: ['dmu'] });

    expect(result.sets).toBe(1);
    expect(sink.cards.map((c) => c.id)).toEqual(['2']);
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await sync.syncAllSetCards({ setCodes: ['neo'], signal: controller.signal });

    expect(result).toMatchObject({ processed: 0, sets: 0, cancelled: true });
  });

  it('stores bulk cards through the same path', async () => {
    source.bulk = [card('1'), card('2', 'dmu'), {}];

    const result = await sync.syncBulk();

    expect(result).toEqual({ processed: 3, stored: 2, skipped: 1, failed: 0, cancelled: false });
    expect(sink.cards.map((c) => c.set_code)).toEqual(['neo', 'dmu']);
  });

  it('records a failed run and rethrows', async () => {
    source.listSets = async () => {
      throw new ExternalFetchError('Scryfall', 'HTTP 500');
    };

    await expect(sync.syncSets()).rejects.toThrow('Scryfall API error: HTTP 500');
    expect(runLog.runs[0]).toMatchObject({ status: 'failed', error: 'Scryfall API error: HTTP 500' });
  });

  it('rethrows the original error when the failure cannot be recorded', async () => {
    runLog.failWrites = true;
    source.downloadBulkCards = async () => {
      throw new Error('gzip: invalid header');
    };

    await expect(sync.syncBulk()).rejects.toThrow('gzip: invalid header');
  });
});
