import { randomUUID } from 'crypto';

/**
 * Generate a short correlation ID for tracing one sync run through the logs.
 * Uses first 8 chars of a UUID for brevity in logs.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

export type SyncType = 'sets' | 'set_cards' | 'all_set_cards' | 'bulk';

/**
 * Bound to a run's child logger, so every line of that run carries it.
 */
export interface SyncContext {
  correlationId: string;
  syncType: SyncType;
  setCode?: string;
}

export function createSyncContext(syncType: SyncType, setCode?: string): SyncContext {
  return {
    correlationId: generateCorrelationId(),
    syncType,
    ...(setCode ? { setCode } : {}),
  };
}
