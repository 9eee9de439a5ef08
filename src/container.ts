import type { AppConfig } from './config/index.js';
import type { Database } from './db/pool.js';
import { PgUnitOfWork } from './db/unit-of-work.js';
import { CardStore } from './services/catalog/card-store.js';
import { CollectionService } from './services/collection/collection-service.js';
import { DeckService } from './services/decks/deck-service.js';
import { ScryfallClient } from './services/scryfall/client.js';
import { PgSyncRunLog } from './services/sync/sync-log.js';
import { SyncService } from './services/sync/sync-service.js';
import { TradeLedger } from './services/trades/trade-ledger.js';

export interface Services {
  db: Database;
  scryfall: ScryfallClient;
  store: CardStore;
  collection: CollectionService;
  trades: TradeLedger;
  decks: DeckService;
  sync: SyncService;
}

/** Wire every service onto one pool. */
export function createServices(db: Database, config: AppConfig): Services {
  const scryfall = new ScryfallClient({
    baseUrl: config.SCRYFALL_BASE_URL,
    userAgent: config.SCRYFALL_USER_AGENT,
    requestDelayMs: config.SCRYFALL_REQUEST_DELAY_MS,
    timeoutMs: config.SCRYFALL_TIMEOUT_MS,
  });
  const store = new CardStore(db);
  const uow = new PgUnitOfWork(db);

  const collection = new CollectionService(uow, async (cardId) => {
    await store.storeRawCard(await scryfall.getCard(cardId));
  });

  return {
    db,
    scryfall,
    store,
    collection,
    trades: new TradeLedger(uow),
    decks: new DeckService(uow),
    sync: new SyncService(scryfall, store, new PgSyncRunLog(db)),
  };
}
