import { PgCardLookup, type CardLookup } from '../services/catalog/card-store.js';
import {
  PgCollectionRepository,
  type CollectionRepository,
} from '../services/collection/collection-repository.js';
import { PgDeckRepository, type DeckRepository } from '../services/decks/deck-repository.js';
import { PgTradeRepository, type TradeRepository } from '../services/trades/trade-repository.js';
import { withTransaction, type Database, type Queryable } from './pool.js';

/** Repositories bound to one connection, and so to one transaction. */
export interface Repositories {
  cards: CardLookup;
  collection: CollectionRepository;
  trades: TradeRepository;
  decks: DeckRepository;
  /**
   * Serialize read-modify-write on one (card, finish) holding. Held until the
   * surrounding transaction ends.
   */
  lockHolding(cardId: string, isFoil: boolean): Promise<void>;
}

export interface UnitOfWork {
  /** All-or-nothing: a throw inside `fn` rolls back every write. */
  transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
  /** Plain reads, no transaction. */
  read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T>;
}

export function holdingLockKey(cardId: string, isFoil: boolean): string {
  return `holding:${cardId}:${isFoil ? 'foil' : 'nonfoil'}`;
}

function pgRepositories(db: Queryable): Repositories {
  return {
    cards: new PgCardLookup(db),
    collection: new PgCollectionRepository(db),
    trades: new PgTradeRepository(db),
    decks: new PgDeckRepository(db),
    async lockHolding(cardId, isFoil) {
      await db.query('SELECT pg_advisory_xact_lock(hashtext($1))', [holdingLockKey(cardId, isFoil)]);
    },
  };
}

export class PgUnitOfWork implements UnitOfWork {
  constructor(private readonly db: Database) {}

  transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return withTransaction(this.db, (client) => fn(pgRepositories(client)));
  }

  read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return fn(pgRepositories(this.db));
  }
}
