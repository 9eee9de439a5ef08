import type { Repositories, UnitOfWork } from '../../db/unit-of-work.js';
import { holdingLockKey } from '../../db/unit-of-work.js';
import type { CardRow } from '../../services/catalog/normalizer.js';
import { normalizeCard } from '../../services/catalog/normalizer.js';
import type { CollectionEntry, CollectionItem } from '../../services/collection/collection-repository.js';
import type { DeckWithLines } from '../../services/decks/deck-repository.js';
import type { TradeRecord } from '../../services/trades/trade-repository.js';

interface MemoryState {
  cards: Map<string, CardRow>;
  collection: Map<string, CollectionEntry>;
  trades: Map<number, TradeRecord>;
  decks: Map<number, DeckWithLines>;
  nextTradeId: number;
  nextDeckId: number;
}

function entryKey(cardId: string, isFoil: boolean): string {
  return `${cardId}:${isFoil}`;
}

/** A catalog card with every optional field at its default. */
export function makeCard(fields: Record<string, unknown>): CardRow {
  return normalizeCard(fields);
}

/**
 * In-process stand-in for PgUnitOfWork. `transaction` snapshots the whole
 * state and restores it when the callback throws.
 */
export class MemoryUnitOfWork implements UnitOfWork {
  readonly state: MemoryState = {
    cards: new Map(),
    collection: new Map(),
    trades: new Map(),
    decks: new Map(),
    nextTradeId: 1,
    nextDeckId: 1,
  };

  /** Lock keys taken, in order. */
  readonly locks: string[] = [];
  /** Operation names (e.g. "trades.insert") that throw on their next call. */
  readonly faults = new Set<string>();

  readonly repos: Repositories = this.createRepositories();

  addCard(card: CardRow): CardRow {
    this.state.cards.set(card.id, card);
    return card;
  }

  quantity(cardId: string, isFoil = false): number {
    return this.state.collection.get(entryKey(cardId, isFoil))?.quantity ?? 0;
  }

  hasEntry(cardId: string, isFoil = false): boolean {
    return this.state.collection.has(entryKey(cardId, isFoil));
  }

  async transaction<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    const snapshot = structuredClone(this.state);
    try {
      return await fn(this.repos);
    } catch (err) {
      Object.assign(this.state, snapshot);
      throw err;
    }
  }

  read<T>(fn: (repos: Repositories) => Promise<T>): Promise<T> {
    return fn(this.repos);
  }

  private trip(operation: string): void {
    if (this.faults.delete(operation)) {
      throw new Error(`Injected failure in ${operation}`);
    }
  }

  private createRepositories(): Repositories {
    const state = this.state;
    const trip = (op: string) => this.trip(op);
    const locks = this.locks;

    return {
      cards: {
        async findById(cardId) {
          return state.cards.get(cardId) ?? null;
        },
        async findBySetAndCollectorNumber(setCode, collectorNumber) {
          for (const card of state.cards.values()) {
            if (card.set_code === setCode && card.collector_number === collectorNumber) return card;
          }
          return null;
        },
        async findMissingNames(names) {
          const known = new Set([...state.cards.values()].map((c) => c.name));
          return [...new Set(names)].filter((name) => !known.has(name));
        },
      },

      collection: {
        async get(cardId, isFoil) {
          return state.collection.get(entryKey(cardId, isFoil)) ?? null;
        },
        async save(cardId, isFoil, quantity) {
          trip('collection.save');
          if (quantity <= 0) throw new Error('quantity must be positive');
          const existing = state.collection.get(entryKey(cardId, isFoil));
          const now = new Date();
          state.collection.set(entryKey(cardId, isFoil), {
            card_id: cardId,
            is_foil: isFoil,
            quantity,
            added_at: existing?.added_at ?? now,
            updated_at: now,
          });
        },
        async remove(cardId, isFoil) {
          state.collection.delete(entryKey(cardId, isFoil));
        },
        async listForCard(cardId) {
          return [...state.collection.values()]
            .filter((e) => e.card_id === cardId)
            .sort((a, b) => Number(a.is_foil) - Number(b.is_foil));
        },
        async list() {
          const items: CollectionItem[] = [];
          for (const entry of state.collection.values()) {
            const card = state.cards.get(entry.card_id);
            if (card) items.push({ ...entry, card });
          }
          return items.sort((a, b) => b.updated_at.getTime() - a.updated_at.getTime());
        },
        async distinctCardIds() {
          return [...new Set([...state.collection.values()].map((e) => e.card_id))].sort();
        },
        async ownedByName(names) {
          const wanted = new Set(names);
          const owned = new Map<string, number>();
          for (const entry of state.collection.values()) {
            const card = state.cards.get(entry.card_id);
            if (!card || !wanted.has(card.name)) continue;
            owned.set(card.name, (owned.get(card.name) ?? 0) + entry.quantity);
          }
          return owned;
        },
        async clear() {
          const count = state.collection.size;
          state.collection.clear();
          return count;
        },
      },

      trades: {
        async insert(trade) {
          trip('trades.insert');
          const record: TradeRecord = { ...trade, id: state.nextTradeId++, created_at: trade.created_at ?? new Date() };
          state.trades.set(record.id, record);
          return record;
        },
        async lockById(tradeId) {
          return state.trades.get(tradeId) ?? null;
        },
        async remove(tradeId) {
          return state.trades.delete(tradeId);
        },
        async list(limit, offset) {
          const sorted = [...state.trades.values()].sort(
            (a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id,
          );
          const trades = sorted.slice(offset, offset + limit).map((t) => {
            let cardName: string | null = null;
            for (const card of state.cards.values()) {
              if (card.set_code === t.set_code && card.collector_number === t.collector_number) {
                cardName = card.name;
                break;
              }
            }
            return { ...t, card_name: cardName, set_name: null };
          });
          return { trades, total: sorted.length };
        },
        async summary() {
          let totalBought = 0;
          let totalSold = 0;
          let totalProfit = 0;
          for (const t of state.trades.values()) {
            if (t.direction === 'Buy') totalBought += t.total_amount;
            else totalSold += t.total_amount;
            totalProfit += t.profit;
          }
          return { totalBought, totalSold, totalProfit };
        },
        async clear() {
          const count = state.trades.size;
          state.trades.clear();
          return count;
        },
      },

      decks: {
        async insert(fields) {
          const now = new Date();
          const deck: DeckWithLines = { ...fields, id: state.nextDeckId++, created_at: now, updated_at: now, lines: [] };
          state.decks.set(deck.id, deck);
          const { lines: _lines, ...record } = deck;
          return record;
        },
        async update(deckId, fields) {
          const deck = state.decks.get(deckId);
          if (!deck) return null;
          const updated: DeckWithLines = { ...deck, ...fields, updated_at: new Date() };
          state.decks.set(deckId, updated);
          const { lines: _lines, ...record } = updated;
          return record;
        },
        async replaceLines(deckId, lines) {
          trip('decks.replaceLines');
          const deck = state.decks.get(deckId);
          if (!deck) throw new Error(`deck ${deckId} does not exist`);
          state.decks.set(deckId, {
            ...deck,
            lines: [...lines].sort((a, b) => a.card_name.localeCompare(b.card_name)),
          });
        },
        async findById(deckId) {
          return state.decks.get(deckId) ?? null;
        },
        async list() {
          return [...state.decks.values()].sort((a, b) => b.id - a.id);
        },
        async remove(deckId) {
          return state.decks.delete(deckId);
        },
        async clear() {
          const count = state.decks.size;
          state.decks.clear();
          return count;
        },
      },

      async lockHolding(cardId, isFoil) {
        locks.push(holdingLockKey(cardId, isFoil));
      },
    };
  }
}
