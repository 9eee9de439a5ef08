import type { UnitOfWork } from '../../db/unit-of-work.js';
import { CardNotFoundError, ValidationError, getErrorMessage } from '../../utils/errors.js';
import type { CardRow } from '../catalog/normalizer.js';
import { createLogger } from '../logger/index.js';
import { CollectionLedger, type HoldingTotals } from './collection-ledger.js';
import { roundCents, unitPrice } from './valuation.js';

const logger = createLogger('collection');

export interface CollectionChange {
  quantity: number;
  totals: HoldingTotals;
  message: string;
}

export interface ValuedCollectionItem {
  card: CardRow;
  is_foil: boolean;
  quantity: number;
  added_at: Date;
  updated_at: Date;
  unit_price: number | null;
  total_value: number | null;
}

export interface CollectionView {
  items: ValuedCollectionItem[];
  totalValue: number;
}

export interface RefreshResult {
  updated: number;
  failed: number;
}

/** Re-fetches and re-stores one catalog card. */
export type CardRefresher = (cardId: string) => Promise<void>;

function finishLabel(isFoil: boolean): string {
  return isFoil ? 'foil' : 'non-foil';
}

export class CollectionService {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly refreshCard: CardRefresher,
  ) {}

  async add(cardId: string, quantity: number, isFoil = false): Promise<CollectionChange> {
    if (!cardId || !Number.isInteger(quantity) || quantity <= 0) {
      throw new ValidationError('Invalid card ID or quantity', { cardId, quantity });
    }

    return this.uow.transaction(async (repos) => {
      if (!(await repos.cards.findById(cardId))) {
        throw CardNotFoundError.byId(cardId);
      }
      await repos.lockHolding(cardId, isFoil);

      const ledger = new CollectionLedger(repos.collection);
      const next = await ledger.adjust(cardId, quantity, isFoil);
      return {
        quantity: next,
        totals: await ledger.totals(cardId),
        message: `Added ${quantity} ${finishLabel(isFoil)} card(s) to collection`,
      };
    });
  }

  /** Set the exact holding; zero removes it. */
  async update(cardId: string, quantity: number, isFoil = false): Promise<CollectionChange> {
    if (!cardId || !Number.isInteger(quantity)) {
      throw new ValidationError('Invalid card ID', { cardId, quantity });
    }

    return this.uow.transaction(async (repos) => {
      if (!(await repos.cards.findById(cardId))) {
        throw CardNotFoundError.byId(cardId);
      }
      await repos.lockHolding(cardId, isFoil);

      const ledger = new CollectionLedger(repos.collection);
      const next = await ledger.setExact(cardId, quantity, isFoil);
      return {
        quantity: next,
        totals: await ledger.totals(cardId),
        message: `Updated ${finishLabel(isFoil)} quantity to ${next}`,
      };
    });
  }

  async totals(cardId: string): Promise<HoldingTotals> {
    return this.uow.read((repos) => new CollectionLedger(repos.collection).totals(cardId));
  }

  async clear(): Promise<number> {
    const removed = await this.uow.transaction((repos) => repos.collection.clear());
    logger.warn({ removed }, 'Collection cleared');
    return removed;
  }

  async list(): Promise<CollectionView> {
    const entries = await this.uow.read((repos) => repos.collection.list());

    let totalValue = 0;
    const items = entries.map((entry): ValuedCollectionItem => {
      const price = unitPrice(entry.card.prices, entry.is_foil);
      const value = price === null ? null : roundCents(price * entry.quantity);
      if (value !== null) totalValue += value;

      return {
        card: entry.card,
        is_foil: entry.is_foil,
        quantity: entry.quantity,
        added_at: entry.added_at,
        updated_at: entry.updated_at,
        unit_price: price,
        total_value: value,
      };
    });

    return { items, totalValue: roundCents(totalValue) };
  }

  /**
   * Refresh catalog data (prices, legalities) for every collected card. A
   * card that fails is counted and skipped.
   */
  async refreshPrices(): Promise<RefreshResult> {
    const cardIds = await this.uow.read((repos) => repos.collection.distinctCardIds());
    const result: RefreshResult = { updated: 0, failed: 0 };

    for (const cardId of cardIds) {
      try {
        await this.refreshCard(cardId);
        result.updated++;
      } catch (err) {
        result.failed++;
        logger.warn({ cardId, error: getErrorMessage(err) }, 'Failed to refresh card');
      }
    }

    logger.info({ ...result, cards: cardIds.length }, 'Collection prices refreshed');
    return result;
  }
}
