import type { UnitOfWork } from '../../db/unit-of-work.js';
import { CardNotFoundError, InsufficientHoldingsError, NotFoundError, ValidationError } from '../../utils/errors.js';
import { CollectionLedger, MAX_QUANTITY } from '../collection/collection-ledger.js';
import { createLogger } from '../logger/index.js';
import type { TradeDirection, TradeListItem, TradeRecord, TradeSummary } from './trade-repository.js';

const logger = createLogger('trade-ledger');

export const TRADES_PAGE_SIZE = 50;

export interface TradeInput {
  setCode: string;
  collectorNumber: string;
  direction: TradeDirection;
  quantity: number;
  price: number;
  profit?: number;
  isFoil?: boolean;
  tradeDate?: Date;
}

export interface TradeOutcome {
  trade: TradeRecord;
  /** Holding of the traded finish after the operation. */
  holding: number;
  message: string;
}

export interface TradePage {
  trades: TradeListItem[];
  summary: TradeSummary;
  page: number;
  totalPages: number;
  total: number;
}

function finishLabel(isFoil: boolean): string {
  return isFoil ? 'foil' : 'regular';
}

/**
 * Buy/sell records kept in step with collection holdings. Each operation is
 * one transaction: resolve the card, lock its holding, check, mutate the
 * holding, then write or remove the trade row.
 */
export class TradeLedger {
  constructor(private readonly uow: UnitOfWork) {}

  async add(input: TradeInput): Promise<TradeOutcome> {
    if (!Number.isInteger(input.quantity) || input.quantity <= 0 || input.quantity > MAX_QUANTITY) {
      throw new ValidationError('Quantity must be a positive integer', { quantity: input.quantity });
    }
    if (!Number.isFinite(input.price) || input.price < 0) {
      throw new ValidationError('Price must be a non-negative number', { price: input.price });
    }

    const isFoil = input.isFoil ?? false;
    const { quantity } = input;

    return this.uow.transaction(async (repos) => {
      const card = await repos.cards.findBySetAndCollectorNumber(input.setCode, input.collectorNumber);
      if (!card) {
        throw CardNotFoundError.bySetAndNumber(input.setCode, input.collectorNumber);
      }

      await repos.lockHolding(card.id, isFoil);
      const ledger = new CollectionLedger(repos.collection);

      let holding: number;
      let collectionMessage: string;
      if (input.direction === 'Buy') {
        holding = await ledger.adjust(card.id, quantity, isFoil);
        collectionMessage = `Added ${quantity} ${finishLabel(isFoil)} cards to collection`;
      } else {
        const held = await ledger.quantityOf(card.id, isFoil);
        if (held < quantity) {
          throw new InsufficientHoldingsError(
            `Cannot sell ${quantity} cards. Only ${held} ${finishLabel(isFoil)} cards in collection`,
            held,
            quantity,
          );
        }
        holding = await ledger.setExact(card.id, held - quantity, isFoil);
        collectionMessage = `Removed ${quantity} ${finishLabel(isFoil)} cards from collection`;
      }

      const trade = await repos.trades.insert({
        set_code: input.setCode,
        collector_number: input.collectorNumber,
        direction: input.direction,
        quantity,
        price: input.price,
        total_amount: quantity * input.price,
        profit: input.profit ?? 0,
        is_foil: isFoil,
        created_at: input.tradeDate,
      });

      logger.info(
        { tradeId: trade.id, cardId: card.id, direction: trade.direction, quantity, isFoil, holding },
        'Trade recorded',
      );

      return {
        trade,
        holding,
        message: `Successfully added ${input.direction} trade for ${quantity} ${finishLabel(isFoil)} cards. ${collectionMessage}`,
      };
    });
  }

  /**
   * Remove a trade and undo its effect on the holding. The trade's own stored
   * fields drive the reversal.
   */
  async delete(tradeId: number): Promise<TradeOutcome> {
    return this.uow.transaction(async (repos) => {
      const trade = await repos.trades.lockById(tradeId);
      if (!trade) {
        throw new NotFoundError('Trade', tradeId);
      }

      const card = await repos.cards.findBySetAndCollectorNumber(trade.set_code, trade.collector_number);
      if (!card) {
        throw CardNotFoundError.bySetAndNumber(trade.set_code, trade.collector_number);
      }

      await repos.lockHolding(card.id, trade.is_foil);
      const ledger = new CollectionLedger(repos.collection);
      const label = finishLabel(trade.is_foil);

      let holding: number;
      let collectionMessage: string;
      if (trade.direction === 'Buy') {
        const held = await ledger.quantityOf(card.id, trade.is_foil);
        if (held < trade.quantity) {
          throw new InsufficientHoldingsError(
            `Cannot delete buy trade. Only ${held} ${label} cards in collection`,
            held,
            trade.quantity,
          );
        }
        holding = await ledger.setExact(card.id, held - trade.quantity, trade.is_foil);
        collectionMessage = `Removed ${trade.quantity} ${label} cards from collection`;
      } else {
        holding = await ledger.adjust(card.id, trade.quantity, trade.is_foil);
        collectionMessage = `Added back ${trade.quantity} ${label} cards to collection`;
      }

      if (!(await repos.trades.remove(trade.id))) {
        throw new NotFoundError('Trade', tradeId);
      }

      logger.info({ tradeId, cardId: card.id, direction: trade.direction, holding }, 'Trade deleted');

      return {
        trade,
        holding,
        message: `Successfully deleted ${trade.direction} trade. ${collectionMessage}`,
      };
    });
  }

  async list(page = 1): Promise<TradePage> {
    const current = Math.max(1, Math.floor(page));
    return this.uow.read(async (repos) => {
      const { trades, total } = await repos.trades.list(TRADES_PAGE_SIZE, (current - 1) * TRADES_PAGE_SIZE);
      const summary = await repos.trades.summary();
      return {
        trades,
        summary,
        page: current,
        total,
        totalPages: Math.ceil(total / TRADES_PAGE_SIZE),
      };
    });
  }

  /** Delete every trade record. Holdings are not touched. */
  async clearAll(): Promise<number> {
    const removed = await this.uow.transaction((repos) => repos.trades.clear());
    logger.warn({ removed }, 'All trades cleared');
    return removed;
  }
}
