import { ValidationError } from '../../utils/errors.js';
import type { CollectionRepository } from './collection-repository.js';

/** Largest quantity an INTEGER column holds. */
export const MAX_QUANTITY = 2_147_483_647;

function assertStorable(cardId: string, quantity: number): void {
  if (quantity > MAX_QUANTITY) {
    throw new ValidationError(`Quantity ${quantity} exceeds the maximum of ${MAX_QUANTITY}`, { cardId, quantity });
  }
}

export interface HoldingTotals {
  nonFoil: number;
  foil: number;
}

/**
 * Quantity rules over collection_entries: a holding is either a positive
 * count or no row at all. Callers that need read-then-write atomicity run
 * the ledger on a transaction's repository after locking the holding.
 */
export class CollectionLedger {
  constructor(private readonly entries: CollectionRepository) {}

  async quantityOf(cardId: string, isFoil: boolean): Promise<number> {
    const entry = await this.entries.get(cardId, isFoil);
    return entry?.quantity ?? 0;
  }

  async totals(cardId: string): Promise<HoldingTotals> {
    const totals: HoldingTotals = { nonFoil: 0, foil: 0 };
    for (const entry of await this.entries.listForCard(cardId)) {
      if (entry.is_foil) totals.foil += entry.quantity;
      else totals.nonFoil += entry.quantity;
    }
    return totals;
  }

  /** Add `delta` (may be negative). Returns the resulting quantity. */
  async adjust(cardId: string, delta: number, isFoil: boolean): Promise<number> {
    const next = (await this.quantityOf(cardId, isFoil)) + delta;
    if (next <= 0) {
      await this.entries.remove(cardId, isFoil);
      return 0;
    }
    assertStorable(cardId, next);
    await this.entries.save(cardId, isFoil, next);
    return next;
  }

  /** Set the holding outright; zero or less removes it. */
  async setExact(cardId: string, quantity: number, isFoil: boolean): Promise<number> {
    if (quantity <= 0) {
      await this.entries.remove(cardId, isFoil);
      return 0;
    }
    assertStorable(cardId, quantity);
    await this.entries.save(cardId, isFoil, quantity);
    return quantity;
  }
}
