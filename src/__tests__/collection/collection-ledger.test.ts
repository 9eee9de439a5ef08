import { beforeEach, describe, expect, it } from 'vitest';
import { CollectionLedger, MAX_QUANTITY } from '../../services/collection/collection-ledger.js';
import { ValidationError } from '../../utils/errors.js';
import { MemoryUnitOfWork, makeCard } from '../helpers/memory-unit-of-work.js';

describe('CollectionLedger', () => {
  let uow: MemoryUnitOfWork;
  let ledger: CollectionLedger;

  beforeEach(() => {
    uow = new MemoryUnitOfWork();
    uow.addCard(makeCard({ id: 'bolt', name: 'Lightning Bolt' }));
    ledger = new CollectionLedger(uow.repos.collection);
  });

  it('refuses a holding larger than an INTEGER column holds', async () => {
    await ledger.setExact('bolt', MAX_QUANTITY, false);

    await expect(ledger.adjust('bolt', 1, false)).rejects.toBeInstanceOf(ValidationError);
    await expect(ledger.setExact('bolt', MAX_QUANTITY + 1, false)).rejects.toThrow(
      'Quantity 2147483648 exceeds the maximum of 2147483647',
    );
    expect(uow.quantity('bolt')).toBe(MAX_QUANTITY);
  });

  it('reads an absent holding as zero', async () => {
    await expect(ledger.quantityOf('bolt', false)).resolves.toBe(0);
  });

  it('creates and then accumulates a holding', async () => {
    await expect(ledger.adjust('bolt', 3, false)).resolves.toBe(3);
    await expect(ledger.adjust('bolt', 2, false)).resolves.toBe(5);
    expect(uow.quantity('bolt')).toBe(5);
  });

  it('keeps finishes apart', async () => {
    await ledger.adjust('bolt', 2, false);
    await ledger.adjust('bolt', 1, true);

    await expect(ledger.totals('bolt')).resolves.toEqual({ nonFoil: 2, foil: 1 });
  });

  it('deletes the entry instead of storing zero', async () => {
    await ledger.adjust('bolt', 2, false);
    await expect(ledger.adjust('bolt', -2, false)).resolves.toBe(0);

    expect(uow.hasEntry('bolt')).toBe(false);
  });

  it('never creates a row from a non-positive adjustment', async () => {
    await expect(ledger.adjust('bolt', -1, false)).resolves.toBe(0);
    expect(uow.hasEntry('bolt')).toBe(false);
  });

  it('sets an exact quantity', async () => {
    await ledger.adjust('bolt', 7, true);
    await expect(ledger.setExact('bolt', 3, true)).resolves.toBe(3);
    expect(uow.quantity('bolt', true)).toBe(3);
  });

  it('removes on setExact(0) and stays idempotent', async () => {
    await ledger.adjust('bolt', 4, false);

    await ledger.setExact('bolt', 0, false);
    await ledger.setExact('bolt', 0, false);

    expect(uow.hasEntry('bolt')).toBe(false);
  });

  it('keeps added_at when a holding changes', async () => {
    await ledger.adjust('bolt', 1, false);
    const first = uow.state.collection.get('bolt:false')?.added_at;

    await ledger.setExact('bolt', 9, false);

    expect(uow.state.collection.get('bolt:false')?.added_at).toBe(first);
  });
});
