import { z } from 'zod';
import type { Queryable } from '../../db/pool.js';
import type { CardRow } from '../catalog/normalizer.js';
import { storedCardSchema } from '../catalog/row-schemas.js';

export interface CollectionEntry {
  card_id: string;
  is_foil: boolean;
  quantity: number;
  added_at: Date;
  updated_at: Date;
}

export interface CollectionItem extends CollectionEntry {
  card: CardRow;
}

/** Raw access to collection_entries. Quantity rules live in CollectionLedger. */
export interface CollectionRepository {
  get(cardId: string, isFoil: boolean): Promise<CollectionEntry | null>;
  /** Insert or replace the quantity, refreshing updated_at. */
  save(cardId: string, isFoil: boolean, quantity: number): Promise<void>;
  remove(cardId: string, isFoil: boolean): Promise<void>;
  listForCard(cardId: string): Promise<CollectionEntry[]>;
  /** Entries joined with their card, most recently touched first. */
  list(): Promise<CollectionItem[]>;
  distinctCardIds(): Promise<string[]>;
  /** Owned copies per exact card name, summed over printings and finishes. */
  ownedByName(names: string[]): Promise<Map<string, number>>;
  clear(): Promise<number>;
}

const entrySchema = z.object({
  card_id: z.string(),
  is_foil: z.boolean(),
  quantity: z.number().int(),
  added_at: z.date(),
  updated_at: z.date(),
});

// row_to_json keeps jsonb columns nested, so the stored-card schema applies as is
const itemSchema = entrySchema.extend({ card: storedCardSchema });

const cardIdSchema = z.object({ card_id: z.string() });

const ownedSchema = z.object({ name: z.string(), owned: z.number() });

const ENTRY_COLUMNS = 'uc.card_id, uc.is_foil, uc.quantity, uc.added_at, uc.updated_at';

export class PgCollectionRepository implements CollectionRepository {
  constructor(private readonly db: Queryable) {}

  async get(cardId: string, isFoil: boolean): Promise<CollectionEntry | null> {
    const { rows } = await this.db.query(
      `SELECT ${ENTRY_COLUMNS} FROM collection_entries uc WHERE uc.card_id = $1 AND uc.is_foil = $2`,
      [cardId, isFoil],
    );
    return rows.length > 0 ? entrySchema.parse(rows[0]) : null;
  }

  async save(cardId: string, isFoil: boolean, quantity: number): Promise<void> {
    await this.db.query(
      `INSERT INTO collection_entries (card_id, is_foil, quantity)
       VALUES ($1, $2, $3)
       ON CONFLICT (card_id, is_foil) DO UPDATE SET
         quantity = EXCLUDED.quantity,
         updated_at = NOW()`,
      [cardId, isFoil, quantity],
    );
  }

  async remove(cardId: string, isFoil: boolean): Promise<void> {
    await this.db.query('DELETE FROM collection_entries WHERE card_id = $1 AND is_foil = $2', [cardId, isFoil]);
  }

  async listForCard(cardId: string): Promise<CollectionEntry[]> {
    const { rows } = await this.db.query(
      `SELECT ${ENTRY_COLUMNS} FROM collection_entries uc WHERE uc.card_id = $1 ORDER BY uc.is_foil`,
      [cardId],
    );
    return rows.map((r) => entrySchema.parse(r));
  }

  async list(): Promise<CollectionItem[]> {
    const { rows } = await this.db.query(
      `SELECT ${ENTRY_COLUMNS}, row_to_json(c.*) AS card
       FROM collection_entries uc
       JOIN cards c ON uc.card_id = c.id
       ORDER BY uc.updated_at DESC`,
    );
    return rows.map((r) => itemSchema.parse(r));
  }

  async distinctCardIds(): Promise<string[]> {
    const { rows } = await this.db.query('SELECT DISTINCT card_id FROM collection_entries ORDER BY card_id');
    return rows.map((r) => cardIdSchema.parse(r).card_id);
  }

  async ownedByName(names: string[]): Promise<Map<string, number>> {
    const owned = new Map<string, number>();
    if (names.length === 0) return owned;

    const { rows } = await this.db.query(
      `SELECT c.name, SUM(uc.quantity)::int AS owned
       FROM collection_entries uc
       JOIN cards c ON uc.card_id = c.id
       WHERE c.name = ANY($1::text[])
       GROUP BY c.name`,
      [[...new Set(names)]],
    );
    for (const row of rows) {
      const { name, owned: count } = ownedSchema.parse(row);
      owned.set(name, count);
    }
    return owned;
  }

  async clear(): Promise<number> {
    const result = await this.db.query('DELETE FROM collection_entries');
    return result.rowCount ?? 0;
  }
}
