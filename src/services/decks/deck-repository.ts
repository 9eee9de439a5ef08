import { z } from 'zod';
import { valuesClause } from '../../db/batch.js';
import type { Queryable } from '../../db/pool.js';

export interface DeckLine {
  card_name: string;
  quantity: number;
  is_sideboard: boolean;
}

export interface DeckFields {
  name: string;
  description: string;
  format: string;
}

export interface DeckRecord extends DeckFields {
  id: number;
  created_at: Date;
  updated_at: Date;
}

export interface DeckWithLines extends DeckRecord {
  lines: DeckLine[];
}

export interface DeckRepository {
  insert(fields: DeckFields): Promise<DeckRecord>;
  /** Null when the deck does not exist. */
  update(deckId: number, fields: DeckFields): Promise<DeckRecord | null>;
  /** Drop every line of the deck and write `lines` in their place. */
  replaceLines(deckId: number, lines: DeckLine[]): Promise<void>;
  findById(deckId: number): Promise<DeckWithLines | null>;
  /** Newest first. */
  list(): Promise<DeckWithLines[]>;
  remove(deckId: number): Promise<boolean>;
  clear(): Promise<number>;
}

const deckSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  description: z.string(),
  format: z.string(),
  created_at: z.date(),
  updated_at: z.date(),
});

const lineSchema = z.object({
  deck_id: z.number().int(),
  card_name: z.string(),
  quantity: z.number().int(),
  is_sideboard: z.boolean(),
});

const DECK_COLUMNS = 'id, name, description, format, created_at, updated_at';

export class PgDeckRepository implements DeckRepository {
  constructor(private readonly db: Queryable) {}

  async insert(fields: DeckFields): Promise<DeckRecord> {
    const { rows } = await this.db.query(
      `INSERT INTO decks (name, description, format) VALUES ($1, $2, $3) RETURNING ${DECK_COLUMNS}`,
      [fields.name, fields.description, fields.format],
    );
    return deckSchema.parse(rows[0]);
  }

  async update(deckId: number, fields: DeckFields): Promise<DeckRecord | null> {
    const { rows } = await this.db.query(
      `UPDATE decks SET name = $2, description = $3, format = $4, updated_at = NOW()
       WHERE id = $1
       RETURNING ${DECK_COLUMNS}`,
      [deckId, fields.name, fields.description, fields.format],
    );
    return rows.length > 0 ? deckSchema.parse(rows[0]) : null;
  }

  async replaceLines(deckId: number, lines: DeckLine[]): Promise<void> {
    await this.db.query('DELETE FROM deck_cards WHERE deck_id = $1', [deckId]);
    if (lines.length === 0) return;

    await this.db.query(
      `INSERT INTO deck_cards (deck_id, card_name, quantity, is_sideboard)
       VALUES ${valuesClause(lines.length, 4)}`,
      lines.flatMap((l) => [deckId, l.card_name, l.quantity, l.is_sideboard]),
    );
  }

  async findById(deckId: number): Promise<DeckWithLines | null> {
    const { rows } = await this.db.query(`SELECT ${DECK_COLUMNS} FROM decks WHERE id = $1`, [deckId]);
    if (rows.length === 0) return null;

    const [deck] = await this.attachLines([deckSchema.parse(rows[0])]);
    return deck ?? null;
  }

  async list(): Promise<DeckWithLines[]> {
    const { rows } = await this.db.query(`SELECT ${DECK_COLUMNS} FROM decks ORDER BY created_at DESC, id DESC`);
    return this.attachLines(rows.map((r) => deckSchema.parse(r)));
  }

  async remove(deckId: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM decks WHERE id = $1', [deckId]);
    return (result.rowCount ?? 0) > 0;
  }

  async clear(): Promise<number> {
    const result = await this.db.query('DELETE FROM decks');
    return result.rowCount ?? 0;
  }

  private async attachLines(decks: DeckRecord[]): Promise<DeckWithLines[]> {
    if (decks.length === 0) return [];

    const { rows } = await this.db.query(
      `SELECT deck_id, card_name, quantity, is_sideboard
       FROM deck_cards
       WHERE deck_id = ANY($1::int[])
       ORDER BY card_name`,
      [decks.map((d) => d.id)],
    );

    const byDeck = new Map<number, DeckLine[]>();
    for (const row of rows) {
      const { deck_id, ...line } = lineSchema.parse(row);
      const lines = byDeck.get(deck_id) ?? [];
      lines.push(line);
      byDeck.set(deck_id, lines);
    }

    return decks.map((deck) => ({ ...deck, lines: byDeck.get(deck.id) ?? [] }));
  }
}
