import { z } from 'zod';
import { CHUNK_SIZE, chunk, dedup, valuesClause } from '../../db/batch.js';
import { withTransaction, type Database, type Queryable } from '../../db/pool.js';
import { createLogger } from '../logger/index.js';
import { compareCollectorNumbers } from './collector-number.js';
import { decodeFaces, type CardFace } from './face-encoding.js';
import { buildCardHistory, type CardHistory } from './history.js';
import { normalizeCard, type CardRow, type SetRow } from './normalizer.js';
import { storedCardSchema, storedSetSchema } from './row-schemas.js';

const logger = createLogger('card-store');

export const SEARCH_PAGE_SIZE = 20;

// ── Column lists ───────────────────────────────────────────────────

const CARD_COLUMNS = [
  'id', 'name', 'mana_cost', 'cmc', 'type_line', 'oracle_text', 'power', 'toughness',
  'colors', 'color_identity', 'legalities', 'games', 'reserved', 'foil', 'nonfoil',
  'finishes', 'oversized', 'promo', 'reprint', 'variation', 'set_id', 'set_code',
  'set_name', 'collector_number', 'rarity', 'artist', 'border_color', 'frame',
  'full_art', 'textless', 'booster', 'story_spotlight', 'edhrec_rank', 'penny_rank',
  'prices', 'related_uris', 'purchase_uris', 'image_uris', 'card_faces',
] as const satisfies readonly (keyof CardRow)[];

// pg would send JS arrays as Postgres arrays, so jsonb values go out as text
const JSON_COLUMNS: ReadonlySet<keyof CardRow> = new Set<keyof CardRow>([
  'colors', 'color_identity', 'legalities', 'games', 'finishes',
  'prices', 'related_uris', 'purchase_uris', 'image_uris',
]);

const SET_COLUMNS = [
  'id', 'code', 'name', 'set_type', 'released_at', 'block_code', 'block',
  'parent_set_code', 'card_count', 'digital', 'foil_only', 'nonfoil_only',
  'scryfall_uri', 'uri', 'icon_svg_uri', 'search_uri', 'printed_size',
] as const satisfies readonly (keyof SetRow)[];

const CARD_SELECT = CARD_COLUMNS.map((col) => `c.${col}`).join(', ');
const SET_SELECT = SET_COLUMNS.map((col) =>
  col === 'released_at' ? 's.released_at::text AS released_at' : `s.${col}`,
).join(', ');

function cardValues(row: CardRow): unknown[] {
  return CARD_COLUMNS.map((col) => (JSON_COLUMNS.has(col) ? JSON.stringify(row[col]) : row[col]));
}

function updateAssignments(columns: readonly string[]): string {
  return columns
    .filter((col) => col !== 'id')
    .map((col) => `${col} = EXCLUDED.${col}`)
    .join(',\n        ');
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// ── Types ──────────────────────────────────────────────────────────

export interface CardLookup {
  findById(cardId: string): Promise<CardRow | null>;
  findBySetAndCollectorNumber(setCode: string, collectorNumber: string): Promise<CardRow | null>;
  /** Names (deduplicated, input order) with no card of exactly that name. */
  findMissingNames(names: string[]): Promise<string[]>;
}

export type CardPrinting = Pick<CardRow, 'id' | 'set_code' | 'set_name' | 'collector_number' | 'rarity'>;

export interface CardDetail {
  card: CardRow;
  set: SetRow | null;
  faces: CardFace[];
  otherPrintings: CardPrinting[];
}

export interface SearchResult {
  cards: CardRow[];
  total: number;
  page: number;
  totalPages: number;
}

export interface SetInfo {
  name: string;
  card_count: number;
  max_collector_number: number;
}

export interface DatabaseStats {
  total_cards: number;
  total_sets: number;
  collection_cards: number;
  total_trades: number;
  total_decks: number;
}

const countSchema = z.object({ total: z.number() });

const nameSchema = z.object({ name: z.string() });

const statsSchema = z.object({
  total_cards: z.number(),
  total_sets: z.number(),
  collection_cards: z.number(),
  total_trades: z.number(),
  total_decks: z.number(),
});

const setInfoSchema = z.object({
  name: z.string(),
  card_count: z.number(),
  max_collector_number: z.number().nullable(),
});

// ── Lookups usable inside a transaction ────────────────────────────

export class PgCardLookup implements CardLookup {
  constructor(protected readonly db: Queryable) {}

  async findById(cardId: string): Promise<CardRow | null> {
    const { rows } = await this.db.query(`SELECT ${CARD_SELECT} FROM cards c WHERE c.id = $1`, [cardId]);
    return rows.length > 0 ? storedCardSchema.parse(rows[0]) : null;
  }

  async findBySetAndCollectorNumber(setCode: string, collectorNumber: string): Promise<CardRow | null> {
    const { rows } = await this.db.query(
      `SELECT ${CARD_SELECT} FROM cards c WHERE c.set_code = $1 AND c.collector_number = $2 LIMIT 1`,
      [setCode, collectorNumber],
    );
    return rows.length > 0 ? storedCardSchema.parse(rows[0]) : null;
  }

  async findMissingNames(names: string[]): Promise<string[]> {
    const wanted = [...new Set(names)];
    if (wanted.length === 0) return [];

    const { rows } = await this.db.query(
      'SELECT DISTINCT name FROM cards WHERE name = ANY($1::text[])',
      [wanted],
    );
    const found = new Set(rows.map((r) => nameSchema.parse(r).name));
    return wanted.filter((name) => !found.has(name));
  }
}

// ── Store ──────────────────────────────────────────────────────────

/**
 * Relational home of the catalog: sets, cards and their append-only
 * legality/price history.
 */
export class CardStore extends PgCardLookup {
  constructor(private readonly database: Database) {
    super(database);
  }

  async upsertSets(sets: SetRow[]): Promise<number> {
    let total = 0;

    for (const batch of chunk(dedup(sets, (s) => s.id), CHUNK_SIZE)) {
      const values = batch.flatMap((s) => SET_COLUMNS.map((col) => s[col]));
      const result = await this.db.query(
        `INSERT INTO sets (${SET_COLUMNS.join(', ')})
         VALUES ${valuesClause(batch.length, SET_COLUMNS.length)}
         ON CONFLICT (id) DO UPDATE SET
        ${updateAssignments(SET_COLUMNS)},
        updated_at = NOW()`,
        values,
      );
      total += result.rowCount ?? 0;
    }

    return total;
  }

  /**
   * Insert or fully replace a card, then append its history snapshot. Both
   * commit together or not at all.
   */
  async upsertCard(row: CardRow, history: CardHistory): Promise<void> {
    await withTransaction(this.database, async (client) => {
      await client.query(
        `INSERT INTO cards (${CARD_COLUMNS.join(', ')})
         VALUES ${valuesClause(1, CARD_COLUMNS.length)}
         ON CONFLICT (id) DO UPDATE SET
        ${updateAssignments(CARD_COLUMNS)},
        updated_at = NOW()`,
        cardValues(row),
      );

      if (history.legalities.length > 0) {
        await client.query(
          `INSERT INTO card_legalities_history (card_id, format_name, legality_status)
           VALUES ${valuesClause(history.legalities.length, 3)}`,
          history.legalities.flatMap((h) => [h.card_id, h.format_name, h.legality_status]),
        );
      }

      if (history.prices.length > 0) {
        await client.query(
          `INSERT INTO card_prices_history (card_id, price_type, price_value, currency)
           VALUES ${valuesClause(history.prices.length, 4)}`,
          history.prices.flatMap((h) => [h.card_id, h.price_type, h.price_value, h.currency]),
        );
      }
    });
  }

  /** Normalize, snapshot history and upsert one raw catalog record. */
  async storeRawCard(raw: unknown, fallbackSetCode = ''): Promise<CardRow> {
    const row = normalizeCard(raw, fallbackSetCode);
    await this.upsertCard(row, buildCardHistory(row));
    logger.debug({ cardId: row.id, name: row.name }, 'Card stored');
    return row;
  }

  /** Every printing with this exact name, newest set first. */
  async findByName(name: string): Promise<CardRow[]> {
    const { rows } = await this.db.query(
      `SELECT ${CARD_SELECT}
       FROM cards c
       LEFT JOIN sets s ON c.set_code = s.code
       WHERE c.name = $1
       ORDER BY s.released_at DESC NULLS LAST, c.set_code, c.collector_number`,
      [name],
    );
    return rows.map((r) => storedCardSchema.parse(r));
  }

  async getCardDetail(cardId: string): Promise<CardDetail | null> {
    const card = await this.findById(cardId);
    if (!card) return null;

    const set = await this.getSet(card.set_code);
    const otherPrintings = (await this.findByName(card.name))
      .filter((printing) => printing.id !== card.id)
      .map(({ id, set_code, set_name, collector_number, rarity }) => ({
        id,
        set_code,
        set_name,
        collector_number,
        rarity,
      }));

    return {
      card,
      set,
      faces: decodeFaces(card.card_faces),
      otherPrintings,
    };
  }

  /**
   * Case-insensitive substring match over name, type line and oracle text.
   * An empty term matches nothing.
   */
  async search(term: string, page = 1): Promise<SearchResult> {
    const trimmed = term.trim();
    const current = Math.max(1, Math.floor(page));
    if (!trimmed) {
      return { cards: [], total: 0, page: current, totalPages: 0 };
    }

    const pattern = `%${escapeLike(trimmed)}%`;
    const where = 'c.name ILIKE $1 OR c.type_line ILIKE $1 OR c.oracle_text ILIKE $1';

    const countResult = await this.db.query(`SELECT COUNT(*)::int AS total FROM cards c WHERE ${where}`, [
      pattern,
    ]);
    const { total } = countSchema.parse(countResult.rows[0]);

    const { rows } = await this.db.query(
      `SELECT ${CARD_SELECT}
       FROM cards c
       LEFT JOIN sets s ON c.set_code = s.code
       WHERE ${where}
       ORDER BY c.name, s.released_at DESC NULLS LAST
       LIMIT $2 OFFSET $3`,
      [pattern, SEARCH_PAGE_SIZE, (current - 1) * SEARCH_PAGE_SIZE],
    );

    return {
      cards: rows.map((r) => storedCardSchema.parse(r)),
      total,
      page: current,
      totalPages: Math.ceil(total / SEARCH_PAGE_SIZE),
    };
  }

  async listSets(): Promise<SetRow[]> {
    const { rows } = await this.db.query(
      `SELECT ${SET_SELECT} FROM sets s ORDER BY s.released_at DESC NULLS LAST, s.name`,
    );
    return rows.map((r) => storedSetSchema.parse(r));
  }

  async getSet(code: string): Promise<SetRow | null> {
    const { rows } = await this.db.query(`SELECT ${SET_SELECT} FROM sets s WHERE s.code = $1`, [code]);
    return rows.length > 0 ? storedSetSchema.parse(rows[0]) : null;
  }

  /** Cards of a set in collector-number order. */
  async listSetCards(setCode: string): Promise<CardRow[]> {
    const { rows } = await this.db.query(`SELECT ${CARD_SELECT} FROM cards c WHERE c.set_code = $1`, [setCode]);
    return rows
      .map((r) => storedCardSchema.parse(r))
      .sort((a, b) => compareCollectorNumbers(a.collector_number, b.collector_number));
  }

  /** Highest numeric collector number only looks at the leading digits. */
  async getSetInfo(code: string): Promise<SetInfo | null> {
    const { rows } = await this.db.query(
      `SELECT s.name, s.card_count,
              (SELECT MAX(CAST(substring(c.collector_number FROM '^[0-9]+') AS INTEGER))
               FROM cards c WHERE c.set_code = s.code) AS max_collector_number
       FROM sets s
       WHERE s.code = $1`,
      [code],
    );
    if (rows.length === 0) return null;

    const info = setInfoSchema.parse(rows[0]);
    return { ...info, max_collector_number: info.max_collector_number ?? 0 };
  }

  async getStats(): Promise<DatabaseStats> {
    const { rows } = await this.db.query(
      `SELECT
         (SELECT COUNT(*)::int FROM cards) AS total_cards,
         (SELECT COUNT(*)::int FROM sets) AS total_sets,
         (SELECT COUNT(*)::int FROM collection_entries) AS collection_cards,
         (SELECT COUNT(*)::int FROM trades) AS total_trades,
         (SELECT COUNT(*)::int FROM decks) AS total_decks`,
    );
    return statsSchema.parse(rows[0]);
  }
}
