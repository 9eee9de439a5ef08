import { z } from 'zod';
import type { Queryable } from '../../db/pool.js';

export type TradeDirection = 'Buy' | 'Sell';

export interface TradeRecord {
  id: number;
  set_code: string;
  collector_number: string;
  direction: TradeDirection;
  quantity: number;
  price: number;
  total_amount: number;
  profit: number;
  is_foil: boolean;
  created_at: Date;
}

export type NewTrade = Omit<TradeRecord, 'id' | 'created_at'> & { created_at?: Date };

export interface TradeListItem extends TradeRecord {
  card_name: string | null;
  set_name: string | null;
}

export interface TradeSummary {
  totalBought: number;
  totalSold: number;
  totalProfit: number;
}

export interface TradeRepository {
  insert(trade: NewTrade): Promise<TradeRecord>;
  /** Load a trade and hold a row lock on it until the transaction ends. */
  lockById(tradeId: number): Promise<TradeRecord | null>;
  remove(tradeId: number): Promise<boolean>;
  /** Newest first. */
  list(limit: number, offset: number): Promise<{ trades: TradeListItem[]; total: number }>;
  summary(): Promise<TradeSummary>;
  clear(): Promise<number>;
}

// NUMERIC comes back from pg as a string
const money = z.union([z.string(), z.number()]).transform((v) => Number(v));

const tradeSchema = z.object({
  id: z.number().int(),
  set_code: z.string(),
  collector_number: z.string(),
  direction: z.enum(['Buy', 'Sell']),
  quantity: z.number().int(),
  price: money,
  total_amount: money,
  profit: money,
  is_foil: z.boolean(),
  created_at: z.date(),
});

const listItemSchema = tradeSchema.extend({
  card_name: z.string().nullable(),
  set_name: z.string().nullable(),
});

const summarySchema = z.object({
  total_bought: money,
  total_sold: money,
  total_profit: money,
});

const countSchema = z.object({ total: z.number() });

const TRADE_COLUMNS =
  't.id, t.set_code, t.collector_number, t.direction, t.quantity, t.price, t.total_amount, t.profit, t.is_foil, t.created_at';

export class PgTradeRepository implements TradeRepository {
  constructor(private readonly db: Queryable) {}

  async insert(trade: NewTrade): Promise<TradeRecord> {
    const { rows } = await this.db.query(
      `INSERT INTO trades AS t (set_code, collector_number, direction, quantity, price, total_amount, profit, is_foil, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, COALESCE($9, NOW()))
       RETURNING ${TRADE_COLUMNS}`,
      [
        trade.set_code,
        trade.collector_number,
        trade.direction,
        trade.quantity,
        trade.price,
        trade.total_amount,
        trade.profit,
        trade.is_foil,
        trade.created_at ?? null,
      ],
    );
    return tradeSchema.parse(rows[0]);
  }

  async lockById(tradeId: number): Promise<TradeRecord | null> {
    const { rows } = await this.db.query(`SELECT ${TRADE_COLUMNS} FROM trades t WHERE t.id = $1 FOR UPDATE`, [
      tradeId,
    ]);
    return rows.length > 0 ? tradeSchema.parse(rows[0]) : null;
  }

  async remove(tradeId: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM trades WHERE id = $1', [tradeId]);
    return (result.rowCount ?? 0) > 0;
  }

  async list(limit: number, offset: number): Promise<{ trades: TradeListItem[]; total: number }> {
    const countResult = await this.db.query('SELECT COUNT(*)::int AS total FROM trades');
    const { total } = countSchema.parse(countResult.rows[0]);

    const { rows } = await this.db.query(
      `SELECT ${TRADE_COLUMNS}, c.name AS card_name, s.name AS set_name
       FROM trades t
       LEFT JOIN LATERAL (
         SELECT name FROM cards
         WHERE set_code = t.set_code AND collector_number = t.collector_number
         LIMIT 1
       ) c ON TRUE
       LEFT JOIN sets s ON s.code = t.set_code
       ORDER BY t.created_at DESC, t.id DESC
       LIMIT $1 OFFSET $2`,
      [limit, offset],
    );

    return { trades: rows.map((r) => listItemSchema.parse(r)), total };
  }

  async summary(): Promise<TradeSummary> {
    const { rows } = await this.db.query(
      `SELECT
         COALESCE(SUM(total_amount) FILTER (WHERE direction = 'Buy'), 0) AS total_bought,
         COALESCE(SUM(total_amount) FILTER (WHERE direction = 'Sell'), 0) AS total_sold,
         COALESCE(SUM(profit), 0) AS total_profit
       FROM trades`,
    );
    const s = summarySchema.parse(rows[0]);
    return { totalBought: s.total_bought, totalSold: s.total_sold, totalProfit: s.total_profit };
  }

  async clear(): Promise<number> {
    const result = await this.db.query('DELETE FROM trades');
    return result.rowCount ?? 0;
  }
}
