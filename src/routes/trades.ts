import { Router } from 'express';
import { z } from 'zod';
import { validateBody, validateParams } from '../middleware/validation.js';
import { MAX_QUANTITY } from '../services/collection/collection-ledger.js';
import { TRADES_PAGE_SIZE, type TradeLedger } from '../services/trades/trade-ledger.js';
import { parsePage } from '../utils/pagination.js';

const tradeSchema = z.object({
  set_code: z.string().trim().min(1),
  collector_number: z.string().trim().min(1),
  direction: z.enum(['Buy', 'Sell']),
  quantity: z.coerce.number().int().positive().max(MAX_QUANTITY).default(1),
  price: z.coerce.number().min(0).default(0),
  profit: z.coerce.number().default(0),
  is_foil: z.boolean().default(false),
  trade_date: z.coerce.date().optional(),
});

const idParams = z.object({ id: z.coerce.number().int().positive() });

export function createTradesRouter(trades: TradeLedger): Router {
  const router = Router();

  /**
   * GET /api/trades?page= — One page of trades (newest first) plus totals.
   */
  router.get('/', async (req, res) => {
    const result = await trades.list(parsePage(req.query.page, TRADES_PAGE_SIZE));
    res.json({ success: true, ...result });
  });

  router.post('/', async (req, res) => {
    const body = validateBody(tradeSchema, req);
    const outcome = await trades.add({
      setCode: body.set_code,
      collectorNumber: body.collector_number,
      direction: body.direction,
      quantity: body.quantity,
      price: body.price,
      profit: body.profit,
      isFoil: body.is_foil,
      tradeDate: body.trade_date,
    });
    res.status(201).json({ success: true, message: outcome.message, trade: outcome.trade, holding: outcome.holding });
  });

  /**
   * DELETE /api/trades/:id — Remove a trade and reverse its effect on the collection.
   */
  router.delete('/:id', async (req, res) => {
    const { id } = validateParams(idParams, req);
    const outcome = await trades.delete(id);
    res.json({ success: true, message: outcome.message, holding: outcome.holding });
  });

  router.post('/clear', async (_req, res) => {
    const removed = await trades.clearAll();
    res.json({ success: true, message: `Successfully deleted ${removed} trades`, removed });
  });

  return router;
}
