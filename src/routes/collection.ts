import { Router } from 'express';
import { z } from 'zod';
import { validateBody } from '../middleware/validation.js';
import { MAX_QUANTITY } from '../services/collection/collection-ledger.js';
import type { CollectionService } from '../services/collection/collection-service.js';

const addSchema = z.object({
  card_id: z.string().trim().min(1),
  quantity: z.coerce.number().int().positive().max(MAX_QUANTITY).default(1),
  is_foil: z.boolean().default(false),
});

const updateSchema = z.object({
  card_id: z.string().trim().min(1),
  quantity: z.coerce.number().int().min(0).max(MAX_QUANTITY).default(0),
  is_foil: z.boolean().default(false),
});

export function createCollectionRouter(collection: CollectionService): Router {
  const router = Router();

  /**
   * GET /api/collection — Every holding with its USD value.
   */
  router.get('/', async (_req, res) => {
    const view = await collection.list();
    res.json({ success: true, collection: view.items, total_collection_value: view.totalValue });
  });

  router.post('/add', async (req, res) => {
    const body = validateBody(addSchema, req);
    const change = await collection.add(body.card_id, body.quantity, body.is_foil);
    res.json({
      success: true,
      message: change.message,
      non_foil_qty: change.totals.nonFoil,
      foil_qty: change.totals.foil,
    });
  });

  router.post('/update', async (req, res) => {
    const body = validateBody(updateSchema, req);
    const change = await collection.update(body.card_id, body.quantity, body.is_foil);
    res.json({
      success: true,
      message: change.message,
      new_quantity: change.quantity,
      non_foil_qty: change.totals.nonFoil,
      foil_qty: change.totals.foil,
    });
  });

  router.post('/clear', async (_req, res) => {
    const removed = await collection.clear();
    res.json({ success: true, message: `Successfully cleared ${removed} cards from collection`, removed });
  });

  /**
   * POST /api/collection/refresh-prices — Re-fetch every collected card from the catalog.
   */
  router.post('/refresh-prices', async (_req, res) => {
    const { updated, failed } = await collection.refreshPrices();
    if (updated === 0 && failed === 0) {
      res.json({ success: false, message: 'No cards in collection to update' });
      return;
    }
    res.json({
      success: true,
      message: `Updated prices and legality for ${updated} cards. ${failed} cards had errors.`,
      updated,
      failed,
    });
  });

  return router;
}
