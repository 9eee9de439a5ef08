import { Router } from 'express';
import type { CardStore } from '../services/catalog/card-store.js';

export function createStatsRouter(store: CardStore): Router {
  const router = Router();

  /**
   * GET /api/stats — Row counts across the catalog, collection, trades and decks.
   */
  router.get('/', async (_req, res) => {
    res.json({ success: true, stats: await store.getStats() });
  });

  return router;
}
