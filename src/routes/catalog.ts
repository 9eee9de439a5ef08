import { Router } from 'express';
import { z } from 'zod';
import { validateParams, validateQuery } from '../middleware/validation.js';
import { SEARCH_PAGE_SIZE, type CardStore } from '../services/catalog/card-store.js';
import type { CollectionService } from '../services/collection/collection-service.js';
import { CardNotFoundError, NotFoundError } from '../utils/errors.js';
import { parsePage } from '../utils/pagination.js';

const setParams = z.object({ code: z.string().trim().min(1) });
const cardParams = z.object({ id: z.string().trim().min(1) });
const byNumberParams = z.object({
  setCode: z.string().trim().min(1),
  collectorNumber: z.string().trim().min(1),
});
const searchQuery = z.object({
  q: z.string().optional().default(''),
  page: z.unknown().optional(),
});

export interface CatalogRouterDeps {
  store: CardStore;
  collection: CollectionService;
}

export function createCatalogRouter({ store, collection }: CatalogRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/catalog/sets — All sets, newest first.
   */
  router.get('/sets', async (_req, res) => {
    res.json({ success: true, sets: await store.listSets() });
  });

  /**
   * GET /api/catalog/sets/:code — A set and its cards in collector-number order.
   */
  router.get('/sets/:code', async (req, res) => {
    const { code } = validateParams(setParams, req);
    const set = await store.getSet(code);
    if (!set) throw new NotFoundError('Set', code);

    res.json({ success: true, set, cards: await store.listSetCards(code) });
  });

  /**
   * GET /api/catalog/sets/:code/info — Name, card count and highest collector number.
   */
  router.get('/sets/:code/info', async (req, res) => {
    const { code } = validateParams(setParams, req);
    const info = await store.getSetInfo(code);
    if (!info) throw new NotFoundError('Set', code);

    res.json({ success: true, set_info: info });
  });

  /**
   * GET /api/catalog/cards/search?q=&page= — Name, type line and rules text.
   */
  router.get('/cards/search', async (req, res) => {
    const { q, page } = validateQuery(searchQuery, req);
    const result = await store.search(q, parsePage(page, SEARCH_PAGE_SIZE));
    res.json({ success: true, query: q.trim(), ...result });
  });

  /**
   * GET /api/catalog/cards/by-number/:setCode/:collectorNumber — Card lookup for the trade form.
   */
  router.get('/cards/by-number/:setCode/:collectorNumber', async (req, res) => {
    const { setCode, collectorNumber } = validateParams(byNumberParams, req);
    const card = await store.findBySetAndCollectorNumber(setCode, collectorNumber);
    if (!card) throw CardNotFoundError.bySetAndNumber(setCode, collectorNumber);

    const set = await store.getSet(card.set_code);
    res.json({
      success: true,
      card: {
        id: card.id,
        name: card.name,
        set_code: card.set_code,
        collector_number: card.collector_number,
        set_name: set?.name ?? card.set_name,
      },
    });
  });

  /**
   * GET /api/catalog/cards/:id — Card detail with faces, other printings and owned copies.
   */
  router.get('/cards/:id', async (req, res) => {
    const { id } = validateParams(cardParams, req);
    const detail = await store.getCardDetail(id);
    if (!detail) throw CardNotFoundError.byId(id);

    const owned = await collection.totals(id);
    res.json({ success: true, ...detail, non_foil_qty: owned.nonFoil, foil_qty: owned.foil });
  });

  return router;
}
