import { Router } from 'express';
import { z } from 'zod';
import { validateParams } from '../middleware/validation.js';
import { createLogger } from '../services/logger/index.js';
import type { SyncService } from '../services/sync/sync-service.js';

const log = createLogger('sync-routes');

const setParams = z.object({ code: z.string().trim().toLowerCase().min(1) });

export function createSyncRouter(sync: SyncService): Router {
  const router = Router();

  /**
   * POST /api/sync/sets — Fetch every set from the catalog and store it.
   */
  router.post('/sets', async (_req, res) => {
    const result = await sync.syncSets();
    res.json({ success: true, message: `Successfully stored ${result.stored} sets`, result });
  });

  /**
   * POST /api/sync/sets/:code/cards — Fetch and store every printing in a set.
   * The run stops early if the client goes away.
   */
  router.post('/sets/:code/cards', async (req, res) => {
    const { code } = validateParams(setParams, req);
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        log.warn({ setCode: code }, 'Client disconnected, cancelling set sync');
        controller.abort();
      }
    });

    const result = await sync.syncSetCards(code, { signal: controller.signal });
    res.json({
      success: true,
      message: `Successfully stored ${result.stored} cards for set ${code.toUpperCase()}`,
      result,
    });
  });

  return router;
}
