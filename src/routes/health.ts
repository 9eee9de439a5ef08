import { Router } from 'express';
import type { Queryable } from '../db/pool.js';
import { createLogger } from '../services/logger/index.js';
import { getErrorMessage } from '../utils/errors.js';

const log = createLogger('health');

export function createHealthRouter(db: Queryable): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    try {
      await db.query('SELECT 1');
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch (err) {
      log.warn({ error: getErrorMessage(err) }, 'Database ping failed');
      res.status(503).json({ status: 'error' });
    }
  });

  return router;
}
