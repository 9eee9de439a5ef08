import express from 'express';
import helmet from 'helmet';
import type { Services } from './container.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { createCatalogRouter } from './routes/catalog.js';
import { createCollectionRouter } from './routes/collection.js';
import { createDecksRouter } from './routes/decks.js';
import { createHealthRouter } from './routes/health.js';
import { createStatsRouter } from './routes/stats.js';
import { createSyncRouter } from './routes/sync.js';
import { createTradesRouter } from './routes/trades.js';
import { createLogger } from './services/logger/index.js';

const logger = createLogger('http');

export function createApp(services: Services): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());
  app.use(express.json());

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(createHealthRouter(services.db));
  app.use('/api/stats', createStatsRouter(services.store));
  app.use('/api/sync', createSyncRouter(services.sync));
  app.use('/api/catalog', createCatalogRouter({ store: services.store, collection: services.collection }));
  app.use('/api/collection', createCollectionRouter(services.collection));
  app.use('/api/trades', createTradesRouter(services.trades));
  app.use('/api/decks', createDecksRouter(services.decks));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
