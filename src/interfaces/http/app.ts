/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a fresh Express app each call: every cluster worker builds its own,
 * and integration tests build one after swapping the coordinator in the
 * container.
 *
 * Middleware order:
 *   1. helmet()      — security headers
 *   2. cors()        — cross-origin access
 *   3. compression() — gzip response bodies
 *   4. express.json()— parse JSON bodies into req.body
 *   5. requestLogger — one log line per request/response
 *   6. Routes
 *   7. errorHandler  — MUST be last
 *
 * `import '@core/container'` bootstraps DI before any controller resolves
 * the collections service.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { aliasRoutes } from '@interfaces/http/routes/aliasRoutes';
import { collectionRoutes } from '@interfaces/http/routes/collectionRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/collections', collectionRoutes);
  app.use('/api/v1', aliasRoutes);

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
