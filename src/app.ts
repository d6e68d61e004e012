/**
 * Express application setup
 */

import express, { type Express } from 'express';
import helmet from 'helmet';
import { corsMiddleware } from './api/middleware/cors.middleware.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import { createApiRoutes } from './api/routes/index.js';
import type { AppContext } from './api/context.js';
import { logger } from './utils/logger.js';

export function createApp(ctx: AppContext): Express {
  const app = express();

  // Security headers
  app.use(helmet());

  // CORS
  app.use(corsMiddleware);

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: `${duration}ms`,
        },
        'Request completed'
      );
    });

    next();
  });

  // API routes
  app.use('/api/v1', createApiRoutes(ctx));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'Chess Error Engine',
      version: '1.0.0',
      status: 'running',
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
