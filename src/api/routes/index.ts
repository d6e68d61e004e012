/**
 * API routes index
 */

import { Router } from 'express';
import type { AppContext } from '../context.js';
import { createGameRoutes } from './games.routes.js';
import { createHealthRoutes } from './health.routes.js';
import { createUserRoutes } from './users.routes.js';

export function createApiRoutes(ctx: AppContext): Router {
  const router = Router();

  router.use('/health', createHealthRoutes(ctx));
  router.use('/users', createUserRoutes(ctx));
  router.use('/games', createGameRoutes(ctx));

  return router;
}
