/**
 * Per-user routes
 */

import { Router } from 'express';
import { GamesController } from '../controllers/games.controller.js';
import { UsersController } from '../controllers/users.controller.js';
import type { AppContext } from '../context.js';

export function createUserRoutes(ctx: AppContext): Router {
  const router = Router();
  const users = new UsersController(ctx);
  const games = new GamesController(ctx);

  /**
   * POST /api/v1/users/:userId/games
   * Import a game from PGN
   */
  router.post('/:userId/games', (req, res, next) => {
    games.importGame(req, res).catch(next);
  });

  router.post('/:userId/analysis', (req, res, next) => {
    users.analyzePending(req, res).catch(next);
  });

  router.get('/:userId/analysis/progress', (req, res, next) => {
    users.getProgress(req, res).catch(next);
  });

  router.post('/:userId/analysis/reset', (req, res, next) => {
    users.resetAnalyses(req, res).catch(next);
  });

  router.get('/:userId/errors', (req, res, next) => {
    users.listErrors(req, res).catch(next);
  });

  router.get('/:userId/errors/stats', (req, res, next) => {
    users.getStatistics(req, res).catch(next);
  });

  return router;
}
