/**
 * Single game routes
 */

import { Router } from 'express';
import { GamesController } from '../controllers/games.controller.js';
import type { AppContext } from '../context.js';

export function createGameRoutes(ctx: AppContext): Router {
  const router = Router();
  const controller = new GamesController(ctx);

  /**
   * POST /api/v1/games/:gameId/analysis
   * Analyse one game and replace its error set
   */
  router.post('/:gameId/analysis', (req, res, next) => {
    controller.analyzeGame(req, res).catch(next);
  });

  /**
   * GET /api/v1/games/:gameId/errors
   */
  router.get('/:gameId/errors', (req, res, next) => {
    controller.listErrors(req, res).catch(next);
  });

  /**
   * DELETE /api/v1/games/:gameId
   * Cancels a running analysis first; errors go with the game
   */
  router.delete('/:gameId', (req, res, next) => {
    controller.deleteGame(req, res).catch(next);
  });

  return router;
}
