/**
 * Games controller - Import, analyse and delete single games
 */

import type { Request, Response } from 'express';
import type { AppContext } from '../context.js';
import {
  analysisOptionsSchema,
  errorListQuerySchema,
  gameParamsSchema,
  importGameSchema,
  userParamsSchema,
} from '../../utils/validation.js';
import { resolveSettings } from '../../services/GameAnalysisService.js';
import { GameNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const gamesLogger = logger.child({ controller: 'games' });

export class GamesController {
  constructor(private readonly ctx: AppContext) {}

  /**
   * POST /users/:userId/games
   */
  async importGame(req: Request, res: Response): Promise<void> {
    const { userId } = userParamsSchema.parse(req.params);
    const { pgn, username, source } = importGameSchema.parse(req.body);

    const newGame = this.ctx.pgnParser.toNewGame(pgn, { userId, username, source });
    const game = await this.ctx.repository.createGame(newGame);

    gamesLogger.info(
      { userId, gameId: game.id, moves: game.moves.length, playerColor: game.playerColor },
      'Game imported'
    );

    res.status(201).json({ game });
  }

  /**
   * POST /games/:gameId/analysis
   */
  async analyzeGame(req: Request, res: Response): Promise<void> {
    const { gameId } = gameParamsSchema.parse(req.params);
    const options = analysisOptionsSchema.parse(req.body);

    const report = await this.ctx.scheduler.analyzeGameById(gameId, {
      settings: resolveSettings(options),
    });

    res.status(report.failure?.statusCode ?? 200).json({ report });
  }

  /**
   * GET /games/:gameId/errors
   */
  async listErrors(req: Request, res: Response): Promise<void> {
    const { gameId } = gameParamsSchema.parse(req.params);
    const { category } = errorListQuerySchema.parse(req.query);

    const game = await this.ctx.repository.getGame(gameId);
    if (!game) throw new GameNotFoundError(gameId);

    const errors = await this.ctx.repository.listErrors({ gameId, category });
    res.json({ analyzed: game.analyzed, errors });
  }

  /**
   * DELETE /games/:gameId
   */
  async deleteGame(req: Request, res: Response): Promise<void> {
    const { gameId } = gameParamsSchema.parse(req.params);

    await this.ctx.scheduler.deleteGame(gameId);
    res.status(204).end();
  }
}
