/**
 * Users controller - Batch analysis, progress and error reports per user
 */

import type { Request, Response } from 'express';
import type { AppContext } from '../context.js';
import {
  analysisOptionsSchema,
  errorListQuerySchema,
  userParamsSchema,
} from '../../utils/validation.js';
import { resolveSettings } from '../../services/GameAnalysisService.js';
import { logger } from '../../utils/logger.js';

const usersLogger = logger.child({ controller: 'users' });

export class UsersController {
  constructor(private readonly ctx: AppContext) {}

  /**
   * POST /users/:userId/analysis
   * Analyse every unanalyzed game. Progress can be polled meanwhile.
   */
  async analyzePending(req: Request, res: Response): Promise<void> {
    const { userId } = userParamsSchema.parse(req.params);
    const options = analysisOptionsSchema.parse(req.body);

    const summary = await this.ctx.scheduler.analyzePending(userId, resolveSettings(options));

    usersLogger.info(
      {
        userId,
        analyzed: summary.analyzed,
        failed: summary.failed,
        errorsFound: summary.errorsFound,
      },
      'Batch analysis finished'
    );

    res.json(summary);
  }

  /**
   * GET /users/:userId/analysis/progress
   */
  async getProgress(req: Request, res: Response): Promise<void> {
    const { userId } = userParamsSchema.parse(req.params);
    res.json(this.ctx.scheduler.getProgress(userId));
  }

  /**
   * POST /users/:userId/analysis/reset
   */
  async resetAnalyses(req: Request, res: Response): Promise<void> {
    const { userId } = userParamsSchema.parse(req.params);

    const gamesReset = await this.ctx.repository.resetAnalyses(userId);
    usersLogger.info({ userId, gamesReset }, 'Analyses reset');

    res.json({ gamesReset });
  }

  /**
   * GET /users/:userId/errors
   */
  async listErrors(req: Request, res: Response): Promise<void> {
    const { userId } = userParamsSchema.parse(req.params);
    const { category } = errorListQuerySchema.parse(req.query);

    const errors = await this.ctx.repository.listErrors({ userId, category });
    res.json({ errors });
  }

  /**
   * GET /users/:userId/errors/stats
   */
  async getStatistics(req: Request, res: Response): Promise<void> {
    const { userId } = userParamsSchema.parse(req.params);

    const [errors, games] = await Promise.all([
      this.ctx.repository.listErrors({ userId }),
      this.ctx.repository.listGames(userId),
    ]);
    const { statistics } = this.ctx;
    const phases = statistics.categorizeByPhase(errors);

    res.json({
      ...statistics.getErrorStatistics(errors),
      byPhase: {
        opening: phases.opening.length,
        middlegame: phases.middlegame.length,
        endgame: phases.endgame.length,
      },
      weekly: statistics.weeklyCounts(errors, games),
    });
  }
}
