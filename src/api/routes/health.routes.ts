/**
 * Health check routes
 */

import { Router, type Request, type Response } from 'express';
import type { HealthResponse } from '../../types/index.js';
import type { AppContext } from '../context.js';

const startTime = Date.now();

function engineState(state: string): HealthResponse['stockfish'] {
  if (state === 'ready') return 'ready';
  if (state === 'created' || state === 'initializing') return 'initializing';
  return 'error';
}

export function createHealthRoutes(ctx: AppContext): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const poolStatus = ctx.engineStatus();
    const stockfish = engineState(poolStatus.state);

    const response: HealthResponse = {
      status: stockfish === 'ready' ? 'healthy' : 'degraded',
      stockfish,
      activeAnalyses: ctx.scheduler.activeAnalyses,
      queueLength: ctx.scheduler.queueLength,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      version: '1.0.0',
    };

    const statusCode = response.status === 'healthy' ? 200 : 503;
    res.status(statusCode).json(response);
  });

  // Detailed status for debugging
  router.get('/detailed', (_req: Request, res: Response) => {
    res.json({
      engines: ctx.engineStatus(),
      analyses: {
        active: ctx.scheduler.activeAnalyses,
        queued: ctx.scheduler.queueLength,
      },
      uptime: Math.floor((Date.now() - startTime) / 1000),
      memory: process.memoryUsage(),
    });
  });

  return router;
}
