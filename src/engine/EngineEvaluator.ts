/**
 * Engine Evaluator - Scores positions through the engine pool
 *
 * Failures never escape as exceptions: after the last retry the position is
 * reported `unavailable`. Only pool shutdown and cancellation propagate.
 */

import { Chess } from 'chess.js';
import type { AnalysisBudget, EvaluationOutcome, PositionEvaluation } from '../types/index.js';
import { RETRY_CONFIG } from '../config/constants.js';
import { EnginePoolError, toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { EnginePool } from './EnginePool.js';

const logger = createChildLogger('EngineEvaluator');

/**
 * Anything that can score a position from the side to move's perspective
 */
export interface Evaluator {
  evaluate(fen: string, budget: AnalysisBudget, signal?: AbortSignal): Promise<EvaluationOutcome>;
}

export interface RetryOptions {
  maxRetries: number;
  baseWaitTime: number;
  depthReductionPerRetry: number;
  minDepth: number;
}

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: RETRY_CONFIG.MAX_RETRIES,
  baseWaitTime: RETRY_CONFIG.BASE_WAIT_TIME,
  depthReductionPerRetry: RETRY_CONFIG.DEPTH_REDUCTION_PER_RETRY,
  minDepth: RETRY_CONFIG.MIN_DEPTH,
};

/**
 * Score for a finished game, without asking the engine.
 * Checkmate is mate 0 for the side to move; stalemate and insufficient
 * material are 0. Fifty-move and repetition draws still have legal moves
 * and go to the engine.
 */
export function evaluateTerminalPosition(fen: string): PositionEvaluation | null {
  const chess = new Chess(fen);

  if (chess.isCheckmate()) {
    return { bestMove: null, score: { type: 'mate', value: 0 }, depth: 0 };
  }
  if (chess.isStalemate() || chess.isInsufficientMaterial()) {
    return { bestMove: null, score: { type: 'cp', value: 0 }, depth: 0 };
  }
  return null;
}

export class EngineEvaluator implements Evaluator {
  private readonly retry: RetryOptions;

  constructor(
    private readonly pool: EnginePool,
    retry: Partial<RetryOptions> = {}
  ) {
    this.retry = { ...DEFAULT_RETRY, ...retry };
  }

  async evaluate(
    fen: string,
    budget: AnalysisBudget,
    signal?: AbortSignal
  ): Promise<EvaluationOutcome> {
    const terminal = evaluateTerminalPosition(fen);
    if (terminal) {
      return { status: 'ok', ...terminal };
    }

    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.retry.maxRetries; attempt++) {
      const attemptBudget: AnalysisBudget = {
        depth: Math.max(
          this.retry.minDepth,
          budget.depth - (attempt - 1) * this.retry.depthReductionPerRetry
        ),
        movetimeMs: budget.movetimeMs,
        timeoutMs: budget.timeoutMs * attempt,
      };

      try {
        const analysis = await this.pool.withEngine(
          (engine) => engine.analyze(fen, attemptBudget),
          signal
        );

        if (!analysis.bestMove) {
          throw new Error('Engine returned no best move');
        }

        return {
          status: 'ok',
          bestMove: analysis.bestMove,
          score: analysis.score,
          depth: analysis.depth,
        };
      } catch (error) {
        if (signal?.aborted || error instanceof EnginePoolError) {
          throw error;
        }

        lastError = toError(error);
        logger.warn(
          { fen, attempt, depth: attemptBudget.depth, err: lastError },
          'Position evaluation failed'
        );

        if (attempt < this.retry.maxRetries) {
          await this.delay(this.retry.baseWaitTime * attempt, signal);
        }
      }
    }

    return {
      status: 'unavailable',
      reason: lastError?.message ?? 'Evaluation failed',
      attempts: this.retry.maxRetries,
    };
  }

  private delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(done, ms);
      function done() {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      }
      signal?.addEventListener('abort', done, { once: true });
    });
  }
}
