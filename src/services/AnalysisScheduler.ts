/**
 * Analysis Scheduler - Runs many game analyses side by side
 *
 * At most `concurrency` games are analysed at once. Each game has its own
 * AbortController, and a failure in one game is reported for that game only.
 */

import type {
  AnalysisProgress,
  AnalysisSettings,
  Game,
  GameAnalysisReport,
} from '../types/index.js';
import type { GameErrorRepository } from '../storage/GameErrorRepository.js';
import {
  AnalysisCancelledError,
  AnalysisError,
  AnalysisInProgressError,
  GameNotFoundError,
  toError,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { Semaphore } from '../utils/Semaphore.js';
import type { GameAnalysisService } from './GameAnalysisService.js';

const schedulerLogger = logger.child({ service: 'AnalysisScheduler' });

export interface SchedulerOptions {
  /** Games analysed at once; normally the engine pool size */
  concurrency: number;
}

export interface BatchOptions {
  settings?: Partial<AnalysisSettings>;
  onGameFinished?: (report: GameAnalysisReport) => void;
}

export interface BatchSummary {
  analyzed: number;
  failed: number;
  cancelled: number;
  errorsFound: number;
  reports: GameAnalysisReport[];
}

const IDLE_PROGRESS: AnalysisProgress = {
  current: 0,
  total: 0,
  percent: 0,
  estimatedSeconds: 0,
  currentAction: 'Waiting...',
  errorsFound: 0,
};

export class AnalysisScheduler {
  private readonly slots: Semaphore;
  private readonly running = new Map<string, AbortController>();
  private readonly progress = new Map<string, AnalysisProgress>();

  constructor(
    private readonly analysisService: GameAnalysisService,
    private readonly repository: GameErrorRepository,
    options: SchedulerOptions
  ) {
    this.slots = new Semaphore(options.concurrency);
  }

  get activeAnalyses(): number {
    return this.slots.inUse;
  }

  get queueLength(): number {
    return this.slots.waiting;
  }

  isRunning(gameId: string): boolean {
    return this.running.has(gameId);
  }

  /**
   * Analyse one game by id. Throws GameNotFoundError for unknown ids.
   */
  async analyzeGameById(gameId: string, options: BatchOptions = {}): Promise<GameAnalysisReport> {
    const game = await this.repository.getGame(gameId);
    if (!game) throw new GameNotFoundError(gameId);
    if (this.running.has(gameId)) throw new AnalysisInProgressError(`game ${gameId}`);

    return this.runOne(game, options);
  }

  /**
   * Analyse a set of games; one report per game, in input order
   */
  async analyzeGames(games: readonly Game[], options: BatchOptions = {}): Promise<BatchSummary> {
    const reports = await Promise.all(games.map((game) => this.runOne(game, options)));
    return summarize(reports);
  }

  /**
   * Analyse every unanalyzed game of a user, tracking progress for that user
   */
  async analyzePending(userId: string, settings?: Partial<AnalysisSettings>): Promise<BatchSummary> {
    if (this.progress.has(userId)) {
      throw new AnalysisInProgressError(`user ${userId}`);
    }

    // Claim the slot before the first await so a second request sees it
    this.progress.set(userId, { ...IDLE_PROGRESS, currentAction: 'Loading games...' });

    try {
      const games = await this.repository.listGames(userId, { analyzed: false });
      const total = games.length;
      const startedAt = Date.now();
      let finished = 0;
      let errorsFound = 0;

      this.progress.set(userId, {
        ...IDLE_PROGRESS,
        total,
        currentAction: total > 0 ? `Analyzing ${total} games...` : 'All games already analyzed',
      });

      schedulerLogger.info({ userId, total }, 'Analyzing pending games');

      return await this.analyzeGames(games, {
        settings,
        onGameFinished: (report) => {
          finished++;
          errorsFound += report.errors.length;

          const elapsedSeconds = (Date.now() - startedAt) / 1000;
          const perGame = elapsedSeconds / finished;

          this.progress.set(userId, {
            current: finished,
            total,
            percent: Math.floor((finished / total) * 100),
            estimatedSeconds: Math.round(perGame * (total - finished)),
            currentAction:
              finished < total ? `Analyzing game ${finished + 1}/${total}...` : 'Finishing...',
            errorsFound,
          });
        },
      });
    } finally {
      this.progress.delete(userId);
    }
  }

  getProgress(userId: string): AnalysisProgress {
    return this.progress.get(userId) ?? IDLE_PROGRESS;
  }

  /**
   * Abort a running or queued analysis. False when none is running.
   */
  cancel(gameId: string): boolean {
    const controller = this.running.get(gameId);
    if (!controller) return false;

    schedulerLogger.info({ gameId }, 'Cancelling analysis');
    controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const gameId of this.running.keys()) {
      this.cancel(gameId);
    }
  }

  /**
   * Cancel any analysis of the game, then delete it with its errors
   */
  async deleteGame(gameId: string): Promise<void> {
    this.cancel(gameId);

    const deleted = await this.repository.deleteGame(gameId);
    if (!deleted) throw new GameNotFoundError(gameId);

    schedulerLogger.info({ gameId }, 'Game deleted');
  }

  private async runOne(game: Game, options: BatchOptions): Promise<GameAnalysisReport> {
    // One analysis per game, so cancel() always reaches the one that commits
    if (this.running.has(game.id)) {
      const report = failureReport(game.id, new AnalysisInProgressError(`game ${game.id}`));
      schedulerLogger.warn({ gameId: game.id }, 'Game already under analysis, skipped');
      options.onGameFinished?.(report);
      return report;
    }

    const controller = new AbortController();
    this.running.set(game.id, controller);

    let report: GameAnalysisReport;
    try {
      report = await this.slots.run(() =>
        this.analysisService.analyzeGame(game, {
          signal: controller.signal,
          settings: options.settings,
        })
      );
    } catch (error) {
      report = failureReport(game.id, error);
      const level = report.status === 'cancelled' ? 'info' : 'error';
      schedulerLogger[level](
        { gameId: game.id, code: report.failure?.code, err: toError(error) },
        'Game analysis did not complete'
      );
    } finally {
      this.running.delete(game.id);
    }

    options.onGameFinished?.(report);
    return report;
  }
}

function failureReport(gameId: string, error: unknown): GameAnalysisReport {
  const cancelled = error instanceof AnalysisCancelledError;
  const err = toError(error);

  return {
    gameId,
    status: cancelled ? 'cancelled' : 'failed',
    errors: [],
    pliesAnalyzed: 0,
    skippedPlies: [],
    failure: {
      code: error instanceof AnalysisError ? error.code : 'INTERNAL_ERROR',
      statusCode: error instanceof AnalysisError ? error.statusCode : 500,
      message: err.message,
    },
  };
}

function summarize(reports: GameAnalysisReport[]): BatchSummary {
  return {
    analyzed: reports.filter((r) => r.status === 'analyzed').length,
    failed: reports.filter((r) => r.status === 'failed').length,
    cancelled: reports.filter((r) => r.status === 'cancelled').length,
    errorsFound: reports.reduce((sum, r) => sum + r.errors.length, 0),
    reports,
  };
}
