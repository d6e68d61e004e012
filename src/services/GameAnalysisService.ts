/**
 * Game Analysis Service - Orchestrates error detection for one game
 *
 * walk → evaluate → detect → classify → explain → commit
 */

import type {
  AnalysisSettings,
  EvaluationOutcome,
  Game,
  GameAnalysisReport,
  GameError,
  PlyPosition,
  PositionEvaluation,
} from '../types/index.js';
import { ANALYSIS_CONFIG, CATEGORY_THEMES } from '../config/constants.js';
import { config } from '../config/index.js';
import { blunderDetector, type BlunderDetector } from '../classifiers/blunder/index.js';
import {
  errorClassifier,
  formatExplanation,
  type ErrorClassifier,
} from '../classifiers/error/index.js';
import { EvaluationUtils } from '../classifiers/EvaluationUtils.js';
import { tacticalMotifDetector } from '../classifiers/TacticalMotifDetector.js';
import type { Evaluator } from '../engine/EngineEvaluator.js';
import type { GameErrorRepository } from '../storage/GameErrorRepository.js';
import { AnalysisCancelledError, EvaluationUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { collectPositions } from './PositionWalker.js';

const analysisLogger = logger.child({ service: 'GameAnalysis' });

export interface AnalyzeGameOptions {
  signal?: AbortSignal;
  settings?: Partial<AnalysisSettings>;
  onProgress?: (pliesDone: number, totalPlies: number) => void;
}

export function defaultAnalysisSettings(): AnalysisSettings {
  return {
    thresholdCp: config.blunderThresholdCp,
    budget: {
      depth: config.stockfishDepth || ANALYSIS_CONFIG.DEFAULT_DEPTH,
      movetimeMs: config.stockfishMovetime > 0 ? config.stockfishMovetime : undefined,
      timeoutMs: config.stockfishTimeout || ANALYSIS_CONFIG.TIMEOUT,
    },
    maxUnavailablePositions: config.maxUnavailablePositions,
  };
}

export interface SettingsOverrides {
  thresholdCp?: number;
  depth?: number;
  movetimeMs?: number;
}

/**
 * Defaults with per-request overrides applied
 */
export function resolveSettings(overrides: SettingsOverrides = {}): AnalysisSettings {
  const defaults = defaultAnalysisSettings();
  return {
    ...defaults,
    thresholdCp: overrides.thresholdCp ?? defaults.thresholdCp,
    budget: {
      ...defaults.budget,
      depth: overrides.depth ?? defaults.budget.depth,
      movetimeMs: overrides.movetimeMs ?? defaults.budget.movetimeMs,
    },
  };
}

export function errorId(gameId: string, ply: number): string {
  return `${gameId}:${ply}`;
}

/**
 * Plies that can never be flagged need no engine time
 */
function needsEvaluation(position: PlyPosition): boolean {
  return !position.isCheckmate && position.legalMoveCount > 1;
}

export class GameAnalysisService {
  constructor(
    private readonly evaluator: Evaluator,
    private readonly repository: GameErrorRepository,
    private readonly detector: BlunderDetector = blunderDetector,
    private readonly classifier: ErrorClassifier = errorClassifier
  ) {}

  /**
   * Analyse one game and commit its error set.
   *
   * Throws MalformedGameError for moves that cannot be replayed,
   * EvaluationUnavailableError when too many positions could not be scored
   * and AnalysisCancelledError when the signal fires or the game disappears
   * before the commit. Nothing is written in any of those cases.
   */
  async analyzeGame(game: Game, options: AnalyzeGameOptions = {}): Promise<GameAnalysisReport> {
    const settings: AnalysisSettings = { ...defaultAnalysisSettings(), ...options.settings };
    const { signal } = options;

    const positions = collectPositions(game.moves, game.initialFen);
    const plies = positions.filter(
      (p) => game.playerColor === null || p.color === game.playerColor
    );

    analysisLogger.info(
      { gameId: game.id, totalPlies: positions.length, inspected: plies.length },
      'Starting game analysis'
    );

    // Index i is the position before ply i, i + 1 the position after it
    const evaluations = new Map<number, EvaluationOutcome>();
    const unavailable = new Set<number>();

    const evaluateAt = async (index: number, fen: string): Promise<PositionEvaluation | null> => {
      let outcome = evaluations.get(index);
      if (!outcome) {
        this.throwIfCancelled(game.id, signal);
        try {
          outcome = await this.evaluator.evaluate(fen, settings.budget, signal);
        } catch (error) {
          this.throwIfCancelled(game.id, signal);
          throw error;
        }
        this.throwIfCancelled(game.id, signal);
        evaluations.set(index, outcome);
      }

      if (outcome.status === 'ok') return outcome;

      if (!unavailable.has(index)) {
        unavailable.add(index);
        analysisLogger.warn(
          { gameId: game.id, position: index, reason: outcome.reason, attempts: outcome.attempts },
          'Position evaluation unavailable'
        );
        if (unavailable.size > settings.maxUnavailablePositions) {
          throw new EvaluationUnavailableError(game.id, unavailable.size);
        }
      }
      return null;
    };

    const errors: GameError[] = [];
    const skippedPlies: number[] = [];

    for (let i = 0; i < plies.length; i++) {
      const position = plies[i];

      if (needsEvaluation(position)) {
        const before = await evaluateAt(position.ply, position.fenBefore);
        const after = await evaluateAt(position.ply + 1, position.fenAfter);

        if (!before || !after) {
          skippedPlies.push(position.ply);
        } else {
          const error = this.inspectPly(game, position, before, after, settings.thresholdCp);
          if (error) errors.push(error);
        }
      }

      options.onProgress?.(i + 1, plies.length);
    }

    this.throwIfCancelled(game.id, signal);

    const committed = await this.repository.commitAnalysis(game.id, errors);
    if (!committed) {
      analysisLogger.info({ gameId: game.id }, 'Game deleted during analysis, nothing committed');
      throw new AnalysisCancelledError(game.id);
    }

    analysisLogger.info(
      { gameId: game.id, errors: errors.length, skippedPlies },
      'Game analysis completed'
    );

    return {
      gameId: game.id,
      status: 'analyzed',
      errors,
      pliesAnalyzed: plies.length - skippedPlies.length,
      skippedPlies,
    };
  }

  /**
   * Build the error record for one ply, or null when the move was fine
   */
  inspectPly(
    game: Game,
    position: PlyPosition,
    before: PositionEvaluation,
    after: PositionEvaluation,
    thresholdCp: number
  ): GameError | null {
    const result = this.detector.detect({ ply: position, before, after, thresholdCp });
    // Without a best move there is nothing to compare the move played with
    if (!result.isBlunder || !before.bestMove) return null;

    const bestMove = before.bestMove;
    const bestMoveSan = tacticalMotifDetector.toSan(position.fenBefore, bestMove);

    const classification = this.classifier.classify({
      color: position.color,
      fenBefore: position.fenBefore,
      fenAfter: position.fenAfter,
      playedMove: position.move,
      bestMove: before.bestMove,
      refutation: after.bestMove,
      bestEval: result.bestEval,
      playedEval: result.playedEval,
    });

    const explanation = formatExplanation({
      category: classification.category,
      tier: result.tier,
      moveNumber: position.moveNumber,
      color: position.color,
      playedMoveSan: position.move.san,
      bestMoveSan,
      centipawnLoss: result.centipawnLoss,
      piece: classification.piece,
      square: classification.square,
      variant: classification.variant,
    });

    analysisLogger.debug(
      {
        gameId: game.id,
        ply: position.ply,
        loss: result.centipawnLoss,
        category: classification.category,
        rule: classification.rule,
      },
      'Error detected'
    );

    return {
      id: errorId(game.id, position.ply),
      gameId: game.id,
      userId: game.userId,
      ply: position.ply,
      moveNumber: position.moveNumber,
      color: position.color,
      fen: position.fenBefore,
      playedMove: position.move.uci,
      playedMoveSan: position.move.san,
      bestMove,
      bestMoveSan,
      category: classification.category,
      tier: result.tier,
      severity: result.severity,
      centipawnLoss: result.centipawnLoss,
      evaluationBefore: EvaluationUtils.toPawns(result.bestEval),
      evaluationAfter: EvaluationUtils.toPawns(result.playedEval),
      explanation,
      themes: CATEGORY_THEMES[classification.category],
    };
  }

  private throwIfCancelled(gameId: string, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new AnalysisCancelledError(gameId);
    }
  }
}
