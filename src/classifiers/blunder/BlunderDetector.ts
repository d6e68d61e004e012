/**
 * Blunder Detector
 *
 * Compares the engine's best evaluation of a position with the evaluation
 * reached by the move actually played, both from the mover's perspective.
 */

import type { PlyPosition, PositionEvaluation } from '../../types/index.js';
import { BLUNDER_DETECTION, getErrorTier } from '../../config/constants.js';
import { EvaluationUtils } from '../EvaluationUtils.js';
import { BLUNDER_THRESHOLDS, type BlunderResult } from './BlunderThresholds.js';

/**
 * Context for blunder detection
 */
export interface BlunderContext {
  ply: PlyPosition;
  /** Evaluation of the position before the move (mover to move) */
  before: PositionEvaluation;
  /** Evaluation of the position after the move (opponent to move) */
  after: PositionEvaluation;
  /** Minimum loss that flags the ply */
  thresholdCp?: number;
}

export class BlunderDetector {
  /**
   * Main entry point - detect if the move played at a ply is a blunder
   */
  detect(ctx: BlunderContext): BlunderResult {
    const { ply, before, after } = ctx;
    const thresholdCp = ctx.thresholdCp ?? BLUNDER_THRESHOLDS.DEFAULT_THRESHOLD_CP;

    // The mating move ends the game: nothing to compare it against
    if (BLUNDER_THRESHOLDS.SKIP_TERMINAL_CHECKMATE && ply.isCheckmate) {
      return { isBlunder: false, centipawnLoss: 0, reason: 'terminal_checkmate' };
    }

    if (BLUNDER_THRESHOLDS.SKIP_FORCED_MOVES && ply.legalMoveCount <= 1) {
      return { isBlunder: false, centipawnLoss: 0, reason: 'forced_move' };
    }

    // No move to compare with, e.g. a position scored without the engine
    if (before.bestMove === null) {
      return { isBlunder: false, centipawnLoss: 0, reason: 'no_best_move' };
    }

    const bestEval = EvaluationUtils.toCentipawns(before.score);
    const playedEval = EvaluationUtils.afterMoveForMover(after.score);

    if (BLUNDER_THRESHOLDS.IGNORE_IN_FORCED_MATE && this._isInForcedMate(bestEval, playedEval)) {
      return { isBlunder: false, centipawnLoss: 0, reason: 'forced_mate_sequence' };
    }

    const centipawnLoss = this.calculateLoss(bestEval, playedEval);

    if (centipawnLoss < thresholdCp) {
      return { isBlunder: false, centipawnLoss, reason: 'below_threshold' };
    }

    const isMateSwing = this._isMateSwing(bestEval, playedEval);

    return {
      isBlunder: true,
      centipawnLoss,
      severity: this.getSeverity(centipawnLoss, isMateSwing),
      tier: getErrorTier(centipawnLoss),
      bestEval,
      playedEval,
      isMateSwing,
    };
  }

  /**
   * Loss versus the best move, floored at 0 and capped
   */
  calculateLoss(bestEval: number, playedEval: number): number {
    const loss = Math.max(0, bestEval - playedEval);
    return Math.min(Math.round(loss), BLUNDER_THRESHOLDS.MAX_CP_LOSS);
  }

  /**
   * Severity on a 1-10 scale: one point per pawn lost, 10 for mate swings
   */
  getSeverity(centipawnLoss: number, isMateSwing = false): number {
    if (isMateSwing) return BLUNDER_DETECTION.MAX_SEVERITY;

    const points = Math.ceil(centipawnLoss / BLUNDER_DETECTION.CP_PER_SEVERITY_POINT);
    return Math.min(
      BLUNDER_DETECTION.MAX_SEVERITY,
      Math.max(BLUNDER_DETECTION.MIN_SEVERITY, points)
    );
  }

  /**
   * Both the best line and the move played stay inside the same forced mate:
   * the delta is only a change in mate distance.
   */
  private _isInForcedMate(bestEval: number, playedEval: number): boolean {
    if (EvaluationUtils.isMateForMover(bestEval) && EvaluationUtils.isMateForMover(playedEval)) {
      return true;
    }
    return (
      EvaluationUtils.isMateAgainstMover(bestEval) &&
      EvaluationUtils.isMateAgainstMover(playedEval)
    );
  }

  private _isMateSwing(bestEval: number, playedEval: number): boolean {
    const lostMate =
      EvaluationUtils.isMateForMover(bestEval) && !EvaluationUtils.isMateForMover(playedEval);
    const walkedIntoMate =
      !EvaluationUtils.isMateAgainstMover(bestEval) &&
      EvaluationUtils.isMateAgainstMover(playedEval);
    return lostMate || walkedIntoMate;
  }
}

// Export singleton for easy usage
export const blunderDetector = new BlunderDetector();
