/**
 * Utility functions for evaluation handling
 *
 * Numeric evaluations here are centipawns from the MOVER's perspective:
 * positive is good for the player who is about to move (or just moved).
 */

import type { Score } from '../types/index.js';
import { MATE_SCORE } from '../config/constants.js';

export class EvaluationUtils {
  /**
   * Convert a score to centipawns, same perspective as the score.
   * Mate in n → BASE - n*STEP; being mated in n → -(BASE - n*STEP).
   * Mate 0 (side to move is checkmated) → -BASE.
   */
  static toCentipawns(score: Score): number {
    if (score.type === 'cp') return score.value;

    if (score.value > 0) {
      return MATE_SCORE.BASE - score.value * MATE_SCORE.STEP;
    }
    return -MATE_SCORE.BASE - score.value * MATE_SCORE.STEP;
  }

  /**
   * Evaluation of the position after a move, re-expressed for the mover.
   * The engine scores that position for the opponent, who is now to move.
   */
  static afterMoveForMover(scoreAfter: Score): number {
    return -EvaluationUtils.toCentipawns(scoreAfter);
  }

  static isMateScore(evaluation: number): boolean {
    return Math.abs(evaluation) >= MATE_SCORE.THRESHOLD;
  }

  static isMateForMover(evaluation: number): boolean {
    return evaluation >= MATE_SCORE.THRESHOLD;
  }

  static isMateAgainstMover(evaluation: number): boolean {
    return evaluation <= -MATE_SCORE.THRESHOLD;
  }

  /**
   * Moves to mate for a mate score, null otherwise
   */
  static mateDistance(evaluation: number): number | null {
    if (!EvaluationUtils.isMateScore(evaluation)) return null;
    return Math.round((MATE_SCORE.BASE - Math.abs(evaluation)) / MATE_SCORE.STEP);
  }

  /**
   * Centipawns to pawn units with two decimals.
   * Mate scores are clamped to ±100 pawns for display.
   */
  static toPawns(evaluation: number): number {
    const clamped = Math.max(-10000, Math.min(10000, evaluation));
    return Math.round(clamped) / 100;
  }
}
