/**
 * Blunder Detection Thresholds
 *
 * A ply is flagged when the move played loses at least `thresholdCp`
 * compared with the engine's best move. The threshold is a per-call setting:
 * what counts as a blunder differs between a beginner and a club player.
 */

import { BLUNDER_DETECTION } from '../../config/constants.js';
import type { ErrorTier } from '../../types/index.js';

export const BLUNDER_THRESHOLDS = {
  DEFAULT_THRESHOLD_CP: BLUNDER_DETECTION.DEFAULT_THRESHOLD_CP,
  MAX_CP_LOSS: BLUNDER_DETECTION.MAX_CP_LOSS,

  /** Don't score the checkmating move itself */
  SKIP_TERMINAL_CHECKMATE: true,

  /** Don't score moves played with no alternative */
  SKIP_FORCED_MOVES: true,

  /** Don't score mate-distance changes inside a forced mate */
  IGNORE_IN_FORCED_MATE: true,
} as const;

/**
 * Why a ply was not flagged
 */
export type BlunderSkipReason =
  | 'below_threshold'
  | 'terminal_checkmate'
  | 'forced_move'
  | 'forced_mate_sequence'
  | 'no_best_move';

export type BlunderResult =
  | {
      isBlunder: true;
      centipawnLoss: number;
      severity: number;
      tier: ErrorTier;
      /** Best achievable evaluation, mover's perspective */
      bestEval: number;
      /** Evaluation after the move played, mover's perspective */
      playedEval: number;
      /** The move threw away a forced mate or walked into one */
      isMateSwing: boolean;
    }
  | {
      isBlunder: false;
      centipawnLoss: number;
      reason: BlunderSkipReason;
    };
