/**
 * Error Detection Constants - All values in centipawns (100cp = 1 pawn)
 */

import type { PieceSymbol } from 'chess.js';
import { ErrorCategory, type ErrorTier } from '../types/index.js';

// ═══════════════════════════════════════════════════════════════════════
// BLUNDER DETECTION
// ═══════════════════════════════════════════════════════════════════════

export const BLUNDER_DETECTION = {
  /** Default loss that flags a ply (2.0 pawns) */
  DEFAULT_THRESHOLD_CP: 200,
  /** Losses are capped here; anything beyond is a lost game either way */
  MAX_CP_LOSS: 1000,
  CP_PER_SEVERITY_POINT: 100,
  MIN_SEVERITY: 1,
  MAX_SEVERITY: 10,
} as const;

/**
 * Tier names by centipawn loss
 */
export const ERROR_TIER_THRESHOLDS = {
  BLUNDER: 300,
  MISTAKE: 100,
} as const;

export function getErrorTier(centipawnLoss: number): ErrorTier {
  if (centipawnLoss >= ERROR_TIER_THRESHOLDS.BLUNDER) return 'blunder';
  if (centipawnLoss >= ERROR_TIER_THRESHOLDS.MISTAKE) return 'mistake';
  return 'inaccuracy';
}

// ═══════════════════════════════════════════════════════════════════════
// MATE ENCODING
// ═══════════════════════════════════════════════════════════════════════

/**
 * Mate in n is encoded as ±(BASE - n * STEP) centipawns.
 * Anything beyond THRESHOLD in absolute value is a mate score.
 */
export const MATE_SCORE = {
  BASE: 100000,
  STEP: 100,
  THRESHOLD: 97000,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// STOCKFISH ANALYSIS CONFIG
// ═══════════════════════════════════════════════════════════════════════

export const ANALYSIS_CONFIG = {
  DEFAULT_DEPTH: 16,
  TIMEOUT: 10000,
  MAX_UNAVAILABLE_POSITIONS: 3,
} as const;

export const ENGINE_CONFIG = {
  HASH_SIZE_PER_WORKER: 64,
  THREADS_PER_WORKER: 1,
  INIT_TIMEOUT: 10000,
  CONFIGURE_TIMEOUT: 5000,
  QUIT_GRACE_PERIOD: 2000,
  /** How long a stopped search may take to report its bestmove */
  STOP_DRAIN_TIMEOUT: 2000,
} as const;

/**
 * Retry logic for failed evaluations
 */
export const RETRY_CONFIG = {
  MAX_RETRIES: 3,
  BASE_WAIT_TIME: 500,
  DEPTH_REDUCTION_PER_RETRY: 1,
  MIN_DEPTH: 6,
} as const;

// ═══════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════

export const PIECE_VALUES: Record<PieceSymbol, number> = {
  p: 100,
  n: 320,
  b: 330,
  r: 500,
  q: 900,
  k: 0,
};

/** Piece points used for game phase decisions */
export const PIECE_POINTS: Record<PieceSymbol, number> = {
  p: 1,
  n: 3,
  b: 3,
  r: 5,
  q: 9,
  k: 0,
};

/** Both sides at or below this much non-pawn material = endgame */
export const ENDGAME_MAX_PIECE_POINTS = 13;

/**
 * Move ranges for each game phase (full move numbers)
 */
export const GAME_PHASE_RANGES = {
  OPENING_END: 15,
  MIDDLEGAME_END: 40,
} as const;

/**
 * Puzzle themes used to pick training puzzles for each category
 */
export const CATEGORY_THEMES: Record<ErrorCategory, readonly string[]> = {
  [ErrorCategory.MISSED_MATE]: ['mate', 'mateIn1', 'mateIn2', 'mateIn3'],
  [ErrorCategory.HANGING_PIECE]: ['hangingPiece'],
  [ErrorCategory.MISSED_FORK]: ['fork'],
  [ErrorCategory.MISSED_PIN]: ['pin'],
  [ErrorCategory.MISSED_CAPTURE]: ['advantage', 'capturingDefender'],
  [ErrorCategory.DEFENSIVE_OVERSIGHT]: ['defensiveMove'],
  [ErrorCategory.ENDGAME_TECHNIQUE]: ['endgame'],
  [ErrorCategory.OTHER]: [],
};

// ═══════════════════════════════════════════════════════════════════════
// EXPLANATIONS
// ═══════════════════════════════════════════════════════════════════════

export const EXPLANATION_MAX_LENGTH = 280;
