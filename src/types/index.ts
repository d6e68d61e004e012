/**
 * Type definitions for game error analysis
 */

export type PlayerColor = 'white' | 'black';

export type GameOutcome = 'white' | 'black' | 'draw' | 'unknown';

/**
 * Categories an error can be filed under.
 * Closed set: every classifier rule must resolve to one of these.
 */
export enum ErrorCategory {
  MISSED_MATE = 'missed_mate',
  HANGING_PIECE = 'hanging_piece',
  MISSED_FORK = 'missed_fork',
  MISSED_PIN = 'missed_pin',
  MISSED_CAPTURE = 'missed_capture',
  DEFENSIVE_OVERSIGHT = 'defensive_oversight',
  ENDGAME_TECHNIQUE = 'endgame_technique',
  OTHER = 'other',
}

export type ErrorTier = 'blunder' | 'mistake' | 'inaccuracy';

/**
 * Evaluation score from the perspective of the side to move.
 * A mate value of 0 means the side to move is already checkmated.
 */
export type Score =
  | { type: 'cp'; value: number }
  | { type: 'mate'; value: number };

/**
 * A finished game as stored for its owner
 */
export interface Game {
  readonly id: string;
  readonly userId: string;
  /** Moves in SAN, in play order */
  readonly moves: readonly string[];
  /** Set-up position, when the game did not start from the initial position */
  readonly initialFen?: string;
  readonly outcome: GameOutcome;
  readonly playedAt: string | null;
  readonly source: string | null;
  /** Side played by the account holder; null analyses both sides */
  readonly playerColor: PlayerColor | null;
  readonly analyzed: boolean;
}

export type NewGame = Omit<Game, 'id' | 'analyzed'>;

/**
 * Move as replayed by chess.js
 */
export interface PlayedMove {
  san: string;
  uci: string;
  from: string;
  to: string;
  piece: string;
  captured?: string;
  promotion?: string;
  flags: string;
}

/**
 * One ply of a replayed game
 */
export interface PlyPosition {
  readonly ply: number;
  readonly moveNumber: number;
  readonly color: PlayerColor;
  readonly fenBefore: string;
  readonly fenAfter: string;
  readonly move: PlayedMove;
  /** Legal moves available to the mover in fenBefore */
  readonly legalMoveCount: number;
  /** The move delivered checkmate */
  readonly isCheckmate: boolean;
}

/**
 * Search limits for a single position
 */
export interface AnalysisBudget {
  depth: number;
  movetimeMs?: number;
  timeoutMs: number;
}

/**
 * Raw search result from one engine process
 */
export interface EngineAnalysis {
  bestMove: string;
  score: Score;
  depth: number;
  pv: string[];
}

/**
 * Evaluation of a position, from the side to move's perspective
 */
export interface PositionEvaluation {
  /** UCI best move, null when the position is already over */
  bestMove: string | null;
  score: Score;
  depth: number;
}

export type EvaluationOutcome =
  | ({ status: 'ok' } & PositionEvaluation)
  | { status: 'unavailable'; reason: string; attempts: number };

/**
 * One flagged error, as persisted
 */
export interface GameError {
  readonly id: string;
  readonly gameId: string;
  readonly userId: string;
  readonly ply: number;
  readonly moveNumber: number;
  readonly color: PlayerColor;
  /** Position before the move */
  readonly fen: string;
  readonly playedMove: string;
  readonly playedMoveSan: string;
  readonly bestMove: string;
  readonly bestMoveSan: string;
  readonly category: ErrorCategory;
  readonly tier: ErrorTier;
  /** 1 (minor) to 10 (decisive) */
  readonly severity: number;
  readonly centipawnLoss: number;
  /** Pawn units, mover's perspective */
  readonly evaluationBefore: number;
  readonly evaluationAfter: number;
  readonly explanation: string;
  /** Puzzle themes matching the category */
  readonly themes: readonly string[];
}

/**
 * Settings that decide what counts as an error.
 * Identical settings and engine answers give identical error sets.
 */
export interface AnalysisSettings {
  readonly thresholdCp: number;
  readonly budget: AnalysisBudget;
  readonly maxUnavailablePositions: number;
}

export type GameAnalysisStatus = 'analyzed' | 'failed' | 'cancelled';

export interface GameAnalysisReport {
  gameId: string;
  status: GameAnalysisStatus;
  errors: GameError[];
  pliesAnalyzed: number;
  skippedPlies: number[];
  failure?: {
    code: string;
    statusCode: number;
    message: string;
  };
}

/**
 * Progress of a user's batch analysis
 */
export interface AnalysisProgress {
  current: number;
  total: number;
  percent: number;
  estimatedSeconds: number;
  currentAction: string;
  errorsFound: number;
}

/**
 * Health check response
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  stockfish: 'ready' | 'initializing' | 'error';
  activeAnalyses: number;
  queueLength: number;
  uptime: number;
  version: string;
}
