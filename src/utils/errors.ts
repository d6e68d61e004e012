/**
 * Error classes for game analysis
 *
 * Each carries the statusCode/code pair the API error handler reads.
 */

export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AnalysisError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The move list cannot be replayed
 */
export class MalformedGameError extends AnalysisError {
  constructor(
    message: string,
    public readonly ply?: number,
    public readonly move?: string
  ) {
    super(message, 422, 'MALFORMED_GAME', { ply, move });
    this.name = 'MalformedGameError';
  }
}

/**
 * Too many positions of one game could not be evaluated.
 * The game stays unanalyzed so it can be retried later.
 */
export class EvaluationUnavailableError extends AnalysisError {
  constructor(
    public readonly gameId: string,
    public readonly unavailablePositions: number
  ) {
    super(
      `Engine unavailable for ${unavailablePositions} positions of game ${gameId}`,
      503,
      'EVALUATION_UNAVAILABLE',
      { gameId, unavailablePositions }
    );
    this.name = 'EvaluationUnavailableError';
  }
}

export class AnalysisCancelledError extends AnalysisError {
  constructor(public readonly gameId: string) {
    super(`Analysis of game ${gameId} was cancelled`, 409, 'ANALYSIS_CANCELLED', { gameId });
    this.name = 'AnalysisCancelledError';
  }
}

export class EnginePoolError extends AnalysisError {
  constructor(message: string) {
    super(message, 503, 'ENGINE_POOL_UNAVAILABLE');
    this.name = 'EnginePoolError';
  }
}

export class EngineTimeoutError extends AnalysisError {
  constructor(
    public readonly workerId: number,
    public readonly timeoutMs: number
  ) {
    super(`Engine ${workerId} timed out after ${timeoutMs}ms`, 504, 'ENGINE_TIMEOUT');
    this.name = 'EngineTimeoutError';
  }
}

export class GameNotFoundError extends AnalysisError {
  constructor(public readonly gameId: string) {
    super(`Game ${gameId} not found`, 404, 'GAME_NOT_FOUND');
    this.name = 'GameNotFoundError';
  }
}

export class StorageError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'STORAGE_ERROR', cause instanceof Error ? cause.message : cause);
    this.name = 'StorageError';
  }
}

export class AnalysisInProgressError extends AnalysisError {
  constructor(target: string) {
    super(`Analysis already running for ${target}`, 409, 'ANALYSIS_IN_PROGRESS', { target });
    this.name = 'AnalysisInProgressError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
