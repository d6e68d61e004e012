/**
 * Storage contract for games and their detected errors
 */

import type { ErrorCategory, Game, GameError, NewGame } from '../types/index.js';

export interface ErrorQuery {
  userId?: string;
  gameId?: string;
  category?: ErrorCategory;
}

export interface GameQuery {
  analyzed?: boolean;
}

export interface GameErrorRepository {
  createGame(game: NewGame): Promise<Game>;

  getGame(gameId: string): Promise<Game | null>;

  /** A user's games, most recently played first */
  listGames(userId: string, query?: GameQuery): Promise<Game[]>;

  /** Errors ordered by game, then ply */
  listErrors(query: ErrorQuery): Promise<GameError[]>;

  /**
   * Replace the game's error set and mark it analyzed, all or nothing.
   * Returns false when the game no longer exists; nothing is written then.
   */
  commitAnalysis(gameId: string, errors: readonly GameError[]): Promise<boolean>;

  /** Delete a game together with its errors. False when it did not exist. */
  deleteGame(gameId: string): Promise<boolean>;

  /**
   * Drop every error of the user and mark all their games unanalyzed.
   * Returns the number of games reset.
   */
  resetAnalyses(userId: string): Promise<number>;
}
