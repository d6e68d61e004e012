/**
 * In-memory repository for development and tests
 */

import { randomUUID } from 'crypto';
import type { Game, GameError, NewGame } from '../types/index.js';
import type { ErrorQuery, GameErrorRepository, GameQuery } from './GameErrorRepository.js';

function byPlayedAtDesc(a: Game, b: Game): number {
  return (b.playedAt ?? '').localeCompare(a.playedAt ?? '');
}

export class InMemoryGameRepository implements GameErrorRepository {
  private readonly games = new Map<string, Game>();
  /** Error sets keyed by game id */
  private readonly errors = new Map<string, GameError[]>();

  async createGame(game: NewGame): Promise<Game> {
    const created: Game = { ...game, moves: [...game.moves], id: randomUUID(), analyzed: false };
    this.games.set(created.id, created);
    return created;
  }

  async getGame(gameId: string): Promise<Game | null> {
    return this.games.get(gameId) ?? null;
  }

  async listGames(userId: string, query: GameQuery = {}): Promise<Game[]> {
    return [...this.games.values()]
      .filter((g) => g.userId === userId)
      .filter((g) => query.analyzed === undefined || g.analyzed === query.analyzed)
      .sort(byPlayedAtDesc);
  }

  async listErrors(query: ErrorQuery): Promise<GameError[]> {
    const result: GameError[] = [];
    for (const [gameId, errors] of this.errors) {
      if (query.gameId && gameId !== query.gameId) continue;
      for (const error of errors) {
        if (query.userId && error.userId !== query.userId) continue;
        if (query.category && error.category !== query.category) continue;
        result.push(error);
      }
    }
    return result.sort((a, b) => a.gameId.localeCompare(b.gameId) || a.ply - b.ply);
  }

  async commitAnalysis(gameId: string, errors: readonly GameError[]): Promise<boolean> {
    const game = this.games.get(gameId);
    if (!game) return false;

    this.errors.set(gameId, [...errors]);
    this.games.set(gameId, { ...game, analyzed: true });
    return true;
  }

  async deleteGame(gameId: string): Promise<boolean> {
    this.errors.delete(gameId);
    return this.games.delete(gameId);
  }

  async resetAnalyses(userId: string): Promise<number> {
    let reset = 0;
    for (const game of this.games.values()) {
      if (game.userId !== userId) continue;
      this.errors.delete(game.id);
      this.games.set(game.id, { ...game, analyzed: false });
      reset++;
    }
    return reset;
  }
}
