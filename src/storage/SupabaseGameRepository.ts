/**
 * Supabase-backed repository
 *
 * Tables and the commit_game_analysis function live in
 * supabase/migrations/0001_error_engine.sql.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { ErrorCategory, type Game, type GameError, type NewGame } from '../types/index.js';
import { StorageError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { ErrorQuery, GameErrorRepository, GameQuery } from './GameErrorRepository.js';

const storageLogger = logger.child({ service: 'SupabaseStorage' });

const gameRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  moves: z.array(z.string()),
  initial_fen: z.string().nullable(),
  outcome: z.enum(['white', 'black', 'draw', 'unknown']),
  played_at: z.string().nullable(),
  source: z.string().nullable(),
  player_color: z.enum(['white', 'black']).nullable(),
  analyzed: z.boolean(),
});

const errorRowSchema = z.object({
  id: z.string(),
  game_id: z.string(),
  user_id: z.string(),
  ply: z.number().int(),
  move_number: z.number().int(),
  color: z.enum(['white', 'black']),
  fen: z.string(),
  played_move: z.string(),
  played_move_san: z.string(),
  best_move: z.string(),
  best_move_san: z.string(),
  category: z.nativeEnum(ErrorCategory),
  tier: z.enum(['blunder', 'mistake', 'inaccuracy']),
  severity: z.number().int(),
  centipawn_loss: z.number(),
  // numeric columns come back as strings
  evaluation_before: z.coerce.number(),
  evaluation_after: z.coerce.number(),
  explanation: z.string(),
  themes: z.array(z.string()),
});

type GameRow = z.infer<typeof gameRowSchema>;
type ErrorRow = z.infer<typeof errorRowSchema>;

function toGame(row: GameRow): Game {
  return {
    id: row.id,
    userId: row.user_id,
    moves: row.moves,
    initialFen: row.initial_fen ?? undefined,
    outcome: row.outcome,
    playedAt: row.played_at,
    source: row.source,
    playerColor: row.player_color,
    analyzed: row.analyzed,
  };
}

function toGameError(row: ErrorRow): GameError {
  return {
    id: row.id,
    gameId: row.game_id,
    userId: row.user_id,
    ply: row.ply,
    moveNumber: row.move_number,
    color: row.color,
    fen: row.fen,
    playedMove: row.played_move,
    playedMoveSan: row.played_move_san,
    bestMove: row.best_move,
    bestMoveSan: row.best_move_san,
    category: row.category,
    tier: row.tier,
    severity: row.severity,
    centipawnLoss: row.centipawn_loss,
    evaluationBefore: row.evaluation_before,
    evaluationAfter: row.evaluation_after,
    explanation: row.explanation,
    themes: row.themes,
  };
}

function toErrorRow(error: GameError): ErrorRow {
  return {
    id: error.id,
    game_id: error.gameId,
    user_id: error.userId,
    ply: error.ply,
    move_number: error.moveNumber,
    color: error.color,
    fen: error.fen,
    played_move: error.playedMove,
    played_move_san: error.playedMoveSan,
    best_move: error.bestMove,
    best_move_san: error.bestMoveSan,
    category: error.category,
    tier: error.tier,
    severity: error.severity,
    centipawn_loss: error.centipawnLoss,
    evaluation_before: error.evaluationBefore,
    evaluation_after: error.evaluationAfter,
    explanation: error.explanation,
    themes: [...error.themes],
  };
}

export function createSupabaseClient(url: string, serviceKey: string): SupabaseClient {
  return createClient(url, serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

export class SupabaseGameRepository implements GameErrorRepository {
  constructor(private readonly supabase: SupabaseClient) {}

  async createGame(game: NewGame): Promise<Game> {
    const { data, error } = await this.supabase
      .from('games')
      .insert({
        user_id: game.userId,
        moves: game.moves,
        initial_fen: game.initialFen ?? null,
        outcome: game.outcome,
        played_at: game.playedAt,
        source: game.source,
        player_color: game.playerColor,
      })
      .select()
      .single();

    if (error) throw this.fail('Failed to create game', error);
    return toGame(gameRowSchema.parse(data));
  }

  async getGame(gameId: string): Promise<Game | null> {
    const { data, error } = await this.supabase
      .from('games')
      .select('*')
      .eq('id', gameId)
      .maybeSingle();

    if (error) throw this.fail('Failed to load game', error);
    return data ? toGame(gameRowSchema.parse(data)) : null;
  }

  async listGames(userId: string, query: GameQuery = {}): Promise<Game[]> {
    let request = this.supabase.from('games').select('*').eq('user_id', userId);

    if (query.analyzed !== undefined) {
      request = request.eq('analyzed', query.analyzed);
    }

    const { data, error } = await request.order('played_at', {
      ascending: false,
      nullsFirst: false,
    });
    if (error) throw this.fail('Failed to list games', error);
    return z.array(gameRowSchema).parse(data).map(toGame);
  }

  async listErrors(query: ErrorQuery): Promise<GameError[]> {
    let request = this.supabase.from('game_errors').select('*');

    if (query.userId) request = request.eq('user_id', query.userId);
    if (query.gameId) request = request.eq('game_id', query.gameId);
    if (query.category) request = request.eq('category', query.category);

    const { data, error } = await request
      .order('game_id', { ascending: true })
      .order('ply', { ascending: true });

    if (error) throw this.fail('Failed to list errors', error);
    return z.array(errorRowSchema).parse(data).map(toGameError);
  }

  async commitAnalysis(gameId: string, errors: readonly GameError[]): Promise<boolean> {
    const { data, error } = await this.supabase.rpc('commit_game_analysis', {
      p_game_id: gameId,
      p_errors: errors.map(toErrorRow),
    });

    if (error) throw this.fail('Failed to commit analysis', error);
    return z.boolean().parse(data);
  }

  async deleteGame(gameId: string): Promise<boolean> {
    // game_errors rows go with the game (on delete cascade)
    const { data, error } = await this.supabase
      .from('games')
      .delete()
      .eq('id', gameId)
      .select('id');

    if (error) throw this.fail('Failed to delete game', error);
    return z.array(z.object({ id: z.string() })).parse(data).length > 0;
  }

  async resetAnalyses(userId: string): Promise<number> {
    const { data, error } = await this.supabase.rpc('reset_user_analyses', {
      p_user_id: userId,
    });

    if (error) throw this.fail('Failed to reset analyses', error);
    return z.number().int().parse(data);
  }

  private fail(message: string, cause: { message: string }): StorageError {
    storageLogger.error({ error: cause }, message);
    return new StorageError(message, cause.message);
  }
}
