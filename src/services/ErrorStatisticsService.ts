/**
 * Error Statistics Service - Aggregates a user's errors for the dashboard
 */

import { ErrorCategory, type Game, type GameError } from '../types/index.js';
import { GAME_PHASE_RANGES } from '../config/constants.js';

export type GamePhase = 'opening' | 'middlegame' | 'endgame';

export interface ErrorStatistics {
  total: number;
  blunders: number;
  mistakes: number;
  inaccuracies: number;
  averageCentipawnLoss: number;
  byCategory: Record<ErrorCategory, number>;
}

export interface WeeklyCount {
  /** ISO week, YYYY-WW */
  week: string;
  category: ErrorCategory;
  count: number;
}

function emptyCategoryCounts(): Record<ErrorCategory, number> {
  return {
    [ErrorCategory.MISSED_MATE]: 0,
    [ErrorCategory.HANGING_PIECE]: 0,
    [ErrorCategory.MISSED_FORK]: 0,
    [ErrorCategory.MISSED_PIN]: 0,
    [ErrorCategory.MISSED_CAPTURE]: 0,
    [ErrorCategory.DEFENSIVE_OVERSIGHT]: 0,
    [ErrorCategory.ENDGAME_TECHNIQUE]: 0,
    [ErrorCategory.OTHER]: 0,
  };
}

/**
 * ISO-8601 week of a date, e.g. 2024-01-01 → "2024-01"
 */
export function isoWeekKey(date: Date): string {
  const day = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  // Thursday decides which year the week belongs to
  const weekday = day.getUTCDay() || 7;
  day.setUTCDate(day.getUTCDate() + 4 - weekday);

  const yearStart = Date.UTC(day.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((day.getTime() - yearStart) / 86400000 + 1) / 7);

  return `${day.getUTCFullYear()}-${String(week).padStart(2, '0')}`;
}

export function getGamePhase(moveNumber: number): GamePhase {
  if (moveNumber <= GAME_PHASE_RANGES.OPENING_END) return 'opening';
  if (moveNumber <= GAME_PHASE_RANGES.MIDDLEGAME_END) return 'middlegame';
  return 'endgame';
}

export class ErrorStatisticsService {
  getErrorStatistics(errors: readonly GameError[]): ErrorStatistics {
    const byCategory = emptyCategoryCounts();
    let blunders = 0;
    let mistakes = 0;
    let inaccuracies = 0;
    let lossSum = 0;

    for (const error of errors) {
      byCategory[error.category]++;
      lossSum += error.centipawnLoss;
      if (error.tier === 'blunder') blunders++;
      else if (error.tier === 'mistake') mistakes++;
      else inaccuracies++;
    }

    return {
      total: errors.length,
      blunders,
      mistakes,
      inaccuracies,
      averageCentipawnLoss:
        errors.length > 0 ? Math.round((lossSum / errors.length) * 100) / 100 : 0,
      byCategory,
    };
  }

  categorizeByPhase(errors: readonly GameError[]): Record<GamePhase, GameError[]> {
    const phases: Record<GamePhase, GameError[]> = { opening: [], middlegame: [], endgame: [] };
    for (const error of errors) {
      phases[getGamePhase(error.moveNumber)].push(error);
    }
    return phases;
  }

  /**
   * Error counts per ISO week of play and category.
   * Errors from games without a date are left out.
   */
  weeklyCounts(errors: readonly GameError[], games: readonly Game[]): WeeklyCount[] {
    const playedAt = new Map(games.map((g) => [g.id, g.playedAt]));
    const counts = new Map<string, WeeklyCount>();

    for (const error of errors) {
      const date = playedAt.get(error.gameId);
      if (!date) continue;

      const week = isoWeekKey(new Date(date));
      const key = `${week}|${error.category}`;
      const entry = counts.get(key);
      if (entry) entry.count++;
      else counts.set(key, { week, category: error.category, count: 1 });
    }

    return [...counts.values()].sort(
      (a, b) => a.week.localeCompare(b.week) || a.category.localeCompare(b.category)
    );
  }
}

export const errorStatisticsService = new ErrorStatisticsService();
