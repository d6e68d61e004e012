/**
 * PGN Parser Service - Turns PGN text into game records
 */

import { Chess } from 'chess.js';
import type { GameOutcome, NewGame, PlayerColor } from '../types/index.js';
import { MalformedGameError } from '../utils/errors.js';

export interface ParsedGame {
  /** SAN moves in play order */
  moves: string[];
  headers: Record<string, string>;
  /** Only set for games that start from a set-up position */
  initialFen?: string;
}

export interface ImportOptions {
  userId: string;
  /** Account name used to find the side the user played */
  username?: string;
  /** Overrides the Site/Link headers */
  source?: string;
}

export class PgnParserService {
  /**
   * Parse a PGN string into a structured game object
   */
  parsePgn(pgn: string): ParsedGame {
    const chess = new Chess();

    try {
      chess.loadPgn(pgn);
    } catch (error) {
      throw new MalformedGameError(
        `Invalid PGN: ${error instanceof Error ? error.message : 'Parse error'}`
      );
    }

    const headers = this.extractHeaders(pgn);
    const moves = chess.history();

    if (moves.length === 0) {
      throw new MalformedGameError('PGN contains no moves');
    }

    return {
      moves,
      headers,
      initialFen: headers['FEN'],
    };
  }

  /**
   * Parse a PGN into a game ready to store for a user
   */
  toNewGame(pgn: string, options: ImportOptions): NewGame {
    const parsed = this.parsePgn(pgn);

    return {
      userId: options.userId,
      moves: parsed.moves,
      initialFen: parsed.initialFen,
      outcome: this.getGameResult(parsed.headers),
      playedAt: this.getPlayedAt(parsed.headers),
      source: options.source ?? parsed.headers['Link'] ?? parsed.headers['Site'] ?? null,
      playerColor: this.getPlayerColor(parsed.headers, options.username),
    };
  }

  /**
   * Determine game result from PGN
   */
  getGameResult(headers: Record<string, string>): GameOutcome {
    const result = headers['Result'];

    if (result === '1-0') return 'white';
    if (result === '0-1') return 'black';
    if (result === '1/2-1/2') return 'draw';

    return 'unknown';
  }

  /**
   * Side played by `username`: a case-insensitive substring of the White or
   * Black header. Null when the name matches neither.
   */
  getPlayerColor(headers: Record<string, string>, username?: string): PlayerColor | null {
    if (!username) return null;

    const whitePlayer = headers['White']?.toLowerCase() ?? '';
    const blackPlayer = headers['Black']?.toLowerCase() ?? '';
    const userLower = username.toLowerCase();

    if (whitePlayer.includes(userLower)) return 'white';
    if (blackPlayer.includes(userLower)) return 'black';

    return null;
  }

  /**
   * ISO timestamp from the UTCDate/UTCTime or Date headers
   */
  getPlayedAt(headers: Record<string, string>): string | null {
    const date = headers['UTCDate'] ?? headers['Date'];
    const match = date?.match(/^(\d{4})\.(\d{2})\.(\d{2})$/);
    if (!match) return null;

    const time = headers['UTCTime']?.match(/^\d{2}:\d{2}:\d{2}$/) ? headers['UTCTime'] : '00:00:00';
    const parsed = new Date(`${match[1]}-${match[2]}-${match[3]}T${time}Z`);

    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  }

  /**
   * Extract PGN headers
   */
  private extractHeaders(pgn: string): Record<string, string> {
    const headers: Record<string, string> = {};
    const headerRegex = /\[(\w+)\s+"([^"]*)"\]/g;

    let match: RegExpExecArray | null;
    while ((match = headerRegex.exec(pgn)) !== null) {
      headers[match[1]] = match[2];
    }

    return headers;
  }
}

// Singleton instance
export const pgnParserService = new PgnParserService();
