/**
 * TacticalMotifDetector
 * Board-level checks used by the error classifier
 *
 * - undefended pieces
 * - forks: one piece attacking several valuable targets
 * - pins: a slider holding a piece in front of a more valuable one
 * - endgame material
 */

import { Chess, SQUARES, type Color, type Move, type PieceSymbol, type Square } from 'chess.js';
import {
  ENDGAME_MAX_PIECE_POINTS,
  PIECE_POINTS,
  PIECE_VALUES,
} from '../config/constants.js';

export interface BoardPiece {
  square: Square;
  type: PieceSymbol;
  color: Color;
}

export interface PinInfo {
  pinner: Square;
  pinned: BoardPiece;
  target: BoardPiece;
}

const KING_TARGET_VALUE = 10000;

const PROMOTION_PIECES: Record<string, PieceSymbol | undefined> = {
  q: 'q',
  r: 'r',
  b: 'b',
  n: 'n',
};

export function parseSquare(text: string): Square | null {
  return SQUARES.find((square) => square === text) ?? null;
}

export function opposite(color: Color): Color {
  return color === 'w' ? 'b' : 'w';
}

export class TacticalMotifDetector {
  /**
   * Play a UCI move on a copy of the position. Null when the move is illegal.
   */
  applyUci(fen: string, uci: string): { chess: Chess; move: Move } | null {
    const from = parseSquare(uci.slice(0, 2));
    const to = parseSquare(uci.slice(2, 4));
    if (!from || !to) return null;

    const chess = new Chess(fen);
    const promotion = uci.length > 4 ? PROMOTION_PIECES[uci[4]] : undefined;

    try {
      const move = chess.move({ from, to, promotion });
      return { chess, move };
    } catch {
      return null;
    }
  }

  /**
   * SAN of a UCI move in a position, falling back to the UCI text
   */
  toSan(fen: string, uci: string): string {
    return this.applyUci(fen, uci)?.move.san ?? uci;
  }

  /**
   * No piece of the owner's side covers the square
   */
  isUndefended(chess: Chess, square: Square, owner: Color): boolean {
    return chess.attackers(square, owner).length === 0;
  }

  isAttackedBy(chess: Chess, square: Square, attacker: Color): boolean {
    return chess.attackers(square, attacker).length > 0;
  }

  /**
   * Valuable enemy pieces attacked by the piece standing on `from`.
   * Targets are the king and anything worth at least a knight.
   */
  findForkTargets(chess: Chess, from: Square): BoardPiece[] {
    const attacker = chess.get(from);
    if (!attacker) return [];

    const enemy = opposite(attacker.color);
    return this.getPieces(chess, enemy).filter((target) => {
      if (target.type !== 'k' && PIECE_VALUES[target.type] < PIECE_VALUES.n) {
        return false;
      }
      return chess.attackers(target.square, attacker.color).includes(from);
    });
  }

  /**
   * Pin created by the slider standing on `from`: the first enemy piece on a
   * line is worth less than the enemy piece behind it (or that piece is the king).
   */
  findPin(chess: Chess, from: Square): PinInfo | null {
    const slider = chess.get(from);
    if (!slider) return null;

    const enemy = opposite(slider.color);

    for (const [fileStep, rankStep] of this._getPieceDirections(slider.type)) {
      const inLine: BoardPiece[] = [];
      let file = from.charCodeAt(0) - 97 + fileStep;
      let rank = Number(from[1]) - 1 + rankStep;

      while (file >= 0 && file < 8 && rank >= 0 && rank < 8 && inLine.length < 2) {
        const square = this._toSquare(file, rank);
        const piece = chess.get(square);
        if (piece) {
          if (piece.color !== enemy) break;
          inLine.push({ square, type: piece.type, color: piece.color });
        }
        file += fileStep;
        rank += rankStep;
      }

      if (inLine.length < 2) continue;

      const [front, behind] = inLine;
      if (front.type === 'k') continue;

      const frontValue = PIECE_VALUES[front.type];
      const behindValue = behind.type === 'k' ? KING_TARGET_VALUE : PIECE_VALUES[behind.type];
      if (frontValue < behindValue) {
        return { pinner: from, pinned: front, target: behind };
      }
    }

    return null;
  }

  /**
   * Non-pawn material of one side in piece points (knight = 3)
   */
  pieceMaterial(chess: Chess, color: Color): number {
    return this.getPieces(chess, color)
      .filter((p) => p.type !== 'p')
      .reduce((sum, p) => sum + PIECE_POINTS[p.type], 0);
  }

  isEndgame(chess: Chess): boolean {
    return (
      this.pieceMaterial(chess, 'w') <= ENDGAME_MAX_PIECE_POINTS &&
      this.pieceMaterial(chess, 'b') <= ENDGAME_MAX_PIECE_POINTS
    );
  }

  getPieces(chess: Chess, color: Color): BoardPiece[] {
    const pieces: BoardPiece[] = [];
    for (const row of chess.board()) {
      for (const cell of row) {
        if (cell && cell.color === color) {
          pieces.push({ square: cell.square, type: cell.type, color: cell.color });
        }
      }
    }
    return pieces;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Helper methods
  // ═══════════════════════════════════════════════════════════════════════

  private _toSquare(file: number, rank: number): Square {
    // SQUARES runs a8..h8, a7..h7, ... a1..h1
    return SQUARES[(7 - rank) * 8 + file];
  }

  private _getPieceDirections(pieceType: PieceSymbol): [number, number][] {
    switch (pieceType) {
      case 'b':
        return [[1, 1], [1, -1], [-1, 1], [-1, -1]];
      case 'r':
        return [[1, 0], [-1, 0], [0, 1], [0, -1]];
      case 'q':
        return [[1, 1], [1, -1], [-1, 1], [-1, -1], [1, 0], [-1, 0], [0, 1], [0, -1]];
      default:
        return [];
    }
  }
}

export const tacticalMotifDetector = new TacticalMotifDetector();
