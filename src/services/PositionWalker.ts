/**
 * Position Walker - Replays a move list into one position per ply
 */

import { Chess, type Move } from 'chess.js';
import type { PlayedMove, PlyPosition } from '../types/index.js';
import { MalformedGameError } from '../utils/errors.js';

export function toPlayedMove(move: Move): PlayedMove {
  return {
    san: move.san,
    uci: `${move.from}${move.to}${move.promotion ?? ''}`,
    from: move.from,
    to: move.to,
    piece: move.piece,
    captured: move.captured,
    promotion: move.promotion,
    flags: move.flags,
  };
}

function loadStartPosition(initialFen?: string): Chess {
  if (!initialFen) return new Chess();

  try {
    return new Chess(initialFen);
  } catch (error) {
    throw new MalformedGameError(
      `Invalid initial position: ${error instanceof Error ? error.message : initialFen}`
    );
  }
}

/**
 * Lazily walk a game, yielding the position before and after every ply.
 * Throws MalformedGameError at the first move that is not legal.
 */
export function* walkPositions(
  moves: readonly string[],
  initialFen?: string
): Generator<PlyPosition, void, undefined> {
  const chess = loadStartPosition(initialFen);

  for (let ply = 0; ply < moves.length; ply++) {
    const san = moves[ply];
    const fenBefore = chess.fen();
    const color = chess.turn() === 'w' ? 'white' : 'black';
    const moveNumber = parseInt(fenBefore.split(' ')[5] ?? '1', 10);
    const legalMoveCount = chess.moves().length;

    let move: Move;
    try {
      move = chess.move(san);
    } catch {
      throw new MalformedGameError(`Illegal move "${san}" at ply ${ply}`, ply, san);
    }

    yield {
      ply,
      moveNumber,
      color,
      fenBefore,
      fenAfter: chess.fen(),
      move: toPlayedMove(move),
      legalMoveCount,
      isCheckmate: chess.isCheckmate(),
    };
  }
}

/**
 * Replay the whole game eagerly
 */
export function collectPositions(moves: readonly string[], initialFen?: string): PlyPosition[] {
  return [...walkPositions(moves, initialFen)];
}
