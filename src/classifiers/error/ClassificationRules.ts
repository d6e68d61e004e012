/**
 * Error classification rules, in priority order.
 *
 * Mate rules come first, then material rules, then tactical motifs, then
 * positional ones. The first rule that matches decides the category.
 */

import type { Chess, Color, Move, PieceSymbol, Square } from 'chess.js';
import { ErrorCategory, type PlayedMove } from '../../types/index.js';
import { PIECE_VALUES } from '../../config/constants.js';
import { EvaluationUtils } from '../EvaluationUtils.js';
import { opposite, parseSquare, type TacticalMotifDetector } from '../TacticalMotifDetector.js';

/**
 * Everything a rule may look at, prepared once per flagged ply
 */
export interface ClassificationContext {
  moverColor: Color;
  before: Chess;
  after: Chess;
  playedMove: PlayedMove;
  /** Engine best move applied to the position before the move */
  best: { chess: Chess; move: Move } | null;
  /** Opponent's best reply applied to the position after the move */
  refutation: { chess: Chess; move: Move } | null;
  /** Mover's perspective, centipawns */
  bestEval: number;
  playedEval: number;
}

/**
 * Which side's piece was en prise: the mover's own piece was left hanging,
 * or an enemy piece was free to take and the mover missed it
 */
export type HangingVariant = 'left' | 'missed';

export interface RuleMatch {
  piece?: PieceSymbol;
  square?: Square;
  variant?: HangingVariant;
}

export interface ClassificationRule {
  readonly name: string;
  readonly category: ErrorCategory;
  match(ctx: ClassificationContext, motifs: TacticalMotifDetector): RuleMatch | null;
}

const MINOR_PIECE_VALUE = PIECE_VALUES.n;

/**
 * Square of the piece a capture removes (differs from `to` for en passant)
 */
function capturedSquare(move: Move): Square | null {
  if (!move.captured) return null;
  if (!move.flags.includes('e')) return move.to;
  return parseSquare(`${move.to[0]}${move.from[1]}`);
}

export const missedMateRule: ClassificationRule = {
  name: 'missed-mate',
  category: ErrorCategory.MISSED_MATE,
  match(ctx) {
    if (ctx.best?.chess.isCheckmate()) {
      return { square: ctx.best.move.to };
    }
    if (
      EvaluationUtils.isMateForMover(ctx.bestEval) &&
      !EvaluationUtils.isMateForMover(ctx.playedEval)
    ) {
      return {};
    }
    return null;
  },
};

export const allowedMateRule: ClassificationRule = {
  name: 'allowed-mate',
  category: ErrorCategory.DEFENSIVE_OVERSIGHT,
  match(ctx) {
    if (
      !EvaluationUtils.isMateAgainstMover(ctx.bestEval) &&
      EvaluationUtils.isMateAgainstMover(ctx.playedEval)
    ) {
      return {};
    }
    return null;
  },
};

export const hangingPieceRule: ClassificationRule = {
  name: 'hanging-piece',
  category: ErrorCategory.HANGING_PIECE,
  match(ctx, motifs) {
    const enemy = opposite(ctx.moverColor);

    // The best move takes an enemy piece nobody defends
    if (ctx.best) {
      const square = capturedSquare(ctx.best.move);
      const captured = ctx.best.move.captured;
      if (
        square &&
        captured &&
        PIECE_VALUES[captured] >= MINOR_PIECE_VALUE &&
        motifs.isUndefended(ctx.before, square, enemy)
      ) {
        return { piece: captured, square, variant: 'missed' };
      }
    }

    // The move played left one of the mover's pieces en prise
    if (ctx.refutation) {
      const square = capturedSquare(ctx.refutation.move);
      const captured = ctx.refutation.move.captured;
      if (!square || !captured || PIECE_VALUES[captured] < MINOR_PIECE_VALUE) {
        return null;
      }
      if (!motifs.isUndefended(ctx.after, square, ctx.moverColor)) {
        return null;
      }

      const movedThere = ctx.playedMove.to === square;
      const wasAlreadyHanging =
        motifs.isAttackedBy(ctx.before, square, enemy) &&
        motifs.isUndefended(ctx.before, square, ctx.moverColor);

      if (movedThere || !wasAlreadyHanging) {
        return { piece: captured, square, variant: 'left' };
      }
    }

    return null;
  },
};

export const missedForkRule: ClassificationRule = {
  name: 'missed-fork',
  category: ErrorCategory.MISSED_FORK,
  match(ctx, motifs) {
    if (!ctx.best) return null;

    const targets = motifs.findForkTargets(ctx.best.chess, ctx.best.move.to);
    if (targets.length >= 2) {
      return { piece: ctx.best.move.piece, square: ctx.best.move.to };
    }
    return null;
  },
};

export const missedPinRule: ClassificationRule = {
  name: 'missed-pin',
  category: ErrorCategory.MISSED_PIN,
  match(ctx, motifs) {
    if (!ctx.best) return null;

    const pin = motifs.findPin(ctx.best.chess, ctx.best.move.to);
    if (pin) {
      return { piece: pin.pinned.type, square: pin.pinned.square };
    }
    return null;
  },
};

export const missedCaptureRule: ClassificationRule = {
  name: 'missed-capture',
  category: ErrorCategory.MISSED_CAPTURE,
  match(ctx) {
    if (!ctx.best) return null;

    const { move } = ctx.best;
    const square = capturedSquare(move);
    if (!square || !move.captured) return null;

    const gain = PIECE_VALUES[move.captured];
    const winsMaterial = gain >= MINOR_PIECE_VALUE || gain > PIECE_VALUES[move.piece];
    const playedSameCapture = Boolean(ctx.playedMove.captured) && ctx.playedMove.to === move.to;

    if (winsMaterial && !playedSameCapture) {
      return { piece: move.captured, square };
    }
    return null;
  },
};

export const ignoredThreatRule: ClassificationRule = {
  name: 'ignored-threat',
  category: ErrorCategory.DEFENSIVE_OVERSIGHT,
  match(ctx, motifs) {
    if (!ctx.refutation) return null;

    const square = capturedSquare(ctx.refutation.move);
    const captured = ctx.refutation.move.captured;
    if (!square || !captured || PIECE_VALUES[captured] < MINOR_PIECE_VALUE) {
      return null;
    }

    const threatExisted =
      ctx.playedMove.to !== square &&
      motifs.isAttackedBy(ctx.before, square, opposite(ctx.moverColor));

    return threatExisted ? { piece: captured, square } : null;
  },
};

export const endgameTechniqueRule: ClassificationRule = {
  name: 'endgame-technique',
  category: ErrorCategory.ENDGAME_TECHNIQUE,
  match(ctx, motifs) {
    return motifs.isEndgame(ctx.before) ? {} : null;
  },
};

/**
 * Rule order is part of the contract: earlier rules win ties.
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  missedMateRule,
  allowedMateRule,
  hangingPieceRule,
  missedForkRule,
  missedPinRule,
  missedCaptureRule,
  ignoredThreatRule,
  endgameTechniqueRule,
];
