/**
 * Error Classifier
 * Labels a flagged ply with one ErrorCategory
 *
 * Rules run in DEFAULT_RULES order and the first match wins. When nothing
 * matches the ply falls back to OTHER, which is a valid result rather than
 * a failure.
 */

import { Chess, type PieceSymbol, type Square } from 'chess.js';
import { ErrorCategory, type PlayedMove, type PlayerColor } from '../../types/index.js';
import { createChildLogger } from '../../utils/logger.js';
import { toError } from '../../utils/errors.js';
import { type TacticalMotifDetector, tacticalMotifDetector } from '../TacticalMotifDetector.js';
import {
  DEFAULT_RULES,
  type ClassificationContext,
  type ClassificationRule,
  type HangingVariant,
} from './ClassificationRules.js';

const logger = createChildLogger('ErrorClassifier');

/**
 * What the classifier needs to know about a flagged ply
 */
export interface ClassificationInput {
  color: PlayerColor;
  fenBefore: string;
  fenAfter: string;
  playedMove: PlayedMove;
  /** Engine best move in fenBefore (UCI) */
  bestMove: string | null;
  /** Engine best reply in fenAfter (UCI) */
  refutation: string | null;
  /** Centipawns, mover's perspective */
  bestEval: number;
  playedEval: number;
}

export interface ClassificationResult {
  category: ErrorCategory;
  /** Name of the matching rule, 'fallback' for OTHER */
  rule: string;
  piece?: PieceSymbol;
  square?: Square;
  variant?: HangingVariant;
}

export class ErrorClassifier {
  constructor(
    private readonly _rules: readonly ClassificationRule[] = DEFAULT_RULES,
    private readonly _motifs: TacticalMotifDetector = tacticalMotifDetector
  ) {}

  classify(input: ClassificationInput): ClassificationResult {
    const ctx = this._buildContext(input);

    for (const rule of this._rules) {
      try {
        const match = rule.match(ctx, this._motifs);
        if (match) {
          return { category: rule.category, rule: rule.name, ...match };
        }
      } catch (error) {
        logger.warn(
          { rule: rule.name, fen: input.fenBefore, err: toError(error) },
          'Classification rule failed, skipping'
        );
      }
    }

    return { category: ErrorCategory.OTHER, rule: 'fallback' };
  }

  private _buildContext(input: ClassificationInput): ClassificationContext {
    return {
      moverColor: input.color === 'white' ? 'w' : 'b',
      before: new Chess(input.fenBefore),
      after: new Chess(input.fenAfter),
      playedMove: input.playedMove,
      best: input.bestMove ? this._motifs.applyUci(input.fenBefore, input.bestMove) : null,
      refutation: input.refutation
        ? this._motifs.applyUci(input.fenAfter, input.refutation)
        : null,
      bestEval: input.bestEval,
      playedEval: input.playedEval,
    };
  }
}

export const errorClassifier = new ErrorClassifier();
