/**
 * Explanation Formatter
 * Turns a classified error into one or two plain sentences
 */

import type { PieceSymbol, Square } from 'chess.js';
import { ErrorCategory, type ErrorTier, type PlayerColor } from '../../types/index.js';
import { EXPLANATION_MAX_LENGTH } from '../../config/constants.js';
import type { HangingVariant } from './ClassificationRules.js';

export interface ExplanationInput {
  category: ErrorCategory;
  tier: ErrorTier;
  moveNumber: number;
  color: PlayerColor;
  playedMoveSan: string;
  bestMoveSan: string;
  centipawnLoss: number;
  /** Piece the matching rule pointed at, if any */
  piece?: PieceSymbol;
  square?: Square;
  /** Hanging piece only: whose piece was free to take */
  variant?: HangingVariant;
}

/**
 * Every chess word an explanation may use, with the definition shown to players
 */
export const GLOSSARY = {
  checkmate: 'The king is attacked and has no way to escape. The game is over.',
  pawn: 'The unit used to measure how much a move cost. One pawn is a small edge, three is a piece.',
  piece: 'A knight, bishop, rook or queen.',
  undefended: 'No piece of your own protects it, so it can be taken for free.',
  fork: 'One piece attacks two or more enemy pieces at the same time.',
  pin: 'A piece cannot move without exposing a more valuable piece behind it.',
  capture: 'Taking an enemy piece.',
  threat: 'A move the opponent wants to play next, such as taking a piece.',
  endgame: 'The last part of the game, when few pieces are left.',
  'big mistake': 'A move that throws away three pawns or more.',
  mistake: 'A move that throws away between one and three pawns.',
  'small inaccuracy': 'A move that throws away less than one pawn.',
} as const;

export type GlossaryTerm = keyof typeof GLOSSARY;

const TIER_WORDS: Record<ErrorTier, GlossaryTerm> = {
  blunder: 'big mistake',
  mistake: 'mistake',
  inaccuracy: 'small inaccuracy',
};

const PIECE_NAMES: Record<PieceSymbol, string> = {
  p: 'pawn',
  n: 'knight',
  b: 'bishop',
  r: 'rook',
  q: 'queen',
  k: 'king',
};

type Template = (input: ExplanationInput, parts: TemplateParts) => string;

interface TemplateParts {
  move: string;
  cost: string;
  piece: string;
}

const TEMPLATES: Partial<Record<ErrorCategory, Template>> = {
  [ErrorCategory.MISSED_MATE]: (input, p) =>
    `On ${p.move} you played ${input.playedMoveSan}, but ${input.bestMoveSan} led to checkmate. ${p.cost}`,
  [ErrorCategory.HANGING_PIECE]: (input, p) => {
    if (input.variant === 'missed') {
      return `On ${p.move} ${input.bestMoveSan} would take an undefended ${p.piece} for free. You played ${input.playedMoveSan}. ${p.cost}`;
    }
    if (input.variant === 'left') {
      return `On ${p.move} ${input.playedMoveSan} left your ${p.piece} undefended. ${input.bestMoveSan} was better. ${p.cost}`;
    }
    return GENERIC_TEMPLATE(input, p);
  },
  [ErrorCategory.MISSED_FORK]: (input, p) =>
    `On ${p.move} ${input.bestMoveSan} was a fork: your ${p.piece} would attack two pieces at once. You played ${input.playedMoveSan}. ${p.cost}`,
  [ErrorCategory.MISSED_PIN]: (input, p) =>
    `On ${p.move} ${input.bestMoveSan} would pin the enemy ${p.piece}. You played ${input.playedMoveSan}. ${p.cost}`,
  [ErrorCategory.MISSED_CAPTURE]: (input, p) =>
    `On ${p.move} ${input.bestMoveSan} was a capture that wins a ${p.piece}. You played ${input.playedMoveSan}. ${p.cost}`,
  [ErrorCategory.DEFENSIVE_OVERSIGHT]: (input, p) =>
    `On ${p.move} ${input.playedMoveSan} missed the opponent's threat. ${input.bestMoveSan} kept you safe. ${p.cost}`,
  [ErrorCategory.ENDGAME_TECHNIQUE]: (input, p) =>
    `In the endgame, on ${p.move}, ${input.playedMoveSan} let the position slip. ${input.bestMoveSan} was stronger. ${p.cost}`,
};

const GENERIC_TEMPLATE: Template = (input, p) =>
  `On ${p.move} you played ${input.playedMoveSan}. ${input.bestMoveSan} was stronger. ${p.cost}`;

/**
 * "move 12" for White, "move 12..." for Black
 */
export function formatMoveLabel(moveNumber: number, color: PlayerColor): string {
  return color === 'white' ? `move ${moveNumber}` : `move ${moveNumber}...`;
}

export function formatPawns(centipawnLoss: number): string {
  const pawns = (centipawnLoss / 100).toFixed(1);
  return pawns === '1.0' ? '1.0 pawn' : `${pawns} pawns`;
}

/**
 * Build the explanation text, at most EXPLANATION_MAX_LENGTH characters
 */
export function formatExplanation(input: ExplanationInput): string {
  const parts: TemplateParts = {
    move: formatMoveLabel(input.moveNumber, input.color),
    cost: `This ${TIER_WORDS[input.tier]} cost ${formatPawns(input.centipawnLoss)}.`,
    piece: input.piece ? PIECE_NAMES[input.piece] : 'piece',
  };

  const template = TEMPLATES[input.category] ?? GENERIC_TEMPLATE;
  const text = template(input, parts);

  if (text.length <= EXPLANATION_MAX_LENGTH) return text;
  return `${text.slice(0, EXPLANATION_MAX_LENGTH - 3).trimEnd()}...`;
}
