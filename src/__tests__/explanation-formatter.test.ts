/**
 * Tests for explanation text
 */

import { describe, it, expect } from 'vitest';
import {
  formatExplanation,
  formatMoveLabel,
  formatPawns,
  GLOSSARY,
  type ExplanationInput,
} from '../classifiers/error/index.js';
import { ErrorCategory } from '../types/index.js';

function input(overrides: Partial<ExplanationInput> = {}): ExplanationInput {
  return {
    category: ErrorCategory.OTHER,
    tier: 'mistake',
    moveNumber: 7,
    color: 'black',
    playedMoveSan: 'a6',
    bestMoveSan: 'Nf6',
    centipawnLoss: 250,
    ...overrides,
  };
}

describe('formatExplanation', () => {
  it('should describe a missed fork', () => {
    const text = formatExplanation(
      input({
        category: ErrorCategory.MISSED_FORK,
        tier: 'blunder',
        moveNumber: 12,
        color: 'white',
        playedMoveSan: 'Kd2',
        bestMoveSan: 'Nc7+',
        centipawnLoss: 450,
        piece: 'n',
      })
    );

    expect(text).toBe(
      'On move 12 Nc7+ was a fork: your knight would attack two pieces at once. You played Kd2. This big mistake cost 4.5 pawns.'
    );
  });

  it('should use the generic sentence for OTHER', () => {
    expect(formatExplanation(input())).toBe(
      'On move 7... you played a6. Nf6 was stronger. This mistake cost 2.5 pawns.'
    );
  });

  it('should say the mover left a piece hanging', () => {
    const text = formatExplanation(
      input({ category: ErrorCategory.HANGING_PIECE, piece: 'b', variant: 'left' })
    );

    expect(text).toBe(
      'On move 7... a6 left your bishop undefended. Nf6 was better. This mistake cost 2.5 pawns.'
    );
  });

  it('should say the mover missed a free piece', () => {
    const text = formatExplanation(
      input({
        category: ErrorCategory.HANGING_PIECE,
        color: 'white',
        moveNumber: 3,
        bestMoveSan: 'Nxd5',
        piece: 'q',
        variant: 'missed',
      })
    );

    expect(text).toBe(
      'On move 3 Nxd5 would take an undefended queen for free. You played a6. This mistake cost 2.5 pawns.'
    );
  });

  it('should fall back to the generic sentence for a hanging piece without a side', () => {
    const text = formatExplanation(
      input({ category: ErrorCategory.HANGING_PIECE, color: 'white', moveNumber: 3 })
    );

    expect(text).toBe('On move 3 you played a6. Nf6 was stronger. This mistake cost 2.5 pawns.');
  });

  it('should name a generic piece when none is known', () => {
    const text = formatExplanation(input({ category: ErrorCategory.MISSED_CAPTURE }));

    expect(text).toBe(
      'On move 7... Nf6 was a capture that wins a piece. You played a6. This mistake cost 2.5 pawns.'
    );
  });

  it('should cap the text at 280 characters', () => {
    const text = formatExplanation(input({ playedMoveSan: 'x'.repeat(300) }));

    expect(text).toHaveLength(280);
    expect(text.endsWith('...')).toBe(true);
    expect(text.startsWith('On move 7... you played xxx')).toBe(true);
  });
});

describe('formatting helpers', () => {
  it('should mark black moves with an ellipsis', () => {
    expect(formatMoveLabel(5, 'white')).toBe('move 5');
    expect(formatMoveLabel(5, 'black')).toBe('move 5...');
  });

  it('should print pawns with one decimal', () => {
    expect(formatPawns(100)).toBe('1.0 pawn');
    expect(formatPawns(120)).toBe('1.2 pawns');
    expect(formatPawns(1000)).toBe('10.0 pawns');
  });

  it('should define every tier word used in explanations', () => {
    expect(Object.keys(GLOSSARY)).toEqual(
      expect.arrayContaining(['big mistake', 'mistake', 'small inaccuracy', 'checkmate', 'fork', 'pin'])
    );
  });
});
