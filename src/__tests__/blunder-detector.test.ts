/**
 * Tests for blunder detection
 */

import { describe, it, expect } from 'vitest';
import { BlunderDetector } from '../classifiers/blunder/index.js';
import { EvaluationUtils } from '../classifiers/EvaluationUtils.js';
import type { PlyPosition, PositionEvaluation, Score } from '../types/index.js';

const detector = new BlunderDetector();

function ply(overrides: Partial<PlyPosition> = {}): PlyPosition {
  return {
    ply: 10,
    moveNumber: 6,
    color: 'white',
    fenBefore: 'placeholder',
    fenAfter: 'placeholder',
    move: { san: 'Nf3', uci: 'g1f3', from: 'g1', to: 'f3', piece: 'n', flags: 'n' },
    legalMoveCount: 30,
    isCheckmate: false,
    ...overrides,
  };
}

function evaluation(score: Score): PositionEvaluation {
  return { bestMove: 'e2e4', score, depth: 16 };
}

const cp = (value: number): Score => ({ type: 'cp', value });
const mate = (value: number): Score => ({ type: 'mate', value });

describe('EvaluationUtils', () => {
  it('should encode mate distance into centipawns', () => {
    expect(EvaluationUtils.toCentipawns(mate(3))).toBe(99700);
    expect(EvaluationUtils.toCentipawns(mate(-3))).toBe(-99700);
    expect(EvaluationUtils.toCentipawns(mate(0))).toBe(-100000);
    expect(EvaluationUtils.toCentipawns(cp(-42))).toBe(-42);
  });

  it('should flip the after-move score to the mover', () => {
    expect(EvaluationUtils.afterMoveForMover(cp(150))).toBe(-150);
    expect(EvaluationUtils.afterMoveForMover(mate(1))).toBe(-99900);
  });

  it('should recover the mate distance', () => {
    expect(EvaluationUtils.mateDistance(99700)).toBe(3);
    expect(EvaluationUtils.mateDistance(-99900)).toBe(1);
    expect(EvaluationUtils.mateDistance(500)).toBeNull();
  });

  it('should convert to pawns with mate clamped', () => {
    expect(EvaluationUtils.toPawns(253)).toBe(2.53);
    expect(EvaluationUtils.toPawns(-99700)).toBe(-100);
  });
});

describe('BlunderDetector', () => {
  describe('threshold', () => {
    it('should flag a loss above the default threshold', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(cp(50)), after: evaluation(cp(200)) });

      expect(result).toEqual({
        isBlunder: true,
        centipawnLoss: 250,
        severity: 3,
        tier: 'mistake',
        bestEval: 50,
        playedEval: -200,
        isMateSwing: false,
      });
    });

    it('should not flag a loss below the threshold', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(cp(30)), after: evaluation(cp(100)) });

      expect(result).toEqual({ isBlunder: false, centipawnLoss: 130, reason: 'below_threshold' });
    });

    it('should honour a per-call threshold', () => {
      const result = detector.detect({
        ply: ply(),
        before: evaluation(cp(30)),
        after: evaluation(cp(100)),
        thresholdCp: 100,
      });

      expect(result.isBlunder).toBe(true);
      if (result.isBlunder) {
        expect(result.severity).toBe(2);
        expect(result.tier).toBe('mistake');
      }
    });

    it('should flag a loss exactly at the threshold', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(cp(0)), after: evaluation(cp(200)) });
      expect(result.isBlunder).toBe(true);
    });

    it('should never report a negative loss', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(cp(0)), after: evaluation(cp(-300)) });
      expect(result).toEqual({ isBlunder: false, centipawnLoss: 0, reason: 'below_threshold' });
    });
  });

  describe('loss cap and severity', () => {
    it('should cap the loss at 1000', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(cp(500)), after: evaluation(cp(900)) });

      expect(result.centipawnLoss).toBe(1000);
      expect(result.isBlunder && result.severity).toBe(10);
      expect(result.isBlunder && result.tier).toBe('blunder');
    });

    it('should give severity 10 to a lost forced mate', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(mate(2)), after: evaluation(cp(0)) });

      expect(result.isBlunder).toBe(true);
      if (result.isBlunder) {
        expect(result.isMateSwing).toBe(true);
        expect(result.severity).toBe(10);
        expect(result.centipawnLoss).toBe(1000);
      }
    });

    it('should give severity 10 to walking into mate', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(cp(0)), after: evaluation(mate(1)) });

      expect(result.isBlunder).toBe(true);
      if (result.isBlunder) {
        expect(result.isMateSwing).toBe(true);
        expect(result.playedEval).toBe(-99900);
      }
    });

    it('should map losses to severity points', () => {
      expect(detector.getSeverity(50)).toBe(1);
      expect(detector.getSeverity(250)).toBe(3);
      expect(detector.getSeverity(1000)).toBe(10);
      expect(detector.getSeverity(120, true)).toBe(10);
    });

    it('should floor and cap calculated losses', () => {
      expect(detector.calculateLoss(100, 300)).toBe(0);
      expect(detector.calculateLoss(300, 100.4)).toBe(200);
      expect(detector.calculateLoss(99800, 0)).toBe(1000);
    });
  });

  describe('excluded plies', () => {
    it('should skip the mating move', () => {
      const result = detector.detect({
        ply: ply({ isCheckmate: true }),
        before: evaluation(cp(900)),
        after: evaluation(mate(0)),
      });

      expect(result).toEqual({ isBlunder: false, centipawnLoss: 0, reason: 'terminal_checkmate' });
    });

    it('should skip forced moves', () => {
      const result = detector.detect({
        ply: ply({ legalMoveCount: 1 }),
        before: evaluation(cp(0)),
        after: evaluation(cp(800)),
      });

      expect(result).toEqual({ isBlunder: false, centipawnLoss: 0, reason: 'forced_move' });
    });

    it('should not flag a ply whose position has no best move', () => {
      const result = detector.detect({
        ply: ply(),
        before: { bestMove: null, score: cp(0), depth: 0 },
        after: evaluation(cp(500)),
      });

      expect(result).toEqual({ isBlunder: false, centipawnLoss: 0, reason: 'no_best_move' });
    });

    it('should not flag a slower mate inside a forced mate', () => {
      // Mate in 2 before, opponent is mated in 3 after
      const result = detector.detect({ ply: ply(), before: evaluation(mate(2)), after: evaluation(mate(-3)) });

      expect(result).toEqual({ isBlunder: false, centipawnLoss: 0, reason: 'forced_mate_sequence' });
    });

    it('should not flag moves while already being mated', () => {
      const result = detector.detect({ ply: ply(), before: evaluation(mate(-2)), after: evaluation(mate(1)) });

      expect(result).toEqual({ isBlunder: false, centipawnLoss: 0, reason: 'forced_mate_sequence' });
    });
  });
});
