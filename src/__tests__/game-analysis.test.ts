/**
 * Tests for single-game analysis
 */

import { beforeEach, describe, it, expect } from 'vitest';
import { GameAnalysisService, errorId, resolveSettings } from '../services/GameAnalysisService.js';
import { collectPositions } from '../services/PositionWalker.js';
import { EngineEvaluator } from '../engine/EngineEvaluator.js';
import { EnginePool, type EngineHandle } from '../engine/EnginePool.js';
import { InMemoryGameRepository } from '../storage/InMemoryGameRepository.js';
import { ErrorCategory, type EvaluationOutcome, type Game, type NewGame } from '../types/index.js';
import {
  AnalysisCancelledError,
  EvaluationUnavailableError,
  MalformedGameError,
} from '../utils/errors.js';
import { cp, FakeEngine, mate, ok, ScriptedEvaluator } from './helpers/fakes.js';

const SCHOLARS_MATE = ['e4', 'e5', 'Qh5', 'Nc6', 'Bc4', 'Nf6', 'Qxf7#'];
const POSITIONS = collectPositions(SCHOLARS_MATE);

const SETTINGS = {
  thresholdCp: 200,
  budget: { depth: 12, timeoutMs: 1000 },
  maxUnavailablePositions: 3,
};

const UNAVAILABLE: EvaluationOutcome = {
  status: 'unavailable',
  reason: 'engine crashed',
  attempts: 3,
};

function newGame(overrides: Partial<NewGame> = {}): NewGame {
  return {
    userId: 'user-1',
    moves: SCHOLARS_MATE,
    outcome: 'white',
    playedAt: '2024-03-02T10:00:00.000Z',
    source: null,
    playerColor: 'black',
    ...overrides,
  };
}

/** Black walks into mate with Nf6 where g6 held */
function scholarsMateEvaluator(): ScriptedEvaluator {
  return new ScriptedEvaluator()
    .set(POSITIONS[5].fenBefore, ok(cp(0), 'g7g6'))
    .set(POSITIONS[5].fenAfter, ok(mate(1), 'h5f7'));
}

describe('GameAnalysisService', () => {
  let repository: InMemoryGameRepository;
  let game: Game;

  beforeEach(async () => {
    repository = new InMemoryGameRepository();
    game = await repository.createGame(newGame());
  });

  describe('analyzeGame', () => {
    it('should find the move that allowed mate', async () => {
      const service = new GameAnalysisService(scholarsMateEvaluator(), repository);

      const report = await service.analyzeGame(game, { settings: SETTINGS });

      expect(report.status).toBe('analyzed');
      expect(report.pliesAnalyzed).toBe(3);
      expect(report.skippedPlies).toEqual([]);
      expect(report.errors).toEqual([
        {
          id: `${game.id}:5`,
          gameId: game.id,
          userId: 'user-1',
          ply: 5,
          moveNumber: 3,
          color: 'black',
          fen: POSITIONS[5].fenBefore,
          playedMove: 'g8f6',
          playedMoveSan: 'Nf6',
          bestMove: 'g7g6',
          bestMoveSan: 'g6',
          category: ErrorCategory.DEFENSIVE_OVERSIGHT,
          tier: 'blunder',
          severity: 10,
          centipawnLoss: 1000,
          evaluationBefore: 0,
          evaluationAfter: -100,
          explanation:
            "On move 3... Nf6 missed the opponent's threat. g6 kept you safe. This big mistake cost 10.0 pawns.",
          themes: ['defensiveMove'],
        },
      ]);
    });

    it('should commit the errors and mark the game analyzed', async () => {
      const service = new GameAnalysisService(scholarsMateEvaluator(), repository);
      await service.analyzeGame(game, { settings: SETTINGS });

      const stored = await repository.listErrors({ gameId: game.id });
      expect(stored.map((e) => e.id)).toEqual([errorId(game.id, 5)]);
      expect((await repository.getGame(game.id))?.analyzed).toBe(true);
    });

    it('should only evaluate positions of the player', async () => {
      const evaluator = new ScriptedEvaluator();
      const service = new GameAnalysisService(evaluator, repository);

      await service.analyzeGame(game, { settings: SETTINGS });

      expect(evaluator.calls).toEqual(POSITIONS.slice(1, 7).map((p) => p.fenBefore));
    });

    it('should evaluate both sides but not the mating move when the color is unknown', async () => {
      const both = await repository.createGame(newGame({ playerColor: null }));
      const evaluator = new ScriptedEvaluator();
      const service = new GameAnalysisService(evaluator, repository);

      const report = await service.analyzeGame(both, { settings: SETTINGS });

      expect(evaluator.calls).toHaveLength(7);
      expect(report.pliesAnalyzed).toBe(7);
    });

    it('should report progress per inspected ply', async () => {
      const service = new GameAnalysisService(new ScriptedEvaluator(), repository);
      const progress: string[] = [];

      await service.analyzeGame(game, {
        settings: SETTINGS,
        onProgress: (done, total) => progress.push(`${done}/${total}`),
      });

      expect(progress).toEqual(['1/3', '2/3', '3/3']);
    });

    it('should give identical results when run twice', async () => {
      const service = new GameAnalysisService(scholarsMateEvaluator(), repository);

      const first = await service.analyzeGame(game, { settings: SETTINGS });
      const second = await service.analyzeGame(game, { settings: SETTINGS });

      expect(second.errors).toEqual(first.errors);
      expect(await repository.listErrors({ gameId: game.id })).toHaveLength(1);
    });

    it('should replace an earlier error set', async () => {
      await new GameAnalysisService(scholarsMateEvaluator(), repository).analyzeGame(game, {
        settings: SETTINGS,
      });
      await new GameAnalysisService(new ScriptedEvaluator(), repository).analyzeGame(game, {
        settings: { ...SETTINGS, thresholdCp: 200 },
      });

      expect(await repository.listErrors({ gameId: game.id })).toEqual([]);
    });
  });

  describe('drawn positions', () => {
    it('should not flag the engine move in a position past the fifty-move limit', async () => {
      const start = '8/8/4k3/8/8/4K3/4R3/8 w - - 100 90';
      const engine = new FakeEngine(0, {
        analyze: async (fen) => ({
          bestMove: fen === start ? 'e3d3' : 'e6d5',
          score: { type: 'cp', value: 0 },
          depth: 12,
          pv: [],
        }),
      });
      const pool = new EnginePool<EngineHandle>({ size: 1, createEngine: () => engine });
      await pool.initialize();
      const drawn = await repository.createGame(
        newGame({ moves: ['Kd3'], initialFen: start, outcome: 'draw', playerColor: 'white' })
      );
      const service = new GameAnalysisService(new EngineEvaluator(pool), repository);

      const report = await service.analyzeGame(drawn, { settings: SETTINGS });

      expect(report.status).toBe('analyzed');
      expect(report.errors).toEqual([]);
      expect(engine.budgets).toHaveLength(2);
    });

    it('should not flag a ply when the position before it has no best move', async () => {
      const evaluator = new ScriptedEvaluator()
        .set(POSITIONS[5].fenBefore, { status: 'ok', bestMove: null, score: cp(0), depth: 0 })
        .set(POSITIONS[5].fenAfter, ok(mate(1), 'h5f7'));
      const service = new GameAnalysisService(evaluator, repository);

      const report = await service.analyzeGame(game, { settings: SETTINGS });

      expect(report.errors).toEqual([]);
    });
  });

  describe('unavailable evaluations', () => {
    it('should skip the plies next to an unavailable position', async () => {
      const both = await repository.createGame(newGame({ playerColor: null }));
      const evaluator = new ScriptedEvaluator().set(POSITIONS[3].fenBefore, UNAVAILABLE);
      const service = new GameAnalysisService(evaluator, repository);

      const report = await service.analyzeGame(both, { settings: SETTINGS });

      expect(report.status).toBe('analyzed');
      expect(report.skippedPlies).toEqual([2, 3]);
      expect(report.pliesAnalyzed).toBe(5);
    });

    it('should give up when too many positions are unavailable', async () => {
      const service = new GameAnalysisService(new ScriptedEvaluator(() => UNAVAILABLE), repository);

      await expect(service.analyzeGame(game, { settings: SETTINGS })).rejects.toThrow(
        EvaluationUnavailableError
      );
      expect((await repository.getGame(game.id))?.analyzed).toBe(false);
    });
  });

  describe('failures', () => {
    it('should reject a game that cannot be replayed', async () => {
      const broken = await repository.createGame(newGame({ moves: ['e4', 'e4'] }));
      const service = new GameAnalysisService(new ScriptedEvaluator(), repository);

      await expect(service.analyzeGame(broken, { settings: SETTINGS })).rejects.toThrow(
        MalformedGameError
      );
    });

    it('should stop before evaluating when already cancelled', async () => {
      const evaluator = new ScriptedEvaluator();
      const service = new GameAnalysisService(evaluator, repository);
      const controller = new AbortController();
      controller.abort();

      await expect(
        service.analyzeGame(game, { settings: SETTINGS, signal: controller.signal })
      ).rejects.toThrow(AnalysisCancelledError);
      expect(evaluator.calls).toEqual([]);
    });

    it('should write nothing when cancelled midway', async () => {
      const controller = new AbortController();
      const evaluator: ScriptedEvaluator = new ScriptedEvaluator(() => {
        if (evaluator.calls.length === 2) controller.abort();
        return undefined;
      });
      const service = new GameAnalysisService(evaluator, repository);

      await expect(
        service.analyzeGame(game, { settings: SETTINGS, signal: controller.signal })
      ).rejects.toThrow(AnalysisCancelledError);
      expect(evaluator.calls).toHaveLength(2);
      expect((await repository.getGame(game.id))?.analyzed).toBe(false);
    });

    it('should treat a game deleted during analysis as cancelled', async () => {
      const evaluator = new ScriptedEvaluator(async () => {
        await repository.deleteGame(game.id);
        return undefined;
      });
      const service = new GameAnalysisService(evaluator, repository);

      await expect(service.analyzeGame(game, { settings: SETTINGS })).rejects.toThrow(
        AnalysisCancelledError
      );
      expect(await repository.listErrors({ gameId: game.id })).toEqual([]);
    });
  });
});

describe('resolveSettings', () => {
  it('should apply request overrides over the defaults', () => {
    const settings = resolveSettings({ thresholdCp: 150, depth: 10, movetimeMs: 500 });

    expect(settings.thresholdCp).toBe(150);
    expect(settings.budget.depth).toBe(10);
    expect(settings.budget.movetimeMs).toBe(500);
  });
});
