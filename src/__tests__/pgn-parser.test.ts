/**
 * Tests for PGN import
 */

import { describe, it, expect } from 'vitest';
import { PgnParserService } from '../services/PgnParserService.js';
import { MalformedGameError } from '../utils/errors.js';

const parser = new PgnParserService();

const SAMPLE_PGN = `[Event "Casual game"]
[Site "https://example.com/game/1"]
[Date "2024.03.02"]
[UTCTime "10:15:00"]
[White "alice_plays"]
[Black "BobTheBuilder"]
[Result "1-0"]

1. e4 e5 2. Qh5 Nc6 3. Bc4 Nf6 4. Qxf7# 1-0`;

const SETUP_PGN = `[Event "Endgame drill"]
[SetUp "1"]
[FEN "7k/8/8/8/8/8/6q1/7K w - - 0 1"]
[Result "*"]

1. Kxg2 *`;

describe('PgnParserService', () => {
  describe('parsePgn', () => {
    it('should read moves and headers', () => {
      const parsed = parser.parsePgn(SAMPLE_PGN);

      expect(parsed.moves).toEqual(['e4', 'e5', 'Qh5', 'Nc6', 'Bc4', 'Nf6', 'Qxf7#']);
      expect(parsed.headers['White']).toBe('alice_plays');
      expect(parsed.initialFen).toBeUndefined();
    });

    it('should keep the set-up position', () => {
      const parsed = parser.parsePgn(SETUP_PGN);

      expect(parsed.moves).toEqual(['Kxg2']);
      expect(parsed.initialFen).toBe('7k/8/8/8/8/8/6q1/7K w - - 0 1');
    });

    it('should reject illegal moves', () => {
      expect(() => parser.parsePgn('1. e4 e5 2. Nf6')).toThrow(MalformedGameError);
    });

    it('should reject a game without moves', () => {
      expect(() => parser.parsePgn('[Event "Empty"]\n\n*')).toThrow(MalformedGameError);
    });
  });

  describe('toNewGame', () => {
    it('should build a game for the importing user', () => {
      const game = parser.toNewGame(SAMPLE_PGN, { userId: 'user-1', username: 'bob' });

      expect(game).toEqual({
        userId: 'user-1',
        moves: ['e4', 'e5', 'Qh5', 'Nc6', 'Bc4', 'Nf6', 'Qxf7#'],
        initialFen: undefined,
        outcome: 'white',
        playedAt: '2024-03-02T10:15:00.000Z',
        source: 'https://example.com/game/1',
        playerColor: 'black',
      });
    });

    it('should prefer an explicit source', () => {
      const game = parser.toNewGame(SAMPLE_PGN, { userId: 'user-1', source: 'upload' });

      expect(game.source).toBe('upload');
      expect(game.playerColor).toBeNull();
    });
  });

  describe('header helpers', () => {
    it('should map results to outcomes', () => {
      expect(parser.getGameResult({ Result: '0-1' })).toBe('black');
      expect(parser.getGameResult({ Result: '1/2-1/2' })).toBe('draw');
      expect(parser.getGameResult({ Result: '*' })).toBe('unknown');
      expect(parser.getGameResult({})).toBe('unknown');
    });

    it('should match the player name ignoring case', () => {
      const headers = { White: 'Alice_Plays', Black: 'bob' };

      expect(parser.getPlayerColor(headers, 'ALICE')).toBe('white');
      expect(parser.getPlayerColor(headers, 'Bob')).toBe('black');
      expect(parser.getPlayerColor(headers, 'carol')).toBeNull();
    });

    it('should ignore incomplete dates', () => {
      expect(parser.getPlayedAt({ Date: '2024.??.??' })).toBeNull();
      expect(parser.getPlayedAt({ UTCDate: '2023.11.05' })).toBe('2023-11-05T00:00:00.000Z');
    });
  });
});
