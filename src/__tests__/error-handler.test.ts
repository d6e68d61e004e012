/**
 * Tests for the HTTP error mapping
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { toErrorResponse } from '../api/middleware/errorHandler.js';
import { GameNotFoundError, MalformedGameError } from '../utils/errors.js';

function validationError(): z.ZodError {
  const result = z.object({ depth: z.number().min(1, 'depth too small') }).safeParse({ depth: 0 });
  if (result.success) throw new Error('expected validation to fail');
  return result.error;
}

describe('toErrorResponse', () => {
  it('should map validation errors to 400 with their paths', () => {
    expect(toErrorResponse(validationError(), false)).toEqual({
      statusCode: 400,
      body: {
        error: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: [{ path: 'depth', message: 'depth too small' }],
      },
    });
  });

  it('should map a malformed game to 422', () => {
    const err = new MalformedGameError('Illegal move e4 at ply 1', 1, 'e4');

    expect(toErrorResponse(err, false)).toEqual({
      statusCode: 422,
      body: {
        error: 'Illegal move e4 at ply 1',
        code: 'MALFORMED_GAME',
        details: { ply: 1, move: 'e4' },
      },
    });
  });

  it('should map a missing game to 404 without details in production', () => {
    expect(toErrorResponse(new GameNotFoundError('game-9'), true)).toEqual({
      statusCode: 404,
      body: { error: 'Game game-9 not found', code: 'GAME_NOT_FOUND' },
    });
  });

  it('should hide unexpected errors in production', () => {
    expect(toErrorResponse(new Error('socket closed'), true)).toEqual({
      statusCode: 500,
      body: { error: 'Internal server error', code: 'INTERNAL_ERROR' },
    });
  });

  it('should expose the message and stack outside production', () => {
    const err = new Error('socket closed');

    expect(toErrorResponse(err, false)).toEqual({
      statusCode: 500,
      body: { error: 'socket closed', code: 'INTERNAL_ERROR', stack: err.stack },
    });
  });
});
