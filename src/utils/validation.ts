/**
 * Zod validation schemas for API requests
 */

import { z } from 'zod';
import { ErrorCategory } from '../types/index.js';

export const importGameSchema = z.object({
  pgn: z.string().min(1, 'PGN is required').max(100000, 'PGN is too long'),
  /** Account name on the platform the game came from */
  username: z.string().min(1).max(100).optional(),
  source: z.string().max(500).optional(),
});

export const analysisOptionsSchema = z
  .object({
    thresholdCp: z.number().int().min(50).max(1000).optional(),
    depth: z.number().int().min(6).max(30).optional(),
    movetimeMs: z.number().int().min(50).max(60000).optional(),
  })
  .default({});

export const errorListQuerySchema = z.object({
  category: z.nativeEnum(ErrorCategory).optional(),
});

export const userParamsSchema = z.object({
  userId: z.string().min(1).max(100),
});

export const gameParamsSchema = z.object({
  gameId: z.string().min(1).max(100),
});
