/**
 * Tests for request validation
 */

import { describe, it, expect } from 'vitest';
import {
  analysisOptionsSchema,
  errorListQuerySchema,
  importGameSchema,
} from '../utils/validation.js';
import { ErrorCategory } from '../types/index.js';

describe('validation schemas', () => {
  it('should accept an import with only a PGN', () => {
    expect(importGameSchema.parse({ pgn: '1. e4 *' })).toEqual({ pgn: '1. e4 *' });
  });

  it('should reject an empty PGN', () => {
    expect(importGameSchema.safeParse({ pgn: '' }).success).toBe(false);
  });

  it('should default missing analysis options', () => {
    expect(analysisOptionsSchema.parse(undefined)).toEqual({});
  });

  it('should bound the analysis options', () => {
    expect(analysisOptionsSchema.safeParse({ thresholdCp: 20 }).success).toBe(false);
    expect(analysisOptionsSchema.safeParse({ depth: 40 }).success).toBe(false);
    expect(analysisOptionsSchema.parse({ thresholdCp: 300, depth: 12 })).toEqual({
      thresholdCp: 300,
      depth: 12,
    });
  });

  it('should only accept known categories', () => {
    expect(errorListQuerySchema.parse({ category: 'missed_fork' })).toEqual({
      category: ErrorCategory.MISSED_FORK,
    });
    expect(errorListQuerySchema.safeParse({ category: 'brilliant' }).success).toBe(false);
  });
});
