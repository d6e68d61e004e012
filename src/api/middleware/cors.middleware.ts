/**
 * CORS for the analysis API
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { AnalysisError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const corsLogger = logger.child({ middleware: 'cors' });

const LOCALHOST = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

/**
 * An origin passes when it is listed, is a subdomain of a listed https
 * origin, or is localhost on any port while localhost is listed.
 */
export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => {
    if (origin === allowed) return true;
    if (LOCALHOST.test(allowed)) return LOCALHOST.test(origin);
    if (allowed.startsWith('https://')) {
      return origin.startsWith('https://') && origin.endsWith(`.${allowed.slice('https://'.length)}`);
    }
    return false;
  });
}

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Server-to-server calls and curl send no Origin
    if (!origin || isOriginAllowed(origin, config.allowedOrigins)) {
      callback(null, true);
      return;
    }

    corsLogger.warn({ origin }, 'Origin not allowed');
    callback(new AnalysisError(`Origin ${origin} is not allowed`, 403, 'ORIGIN_NOT_ALLOWED'));
  },
  methods: ['GET', 'POST', 'DELETE'],
  allowedHeaders: ['Content-Type'],
  maxAge: 600,
});
