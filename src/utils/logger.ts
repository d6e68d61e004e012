/**
 * Pino logger configuration
 */

import pino from 'pino';
import { config } from '../config/index.js';

const isTest = config.nodeEnv === 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : config.isProduction ? 'info' : 'debug'),
  transport:
    config.isProduction || isTest
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },
});

export function createChildLogger(name: string) {
  return logger.child({ name });
}
