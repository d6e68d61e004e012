/**
 * Chess Error Engine - Entry Point
 */

// Load environment variables FIRST, before any other imports
import 'dotenv/config';

import { createApp } from './app.js';
import { config, hasStorageCredentials, validateConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { EnginePool, type EngineHandle } from './engine/EnginePool.js';
import { EngineEvaluator } from './engine/EngineEvaluator.js';
import { StockfishWorker } from './engine/StockfishWorker.js';
import { AnalysisScheduler } from './services/AnalysisScheduler.js';
import { errorStatisticsService } from './services/ErrorStatisticsService.js';
import { GameAnalysisService } from './services/GameAnalysisService.js';
import { pgnParserService } from './services/PgnParserService.js';
import type { GameErrorRepository } from './storage/GameErrorRepository.js';
import { InMemoryGameRepository } from './storage/InMemoryGameRepository.js';
import {
  createSupabaseClient,
  SupabaseGameRepository,
} from './storage/SupabaseGameRepository.js';

function createRepository(): GameErrorRepository {
  if (hasStorageCredentials()) {
    return new SupabaseGameRepository(
      createSupabaseClient(config.supabaseUrl, config.supabaseServiceKey)
    );
  }
  return new InMemoryGameRepository();
}

const startServer = async () => {
  // Validate configuration
  for (const warning of validateConfig()) {
    logger.warn(warning);
  }

  logger.info(
    {
      nodeEnv: config.nodeEnv,
      port: config.port,
      stockfishPath: config.stockfishPath,
      poolSize: config.stockfishPoolSize,
      thresholdCp: config.blunderThresholdCp,
    },
    'Starting Chess Error Engine'
  );

  const pool = new EnginePool<EngineHandle>({
    size: config.stockfishPoolSize,
    createEngine: (id) => new StockfishWorker(id, config.stockfishPath),
  });

  try {
    logger.info('Initializing engine pool...');
    await pool.initialize();
  } catch (error) {
    logger.error({ error }, 'Failed to initialize engine pool');
    process.exit(1);
  }

  const repository = createRepository();
  const analysisService = new GameAnalysisService(new EngineEvaluator(pool), repository);
  const scheduler = new AnalysisScheduler(analysisService, repository, {
    concurrency: pool.size,
  });

  const app = createApp({
    repository,
    scheduler,
    pgnParser: pgnParserService,
    statistics: errorStatisticsService,
    engineStatus: () => pool.getStatus(),
  });

  // Start HTTP server
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/api/v1/health`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');

    // Stop accepting new connections
    server.close(() => {
      logger.info('HTTP server closed');
    });

    // Running analyses write nothing once cancelled
    scheduler.cancelAll();

    try {
      await pool.dispose();
    } catch (error) {
      logger.error({ error }, 'Error disposing engine pool');
    }

    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
  });
};

startServer().catch((error) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
