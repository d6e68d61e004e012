/**
 * Services the HTTP layer talks to
 */

import type { EnginePoolStatus } from '../engine/EnginePool.js';
import type { AnalysisScheduler } from '../services/AnalysisScheduler.js';
import type { ErrorStatisticsService } from '../services/ErrorStatisticsService.js';
import type { PgnParserService } from '../services/PgnParserService.js';
import type { GameErrorRepository } from '../storage/GameErrorRepository.js';

export interface AppContext {
  repository: GameErrorRepository;
  scheduler: AnalysisScheduler;
  pgnParser: PgnParserService;
  statistics: ErrorStatisticsService;
  engineStatus: () => EnginePoolStatus;
}
