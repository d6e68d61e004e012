/**
 * Environment configuration
 */

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3001', 10),
  isProduction: process.env.NODE_ENV === 'production',

  // Supabase
  supabaseUrl: process.env.SUPABASE_URL || '',
  supabaseServiceKey: process.env.SUPABASE_SERVICE_KEY || '',

  // Stockfish
  stockfishPath: process.env.STOCKFISH_PATH || '/usr/games/stockfish',
  stockfishPoolSize: parseInt(process.env.STOCKFISH_POOL_SIZE || '4', 10),
  stockfishDepth: parseInt(process.env.STOCKFISH_DEPTH || '16', 10),
  stockfishMovetime: parseInt(process.env.STOCKFISH_MOVETIME || '0', 10),
  stockfishTimeout: parseInt(process.env.STOCKFISH_TIMEOUT || '10000', 10),

  // Error detection
  blunderThresholdCp: parseInt(process.env.BLUNDER_THRESHOLD_CP || '200', 10),
  maxUnavailablePositions: parseInt(process.env.MAX_UNAVAILABLE_POSITIONS || '3', 10),

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:8080')
    .split(',')
    .map((o) => o.trim()),
} as const;

export type Config = typeof config;

export function hasStorageCredentials(): boolean {
  return Boolean(config.supabaseUrl && config.supabaseServiceKey);
}

export function validateConfig(): string[] {
  const warnings: string[] = [];

  if (!hasStorageCredentials()) {
    warnings.push('SUPABASE_URL / SUPABASE_SERVICE_KEY not set, using in-memory storage');
  }
  if (!Number.isFinite(config.stockfishPoolSize) || config.stockfishPoolSize < 1) {
    throw new Error(`STOCKFISH_POOL_SIZE must be a positive integer`);
  }
  if (!Number.isFinite(config.blunderThresholdCp) || config.blunderThresholdCp <= 0) {
    throw new Error(`BLUNDER_THRESHOLD_CP must be a positive integer`);
  }

  return warnings;
}
