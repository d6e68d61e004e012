/**
 * StockfishWorker - Wraps a single native Stockfish process
 * Handles UCI protocol communication
 */

import { spawn, type ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import type { AnalysisBudget, EngineAnalysis, Score } from '../types/index.js';
import { ENGINE_CONFIG } from '../config/constants.js';
import { EngineTimeoutError, toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import type { EngineHandle } from './EnginePool.js';

const logger = createChildLogger('StockfishWorker');

interface InfoLine {
  depth: number;
  score: Score;
  pv: string[];
}

interface PendingSearch {
  resolve: (result: EngineAnalysis) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Parse one `info` line. Lines without a score (currmove, string, ...) give null.
 */
export function parseInfoLine(line: string): InfoLine | null {
  if (!line.startsWith('info')) return null;

  const depthMatch = line.match(/\bdepth (\d+)/);
  const scoreMatch = line.match(/\bscore (cp|mate) (-?\d+)/);
  if (!depthMatch || !scoreMatch) return null;

  // Bound scores come from an aspiration window and are not final
  if (/\bscore (?:cp|mate) -?\d+ (?:lowerbound|upperbound)/.test(line)) return null;

  const value = parseInt(scoreMatch[2], 10);
  const score: Score = scoreMatch[1] === 'mate' ? { type: 'mate', value } : { type: 'cp', value };
  const pvMatch = line.match(/ pv (.+)$/);

  return {
    depth: parseInt(depthMatch[1], 10),
    score,
    pv: pvMatch ? pvMatch[1].trim().split(/\s+/) : [],
  };
}

/**
 * Move from a `bestmove` line, null for `bestmove (none)`
 */
export function parseBestMove(line: string): string | null {
  const match = line.match(/^bestmove (\S+)/);
  if (!match || match[1] === '(none)') return null;
  return match[1];
}

export class StockfishWorker extends EventEmitter implements EngineHandle {
  private process: ChildProcess | null = null;
  private isReady = false;
  private isBroken = false;
  private outputBuffer = '';
  private pending: PendingSearch | null = null;
  private lastInfo: InfoLine | null = null;
  /** Resolves once a stopped search has reported its late bestmove */
  private draining: Promise<void> | null = null;
  private finishDrain: (() => void) | null = null;

  constructor(
    public readonly id: number,
    private readonly stockfishPath: string = process.env.STOCKFISH_PATH || '/usr/games/stockfish'
  ) {
    super();
  }

  get healthy(): boolean {
    return this.isReady && !this.isBroken;
  }

  async initialize(): Promise<void> {
    const child = spawn(this.stockfishPath, [], { stdio: ['pipe', 'pipe', 'pipe'] });
    this.process = child;

    if (!child.stdout || !child.stdin) {
      throw new Error('Failed to create Stockfish process streams');
    }

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (data: string) => this.handleOutput(data));

    child.stdin.on('error', (err) => {
      logger.error({ workerId: this.id, err }, 'Stockfish stdin closed');
      this.markBroken(err);
    });

    child.stderr?.on('data', (data: Buffer) => {
      logger.warn({ workerId: this.id, stderr: data.toString() }, 'Stockfish stderr');
    });

    child.on('error', (err) => {
      logger.error({ workerId: this.id, err }, 'Stockfish process error');
      this.markBroken(err);
    });

    child.on('close', (code) => {
      logger.info({ workerId: this.id, code }, 'Stockfish process closed');
      this.isReady = false;
      this.markBroken(new Error(`Stockfish ${this.id} exited with code ${code}`));
      this.emit('close', code);
    });

    const uciOk = this.waitFor('uciok', ENGINE_CONFIG.INIT_TIMEOUT);
    this.sendCommand('uci');
    await uciOk;

    this.sendCommand(`setoption name Hash value ${ENGINE_CONFIG.HASH_SIZE_PER_WORKER}`);
    this.sendCommand(`setoption name Threads value ${ENGINE_CONFIG.THREADS_PER_WORKER}`);

    const readyOk = this.waitFor('readyok', ENGINE_CONFIG.CONFIGURE_TIMEOUT);
    this.sendCommand('isready');
    await readyOk;

    this.isReady = true;
    logger.info({ workerId: this.id }, 'Stockfish initialized');
  }

  /**
   * Search one position. Rejects with EngineTimeoutError when the budget's
   * hard timeout passes; the search is stopped and its late result discarded.
   */
  async analyze(fen: string, budget: AnalysisBudget): Promise<EngineAnalysis> {
    if (this.draining) {
      await this.draining;
    }
    if (!this.healthy) {
      throw new Error(`Stockfish worker ${this.id} is not ready`);
    }
    if (this.pending) {
      throw new Error(`Stockfish worker ${this.id} is busy`);
    }

    this.lastInfo = null;

    return new Promise<EngineAnalysis>((resolve, reject) => {
      const timer = setTimeout(() => this.handleTimeout(budget.timeoutMs), budget.timeoutMs);
      this.pending = { resolve, reject, timer };

      this.sendCommand(`position fen ${fen}`);
      if (budget.movetimeMs && budget.movetimeMs > 0) {
        this.sendCommand(`go movetime ${budget.movetimeMs}`);
      } else {
        this.sendCommand(`go depth ${budget.depth}`);
      }
    });
  }

  stop(): void {
    this.sendCommand('stop');
  }

  async dispose(): Promise<void> {
    this.failPending(new Error(`Stockfish worker ${this.id} disposed`));
    this.endDrain();

    const child = this.process;
    if (!child || child.exitCode !== null) return;

    this.sendCommand('quit');

    return new Promise((resolve) => {
      const forceKill = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, ENGINE_CONFIG.QUIT_GRACE_PERIOD);

      child.once('close', () => {
        clearTimeout(forceKill);
        resolve();
      });
    });
  }

  private handleOutput(data: string): void {
    this.outputBuffer += data;
    const lines = this.outputBuffer.split('\n');

    // Keep incomplete line in buffer
    this.outputBuffer = lines.pop() || '';

    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;

      this.emit('output', line);
      this.parseLine(line);
    }
  }

  private parseLine(line: string): void {
    const info = parseInfoLine(line);
    if (info) {
      if (!this.lastInfo || info.depth >= this.lastInfo.depth) {
        this.lastInfo = info;
      }
      return;
    }

    if (line.startsWith('bestmove')) {
      if (this.draining) {
        this.endDrain();
        return;
      }
      this.completeSearch(parseBestMove(line));
    }
  }

  private completeSearch(bestMove: string | null): void {
    const pending = this.pending;
    if (!pending) return;

    clearTimeout(pending.timer);
    this.pending = null;

    const info = this.lastInfo;
    if (!info) {
      pending.reject(new Error(`Stockfish ${this.id} returned no score`));
      return;
    }

    pending.resolve({
      bestMove: bestMove ?? info.pv[0] ?? '',
      score: info.score,
      depth: info.depth,
      pv: info.pv,
    });
  }

  private handleTimeout(timeoutMs: number): void {
    const pending = this.pending;
    if (!pending) return;

    this.pending = null;
    pending.reject(new EngineTimeoutError(this.id, timeoutMs));

    // The engine still owes a bestmove for the stopped search
    this.draining = new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        logger.warn({ workerId: this.id }, 'Stopped search never reported, marking unhealthy');
        this.isBroken = true;
        this.endDrain();
      }, ENGINE_CONFIG.STOP_DRAIN_TIMEOUT);

      this.finishDrain = () => {
        clearTimeout(timer);
        resolve();
      };
    });
    this.stop();
  }

  private endDrain(): void {
    const finish = this.finishDrain;
    this.finishDrain = null;
    this.draining = null;
    finish?.();
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;

    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(error);
  }

  private markBroken(error: unknown): void {
    this.isBroken = true;
    this.failPending(toError(error));
    this.endDrain();
    this.emit('unhealthy', this.id);
  }

  /**
   * Resolve when the engine prints a line containing `token`
   */
  private waitFor(token: string, timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onClose = () => {
        cleanup();
        reject(new Error(`Stockfish ${this.id} exited before "${token}"`));
      };
      const onLine = (line: string) => {
        if (line.includes(token)) {
          cleanup();
          resolve();
        }
      };
      const timeout = setTimeout(() => {
        cleanup();
        reject(new Error(`Stockfish ${this.id} did not answer "${token}" in ${timeoutMs}ms`));
      }, timeoutMs);
      const cleanup = () => {
        clearTimeout(timeout);
        this.removeListener('output', onLine);
        this.removeListener('unhealthy', onClose);
      };

      this.on('output', onLine);
      this.on('unhealthy', onClose);
    });
  }

  private sendCommand(command: string): void {
    if (this.process?.stdin && !this.process.stdin.destroyed) {
      this.process.stdin.write(`${command}\n`);
    }
  }
}
