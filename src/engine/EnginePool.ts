/**
 * EnginePool - Owns a fixed set of engine processes
 *
 * Engines are checked out exclusively with acquire()/release() or, preferably,
 * withEngine(), which always returns the engine. Waiters are served in FIFO
 * order. An engine that comes back unhealthy is disposed and replaced.
 */

import type { AnalysisBudget, EngineAnalysis } from '../types/index.js';
import { EnginePoolError, toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('EnginePool');

/**
 * One engine process as seen by the pool
 */
export interface EngineHandle {
  readonly id: number;
  readonly healthy: boolean;
  initialize(): Promise<void>;
  analyze(fen: string, budget: AnalysisBudget): Promise<EngineAnalysis>;
  dispose(): Promise<void>;
}

export type EngineFactory<E extends EngineHandle> = (id: number) => E;

export interface EnginePoolOptions<E extends EngineHandle> {
  size: number;
  createEngine: EngineFactory<E>;
}

export type EnginePoolState = 'created' | 'initializing' | 'ready' | 'disposed' | 'error';

export interface EnginePoolStatus {
  state: EnginePoolState;
  size: number;
  idle: number;
  inUse: number;
  waiting: number;
  engines: Array<{ id: number; healthy: boolean; inUse: boolean }>;
}

interface Waiter<E> {
  resolve: (engine: E) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

export class EnginePool<E extends EngineHandle = EngineHandle> {
  private engines = new Set<E>();
  private idle: E[] = [];
  private waiters: Waiter<E>[] = [];
  private state: EnginePoolState = 'created';
  private nextId = 0;

  constructor(private readonly options: EnginePoolOptions<E>) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new EnginePoolError(`Pool size must be a positive integer, got ${options.size}`);
    }
  }

  get size(): number {
    return this.options.size;
  }

  get ready(): boolean {
    return this.state === 'ready';
  }

  async initialize(): Promise<void> {
    if (this.state === 'ready' || this.state === 'initializing') return;
    if (this.state === 'disposed') {
      throw new EnginePoolError('Engine pool has been disposed');
    }

    this.state = 'initializing';
    logger.info({ size: this.options.size }, 'Initializing engine pool');

    const results = await Promise.allSettled(
      Array.from({ length: this.options.size }, () => this.startEngine())
    );

    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
    if (failure) {
      this.state = 'error';
      const started = [...this.engines];
      this.engines.clear();
      this.idle = [];
      await this.disposeEngines(started);
      throw new EnginePoolError(`Engine pool failed to start: ${toError(failure.reason).message}`);
    }

    this.state = 'ready';
    logger.info({ size: this.engines.size }, 'Engine pool ready');
  }

  /**
   * Check out an engine. Queues FIFO when all engines are in use.
   * Rejects when the pool is not ready, is disposed while waiting, or the
   * signal aborts first.
   */
  acquire(signal?: AbortSignal): Promise<E> {
    if (this.state !== 'ready') {
      return Promise.reject(new EnginePoolError(`Engine pool is ${this.state}`));
    }
    if (signal?.aborted) {
      return Promise.reject(toError(signal.reason));
    }

    const engine = this.idle.shift();
    if (engine) return Promise.resolve(engine);

    return new Promise<E>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(toError(signal?.reason));
      };
      const waiter: Waiter<E> = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Return an engine. Unhealthy engines are swapped for a fresh one.
   */
  release(engine: E): void {
    if (!this.engines.has(engine)) return;

    if (this.state === 'disposed') {
      this.engines.delete(engine);
      engine.dispose().catch((err: unknown) => {
        logger.warn({ engineId: engine.id, err: toError(err) }, 'Engine dispose failed');
      });
      return;
    }

    if (!engine.healthy) {
      this.replace(engine).catch((err: unknown) => {
        logger.error({ engineId: engine.id, err: toError(err) }, 'Engine replacement failed');
      });
      return;
    }

    this.handOver(engine);
  }

  /**
   * Run `fn` with an engine checked out; the engine is returned even when `fn` throws
   */
  async withEngine<T>(fn: (engine: E) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const engine = await this.acquire(signal);
    try {
      return await fn(engine);
    } finally {
      this.release(engine);
    }
  }

  async dispose(): Promise<void> {
    if (this.state === 'disposed') return;
    this.state = 'disposed';

    logger.info('Disposing engine pool');

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(new EnginePoolError('Engine pool is being disposed'));
    }

    // Engines still checked out are disposed when they are released
    const idle = this.idle;
    this.idle = [];
    for (const engine of idle) {
      this.engines.delete(engine);
    }
    await this.disposeEngines(idle);

    logger.info('Engine pool disposed');
  }

  getStatus(): EnginePoolStatus {
    const idle = new Set(this.idle);
    return {
      state: this.state,
      size: this.options.size,
      idle: this.idle.length,
      inUse: this.engines.size - this.idle.length,
      waiting: this.waiters.length,
      engines: [...this.engines].map((e) => ({
        id: e.id,
        healthy: e.healthy,
        inUse: !idle.has(e),
      })),
    };
  }

  private async startEngine(): Promise<E> {
    const engine = this.options.createEngine(this.nextId++);
    this.engines.add(engine);
    await engine.initialize();
    this.idle.push(engine);
    return engine;
  }

  private handOver(engine: E): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(engine);
    } else {
      this.idle.push(engine);
    }
  }

  private async replace(broken: E): Promise<void> {
    logger.warn({ engineId: broken.id }, 'Replacing unhealthy engine');
    this.engines.delete(broken);
    await this.disposeEngines([broken]);

    if (this.state !== 'ready') return;

    const fresh = this.options.createEngine(this.nextId++);
    this.engines.add(fresh);
    try {
      await fresh.initialize();
    } catch (error) {
      this.engines.delete(fresh);
      await this.disposeEngines([fresh]);
      this.failIfEmpty();
      throw error;
    }

    if (this.state !== 'ready') {
      this.engines.delete(fresh);
      await this.disposeEngines([fresh]);
      return;
    }
    this.handOver(fresh);
  }

  /**
   * With no engine left nobody will ever serve the waiters
   */
  private failIfEmpty(): void {
    if (this.engines.size > 0) return;

    this.state = 'error';
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(new EnginePoolError('No healthy engine left in the pool'));
    }
  }

  private async disposeEngines(engines: E[]): Promise<void> {
    const results = await Promise.allSettled(engines.map((e) => e.dispose()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logger.warn(
          { engineId: engines[i].id, err: toError(result.reason) },
          'Engine dispose failed'
        );
      }
    });
  }
}
