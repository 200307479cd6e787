import { errorMessage, logger } from '../../utils/logger';

export type JobHandler = (pictureId: string) => Promise<unknown>;

interface WorkerPool {
  concurrency: number;
  active: number;
  queue: Array<() => Promise<void>>;
}

interface RegisteredJob {
  pool: string;
  handler: JobHandler;
}

/**
 * Named jobs run on named in-process pools, each with its own concurrency.
 * A failing job is logged and dropped; nothing is reported back to whoever
 * enqueued it.
 */
export class InProcessJobQueue {
  private readonly pools = new Map<string, WorkerPool>();
  private readonly jobs = new Map<string, RegisteredJob>();
  private idleWaiters: Array<() => void> = [];

  constructor(pools: Record<string, number>) {
    for (const [name, concurrency] of Object.entries(pools)) {
      this.pools.set(name, { concurrency: Math.max(1, concurrency), active: 0, queue: [] });
    }
  }

  register(name: string, pool: string, handler: JobHandler): void {
    if (!this.pools.has(pool)) {
      throw new Error(`Unknown worker pool "${pool}" for job ${name}`);
    }
    this.jobs.set(name, { pool, handler });
  }

  enqueue(name: string, pictureId: string): void {
    const job = this.jobs.get(name);
    if (!job) {
      throw new Error(`No handler registered for job ${name}`);
    }
    const pool = this.requirePool(job.pool);
    pool.queue.push(async () => {
      logger.debug(`Running ${name}`, { pictureId, pool: job.pool });
      await job.handler(pictureId);
    });
    void this.drain(job.pool);
  }

  /**
   * Resolves once every pool is empty and no job is running.
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private async drain(poolName: string): Promise<void> {
    const pool = this.requirePool(poolName);
    if (pool.active >= pool.concurrency) return;

    const next = pool.queue.shift();
    if (!next) return;

    pool.active += 1;
    try {
      await next();
    } catch (error) {
      logger.warn(`Job failed on pool ${poolName}: ${errorMessage(error)}`);
    } finally {
      pool.active -= 1;
      if (pool.queue.length > 0) {
        void this.drain(poolName);
      }
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    for (const pool of this.pools.values()) {
      if (pool.active > 0 || pool.queue.length > 0) return false;
    }
    return true;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private requirePool(name: string): WorkerPool {
    const pool = this.pools.get(name);
    if (!pool) {
      throw new Error(`Unknown worker pool "${name}"`);
    }
    return pool;
  }
}
