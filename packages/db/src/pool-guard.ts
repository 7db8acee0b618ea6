/**
 * Pool Guard — bounds how many connections sessions may borrow at once.
 *
 * postgres.js would otherwise queue borrowers with no upper wait. The guard
 * turns a saturated pool into a FIFO queue with a timeout:
 * 1. At most `limit` connections are checked out concurrently
 * 2. Further borrowers wait in arrival order
 * 3. A borrower still waiting after `queueTimeoutMs` fails with POOL_EXHAUSTED
 *
 * @module
 */

import { PoolExhaustedError, logger } from '@fieldwork/shared';

const QUEUE_WARN_THRESHOLD = 5;
const SLOW_OP_THRESHOLD_MS = 5_000;

interface QueueEntry {
  resolve: () => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

export interface PoolGuardOptions {
  limit: number;
  /** 0 disables the timeout: borrowers wait until a slot frees. */
  queueTimeoutMs: number;
}

export interface PoolGuardStats {
  active: number;
  queued: number;
  limit: number;
  queueTimeoutMs: number;
  exhaustionCount: number;
}

export class PoolGuard {
  private queue: QueueEntry[] = [];
  private current = 0;
  private exhaustionCount = 0;

  constructor(private readonly options: PoolGuardOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`Pool limit must be a positive integer, got ${options.limit}`);
    }
  }

  async acquire(): Promise<void> {
    if (this.current < this.options.limit) {
      this.current++;
      return;
    }

    if (this.queue.length >= QUEUE_WARN_THRESHOLD) {
      logger.warn('[pool-guard] connection queue backing up', {
        queued: this.queue.length,
        active: this.current,
      });
    }

    const timeoutMs = this.options.queueTimeoutMs;
    return new Promise<void>((resolve, reject) => {
      const entry: QueueEntry = { resolve, reject };

      if (timeoutMs > 0) {
        entry.timer = setTimeout(() => {
          const idx = this.queue.indexOf(entry);
          if (idx >= 0) {
            this.queue.splice(idx, 1);
            this.exhaustionCount++;
            const err = new PoolExhaustedError(
              `[pool-guard] waited ${timeoutMs}ms for a connection ` +
                `(${this.current} active, ${this.queue.length} queued)`,
            );
            logger.error(err.message, { code: err.code });
            reject(err);
          }
          // Not in queue: release() already resolved this entry
        }, timeoutMs);
      }

      this.queue.push(entry);
    });
  }

  release(): void {
    if (this.current === 0) {
      throw new RangeError('[pool-guard] release() without a matching acquire()');
    }
    this.current--;
    const next = this.queue.shift();
    if (next) {
      this.current++;
      if (next.timer) clearTimeout(next.timer);
      next.resolve();
    }
  }

  /** Runs a one-off operation while holding a slot. */
  async run<T>(opName: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    const start = Date.now();
    try {
      return await fn();
    } finally {
      const duration = Date.now() - start;
      if (duration > SLOW_OP_THRESHOLD_MS) {
        logger.warn(`[pool-guard] slow DB op: ${opName}`, { durationMs: duration });
      }
      this.release();
    }
  }

  stats(): PoolGuardStats {
    return {
      active: this.current,
      queued: this.queue.length,
      limit: this.options.limit,
      queueTimeoutMs: this.options.queueTimeoutMs,
      exhaustionCount: this.exhaustionCount,
    };
  }
}
