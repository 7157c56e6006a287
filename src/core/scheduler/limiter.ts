/**
 * @fileoverview Concurrency Limiter - bounds how many job bodies run at once.
 *
 * A FIFO counting semaphore. Each grant hands out a {@link Permit} that
 * returns its slot to the limiter that issued it, so a scheduler can swap in
 * a new limiter at runtime while jobs holding old permits finish normally.
 *
 * @module core/scheduler/limiter
 */

import { Logger } from '../logger';

const log = Logger.for('limiter');

/**
 * A granted slot. `release()` may be called any number of times; only the
 * first call frees the slot.
 */
export interface Permit {
  release(): void;
}

interface Waiter {
  grant: (permit: Permit) => void;
  detach: () => void;
}

/** Permit handed out when no limit is configured. */
const UNBOUNDED_PERMIT: Permit = { release: () => {} };

/**
 * FIFO counting semaphore with abortable acquisition.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(2);
 * const permit = await limiter.acquire(signal);
 * try {
 *   await work();
 * } finally {
 *   permit.release();
 * }
 * ```
 */
export class ConcurrencyLimiter {
  private held = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${max}`);
    }
  }

  /** Permits currently held */
  get active(): number {
    return this.held;
  }

  /** Acquisitions queued behind the limit */
  get waiting(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a free slot.
   *
   * If `signal` aborts while queued, the waiter leaves the queue and the
   * promise rejects with the signal's reason.
   */
  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.held < this.max) {
      this.held++;
      return Promise.resolve(this.createPermit());
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        log.debug('Queued acquisition aborted', { waiting: this.waiters.length });
        reject(signal?.reason);
      };

      const waiter: Waiter = {
        grant: resolve,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) {
          return;
        }
        released = true;
        this.handOff();
      },
    };
  }

  /**
   * Pass a freed slot to the oldest waiter, or return it to the pool.
   */
  private handOff(): void {
    const next = this.waiters.shift();
    if (next) {
      next.detach();
      next.grant(this.createPermit());
      return;
    }
    this.held--;
  }
}

/**
 * Build a limiter for `max`, or `undefined` (unbounded) when `max` is absent
 * or not positive.
 */
export function createLimiter(max: number | null | undefined): ConcurrencyLimiter | undefined {
  if (max === null || max === undefined || max <= 0) {
    return undefined;
  }
  return new ConcurrencyLimiter(max);
}

/**
 * Acquire from `limiter`, or get a no-op permit when there is none.
 *
 * Always settles asynchronously, so callers never start work in the same
 * tick they asked for a slot.
 */
export async function acquirePermit(limiter: ConcurrencyLimiter | undefined, signal: AbortSignal): Promise<Permit> {
  if (!limiter) {
    await Promise.resolve();
    signal.throwIfAborted();
    return UNBOUNDED_PERMIT;
  }
  return limiter.acquire(signal);
}
