/**
 * Concurrency Primitives
 *
 * Shared-state helpers for the pipeline. Each is an explicit object owned
 * by whoever constructs it (collector, orchestrator, publisher); nothing here
 * is a module-level singleton.
 *
 * - KeyedMutex: one lock per key, no global lock
 * - DomainRateLimiter: minimum interval between requests to the same domain
 * - IdentityRotator: round-robin user agents per provider key
 * - createSemaphore: counting semaphore around an external dependency
 */

import pLimit, { type LimitFunction } from 'p-limit';

import { sleep as realSleep } from './retry';
import { systemClock, type Clock, type SleepFn } from './types';

// ============================================================================
// Counting Semaphore
// ============================================================================

/**
 * Counting semaphore with `concurrency` permits.
 *
 * @example
 * const limit = createSemaphore(2);
 * await Promise.all(urls.map((url) => limit(() => media.process(url))));
 */
export function createSemaphore(concurrency: number): LimitFunction {
  return pLimit(Math.max(1, Math.trunc(concurrency)));
}

// ============================================================================
// KeyedMutex
// ============================================================================

/**
 * Mutual exclusion per key. Work for different keys runs concurrently;
 * work for the same key runs one at a time in submission order.
 * Idle locks are dropped so the table does not grow without bound.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, LimitFunction>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = pLimit(1);
      this.locks.set(key, lock);
    }
    const current = lock;
    try {
      return await current(fn);
    } finally {
      if (current.activeCount === 0 && current.pendingCount === 0 && this.locks.get(key) === current) {
        this.locks.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work */
  get size(): number {
    return this.locks.size;
  }
}

// ============================================================================
// DomainRateLimiter
// ============================================================================

export interface DomainRateLimiterOptions {
  /** Minimum gap between two request starts on the same domain */
  readonly intervalMs: number;
  readonly clock?: Clock;
  readonly sleep?: SleepFn;
}

/**
 * Enforces a minimum interval between request starts per domain.
 *
 * The slot is reserved under the domain's lock, then the caller's request
 * runs outside it, so a slow response never holds other domains back and
 * concurrent callers on one domain are spaced by `intervalMs`.
 */
export class DomainRateLimiter {
  private readonly lastStart = new Map<string, number>();
  private readonly mutex = new KeyedMutex();
  private readonly intervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: SleepFn;

  constructor(options: DomainRateLimiterOptions) {
    this.intervalMs = Math.max(0, options.intervalMs);
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? realSleep;
  }

  async schedule<T>(domain: string, fn: () => Promise<T>): Promise<T> {
    const key = domain.toLowerCase();
    await this.mutex.runExclusive(key, async () => {
      const now = this.clock.now();
      const previous = this.lastStart.get(key);
      const startAt = previous === undefined ? now : Math.max(now, previous + this.intervalMs);
      this.lastStart.set(key, startAt);
      if (startAt > now) {
        await this.sleep(startAt - now);
      }
    });
    return fn();
  }
}

// ============================================================================
// IdentityRotator
// ============================================================================

/**
 * Round-robin over client identities (user-agent strings), tracked per key.
 * The index advances synchronously, so two callers never read the same slot.
 */
export class IdentityRotator {
  private readonly indexes = new Map<string, number>();

  constructor(private readonly identities: readonly string[]) {
    if (identities.length === 0) {
      throw new Error('IdentityRotator needs at least one identity');
    }
  }

  /** Current identity for `key` without advancing */
  current(key = 'default'): string {
    const index = this.indexes.get(key) ?? 0;
    return this.identities[index % this.identities.length];
  }

  /** Advance `key` to the next identity and return it */
  rotate(key = 'default'): string {
    const next = ((this.indexes.get(key) ?? 0) + 1) % this.identities.length;
    this.indexes.set(key, next);
    return this.identities[next];
  }
}
