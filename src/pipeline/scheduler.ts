/**
 * Scheduler
 *
 * Periodically picks up due work items and hands them to the orchestrator.
 * Dispatch is at most once per dispatch key: the key is claimed with a
 * compare-and-set in the store before the item is processed, so two
 * schedulers (or two overlapping ticks) never run the same item twice.
 */

import { createStructuredLogger, type StructuredLogger } from '../utils/logger';
import type { WorkItemStore } from '../store/work-item-store';
import { SCHEDULER_CONFIG } from './config';
import { errorMessage, systemClock, type Clock, type WorkItem } from './types';
import type { Orchestrator } from './orchestrator';

export interface SchedulerDeps {
  readonly store: WorkItemStore;
  readonly orchestrator: Pick<Orchestrator, 'process' | 'retry'>;
  readonly clock?: Clock;
  readonly logger?: StructuredLogger;
}

export interface SchedulerOptions {
  readonly batchSize?: number;
  readonly staleAfterMs?: number;
  readonly maxItemAttempts?: number;
}

export interface TickReport {
  readonly dispatched: readonly string[];
  readonly skipped: readonly string[];
}

/**
 * Claim key for one dispatch: `id:attempt:dueAt` for pending items.
 * A failed item gets a retry key, and a stale in-progress item a resume key
 * derived from its last update, so each can be picked up once.
 *
 * @example
 * dispatchKeyFor({ id: 'a', attempt: 1, dueAt: 1000, status: 'pending', ... }) // 'a:1:1000'
 */
export function dispatchKeyFor(item: Pick<WorkItem, 'id' | 'attempt' | 'dueAt' | 'status' | 'updatedAt'>): string {
  const base = `${item.id}:${item.attempt}:${item.dueAt}`;
  if (item.status === 'pending') return base;
  if (item.status === 'failed') return `${base}:retry`;
  return `${base}:resume:${item.updatedAt}`;
}

export class Scheduler {
  private readonly clock: Clock;
  private readonly log: StructuredLogger;
  private readonly inFlight = new Set<Promise<void>>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions = {}
  ) {
    this.clock = deps.clock ?? systemClock;
    this.log = deps.logger ?? createStructuredLogger('[Scheduler]');
  }

  /**
   * Scans for due items and dispatches each one whose key could be claimed.
   * Dispatches run in the background; `idle()` waits for them.
   */
  async tick(now: number = this.clock.now()): Promise<TickReport> {
    const maxItemAttempts = this.options.maxItemAttempts ?? SCHEDULER_CONFIG.MAX_ITEM_ATTEMPTS;
    const due = await this.deps.store.findDue({
      now,
      staleBefore: now - (this.options.staleAfterMs ?? SCHEDULER_CONFIG.STALE_AFTER_MS),
      maxItemAttempts,
      limit: this.options.batchSize ?? SCHEDULER_CONFIG.BATCH_SIZE,
    });

    const dispatched: string[] = [];
    const skipped: string[] = [];

    for (const item of due) {
      const key = dispatchKeyFor(item);
      const claimed = await this.deps.store.claimDispatch(item.id, key);
      if (!claimed) {
        skipped.push(item.id);
        continue;
      }

      dispatched.push(item.id);
      this.log.structured('info', { event: 'dispatch', workItemId: item.id, status: item.status, dispatchKey: key });
      this.track(this.dispatch(item));
    }

    if (due.length > 0) {
      this.log.structured('debug', { event: 'tick', due: due.length, dispatched: dispatched.length });
    }
    return { dispatched, skipped };
  }

  /** Starts ticking every `intervalMs`; overlapping ticks are skipped */
  start(intervalMs: number = SCHEDULER_CONFIG.INTERVAL_MS): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.ticking) return;
      this.ticking = true;
      this.tick()
        .catch((error: unknown) => {
          this.log.structured('error', { event: 'tick_failed', message: errorMessage(error) });
        })
        .finally(() => {
          this.ticking = false;
        });
    }, intervalMs);
    this.log.structured('info', { event: 'scheduler_started', intervalMs });
  }

  /** Stops the timer and waits for in-flight dispatches */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.idle();
    this.log.structured('info', { event: 'scheduler_stopped' });
  }

  /** Resolves once every dispatch started so far has settled */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async dispatch(item: WorkItem): Promise<void> {
    if (item.status === 'failed') {
      await this.deps.orchestrator.retry(item.id);
    }
    const result = await this.deps.orchestrator.process(item.id);
    this.log.structured('info', {
      event: 'dispatch_complete',
      workItemId: item.id,
      status: result.status,
      ...(result.lastError ? { code: result.lastError.code } : {}),
    });
  }

  private track(task: Promise<void>): void {
    const settled = task
      .catch((error: unknown) => {
        this.log.structured('error', { event: 'dispatch_failed', message: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
  }
}
