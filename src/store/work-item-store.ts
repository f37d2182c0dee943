/**
 * Work Item Store
 *
 * Storage boundary owned by the orchestrator and scheduler: work items,
 * append-only stage results, persisted publish envelopes, the publish
 * idempotency ledger and dispatch claims.
 */

import type {
  PublishEnvelope,
  PublishRecord,
  RecordedError,
  StageName,
  StageResult,
  WorkItem,
  WorkItemMode,
  WorkItemStatus,
} from '../pipeline/types';

/**
 * Mutable fields of a work item. `lastError: null` clears the error.
 */
export interface WorkItemPatch {
  readonly status?: WorkItemStatus;
  readonly attempt?: number;
  readonly lastError?: RecordedError | null;
  readonly postId?: string;
  readonly cancelRequested?: boolean;
  readonly updatedAt: number;
}

export interface DueQuery {
  readonly now: number;
  /** In-progress items last updated before this instant are considered stale */
  readonly staleBefore: number;
  /** Failed items at or above this attempt are never picked up again */
  readonly maxItemAttempts: number;
  readonly limit: number;
}

export interface PublicationLedger {
  findPublication(idempotencyKey: string): Promise<PublishRecord | undefined>;
  recordPublication(record: PublishRecord): Promise<void>;
}

export interface WorkItemStore extends PublicationLedger {
  create(item: WorkItem): Promise<void>;
  get(id: string): Promise<WorkItem | undefined>;
  /**
   * @throws PipelineError NOT_FOUND
   */
  update(id: string, patch: WorkItemPatch): Promise<WorkItem>;

  appendStageResult(result: StageResult): Promise<void>;
  /** Results in insertion order, optionally for one stage */
  listStageResults(workItemId: string, stageName?: StageName): Promise<StageResult[]>;

  /** Due items in due order; see `isDispatchable` */
  findDue(query: DueQuery): Promise<WorkItem[]>;
  /** Latest `scheduledAt` among items of `mode`, or undefined when there are none */
  latestScheduledAt(mode: WorkItemMode): Promise<number | undefined>;
  /**
   * Compare-and-set on the dispatch key: succeeds only when the item's
   * current key differs from `dispatchKey`.
   */
  claimDispatch(id: string, dispatchKey: string): Promise<boolean>;

  saveEnvelope(workItemId: string, envelope: PublishEnvelope): Promise<void>;
  getEnvelope(workItemId: string): Promise<PublishEnvelope | undefined>;
}

// ============================================================================
// Shared predicates
// ============================================================================

export const IN_PROGRESS_STATUSES: ReadonlySet<WorkItemStatus> = new Set<WorkItemStatus>([
  'researching',
  'drafting',
  'mutating',
  'ready_to_publish',
]);

/**
 * Whether the scheduler should hand `item` to the orchestrator:
 * - pending and due
 * - failed with a retryable error, retries remaining, not cancelled
 * - in progress but not touched since `staleBefore` (crash resume)
 */
export function isDispatchable(item: WorkItem, query: Omit<DueQuery, 'limit'>): boolean {
  if (item.dueAt > query.now) return false;
  if (item.status === 'pending') return true;
  if (item.status === 'failed') {
    return (
      !item.cancelRequested &&
      item.lastError?.retryable === true &&
      item.attempt < query.maxItemAttempts
    );
  }
  return IN_PROGRESS_STATUSES.has(item.status) && item.updatedAt < query.staleBefore;
}

export function applyPatch(item: WorkItem, patch: WorkItemPatch): WorkItem {
  const { lastError, ...rest } = patch;
  const next: WorkItem = { ...item, ...rest };
  if (lastError === null) {
    const { lastError: _cleared, ...withoutError } = next;
    return withoutError;
  }
  return lastError ? { ...next, lastError } : next;
}
