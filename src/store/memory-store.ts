import { PipelineError } from '../pipeline/types';
import type { PublishEnvelope, PublishRecord, StageName, StageResult, WorkItem, WorkItemMode } from '../pipeline/types';
import { applyPatch, isDispatchable, type DueQuery, type WorkItemPatch, type WorkItemStore } from './work-item-store';

/**
 * Process-local store. Used when no DATABASE_URL is configured and in tests.
 */
export class InMemoryWorkItemStore implements WorkItemStore {
  private readonly items = new Map<string, WorkItem>();
  private readonly results = new Map<string, StageResult[]>();
  private readonly envelopes = new Map<string, PublishEnvelope>();
  private readonly publications = new Map<string, PublishRecord>();

  async create(item: WorkItem): Promise<void> {
    if (this.items.has(item.id)) {
      throw new PipelineError('INVALID_TRANSITION', `work item ${item.id} already exists`);
    }
    this.items.set(item.id, item);
  }

  async get(id: string): Promise<WorkItem | undefined> {
    return this.items.get(id);
  }

  async update(id: string, patch: WorkItemPatch): Promise<WorkItem> {
    const current = this.items.get(id);
    if (!current) throw new PipelineError('NOT_FOUND', `work item ${id} not found`);
    const next = applyPatch(current, patch);
    this.items.set(id, next);
    return next;
  }

  async appendStageResult(result: StageResult): Promise<void> {
    const list = this.results.get(result.workItemId) ?? [];
    list.push(result);
    this.results.set(result.workItemId, list);
  }

  async listStageResults(workItemId: string, stageName?: StageName): Promise<StageResult[]> {
    const list = this.results.get(workItemId) ?? [];
    return stageName ? list.filter((r) => r.stageName === stageName) : [...list];
  }

  async findDue(query: DueQuery): Promise<WorkItem[]> {
    return [...this.items.values()]
      .filter((item) => isDispatchable(item, query))
      .sort((a, b) => a.dueAt - b.dueAt)
      .slice(0, query.limit);
  }

  async latestScheduledAt(mode: WorkItemMode): Promise<number | undefined> {
    let latest: number | undefined;
    for (const item of this.items.values()) {
      if (item.mode !== mode) continue;
      if (latest === undefined || item.scheduledAt > latest) latest = item.scheduledAt;
    }
    return latest;
  }

  async claimDispatch(id: string, dispatchKey: string): Promise<boolean> {
    const current = this.items.get(id);
    if (!current || current.dispatchKey === dispatchKey) return false;
    this.items.set(id, { ...current, dispatchKey });
    return true;
  }

  async saveEnvelope(workItemId: string, envelope: PublishEnvelope): Promise<void> {
    this.envelopes.set(workItemId, envelope);
  }

  async getEnvelope(workItemId: string): Promise<PublishEnvelope | undefined> {
    return this.envelopes.get(workItemId);
  }

  async findPublication(idempotencyKey: string): Promise<PublishRecord | undefined> {
    return this.publications.get(idempotencyKey);
  }

  async recordPublication(record: PublishRecord): Promise<void> {
    this.publications.set(record.idempotencyKey, record);
  }
}
