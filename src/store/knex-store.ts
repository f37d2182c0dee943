/**
 * Knex-backed Work Item Store
 *
 * Postgres in production (DATABASE_URL); the same queries run against SQLite
 * in tests. Rows are validated with zod on the way out: bigint columns may
 * come back as strings and booleans as 0/1 depending on the driver.
 */

import knexFactory, { type Knex } from 'knex';
import { z } from 'zod';

import { CategoryOptionSchema, PublishEnvelopeSchema, RecordedErrorSchema } from '../pipeline/stage-payloads';
import { PipelineError, WORK_ITEM_MODES, WORK_ITEM_STATUSES, STAGE_NAMES } from '../pipeline/types';
import type { PublishEnvelope, PublishRecord, StageName, StageResult, WorkItem, WorkItemMode } from '../pipeline/types';
import { ensureSchema, TABLES } from './schema';
import {
  applyPatch,
  IN_PROGRESS_STATUSES,
  type DueQuery,
  type WorkItemPatch,
  type WorkItemStore,
} from './work-item-store';

// ============================================================================
// Row Schemas
// ============================================================================

const millis = z.union([z.number(), z.string()]).transform((value) => Number(value));
const flag = z.union([z.boolean(), z.number()]).transform((value) => value === true || value === 1);

const WorkItemRowSchema = z.object({
  id: z.string(),
  topic: z.string(),
  language: z.string(),
  country: z.string(),
  target_word_count: z.coerce.number(),
  available_categories: z.string(),
  backlink_candidates: z.string(),
  created_at: millis,
  due_at: millis,
  scheduled_at: millis,
  status: z.enum(WORK_ITEM_STATUSES),
  mode: z.enum(WORK_ITEM_MODES),
  news_rank: z.coerce.number(),
  attempt: z.coerce.number(),
  last_error: z.string().nullable(),
  post_id: z.string().nullable(),
  cancel_requested: flag,
  dispatch_key: z.string().nullable(),
  updated_at: millis,
});

const StageResultRowSchema = z.object({
  work_item_id: z.string(),
  stage_name: z.enum(STAGE_NAMES),
  attempt: z.coerce.number(),
  item_attempt: z.coerce.number(),
  payload: z.string().nullable(),
  error: z.string().nullable(),
  accepted: flag,
  created_at: millis,
});

const PublishRecordRowSchema = z.object({
  idempotency_key: z.string(),
  post_id: z.string(),
  created_at: millis,
});

function parseJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, column: string): T {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new PipelineError('MALFORMED_PAYLOAD', `column ${column} holds invalid JSON`, { cause: error });
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new PipelineError('MALFORMED_PAYLOAD', `column ${column}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toWorkItem(raw: unknown): WorkItem {
  const row = WorkItemRowSchema.parse(raw);
  return {
    id: row.id,
    topic: row.topic,
    language: row.language,
    country: row.country,
    targetWordCount: row.target_word_count,
    availableCategories: parseJson(row.available_categories, z.array(CategoryOptionSchema), 'available_categories'),
    backlinkCandidates: parseJson(row.backlink_candidates, z.array(z.string()), 'backlink_candidates'),
    createdAt: row.created_at,
    dueAt: row.due_at,
    scheduledAt: row.scheduled_at,
    status: row.status,
    mode: row.mode,
    newsRank: row.news_rank,
    attempt: row.attempt,
    ...(row.last_error ? { lastError: parseJson(row.last_error, RecordedErrorSchema, 'last_error') } : {}),
    ...(row.post_id ? { postId: row.post_id } : {}),
    cancelRequested: row.cancel_requested,
    ...(row.dispatch_key ? { dispatchKey: row.dispatch_key } : {}),
    updatedAt: row.updated_at,
  };
}

function toWorkItemRow(item: WorkItem): Record<string, string | number | boolean | null> {
  return {
    id: item.id,
    topic: item.topic,
    language: item.language,
    country: item.country,
    target_word_count: item.targetWordCount,
    available_categories: JSON.stringify(item.availableCategories),
    backlink_candidates: JSON.stringify(item.backlinkCandidates),
    created_at: item.createdAt,
    due_at: item.dueAt,
    scheduled_at: item.scheduledAt,
    status: item.status,
    mode: item.mode,
    news_rank: item.newsRank,
    attempt: item.attempt,
    last_error: item.lastError ? JSON.stringify(item.lastError) : null,
    last_error_retryable: item.lastError?.retryable === true,
    post_id: item.postId ?? null,
    cancel_requested: item.cancelRequested,
    dispatch_key: item.dispatchKey ?? null,
    updated_at: item.updatedAt,
  };
}

function toStageResult(raw: unknown): StageResult {
  const row = StageResultRowSchema.parse(raw);
  return {
    workItemId: row.work_item_id,
    stageName: row.stage_name,
    attempt: row.attempt,
    itemAttempt: row.item_attempt,
    payload: row.payload === null ? null : parseJson(row.payload, z.unknown(), 'payload'),
    ...(row.error ? { error: parseJson(row.error, RecordedErrorSchema, 'error') } : {}),
    accepted: row.accepted,
    createdAt: row.created_at,
  };
}

// ============================================================================
// Store
// ============================================================================

export class KnexWorkItemStore implements WorkItemStore {
  constructor(private readonly knex: Knex) {}

  /** Creates missing tables; call once before first use */
  async init(): Promise<void> {
    await ensureSchema(this.knex);
  }

  async destroy(): Promise<void> {
    await this.knex.destroy();
  }

  async create(item: WorkItem): Promise<void> {
    await this.knex(TABLES.WORK_ITEMS).insert(toWorkItemRow(item));
  }

  async get(id: string): Promise<WorkItem | undefined> {
    const row: unknown = await this.knex(TABLES.WORK_ITEMS).where({ id }).first();
    return row ? toWorkItem(row) : undefined;
  }

  async update(id: string, patch: WorkItemPatch): Promise<WorkItem> {
    const current = await this.get(id);
    if (!current) throw new PipelineError('NOT_FOUND', `work item ${id} not found`);

    const next = applyPatch(current, patch);
    const { id: _id, dispatch_key: _dispatchKey, ...fields } = toWorkItemRow(next);
    await this.knex(TABLES.WORK_ITEMS).where({ id }).update(fields);
    return next;
  }

  async appendStageResult(result: StageResult): Promise<void> {
    await this.knex(TABLES.STAGE_RESULTS).insert({
      work_item_id: result.workItemId,
      stage_name: result.stageName,
      attempt: result.attempt,
      item_attempt: result.itemAttempt,
      payload: result.payload === undefined ? null : JSON.stringify(result.payload),
      error: result.error ? JSON.stringify(result.error) : null,
      accepted: result.accepted,
      created_at: result.createdAt,
    });
  }

  async listStageResults(workItemId: string, stageName?: StageName): Promise<StageResult[]> {
    const query = this.knex(TABLES.STAGE_RESULTS).where({ work_item_id: workItemId });
    if (stageName) query.andWhere({ stage_name: stageName });
    const rows: unknown[] = await query.orderBy('id', 'asc');
    return rows.map(toStageResult);
  }

  /** Same predicate as `isDispatchable`, evaluated in SQL */
  async findDue(query: DueQuery): Promise<WorkItem[]> {
    const rows: unknown[] = await this.knex(TABLES.WORK_ITEMS)
      .where('due_at', '<=', query.now)
      .andWhere((due) => {
        due
          .where('status', 'pending')
          .orWhere((failed) => {
            failed
              .where('status', 'failed')
              .andWhere('cancel_requested', false)
              .andWhere('last_error_retryable', true)
              .andWhere('attempt', '<', query.maxItemAttempts);
          })
          .orWhere((stale) => {
            stale.whereIn('status', [...IN_PROGRESS_STATUSES]).andWhere('updated_at', '<', query.staleBefore);
          });
      })
      .orderBy('due_at', 'asc')
      .limit(query.limit);
    return rows.map(toWorkItem);
  }

  async latestScheduledAt(mode: WorkItemMode): Promise<number | undefined> {
    const row: unknown = await this.knex(TABLES.WORK_ITEMS)
      .where({ mode })
      .max({ latest: 'scheduled_at' })
      .first();
    const { latest } = z.object({ latest: millis.nullable() }).parse(row ?? { latest: null });
    return latest ?? undefined;
  }

  async claimDispatch(id: string, dispatchKey: string): Promise<boolean> {
    const updated: unknown = await this.knex(TABLES.WORK_ITEMS)
      .where({ id })
      .andWhere((builder) => {
        builder.whereNull('dispatch_key').orWhereNot('dispatch_key', dispatchKey);
      })
      .update({ dispatch_key: dispatchKey });
    return Number(updated) > 0;
  }

  async saveEnvelope(workItemId: string, envelope: PublishEnvelope): Promise<void> {
    await this.knex(TABLES.PUBLISH_ENVELOPES)
      .insert({ work_item_id: workItemId, envelope: JSON.stringify(envelope) })
      .onConflict('work_item_id')
      .merge();
  }

  async getEnvelope(workItemId: string): Promise<PublishEnvelope | undefined> {
    const row: unknown = await this.knex(TABLES.PUBLISH_ENVELOPES).where({ work_item_id: workItemId }).first();
    if (!row) return undefined;
    const { envelope } = z.object({ envelope: z.string() }).parse(row);
    return parseJson(envelope, PublishEnvelopeSchema, 'envelope');
  }

  async findPublication(idempotencyKey: string): Promise<PublishRecord | undefined> {
    const raw: unknown = await this.knex(TABLES.PUBLISH_RECORDS).where({ idempotency_key: idempotencyKey }).first();
    if (!raw) return undefined;
    const row = PublishRecordRowSchema.parse(raw);
    return { idempotencyKey: row.idempotency_key, postId: row.post_id, createdAt: row.created_at };
  }

  async recordPublication(record: PublishRecord): Promise<void> {
    await this.knex(TABLES.PUBLISH_RECORDS)
      .insert({
        idempotency_key: record.idempotencyKey,
        post_id: record.postId,
        created_at: record.createdAt,
      })
      .onConflict('idempotency_key')
      .merge();
  }
}

/**
 * Connects to Postgres and ensures the schema exists.
 */
export async function createPostgresStore(databaseUrl: string): Promise<KnexWorkItemStore> {
  const store = new KnexWorkItemStore(
    knexFactory({
      client: 'pg',
      connection: databaseUrl,
      pool: { min: 0, max: 10 },
    })
  );
  await store.init();
  return store;
}
