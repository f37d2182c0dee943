/**
 * Orchestrator
 *
 * Runs the fixed per-item stage graph:
 *
 *   {research, plan, images}  (concurrent fan-out)
 *            │ merge barrier
 *          draft → mutate → persist envelope → publish
 *
 * News items take the same graph: research searches news, the plan is the
 * bare category and the draft rephrases one of the headlines.
 *
 * Each stage attempt is stored as a StageResult. A stage that already has an
 * accepted result is reused, so resuming or retrying an item never repeats
 * finished work. Required stages (plan, draft, publish) fail the item when
 * they are exhausted; research and images degrade to empty collections.
 */

import { createHash, randomUUID } from 'node:crypto';

import { createStructuredLogger, type StructuredLogger } from '../utils/logger';
import { slugify, slugifyWithLimit } from '../utils/slug';
import type { CollectRequest } from '../research/collector';
import type { MediaBundle } from '../media/media-collector';
import { createFallbackPlan } from '../drafting/article-plan';
import type {
  DraftOutcome,
  DraftRequest,
  PlanOutcome,
  PlanRequest,
  RephraseRequest,
} from '../drafting/draft-generator';
import type { MutationInput, MutationResult } from '../content/content-mutator';
import { excerptOf } from '../content/markup-utils';
import type { Publisher } from '../publishing/publisher';
import type { WorkItemStore } from '../store/work-item-store';
import { KeyedMutex } from './concurrency';
import { DRAFT_CONFIG, NEWS_CONFIG, PUBLISH_CONFIG, RESEARCH_CONFIG, STAGE_RETRY_CONFIG } from './config';
import { sleep as realSleep, stageBackoffDelay } from './retry';
import { readStagePayload, type StagePayloads } from './stage-payloads';
import {
  errorMessage,
  isPipelineError,
  PipelineError,
  REQUIRED_STAGES,
  systemClock,
  WORK_ITEM_STATUSES,
  type CategoryOption,
  type Clock,
  type Draft,
  type PublishEnvelope,
  type RecordedError,
  type SleepFn,
  type Snippet,
  type StageName,
  type StageResult,
  type WorkItem,
  type WorkItemInput,
  type WorkItemStatus,
} from './types';

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorDeps {
  readonly store: WorkItemStore;
  readonly research: { collect(request: CollectRequest): Promise<Snippet[]> };
  readonly media: { collect(request: Omit<CollectRequest, 'maxResults'>): Promise<MediaBundle> };
  readonly drafts: {
    generatePlan(request: PlanRequest): Promise<PlanOutcome>;
    generateDraft(request: DraftRequest): Promise<DraftOutcome>;
    rephraseArticle(request: RephraseRequest): Promise<DraftOutcome>;
  };
  readonly mutator: { mutate(draft: Pick<Draft, 'title' | 'bodyHtml'>, input: MutationInput): MutationResult };
  /** Expected to be idempotent per envelope key (see IdempotentPublisher) */
  readonly publisher: Publisher;
  readonly clock?: Clock;
  readonly sleep?: SleepFn;
  readonly logger?: StructuredLogger;
  readonly generateId?: () => string;
}

export interface OrchestratorOptions {
  readonly maxStageAttempts?: number;
  readonly backoffUnitMs?: number;
  readonly backoffCeilingMs?: number;
  readonly researchMaxResults?: number;
  readonly defaultLanguage?: string;
  readonly defaultCountry?: string;
  readonly defaultCategories?: readonly CategoryOption[];
  /** Gap between publish times of news items submitted without one (default: 30 min) */
  readonly newsSpacingMs?: number;
}

export interface NewsCategoryRequest {
  /** Searched for headlines, e.g. 'business' */
  readonly name: string;
  /** Articles to write from the category's top headlines (default: 2) */
  readonly count?: number;
  /** CMS category the articles are filed under */
  readonly categoryId?: string;
}

export interface NewsSubmission {
  /** Default: one `business` category */
  readonly categories?: readonly NewsCategoryRequest[];
  readonly language?: string;
  readonly country?: string;
  readonly targetWordCount?: number;
  readonly dueAt?: number;
}

export interface ProcessOptions {
  /** Aborts in-flight external calls, e.g. on worker shutdown */
  readonly signal?: AbortSignal;
}

type StageOutcome<K extends StageName> =
  | { readonly ok: true; readonly payload: StagePayloads[K]; readonly reused: boolean }
  | { readonly ok: false; readonly error: RecordedError };

/** Statuses in pipeline order; `failed` is outside the order */
const STATUS_RANK: ReadonlyMap<WorkItemStatus, number> = new Map(
  WORK_ITEM_STATUSES.filter((s) => s !== 'failed').map((status, index): [WorkItemStatus, number] => [status, index])
);

// ============================================================================
// Helpers
// ============================================================================

/**
 * Deterministic publish key for one attempt of one work item.
 *
 * @example
 * idempotencyKeyFor('item-1', 1) === idempotencyKeyFor('item-1', 1) // true
 */
export function idempotencyKeyFor(workItemId: string, attempt: number): string {
  return createHash('sha256').update(`${workItemId}:${attempt}`).digest('hex');
}

export function toRecordedError(error: unknown, stage?: StageName): RecordedError {
  if (isPipelineError(error)) {
    return { code: error.code, message: error.message, retryable: error.retryable, ...(stage ? { stage } : {}) };
  }
  return { code: 'UNKNOWN', message: errorMessage(error), retryable: false, ...(stage ? { stage } : {}) };
}

function cancelledError(stage?: StageName): RecordedError {
  return {
    code: 'CANCELLED',
    message: 'work item was cancelled',
    retryable: false,
    ...(stage ? { stage } : {}),
  };
}

/**
 * The headline a news item rephrases. Research results are reused on
 * resume, so a missing headline cannot appear on a retry.
 */
function newsSource(item: WorkItem, snippets: readonly Snippet[]): Snippet {
  const source = snippets[item.newsRank];
  if (!source) {
    throw new PipelineError(
      'PROVIDER_UNAVAILABLE',
      `no news story at rank ${item.newsRank + 1} for "${item.topic}" (found ${snippets.length})`,
      { retryable: false }
    );
  }
  return source;
}

export function buildEnvelope(
  item: WorkItem,
  draft: Draft,
  mutated: StagePayloads['mutate'],
  media: StagePayloads['images']
): PublishEnvelope {
  const slug =
    slugifyWithLimit(draft.title, PUBLISH_CONFIG.SLUG_MAX_LENGTH) ||
    slugifyWithLimit(item.topic, PUBLISH_CONFIG.SLUG_MAX_LENGTH) ||
    slugify(item.id);
  const featured = media.images.find((image) => image.validated);

  return {
    title: draft.title,
    html: mutated.html,
    categoryId: draft.category.id,
    scheduledAt: item.scheduledAt,
    idempotencyKey: idempotencyKeyFor(item.id, item.attempt),
    slug,
    metaTitle: draft.title.slice(0, DRAFT_CONFIG.META_TITLE_MAX_LENGTH),
    metaDescription: draft.metaDescription,
    excerpt: excerptOf(mutated.html, PUBLISH_CONFIG.EXCERPT_MAX_LENGTH),
    ...(featured ? { featuredImage: featured.url } : {}),
  };
}

// ============================================================================
// Orchestrator
// ============================================================================

export class Orchestrator {
  private readonly clock: Clock;
  private readonly sleep: SleepFn;
  private readonly log: StructuredLogger;
  private readonly generateId: () => string;
  /** One in-flight run per item */
  private readonly running = new Map<string, Promise<WorkItem>>();
  /** Serializes news slot assignment so concurrent submits never share a slot */
  private readonly newsSlots = new KeyedMutex();

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? realSleep;
    this.log = deps.logger ?? createStructuredLogger('[Orchestrator]');
    this.generateId = deps.generateId ?? randomUUID;
  }

  // ==========================================================================
  // Public API
  // ==========================================================================

  async submit(input: WorkItemInput): Promise<string> {
    const topic = input.topic.trim();
    if (!topic) {
      throw new PipelineError('MALFORMED_PAYLOAD', 'topic must not be empty');
    }

    const newsRank = input.newsRank ?? 0;
    if (!Number.isInteger(newsRank) || newsRank < 0) {
      throw new PipelineError('MALFORMED_PAYLOAD', `newsRank must be a non-negative integer, got ${newsRank}`);
    }

    const now = this.clock.now();
    const dueAt = input.dueAt ?? now;
    const target = input.targetWordCount ?? DRAFT_CONFIG.DEFAULT_TARGET_WORD_COUNT;
    const mode = input.mode ?? 'keyword';
    const item: WorkItem = {
      id: this.generateId(),
      topic,
      language: input.language ?? this.options.defaultLanguage ?? 'en',
      country: input.country ?? this.options.defaultCountry ?? 'us',
      targetWordCount: Math.min(
        DRAFT_CONFIG.MAX_TARGET_WORD_COUNT,
        Math.max(DRAFT_CONFIG.MIN_TARGET_WORD_COUNT, Math.trunc(target))
      ),
      availableCategories: input.availableCategories ?? this.options.defaultCategories ?? [],
      backlinkCandidates: input.backlinkCandidates ?? [],
      createdAt: now,
      dueAt,
      scheduledAt: input.scheduledAt ?? dueAt,
      status: 'pending',
      mode,
      newsRank: mode === 'news' ? newsRank : 0,
      attempt: 1,
      cancelRequested: false,
      updatedAt: now,
    };

    if (mode === 'news' && input.scheduledAt === undefined) {
      await this.newsSlots.runExclusive('news', async () => {
        const latest = await this.deps.store.latestScheduledAt('news');
        const spacing = this.options.newsSpacingMs ?? NEWS_CONFIG.SCHEDULE_SPACING_MS;
        const scheduledAt = latest === undefined ? dueAt : Math.max(dueAt, latest + spacing);
        await this.deps.store.create({ ...item, scheduledAt });
      });
    } else {
      await this.deps.store.create(item);
    }
    this.log.structured('info', { event: 'item_submitted', workItemId: item.id, topic, mode, dueAt });
    return item.id;
  }

  /**
   * Queues news articles: `count` items per category, each rephrasing the
   * next of the category's top headlines. Items without an explicit
   * schedule publish `newsSpacingMs` apart.
   *
   * @returns Work item ids in submission order
   */
  async submitNews(submission: NewsSubmission = {}): Promise<string[]> {
    const categories: readonly NewsCategoryRequest[] =
      submission.categories ?? [{ name: NEWS_CONFIG.DEFAULT_CATEGORY }];
    const ids: string[] = [];

    for (const category of categories) {
      const name = category.name.trim();
      const count = Math.min(
        NEWS_CONFIG.MAX_ARTICLES_PER_CATEGORY,
        Math.max(1, Math.trunc(category.count ?? NEWS_CONFIG.DEFAULT_ARTICLES_PER_CATEGORY))
      );

      for (let rank = 0; rank < count; rank++) {
        ids.push(
          await this.submit({
            topic: name,
            mode: 'news',
            newsRank: rank,
            ...(category.categoryId ? { availableCategories: [{ id: category.categoryId, name }] } : {}),
            ...(submission.language ? { language: submission.language } : {}),
            ...(submission.country ? { country: submission.country } : {}),
            ...(submission.targetWordCount ? { targetWordCount: submission.targetWordCount } : {}),
            ...(submission.dueAt !== undefined ? { dueAt: submission.dueAt } : {}),
          })
        );
      }
    }
    return ids;
  }

  /**
   * @throws PipelineError NOT_FOUND
   */
  async status(id: string): Promise<WorkItem> {
    const item = await this.deps.store.get(id);
    if (!item) throw new PipelineError('NOT_FOUND', `work item ${id} not found`);
    return item;
  }

  async stageResults(id: string): Promise<StageResult[]> {
    await this.status(id);
    return this.deps.store.listStageResults(id);
  }

  /**
   * Runs or resumes the pipeline for one item and resolves with its final
   * state. Concurrent calls for the same item share one run.
   */
  process(id: string, options: ProcessOptions = {}): Promise<WorkItem> {
    const inFlight = this.running.get(id);
    if (inFlight) return inFlight;

    const run = this.run(id, options).finally(() => {
      this.running.delete(id);
    });
    this.running.set(id, run);
    return run;
  }

  /**
   * Requests cancellation. A running item stops at its next checkpoint;
   * an idle unfinished item fails right away.
   */
  async cancel(id: string): Promise<WorkItem> {
    const item = await this.status(id);
    if (item.status === 'published' || item.status === 'failed') return item;

    const flagged = await this.deps.store.update(id, { cancelRequested: true, updatedAt: this.clock.now() });
    this.log.structured('info', { event: 'cancel_requested', workItemId: id, status: flagged.status });

    if (!this.running.has(id)) {
      return this.fail(flagged, cancelledError());
    }
    return flagged;
  }

  /**
   * Explicit retry reset: failed → pending with attempt + 1.
   *
   * @throws PipelineError INVALID_TRANSITION when the item has not failed
   */
  async retry(id: string): Promise<WorkItem> {
    const item = await this.status(id);
    if (item.status !== 'failed') {
      throw new PipelineError('INVALID_TRANSITION', `cannot retry work item ${id} in status ${item.status}`);
    }
    const reset = await this.deps.store.update(id, {
      status: 'pending',
      attempt: item.attempt + 1,
      lastError: null,
      cancelRequested: false,
      updatedAt: this.clock.now(),
    });
    this.log.structured('info', { event: 'item_retry', workItemId: id, attempt: reset.attempt });
    return reset;
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private async run(id: string, options: ProcessOptions): Promise<WorkItem> {
    let item = await this.status(id);
    if (item.status === 'published' || item.status === 'failed') return item;
    if (item.cancelRequested) return this.fail(item, cancelledError());

    const signal = options.signal;
    const base = { topic: item.topic, language: item.language, country: item.country };
    const news = item.mode === 'news';
    const researchMaxResults = this.options.researchMaxResults ?? RESEARCH_CONFIG.MAX_RESULTS;

    // Fan-out
    item = await this.advance(item, 'researching');
    const [research, plan, images] = await Promise.all([
      this.runStage(item, 'research', async () => ({
        snippets: await this.deps.research.collect({
          ...base,
          maxResults: news ? Math.max(researchMaxResults, item.newsRank + 1) : researchMaxResults,
          ...(news ? { kind: 'news' as const } : {}),
          ...(signal ? { signal } : {}),
        }),
      })),
      // Invalid plan responses are retried inside generatePlan and count as generationAttempts, not StageResults
      this.runStage(item, 'plan', async () => {
        if (news) {
          const newsPlan = { ...createFallbackPlan(item.topic), category: item.topic };
          return { plan: newsPlan, generationAttempts: 0, degraded: false };
        }
        const outcome = await this.deps.drafts.generatePlan({
          topic: item.topic,
          language: item.language,
          categories: item.availableCategories,
          ...(signal ? { signal } : {}),
        });
        return { plan: outcome.plan, generationAttempts: outcome.attempts, degraded: outcome.degraded };
      }),
      this.runStage(item, 'images', async () => {
        const bundle = await this.deps.media.collect({ ...base, ...(signal ? { signal } : {}) });
        return { images: [...bundle.images], video: bundle.video };
      }),
    ]);

    // Merge barrier
    if (await this.isCancelled(id)) return this.fail(item, cancelledError());
    if (!plan.ok) return this.failStage(item, 'plan', plan.error);

    const snippets = research.ok ? research.payload.snippets : [];
    const media = images.ok ? images.payload : { images: [], video: null };
    if (!research.ok) this.logDegraded(item, 'research', research.error);
    if (!images.ok) this.logDegraded(item, 'images', images.error);

    // Draft
    item = await this.advance(item, 'drafting');
    const drafted = await this.runStage(item, 'draft', async () => {
      const outcome = news
        ? await this.deps.drafts.rephraseArticle({
            source: newsSource(item, snippets),
            categoryHint: item.topic,
            language: item.language,
            targetWordCount: item.targetWordCount,
            categories: item.availableCategories,
            ...(signal ? { signal } : {}),
          })
        : await this.deps.drafts.generateDraft({
            plan: plan.payload.plan,
            language: item.language,
            snippets,
            targetWordCount: item.targetWordCount,
            categories: item.availableCategories,
            ...(signal ? { signal } : {}),
          });
      return { draft: outcome.draft, expansionAttempts: outcome.expansionAttempts };
    });
    if (!drafted.ok) return this.failStage(item, 'draft', drafted.error);
    const draft = drafted.payload.draft;

    // Mutate (never fatal)
    item = await this.advance(item, 'mutating');
    const backlinkCandidates =
      item.backlinkCandidates.length > 0 ? item.backlinkCandidates : snippets.map((s) => s.url);
    const mutated = await this.runStage(item, 'mutate', async () =>
      this.deps.mutator.mutate(draft, {
        images: media.images,
        video: media.video,
        backlinkCandidates,
        language: item.language,
      })
    );
    if (!mutated.ok && mutated.error.code === 'CANCELLED') return this.fail(item, mutated.error);
    const body = mutated.ok ? mutated.payload : { html: draft.bodyHtml, wordCount: draft.wordCount };

    // Persist
    if (await this.isCancelled(id)) return this.fail(item, cancelledError('publish'));
    const envelope = buildEnvelope(item, draft, body, media);
    await this.deps.store.saveEnvelope(item.id, envelope);
    item = await this.advance(item, 'ready_to_publish');

    // Publish
    const published = await this.runStage(item, 'publish', async () => ({
      postId: await this.deps.publisher.createPost(envelope, signal),
      idempotencyKey: envelope.idempotencyKey,
    }));
    if (!published.ok) return this.failStage(item, 'publish', published.error);

    const done = await this.deps.store.update(item.id, {
      status: 'published',
      postId: published.payload.postId,
      lastError: null,
      updatedAt: this.clock.now(),
    });
    this.log.structured('info', {
      event: 'item_published',
      workItemId: done.id,
      postId: published.payload.postId,
      wordCount: body.wordCount,
    });
    return done;
  }

  /**
   * Runs one stage under the retry policy, recording every attempt.
   * Never throws: failures come back as `{ ok: false }`.
   */
  private async runStage<K extends StageName>(
    item: WorkItem,
    stage: K,
    execute: () => Promise<StagePayloads[K]>
  ): Promise<StageOutcome<K>> {
    const previous = await this.deps.store.listStageResults(item.id, stage);

    const accepted = [...previous].reverse().find((r) => r.accepted);
    if (accepted) {
      const payload = readStagePayload(stage, accepted.payload);
      if (payload) {
        this.log.structured('debug', { event: 'stage_reused', workItemId: item.id, stage, attempt: accepted.attempt });
        return { ok: true, payload, reused: true };
      }
      this.log.structured('warn', {
        event: 'stage_payload_invalid',
        workItemId: item.id,
        stage,
        message: 'stored payload failed validation, re-running stage',
      });
    }

    const maxAttempts = this.options.maxStageAttempts ?? STAGE_RETRY_CONFIG.MAX_ATTEMPTS;
    const unitMs = this.options.backoffUnitMs ?? STAGE_RETRY_CONFIG.BACKOFF_UNIT_MS;
    const ceilingMs = this.options.backoffCeilingMs ?? STAGE_RETRY_CONFIG.BACKOFF_CEILING_MS;
    let sequence = previous.reduce((max, r) => Math.max(max, r.attempt), 0);
    let lastError: RecordedError = cancelledError(stage);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (await this.isCancelled(item.id)) return { ok: false, error: cancelledError(stage) };

      sequence++;
      const startedAt = this.clock.now();
      let payload: StagePayloads[K];
      try {
        payload = await execute();
      } catch (error) {
        lastError = toRecordedError(error, stage);
        await this.record(item, stage, sequence, null, lastError);
        this.log.structured('warn', {
          event: 'stage_attempt_failed',
          workItemId: item.id,
          stage,
          attempt,
          maxAttempts,
          code: lastError.code,
          retryable: lastError.retryable,
          message: lastError.message,
        });

        if (!lastError.retryable || attempt === maxAttempts) break;

        const delay = stageBackoffDelay(attempt, unitMs, ceilingMs);
        this.log.structured('info', { event: 'stage_retry_scheduled', workItemId: item.id, stage, delayMs: delay });
        await this.sleep(delay);
        continue;
      }

      if (await this.isCancelled(item.id)) {
        const error = cancelledError(stage);
        await this.record(item, stage, sequence, payload, error);
        return { ok: false, error };
      }

      await this.record(item, stage, sequence, payload);
      this.log.structured('info', {
        event: 'stage_complete',
        workItemId: item.id,
        stage,
        attempt,
        durationMs: this.clock.now() - startedAt,
      });
      return { ok: true, payload, reused: false };
    }

    return { ok: false, error: lastError };
  }

  private async record(
    item: WorkItem,
    stage: StageName,
    attempt: number,
    payload: unknown,
    error?: RecordedError
  ): Promise<void> {
    await this.deps.store.appendStageResult({
      workItemId: item.id,
      stageName: stage,
      attempt,
      itemAttempt: item.attempt,
      payload,
      ...(error ? { error } : {}),
      accepted: !error,
      createdAt: this.clock.now(),
    });
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  /**
   * Moves the item forward to `target`. A no-op when the item is already
   * there or further along, so resumed runs never regress.
   */
  private async advance(item: WorkItem, target: WorkItemStatus): Promise<WorkItem> {
    const current = STATUS_RANK.get(item.status);
    const next = STATUS_RANK.get(target);
    if (current === undefined || next === undefined) {
      throw new PipelineError('INVALID_TRANSITION', `cannot move work item ${item.id} from ${item.status} to ${target}`);
    }
    if (current >= next) return item;

    const updated = await this.deps.store.update(item.id, { status: target, updatedAt: this.clock.now() });
    this.log.structured('info', { event: 'status_changed', workItemId: item.id, from: item.status, to: target });
    return updated;
  }

  private async failStage(item: WorkItem, stage: StageName, error: RecordedError): Promise<WorkItem> {
    if (REQUIRED_STAGES.has(stage)) {
      this.log.structured('error', {
        event: 'required_stage_failed',
        workItemId: item.id,
        stage,
        code: error.code,
        message: error.message,
      });
    }
    return this.fail(item, error);
  }

  private async fail(item: WorkItem, error: RecordedError): Promise<WorkItem> {
    const failed = await this.deps.store.update(item.id, {
      status: 'failed',
      lastError: error,
      updatedAt: this.clock.now(),
    });
    this.log.structured('error', {
      event: 'item_failed',
      workItemId: item.id,
      code: error.code,
      retryable: error.retryable,
      message: error.message,
    });
    return failed;
  }

  private logDegraded(item: WorkItem, stage: StageName, error: RecordedError): void {
    this.log.structured('warn', {
      event: 'stage_degraded',
      workItemId: item.id,
      stage,
      code: error.code,
      message: error.message,
    });
  }

  private async isCancelled(id: string): Promise<boolean> {
    const current = await this.deps.store.get(id);
    return current?.cancelRequested === true;
  }
}
