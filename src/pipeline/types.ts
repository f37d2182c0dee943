/**
 * Pipeline Types
 *
 * Shared types for the topic-to-article pipeline: work items, stage results,
 * drafts, media, publish envelopes, the error taxonomy and the injectable clock.
 */

// ============================================================================
// Status & Stage Constants
// ============================================================================

/**
 * Work item statuses in pipeline order. `failed` sits outside the order:
 * any non-terminal status may move to it.
 */
export const WORK_ITEM_STATUSES = [
  'pending',
  'researching',
  'drafting',
  'mutating',
  'ready_to_publish',
  'published',
  'failed',
] as const;

export type WorkItemStatus = (typeof WORK_ITEM_STATUSES)[number];

/**
 * Stages of the per-item graph.
 * research/plan/images fan out together; the rest run in sequence.
 */
/**
 * How an item finds its material:
 * - keyword: research the topic, plan, then write
 * - news: rephrase the `newsRank`-th news headline found for the topic
 */
export const WORK_ITEM_MODES = ['keyword', 'news'] as const;

export type WorkItemMode = (typeof WORK_ITEM_MODES)[number];

export const STAGE_NAMES = ['research', 'plan', 'images', 'draft', 'mutate', 'publish'] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Stages whose terminal failure fails the whole work item. */
export const REQUIRED_STAGES: ReadonlySet<StageName> = new Set(['plan', 'draft', 'publish']);

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error codes for pipeline failures.
 */
export const PIPELINE_ERROR_CODES = [
  'GENERATION_RATE_LIMITED',
  'GENERATION_TIMEOUT',
  'GENERATION_INVALID_RESPONSE',
  'INVALID_PLAN_STRUCTURE',
  'PROVIDER_UNAVAILABLE',
  'MALFORMED_PAYLOAD',
  'DOWNLOAD_FAILED',
  'UNSUPPORTED_FORMAT',
  'PUBLISH_REJECTED',
  'PUBLISH_UNAUTHORIZED',
  'PUBLISH_UNAVAILABLE',
  'CANCELLED',
  'CONFIG_ERROR',
  'NOT_FOUND',
  'INVALID_TRANSITION',
] as const;

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[number];

/**
 * Codes that describe transient conditions. Retry policies consult
 * `PipelineError.retryable`, which defaults from this set.
 */
const TRANSIENT_CODES: ReadonlySet<PipelineErrorCode> = new Set<PipelineErrorCode>([
  'GENERATION_RATE_LIMITED',
  'GENERATION_TIMEOUT',
  'GENERATION_INVALID_RESPONSE',
  'PROVIDER_UNAVAILABLE',
  'DOWNLOAD_FAILED',
  'PUBLISH_UNAVAILABLE',
]);

export interface PipelineErrorOptions {
  /** Overrides the per-code default */
  readonly retryable?: boolean;
  readonly cause?: unknown;
  /** HTTP status of the failing response, when there was one */
  readonly status?: number;
}

/**
 * Custom error class for every failure the pipeline reasons about.
 *
 * @example
 * try {
 *   await publisher.createPost(envelope);
 * } catch (error) {
 *   if (isPipelineError(error) && error.code === 'PUBLISH_REJECTED') {
 *     // terminal, do not retry
 *   }
 * }
 */
export class PipelineError extends Error {
  readonly name = 'PipelineError';
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.retryable = options.retryable ?? TRANSIENT_CODES.has(code);
    if (options.status !== undefined) {
      this.status = options.status;
    }
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Work Items
// ============================================================================

/**
 * A category the CMS knows about. The plan picks one by name,
 * the envelope carries its id.
 */
export interface CategoryOption {
  readonly id: string;
  readonly name: string;
}

/**
 * Error recorded on a work item or stage result for operator visibility.
 */
export interface RecordedError {
  readonly code: PipelineErrorCode | 'UNKNOWN';
  readonly message: string;
  readonly retryable: boolean;
  readonly stage?: StageName;
}

export interface WorkItem {
  readonly id: string;
  readonly topic: string;
  readonly language: string;
  readonly country: string;
  readonly targetWordCount: number;
  readonly availableCategories: readonly CategoryOption[];
  /** URLs offered for backlink insertion; research URLs are used when empty */
  readonly backlinkCandidates: readonly string[];
  readonly createdAt: number;
  readonly dueAt: number;
  /** Publish time handed to the CMS */
  readonly scheduledAt: number;
  readonly status: WorkItemStatus;
  readonly mode: WorkItemMode;
  /** Index into the news headlines for the topic; 0 in keyword mode */
  readonly newsRank: number;
  /** Starts at 1; incremented by each explicit retry reset */
  readonly attempt: number;
  readonly lastError?: RecordedError;
  readonly postId?: string;
  readonly cancelRequested: boolean;
  /** Last claimed dispatch key, `${id}:${attempt}:${dueAt}` */
  readonly dispatchKey?: string;
  readonly updatedAt: number;
}

/**
 * Caller input for `Orchestrator.submit`.
 */
export interface WorkItemInput {
  readonly topic: string;
  readonly language?: string;
  readonly country?: string;
  readonly targetWordCount?: number;
  readonly availableCategories?: readonly CategoryOption[];
  readonly backlinkCandidates?: readonly string[];
  readonly dueAt?: number;
  readonly scheduledAt?: number;
  /** Default: keyword */
  readonly mode?: WorkItemMode;
  readonly newsRank?: number;
}

// ============================================================================
// Stage Results
// ============================================================================

export interface StageResult {
  readonly workItemId: string;
  readonly stageName: StageName;
  /** 1-based, strictly increasing per (workItemId, stageName) */
  readonly attempt: number;
  /** WorkItem.attempt at the time the stage ran */
  readonly itemAttempt: number;
  readonly payload: unknown;
  readonly error?: RecordedError;
  readonly accepted: boolean;
  readonly createdAt: number;
}

// ============================================================================
// Research, Drafts & Media
// ============================================================================

export interface Snippet {
  readonly url: string;
  /** Registrable domain, the dedup key */
  readonly domain: string;
  readonly title: string;
  readonly content: string;
  readonly provider: string;
}

export interface Draft {
  readonly title: string;
  readonly bodyHtml: string;
  readonly category: CategoryOption;
  readonly metaDescription: string;
  /** Always recomputed from visible text */
  readonly wordCount: number;
}

export type MediaKind = 'image' | 'video';

export interface MediaAsset {
  readonly url: string;
  readonly kind: MediaKind;
  readonly validated: boolean;
  readonly alt?: string;
  /** Original URL before processing by the media service */
  readonly sourceUrl?: string;
}

export interface PublishEnvelope {
  readonly title: string;
  readonly html: string;
  readonly categoryId: string;
  readonly scheduledAt: number;
  readonly idempotencyKey: string;
  readonly slug: string;
  readonly metaTitle: string;
  readonly metaDescription: string;
  readonly excerpt: string;
  readonly featuredImage?: string;
}

export interface PublishRecord {
  readonly idempotencyKey: string;
  readonly postId: string;
  readonly createdAt: number;
}

// ============================================================================
// Clock Abstraction (for testability)
// ============================================================================

/**
 * Clock interface for time-dependent operations.
 *
 * @example
 * const mockClock: Clock = { now: () => 1234567890000 };
 */
export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Creates a mock clock for testing with a fixed or advancing time.
 *
 * @param autoAdvance - If provided, advances time by this many ms on each call
 *
 * @example
 * const clock = createMockClock(1000000, 100);
 * clock.now(); // 1000000
 * clock.now(); // 1000100
 */
export function createMockClock(initialTime: number, autoAdvance?: number): Clock {
  let currentTime = initialTime;
  return {
    now: () => {
      const time = currentTime;
      if (autoAdvance !== undefined) {
        currentTime += autoAdvance;
      }
      return time;
    },
  };
}

/**
 * Sleep function signature, injected so tests never wait on real timers.
 */
export type SleepFn = (ms: number) => Promise<void>;
