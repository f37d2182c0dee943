/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures in provider calls, plus the
 * deterministic stage backoff used by the orchestrator.
 */

import { createPrefixedLogger } from '../utils/logger';
import { RETRY_CONFIG } from './config';
import { isPipelineError, PipelineError, type SleepFn } from './types';

export { RETRY_CONFIG } from './config';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Maximum number of retry attempts after the first call (default: 2) */
  readonly maxRetries?: number;
  /** Initial delay in ms before first retry (default: 1000) */
  readonly initialDelayMs?: number;
  /** Maximum delay in ms between retries (default: 10000) */
  readonly maxDelayMs?: number;
  /** Context for logging (e.g., "tavily search") */
  readonly context?: string;
  /** Custom function to determine if an error is retryable (default: isRetryableError) */
  readonly shouldRetry?: (error: unknown) => boolean;
  readonly signal?: AbortSignal;
  /** Sleep implementation (default: real timers) */
  readonly sleep?: SleepFn;
  /** Random source in [0, 1) used for jitter (default: Math.random) */
  readonly random?: () => number;
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Known transient error patterns for errors that are not PipelineErrors.
 */
const RETRYABLE_ERROR_PATTERNS = [
  // Rate limiting
  /rate.?limit/i,
  /too.?many.?requests/i,
  /429/,
  // Network issues
  /network/i,
  /fetch.*fail/i,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /ECONNREFUSED/,
  /socket.?hang.?up/i,
  // Server errors (5xx)
  /5\d{2}/,
  /internal.?server.?error/i,
  /service.?unavailable/i,
  /bad.?gateway/i,
  /overloaded/i,
  /temporarily/i,
];

/**
 * Determines if an error is likely transient and worth retrying.
 *
 * PipelineErrors carry their own classification; anything else is matched
 * against known transient patterns and HTTP status codes.
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  if (isPipelineError(error)) {
    return error.retryable;
  }

  const message = error instanceof Error ? error.message : String(error);

  for (const pattern of RETRYABLE_ERROR_PATTERNS) {
    if (pattern.test(message)) {
      return true;
    }
  }

  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    const status = error.status;
    return status === 429 || (status >= 500 && status < 600);
  }

  return false;
}

// ============================================================================
// Delay Calculation
// ============================================================================

/**
 * Delay before retry number `attempt` (0-based) for per-request retries:
 * initial * 2^attempt, capped, plus up to 25% of that delay as jitter.
 * The jitter is applied after the cap, so the upper bound is maxDelayMs * 1.25.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const exponentialDelay = initialDelayMs * Math.pow(RETRY_CONFIG.BACKOFF_MULTIPLIER, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  const jitter = cappedDelay * RETRY_CONFIG.JITTER_RATIO * random();
  return Math.round(cappedDelay + jitter);
}

/**
 * Deterministic stage backoff: 1 unit, then 2, 4, ... capped at the ceiling.
 *
 * @param failedAttempt - 1-based number of the attempt that just failed
 */
export function stageBackoffDelay(failedAttempt: number, unitMs: number, ceilingMs: number): number {
  const exponent = Math.max(0, failedAttempt - 1);
  return Math.min(unitMs * Math.pow(2, exponent), ceilingMs);
}

/**
 * Sleeps for the specified duration.
 *
 * @example
 * await sleep(1000); // Wait 1 second
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Retry Logic
// ============================================================================

/**
 * Executes an async function with retry logic and exponential backoff.
 *
 * Only retries on transient errors; anything `shouldRetry` rejects is
 * rethrown immediately.
 *
 * @throws The last error if all retries fail, or immediately for non-retryable errors
 *
 * @example
 * const hits = await withRetry(
 *   () => provider.search(query, options),
 *   { context: 'tavily search', maxRetries: 2 }
 * );
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = RETRY_CONFIG.MAX_RETRIES,
    initialDelayMs = RETRY_CONFIG.INITIAL_DELAY_MS,
    maxDelayMs = RETRY_CONFIG.MAX_DELAY_MS,
    context = 'operation',
    shouldRetry = isRetryableError,
    signal,
    sleep: sleepFn = sleep,
    random = Math.random,
  } = options;

  const log = createPrefixedLogger('[Retry]');
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) {
      throw new PipelineError('CANCELLED', `${context} was cancelled`);
    }

    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (signal?.aborted) {
        throw new PipelineError('CANCELLED', `${context} was cancelled`, { cause: error });
      }

      if (!shouldRetry(error)) {
        throw error;
      }

      if (attempt >= maxRetries) {
        log.warn(
          `${context} failed after ${maxRetries + 1} attempts: ${error instanceof Error ? error.message : String(error)}`
        );
        throw error;
      }

      const delay = calculateDelay(attempt, initialDelayMs, maxDelayMs, random);
      log.info(
        `${context} failed (attempt ${attempt + 1}/${maxRetries + 1}), ` +
          `retrying in ${delay}ms: ${error instanceof Error ? error.message : String(error)}`
      );
      await sleepFn(delay);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}
