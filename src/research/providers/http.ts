/**
 * HTTP helpers shared by the search providers and the page fetcher.
 */

import { PipelineError } from '../../pipeline/types';

export function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.trunc(value)));
}

export function safeString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface TimedFetchOptions extends RequestInit {
  readonly timeoutMs: number;
  /** Name used in error messages */
  readonly context: string;
}

/**
 * fetch with a timeout that maps transport failures and error statuses to
 * PROVIDER_UNAVAILABLE. 429 and 5xx are retryable; other 4xx are not.
 */
export async function timedFetch(url: string, options: TimedFetchOptions): Promise<Response> {
  const { timeoutMs, context, signal, ...init } = options;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener('abort', onAbort, { once: true });

  let res: Response;
  try {
    res = await fetch(url, { ...init, signal: controller.signal });
  } catch (error) {
    const reason = controller.signal.aborted && !signal?.aborted ? 'timed out' : describe(error);
    throw new PipelineError('PROVIDER_UNAVAILABLE', `${context} request failed: ${reason}`, {
      cause: error,
    });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }

  if (!res.ok) {
    const retryable = res.status === 429 || res.status >= 500;
    throw new PipelineError('PROVIDER_UNAVAILABLE', `${context} responded ${res.status}`, {
      retryable,
      status: res.status,
    });
  }
  return res;
}

/**
 * Reads a JSON body, mapping parse failures to MALFORMED_PAYLOAD.
 */
export async function readJson(res: Response, context: string): Promise<unknown> {
  const text = await res.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new PipelineError('MALFORMED_PAYLOAD', `${context} returned invalid JSON`, { cause: error });
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
