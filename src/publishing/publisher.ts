/**
 * CMS Publisher
 *
 * Creates posts through a WordPress plugin endpoint:
 *
 *   POST {baseUrl}/wp-json/thirdparty/v1/create-post
 *   Authorization: Bearer <token>
 *   Idempotency-Key: <envelope.idempotencyKey>
 *
 * Response mapping:
 * - 200 { success: true, post_id } → post id
 * - 401 / 403 → PUBLISH_UNAUTHORIZED
 * - other 4xx, or success: false → PUBLISH_REJECTED
 * - 5xx / network failure / timeout → PUBLISH_UNAVAILABLE (retryable)
 */

import { createPrefixedLogger, type Logger } from '../utils/logger';
import { DRAFT_CONFIG, PUBLISH_CONFIG } from '../pipeline/config';
import { errorMessage, PipelineError, systemClock, type Clock, type PublishEnvelope } from '../pipeline/types';
import { isRecord, safeString } from '../research/providers/http';

export interface Publisher {
  /**
   * @returns the CMS post id
   * @throws PipelineError PUBLISH_REJECTED | PUBLISH_UNAUTHORIZED | PUBLISH_UNAVAILABLE
   */
  createPost(envelope: PublishEnvelope, signal?: AbortSignal): Promise<string>;
}

export interface CmsPublisherOptions {
  readonly baseUrl: string;
  readonly apiToken?: string;
  readonly timeoutMs?: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

/**
 * Request body sent to the CMS.
 */
export interface CreatePostBody {
  readonly title: string;
  readonly content: string;
  readonly excerpt: string;
  readonly status: 'publish' | 'future';
  readonly slug: string;
  readonly categories: readonly string[];
  readonly meta_title: string;
  readonly meta_description: string;
  readonly featured_image?: string;
  /** ISO 8601 publish time */
  readonly date: string;
}

export function toCreatePostBody(envelope: PublishEnvelope, now: number): CreatePostBody {
  return {
    title: envelope.title,
    content: envelope.html,
    excerpt: envelope.excerpt,
    status: envelope.scheduledAt > now ? 'future' : 'publish',
    slug: envelope.slug,
    categories: [envelope.categoryId],
    meta_title: envelope.metaTitle.slice(0, DRAFT_CONFIG.META_TITLE_MAX_LENGTH),
    meta_description: envelope.metaDescription.slice(0, DRAFT_CONFIG.META_DESCRIPTION_MAX_LENGTH),
    ...(envelope.featuredImage ? { featured_image: envelope.featuredImage } : {}),
    date: new Date(envelope.scheduledAt).toISOString(),
  };
}

function postIdOf(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const raw = body.post_id ?? body.id;
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  return safeString(raw);
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function describeBody(body: unknown): string {
  if (isRecord(body)) return safeString(body.message) ?? safeString(body.error) ?? JSON.stringify(body);
  return typeof body === 'string' ? body.slice(0, 200) : '';
}

export function createCmsPublisher(options: CmsPublisherOptions): Publisher {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}${PUBLISH_CONFIG.CREATE_POST_PATH}`;
  const timeoutMs = options.timeoutMs ?? PUBLISH_CONFIG.REQUEST_TIMEOUT_MS;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? createPrefixedLogger('[Publisher]');

  return {
    async createPost(envelope, signal) {
      const body = toCreatePostBody(envelope, clock.now());
      const headers: Record<string, string> = {
        'content-type': 'application/json',
        'idempotency-key': envelope.idempotencyKey,
      };
      if (options.apiToken) headers.authorization = `Bearer ${options.apiToken}`;

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      const onAbort = (): void => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      let res: Response;
      try {
        res = await fetch(endpoint, {
          method: 'POST',
          headers,
          body: JSON.stringify(body),
          signal: controller.signal,
        });
      } catch (error) {
        throw new PipelineError('PUBLISH_UNAVAILABLE', `CMS unreachable: ${errorMessage(error)}`, { cause: error });
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }

      const payload = await readBody(res);

      if (res.status === 401 || res.status === 403) {
        throw new PipelineError('PUBLISH_UNAUTHORIZED', `CMS refused credentials (${res.status})`, {
          status: res.status,
        });
      }
      if (res.status >= 500) {
        throw new PipelineError('PUBLISH_UNAVAILABLE', `CMS responded ${res.status}`, { status: res.status });
      }
      if (!res.ok) {
        throw new PipelineError('PUBLISH_REJECTED', `CMS rejected post (${res.status}): ${describeBody(payload)}`, {
          status: res.status,
        });
      }
      if (isRecord(payload) && payload.success === false) {
        throw new PipelineError('PUBLISH_REJECTED', `CMS rejected post: ${describeBody(payload)}`, {
          status: res.status,
        });
      }

      const postId = postIdOf(payload);
      if (!postId) {
        throw new PipelineError('PUBLISH_REJECTED', 'CMS response carried no post id', { status: res.status });
      }

      log.info(`Created post ${postId} (${body.status}) for "${envelope.title}"`);
      return postId;
    },
  };
}
