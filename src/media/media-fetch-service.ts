/**
 * Media Fetch Service client
 *
 * The media service downloads a source image, re-encodes and stores it, and
 * returns the URL it is served from. Contract:
 *
 *   POST {baseUrl}/process  { "image_url": "<source>" }
 *   200 { "processed_url": "<served url>" }
 *   415 / 422 → the source is not an image it can handle
 *   anything else → the download failed
 */

import { MEDIA_CONFIG } from '../pipeline/config';
import { PipelineError } from '../pipeline/types';
import { isRecord, safeString } from '../research/providers/http';

export interface MediaFetchService {
  /**
   * @throws PipelineError DOWNLOAD_FAILED | UNSUPPORTED_FORMAT
   */
  process(imageUrl: string, signal?: AbortSignal): Promise<string>;
}

export interface HttpMediaFetchServiceOptions {
  readonly baseUrl: string;
  readonly timeoutMs?: number;
}

export function createHttpMediaFetchService(options: HttpMediaFetchServiceOptions): MediaFetchService {
  const endpoint = `${options.baseUrl.replace(/\/+$/, '')}/process`;
  const timeoutMs = options.timeoutMs ?? MEDIA_CONFIG.REQUEST_TIMEOUT_MS;

  return {
    async process(imageUrl, signal) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      const onAbort = (): void => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        let res: Response;
        try {
          res = await fetch(endpoint, {
            method: 'POST',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify({ image_url: imageUrl }),
            signal: controller.signal,
          });
        } catch (error) {
          throw new PipelineError('DOWNLOAD_FAILED', `media service unreachable for ${imageUrl}`, {
            cause: error,
          });
        }

        if (res.status === 415 || res.status === 422) {
          throw new PipelineError('UNSUPPORTED_FORMAT', `media service cannot process ${imageUrl}`, {
            status: res.status,
          });
        }
        if (!res.ok) {
          throw new PipelineError('DOWNLOAD_FAILED', `media service responded ${res.status} for ${imageUrl}`, {
            status: res.status,
          });
        }

        const body: unknown = await res.json().catch((error: unknown) => {
          throw new PipelineError('DOWNLOAD_FAILED', 'media service returned invalid JSON', { cause: error });
        });
        const processed = isRecord(body) ? safeString(body.processed_url) : undefined;
        if (!processed) {
          throw new PipelineError('DOWNLOAD_FAILED', `media service returned no processed_url for ${imageUrl}`);
        }
        return processed;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }
    },
  };
}

/**
 * Used when no media service is deployed: the source URL is served as-is and
 * only passes if its host is on the trusted list.
 */
export const passthroughMediaFetchService: MediaFetchService = {
  async process(imageUrl) {
    return imageUrl;
  },
};
