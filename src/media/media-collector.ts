/**
 * Media Collector (Images stage)
 *
 * Finds candidate images and a video for a topic, runs each image through the
 * media service under a concurrency ceiling and keeps the first validated ones
 * in candidate order. Takes the topic only; never depends on research output.
 */

import type { LimitFunction } from 'p-limit';

import { createPrefixedLogger, type Logger } from '../utils/logger';
import { MEDIA_CONFIG } from '../pipeline/config';
import { createSemaphore } from '../pipeline/concurrency';
import { errorMessage, type MediaAsset } from '../pipeline/types';
import type { CollectRequest, ResearchCollector } from '../research/collector';
import type { MediaFetchService } from './media-fetch-service';
import { checkFetchableUrl, toMediaAsset } from './media-validator';

export interface MediaBundle {
  readonly images: readonly MediaAsset[];
  readonly video: MediaAsset | null;
}

export interface MediaCollectorDeps {
  readonly research: Pick<ResearchCollector, 'findImages' | 'findVideo'>;
  readonly mediaService: MediaFetchService;
  readonly logger?: Logger;
}

export interface MediaCollectorOptions {
  readonly trustedDomains: readonly string[];
  readonly maxImages?: number;
  /** Concurrent media-service calls across every collect() on this instance (default: 2) */
  readonly concurrency?: number;
}

export class MediaCollector {
  private readonly log: Logger;
  private readonly limit: LimitFunction;

  constructor(
    private readonly deps: MediaCollectorDeps,
    private readonly options: MediaCollectorOptions
  ) {
    this.log = deps.logger ?? createPrefixedLogger('[Media]');
    this.limit = createSemaphore(options.concurrency ?? MEDIA_CONFIG.CONCURRENCY);
  }

  async collect(request: Omit<CollectRequest, 'maxResults'>): Promise<MediaBundle> {
    const [images, video] = await Promise.all([this.collectImages(request), this.collectVideo(request)]);
    return { images, video };
  }

  private async collectImages(request: Omit<CollectRequest, 'maxResults'>): Promise<MediaAsset[]> {
    const maxImages = this.options.maxImages ?? MEDIA_CONFIG.MAX_IMAGES;
    if (maxImages === 0) return [];

    const candidates = await this.deps.research.findImages({
      ...request,
      maxResults: maxImages * MEDIA_CONFIG.CANDIDATE_MULTIPLIER,
    });

    const fetchable = candidates.filter((url) => {
      const check = checkFetchableUrl(url);
      if (!check.ok) this.log.debug(`Skipping candidate ${url}: ${check.reason}`);
      return check.ok;
    });

    const processed = await Promise.all(
      fetchable.map((url) =>
        this.limit(async (): Promise<MediaAsset | null> => {
          try {
            const processedUrl = await this.deps.mediaService.process(url, request.signal);
            const asset = toMediaAsset(
              processedUrl,
              'image',
              { trustedDomains: this.options.trustedDomains },
              { alt: request.topic, sourceUrl: url }
            );
            if (!asset.validated) {
              this.log.warn(`Processed image failed validation: ${processedUrl}`);
            }
            return asset;
          } catch (error) {
            this.log.warn(`Media processing failed for ${url}: ${errorMessage(error)}`);
            return null;
          }
        })
      )
    );

    const validated = processed.filter((asset): asset is MediaAsset => asset !== null && asset.validated);
    this.log.info(`Kept ${Math.min(validated.length, maxImages)} of ${candidates.length} image candidate(s)`);
    return validated.slice(0, maxImages);
  }

  private async collectVideo(request: Omit<CollectRequest, 'maxResults'>): Promise<MediaAsset | null> {
    const url = await this.deps.research.findVideo(request);
    if (!url) return null;
    return toMediaAsset(url, 'video', { trustedDomains: this.options.trustedDomains }, { alt: request.topic });
  }
}
