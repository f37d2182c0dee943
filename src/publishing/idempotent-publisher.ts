import { createPrefixedLogger, type Logger } from '../utils/logger';
import { PUBLISH_CONFIG } from '../pipeline/config';
import { KeyedMutex } from '../pipeline/concurrency';
import { systemClock, type Clock, type PublishEnvelope } from '../pipeline/types';
import type { PublicationLedger } from '../store/work-item-store';
import type { Publisher } from './publisher';

export interface IdempotentPublisherDeps {
  readonly publisher: Publisher;
  readonly ledger: PublicationLedger;
  readonly clock?: Clock;
  readonly mutex?: KeyedMutex;
  readonly logger?: Logger;
}

/**
 * Publisher decorator that makes `createPost` idempotent per envelope key.
 *
 * Calls for the same key are serialized; a key recorded within the TTL returns
 * its post id without calling the CMS again.
 */
export class IdempotentPublisher implements Publisher {
  private readonly clock: Clock;
  private readonly mutex: KeyedMutex;
  private readonly log: Logger;

  constructor(
    private readonly deps: IdempotentPublisherDeps,
    private readonly ttlMs: number = PUBLISH_CONFIG.IDEMPOTENCY_TTL_MS
  ) {
    this.clock = deps.clock ?? systemClock;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.log = deps.logger ?? createPrefixedLogger('[Publisher]');
  }

  async createPost(envelope: PublishEnvelope, signal?: AbortSignal): Promise<string> {
    const key = envelope.idempotencyKey;
    return this.mutex.runExclusive(key, async () => {
      const existing = await this.deps.ledger.findPublication(key);
      if (existing && this.clock.now() - existing.createdAt < this.ttlMs) {
        this.log.info(`Idempotency key ${key.slice(0, 12)}… already published as post ${existing.postId}`);
        return existing.postId;
      }

      const postId = await this.deps.publisher.createPost(envelope, signal);
      await this.deps.ledger.recordPublication({ idempotencyKey: key, postId, createdAt: this.clock.now() });
      return postId;
    });
  }
}
