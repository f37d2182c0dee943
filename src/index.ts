/**
 * Pipeline composition root.
 *
 * Wires settings into the concrete collaborators (providers, generation
 * client, mutator, publisher, store) and returns an orchestrator with its
 * scheduler. Tests and embedders pass overrides for any external boundary.
 */

import { createStructuredLogger } from './utils/logger';
import { createOpenRouterGenerationClient, withConcurrencyLimit, type GenerationClient } from './ai/generation-client';
import { ContentMutator } from './content/content-mutator';
import { DraftGenerator } from './drafting/draft-generator';
import { MediaCollector } from './media/media-collector';
import {
  createHttpMediaFetchService,
  passthroughMediaFetchService,
  type MediaFetchService,
} from './media/media-fetch-service';
import { DomainRateLimiter, IdentityRotator } from './pipeline/concurrency';
import { MEDIA_CONFIG, RESEARCH_CONFIG } from './pipeline/config';
import { Orchestrator } from './pipeline/orchestrator';
import { Scheduler } from './pipeline/scheduler';
import type { PipelineSettings, ResearchProviderName } from './pipeline/settings';
import { PipelineError, type Clock, type SleepFn } from './pipeline/types';
import { IdempotentPublisher } from './publishing/idempotent-publisher';
import { createCmsPublisher, type Publisher } from './publishing/publisher';
import { ResearchCollector } from './research/collector';
import { createDuckDuckGoProvider } from './research/providers/duckduckgo';
import { createExaProvider } from './research/providers/exa';
import { createTavilyProvider } from './research/providers/tavily';
import type { SearchProvider } from './research/providers/types';
import { extractDomain } from './research/url-utils';
import { createPostgresStore } from './store/knex-store';
import { InMemoryWorkItemStore } from './store/memory-store';
import type { WorkItemStore } from './store/work-item-store';

export interface PipelineOverrides {
  readonly store?: WorkItemStore;
  readonly generationClient?: GenerationClient;
  /** Raw CMS publisher; still wrapped for idempotency */
  readonly publisher?: Publisher;
  readonly mediaService?: MediaFetchService;
  readonly providers?: readonly SearchProvider[];
  readonly clock?: Clock;
  readonly sleep?: SleepFn;
}

export interface Pipeline {
  readonly orchestrator: Orchestrator;
  readonly scheduler: Scheduler;
  readonly store: WorkItemStore;
  /** Stops the scheduler, waits for running items and releases the store */
  close(): Promise<void>;
}

function createProvider(name: ResearchProviderName, settings: PipelineSettings): SearchProvider {
  switch (name) {
    case 'tavily':
      return createTavilyProvider({ apiKey: settings.research.tavilyApiKey });
    case 'exa':
      return createExaProvider({ apiKey: settings.research.exaApiKey });
    case 'duckduckgo':
      return createDuckDuckGoProvider();
  }
}

/**
 * Builds a ready-to-run pipeline.
 *
 * @throws PipelineError CONFIG_ERROR when no CMS endpoint is configured and no publisher is given
 *
 * @example
 * const settings = loadSettings();
 * const pipeline = await createPipeline(settings);
 * const id = await pipeline.orchestrator.submit({ topic: 'Home espresso basics' });
 * pipeline.scheduler.start(settings.scheduler.intervalMs);
 */
export async function createPipeline(
  settings: PipelineSettings,
  overrides: PipelineOverrides = {}
): Promise<Pipeline> {
  const log = createStructuredLogger('[Pipeline]');

  let store: WorkItemStore;
  let releaseStore = async (): Promise<void> => {};
  if (overrides.store) {
    store = overrides.store;
  } else if (settings.databaseUrl) {
    const knexStore = await createPostgresStore(settings.databaseUrl);
    store = knexStore;
    releaseStore = () => knexStore.destroy();
  } else {
    store = new InMemoryWorkItemStore();
  }

  const research = new ResearchCollector(
    {
      providers: overrides.providers ?? settings.research.providers.map((name) => createProvider(name, settings)),
      rateLimiter: new DomainRateLimiter({
        intervalMs: settings.research.domainIntervalMs,
        ...(overrides.clock ? { clock: overrides.clock } : {}),
        ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
      }),
      identities: new IdentityRotator(RESEARCH_CONFIG.USER_AGENTS),
      ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
    },
    {
      chainAttempts: settings.research.chainAttempts,
      chainDelayMs: settings.research.chainDelayMs,
    }
  );

  const media = new MediaCollector(
    {
      research,
      mediaService:
        overrides.mediaService ??
        (settings.media.serviceUrl
          ? createHttpMediaFetchService({ baseUrl: settings.media.serviceUrl })
          : passthroughMediaFetchService),
    },
    {
      trustedDomains: settings.media.trustedDomains,
      maxImages: settings.media.maxImages,
      concurrency: settings.media.concurrency,
    }
  );

  const client = withConcurrencyLimit(
    overrides.generationClient ??
      createOpenRouterGenerationClient({
        apiKey: settings.generation.apiKey,
        defaultModel: settings.generation.draftModel,
        timeoutMs: settings.generation.timeoutMs,
      }),
    settings.generation.concurrency
  );

  const drafts = new DraftGenerator(
    { client },
    {
      planModel: settings.generation.planModel,
      draftModel: settings.generation.draftModel,
      temperature: settings.generation.temperature,
      planMaxTokens: settings.generation.planMaxTokens,
      draftMaxTokens: settings.generation.draftMaxTokens,
      maxPlanAttempts: settings.generation.maxPlanAttempts,
      maxExpansionAttempts: settings.generation.maxExpansionAttempts,
    }
  );

  const cmsBaseUrl = settings.publish.cmsBaseUrl;
  let rawPublisher: Publisher;
  if (overrides.publisher) {
    rawPublisher = overrides.publisher;
  } else if (cmsBaseUrl) {
    rawPublisher = createCmsPublisher({
      baseUrl: cmsBaseUrl,
      apiToken: settings.publish.cmsApiToken,
      ...(overrides.clock ? { clock: overrides.clock } : {}),
    });
  } else {
    throw new PipelineError('CONFIG_ERROR', 'CMS_BASE_URL is required to publish');
  }

  const mutator = new ContentMutator(
    {},
    {
      ...(cmsBaseUrl ? { siteHost: extractDomain(cmsBaseUrl) } : {}),
      trustedVideoHosts: MEDIA_CONFIG.TRUSTED_VIDEO_HOSTS,
    }
  );

  const orchestrator = new Orchestrator(
    {
      store,
      research,
      media,
      drafts,
      mutator,
      publisher: new IdempotentPublisher(
        {
          publisher: rawPublisher,
          ledger: store,
          ...(overrides.clock ? { clock: overrides.clock } : {}),
        },
        settings.publish.idempotencyTtlMs
      ),
      ...(overrides.clock ? { clock: overrides.clock } : {}),
      ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
    },
    {
      maxStageAttempts: settings.stage.maxAttempts,
      backoffUnitMs: settings.stage.backoffUnitMs,
      backoffCeilingMs: settings.stage.backoffCeilingMs,
      researchMaxResults: settings.research.maxResults,
      newsSpacingMs: settings.scheduler.newsSpacingMs,
    }
  );

  const scheduler = new Scheduler(
    { store, orchestrator, ...(overrides.clock ? { clock: overrides.clock } : {}) },
    {
      batchSize: settings.scheduler.batchSize,
      staleAfterMs: settings.scheduler.staleAfterMs,
      maxItemAttempts: settings.scheduler.maxItemAttempts,
    }
  );

  log.structured('info', {
    event: 'pipeline_ready',
    providers: settings.research.providers.join(','),
    store: overrides.store ? 'custom' : settings.databaseUrl ? 'postgres' : 'memory',
  });

  return {
    orchestrator,
    scheduler,
    store,
    async close() {
      await scheduler.stop();
      await releaseStore();
    },
  };
}

export { loadSettings } from './pipeline/settings';
export type { PipelineSettings } from './pipeline/settings';
export { Orchestrator } from './pipeline/orchestrator';
export { Scheduler } from './pipeline/scheduler';
export { PipelineError, isPipelineError } from './pipeline/types';
export type {
  WorkItem,
  WorkItemInput,
  WorkItemMode,
  WorkItemStatus,
  StageResult,
  PublishEnvelope,
} from './pipeline/types';
export type { NewsCategoryRequest, NewsSubmission } from './pipeline/orchestrator';
export { InMemoryWorkItemStore } from './store/memory-store';
export { KnexWorkItemStore, createPostgresStore } from './store/knex-store';
