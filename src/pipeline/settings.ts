/**
 * Deployment Settings
 *
 * Reads the environment into typed settings. Tuning defaults come from the
 * `*_CONFIG` objects; the environment only overrides them.
 */

import { z } from 'zod';

import {
  DRAFT_CONFIG,
  GENERATION_CONFIG,
  MEDIA_CONFIG,
  NEWS_CONFIG,
  PLAN_CONFIG,
  PUBLISH_CONFIG,
  RESEARCH_CONFIG,
  SCHEDULER_CONFIG,
  STAGE_RETRY_CONFIG,
} from './config';
import { PipelineError } from './types';

export const RESEARCH_PROVIDER_NAMES = ['tavily', 'exa', 'duckduckgo'] as const;
export type ResearchProviderName = (typeof RESEARCH_PROVIDER_NAMES)[number];

// ============================================================================
// Env Schema
// ============================================================================

/** `.env` files commonly leave variables present but empty */
const emptyToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const int = (fallback: number, min = 0) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().min(min).default(fallback));

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const optionalUrl = z.preprocess(emptyToUndefined, z.string().url().optional());

const csv = (fallback: readonly string[]) =>
  z.preprocess(
    emptyToUndefined,
    z
      .string()
      .default(fallback.join(','))
      .transform((value) =>
        value
          .split(',')
          .map((part) => part.trim().toLowerCase())
          .filter(Boolean)
      )
  );

const EnvSchema = z
  .object({
    OPENROUTER_API_KEY: optionalString,
    GENERATION_MODEL: z.preprocess(emptyToUndefined, z.string().default(GENERATION_CONFIG.DRAFT_MODEL)),
    GENERATION_PLAN_MODEL: z.preprocess(emptyToUndefined, z.string().default(GENERATION_CONFIG.PLAN_MODEL)),
    GENERATION_TEMPERATURE: z.preprocess(
      emptyToUndefined,
      z.coerce.number().min(0).max(2).default(GENERATION_CONFIG.TEMPERATURE)
    ),
    GENERATION_PLAN_MAX_TOKENS: int(GENERATION_CONFIG.PLAN_MAX_TOKENS, 1),
    GENERATION_DRAFT_MAX_TOKENS: int(GENERATION_CONFIG.DRAFT_MAX_TOKENS, 1),
    GENERATION_TIMEOUT_MS: int(GENERATION_CONFIG.TIMEOUT_MS, 1),
    GENERATION_CONCURRENCY: int(GENERATION_CONFIG.CONCURRENCY, 1),
    MAX_EXPANSION_ATTEMPTS: int(DRAFT_CONFIG.MAX_EXPANSION_ATTEMPTS),
    PLAN_MAX_ATTEMPTS: int(PLAN_CONFIG.MAX_ATTEMPTS, 1),

    TAVILY_API_KEY: optionalString,
    EXA_API_KEY: optionalString,
    RESEARCH_PROVIDERS: csv(RESEARCH_CONFIG.PROVIDER_ORDER).pipe(z.array(z.enum(RESEARCH_PROVIDER_NAMES)).min(1)),
    RESEARCH_CHAIN_ATTEMPTS: int(RESEARCH_CONFIG.CHAIN_ATTEMPTS, 1),
    RESEARCH_CHAIN_DELAY_MS: int(RESEARCH_CONFIG.CHAIN_DELAY_MS),
    RESEARCH_DOMAIN_INTERVAL_MS: int(RESEARCH_CONFIG.DOMAIN_INTERVAL_MS),
    RESEARCH_MAX_RESULTS: int(RESEARCH_CONFIG.MAX_RESULTS, 1),

    MEDIA_SERVICE_URL: optionalUrl,
    MEDIA_CONCURRENCY: int(MEDIA_CONFIG.CONCURRENCY, 1),
    MEDIA_TRUSTED_DOMAINS: csv([]),
    MEDIA_MAX_IMAGES: int(MEDIA_CONFIG.MAX_IMAGES),

    CMS_BASE_URL: optionalUrl,
    CMS_API_TOKEN: optionalString,
    PUBLISH_IDEMPOTENCY_TTL_MS: int(PUBLISH_CONFIG.IDEMPOTENCY_TTL_MS, 1),

    STAGE_MAX_ATTEMPTS: int(STAGE_RETRY_CONFIG.MAX_ATTEMPTS, 1),
    STAGE_BACKOFF_UNIT_MS: int(STAGE_RETRY_CONFIG.BACKOFF_UNIT_MS),
    STAGE_BACKOFF_CEILING_MS: int(STAGE_RETRY_CONFIG.BACKOFF_CEILING_MS),

    SCHEDULER_INTERVAL_MS: int(SCHEDULER_CONFIG.INTERVAL_MS, 1),
    SCHEDULER_BATCH_SIZE: int(SCHEDULER_CONFIG.BATCH_SIZE, 1),
    SCHEDULER_STALE_AFTER_MS: int(SCHEDULER_CONFIG.STALE_AFTER_MS, 1),
    MAX_ITEM_ATTEMPTS: int(SCHEDULER_CONFIG.MAX_ITEM_ATTEMPTS, 1),
    NEWS_SCHEDULE_SPACING_MS: int(NEWS_CONFIG.SCHEDULE_SPACING_MS),

    DATABASE_URL: optionalString,
  })
  .superRefine((env, ctx) => {
    if (env.STAGE_BACKOFF_UNIT_MS > env.STAGE_BACKOFF_CEILING_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STAGE_BACKOFF_UNIT_MS'],
        message: `must not exceed STAGE_BACKOFF_CEILING_MS (${env.STAGE_BACKOFF_CEILING_MS})`,
      });
    }
  });

// ============================================================================
// Settings
// ============================================================================

export interface PipelineSettings {
  readonly generation: {
    readonly apiKey?: string;
    readonly draftModel: string;
    readonly planModel: string;
    readonly temperature: number;
    readonly planMaxTokens: number;
    readonly draftMaxTokens: number;
    readonly timeoutMs: number;
    readonly concurrency: number;
    readonly maxExpansionAttempts: number;
    readonly maxPlanAttempts: number;
  };
  readonly research: {
    readonly providers: readonly ResearchProviderName[];
    readonly tavilyApiKey?: string;
    readonly exaApiKey?: string;
    readonly chainAttempts: number;
    readonly chainDelayMs: number;
    readonly domainIntervalMs: number;
    readonly maxResults: number;
  };
  readonly media: {
    readonly serviceUrl?: string;
    readonly concurrency: number;
    readonly trustedDomains: readonly string[];
    readonly maxImages: number;
  };
  readonly publish: {
    readonly cmsBaseUrl?: string;
    readonly cmsApiToken?: string;
    readonly idempotencyTtlMs: number;
  };
  readonly stage: {
    readonly maxAttempts: number;
    readonly backoffUnitMs: number;
    readonly backoffCeilingMs: number;
  };
  readonly scheduler: {
    readonly intervalMs: number;
    readonly batchSize: number;
    readonly staleAfterMs: number;
    readonly maxItemAttempts: number;
    /** Gap between publish times of news articles submitted without one */
    readonly newsSpacingMs: number;
  };
  readonly databaseUrl?: string;
}

/**
 * Parses settings from an environment map.
 *
 * @throws PipelineError CONFIG_ERROR naming every invalid variable
 *
 * @example
 * const settings = loadSettings(process.env);
 */
export function loadSettings(env: Readonly<Record<string, string | undefined>> = process.env): PipelineSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new PipelineError('CONFIG_ERROR', `Invalid configuration: ${details}`);
  }
  const e = parsed.data;

  return {
    generation: {
      apiKey: e.OPENROUTER_API_KEY,
      draftModel: e.GENERATION_MODEL,
      planModel: e.GENERATION_PLAN_MODEL,
      temperature: e.GENERATION_TEMPERATURE,
      planMaxTokens: e.GENERATION_PLAN_MAX_TOKENS,
      draftMaxTokens: e.GENERATION_DRAFT_MAX_TOKENS,
      timeoutMs: e.GENERATION_TIMEOUT_MS,
      concurrency: e.GENERATION_CONCURRENCY,
      maxExpansionAttempts: e.MAX_EXPANSION_ATTEMPTS,
      maxPlanAttempts: e.PLAN_MAX_ATTEMPTS,
    },
    research: {
      providers: e.RESEARCH_PROVIDERS,
      tavilyApiKey: e.TAVILY_API_KEY,
      exaApiKey: e.EXA_API_KEY,
      chainAttempts: e.RESEARCH_CHAIN_ATTEMPTS,
      chainDelayMs: e.RESEARCH_CHAIN_DELAY_MS,
      domainIntervalMs: e.RESEARCH_DOMAIN_INTERVAL_MS,
      maxResults: e.RESEARCH_MAX_RESULTS,
    },
    media: {
      serviceUrl: e.MEDIA_SERVICE_URL,
      concurrency: e.MEDIA_CONCURRENCY,
      trustedDomains: e.MEDIA_TRUSTED_DOMAINS,
      maxImages: e.MEDIA_MAX_IMAGES,
    },
    publish: {
      cmsBaseUrl: e.CMS_BASE_URL,
      cmsApiToken: e.CMS_API_TOKEN,
      idempotencyTtlMs: e.PUBLISH_IDEMPOTENCY_TTL_MS,
    },
    stage: {
      maxAttempts: e.STAGE_MAX_ATTEMPTS,
      backoffUnitMs: e.STAGE_BACKOFF_UNIT_MS,
      backoffCeilingMs: e.STAGE_BACKOFF_CEILING_MS,
    },
    scheduler: {
      intervalMs: e.SCHEDULER_INTERVAL_MS,
      batchSize: e.SCHEDULER_BATCH_SIZE,
      staleAfterMs: e.SCHEDULER_STALE_AFTER_MS,
      maxItemAttempts: e.MAX_ITEM_ATTEMPTS,
      newsSpacingMs: e.NEWS_SCHEDULE_SPACING_MS,
    },
    databaseUrl: e.DATABASE_URL,
  };
}
