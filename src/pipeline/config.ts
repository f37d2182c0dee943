/**
 * Pipeline Configuration
 *
 * Centralized defaults for every stage, retry loop and mutation rule.
 * Deployment-specific overrides come from the environment (see settings.ts);
 * the values here are the fallbacks and are validated once at module load.
 */

// ============================================================================
// Configuration Validation
// ============================================================================

/**
 * Configuration validation error.
 * Thrown at module load time if configuration is inconsistent.
 */
export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(`Pipeline config error: ${message}`);
    this.name = 'ConfigValidationError';
  }
}

function validateMinMax(minValue: number, maxValue: number, minName: string, maxName: string): void {
  if (minValue > maxValue) {
    throw new ConfigValidationError(
      `${minName} (${minValue}) cannot be greater than ${maxName} (${maxValue})`
    );
  }
}

function validatePositive(value: number, name: string): void {
  if (value <= 0) {
    throw new ConfigValidationError(`${name} must be positive (got ${value})`);
  }
}

function validateNonNegative(value: number, name: string): void {
  if (value < 0) {
    throw new ConfigValidationError(`${name} cannot be negative (got ${value})`);
  }
}

function validateTemperature(value: number, name: string): void {
  if (value < 0 || value > 2) {
    throw new ConfigValidationError(`${name} must be between 0 and 2 (got ${value})`);
  }
}

// ============================================================================
// Stage Retry
// ============================================================================

/**
 * Per-stage retry policy used by the orchestrator.
 * Delay before attempt k+1 is min(UNIT * 2^(k-1), CEILING).
 */
export const STAGE_RETRY_CONFIG = {
  MAX_ATTEMPTS: 3,
  BACKOFF_UNIT_MS: 1000,
  BACKOFF_CEILING_MS: 30_000,
} as const;

/**
 * Per-request retry used around individual provider calls.
 */
export const RETRY_CONFIG = {
  MAX_RETRIES: 2,
  INITIAL_DELAY_MS: 1000,
  MAX_DELAY_MS: 10_000,
  BACKOFF_MULTIPLIER: 2,
  /** Jitter adds up to this fraction of the current delay */
  JITTER_RATIO: 0.25,
} as const;

// ============================================================================
// Generation
// ============================================================================

export const GENERATION_CONFIG = {
  DRAFT_MODEL: 'openai/gpt-4o-mini',
  PLAN_MODEL: 'openai/gpt-4o-mini',
  TEMPERATURE: 0.7,
  PLAN_MAX_TOKENS: 4000,
  DRAFT_MAX_TOKENS: 8000,
  TIMEOUT_MS: 120_000,
  /** Counting semaphore width around the generation service */
  CONCURRENCY: 4,
} as const;

export const PLAN_CONFIG = {
  /** R: generation calls before falling back to the minimal plan */
  MAX_ATTEMPTS: 3,
  FALLBACK_CATEGORY: 'General',
} as const;

export const DRAFT_CONFIG = {
  DEFAULT_TARGET_WORD_COUNT: 1500,
  MIN_TARGET_WORD_COUNT: 200,
  MAX_TARGET_WORD_COUNT: 10_000,
  MAX_EXPANSION_ATTEMPTS: 2,
  /** Research snippets included in the draft prompt */
  MAX_CONTEXT_SNIPPETS: 8,
  MAX_SNIPPET_PROMPT_CHARS: 1200,
  META_DESCRIPTION_MAX_LENGTH: 160,
  META_TITLE_MAX_LENGTH: 60,
  SELECTED_CATEGORY_PREFIX: 'SELECTED_CATEGORY:',
  /** Rephrased news articles answer as `TITLE: ...` then `CONTENT: ...` */
  REPHRASE_TITLE_PREFIX: 'TITLE:',
  REPHRASE_CONTENT_PREFIX: 'CONTENT:',
} as const;

export const NEWS_CONFIG = {
  DEFAULT_CATEGORY: 'business',
  DEFAULT_ARTICLES_PER_CATEGORY: 2,
  MAX_ARTICLES_PER_CATEGORY: 10,
  /** Gap between the publish times of consecutive news articles */
  SCHEDULE_SPACING_MS: 30 * 60 * 1000,
} as const;

export const CATEGORY_CONFIG = {
  SENTINEL_NAME: 'Uncategorized',
  SENTINEL_DEFAULT_ID: '1',
} as const;

// ============================================================================
// Research
// ============================================================================

export const RESEARCH_CONFIG = {
  PROVIDER_ORDER: ['tavily', 'exa', 'duckduckgo'],
  /** M: whole-chain attempts */
  CHAIN_ATTEMPTS: 2,
  CHAIN_DELAY_MS: 10_000,
  DOMAIN_INTERVAL_MS: 1000,
  MAX_RESULTS: 15,
  PROVIDER_TIMEOUT_MS: 15_000,
  PAGE_TIMEOUT_MS: 10_000,
  MAX_SNIPPET_CHARS: 4000,
  MIN_PARAGRAPH_CHARS: 40,
  USER_AGENTS: [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15',
    'Mozilla/5.0 (X11; Linux x86_64; rv:127.0) Gecko/20100101 Firefox/127.0',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:127.0) Gecko/20100101 Firefox/127.0',
  ],
} as const;

/**
 * Sites that never make useful research sources. Matched on registrable domain.
 */
export const BLOCKED_DOMAINS: readonly string[] = [
  'youtube.com',
  'youtu.be',
  'facebook.com',
  'twitter.com',
  'x.com',
  'instagram.com',
  'linkedin.com',
  'tiktok.com',
  'pinterest.com',
  'reddit.com',
  'quora.com',
  'amazon.com',
  'ebay.com',
  'aliexpress.com',
  'walmart.com',
  'wikipedia.org',
  'wikimedia.org',
];

export const BLOCKED_EXTENSIONS: readonly string[] = [
  '.pdf',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  '.ppt',
  '.pptx',
  '.zip',
];

// ============================================================================
// Media
// ============================================================================

export const MEDIA_CONFIG = {
  MAX_IMAGES: 2,
  /** Candidates requested per kept image */
  CANDIDATE_MULTIPLIER: 3,
  CONCURRENCY: 2,
  REQUEST_TIMEOUT_MS: 30_000,
  ALLOWED_IMAGE_EXTENSIONS: ['.jpg', '.jpeg', '.png', '.webp', '.gif'],
  TRUSTED_VIDEO_HOSTS: ['youtube.com', 'youtu.be', 'youtube-nocookie.com', 'vimeo.com'],
} as const;

// ============================================================================
// Content Mutation
// ============================================================================

export const MUTATION_CONFIG = {
  FIRST_IMAGE_PLACEMENT: 'top',
  SECOND_IMAGE_HEADING_INDEX: 12,
  VIDEO_HEADING_INDEX: 16,
  MIN_EXTERNAL_LINKS: 1,
  MAX_BACKLINKS: 3,
  BACKLINK_PARAGRAPH_INTERVAL: 5,
  CONTAINER_CLASS: 'content-container',
  IMAGE_CLASS: 'blog-image',
  VIDEO_CLASS: 'video-container',
  EXTERNAL_REL_TOKENS: ['nofollow', 'noopener', 'noreferrer'],
} as const;

// ============================================================================
// Publishing & Scheduling
// ============================================================================

export const PUBLISH_CONFIG = {
  IDEMPOTENCY_TTL_MS: 7 * 24 * 60 * 60 * 1000,
  REQUEST_TIMEOUT_MS: 30_000,
  CREATE_POST_PATH: '/wp-json/thirdparty/v1/create-post',
  EXCERPT_MAX_LENGTH: 300,
  SLUG_MAX_LENGTH: 80,
} as const;

export const SCHEDULER_CONFIG = {
  INTERVAL_MS: 60_000,
  BATCH_SIZE: 10,
  STALE_AFTER_MS: 30 * 60 * 1000,
  MAX_ITEM_ATTEMPTS: 3,
} as const;

// ============================================================================
// Validation (runs at module load)
// ============================================================================

/**
 * Validates all configuration values at module load time.
 * Throws ConfigValidationError if any values are inconsistent.
 */
function validateConfiguration(): void {
  validatePositive(STAGE_RETRY_CONFIG.MAX_ATTEMPTS, 'STAGE_RETRY_CONFIG.MAX_ATTEMPTS');
  validateNonNegative(STAGE_RETRY_CONFIG.BACKOFF_UNIT_MS, 'STAGE_RETRY_CONFIG.BACKOFF_UNIT_MS');
  validateMinMax(
    STAGE_RETRY_CONFIG.BACKOFF_UNIT_MS,
    STAGE_RETRY_CONFIG.BACKOFF_CEILING_MS,
    'STAGE_RETRY_CONFIG.BACKOFF_UNIT_MS',
    'STAGE_RETRY_CONFIG.BACKOFF_CEILING_MS'
  );

  validateNonNegative(RETRY_CONFIG.MAX_RETRIES, 'RETRY_CONFIG.MAX_RETRIES');

  validateMinMax(
    NEWS_CONFIG.DEFAULT_ARTICLES_PER_CATEGORY,
    NEWS_CONFIG.MAX_ARTICLES_PER_CATEGORY,
    'NEWS_CONFIG.DEFAULT_ARTICLES_PER_CATEGORY',
    'NEWS_CONFIG.MAX_ARTICLES_PER_CATEGORY'
  );
  validateNonNegative(NEWS_CONFIG.SCHEDULE_SPACING_MS, 'NEWS_CONFIG.SCHEDULE_SPACING_MS');
  validateMinMax(
    RETRY_CONFIG.INITIAL_DELAY_MS,
    RETRY_CONFIG.MAX_DELAY_MS,
    'RETRY_CONFIG.INITIAL_DELAY_MS',
    'RETRY_CONFIG.MAX_DELAY_MS'
  );
  if (RETRY_CONFIG.JITTER_RATIO < 0 || RETRY_CONFIG.JITTER_RATIO > 1) {
    throw new ConfigValidationError(
      `RETRY_CONFIG.JITTER_RATIO must be between 0 and 1 (got ${RETRY_CONFIG.JITTER_RATIO})`
    );
  }

  validateTemperature(GENERATION_CONFIG.TEMPERATURE, 'GENERATION_CONFIG.TEMPERATURE');
  validatePositive(GENERATION_CONFIG.CONCURRENCY, 'GENERATION_CONFIG.CONCURRENCY');
  validatePositive(PLAN_CONFIG.MAX_ATTEMPTS, 'PLAN_CONFIG.MAX_ATTEMPTS');
  validateNonNegative(DRAFT_CONFIG.MAX_EXPANSION_ATTEMPTS, 'DRAFT_CONFIG.MAX_EXPANSION_ATTEMPTS');
  validateMinMax(
    DRAFT_CONFIG.MIN_TARGET_WORD_COUNT,
    DRAFT_CONFIG.MAX_TARGET_WORD_COUNT,
    'DRAFT_CONFIG.MIN_TARGET_WORD_COUNT',
    'DRAFT_CONFIG.MAX_TARGET_WORD_COUNT'
  );
  validateMinMax(
    DRAFT_CONFIG.MIN_TARGET_WORD_COUNT,
    DRAFT_CONFIG.DEFAULT_TARGET_WORD_COUNT,
    'DRAFT_CONFIG.MIN_TARGET_WORD_COUNT',
    'DRAFT_CONFIG.DEFAULT_TARGET_WORD_COUNT'
  );

  validatePositive(RESEARCH_CONFIG.CHAIN_ATTEMPTS, 'RESEARCH_CONFIG.CHAIN_ATTEMPTS');
  validatePositive(RESEARCH_CONFIG.USER_AGENTS.length, 'RESEARCH_CONFIG.USER_AGENTS.length');
  validatePositive(RESEARCH_CONFIG.MAX_RESULTS, 'RESEARCH_CONFIG.MAX_RESULTS');

  validatePositive(MEDIA_CONFIG.CONCURRENCY, 'MEDIA_CONFIG.CONCURRENCY');
  validateNonNegative(MEDIA_CONFIG.MAX_IMAGES, 'MEDIA_CONFIG.MAX_IMAGES');

  validatePositive(MUTATION_CONFIG.BACKLINK_PARAGRAPH_INTERVAL, 'MUTATION_CONFIG.BACKLINK_PARAGRAPH_INTERVAL');
  validatePositive(MUTATION_CONFIG.SECOND_IMAGE_HEADING_INDEX, 'MUTATION_CONFIG.SECOND_IMAGE_HEADING_INDEX');
  validatePositive(MUTATION_CONFIG.VIDEO_HEADING_INDEX, 'MUTATION_CONFIG.VIDEO_HEADING_INDEX');

  validatePositive(PUBLISH_CONFIG.IDEMPOTENCY_TTL_MS, 'PUBLISH_CONFIG.IDEMPOTENCY_TTL_MS');
  validatePositive(SCHEDULER_CONFIG.INTERVAL_MS, 'SCHEDULER_CONFIG.INTERVAL_MS');
  validatePositive(SCHEDULER_CONFIG.MAX_ITEM_ATTEMPTS, 'SCHEDULER_CONFIG.MAX_ITEM_ATTEMPTS');
}

validateConfiguration();
