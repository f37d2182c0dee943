/**
 * Stage Payload Schemas
 *
 * Stage results are stored as loosely typed JSON. Everything read back from
 * the store is re-validated here before a later stage or a resumed run uses it.
 */

import { z } from 'zod';

import { ArticlePlanSchema } from '../drafting/article-plan';
import { PIPELINE_ERROR_CODES, STAGE_NAMES, type StageName } from './types';

// ============================================================================
// Entity Schemas
// ============================================================================

export const CategoryOptionSchema = z.object({
  id: z.string(),
  name: z.string(),
});

const RECORDED_ERROR_CODES = [...PIPELINE_ERROR_CODES, 'UNKNOWN'] as const;

export const RecordedErrorSchema = z.object({
  code: z.enum(RECORDED_ERROR_CODES),
  message: z.string(),
  retryable: z.boolean(),
  stage: z.enum(STAGE_NAMES).optional(),
});

export const SnippetSchema = z.object({
  url: z.string(),
  domain: z.string(),
  title: z.string(),
  content: z.string(),
  provider: z.string(),
});

export const MediaAssetSchema = z.object({
  url: z.string(),
  kind: z.enum(['image', 'video']),
  validated: z.boolean(),
  alt: z.string().optional(),
  sourceUrl: z.string().optional(),
});

export const DraftSchema = z.object({
  title: z.string(),
  bodyHtml: z.string(),
  category: CategoryOptionSchema,
  metaDescription: z.string(),
  wordCount: z.number().int().nonnegative(),
});

export const PublishEnvelopeSchema = z.object({
  title: z.string(),
  html: z.string(),
  categoryId: z.string(),
  scheduledAt: z.number(),
  idempotencyKey: z.string(),
  slug: z.string(),
  metaTitle: z.string(),
  metaDescription: z.string(),
  excerpt: z.string(),
  featuredImage: z.string().optional(),
});

// ============================================================================
// Stage Payloads
// ============================================================================

export const ResearchPayloadSchema = z.object({
  snippets: z.array(SnippetSchema),
});

export const PlanPayloadSchema = z.object({
  plan: ArticlePlanSchema,
  /** Generation calls made by the accepted run */
  generationAttempts: z.number().int().nonnegative(),
  degraded: z.boolean(),
});

export const ImagesPayloadSchema = z.object({
  images: z.array(MediaAssetSchema),
  video: MediaAssetSchema.nullable(),
});

export const DraftPayloadSchema = z.object({
  draft: DraftSchema,
  expansionAttempts: z.number().int().nonnegative(),
});

export const MutatePayloadSchema = z.object({
  html: z.string(),
  wordCount: z.number().int().nonnegative(),
});

export const PublishPayloadSchema = z.object({
  postId: z.string(),
  idempotencyKey: z.string(),
});

export const STAGE_PAYLOAD_SCHEMAS = {
  research: ResearchPayloadSchema,
  plan: PlanPayloadSchema,
  images: ImagesPayloadSchema,
  draft: DraftPayloadSchema,
  mutate: MutatePayloadSchema,
  publish: PublishPayloadSchema,
} as const satisfies Record<StageName, z.ZodTypeAny>;

export type StagePayloads = {
  [K in StageName]: z.infer<(typeof STAGE_PAYLOAD_SCHEMAS)[K]>;
};

/**
 * Validates a stored payload for `stage`.
 *
 * @returns the typed payload, or null when it no longer matches the schema
 */
export function readStagePayload<K extends StageName>(stage: K, payload: unknown): StagePayloads[K] | null {
  const schemas: { [S in StageName]: z.ZodType<StagePayloads[S], z.ZodTypeDef, unknown> } = STAGE_PAYLOAD_SCHEMAS;
  const parsed = schemas[stage].safeParse(payload);
  return parsed.success ? parsed.data : null;
}
