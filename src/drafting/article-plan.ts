import { z } from 'zod';

import { PLAN_CONFIG } from '../pipeline/config';
import { stripCodeFences } from '../content/markup-utils';

// ============================================================================
// Raw Plan Schema (model output)
// ============================================================================

export const TableOfContentsEntrySchema = z.object({
  heading: z.string().min(1),
  subheadings: z.array(z.string()).optional(),
});

export const PlanHeadingSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
});

/**
 * Plan as the model returns it (snake_case JSON).
 * Every field except meta_description and image_prompts is required; a
 * response that fails this schema is retried, never patched.
 */
export const RawArticlePlanSchema = z.object({
  title: z.string().min(1),
  category: z.string().min(1),
  table_of_contents: z.array(TableOfContentsEntrySchema),
  headings: z.array(PlanHeadingSchema).min(1),
  meta_description: z.string().optional(),
  image_prompts: z.array(z.string()).optional(),
});

export type RawArticlePlan = z.infer<typeof RawArticlePlanSchema>;

// ============================================================================
// Normalized Plan
// ============================================================================

export const ArticlePlanSchema = z.object({
  title: z.string(),
  category: z.string(),
  tableOfContents: z.array(
    z.object({
      heading: z.string(),
      subheadings: z.array(z.string()),
    })
  ),
  headings: z.array(
    z.object({
      title: z.string(),
      description: z.string(),
    })
  ),
  metaDescription: z.string().optional(),
  imagePrompts: z.array(z.string()),
});

/**
 * Plan type used by the rest of the pipeline after normalization.
 */
export type ArticlePlan = z.infer<typeof ArticlePlanSchema>;

export function normalizeArticlePlan(raw: RawArticlePlan): ArticlePlan {
  const metaDescription = raw.meta_description?.trim();
  return {
    title: raw.title.trim(),
    category: raw.category.trim(),
    tableOfContents: raw.table_of_contents.map((entry) => ({
      heading: entry.heading.trim(),
      subheadings: (entry.subheadings ?? []).map((s) => s.trim()).filter(Boolean),
    })),
    headings: raw.headings.map((h) => ({ title: h.title.trim(), description: h.description.trim() })),
    ...(metaDescription ? { metaDescription } : {}),
    imagePrompts: (raw.image_prompts ?? []).map((p) => p.trim()).filter(Boolean),
  };
}

/**
 * Minimal plan used when the model never produced a valid one.
 * Downstream stages run in degraded mode on the bare topic.
 */
export function createFallbackPlan(topic: string): ArticlePlan {
  return {
    title: topic.trim(),
    category: PLAN_CONFIG.FALLBACK_CATEGORY,
    tableOfContents: [],
    headings: [],
    imagePrompts: [],
  };
}

// ============================================================================
// Response Parsing
// ============================================================================

export type PlanParseResult =
  | { readonly ok: true; readonly plan: ArticlePlan }
  | { readonly ok: false; readonly issues: readonly string[] };

/**
 * Extracts the outermost JSON object from a model response, tolerating code
 * fences and prose around it.
 */
export function extractJsonObject(text: string): string | null {
  const cleaned = stripCodeFences(text);
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return cleaned.slice(start, end + 1);
}

/**
 * Parses and validates a plan response.
 *
 * @example
 * const result = parsePlanResponse(text);
 * if (!result.ok) log.warn(result.issues.join('; '));
 */
export function parsePlanResponse(text: string): PlanParseResult {
  const json = extractJsonObject(text);
  if (!json) {
    return { ok: false, issues: ['response contains no JSON object'] };
  }

  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    return { ok: false, issues: [`invalid JSON: ${error instanceof Error ? error.message : String(error)}`] };
  }

  const parsed = RawArticlePlanSchema.safeParse(data);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }
  return { ok: true, plan: normalizeArticlePlan(parsed.data) };
}
