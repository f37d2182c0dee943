/**
 * Draft Generator
 *
 * Drives the generation client through two kinds of call:
 * - plan: JSON outline, validated and retried on structural failure
 * - draft: HTML article, then a bounded expansion loop toward the target length
 * - rephrase: a news story rewritten as an article, expanded the same way
 *
 * Transient generation errors are never swallowed here; they surface to the
 * orchestrator's stage retry policy.
 */

import { createPrefixedLogger, type Logger } from '../utils/logger';
import type { GenerationClient } from '../ai/generation-client';
import { DRAFT_CONFIG, GENERATION_CONFIG, PLAN_CONFIG } from '../pipeline/config';
import { errorMessage, isPipelineError, PipelineError } from '../pipeline/types';
import type { CategoryOption, Draft, Snippet } from '../pipeline/types';
import { countWords, excerptOf, stripCodeFences } from '../content/markup-utils';
import { createFallbackPlan, parsePlanResponse, type ArticlePlan } from './article-plan';
import { resolveCategory } from './category';
import {
  getDraftSystemPrompt,
  getDraftUserPrompt,
  getExpansionUserPrompt,
  getPlanSystemPrompt,
  getPlanUserPrompt,
  getRephraseSystemPrompt,
  getRephraseUserPrompt,
} from './prompts';

// ============================================================================
// Types
// ============================================================================

export interface DraftGeneratorDeps {
  readonly client: GenerationClient;
  readonly logger?: Logger;
}

export interface DraftGeneratorOptions {
  readonly planModel?: string;
  readonly draftModel?: string;
  readonly temperature?: number;
  readonly planMaxTokens?: number;
  readonly draftMaxTokens?: number;
  /** R: plan generation calls before giving up */
  readonly maxPlanAttempts?: number;
  readonly maxExpansionAttempts?: number;
}

export interface PlanRequest {
  readonly topic: string;
  readonly language: string;
  readonly categories: readonly CategoryOption[];
  /** When false, exhaustion throws INVALID_PLAN_STRUCTURE instead of returning the fallback plan */
  readonly fallback?: boolean;
  readonly signal?: AbortSignal;
}

export interface PlanOutcome {
  readonly plan: ArticlePlan;
  /** Generation calls made */
  readonly attempts: number;
  readonly degraded: boolean;
}

export interface DraftRequest {
  readonly plan: ArticlePlan;
  readonly language: string;
  readonly snippets: readonly Snippet[];
  readonly targetWordCount: number;
  readonly categories: readonly CategoryOption[];
  readonly signal?: AbortSignal;
}

export interface DraftOutcome {
  readonly draft: Draft;
  readonly expansionAttempts: number;
  /** Word count after the first call and after every accepted expansion */
  readonly wordCounts: readonly number[];
}

export interface RephraseRequest {
  /** News story to rewrite */
  readonly source: Snippet;
  /** Category the story was found under; resolved against `categories` */
  readonly categoryHint: string;
  readonly language: string;
  readonly targetWordCount: number;
  readonly categories: readonly CategoryOption[];
  readonly signal?: AbortSignal;
}

export interface RephrasedArticle {
  readonly title: string;
  readonly html: string;
}

export interface CleanedDraftResponse {
  readonly html: string;
  readonly selectedCategory?: string;
}

// ============================================================================
// Response Cleaning
// ============================================================================

/**
 * Strips code fences and an optional leading `SELECTED_CATEGORY: <name>` line.
 *
 * @example
 * cleanDraftResponse('SELECTED_CATEGORY: Tech\n<p>Hi</p>')
 * // { html: '<p>Hi</p>', selectedCategory: 'Tech' }
 */
export function cleanDraftResponse(text: string): CleanedDraftResponse {
  const stripped = stripCodeFences(text);
  const lines = stripped.split('\n');
  const firstIndex = lines.findIndex((line) => line.trim().length > 0);
  if (firstIndex === -1) return { html: '' };

  const first = lines[firstIndex].trim();
  const prefix = DRAFT_CONFIG.SELECTED_CATEGORY_PREFIX;
  if (first.toUpperCase().startsWith(prefix)) {
    const selected = first.slice(prefix.length).trim();
    const html = lines
      .slice(firstIndex + 1)
      .join('\n')
      .trim();
    return selected ? { html, selectedCategory: selected } : { html };
  }
  return { html: stripped };
}

/**
 * Reads a `TITLE: <headline>` line and everything after `CONTENT:`.
 * Without a title line the source title is kept; without a CONTENT marker
 * the whole response (minus any title line) is the body.
 *
 * @example
 * parseRephraseResponse('TITLE: Rates hold\nCONTENT:\n<p>Body</p>', 'Old')
 * // { title: 'Rates hold', html: '<p>Body</p>' }
 */
export function parseRephraseResponse(text: string, fallbackTitle: string): RephrasedArticle {
  const stripped = stripCodeFences(text);
  const titlePattern = new RegExp(`^\\s*${DRAFT_CONFIG.REPHRASE_TITLE_PREFIX}[ \\t]*(.*)$`, 'im');
  const contentPattern = new RegExp(`${DRAFT_CONFIG.REPHRASE_CONTENT_PREFIX}\\s*([\\s\\S]*)$`, 'i');

  const titleMatch = titlePattern.exec(stripped);
  const title = titleMatch?.[1].trim() || fallbackTitle.trim();
  const contentMatch = contentPattern.exec(stripped);
  const html = contentMatch
    ? contentMatch[1].trim()
    : (titleMatch ? stripped.replace(titleMatch[0], '') : stripped).trim();

  return { title, html };
}

// ============================================================================
// Draft Generator
// ============================================================================

export class DraftGenerator {
  private readonly log: Logger;

  constructor(
    private readonly deps: DraftGeneratorDeps,
    private readonly options: DraftGeneratorOptions = {}
  ) {
    this.log = deps.logger ?? createPrefixedLogger('[Draft]');
  }

  /**
   * Generates and validates an article plan.
   * Only structural failures consume the attempt budget; generation errors propagate.
   *
   * @throws PipelineError INVALID_PLAN_STRUCTURE when exhausted with `fallback: false`
   */
  async generatePlan(request: PlanRequest): Promise<PlanOutcome> {
    const maxAttempts = this.options.maxPlanAttempts ?? PLAN_CONFIG.MAX_ATTEMPTS;
    let feedback: readonly string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const text = await this.deps.client.complete({
        systemPrompt: getPlanSystemPrompt(request.language),
        userPrompt: getPlanUserPrompt({
          topic: request.topic,
          language: request.language,
          categories: request.categories,
          validationFeedback: feedback,
        }),
        maxTokens: this.options.planMaxTokens ?? GENERATION_CONFIG.PLAN_MAX_TOKENS,
        temperature: this.options.temperature ?? GENERATION_CONFIG.TEMPERATURE,
        model: this.options.planModel ?? GENERATION_CONFIG.PLAN_MODEL,
        ...(request.signal ? { signal: request.signal } : {}),
      });

      const parsed = parsePlanResponse(text);
      if (parsed.ok) {
        this.log.info(`Plan accepted on attempt ${attempt}/${maxAttempts}: "${parsed.plan.title}"`);
        return { plan: parsed.plan, attempts: attempt, degraded: false };
      }

      feedback = parsed.issues;
      this.log.warn(`Plan attempt ${attempt}/${maxAttempts} invalid: ${parsed.issues.join('; ')}`);
    }

    if (request.fallback === false) {
      throw new PipelineError(
        'INVALID_PLAN_STRUCTURE',
        `no valid plan after ${maxAttempts} attempts: ${feedback.join('; ')}`
      );
    }

    this.log.warn(`Using fallback plan for "${request.topic}"`);
    return { plan: createFallbackPlan(request.topic), attempts: maxAttempts, degraded: true };
  }

  /**
   * Writes the article, then expands it while it is shorter than the target.
   */
  async generateDraft(request: DraftRequest): Promise<DraftOutcome> {
    const firstText = await this.deps.client.complete({
      systemPrompt: getDraftSystemPrompt(request.language),
      userPrompt: getDraftUserPrompt({
        plan: request.plan,
        language: request.language,
        snippets: request.snippets,
        targetWordCount: request.targetWordCount,
        categories: request.categories,
      }),
      ...this.draftCallSettings(request.signal),
    });

    const first = cleanDraftResponse(firstText);
    if (first.html.length === 0) {
      throw new PipelineError('GENERATION_INVALID_RESPONSE', 'draft response contained no article body');
    }

    const expanded = await this.expand(first.html, request.plan, request);

    const category = resolveCategory(first.selectedCategory ?? request.plan.category, request.categories);
    const metaDescription =
      request.plan.metaDescription?.slice(0, DRAFT_CONFIG.META_DESCRIPTION_MAX_LENGTH) ??
      excerptOf(expanded.html, DRAFT_CONFIG.META_DESCRIPTION_MAX_LENGTH);

    return {
      draft: {
        title: request.plan.title,
        bodyHtml: expanded.html,
        category,
        metaDescription,
        wordCount: expanded.wordCount,
      },
      expansionAttempts: expanded.expansionAttempts,
      wordCounts: expanded.wordCounts,
    };
  }

  /**
   * Rewrites a news story as an article in `TITLE:`/`CONTENT:` form, then
   * expands it like a draft. The category is the one the story was found
   * under, never a model choice.
   */
  async rephraseArticle(request: RephraseRequest): Promise<DraftOutcome> {
    const text = await this.deps.client.complete({
      systemPrompt: getRephraseSystemPrompt(request.language),
      userPrompt: getRephraseUserPrompt({
        source: request.source,
        language: request.language,
        targetWordCount: request.targetWordCount,
      }),
      ...this.draftCallSettings(request.signal),
    });

    const rephrased = parseRephraseResponse(text, request.source.title);
    if (rephrased.html.length === 0) {
      throw new PipelineError('GENERATION_INVALID_RESPONSE', 'rephrase response contained no article body');
    }
    this.log.info(`Rephrased "${request.source.title}" as "${rephrased.title}"`);

    const plan = { ...createFallbackPlan(rephrased.title), category: request.categoryHint };
    const expanded = await this.expand(rephrased.html, plan, request);

    return {
      draft: {
        title: rephrased.title,
        bodyHtml: expanded.html,
        category: resolveCategory(request.categoryHint, request.categories),
        metaDescription: excerptOf(expanded.html, DRAFT_CONFIG.META_DESCRIPTION_MAX_LENGTH),
        wordCount: expanded.wordCount,
      },
      expansionAttempts: expanded.expansionAttempts,
      wordCounts: expanded.wordCounts,
    };
  }

  /**
   * Continues `html` while it is shorter than the target.
   * An expansion is kept only if it strictly increases the word count.
   */
  private async expand(
    initialHtml: string,
    plan: ArticlePlan,
    request: Pick<DraftRequest, 'language' | 'targetWordCount' | 'signal'>
  ): Promise<{ html: string; wordCount: number; expansionAttempts: number; wordCounts: number[] }> {
    const maxExpansions = this.options.maxExpansionAttempts ?? DRAFT_CONFIG.MAX_EXPANSION_ATTEMPTS;
    let html = initialHtml;
    let wordCount = countWords(html);
    const wordCounts = [wordCount];
    let expansionAttempts = 0;

    while (wordCount < request.targetWordCount && expansionAttempts < maxExpansions) {
      expansionAttempts++;
      let continuation: string;
      try {
        const text = await this.deps.client.complete({
          systemPrompt: getDraftSystemPrompt(request.language),
          userPrompt: getExpansionUserPrompt({
            plan,
            language: request.language,
            currentHtml: html,
            currentWordCount: wordCount,
            targetWordCount: request.targetWordCount,
          }),
          ...this.draftCallSettings(request.signal),
        });
        continuation = cleanDraftResponse(text).html;
      } catch (error) {
        if (isPipelineError(error) && error.code === 'CANCELLED') throw error;
        this.log.warn(`Expansion ${expansionAttempts}/${maxExpansions} failed, keeping current draft: ${errorMessage(error)}`);
        break;
      }

      const candidate = `${html}\n${continuation}`;
      const candidateCount = countWords(candidate);
      if (candidateCount <= wordCount) {
        this.log.warn(`Expansion ${expansionAttempts}/${maxExpansions} added no words, stopping`);
        break;
      }

      this.log.info(`Expansion ${expansionAttempts}/${maxExpansions}: ${wordCount} → ${candidateCount} words`);
      html = candidate;
      wordCount = candidateCount;
      wordCounts.push(wordCount);
    }

    return { html, wordCount, expansionAttempts, wordCounts };
  }

  private draftCallSettings(signal: AbortSignal | undefined): {
    maxTokens: number;
    temperature: number;
    model: string;
    signal?: AbortSignal;
  } {
    return {
      maxTokens: this.options.draftMaxTokens ?? GENERATION_CONFIG.DRAFT_MAX_TOKENS,
      temperature: this.options.temperature ?? GENERATION_CONFIG.TEMPERATURE,
      model: this.options.draftModel ?? GENERATION_CONFIG.DRAFT_MODEL,
      ...(signal ? { signal } : {}),
    };
  }
}
