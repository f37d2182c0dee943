/**
 * Plan, draft, expansion and news rephrasing prompts.
 */

import { DRAFT_CONFIG } from '../pipeline/config';
import type { CategoryOption, Snippet } from '../pipeline/types';
import type { ArticlePlan } from './article-plan';

export interface PlanPromptContext {
  readonly topic: string;
  readonly language: string;
  readonly categories: readonly CategoryOption[];
  /** Issues from the previous invalid response, if any */
  readonly validationFeedback?: readonly string[];
}

export interface DraftPromptContext {
  readonly plan: ArticlePlan;
  readonly language: string;
  readonly snippets: readonly Snippet[];
  readonly targetWordCount: number;
  readonly categories: readonly CategoryOption[];
}

export interface ExpansionPromptContext {
  readonly plan: ArticlePlan;
  readonly language: string;
  readonly currentHtml: string;
  readonly currentWordCount: number;
  readonly targetWordCount: number;
}

export interface RephrasePromptContext {
  readonly source: Snippet;
  readonly language: string;
  readonly targetWordCount: number;
}

function languageInstruction(language: string): string {
  return `Write everything in the language with code "${language}".`;
}

function formatCategories(categories: readonly CategoryOption[]): string {
  if (categories.length === 0) return '(none provided)';
  return categories.map((c) => `- ${c.name}`).join('\n');
}

// ============================================================================
// Plan
// ============================================================================

export function getPlanSystemPrompt(language: string): string {
  return `You are an editor who designs article outlines for a content website.
You answer with a single JSON object and nothing else.

${languageInstruction(language)}`;
}

export function getPlanUserPrompt(ctx: PlanPromptContext): string {
  const feedback = ctx.validationFeedback?.length
    ? `\n=== PREVIOUS RESPONSE WAS INVALID ===\n${ctx.validationFeedback.map((msg, i) => `${i + 1}. ${msg}`).join('\n')}\n`
    : '';

  return `Design an article plan for the topic "${ctx.topic}".
${feedback}
=== AVAILABLE CATEGORIES ===
${formatCategories(ctx.categories)}

=== OUTPUT FORMAT ===
{
  "title": "headline",
  "category": "one of the available categories",
  "table_of_contents": [{ "heading": "section", "subheadings": ["sub section"] }],
  "headings": [{ "title": "section", "description": "what the section covers" }],
  "meta_description": "120-160 characters",
  "image_prompts": ["short image description"]
}`;
}

// ============================================================================
// Draft
// ============================================================================

export function getDraftSystemPrompt(language: string): string {
  return `You are a writer producing complete articles as HTML fragments.
Use <h2>/<h3> headings, <p> paragraphs and lists. No <html>, <head> or <body>, no markdown.

${languageInstruction(language)}`;
}

function formatSnippets(snippets: readonly Snippet[]): string {
  const selected = snippets.slice(0, DRAFT_CONFIG.MAX_CONTEXT_SNIPPETS);
  if (selected.length === 0) return '(no research available; rely on general knowledge)';
  return selected
    .map((s, i) => `[${i + 1}] ${s.title || s.domain} (${s.url})\n${s.content.slice(0, DRAFT_CONFIG.MAX_SNIPPET_PROMPT_CHARS)}`)
    .join('\n\n');
}

function formatOutline(plan: ArticlePlan): string {
  if (plan.headings.length === 0) return '(no outline; structure the article yourself)';
  return plan.headings.map((h, i) => `${i + 1}. ${h.title}: ${h.description}`).join('\n');
}

export function getDraftUserPrompt(ctx: DraftPromptContext): string {
  return `Write the article "${ctx.plan.title}".

=== OUTLINE ===
${formatOutline(ctx.plan)}

=== RESEARCH ===
${formatSnippets(ctx.snippets)}

=== CATEGORY ===
Planned category: ${ctx.plan.category}
Available categories:
${formatCategories(ctx.categories)}
Start your answer with a line "${DRAFT_CONFIG.SELECTED_CATEGORY_PREFIX} <category>" naming the best fit.

=== LENGTH ===
At least ${ctx.targetWordCount} words.`;
}

export function getExpansionUserPrompt(ctx: ExpansionPromptContext): string {
  const missing = Math.max(0, ctx.targetWordCount - ctx.currentWordCount);
  return `The article "${ctx.plan.title}" has ${ctx.currentWordCount} words; it needs about ${missing} more.

=== CURRENT ARTICLE ===
${ctx.currentHtml}

=== TASK ===
Write only the additional HTML sections that continue the article. Do not repeat existing sections.`;
}

// ============================================================================
// News Rephrasing
// ============================================================================

export function getRephraseSystemPrompt(language: string): string {
  return `You are a news writer who turns a reported story into an original article for a content website.
Keep every fact from the source and add context, background and analysis. Never copy sentences verbatim.
Use <h2>/<h3> headings, <p> paragraphs and lists. No <html>, <head> or <body>, no markdown.

${languageInstruction(language)}`;
}

export function getRephraseUserPrompt(ctx: RephrasePromptContext): string {
  return `Rephrase and expand this news story into a complete article.

=== SOURCE ===
Title: ${ctx.source.title}
URL: ${ctx.source.url}
${ctx.source.content}

=== LENGTH ===
At least ${ctx.targetWordCount} words.

=== OUTPUT FORMAT ===
${DRAFT_CONFIG.REPHRASE_TITLE_PREFIX} <new headline>
${DRAFT_CONFIG.REPHRASE_CONTENT_PREFIX}
<article HTML>`;
}
