import { describe, it, expect, vi } from 'vitest';

import type { GenerationClient } from '../../../src/ai/generation-client';
import type { ArticlePlan } from '../../../src/drafting/article-plan';
import { DraftGenerator } from '../../../src/drafting/draft-generator';
import {
  idempotencyKeyFor,
  Orchestrator,
  toRecordedError,
  type OrchestratorDeps,
} from '../../../src/pipeline/orchestrator';
import {
  PipelineError,
  type Draft,
  type MediaAsset,
  type Snippet,
  type WorkItemStatus,
} from '../../../src/pipeline/types';
import { InMemoryWorkItemStore } from '../../../src/store/memory-store';
import { silentLogger, type StructuredLogger } from '../../../src/utils/logger';

// ============================================================================
// Fixtures
// ============================================================================

const CATEGORIES = [
  { id: '1', name: 'Uncategorized' },
  { id: '9', name: 'Food' },
];

const SNIPPET: Snippet = {
  url: 'https://coffee-notes.example.com/ratios',
  domain: 'example.com',
  title: 'Brewing ratios explained',
  content: 'A 1:16 ratio is a common starting point.',
  provider: 'tavily',
};

const IMAGE: MediaAsset = {
  url: 'https://cdn.example.com/media/beans.jpg',
  kind: 'image',
  validated: true,
  alt: 'pour-over coffee',
};

const PLAN: ArticlePlan = {
  title: 'Pour-Over Coffee at Home',
  category: 'Food',
  tableOfContents: [{ heading: 'Gear', subheadings: [] }],
  headings: [{ title: 'Gear', description: 'What you need' }],
  metaDescription: 'A practical guide to brewing pour-over coffee.',
  imagePrompts: [],
};

const DRAFT: Draft = {
  title: 'Pour-Over Coffee at Home',
  bodyHtml: '<h2>Gear</h2><p>Use a kettle.</p>',
  category: { id: '9', name: 'Food' },
  metaDescription: 'A practical guide to brewing pour-over coffee.',
  wordCount: 4,
};

const HEADLINE: Snippet = {
  url: 'https://wire.example.org/rates',
  domain: 'example.org',
  title: 'Rates on hold',
  content: 'The central bank left rates unchanged.',
  provider: 'tavily',
};

const NEWS_DRAFT: Draft = {
  title: 'Rates Stay Put',
  bodyHtml: '<h2>Why</h2><p>The bank paused.</p>',
  category: { id: '12', name: 'business' },
  metaDescription: 'Why The bank paused.',
  wordCount: 4,
};

const THIRTY_MINUTES = 30 * 60 * 1000;

const quietLogger: StructuredLogger = { ...silentLogger, structured: () => undefined };

type Deps = OrchestratorDeps;

function setup(overrides: Partial<Pick<Deps, 'drafts'>> = {}) {
  const store = new InMemoryWorkItemStore();
  const research = { collect: vi.fn<Deps['research']['collect']>().mockResolvedValue([SNIPPET]) };
  const media = { collect: vi.fn<Deps['media']['collect']>().mockResolvedValue({ images: [IMAGE], video: null }) };
  const drafts = {
    generatePlan: vi
      .fn<Deps['drafts']['generatePlan']>()
      .mockResolvedValue({ plan: PLAN, attempts: 1, degraded: false }),
    generateDraft: vi
      .fn<Deps['drafts']['generateDraft']>()
      .mockResolvedValue({ draft: DRAFT, expansionAttempts: 0, wordCounts: [4] }),
    rephraseArticle: vi
      .fn<Deps['drafts']['rephraseArticle']>()
      .mockResolvedValue({ draft: NEWS_DRAFT, expansionAttempts: 0, wordCounts: [4] }),
  };
  const mutator = {
    mutate: vi.fn<Deps['mutator']['mutate']>(() => ({ html: '<p>Mutated body text</p>', wordCount: 3 })),
  };
  const publisher = { createPost: vi.fn<Deps['publisher']['createPost']>().mockResolvedValue('101') };
  const sleep = vi.fn(async (_ms: number): Promise<void> => {});
  let sequence = 0;

  const orchestrator = new Orchestrator(
    {
      store,
      research,
      media,
      drafts: overrides.drafts ?? drafts,
      mutator,
      publisher,
      clock: { now: () => 1_000 },
      sleep,
      logger: quietLogger,
      generateId: () => `item-${++sequence}`,
    },
    { maxStageAttempts: 3, backoffUnitMs: 100, backoffCeilingMs: 1_000, defaultCategories: CATEGORIES }
  );

  const updateSpy = vi.spyOn(store, 'update');
  const statusChanges = (): WorkItemStatus[] =>
    updateSpy.mock.calls.flatMap(([, patch]) => (patch.status ? [patch.status] : []));

  return {
    orchestrator,
    store,
    research,
    media,
    drafts,
    mutator,
    publisher,
    sleep,
    statusChanges,
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('Orchestrator.submit', () => {
  it('creates a pending item with defaults', async () => {
    const { orchestrator } = setup();

    const id = await orchestrator.submit({ topic: '  pour-over coffee ' });

    await expect(orchestrator.status(id)).resolves.toEqual({
      id: 'item-1',
      topic: 'pour-over coffee',
      language: 'en',
      country: 'us',
      targetWordCount: 1500,
      availableCategories: CATEGORIES,
      backlinkCandidates: [],
      createdAt: 1_000,
      dueAt: 1_000,
      scheduledAt: 1_000,
      status: 'pending',
      mode: 'keyword',
      newsRank: 0,
      attempt: 1,
      cancelRequested: false,
      updatedAt: 1_000,
    });
  });

  it('clamps the target word count', async () => {
    const { orchestrator } = setup();

    const low = await orchestrator.submit({ topic: 'a', targetWordCount: 50 });
    const high = await orchestrator.submit({ topic: 'b', targetWordCount: 50_000 });

    expect((await orchestrator.status(low)).targetWordCount).toBe(200);
    expect((await orchestrator.status(high)).targetWordCount).toBe(10_000);
  });

  it('rejects an empty topic', async () => {
    const { orchestrator } = setup();
    await expect(orchestrator.submit({ topic: '   ' })).rejects.toMatchObject({ code: 'MALFORMED_PAYLOAD' });
  });

  it('reports unknown items as NOT_FOUND', async () => {
    const { orchestrator } = setup();
    await expect(orchestrator.status('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });
});

describe('Orchestrator.submitNews', () => {
  it('queues count items per category thirty minutes apart', async () => {
    const { orchestrator } = setup();

    const ids = await orchestrator.submitNews({
      categories: [
        { name: 'business', count: 2, categoryId: '12' },
        { name: 'science', count: 1 },
      ],
    });

    expect(ids).toEqual(['item-1', 'item-2', 'item-3']);
    const items = await Promise.all(ids.map((id) => orchestrator.status(id)));
    expect(items.map((i) => [i.topic, i.mode, i.newsRank, i.scheduledAt, i.dueAt])).toEqual([
      ['business', 'news', 0, 1_000, 1_000],
      ['business', 'news', 1, 1_000 + THIRTY_MINUTES, 1_000],
      ['science', 'news', 0, 1_000 + 2 * THIRTY_MINUTES, 1_000],
    ]);
    expect(items[0].availableCategories).toEqual([{ id: '12', name: 'business' }]);
    expect(items[2].availableCategories).toEqual(CATEGORIES);
  });

  it('defaults to two business articles', async () => {
    const { orchestrator } = setup();

    const ids = await orchestrator.submitNews();

    const items = await Promise.all(ids.map((id) => orchestrator.status(id)));
    expect(items.map((i) => [i.topic, i.newsRank])).toEqual([
      ['business', 0],
      ['business', 1],
    ]);
  });

  it('spaces new articles after the latest news publish time and leaves keyword items alone', async () => {
    const { orchestrator } = setup();
    await orchestrator.submit({ topic: 'business', mode: 'news', scheduledAt: 9_000_000 });

    const [next] = await orchestrator.submitNews({ categories: [{ name: 'business', count: 1 }] });
    const keyword = await orchestrator.submit({ topic: 'pour-over' });

    expect((await orchestrator.status(next)).scheduledAt).toBe(9_000_000 + THIRTY_MINUTES);
    expect((await orchestrator.status(keyword)).scheduledAt).toBe(1_000);
  });

  it('gives concurrent news submissions distinct slots', async () => {
    const { orchestrator } = setup();

    const ids = await Promise.all([
      orchestrator.submit({ topic: 'business', mode: 'news' }),
      orchestrator.submit({ topic: 'business', mode: 'news', newsRank: 1 }),
      orchestrator.submit({ topic: 'science', mode: 'news' }),
    ]);

    const slots = await Promise.all(ids.map(async (id) => (await orchestrator.status(id)).scheduledAt));
    expect(slots.sort((a, b) => a - b)).toEqual([1_000, 1_000 + THIRTY_MINUTES, 1_000 + 2 * THIRTY_MINUTES]);
  });

  it('rejects a negative news rank', async () => {
    const { orchestrator } = setup();
    await expect(orchestrator.submit({ topic: 'business', mode: 'news', newsRank: -1 })).rejects.toMatchObject({
      code: 'MALFORMED_PAYLOAD',
    });
  });
});

describe('Orchestrator.process for news items', () => {
  it('rephrases the headline at the item rank through the same publish path', async () => {
    const { orchestrator, store, research, drafts, mutator, publisher } = setup();
    research.collect.mockResolvedValue([SNIPPET, HEADLINE]);
    const [, second] = await orchestrator.submitNews({ categories: [{ name: 'business', categoryId: '12' }] });

    const done = await orchestrator.process(second);

    expect(done.status).toBe('published');
    expect(research.collect.mock.calls[0][0]).toMatchObject({ topic: 'business', kind: 'news' });
    expect(drafts.generatePlan).not.toHaveBeenCalled();
    expect(drafts.generateDraft).not.toHaveBeenCalled();
    expect(drafts.rephraseArticle).toHaveBeenCalledWith({
      source: HEADLINE,
      categoryHint: 'business',
      language: 'en',
      targetWordCount: 1500,
      categories: [{ id: '12', name: 'business' }],
    });
    expect(mutator.mutate.mock.calls[0][0]).toEqual(NEWS_DRAFT);
    expect(mutator.mutate.mock.calls[0][1].backlinkCandidates).toEqual([SNIPPET.url, HEADLINE.url]);

    const plans = (await orchestrator.stageResults(second)).filter((r) => r.stageName === 'plan');
    expect(plans[0].payload).toMatchObject({ generationAttempts: 0, degraded: false, plan: { title: 'business' } });

    const envelope = await store.getEnvelope(second);
    expect(envelope).toMatchObject({
      title: 'Rates Stay Put',
      categoryId: '12',
      scheduledAt: 1_000 + THIRTY_MINUTES,
      slug: 'rates-stay-put',
    });
    expect(publisher.createPost).toHaveBeenCalledTimes(1);
  });

  it('fails without retry when no headline exists at the item rank', async () => {
    const { orchestrator, drafts, sleep } = setup();
    const [, second] = await orchestrator.submitNews({ categories: [{ name: 'business' }] });

    const done = await orchestrator.process(second);

    expect(done.status).toBe('failed');
    expect(done.lastError).toEqual({
      code: 'PROVIDER_UNAVAILABLE',
      message: 'no news story at rank 2 for "business" (found 1)',
      retryable: false,
      stage: 'draft',
    });
    expect(drafts.rephraseArticle).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });
});

describe('Orchestrator.process', () => {
  it('runs every stage and publishes', async () => {
    const { orchestrator, store, publisher, mutator, statusChanges } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over coffee' });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('published');
    expect(done.postId).toBe('101');
    expect(statusChanges()).toEqual(['researching', 'drafting', 'mutating', 'ready_to_publish', 'published']);

    const results = await orchestrator.stageResults(id);
    expect(results.map((r) => r.stageName).sort()).toEqual(['draft', 'images', 'mutate', 'plan', 'publish', 'research']);
    expect(results.every((r) => r.accepted && r.attempt === 1 && r.itemAttempt === 1)).toBe(true);

    expect(mutator.mutate).toHaveBeenCalledWith(DRAFT, {
      images: [IMAGE],
      video: null,
      backlinkCandidates: [SNIPPET.url],
      language: 'en',
    });

    const envelope = await store.getEnvelope(id);
    expect(envelope).toEqual({
      title: 'Pour-Over Coffee at Home',
      html: '<p>Mutated body text</p>',
      categoryId: '9',
      scheduledAt: 1_000,
      idempotencyKey: idempotencyKeyFor(id, 1),
      slug: 'pour-over-coffee-at-home',
      metaTitle: 'Pour-Over Coffee at Home',
      metaDescription: 'A practical guide to brewing pour-over coffee.',
      excerpt: 'Mutated body text',
      featuredImage: IMAGE.url,
    });
    expect(publisher.createPost).toHaveBeenCalledWith(envelope, undefined);
  });

  it('prefers submitted backlink candidates over research urls', async () => {
    const { orchestrator, mutator } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over', backlinkCandidates: ['https://brewguide.com/'] });

    await orchestrator.process(id);

    expect(mutator.mutate.mock.calls[0][1].backlinkCandidates).toEqual(['https://brewguide.com/']);
  });

  it('degrades research and images to empty collections', async () => {
    const { orchestrator, research, media, drafts, mutator, sleep } = setup();
    research.collect.mockRejectedValue(new PipelineError('PROVIDER_UNAVAILABLE', 'all providers down'));
    media.collect.mockRejectedValue(new PipelineError('DOWNLOAD_FAILED', 'media service down'));
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('published');
    expect(research.collect).toHaveBeenCalledTimes(3);
    expect(drafts.generateDraft.mock.calls[0][0].snippets).toEqual([]);
    expect(mutator.mutate.mock.calls[0][1]).toMatchObject({ images: [], video: null, backlinkCandidates: [] });
    expect(sleep.mock.calls.map(([ms]) => ms).sort((a, b) => a - b)).toEqual([100, 100, 200, 200]);
  });

  it('records each plan generation attempt on the accepted plan result', async () => {
    const complete = vi.fn<GenerationClient['complete']>();
    const generator = new DraftGenerator({ client: { complete }, logger: silentLogger });
    const validPlan = JSON.stringify({
      title: 'Pour-Over Coffee at Home',
      category: 'Food',
      table_of_contents: [{ heading: 'Gear' }],
      headings: [{ title: 'Gear', description: 'What you need' }],
    });
    const missingHeadings = JSON.stringify({ title: 'Pour-Over', category: 'Food', table_of_contents: [] });
    const body = `<p>${Array.from({ length: 250 }, () => 'word').join(' ')}</p>`;
    complete
      .mockResolvedValueOnce(missingHeadings)
      .mockResolvedValueOnce(missingHeadings)
      .mockResolvedValueOnce(validPlan)
      .mockResolvedValueOnce(body);
    const { orchestrator } = setup({ drafts: generator });
    const id = await orchestrator.submit({ topic: 'pour-over', targetWordCount: 200 });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('published');
    expect(complete).toHaveBeenCalledTimes(4);
    const plans = (await orchestrator.stageResults(id)).filter((r) => r.stageName === 'plan');
    expect(plans).toHaveLength(1);
    expect(plans[0].payload).toMatchObject({ generationAttempts: 3, degraded: false });
  });

  it('fails without retry when the CMS rejects the post', async () => {
    const { orchestrator, publisher, sleep } = setup();
    publisher.createPost.mockRejectedValue(new PipelineError('PUBLISH_REJECTED', 'CMS rejected post (400): bad slug'));
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('failed');
    expect(done.lastError).toEqual({
      code: 'PUBLISH_REJECTED',
      message: 'CMS rejected post (400): bad slug',
      retryable: false,
      stage: 'publish',
    });
    expect(publisher.createPost).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a transient publish failure with backoff', async () => {
    const { orchestrator, publisher, sleep } = setup();
    publisher.createPost
      .mockRejectedValueOnce(new PipelineError('PUBLISH_UNAVAILABLE', 'CMS responded 503'))
      .mockRejectedValueOnce(new PipelineError('PUBLISH_UNAVAILABLE', 'CMS responded 503'))
      .mockResolvedValueOnce('202');
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const done = await orchestrator.process(id);

    expect(done.postId).toBe('202');
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    const publishes = (await orchestrator.stageResults(id)).filter((r) => r.stageName === 'publish');
    expect(publishes.map((r) => [r.attempt, r.accepted])).toEqual([
      [1, false],
      [2, false],
      [3, true],
    ]);
  });

  it('fails the item when planning fails', async () => {
    const { orchestrator, drafts } = setup();
    drafts.generatePlan.mockRejectedValue(new PipelineError('INVALID_PLAN_STRUCTURE', 'no valid plan'));
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('failed');
    expect(done.lastError).toMatchObject({ code: 'INVALID_PLAN_STRUCTURE', stage: 'plan' });
    expect(drafts.generatePlan).toHaveBeenCalledTimes(1);
    expect(drafts.generateDraft).not.toHaveBeenCalled();
  });

  it('publishes the unmutated draft when mutation throws', async () => {
    const { orchestrator, mutator, store } = setup();
    mutator.mutate.mockImplementation(() => {
      throw new PipelineError('MALFORMED_PAYLOAD', 'unbalanced markup');
    });
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('published');
    expect((await store.getEnvelope(id))?.html).toBe(DRAFT.bodyHtml);
  });

  it('shares one run between concurrent calls', async () => {
    const { orchestrator, publisher } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const [a, b] = await Promise.all([orchestrator.process(id), orchestrator.process(id)]);

    expect(a).toEqual(b);
    expect(publisher.createPost).toHaveBeenCalledTimes(1);
  });

  it('resumes from stored stage results without moving status backwards', async () => {
    const { orchestrator, store, research, media, drafts, statusChanges } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });
    await store.update(id, { status: 'drafting', updatedAt: 1_000 });
    const stored = [
      ['research', { snippets: [SNIPPET] }],
      ['plan', { plan: PLAN, generationAttempts: 1, degraded: false }],
      ['images', { images: [], video: null }],
    ] as const;
    for (const [stageName, payload] of stored) {
      await store.appendStageResult({
        workItemId: id, stageName, attempt: 1, itemAttempt: 1, payload, accepted: true, createdAt: 1_000,
      });
    }

    const done = await orchestrator.process(id);

    expect(done.status).toBe('published');
    expect(research.collect).not.toHaveBeenCalled();
    expect(media.collect).not.toHaveBeenCalled();
    expect(drafts.generatePlan).not.toHaveBeenCalled();
    expect(drafts.generateDraft).toHaveBeenCalledTimes(1);
    expect(statusChanges()).toEqual(['drafting', 'mutating', 'ready_to_publish', 'published']);
  });

  it('leaves finished items alone', async () => {
    const { orchestrator, research } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });
    await orchestrator.process(id);

    const again = await orchestrator.process(id);

    expect(again.status).toBe('published');
    expect(research.collect).toHaveBeenCalledTimes(1);
  });
});

describe('Orchestrator.cancel', () => {
  it('fails an idle item right away', async () => {
    const { orchestrator } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });

    const cancelled = await orchestrator.cancel(id);

    expect(cancelled.status).toBe('failed');
    expect(cancelled.lastError).toEqual({ code: 'CANCELLED', message: 'work item was cancelled', retryable: false });
  });

  it('stops a running item at the merge barrier', async () => {
    const { orchestrator, research, drafts, publisher } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });
    research.collect.mockImplementation(async () => {
      await orchestrator.cancel(id);
      return [];
    });

    const done = await orchestrator.process(id);

    expect(done.status).toBe('failed');
    expect(done.lastError?.code).toBe('CANCELLED');
    expect(drafts.generateDraft).not.toHaveBeenCalled();
    expect(publisher.createPost).not.toHaveBeenCalled();
  });

  it('leaves published items unchanged', async () => {
    const { orchestrator } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });
    await orchestrator.process(id);

    await expect(orchestrator.cancel(id)).resolves.toMatchObject({ status: 'published', cancelRequested: false });
  });
});

describe('Orchestrator.retry', () => {
  it('resets a failed item and reuses accepted stages on the next run', async () => {
    const { orchestrator, research, publisher } = setup();
    publisher.createPost.mockRejectedValueOnce(new PipelineError('PUBLISH_REJECTED', 'bad slug'));
    const id = await orchestrator.submit({ topic: 'pour-over' });
    await orchestrator.process(id);

    const reset = await orchestrator.retry(id);
    expect(reset).toMatchObject({ status: 'pending', attempt: 2, cancelRequested: false });
    expect(reset.lastError).toBeUndefined();

    const done = await orchestrator.process(id);

    expect(done.status).toBe('published');
    expect(research.collect).toHaveBeenCalledTimes(1);
    expect(publisher.createPost).toHaveBeenCalledTimes(2);
    expect(publisher.createPost.mock.calls[1][0].idempotencyKey).toBe(idempotencyKeyFor(id, 2));
  });

  it('rejects items that have not failed', async () => {
    const { orchestrator } = setup();
    const id = await orchestrator.submit({ topic: 'pour-over' });
    await expect(orchestrator.retry(id)).rejects.toMatchObject({ code: 'INVALID_TRANSITION' });
  });
});

describe('helpers', () => {
  it('derives a stable idempotency key per item attempt', () => {
    expect(idempotencyKeyFor('item-1', 1)).toBe(idempotencyKeyFor('item-1', 1));
    expect(idempotencyKeyFor('item-1', 1)).not.toBe(idempotencyKeyFor('item-1', 2));
    expect(idempotencyKeyFor('item-1', 1)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('records unknown errors as non-retryable', () => {
    expect(toRecordedError(new Error('boom'), 'draft')).toEqual({
      code: 'UNKNOWN',
      message: 'boom',
      retryable: false,
      stage: 'draft',
    });
  });
});
