/**
 * Shared behaviour of both store implementations. The knex store runs on
 * in-memory SQLite through better-sqlite3.
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import knexFactory from 'knex';

import type { PublishEnvelope, WorkItem } from '../../../src/pipeline/types';
import { KnexWorkItemStore } from '../../../src/store/knex-store';
import { InMemoryWorkItemStore } from '../../../src/store/memory-store';
import type { WorkItemStore } from '../../../src/store/work-item-store';

function makeItem(overrides: Partial<WorkItem> = {}): WorkItem {
  return {
    id: 'item-1',
    topic: 'pour-over coffee',
    language: 'en',
    country: 'us',
    targetWordCount: 1500,
    availableCategories: [{ id: '7', name: 'Brewing' }],
    backlinkCandidates: ['https://brewguide.com/ratios'],
    createdAt: 1_000,
    dueAt: 1_000,
    scheduledAt: 5_000,
    status: 'pending',
    mode: 'keyword',
    newsRank: 0,
    attempt: 1,
    cancelRequested: false,
    updatedAt: 1_000,
    ...overrides,
  };
}

const ENVELOPE: PublishEnvelope = {
  title: 'Pour-over basics',
  html: '<p>Body</p>',
  categoryId: '7',
  scheduledAt: 5_000,
  idempotencyKey: 'key-1',
  slug: 'pour-over-basics',
  metaTitle: 'Pour-over basics',
  metaDescription: 'How to brew.',
  excerpt: 'Body',
  featuredImage: 'https://cdn.example.com/media/beans.jpg',
};

const DUE_QUERY = { now: 10_000, staleBefore: 5_000, maxItemAttempts: 3, limit: 10 };

interface StoreFixture {
  readonly store: WorkItemStore;
  close(): Promise<void>;
}

const factories: ReadonlyArray<[string, () => Promise<StoreFixture>]> = [
  [
    'InMemoryWorkItemStore',
    async () => ({ store: new InMemoryWorkItemStore(), close: async () => {} }),
  ],
  [
    'KnexWorkItemStore (sqlite)',
    async () => {
      const store = new KnexWorkItemStore(
        knexFactory({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true })
      );
      await store.init();
      return { store, close: () => store.destroy() };
    },
  ],
];

describe.each(factories)('%s', (_name, createFixture) => {
  let fixture: StoreFixture;
  let store: WorkItemStore;

  beforeEach(async () => {
    fixture = await createFixture();
    store = fixture.store;
  });

  afterEach(async () => {
    await fixture.close();
  });

  it('stores and reads back work items', async () => {
    const item = makeItem();
    await store.create(item);

    await expect(store.get('item-1')).resolves.toEqual(item);
    await expect(store.get('missing')).resolves.toBeUndefined();
  });

  it('patches fields and clears the last error', async () => {
    await store.create(makeItem());
    const error = { code: 'PUBLISH_UNAVAILABLE' as const, message: 'CMS responded 503', retryable: true, stage: 'publish' as const };

    const failed = await store.update('item-1', { status: 'failed', lastError: error, updatedAt: 2_000 });
    expect(failed.lastError).toEqual(error);
    await expect(store.get('item-1')).resolves.toMatchObject({ status: 'failed', lastError: error, updatedAt: 2_000 });

    const reset = await store.update('item-1', { status: 'pending', attempt: 2, lastError: null, updatedAt: 3_000 });
    expect(reset.lastError).toBeUndefined();
    const stored = await store.get('item-1');
    expect(stored?.lastError).toBeUndefined();
    expect(stored?.attempt).toBe(2);
  });

  it('round-trips news items and reports the latest news publish time', async () => {
    await expect(store.latestScheduledAt('news')).resolves.toBeUndefined();
    const news = makeItem({ id: 'news-1', topic: 'business', mode: 'news', newsRank: 1, scheduledAt: 7_000 });
    await store.create(news);
    await store.create(makeItem({ id: 'news-2', topic: 'science', mode: 'news', scheduledAt: 4_000 }));
    await store.create(makeItem({ id: 'keyword-1', scheduledAt: 99_000 }));

    await expect(store.get('news-1')).resolves.toEqual(news);
    await expect(store.latestScheduledAt('news')).resolves.toBe(7_000);
    await expect(store.latestScheduledAt('keyword')).resolves.toBe(99_000);
  });

  it('rejects updates to unknown items', async () => {
    await expect(store.update('missing', { updatedAt: 1 })).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('lists stage results in insertion order and by stage', async () => {
    await store.create(makeItem());
    const error = { code: 'GENERATION_TIMEOUT' as const, message: 'timed out', retryable: true, stage: 'plan' as const };
    await store.appendStageResult({
      workItemId: 'item-1', stageName: 'plan', attempt: 1, itemAttempt: 1,
      payload: null, error, accepted: false, createdAt: 1_100,
    });
    await store.appendStageResult({
      workItemId: 'item-1', stageName: 'research', attempt: 1, itemAttempt: 1,
      payload: { snippets: [] }, accepted: true, createdAt: 1_200,
    });
    await store.appendStageResult({
      workItemId: 'item-1', stageName: 'plan', attempt: 2, itemAttempt: 1,
      payload: { ok: true }, accepted: true, createdAt: 1_300,
    });

    const all = await store.listStageResults('item-1');
    expect(all.map((r) => [r.stageName, r.attempt, r.accepted])).toEqual([
      ['plan', 1, false],
      ['research', 1, true],
      ['plan', 2, true],
    ]);
    expect(all[0].error).toEqual(error);
    expect(all[0].payload).toBeNull();

    const plans = await store.listStageResults('item-1', 'plan');
    expect(plans.map((r) => r.payload)).toEqual([null, { ok: true }]);
  });

  it('finds due items in due order', async () => {
    const retryable = { code: 'PUBLISH_UNAVAILABLE' as const, message: 'down', retryable: true };
    await store.create(makeItem({ id: 'pending-late', dueAt: 3_000 }));
    await store.create(makeItem({ id: 'pending-early', dueAt: 2_000 }));
    await store.create(makeItem({ id: 'pending-future', dueAt: 20_000 }));
    await store.create(makeItem({ id: 'failed-retryable', status: 'failed', lastError: retryable, attempt: 2 }));
    await store.create(makeItem({ id: 'failed-exhausted', status: 'failed', lastError: retryable, attempt: 3 }));
    await store.create(
      makeItem({ id: 'failed-fatal', status: 'failed', lastError: { ...retryable, retryable: false } })
    );
    await store.create(
      makeItem({ id: 'failed-cancelled', status: 'failed', lastError: retryable, cancelRequested: true })
    );
    await store.create(makeItem({ id: 'stale', status: 'drafting', dueAt: 1_500, updatedAt: 4_000 }));
    await store.create(makeItem({ id: 'fresh', status: 'drafting', updatedAt: 6_000 }));
    await store.create(makeItem({ id: 'published', status: 'published', postId: '9' }));

    const due = await store.findDue(DUE_QUERY);
    expect(due.map((item) => item.id)).toEqual(['failed-retryable', 'stale', 'pending-early', 'pending-late']);

    const limited = await store.findDue({ ...DUE_QUERY, limit: 2 });
    expect(limited.map((item) => item.id)).toEqual(['failed-retryable', 'stale']);
  });

  it('applies the limit after leaving out items that cannot dispatch', async () => {
    const retryable = { code: 'PUBLISH_UNAVAILABLE' as const, message: 'down', retryable: true };
    for (let i = 0; i < 3; i++) {
      await store.create(
        makeItem({ id: `fatal-${i}`, status: 'failed', dueAt: 1_000 + i, lastError: { ...retryable, retryable: false } })
      );
    }
    await store.create(makeItem({ id: 'exhausted', status: 'failed', dueAt: 1_100, lastError: retryable, attempt: 3 }));
    await store.create(makeItem({ id: 'fresh', status: 'mutating', dueAt: 1_200, updatedAt: 9_000 }));
    await store.create(makeItem({ id: 'pending', dueAt: 9_000 }));

    const due = await store.findDue({ ...DUE_QUERY, limit: 1 });
    expect(due.map((item) => item.id)).toEqual(['pending']);
  });

  it('stops returning a failed item once its error becomes terminal', async () => {
    const retryable = { code: 'PUBLISH_UNAVAILABLE' as const, message: 'down', retryable: true };
    await store.create(makeItem({ status: 'failed', lastError: retryable }));
    expect((await store.findDue(DUE_QUERY)).map((item) => item.id)).toEqual(['item-1']);

    await store.update('item-1', {
      lastError: { code: 'PUBLISH_REJECTED', message: 'duplicate slug', retryable: false },
      updatedAt: 2_000,
    });

    await expect(store.findDue(DUE_QUERY)).resolves.toEqual([]);
  });

  it('claims each dispatch key once', async () => {
    await store.create(makeItem());

    await expect(store.claimDispatch('item-1', 'item-1:1:1000')).resolves.toBe(true);
    await expect(store.claimDispatch('item-1', 'item-1:1:1000')).resolves.toBe(false);
    await expect(store.claimDispatch('item-1', 'item-1:2:1000')).resolves.toBe(true);
    await expect(store.claimDispatch('missing', 'missing:1:0')).resolves.toBe(false);
    await expect(store.get('item-1')).resolves.toMatchObject({ dispatchKey: 'item-1:2:1000' });
  });

  it('keeps the claimed key across updates', async () => {
    await store.create(makeItem());
    await store.claimDispatch('item-1', 'item-1:1:1000');

    await store.update('item-1', { status: 'researching', updatedAt: 2_000 });

    await expect(store.claimDispatch('item-1', 'item-1:1:1000')).resolves.toBe(false);
  });

  it('overwrites the persisted envelope', async () => {
    await store.create(makeItem());
    await store.saveEnvelope('item-1', ENVELOPE);
    await store.saveEnvelope('item-1', { ...ENVELOPE, title: 'Pour-over, revisited' });

    await expect(store.getEnvelope('item-1')).resolves.toEqual({ ...ENVELOPE, title: 'Pour-over, revisited' });
    await expect(store.getEnvelope('missing')).resolves.toBeUndefined();
  });

  it('records publications by idempotency key', async () => {
    await store.recordPublication({ idempotencyKey: 'key-1', postId: '101', createdAt: 1_000 });
    await store.recordPublication({ idempotencyKey: 'key-1', postId: '102', createdAt: 2_000 });

    await expect(store.findPublication('key-1')).resolves.toEqual({
      idempotencyKey: 'key-1',
      postId: '102',
      createdAt: 2_000,
    });
    await expect(store.findPublication('key-2')).resolves.toBeUndefined();
  });
});

describe('KnexWorkItemStore.findDue', () => {
  it('filters and limits in the query', async () => {
    const knex = knexFactory({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });
    const store = new KnexWorkItemStore(knex);
    await store.init();
    const statements: string[] = [];
    knex.on('query', (query: { sql: string }) => statements.push(query.sql));

    try {
      await store.findDue({ ...DUE_QUERY, limit: 5 });
    } finally {
      await store.destroy();
    }

    expect(statements).toHaveLength(1);
    expect(statements[0]).toContain('`last_error_retryable` = ?');
    expect(statements[0]).toContain('`updated_at` < ?');
    expect(statements[0]).toMatch(/limit \?$/);
  });
});

describe('KnexWorkItemStore.init', () => {
  it('adds columns missing from an older work item table', async () => {
    const knex = knexFactory({ client: 'better-sqlite3', connection: { filename: ':memory:' }, useNullAsDefault: true });
    await knex.schema.createTable('work_items', (table) => {
      table.string('id', 64).primary();
      table.text('topic').notNullable();
      table.string('language', 16).notNullable();
      table.string('country', 16).notNullable();
      table.integer('target_word_count').notNullable();
      table.text('available_categories').notNullable();
      table.text('backlink_candidates').notNullable();
      table.bigInteger('created_at').notNullable();
      table.bigInteger('due_at').notNullable();
      table.bigInteger('scheduled_at').notNullable();
      table.string('status', 32).notNullable();
      table.integer('attempt').notNullable();
      table.text('last_error').nullable();
      table.string('post_id', 64).nullable();
      table.boolean('cancel_requested').notNullable().defaultTo(false);
      table.string('dispatch_key', 255).nullable();
      table.bigInteger('updated_at').notNullable();
    });
    const store = new KnexWorkItemStore(knex);

    try {
      await store.init();
      const news = makeItem({ mode: 'news', newsRank: 2 });
      await store.create(news);
      await expect(store.get('item-1')).resolves.toEqual(news);
      await expect(knex.schema.hasColumn('work_items', 'last_error_retryable')).resolves.toBe(true);
    } finally {
      await store.destroy();
    }
  });
});
