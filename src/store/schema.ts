import type { Knex } from 'knex';

export const TABLES = {
  WORK_ITEMS: 'work_items',
  STAGE_RESULTS: 'stage_results',
  PUBLISH_ENVELOPES: 'publish_envelopes',
  PUBLISH_RECORDS: 'publish_records',
} as const;

/** Work item columns added after the first release, with their definitions */
const ADDED_WORK_ITEM_COLUMNS: ReadonlyArray<readonly [string, (table: Knex.TableBuilder) => void]> = [
  ['last_error_retryable', (table) => table.boolean('last_error_retryable').notNullable().defaultTo(false)],
  ['mode', (table) => table.string('mode', 16).notNullable().defaultTo('keyword')],
  ['news_rank', (table) => table.integer('news_rank').notNullable().defaultTo(0)],
];

async function addMissingColumns(knex: Knex): Promise<void> {
  for (const [column, define] of ADDED_WORK_ITEM_COLUMNS) {
    if (await knex.schema.hasColumn(TABLES.WORK_ITEMS, column)) continue;
    await knex.schema.alterTable(TABLES.WORK_ITEMS, define);
  }
}

/**
 * Creates the pipeline tables when they do not exist yet.
 * JSON-shaped columns are stored as text so the same schema runs on
 * Postgres and SQLite.
 */
export async function ensureSchema(knex: Knex): Promise<void> {
  if (!(await knex.schema.hasTable(TABLES.WORK_ITEMS))) {
    await knex.schema.createTable(TABLES.WORK_ITEMS, (table) => {
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
      table.string('mode', 16).notNullable().defaultTo('keyword');
      table.integer('news_rank').notNullable().defaultTo(0);
      table.integer('attempt').notNullable();
      table.text('last_error').nullable();
      table.boolean('last_error_retryable').notNullable().defaultTo(false);
      table.string('post_id', 64).nullable();
      table.boolean('cancel_requested').notNullable().defaultTo(false);
      table.string('dispatch_key', 255).nullable();
      table.bigInteger('updated_at').notNullable();
      table.index(['status', 'due_at']);
      table.index(['mode', 'scheduled_at']);
    });
  } else {
    await addMissingColumns(knex);
  }

  if (!(await knex.schema.hasTable(TABLES.STAGE_RESULTS))) {
    await knex.schema.createTable(TABLES.STAGE_RESULTS, (table) => {
      table.increments('id').primary();
      table.string('work_item_id', 64).notNullable().references('id').inTable(TABLES.WORK_ITEMS);
      table.string('stage_name', 32).notNullable();
      table.integer('attempt').notNullable();
      table.integer('item_attempt').notNullable();
      table.text('payload').nullable();
      table.text('error').nullable();
      table.boolean('accepted').notNullable();
      table.bigInteger('created_at').notNullable();
      table.unique(['work_item_id', 'stage_name', 'attempt']);
    });
  }

  if (!(await knex.schema.hasTable(TABLES.PUBLISH_ENVELOPES))) {
    await knex.schema.createTable(TABLES.PUBLISH_ENVELOPES, (table) => {
      table.string('work_item_id', 64).primary();
      table.text('envelope').notNullable();
    });
  }

  if (!(await knex.schema.hasTable(TABLES.PUBLISH_RECORDS))) {
    await knex.schema.createTable(TABLES.PUBLISH_RECORDS, (table) => {
      table.string('idempotency_key', 128).primary();
      table.string('post_id', 64).notNullable();
      table.bigInteger('created_at').notNullable();
    });
  }
}
