/**
 * Migration 001 — Create the `health_life_expectancy` Table
 * Layer: Infrastructure (Database)
 *
 * The warehouse sink: one append-only table, filled by COPY once per run and
 * read by the dbt models and the training job downstream. No primary key and
 * no upsert — every run appends its batch stamped with its own ingested_at.
 *
 * Column ORDER matters: the loader compares this list, position by position,
 * with CANONICAL_COLUMNS before it copies anything.
 */
import type { Knex } from 'knex';

const TABLE = 'health_life_expectancy';

export async function up(knex: Knex): Promise<void> {
  const exists = await knex.schema.hasTable(TABLE);
  if (exists) return;

  await knex.schema.createTable(TABLE, (table) => {
    table.text('country_name');
    table.text('country_code');
    table.integer('year');
    table.text('sex');
    table.double('life_expectancy');
    table.timestamp('ingested_at', { useTz: false });
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists(TABLE);
}
