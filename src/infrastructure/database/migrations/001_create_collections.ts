/**
 * Migration 001 — Create the `collections` Table
 * Layer: Infrastructure (Database)
 *
 * One row per collection. The full CollectionConfig lives in a JSONB column:
 * the catalogue never queries inside it, it only reads it back whole and
 * merges update diffs into it.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('collections', (table) => {
    table.string('name', 255).primary();
    table.jsonb('config').notNullable();
    table.timestamps(true, true);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('collections');
}
