/**
 * Migration 002 — Create the `collection_aliases` Table
 * Layer: Infrastructure (Database)
 *
 * Alias names are globally unique (primary key). Deleting a collection
 * removes its aliases through ON DELETE CASCADE; the index on
 * collection_name serves "aliases of collection X" lookups.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('collection_aliases', (table) => {
    table.string('alias_name', 255).primary();
    table
      .string('collection_name', 255)
      .notNullable()
      .references('name')
      .inTable('collections')
      .onDelete('CASCADE');
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.index('collection_name', 'idx_collection_aliases_collection');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('collection_aliases');
}
