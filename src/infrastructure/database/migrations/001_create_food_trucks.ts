/**
 * Migration 001 — Food Trucks
 * Layer: Infrastructure (Database)
 *
 * Joined-table inheritance for trucks: `food_trucks` holds every truck and
 * its discriminator; `taco_trucks` holds one row per taco truck, keyed by
 * the same id.
 *
 *   - `name` is UNIQUE and NOT NULL.
 *   - `type` is indexed; polymorphic reads dispatch on it.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('food_trucks', (table) => {
    table.increments('id').primary();
    table.string('type', 50).notNullable();
    table.string('name', 80).notNullable().unique();

    table.index('type', 'idx_food_trucks_type');
  });

  await knex.schema.createTable('taco_trucks', (table) => {
    table.integer('id').unsigned().primary().references('id').inTable('food_trucks');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('taco_trucks');
  await knex.schema.dropTableIfExists('food_trucks');
}
