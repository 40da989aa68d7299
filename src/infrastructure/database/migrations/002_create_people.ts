/**
 * Migration 002 — People, Employees, Customers
 * Layer: Infrastructure (Database)
 *
 *   people (id, type, first_name, last_name)
 *     ├── employees (id → people.id, food_truck_id → food_trucks.id)
 *     └── customers (id → people.id)
 *
 * Both name columns are nullable. An employee may exist without a truck.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('people', (table) => {
    table.increments('id').primary();
    table.string('type', 50).notNullable();
    table.string('first_name', 50);
    table.string('last_name', 50);

    table.index('type', 'idx_people_type');
  });

  await knex.schema.createTable('employees', (table) => {
    table.integer('id').unsigned().primary().references('id').inTable('people');
    table.integer('food_truck_id').unsigned().references('id').inTable('food_trucks');

    table.index('food_truck_id', 'idx_employees_food_truck_id');
  });

  await knex.schema.createTable('customers', (table) => {
    table.integer('id').unsigned().primary().references('id').inTable('people');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('customers');
  await knex.schema.dropTableIfExists('employees');
  await knex.schema.dropTableIfExists('people');
}
