/**
 * Migration 003 — Menu Items, Orders and their Junction
 * Layer: Infrastructure (Database)
 *
 *   food_trucks (1) ──< menu_items
 *   orders (n) ──< menu_item_orders >── (n) menu_items
 *
 *   - `menu_items.food_truck_id` is NOT NULL: an item has exactly one truck.
 *   - `menu_item_orders` has no id of its own. Its composite primary key
 *     also serves the order → items lookup; the second index serves the
 *     item → orders direction. Both foreign keys cascade, so a link never
 *     outlives either row.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('menu_items', (table) => {
    table.increments('id').primary();
    table.integer('price').notNullable();
    table.string('name', 50).notNullable();
    table
      .integer('food_truck_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('food_trucks');

    table.index('food_truck_id', 'idx_menu_items_food_truck_id');
    table.index('price', 'idx_menu_items_price');
  });

  await knex.schema.createTable('orders', (table) => {
    table.increments('id').primary();
    table.integer('employee_id').unsigned().references('id').inTable('employees');
    table.integer('customer_id').unsigned().references('id').inTable('customers');

    table.index('employee_id', 'idx_orders_employee_id');
    table.index('customer_id', 'idx_orders_customer_id');
  });

  await knex.schema.createTable('menu_item_orders', (table) => {
    table
      .integer('order_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('orders')
      .onDelete('CASCADE');
    table
      .integer('menu_item_id')
      .unsigned()
      .notNullable()
      .references('id')
      .inTable('menu_items')
      .onDelete('CASCADE');

    table.primary(['order_id', 'menu_item_id']);
    table.index('menu_item_id', 'idx_menu_item_orders_menu_item_id');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('menu_item_orders');
  await knex.schema.dropTableIfExists('orders');
  await knex.schema.dropTableIfExists('menu_items');
}
