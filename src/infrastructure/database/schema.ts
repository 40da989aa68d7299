/**
 * Schema Bootstrap
 * Layer: Infrastructure (Database)
 *
 * Runs the migrations in this directory against a Knex handle. They are
 * served from an in-code migration source rather than a directory scan, so
 * the same list works under tsx, under Jest and from a compiled build.
 * Knex records applied migrations in `knex_migrations`, which makes
 * `migrateToLatest()` a no-op on a store that already has the schema.
 */
import type { Knex } from 'knex';
import { logger } from '@core/logger';

import * as createFoodTrucks from './migrations/001_create_food_trucks';
import * as createPeople from './migrations/002_create_people';
import * as createMenuItemsAndOrders from './migrations/003_create_menu_items_and_orders';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const MIGRATIONS: readonly NamedMigration[] = [
  { name: '001_create_food_trucks', migration: createFoodTrucks },
  { name: '002_create_people', migration: createPeople },
  { name: '003_create_menu_items_and_orders', migration: createMenuItemsAndOrders },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return [...MIGRATIONS];
  },
  getMigrationName(migration) {
    return migration.name;
  },
  async getMigration(migration) {
    return migration.migration;
  },
};

/** Creates every table that is missing. Returns the names of migrations applied now. */
export async function migrateToLatest(db: Knex): Promise<string[]> {
  const [batch, applied]: [number, string[]] = await db.migrate.latest({ migrationSource });
  logger.info({ batch, applied }, 'Schema is up to date');
  return applied;
}
