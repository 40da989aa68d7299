/**
 * Database Connection — Knex over better-sqlite3
 * Layer: Infrastructure
 * Pattern: Singleton (plus a factory for isolated handles)
 *
 * The store is SQLite, in memory unless DATABASE_FILENAME says otherwise.
 * An in-memory database belongs to a single connection, so the pool is
 * pinned to exactly one: a second connection would open a second, empty
 * database. `min: 1` also keeps the pool from reaping that connection while
 * it sits idle.
 *
 * SQLite ships with foreign keys off; `afterCreate` turns them on for the
 * connection before Knex hands it out.
 *
 * Every statement Knex sends is echoed at `debug` (set LOG_LEVEL=debug to
 * watch the eager prefetch lookups go by).
 *
 * `getDbConnection()` is the process-wide handle the container registers.
 * `createDbConnection()` builds an independent handle; tests use it to get a
 * fresh store each. `destroyDbConnection()` closes the shared handle and,
 * for an in-memory store, discards its data.
 */
import type Database from 'better-sqlite3';
import knex, { Knex } from 'knex';
import { config } from '@core/config';
import { logger } from '@core/logger';

export interface DbConnectionOptions {
  filename?: string;
  acquireTimeoutMs?: number;
}

export function createDbConnection(options: DbConnectionOptions = {}): Knex {
  const filename = options.filename ?? config.database.filename;

  const db = knex({
    client: 'better-sqlite3',
    connection: { filename },
    useNullAsDefault: true,
    pool: {
      min: 1,
      max: 1,
      afterCreate: (
        conn: Database.Database,
        done: (err: Error | null, conn: Database.Database) => void,
      ) => {
        conn.pragma('foreign_keys = ON');
        logger.debug({ filename }, 'SQLite connection opened with foreign keys enforced');
        done(null, conn);
      },
    },
    acquireConnectionTimeout: options.acquireTimeoutMs ?? config.database.acquireTimeoutMs,
  });

  db.on('query', (query: Knex.Sql) => {
    logger.debug({ sql: query.sql, bindings: query.bindings }, 'query');
  });

  return db;
}

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    instance = createDbConnection();
    logger.info({ filename: config.database.filename }, 'Database connection initialized');
  }

  return instance;
}

/** Closes the shared handle (end of the demo, or test cleanup). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection destroyed');
  }
}
