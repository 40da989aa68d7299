/**
 * Dependency Injection Container
 * Layer: Core
 *
 * The single place every dependency is wired. `reflect-metadata` must load
 * first: tsyringe reads the constructor parameter metadata that the
 * @injectable/@inject decorators record.
 *
 *   - `useValue` registers a pre-built singleton (logger, Knex handle, SQL
 *     printer built from config).
 *   - `useClass` lets the container construct the class and inject its own
 *     dependencies.
 *
 * No class calls `new SqliteOrderRepository(...)` itself; tests do, with a
 * fresh in-memory store each.
 */
import 'reflect-metadata';
import { container } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { OrderQueryComposer } from '@application/queries/OrderQueryComposer';
import { OrderReportRenderer } from '@application/renderers/OrderReportRenderer';
import { FixtureService } from '@application/services/FixtureService';
import { getDbConnection } from '@infrastructure/database/connection';
import { SqliteFoodTruckRepository } from '@infrastructure/repositories/SqliteFoodTruckRepository';
import { SqliteMenuItemRepository } from '@infrastructure/repositories/SqliteMenuItemRepository';
import { SqliteOrderRepository } from '@infrastructure/repositories/SqliteOrderRepository';
import { SqlitePersonRepository } from '@infrastructure/repositories/SqlitePersonRepository';
import { SqlPrettyPrinter } from '@interfaces/cli/SqlPrettyPrinter';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register(TOKENS.MenuItemRepository, { useClass: SqliteMenuItemRepository });
container.register(TOKENS.PersonRepository, { useClass: SqlitePersonRepository });
container.register(TOKENS.FoodTruckRepository, { useClass: SqliteFoodTruckRepository });
container.register(TOKENS.OrderRepository, { useClass: SqliteOrderRepository });
container.register(TOKENS.FixtureService, { useClass: FixtureService });
container.register(TOKENS.OrderQueryComposer, { useClass: OrderQueryComposer });
container.register(TOKENS.OrderReportRenderer, { useClass: OrderReportRenderer });
container.register(TOKENS.SqlPrinter, {
  useValue: new SqlPrettyPrinter({ highlight: config.output.highlightSql }),
});

export { container };
