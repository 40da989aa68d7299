/**
 * Demo CLI Script — Food Truck Order Report
 * Layer: Entry Point (CLI)
 *
 * npm start. Builds the schema in an in-memory SQLite database, loads the
 * demo fixture, composes "orders containing an item at DEMO_PRICE_FILTER
 * cents", prints that query's SQL without running it, then runs it and
 * prints one line per (order, menu item):
 *
 *   <customer> <item> <price> <truck name> <truck type>
 *
 * Diagnostics go to the pino logger; the report itself goes to stdout.
 */
import 'dotenv/config';

import type { OrderQueryComposer } from '@application/queries/OrderQueryComposer';
import type { OrderReportRenderer } from '@application/renderers/OrderReportRenderer';
import type { FixtureService } from '@application/services/FixtureService';
import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { IOrderRepository } from '@domain/interfaces/IOrderRepository';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { migrateToLatest } from '@infrastructure/database/schema';
import type { SqlPrettyPrinter } from '@interfaces/cli/SqlPrettyPrinter';
import type { Knex } from 'knex';

const RULE = '-'.repeat(25);

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  const db = container.resolve<Knex>(TOKENS.Knex);
  const fixtures = container.resolve<FixtureService>(TOKENS.FixtureService);
  const composer = container.resolve<OrderQueryComposer>(TOKENS.OrderQueryComposer);
  const orders = container.resolve<IOrderRepository>(TOKENS.OrderRepository);
  const renderer = container.resolve<OrderReportRenderer>(TOKENS.OrderReportRenderer);
  const printer = container.resolve<SqlPrettyPrinter>(TOKENS.SqlPrinter);

  try {
    await migrateToLatest(db);
    await fixtures.populate();

    const plan = composer.forMenuItemPrice(config.demo.priceFilter);
    logger.info({ price: config.demo.priceFilter }, 'Composed order query');

    log(printer.format(orders.toQuery(plan)));
    log(`${RULE} STARTING ${RULE}`);

    for (const line of renderer.render(await orders.findByPlan(plan))) {
      log(line);
    }
  } finally {
    await destroyDbConnection();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Demo failed:', err);
  process.exit(1);
});
