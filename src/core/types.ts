/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is keyed by one of these Symbols; the container
 * (container.ts) maps each token to its implementation. Grouped by layer so
 * a new repository or service gets its token here first.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Repositories — data-access contracts
  FoodTruckRepository: Symbol.for('FoodTruckRepository'),
  PersonRepository: Symbol.for('PersonRepository'),
  MenuItemRepository: Symbol.for('MenuItemRepository'),
  OrderRepository: Symbol.for('OrderRepository'),

  // Services and query composition
  FixtureService: Symbol.for('FixtureService'),
  OrderQueryComposer: Symbol.for('OrderQueryComposer'),
  OrderReportRenderer: Symbol.for('OrderReportRenderer'),

  // Presentation
  SqlPrinter: Symbol.for('SqlPrinter'),
} as const;
