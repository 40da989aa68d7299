/**
 * SQLite Order Repository
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IOrderRepository)
 *
 * Runs composed order query plans in two phases.
 *
 *   1. Primary query: `select distinct` order columns through the plan's inner
 *      joins and filters, in order id order. This alone decides which orders
 *      come back.
 *   2. Prefetch: one `whereIn` lookup per eager path, keyed by the foreign
 *      keys collected from phase 1, attached in memory. These lookups never
 *      see the plan's filters, so `order.menuItems` is the order's whole
 *      item list even when the join matched only one of them.
 *
 * Relations outside the eager set stay `undefined`; there is no lazy
 * loading behind them. A loaded but unset relation is `null`.
 *
 * One EntityCache spans both phases, so each row maps to a single object
 * for the whole result.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { MenuItemOrderRow, NewOrder, Order, OrderRow } from '@domain/entities/Order';
import { type Employee, isCustomer, isEmployee } from '@domain/entities/Person';
import type { IOrderRepository } from '@domain/interfaces/IOrderRepository';
import type { OrderEagerPath, OrderQueryPlan } from '@domain/query/OrderQueryPlan';
import { TABLES } from '@domain/schema/relations';
import { guardWrite } from '@infrastructure/database/errors';
import {
  EntityCache,
  intern,
  loadFoodTrucks,
  loadMenuItemsByOrder,
  loadPeople,
  uniqueIds,
} from '@infrastructure/database/loaders';
import { orderRecord, toOrder } from '@infrastructure/database/records';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

const ORDER_COLUMNS = ['id', 'customer_id', 'employee_id'].map((c) => `${TABLES.orders}.${c}`);

@injectable()
export class SqliteOrderRepository implements IOrderRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async create(input: NewOrder, trx?: Knex.Transaction): Promise<Order> {
    if (!trx) {
      return this.db.transaction((t) => this.create(input, t));
    }

    const row: OrderRow = { customer_id: input.customerId, employee_id: input.employeeId };
    const [id] = await guardWrite(() => trx(TABLES.orders).insert(row));

    if (input.menuItemIds.length > 0) {
      const links: MenuItemOrderRow[] = input.menuItemIds.map((menuItemId) => ({
        order_id: id,
        menu_item_id: menuItemId,
      }));
      await guardWrite(() => trx(TABLES.menuItemOrders).insert(links));
    }

    this.log.debug({ id, menuItems: input.menuItemIds.length }, 'order created');
    return { id, customerId: input.customerId, employeeId: input.employeeId };
  }

  toQuery(plan: OrderQueryPlan): Knex.QueryBuilder {
    const qb = this.db(TABLES.orders);

    for (const step of plan.joins) {
      const target = step.alias === step.table ? step.table : `${step.table} as ${step.alias}`;
      qb.join(target, step.left, step.right);
    }

    for (const filter of plan.filters) {
      if (filter.value === null) {
        if (filter.operator === '=') qb.whereNull(filter.column);
        else qb.whereNotNull(filter.column);
      } else {
        qb.where(filter.column, filter.operator, filter.value);
      }
    }

    return qb.distinct(ORDER_COLUMNS).orderBy(`${TABLES.orders}.id`);
  }

  async findByPlan(plan: OrderQueryPlan): Promise<Order[]> {
    const cache = new EntityCache();
    const orders: Order[] = [];
    for (const row of orderRecord.array().parse(await this.toQuery(plan))) {
      if (!cache.orders.has(row.id)) orders.push(intern(cache.orders, toOrder(row)));
    }

    await this.prefetch(orders, plan.eager, cache);

    this.log.debug({ orders: orders.length, eager: [...plan.eager] }, 'order query executed');
    return orders;
  }

  async findByCustomer(customerId: number): Promise<Order[]> {
    return this.selectOrders((qb) => qb.where(`${TABLES.orders}.customer_id`, customerId));
  }

  async findByEmployee(employeeId: number): Promise<Order[]> {
    return this.selectOrders((qb) => qb.where(`${TABLES.orders}.employee_id`, employeeId));
  }

  async findByMenuItem(menuItemId: number): Promise<Order[]> {
    return this.selectOrders((qb) =>
      qb
        .join(TABLES.menuItemOrders, `${TABLES.menuItemOrders}.order_id`, `${TABLES.orders}.id`)
        .where(`${TABLES.menuItemOrders}.menu_item_id`, menuItemId),
    );
  }

  private async selectOrders(
    scope: (qb: Knex.QueryBuilder) => Knex.QueryBuilder,
  ): Promise<Order[]> {
    const rows = await scope(this.db(TABLES.orders))
      .select(ORDER_COLUMNS)
      .orderBy(`${TABLES.orders}.id`);
    return orderRecord.array().parse(rows).map(toOrder);
  }

  private async prefetch(
    orders: Order[],
    eager: ReadonlySet<OrderEagerPath>,
    cache: EntityCache,
  ): Promise<void> {
    if (orders.length === 0) return;

    if (eager.has('menuItems')) {
      const byOrder = await loadMenuItemsByOrder(
        this.db,
        orders.map((o) => o.id),
        cache,
      );
      for (const order of orders) order.menuItems = byOrder.get(order.id) ?? [];
    }

    if (eager.has('customer')) {
      const people = await loadPeople(this.db, uniqueIds(orders.map((o) => o.customerId)), cache);
      for (const order of orders) {
        const person = order.customerId === null ? undefined : people.get(order.customerId);
        order.customer = person && isCustomer(person) ? person : null;
      }
    }

    if (eager.has('employee') || eager.has('employee.foodTruck')) {
      const people = await loadPeople(this.db, uniqueIds(orders.map((o) => o.employeeId)), cache);
      for (const order of orders) {
        const person = order.employeeId === null ? undefined : people.get(order.employeeId);
        order.employee = person && isEmployee(person) ? person : null;
      }
    }

    if (eager.has('employee.foodTruck')) {
      const employees = uniqueEmployees(orders);
      const trucks = await loadFoodTrucks(
        this.db,
        uniqueIds(employees.map((e) => e.foodTruckId)),
        cache,
      );
      for (const employee of employees) {
        employee.foodTruck =
          employee.foodTruckId === null ? null : trucks.get(employee.foodTruckId) ?? null;
      }
    }
  }
}

function uniqueEmployees(orders: readonly Order[]): Employee[] {
  const seen = new Set<Employee>();
  for (const order of orders) {
    if (order.employee) seen.add(order.employee);
  }
  return [...seen];
}
