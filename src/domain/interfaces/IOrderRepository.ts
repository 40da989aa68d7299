/**
 * Order Repository Interface
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * `toQuery()` and `findByPlan()` are the two halves of running a composed
 * plan: the first hands back the primary statement without executing it
 * (the demo prints it), the second executes it and resolves the plan's
 * eager paths with one indexed lookup each.
 */
import type { NewOrder, Order } from '@domain/entities/Order';
import type { OrderQueryPlan } from '@domain/query/OrderQueryPlan';
import type { Knex } from 'knex';

export interface IOrderRepository {
  create(input: NewOrder, trx?: Knex.Transaction): Promise<Order>;

  toQuery(plan: OrderQueryPlan): Knex.QueryBuilder;

  findByPlan(plan: OrderQueryPlan): Promise<Order[]>;

  findByCustomer(customerId: number): Promise<Order[]>;

  findByEmployee(employeeId: number): Promise<Order[]>;

  /** Orders that include the item, through the junction table. */
  findByMenuItem(menuItemId: number): Promise<Order[]>;
}
