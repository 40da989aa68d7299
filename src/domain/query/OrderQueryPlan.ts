/**
 * Order Query Plan
 * Layer: Domain
 *
 * The composed, not-yet-executed form of an order query. The composer
 * (application layer) validates and resolves everything up front, so the
 * repository only has to apply the plan:
 *
 *   joins   — inner joins that restrict which orders come back
 *   filters — column comparisons over the joined aliases
 *   eager   — relations to prefetch; they never narrow the rows, and an
 *             eager-loaded collection is never filtered
 */
import type { JoinStep } from '@domain/schema/relations';

export type OrderJoinPath =
  | 'menuItems'
  | 'menuItems.foodTruck'
  | 'customer'
  | 'employee'
  | 'employee.foodTruck';

export type OrderEagerPath = 'menuItems' | 'customer' | 'employee' | 'employee.foodTruck';

/** Filterable fields per path; `order` is the root row itself. */
export interface OrderFilterFields {
  order: 'id' | 'customerId' | 'employeeId';
  menuItems: 'id' | 'name' | 'price' | 'foodTruckId';
  'menuItems.foodTruck': 'id' | 'name' | 'type';
  customer: 'id' | 'firstName' | 'lastName';
  employee: 'id' | 'firstName' | 'lastName' | 'foodTruckId';
  'employee.foodTruck': 'id' | 'name' | 'type';
}

export type FilterPath = keyof OrderFilterFields;

export type ComparisonOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

export type FilterValue = string | number | null;

export interface ResolvedFilter {
  /** Fully qualified column, e.g. `menu_items.price`. */
  column: string;
  operator: ComparisonOperator;
  value: FilterValue;
}

export interface OrderQueryPlan {
  readonly joins: readonly JoinStep[];
  readonly filters: readonly ResolvedFilter[];
  readonly eager: ReadonlySet<OrderEagerPath>;
}
