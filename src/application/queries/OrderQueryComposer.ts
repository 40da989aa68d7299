/**
 * Order Query Composer
 * Layer: Application
 * Pattern: Builder
 *
 * Builds an OrderQueryPlan from three independent kinds of clause:
 *
 *   join(path)                  — inner join along a relation path; restricts rows
 *   where(path, field, value)   — comparison on the root or a joined path
 *   eager(...paths)             — relations to prefetch; never restricts rows
 *
 * Nothing is checked while the chain is being written. `build()` validates
 * the whole specification at once and throws QueryConstructionError on the
 * first problem, so a plan that exists is always executable.
 *
 * Join clauses come from the relationship graph: each path names the
 * relation it walks and the alias its rows get. Person paths also pull in
 * the `people` base table so name columns can be filtered on.
 */
import type {
  ComparisonOperator,
  FilterPath,
  FilterValue,
  OrderEagerPath,
  OrderFilterFields,
  OrderJoinPath,
  OrderQueryPlan,
  ResolvedFilter,
} from '@domain/query/OrderQueryPlan';
import {
  joinStepsFor,
  type JoinStep,
  type Relation,
  RELATIONS,
  TABLES,
} from '@domain/schema/relations';
import { QueryConstructionError } from '@shared/errors/AppError';
import { injectable } from 'tsyringe';

interface JoinNode {
  parent: OrderJoinPath | null;
  relation: Relation;
  alias: string;
  baseAlias?: string;
}

const JOIN_GRAPH: Readonly<Record<OrderJoinPath, JoinNode>> = {
  menuItems: { parent: null, relation: RELATIONS.order.menuItems, alias: TABLES.menuItems },
  'menuItems.foodTruck': {
    parent: 'menuItems',
    relation: RELATIONS.menuItem.foodTruck,
    alias: TABLES.foodTrucks,
  },
  customer: {
    parent: null,
    relation: RELATIONS.order.customer,
    alias: TABLES.customers,
    baseAlias: 'customer_people',
  },
  employee: {
    parent: null,
    relation: RELATIONS.order.employee,
    alias: TABLES.employees,
    baseAlias: 'employee_people',
  },
  'employee.foodTruck': {
    parent: 'employee',
    relation: RELATIONS.employee.foodTruck,
    alias: 'employee_food_trucks',
  },
};

/** Qualified column behind each filterable field, keyed by the alias its path joins as. */
type FieldColumns = { readonly [P in FilterPath]: Readonly<Record<OrderFilterFields[P], string>> };

const FIELD_COLUMNS: FieldColumns = {
  order: {
    id: 'orders.id',
    customerId: 'orders.customer_id',
    employeeId: 'orders.employee_id',
  },
  menuItems: {
    id: 'menu_items.id',
    name: 'menu_items.name',
    price: 'menu_items.price',
    foodTruckId: 'menu_items.food_truck_id',
  },
  'menuItems.foodTruck': {
    id: 'food_trucks.id',
    name: 'food_trucks.name',
    type: 'food_trucks.type',
  },
  customer: {
    id: 'customers.id',
    firstName: 'customer_people.first_name',
    lastName: 'customer_people.last_name',
  },
  employee: {
    id: 'employees.id',
    firstName: 'employee_people.first_name',
    lastName: 'employee_people.last_name',
    foodTruckId: 'employees.food_truck_id',
  },
  'employee.foodTruck': {
    id: 'employee_food_trucks.id',
    name: 'employee_food_trucks.name',
    type: 'employee_food_trucks.type',
  },
};

const OPERATORS: readonly ComparisonOperator[] = ['=', '<>', '<', '<=', '>', '>='];

const EAGER_PATHS: readonly OrderEagerPath[] = [
  'menuItems',
  'customer',
  'employee',
  'employee.foodTruck',
];

interface PendingFilter {
  path: FilterPath;
  field: string;
  value: FilterValue;
  operator: ComparisonOperator;
}

export class OrderQueryBuilder {
  private readonly joinPaths: OrderJoinPath[] = [];
  private readonly pendingFilters: PendingFilter[] = [];
  private readonly eagerPaths: OrderEagerPath[] = [];

  join(path: OrderJoinPath): this {
    this.joinPaths.push(path);
    return this;
  }

  where<P extends FilterPath>(
    path: P,
    field: OrderFilterFields[P],
    value: FilterValue,
    operator: ComparisonOperator = '=',
  ): this {
    this.pendingFilters.push({ path, field, value, operator });
    return this;
  }

  eager(...paths: OrderEagerPath[]): this {
    this.eagerPaths.push(...paths);
    return this;
  }

  build(): OrderQueryPlan {
    const joined = new Set<OrderJoinPath>();
    const joins: JoinStep[] = [];

    for (const path of this.joinPaths) {
      if (!Object.hasOwn(JOIN_GRAPH, path)) {
        throw new QueryConstructionError(`Unknown join path "${path}"`);
      }
      if (joined.has(path)) {
        throw new QueryConstructionError(`Join path "${path}" is joined more than once`);
      }

      const node = JOIN_GRAPH[path];
      if (node.parent !== null && !joined.has(node.parent)) {
        throw new QueryConstructionError(`Join "${path}" needs "${node.parent}" joined before it`);
      }

      const fromAlias = node.parent === null ? TABLES.orders : JOIN_GRAPH[node.parent].alias;
      joins.push(...joinStepsFor(node.relation, fromAlias, node.alias, node.baseAlias));
      joined.add(path);
    }

    const filters = this.pendingFilters.map((filter) => resolveFilter(filter, joined));

    const eager = new Set<OrderEagerPath>();
    for (const path of this.eagerPaths) {
      if (!EAGER_PATHS.includes(path)) {
        throw new QueryConstructionError(`Unknown eager path "${path}"`);
      }
      if (path === 'employee.foodTruck') eager.add('employee');
      eager.add(path);
    }

    return { joins: Object.freeze(joins), filters: Object.freeze(filters), eager };
  }
}

function resolveFilter(filter: PendingFilter, joined: ReadonlySet<OrderJoinPath>): ResolvedFilter {
  const { path, field, value, operator } = filter;

  if (path !== 'order') {
    if (!Object.hasOwn(JOIN_GRAPH, path)) {
      throw new QueryConstructionError(`Unknown filter path "${path}"`);
    }
    if (!joined.has(path)) {
      throw new QueryConstructionError(`Filter on "${path}" needs join("${path}")`);
    }
  }

  const columns: Readonly<Record<string, string>> = FIELD_COLUMNS[path];
  if (!Object.hasOwn(columns, field)) {
    throw new QueryConstructionError(`Unknown field "${field}" on "${path}"`);
  }
  if (!OPERATORS.includes(operator)) {
    throw new QueryConstructionError(`Unsupported operator "${operator}"`);
  }
  if (value === null && operator !== '=' && operator !== '<>') {
    throw new QueryConstructionError(`Operator "${operator}" cannot compare with null`);
  }
  if (value !== null && typeof value !== 'string' && typeof value !== 'number') {
    throw new QueryConstructionError(
      `Filter value for "${path}.${field}" must be a string or number`,
    );
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new QueryConstructionError(
      `Filter value for "${path}.${field}" must be a finite number, got ${value}`,
    );
  }

  return { column: columns[field], operator, value };
}

@injectable()
export class OrderQueryComposer {
  create(): OrderQueryBuilder {
    return new OrderQueryBuilder();
  }

  /**
   * Orders containing at least one item at exactly `price` cents, joined
   * through their items to the items' truck, with items, customer, and
   * employee plus the employee's truck prefetched.
   */
  forMenuItemPrice(price: number): OrderQueryPlan {
    if (!Number.isInteger(price)) {
      throw new QueryConstructionError(
        `Price filter must be a whole number of cents, got ${price}`,
      );
    }

    return this.create()
      .join('menuItems')
      .join('menuItems.foodTruck')
      .eager('menuItems', 'customer', 'employee.foodTruck')
      .where('menuItems', 'price', price)
      .build();
  }
}
