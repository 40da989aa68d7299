/**
 * Relationship Graph
 * Layer: Domain
 *
 * Table names, the joined-table inheritance links, and every navigable
 * relation between entities, described by cardinality and keys:
 *
 *   food_trucks (1) ──< menu_items
 *   food_trucks (1) ──< employees
 *   customers   (1) ──< orders >── (1) employees
 *   orders      (n) ──< menu_item_orders >── (n) menu_items
 *
 * Both directions of each link are listed, but neither side stores a pointer
 * to the other: navigation is always "follow this foreign key, look the rows
 * up". The query composer turns these entries into join clauses.
 */
export const TABLES = {
  foodTrucks: 'food_trucks',
  tacoTrucks: 'taco_trucks',
  people: 'people',
  employees: 'employees',
  customers: 'customers',
  menuItems: 'menu_items',
  orders: 'orders',
  menuItemOrders: 'menu_item_orders',
} as const;

export type TableName = (typeof TABLES)[keyof typeof TABLES];

/** Specialization table → base table. Both share the `id` primary key. */
export const INHERITANCE: Partial<Record<TableName, TableName>> = {
  [TABLES.tacoTrucks]: TABLES.foodTrucks,
  [TABLES.employees]: TABLES.people,
  [TABLES.customers]: TABLES.people,
};

/** `from.foreignKey` points at `to.id`. */
export interface BelongsTo {
  kind: 'belongsTo';
  from: TableName;
  to: TableName;
  foreignKey: string;
}

/** `to.foreignKey` points at `from.id`. */
export interface HasMany {
  kind: 'hasMany';
  from: TableName;
  to: TableName;
  foreignKey: string;
}

/** `through.sourceKey` points at `from.id`, `through.targetKey` at `to.id`. */
export interface ManyToMany {
  kind: 'manyToMany';
  from: TableName;
  to: TableName;
  through: TableName;
  sourceKey: string;
  targetKey: string;
}

export type Relation = BelongsTo | HasMany | ManyToMany;

export const RELATIONS = {
  foodTruck: {
    menuItems: {
      kind: 'hasMany',
      from: TABLES.foodTrucks,
      to: TABLES.menuItems,
      foreignKey: 'food_truck_id',
    },
    employees: {
      kind: 'hasMany',
      from: TABLES.foodTrucks,
      to: TABLES.employees,
      foreignKey: 'food_truck_id',
    },
  },
  menuItem: {
    foodTruck: {
      kind: 'belongsTo',
      from: TABLES.menuItems,
      to: TABLES.foodTrucks,
      foreignKey: 'food_truck_id',
    },
    orders: {
      kind: 'manyToMany',
      from: TABLES.menuItems,
      to: TABLES.orders,
      through: TABLES.menuItemOrders,
      sourceKey: 'menu_item_id',
      targetKey: 'order_id',
    },
  },
  employee: {
    foodTruck: {
      kind: 'belongsTo',
      from: TABLES.employees,
      to: TABLES.foodTrucks,
      foreignKey: 'food_truck_id',
    },
    ordersServed: {
      kind: 'hasMany',
      from: TABLES.employees,
      to: TABLES.orders,
      foreignKey: 'employee_id',
    },
  },
  customer: {
    ordersRequested: {
      kind: 'hasMany',
      from: TABLES.customers,
      to: TABLES.orders,
      foreignKey: 'customer_id',
    },
  },
  order: {
    menuItems: {
      kind: 'manyToMany',
      from: TABLES.orders,
      to: TABLES.menuItems,
      through: TABLES.menuItemOrders,
      sourceKey: 'order_id',
      targetKey: 'menu_item_id',
    },
    customer: {
      kind: 'belongsTo',
      from: TABLES.orders,
      to: TABLES.customers,
      foreignKey: 'customer_id',
    },
    employee: {
      kind: 'belongsTo',
      from: TABLES.orders,
      to: TABLES.employees,
      foreignKey: 'employee_id',
    },
  },
} as const satisfies Record<string, Record<string, Relation>>;

/** One `INNER JOIN table AS alias ON left = right`. */
export interface JoinStep {
  table: TableName;
  alias: string;
  left: string;
  right: string;
}

/**
 * Join clauses that walk `relation` from the rows aliased `fromAlias` to
 * rows aliased `toAlias`. A many-to-many walk goes through its junction
 * table first; a target with a base table pulls the base in under
 * `baseAlias` so its inherited columns can be filtered on.
 */
export function joinStepsFor(
  relation: Relation,
  fromAlias: string,
  toAlias: string,
  baseAlias?: string,
): JoinStep[] {
  const steps: JoinStep[] = [];

  switch (relation.kind) {
    case 'belongsTo':
      steps.push({
        table: relation.to,
        alias: toAlias,
        left: `${fromAlias}.${relation.foreignKey}`,
        right: `${toAlias}.id`,
      });
      break;
    case 'hasMany':
      steps.push({
        table: relation.to,
        alias: toAlias,
        left: `${toAlias}.${relation.foreignKey}`,
        right: `${fromAlias}.id`,
      });
      break;
    case 'manyToMany':
      steps.push(
        {
          table: relation.through,
          alias: relation.through,
          left: `${relation.through}.${relation.sourceKey}`,
          right: `${fromAlias}.id`,
        },
        {
          table: relation.to,
          alias: toAlias,
          left: `${relation.through}.${relation.targetKey}`,
          right: `${toAlias}.id`,
        },
      );
      break;
  }

  const base = INHERITANCE[relation.to];
  if (base && baseAlias) {
    steps.push({ table: base, alias: baseAlias, left: `${baseAlias}.id`, right: `${toAlias}.id` });
  }

  return steps;
}
