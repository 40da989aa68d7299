/**
 * Batched Loaders and Identity Map
 * Layer: Infrastructure (Database)
 *
 * Each loader resolves one relation for a whole batch of parent rows with a
 * single `whereIn` on an indexed key, and returns the results keyed so the
 * caller can attach them in memory. Repositories use them both for their
 * own reads and for the eager paths of an order query.
 *
 * `EntityCache` is the identity map for one read: every row goes through
 * `intern()`, so the same `menu_items` row reached from two orders is the
 * same object.
 */
import type { Knex } from 'knex';

import type { FoodTruck } from '@domain/entities/FoodTruck';
import type { MenuItem } from '@domain/entities/MenuItem';
import type { Order } from '@domain/entities/Order';
import { type Employee, isEmployee, type Person } from '@domain/entities/Person';
import { TABLES } from '@domain/schema/relations';

import {
  foodTruckRecord,
  linkedMenuItemRecord,
  menuItemRecord,
  personRecord,
  toFoodTruck,
  toMenuItem,
  toPerson,
} from './records';

export class EntityCache {
  readonly foodTrucks = new Map<number, FoodTruck>();
  readonly people = new Map<number, Person>();
  readonly menuItems = new Map<number, MenuItem>();
  readonly orders = new Map<number, Order>();
}

/** Returns the instance already held for `value.id`, or stores `value` as that instance. */
export function intern<T extends { id: number }>(map: Map<number, T>, value: T): T {
  const existing = map.get(value.id);
  if (existing) return existing;
  map.set(value.id, value);
  return value;
}

export function uniqueIds(ids: Iterable<number | null | undefined>): number[] {
  const out = new Set<number>();
  for (const value of ids) {
    if (value != null) out.add(value);
  }
  return [...out];
}

/** Base query for polymorphic person reads: `people` plus the employee columns. */
export function selectPeople(db: Knex): Knex.QueryBuilder {
  return db(TABLES.people)
    .leftJoin(TABLES.employees, `${TABLES.employees}.id`, `${TABLES.people}.id`)
    .select(
      `${TABLES.people}.id`,
      `${TABLES.people}.type`,
      `${TABLES.people}.first_name`,
      `${TABLES.people}.last_name`,
      `${TABLES.employees}.food_truck_id`,
    )
    .orderBy(`${TABLES.people}.id`);
}

export function selectFoodTrucks(db: Knex): Knex.QueryBuilder {
  return db(TABLES.foodTrucks)
    .select(`${TABLES.foodTrucks}.id`, `${TABLES.foodTrucks}.type`, `${TABLES.foodTrucks}.name`)
    .orderBy(`${TABLES.foodTrucks}.id`);
}

export async function loadFoodTrucks(
  db: Knex,
  ids: readonly number[],
  cache: EntityCache,
): Promise<Map<number, FoodTruck>> {
  const byId = new Map<number, FoodTruck>();
  if (ids.length === 0) return byId;

  const rows = foodTruckRecord
    .array()
    .parse(await selectFoodTrucks(db).whereIn(`${TABLES.foodTrucks}.id`, [...ids]));

  for (const row of rows) {
    byId.set(row.id, intern(cache.foodTrucks, toFoodTruck(row)));
  }
  return byId;
}

export async function loadPeople(
  db: Knex,
  ids: readonly number[],
  cache: EntityCache,
): Promise<Map<number, Person>> {
  const byId = new Map<number, Person>();
  if (ids.length === 0) return byId;

  const rows = personRecord
    .array()
    .parse(await selectPeople(db).whereIn(`${TABLES.people}.id`, [...ids]));

  for (const row of rows) {
    byId.set(row.id, intern(cache.people, toPerson(row)));
  }
  return byId;
}

/** Menu items of each order, keyed by order id, in item id order. */
export async function loadMenuItemsByOrder(
  db: Knex,
  orderIds: readonly number[],
  cache: EntityCache,
): Promise<Map<number, MenuItem[]>> {
  const byOrder = new Map<number, MenuItem[]>();
  if (orderIds.length === 0) return byOrder;

  const rows = linkedMenuItemRecord.array().parse(
    await db(TABLES.menuItemOrders)
      .join(TABLES.menuItems, `${TABLES.menuItems}.id`, `${TABLES.menuItemOrders}.menu_item_id`)
      .whereIn(`${TABLES.menuItemOrders}.order_id`, [...orderIds])
      .select(`${TABLES.menuItems}.*`, `${TABLES.menuItemOrders}.order_id`)
      .orderBy([`${TABLES.menuItemOrders}.order_id`, `${TABLES.menuItems}.id`]),
  );

  for (const row of rows) {
    const item = intern(cache.menuItems, toMenuItem(row));
    const list = byOrder.get(row.order_id);
    if (list) list.push(item);
    else byOrder.set(row.order_id, [item]);
  }
  return byOrder;
}

/** Menu items owned by each truck, keyed by truck id. */
export async function loadMenuItemsByFoodTruck(
  db: Knex,
  foodTruckIds: readonly number[],
  cache: EntityCache,
): Promise<Map<number, MenuItem[]>> {
  const byTruck = new Map<number, MenuItem[]>();
  if (foodTruckIds.length === 0) return byTruck;

  const rows = menuItemRecord.array().parse(
    await db(TABLES.menuItems)
      .whereIn('food_truck_id', [...foodTruckIds])
      .select('id', 'name', 'price', 'food_truck_id')
      .orderBy('id'),
  );

  for (const row of rows) {
    const item = intern(cache.menuItems, toMenuItem(row));
    const list = byTruck.get(row.food_truck_id);
    if (list) list.push(item);
    else byTruck.set(row.food_truck_id, [item]);
  }
  return byTruck;
}

/** Staff of each truck, keyed by truck id. */
export async function loadEmployeesByFoodTruck(
  db: Knex,
  foodTruckIds: readonly number[],
  cache: EntityCache,
): Promise<Map<number, Employee[]>> {
  const byTruck = new Map<number, Employee[]>();
  if (foodTruckIds.length === 0) return byTruck;

  const rows = personRecord.array().parse(
    await selectPeople(db).whereIn(`${TABLES.employees}.food_truck_id`, [...foodTruckIds]),
  );

  for (const row of rows) {
    const person = intern(cache.people, toPerson(row));
    if (!isEmployee(person) || person.foodTruckId === null) continue;
    const list = byTruck.get(person.foodTruckId);
    if (list) list.push(person);
    else byTruck.set(person.foodTruckId, [person]);
  }
  return byTruck;
}
