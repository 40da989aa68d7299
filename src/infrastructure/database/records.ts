/**
 * Row Records — Validation and Mapping
 * Layer: Infrastructure (Database)
 *
 * Knex hands back untyped rows. Each read parses its rows through one of
 * these Zod schemas, then maps snake_case columns onto the camelCase domain
 * shape. This is the single place that conversion happens.
 *
 * The polymorphic mappers dispatch on the discriminator: a `taco_truck` row
 * becomes a TacoTruck, an `employee` row an Employee with its truck id.
 */
import { z } from 'zod/v4';

import { FOOD_TRUCK_TYPES, type FoodTruck } from '@domain/entities/FoodTruck';
import type { MenuItem } from '@domain/entities/MenuItem';
import type { Order } from '@domain/entities/Order';
import { PERSON_TYPES, type Person } from '@domain/entities/Person';

const id = z.number().int();

export const foodTruckRecord = z.object({
  id,
  type: z.enum(FOOD_TRUCK_TYPES),
  name: z.string(),
});

/** `people` left-joined to `employees`; `food_truck_id` is null for non-employees. */
export const personRecord = z.object({
  id,
  type: z.enum(PERSON_TYPES),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  food_truck_id: id.nullable(),
});

export const menuItemRecord = z.object({
  id,
  name: z.string(),
  price: z.number().int(),
  food_truck_id: id,
});

/** A menu item reached through the junction, tagged with the order it belongs to. */
export const linkedMenuItemRecord = menuItemRecord.extend({ order_id: id });

export const orderRecord = z.object({
  id,
  customer_id: id.nullable(),
  employee_id: id.nullable(),
});

export type FoodTruckRecord = z.infer<typeof foodTruckRecord>;
export type PersonRecord = z.infer<typeof personRecord>;
export type MenuItemRecord = z.infer<typeof menuItemRecord>;
export type OrderRecord = z.infer<typeof orderRecord>;

export function toFoodTruck(row: FoodTruckRecord): FoodTruck {
  switch (row.type) {
    case 'taco_truck':
      return { id: row.id, type: 'taco_truck', name: row.name };
    case 'food_truck':
      return { id: row.id, type: 'food_truck', name: row.name };
  }
}

export function toPerson(row: PersonRecord): Person {
  const base = { id: row.id, firstName: row.first_name, lastName: row.last_name };
  switch (row.type) {
    case 'employee':
      return { ...base, type: 'employee', foodTruckId: row.food_truck_id };
    case 'customer':
      return { ...base, type: 'customer' };
    case 'person':
      return { ...base, type: 'person' };
  }
}

export function toMenuItem(row: MenuItemRecord): MenuItem {
  return { id: row.id, name: row.name, price: row.price, foodTruckId: row.food_truck_id };
}

export function toOrder(row: OrderRecord): Order {
  return { id: row.id, customerId: row.customer_id, employeeId: row.employee_id };
}
