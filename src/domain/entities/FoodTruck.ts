/**
 * FoodTruck Entity — Polymorphic Base
 * Layer: Domain
 *
 * A food truck is stored as a base row in `food_trucks` plus, for each
 * specialization, a row in its own table sharing the same primary key:
 *
 *   food_trucks (id, type, name)  ──1:1──  taco_trucks (id)
 *
 * `type` is the discriminator. It picks the variant of the `FoodTruck`
 * union when a row is read back, so `findAll()` over the base table hands
 * back `TacoTruck` values where the tag says so.
 *
 * Relations are optional fields: `undefined` means "not loaded", never
 * "empty". A loaded truck with no menu yet has `menuItems: []`.
 */
import type { MenuItem, NewMenuItem } from './MenuItem';
import type { Employee, NewPerson } from './Person';

export const FOOD_TRUCK_TYPES = ['food_truck', 'taco_truck'] as const;

export type FoodTruckType = (typeof FOOD_TRUCK_TYPES)[number];

interface FoodTruckBase {
  id: number;
  name: string;
  menuItems?: MenuItem[];
  employees?: Employee[];
}

export interface PlainFoodTruck extends FoodTruckBase {
  type: 'food_truck';
}

export interface TacoTruck extends FoodTruckBase {
  type: 'taco_truck';
}

export type FoodTruck = PlainFoodTruck | TacoTruck;

/** A truck as returned from creation: both owned collections present. */
export type FoodTruckAggregate = FoodTruck & { menuItems: MenuItem[]; employees: Employee[] };

/** What a caller hands the repository to create a truck and everything it owns. */
export interface NewFoodTruck {
  type: FoodTruckType;
  name: string;
  menuItems?: Omit<NewMenuItem, 'foodTruckId'>[];
  employees?: NewPerson[];
}

export interface FoodTruckRow {
  type: FoodTruckType;
  name: string;
}
