/**
 * Person Entity — Employees and Customers
 * Layer: Domain
 *
 * Same joined-table layout as FoodTruck: every person has a `people` row
 * and each specialization adds its own row keyed by the same id.
 *
 *   people (id, type, first_name, last_name)
 *     ├── employees (id, food_truck_id)
 *     └── customers (id)
 *
 * Both name parts are optional. `displayName()` renders "last, first" with
 * "NA" standing in for whatever is missing.
 */
import type { FoodTruck } from './FoodTruck';
import type { Order } from './Order';

export const PERSON_TYPES = ['person', 'employee', 'customer'] as const;

export type PersonType = (typeof PERSON_TYPES)[number];

interface PersonBase {
  id: number;
  firstName: string | null;
  lastName: string | null;
}

export interface PlainPerson extends PersonBase {
  type: 'person';
}

export interface Employee extends PersonBase {
  type: 'employee';
  foodTruckId: number | null;
  foodTruck?: FoodTruck | null;
  ordersServed?: Order[];
}

export interface Customer extends PersonBase {
  type: 'customer';
  ordersRequested?: Order[];
}

export type Person = PlainPerson | Employee | Customer;

export interface NewPerson {
  firstName?: string | null;
  lastName?: string | null;
}

export interface NewEmployee extends NewPerson {
  foodTruckId: number | null;
}

export interface PersonRow {
  type: PersonType;
  first_name: string | null;
  last_name: string | null;
}

export interface EmployeeRow {
  id: number;
  food_truck_id: number | null;
}

export function displayName(person: Pick<PersonBase, 'firstName' | 'lastName'>): string {
  return `${person.lastName || 'NA'}, ${person.firstName || 'NA'}`;
}

export function isEmployee(person: Person): person is Employee {
  return person.type === 'employee';
}

export function isCustomer(person: Person): person is Customer {
  return person.type === 'customer';
}
