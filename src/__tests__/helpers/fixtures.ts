/**
 * Test Fixtures — Reusable Sample Data
 * Layer: Test Helpers
 *
 * Hand-built domain objects for tests that never touch the store. Each
 * factory returns fresh objects so a test can null out a relation without
 * leaking into the next one.
 */
import type { TacoTruck } from '@domain/entities/FoodTruck';
import type { MenuItem } from '@domain/entities/MenuItem';
import type { Order } from '@domain/entities/Order';
import type { Customer, Employee } from '@domain/entities/Person';

export function sampleTruck(): TacoTruck {
  return { id: 1, type: 'taco_truck', name: 'Test Truck' };
}

export function sampleMenuItems(): MenuItem[] {
  return [
    { id: 1, name: 'Bean Taco', price: 450, foodTruckId: 1 },
    { id: 2, name: 'Fish Taco', price: 600, foodTruckId: 1 },
  ];
}

export function sampleCustomer(): Customer {
  return { id: 3, type: 'customer', firstName: 'Ada', lastName: 'Tester' };
}

export function sampleEmployee(): Employee {
  const foodTruck = sampleTruck();
  return {
    id: 2,
    type: 'employee',
    firstName: 'Sam',
    lastName: 'Cook',
    foodTruckId: foodTruck.id,
    foodTruck,
  };
}

/** An order with every relation the renderer reads already loaded. */
export function sampleOrder(): Order {
  const customer = sampleCustomer();
  const employee = sampleEmployee();
  return {
    id: 10,
    customerId: customer.id,
    employeeId: employee.id,
    menuItems: sampleMenuItems(),
    customer,
    employee,
  };
}
