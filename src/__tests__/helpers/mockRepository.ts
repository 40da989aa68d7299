/**
 * Mock Repository Factories
 * Layer: Test Helpers
 *
 * Each factory returns an object whose methods are all `jest.fn()`, shaped
 * like the repository interface, so a service can be tested without a
 * store. A fresh set per call keeps call counts from leaking between tests.
 *
 * Usage:
 *   const people = createMockPersonRepository();
 *   people.createCustomer.mockResolvedValue(customer);
 */
import type { IFoodTruckRepository } from '@domain/interfaces/IFoodTruckRepository';
import type { IOrderRepository } from '@domain/interfaces/IOrderRepository';
import type { IPersonRepository } from '@domain/interfaces/IPersonRepository';

export type MockFoodTruckRepository = jest.Mocked<IFoodTruckRepository>;
export type MockPersonRepository = jest.Mocked<IPersonRepository>;
export type MockOrderRepository = jest.Mocked<IOrderRepository>;

export function createMockFoodTruckRepository(): MockFoodTruckRepository {
  return {
    create: jest.fn(),
    findById: jest.fn(),
    findByName: jest.fn(),
    findAll: jest.fn(),
  };
}

export function createMockPersonRepository(): MockPersonRepository {
  return {
    createCustomer: jest.fn(),
    createEmployee: jest.fn(),
    findById: jest.fn(),
    findByIds: jest.fn(),
    findEmployeesByFoodTruck: jest.fn(),
  };
}

export function createMockOrderRepository(): MockOrderRepository {
  return {
    create: jest.fn(),
    toQuery: jest.fn(),
    findByPlan: jest.fn(),
    findByCustomer: jest.fn(),
    findByEmployee: jest.fn(),
    findByMenuItem: jest.fn(),
  };
}
