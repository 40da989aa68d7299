/**
 * Person Repository Interface
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * Reads go through the `people` base table and come back as the variant the
 * row's `type` names.
 */
import type { Customer, Employee, NewEmployee, NewPerson, Person } from '@domain/entities/Person';
import type { Knex } from 'knex';

export interface IPersonRepository {
  createCustomer(input: NewPerson, trx?: Knex.Transaction): Promise<Customer>;

  createEmployee(input: NewEmployee, trx?: Knex.Transaction): Promise<Employee>;

  /** Throws NotFoundError on a miss. */
  findById(id: number): Promise<Person>;

  /** Missing ids are simply absent from the result. */
  findByIds(ids: readonly number[]): Promise<Person[]>;

  /** Staff of one truck, in insertion order. */
  findEmployeesByFoodTruck(foodTruckId: number): Promise<Employee[]>;
}
