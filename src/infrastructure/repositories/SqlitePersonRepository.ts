/**
 * SQLite Person Repository
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IPersonRepository)
 *
 * Writes go to `people` first, then to the specialization table under the
 * same id. Called without a transaction, each create opens one, so a
 * `people` row never commits without its specialization row. Reads select from `people` left-joined to `employees` and let the
 * `type` column decide which variant each row becomes.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  type Customer,
  type Employee,
  type EmployeeRow,
  isEmployee,
  type NewEmployee,
  type NewPerson,
  type Person,
  type PersonRow,
} from '@domain/entities/Person';
import type { IPersonRepository } from '@domain/interfaces/IPersonRepository';
import { TABLES } from '@domain/schema/relations';
import { guardWrite } from '@infrastructure/database/errors';
import { personRecord, toPerson } from '@infrastructure/database/records';
import { selectPeople } from '@infrastructure/database/loaders';
import { NotFoundError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

@injectable()
export class SqlitePersonRepository implements IPersonRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async createCustomer(input: NewPerson, trx?: Knex.Transaction): Promise<Customer> {
    if (!trx) {
      return this.db.transaction((t) => this.createCustomer(input, t));
    }

    const id = await this.insertPerson(trx, 'customer', input);
    await guardWrite(() => trx(TABLES.customers).insert({ id }));

    this.log.debug({ id }, 'customer created');
    return {
      id,
      type: 'customer',
      firstName: input.firstName ?? null,
      lastName: input.lastName ?? null,
    };
  }

  async createEmployee(input: NewEmployee, trx?: Knex.Transaction): Promise<Employee> {
    if (!trx) {
      return this.db.transaction((t) => this.createEmployee(input, t));
    }

    const id = await this.insertPerson(trx, 'employee', input);
    const row: EmployeeRow = { id, food_truck_id: input.foodTruckId };
    await guardWrite(() => trx(TABLES.employees).insert(row));

    this.log.debug({ id, foodTruckId: input.foodTruckId }, 'employee created');
    return {
      id,
      type: 'employee',
      firstName: input.firstName ?? null,
      lastName: input.lastName ?? null,
      foodTruckId: input.foodTruckId,
    };
  }

  async findById(id: number): Promise<Person> {
    const row = await selectPeople(this.db).where(`${TABLES.people}.id`, id).first();
    if (!row) throw new NotFoundError('Person', id);
    return toPerson(personRecord.parse(row));
  }

  async findByIds(ids: readonly number[]): Promise<Person[]> {
    if (ids.length === 0) return [];
    const rows = await selectPeople(this.db).whereIn(`${TABLES.people}.id`, [...ids]);
    return personRecord.array().parse(rows).map(toPerson);
  }

  async findEmployeesByFoodTruck(foodTruckId: number): Promise<Employee[]> {
    const rows = await selectPeople(this.db).where(
      `${TABLES.employees}.food_truck_id`,
      foodTruckId,
    );
    return personRecord.array().parse(rows).map(toPerson).filter(isEmployee);
  }

  private async insertPerson(
    trx: Knex.Transaction,
    type: PersonRow['type'],
    input: NewPerson,
  ): Promise<number> {
    const row: PersonRow = {
      type,
      first_name: input.firstName ?? null,
      last_name: input.lastName ?? null,
    };
    const [id] = await guardWrite(() => trx(TABLES.people).insert(row));
    return id;
  }
}
