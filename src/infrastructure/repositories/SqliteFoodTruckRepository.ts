/**
 * SQLite Food Truck Repository
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IFoodTruckRepository)
 *
 * `create()` writes the whole aggregate: the `food_trucks` row, a
 * `taco_trucks` row under the same id when the discriminator asks for one,
 * then each menu item and employee through their own repositories. Called
 * without a transaction it opens one, so a half-written truck never
 * commits.
 *
 * Reads return the variant the `type` column names and can prefetch the
 * truck's menu and staff in one batched lookup each.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type {
  FoodTruck,
  FoodTruckAggregate,
  FoodTruckRow,
  NewFoodTruck,
} from '@domain/entities/FoodTruck';
import type { MenuItem } from '@domain/entities/MenuItem';
import type { Employee } from '@domain/entities/Person';
import type {
  FoodTruckInclude,
  IFoodTruckRepository,
} from '@domain/interfaces/IFoodTruckRepository';
import type { IMenuItemRepository } from '@domain/interfaces/IMenuItemRepository';
import type { IPersonRepository } from '@domain/interfaces/IPersonRepository';
import { TABLES } from '@domain/schema/relations';
import { guardWrite } from '@infrastructure/database/errors';
import {
  EntityCache,
  intern,
  loadEmployeesByFoodTruck,
  loadMenuItemsByFoodTruck,
  selectFoodTrucks,
} from '@infrastructure/database/loaders';
import { foodTruckRecord, toFoodTruck } from '@infrastructure/database/records';
import { NotFoundError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

@injectable()
export class SqliteFoodTruckRepository implements IFoodTruckRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.MenuItemRepository) private menuItems: IMenuItemRepository,
    @inject(TOKENS.PersonRepository) private people: IPersonRepository,
  ) {}

  async create(input: NewFoodTruck, trx?: Knex.Transaction): Promise<FoodTruckAggregate> {
    if (!trx) {
      return this.db.transaction((t) => this.create(input, t));
    }

    const row: FoodTruckRow = { type: input.type, name: input.name };
    const [id] = await guardWrite(() => trx(TABLES.foodTrucks).insert(row));
    if (input.type === 'taco_truck') {
      await guardWrite(() => trx(TABLES.tacoTrucks).insert({ id }));
    }

    const menuItems: MenuItem[] = [];
    for (const item of input.menuItems ?? []) {
      menuItems.push(await this.menuItems.create({ ...item, foodTruckId: id }, trx));
    }

    const employees: Employee[] = [];
    for (const person of input.employees ?? []) {
      employees.push(await this.people.createEmployee({ ...person, foodTruckId: id }, trx));
    }

    this.log.debug(
      { id, type: input.type, menuItems: menuItems.length, employees: employees.length },
      'food truck created',
    );

    return { ...toFoodTruck({ id, type: input.type, name: input.name }), menuItems, employees };
  }

  async findById(id: number, include: readonly FoodTruckInclude[] = []): Promise<FoodTruck> {
    const rows = await selectFoodTrucks(this.db).where(`${TABLES.foodTrucks}.id`, id);
    const [truck] = await this.hydrate(rows, include);
    if (!truck) throw new NotFoundError('FoodTruck', id);
    return truck;
  }

  async findByName(
    name: string,
    include: readonly FoodTruckInclude[] = [],
  ): Promise<FoodTruck | null> {
    const rows = await selectFoodTrucks(this.db).where(`${TABLES.foodTrucks}.name`, name);
    const [truck] = await this.hydrate(rows, include);
    return truck ?? null;
  }

  async findAll(include: readonly FoodTruckInclude[] = []): Promise<FoodTruck[]> {
    return this.hydrate(await selectFoodTrucks(this.db), include);
  }

  /** Maps base rows to trucks, then attaches the requested collections. */
  private async hydrate(
    rows: unknown,
    include: readonly FoodTruckInclude[],
  ): Promise<FoodTruck[]> {
    const cache = new EntityCache();
    const trucks = foodTruckRecord
      .array()
      .parse(rows)
      .map((row) => intern(cache.foodTrucks, toFoodTruck(row)));
    const ids = trucks.map((t) => t.id);

    if (include.includes('menuItems')) {
      const byTruck = await loadMenuItemsByFoodTruck(this.db, ids, cache);
      for (const truck of trucks) truck.menuItems = byTruck.get(truck.id) ?? [];
    }

    if (include.includes('employees')) {
      const byTruck = await loadEmployeesByFoodTruck(this.db, ids, cache);
      for (const truck of trucks) truck.employees = byTruck.get(truck.id) ?? [];
    }

    return trucks;
  }
}
