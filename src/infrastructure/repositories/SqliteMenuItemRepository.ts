/**
 * SQLite Menu Item Repository
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements IMenuItemRepository)
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { MenuItem, MenuItemRow, NewMenuItem } from '@domain/entities/MenuItem';
import type { IMenuItemRepository } from '@domain/interfaces/IMenuItemRepository';
import { TABLES } from '@domain/schema/relations';
import { guardWrite } from '@infrastructure/database/errors';
import { menuItemRecord, toMenuItem } from '@infrastructure/database/records';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

const COLUMNS = ['id', 'name', 'price', 'food_truck_id'].map((c) => `${TABLES.menuItems}.${c}`);

@injectable()
export class SqliteMenuItemRepository implements IMenuItemRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async create(input: NewMenuItem, trx?: Knex.Transaction): Promise<MenuItem> {
    const db = trx ?? this.db;
    const row: MenuItemRow = {
      name: input.name,
      price: input.price,
      food_truck_id: input.foodTruckId,
    };

    const [id] = await guardWrite(() => db(TABLES.menuItems).insert(row));

    this.log.debug({ id, foodTruckId: input.foodTruckId }, 'menu item created');
    return { id, name: input.name, price: input.price, foodTruckId: input.foodTruckId };
  }

  async findByFoodTruck(foodTruckId: number): Promise<MenuItem[]> {
    const rows = await this.db(TABLES.menuItems)
      .where('food_truck_id', foodTruckId)
      .select(COLUMNS)
      .orderBy('id');
    return menuItemRecord.array().parse(rows).map(toMenuItem);
  }

  async findByOrder(orderId: number): Promise<MenuItem[]> {
    const rows = await this.db(TABLES.menuItems)
      .join(
        TABLES.menuItemOrders,
        `${TABLES.menuItemOrders}.menu_item_id`,
        `${TABLES.menuItems}.id`,
      )
      .where(`${TABLES.menuItemOrders}.order_id`, orderId)
      .select(COLUMNS)
      .orderBy(`${TABLES.menuItems}.id`);
    return menuItemRecord.array().parse(rows).map(toMenuItem);
  }
}
