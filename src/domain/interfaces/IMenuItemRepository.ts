/**
 * Menu Item Repository Interface
 * Layer: Domain
 * Pattern: Repository Pattern
 */
import type { MenuItem, NewMenuItem } from '@domain/entities/MenuItem';
import type { Knex } from 'knex';

export interface IMenuItemRepository {
  create(input: NewMenuItem, trx?: Knex.Transaction): Promise<MenuItem>;

  /** The truck's menu, in insertion order. */
  findByFoodTruck(foodTruckId: number): Promise<MenuItem[]>;

  /** Items linked to an order through the junction table. */
  findByOrder(orderId: number): Promise<MenuItem[]>;
}
