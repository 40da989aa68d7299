/**
 * Food Truck Repository Interface
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * Creation writes the whole aggregate: the base row, the specialization row
 * the discriminator calls for, the menu and the staff. Reads are polymorphic
 * and can prefetch the two owned collections.
 *
 * Every write accepts an optional transaction so a caller can group several
 * writes under one commit.
 */
import type { FoodTruck, FoodTruckAggregate, NewFoodTruck } from '@domain/entities/FoodTruck';
import type { Knex } from 'knex';

export type FoodTruckInclude = 'menuItems' | 'employees';

export interface IFoodTruckRepository {
  create(input: NewFoodTruck, trx?: Knex.Transaction): Promise<FoodTruckAggregate>;

  /** Throws NotFoundError when no truck has this id. */
  findById(id: number, include?: readonly FoodTruckInclude[]): Promise<FoodTruck>;

  /** Names are unique, so at most one truck matches. */
  findByName(name: string, include?: readonly FoodTruckInclude[]): Promise<FoodTruck | null>;

  findAll(include?: readonly FoodTruckInclude[]): Promise<FoodTruck[]>;
}
