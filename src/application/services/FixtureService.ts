/**
 * Fixture Service — Demo Dataset
 * Layer: Application
 *
 * Populates the store with one small dataset that touches every relation:
 *
 *   Hell's Chariot (taco_truck)
 *     menu:   Super Burrito 1000, California Burrito 700, Shrimp Burrito 800
 *     staff:  Danny Zuko, Sandra Dee
 *   Frenchy (customer, first name only)
 *   order 1: Super Burrito + California Burrito, served by Zuko
 *   order 2: California Burrito, served by Dee
 *
 * Three commits, one per logical unit: the truck with its menu and staff,
 * then the customer, then both orders. A failure inside a unit rolls back
 * that unit only; earlier commits stay. Nothing here catches: a
 * ConstraintViolationError (e.g. populating twice) reaches the caller.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { FoodTruckAggregate, NewFoodTruck } from '@domain/entities/FoodTruck';
import type { Order } from '@domain/entities/Order';
import type { Customer, NewPerson } from '@domain/entities/Person';
import type { IFoodTruckRepository } from '@domain/interfaces/IFoodTruckRepository';
import type { IOrderRepository } from '@domain/interfaces/IOrderRepository';
import type { IPersonRepository } from '@domain/interfaces/IPersonRepository';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

export const DEMO_FOOD_TRUCK: NewFoodTruck = {
  type: 'taco_truck',
  name: "Hell's Chariot",
  menuItems: [
    { name: 'Super Burrito', price: 10_00 },
    { name: 'California Burrito', price: 7_00 },
    { name: 'Shrimp Burrito', price: 8_00 },
  ],
  employees: [
    { firstName: 'Danny', lastName: 'Zuko' },
    { firstName: 'Sandra', lastName: 'Dee' },
  ],
};

export const DEMO_CUSTOMER: NewPerson = { firstName: 'Frenchy' };

export interface FixtureData {
  foodTruck: FoodTruckAggregate;
  customer: Customer;
  orders: Order[];
}

@injectable()
export class FixtureService {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
    @inject(TOKENS.FoodTruckRepository) private trucks: IFoodTruckRepository,
    @inject(TOKENS.PersonRepository) private people: IPersonRepository,
    @inject(TOKENS.OrderRepository) private orders: IOrderRepository,
  ) {}

  async populate(): Promise<FixtureData> {
    const foodTruck = await this.db.transaction((trx) => this.trucks.create(DEMO_FOOD_TRUCK, trx));
    this.log.info(
      {
        foodTruckId: foodTruck.id,
        menuItems: foodTruck.menuItems.length,
        employees: foodTruck.employees.length,
      },
      'Committed food truck',
    );

    const customer = await this.db.transaction((trx) =>
      this.people.createCustomer(DEMO_CUSTOMER, trx),
    );
    this.log.info({ customerId: customer.id }, 'Committed customer');

    const [superBurrito, californiaBurrito] = foodTruck.menuItems;
    const [zuko, dee] = foodTruck.employees;

    const orders = await this.db.transaction(async (trx) => [
      await this.orders.create(
        {
          customerId: customer.id,
          employeeId: zuko.id,
          menuItemIds: [superBurrito.id, californiaBurrito.id],
        },
        trx,
      ),
      await this.orders.create(
        { customerId: customer.id, employeeId: dee.id, menuItemIds: [californiaBurrito.id] },
        trx,
      ),
    ]);
    this.log.info({ orderIds: orders.map((o) => o.id) }, 'Committed orders');

    return { foodTruck, customer, orders };
  }
}
