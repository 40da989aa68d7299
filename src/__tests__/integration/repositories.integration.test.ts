/**
 * Integration Tests — Schema and Repositories
 *
 * Runs against a real in-memory SQLite store, migrated fresh for each test.
 * Covers polymorphic reads, the back-reference lookups, and the store's
 * constraints surfacing as ConstraintViolationError.
 */
import { logger } from '@core/logger';
import { migrateToLatest } from '@infrastructure/database/schema';
import { ConstraintViolationError, NotFoundError } from '@shared/errors/AppError';

import { createTestStore, type TestStore } from '../helpers/store';

describe('Schema and repositories (integration)', () => {
  let store: TestStore;

  beforeEach(async () => {
    store = await createTestStore();
  });

  afterEach(async () => {
    await store.destroy();
  });

  describe('schema', () => {
    it('should be a no-op when migrated twice', async () => {
      await expect(migrateToLatest(store.db)).resolves.toEqual([]);
    });

    it('should echo each executed statement at debug', async () => {
      const debug = jest.spyOn(logger, 'debug');

      try {
        await store.db.raw('select 1 as one');

        expect(debug).toHaveBeenCalledWith(
          expect.objectContaining({ sql: 'select 1 as one' }),
          'query',
        );
      } finally {
        debug.mockRestore();
      }
    });

    it('should enforce foreign keys on the connection', async () => {
      const [{ foreign_keys }] = await store.db.raw('PRAGMA foreign_keys');

      expect(foreign_keys).toBe(1);
    });
  });

  describe('food trucks', () => {
    it('should write the base row and the taco truck row under one id', async () => {
      const truck = await store.foodTrucks.create({ type: 'taco_truck', name: 'Test Tacos' });

      expect(truck).toEqual({
        id: 1,
        type: 'taco_truck',
        name: 'Test Tacos',
        menuItems: [],
        employees: [],
      });
      await expect(store.db('taco_trucks').select('id')).resolves.toEqual([{ id: 1 }]);
    });

    it('should not write a specialization row for a plain truck', async () => {
      await store.foodTrucks.create({ type: 'food_truck', name: 'Test Grill' });

      await expect(store.db('taco_trucks').select('id')).resolves.toEqual([]);
    });

    it('should create the menu and staff with the truck', async () => {
      const truck = await store.foodTrucks.create({
        type: 'taco_truck',
        name: 'Test Tacos',
        menuItems: [
          { name: 'Bean Taco', price: 450 },
          { name: 'Fish Taco', price: 600 },
        ],
        employees: [{ firstName: 'Sam', lastName: 'Cook' }, { firstName: 'Alex' }],
      });

      expect(truck.menuItems.map((m) => [m.id, m.foodTruckId])).toEqual([
        [1, 1],
        [2, 1],
      ]);
      expect(truck.employees).toEqual([
        { id: 1, type: 'employee', firstName: 'Sam', lastName: 'Cook', foodTruckId: 1 },
        { id: 2, type: 'employee', firstName: 'Alex', lastName: null, foodTruckId: 1 },
      ]);
    });

    it('should read back the variant each row is tagged with', async () => {
      await store.foodTrucks.create({ type: 'taco_truck', name: 'Test Tacos' });
      await store.foodTrucks.create({ type: 'food_truck', name: 'Test Grill' });

      const trucks = await store.foodTrucks.findAll();

      expect(trucks.map((t) => [t.name, t.type])).toEqual([
        ['Test Tacos', 'taco_truck'],
        ['Test Grill', 'food_truck'],
      ]);
    });

    it('should leave collections unloaded unless included', async () => {
      const { id } = await store.foodTrucks.create({
        type: 'food_truck',
        name: 'Test Grill',
        menuItems: [{ name: 'Burger', price: 900 }],
      });

      const bare = await store.foodTrucks.findById(id);
      const full = await store.foodTrucks.findById(id, ['menuItems', 'employees']);

      expect(bare.menuItems).toBeUndefined();
      expect(bare.employees).toBeUndefined();
      expect(full.menuItems?.map((m) => m.name)).toEqual(['Burger']);
      expect(full.employees).toEqual([]);
    });

    it('should find by name or return null', async () => {
      await store.foodTrucks.create({ type: 'food_truck', name: 'Test Grill' });

      await expect(store.foodTrucks.findByName('Test Grill')).resolves.toMatchObject({ id: 1 });
      await expect(store.foodTrucks.findByName('Nobody')).resolves.toBeNull();
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(store.foodTrucks.findById(99)).rejects.toThrow(
        new NotFoundError('FoodTruck', 99),
      );
    });

    it('should reject a duplicate name and roll the whole truck back', async () => {
      await store.foodTrucks.create({ type: 'taco_truck', name: 'Test Tacos' });

      const duplicate = store.foodTrucks.create({
        type: 'taco_truck',
        name: 'Test Tacos',
        menuItems: [{ name: 'Bean Taco', price: 450 }],
      });

      await expect(duplicate).rejects.toBeInstanceOf(ConstraintViolationError);
      await expect(duplicate).rejects.toHaveProperty('constraint', 'unique');
      await expect(store.db('food_trucks').count({ n: '*' })).resolves.toEqual([{ n: 1 }]);
      await expect(store.db('menu_items').count({ n: '*' })).resolves.toEqual([{ n: 0 }]);
    });
  });

  describe('menu items', () => {
    it('should reject an item for a truck that does not exist', async () => {
      const write = store.menuItems.create({ name: 'Ghost Taco', price: 100, foodTruckId: 999 });

      await expect(write).rejects.toHaveProperty('constraint', 'foreign_key');
    });
  });

  describe('people', () => {
    it('should read each person back as their own variant', async () => {
      const { id: truckId } = await store.foodTrucks.create({
        type: 'food_truck',
        name: 'Test Grill',
      });
      const employee = await store.people.createEmployee({
        firstName: 'Sam',
        foodTruckId: truckId,
      });
      const customer = await store.people.createCustomer({ lastName: 'Tester' });

      await expect(store.people.findById(employee.id)).resolves.toEqual({
        id: employee.id,
        type: 'employee',
        firstName: 'Sam',
        lastName: null,
        foodTruckId: truckId,
      });
      await expect(store.people.findById(customer.id)).resolves.toEqual({
        id: customer.id,
        type: 'customer',
        firstName: null,
        lastName: 'Tester',
      });
    });

    it('should allow an employee with no truck', async () => {
      const employee = await store.people.createEmployee({ firstName: 'Sam', foodTruckId: null });

      const found = await store.people.findById(employee.id);

      expect(found).toHaveProperty('foodTruckId', null);
    });

    it('should roll back the people row when the employee row is rejected', async () => {
      const write = store.people.createEmployee({ firstName: 'Sam', foodTruckId: 999 });

      await expect(write).rejects.toHaveProperty('constraint', 'foreign_key');
      await expect(store.db('people').select('id')).resolves.toEqual([]);
      await expect(store.people.findByIds([1])).resolves.toEqual([]);
    });

    it('should write a customer as one unit', async () => {
      const customer = await store.people.createCustomer({ firstName: 'Ada' });

      await expect(store.db('customers').select('id')).resolves.toEqual([{ id: customer.id }]);
      await expect(store.db('people').count({ n: '*' })).resolves.toEqual([{ n: 1 }]);
    });

    it('should return only the ids that exist, in id order', async () => {
      const a = await store.people.createCustomer({ firstName: 'A' });
      const b = await store.people.createCustomer({ firstName: 'B' });

      const found = await store.people.findByIds([b.id, 999, a.id]);

      expect(found.map((p) => p.id)).toEqual([a.id, b.id]);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(store.people.findById(42)).rejects.toThrow('Person not found: 42');
    });
  });

  describe('orders and back-references', () => {
    beforeEach(async () => {
      await store.fixtures.populate();
    });

    it("should list a truck's staff", async () => {
      const staff = await store.people.findEmployeesByFoodTruck(1);

      expect(staff.map((e) => e.lastName)).toEqual(['Zuko', 'Dee']);
    });

    it("should list a truck's menu", async () => {
      const menu = await store.menuItems.findByFoodTruck(1);

      expect(menu.map((m) => [m.name, m.price])).toEqual([
        ['Super Burrito', 1000],
        ['California Burrito', 700],
        ['Shrimp Burrito', 800],
      ]);
    });

    it('should follow the junction table in both directions', async () => {
      const items = await store.menuItems.findByOrder(1);
      const orders = await store.orders.findByMenuItem(2);

      expect(items.map((m) => m.name)).toEqual(['Super Burrito', 'California Burrito']);
      expect(orders.map((o) => o.id)).toEqual([1, 2]);
    });

    it('should list orders by customer and by employee', async () => {
      const requested = await store.orders.findByCustomer(3);
      const servedByDee = await store.orders.findByEmployee(2);

      expect(requested.map((o) => o.id)).toEqual([1, 2]);
      expect(servedByDee).toEqual([{ id: 2, customerId: 3, employeeId: 2 }]);
    });

    it('should reject a link to a missing menu item and roll the order back', async () => {
      const write = store.orders.create({ customerId: 3, employeeId: 1, menuItemIds: [999] });

      await expect(write).rejects.toHaveProperty('constraint', 'foreign_key');
      await expect(store.orders.findByCustomer(3)).resolves.toHaveLength(2);
    });

    it('should reject the same item twice on one order', async () => {
      const write = store.orders.create({ customerId: 3, employeeId: 1, menuItemIds: [1, 1] });

      await expect(write).rejects.toHaveProperty('constraint', 'unique');
    });

    it('should drop the links when an order is deleted', async () => {
      await store.db('orders').where('id', 1).del();

      await expect(store.db('menu_item_orders').where('order_id', 1)).resolves.toEqual([]);
      await expect(store.menuItems.findByOrder(2)).resolves.toHaveLength(1);
    });
  });
});
