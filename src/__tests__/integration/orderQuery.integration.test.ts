/**
 * Integration Tests — Order query pipeline
 *
 * Fixture → composer → repository → renderer against an in-memory store
 * holding the demo dataset:
 *
 *   truck 1 Hell's Chariot; items 1 Super 1000, 2 California 700, 3 Shrimp 800
 *   people 1 Zuko, 2 Dee (employees), 3 Frenchy (customer)
 *   order 1 = items [1, 2] by Zuko, order 2 = item [2] by Dee
 */
import { OrderQueryComposer } from '@application/queries/OrderQueryComposer';
import { OrderReportRenderer } from '@application/renderers/OrderReportRenderer';
import { SqlPrettyPrinter } from '@interfaces/cli/SqlPrettyPrinter';
import { ConstraintViolationError } from '@shared/errors/AppError';

import { createTestStore, type TestStore } from '../helpers/store';

describe('Order query pipeline (integration)', () => {
  let store: TestStore;
  const composer = new OrderQueryComposer();
  const renderer = new OrderReportRenderer();

  beforeEach(async () => {
    store = await createTestStore();
    await store.fixtures.populate();
  });

  afterEach(async () => {
    await store.destroy();
  });

  describe('orders with an item at 700', () => {
    it('should render every item of each matching order', async () => {
      const orders = await store.orders.findByPlan(composer.forMenuItemPrice(700));

      expect(renderer.render(orders)).toEqual([
        "NA, Frenchy Super Burrito 1000 Hell's Chariot taco_truck",
        "NA, Frenchy California Burrito 700 Hell's Chariot taco_truck",
        "NA, Frenchy California Burrito 700 Hell's Chariot taco_truck",
      ]);
    });

    it('should return each matching order once', async () => {
      const orders = await store.orders.findByPlan(composer.forMenuItemPrice(700));

      expect(orders.map((o) => o.id)).toEqual([1, 2]);
    });

    it('should share one object per row across the result', async () => {
      const [first, second] = await store.orders.findByPlan(composer.forMenuItemPrice(700));

      expect(first.menuItems?.[1]).toBe(second.menuItems?.[0]);
      expect(first.customer).toBe(second.customer);
      expect(first.employee?.foodTruck).toBe(second.employee?.foodTruck);
      expect(first.employee).not.toBe(second.employee);
    });

    it("should match the items read through the truck's menu", async () => {
      const [first] = await store.orders.findByPlan(composer.forMenuItemPrice(700));
      const truck = await store.foodTrucks.findById(1, ['menuItems']);

      expect(first.menuItems).toEqual(truck.menuItems?.slice(0, 2));
    });

    it('should give the same report when run again', async () => {
      const plan = composer.forMenuItemPrice(700);

      const once = renderer.render(await store.orders.findByPlan(plan));
      const twice = renderer.render(await store.orders.findByPlan(plan));

      expect(twice).toEqual(once);
    });
  });

  it('should narrow to the one order holding the 1000 item', async () => {
    const orders = await store.orders.findByPlan(composer.forMenuItemPrice(1000));

    expect(renderer.render(orders)).toEqual([
      "NA, Frenchy Super Burrito 1000 Hell's Chariot taco_truck",
      "NA, Frenchy California Burrito 700 Hell's Chariot taco_truck",
    ]);
  });

  it('should return nothing when no item has the price', async () => {
    const orders = await store.orders.findByPlan(composer.forMenuItemPrice(999));

    expect(orders).toEqual([]);
    expect(renderer.render(orders)).toEqual([]);
  });

  it('should restrict on a joined person name', async () => {
    const plan = composer.create().join('employee').where('employee', 'lastName', 'Dee').build();

    const orders = await store.orders.findByPlan(plan);

    expect(orders).toEqual([{ id: 2, customerId: 3, employeeId: 2 }]);
  });

  it('should restrict on the employee truck type', async () => {
    const plan = composer
      .create()
      .join('employee')
      .join('employee.foodTruck')
      .where('employee.foodTruck', 'type', 'food_truck')
      .build();

    await expect(store.orders.findByPlan(plan)).resolves.toEqual([]);
  });

  it('should leave relations outside the eager set unloaded', async () => {
    const plan = composer
      .create()
      .join('customer')
      .where('customer', 'firstName', 'Frenchy')
      .eager('menuItems')
      .build();

    const orders = await store.orders.findByPlan(plan);

    expect(orders.map((o) => o.id)).toEqual([1, 2]);
    expect(orders[0].customer).toBeUndefined();
    expect(() => renderer.render(orders)).toThrow('Order#1.customer was not eager-loaded');
  });

  it('should render placeholders for an order nobody served', async () => {
    await store.orders.create({ customerId: 3, employeeId: null, menuItemIds: [3] });
    const plan = composer
      .create()
      .where('order', 'employeeId', null)
      .eager('menuItems', 'customer', 'employee.foodTruck')
      .build();

    const orders = await store.orders.findByPlan(plan);

    expect(orders.map((o) => o.employee)).toEqual([null]);
    expect(renderer.render(orders)).toEqual(['NA, Frenchy Shrimp Burrito 800 - -']);
  });

  describe('toQuery', () => {
    it('should bind the price and join through the junction table', () => {
      const { sql, bindings } = store.orders.toQuery(composer.forMenuItemPrice(700)).toSQL();

      expect(bindings).toEqual([700]);
      expect(sql).toContain(
        'select distinct `orders`.`id`, `orders`.`customer_id`, `orders`.`employee_id` from `orders`',
      );
      expect(sql).toContain(
        'inner join `menu_item_orders` on `menu_item_orders`.`order_id` = `orders`.`id`',
      );
      expect(sql).toContain(
        'inner join `menu_items` on `menu_item_orders`.`menu_item_id` = `menu_items`.`id`',
      );
      expect(sql).toContain(
        'inner join `food_trucks` on `menu_items`.`food_truck_id` = `food_trucks`.`id`',
      );
      expect(sql).toContain('where `menu_items`.`price` = ?');
    });

    it('should alias a second join of the same table', () => {
      const plan = composer.create().join('employee').join('employee.foodTruck').build();

      const { sql } = store.orders.toQuery(plan).toSQL();

      expect(sql).toContain('inner join `people` as `employee_people`');
      expect(sql).toContain('inner join `food_trucks` as `employee_food_trucks`');
    });

    it('should not add eager paths to the primary query', () => {
      const plan = composer.create().eager('menuItems', 'customer').build();

      expect(store.orders.toQuery(plan).toSQL().sql).not.toContain('join');
    });

    it('should print as formatted SQL without executing', () => {
      const printer = new SqlPrettyPrinter({ highlight: false });
      const query = store.db('orders').select('id').where('id', 1);

      expect(printer.format(query).split('\n')).toEqual([
        'SELECT',
        '  `id`',
        'FROM',
        '  `orders`',
        'WHERE',
        '  `id` = 1',
      ]);
    });
  });

  describe('fixture', () => {
    it('should commit in three transactions', async () => {
      const fresh = await createTestStore();
      const transaction = jest.spyOn(fresh.db, 'transaction');

      try {
        await fresh.fixtures.populate();
        expect(transaction).toHaveBeenCalledTimes(3);
      } finally {
        await fresh.destroy();
      }
    });

    it('should refuse to populate twice', async () => {
      await expect(store.fixtures.populate()).rejects.toHaveProperty('constraint', 'unique');
      await expect(store.fixtures.populate()).rejects.toBeInstanceOf(ConstraintViolationError);
    });
  });
});
