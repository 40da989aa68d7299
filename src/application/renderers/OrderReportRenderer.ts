/**
 * Order Report Renderer
 * Layer: Application
 *
 * Flattens query results into one row per (order, menu item):
 *
 *   customer display name, item name, item price, serving employee's truck
 *   name, that truck's type tag
 *
 * Rows follow the order the store returned. Lines are the row fields joined
 * by a single space.
 *
 * Missing relations:
 *   - never eager-loaded (`undefined`): always RelationshipAbsentError.
 *   - loaded but empty (`null`), e.g. an order with no employee or an
 *     employee with no truck: rendered as `-` by default, or
 *     RelationshipAbsentError with `{ missing: 'strict' }`.
 */
import type { FoodTruckType } from '@domain/entities/FoodTruck';
import type { Order } from '@domain/entities/Order';
import { displayName } from '@domain/entities/Person';
import { RelationshipAbsentError } from '@shared/errors/AppError';
import { injectable } from 'tsyringe';

export const PLACEHOLDER = '-';

export interface OrderReportRow {
  orderId: number;
  customerName: string;
  menuItemName: string;
  price: number;
  foodTruckName: string;
  foodTruckType: FoodTruckType | typeof PLACEHOLDER;
}

export interface RenderOptions {
  missing?: 'placeholder' | 'strict';
}

@injectable()
export class OrderReportRenderer {
  rows(orders: readonly Order[], options: RenderOptions = {}): OrderReportRow[] {
    const strict = options.missing === 'strict';
    const out: OrderReportRow[] = [];

    for (const order of orders) {
      const menuItems = required(order.menuItems, 'Order', 'menuItems', order.id);
      const customer = optional(order.customer, strict, 'Order', 'customer', order.id);
      const employee = optional(order.employee, strict, 'Order', 'employee', order.id);
      const truck = employee
        ? optional(employee.foodTruck, strict, 'Employee', 'foodTruck', employee.id)
        : null;

      for (const item of menuItems) {
        out.push({
          orderId: order.id,
          customerName: customer ? displayName(customer) : PLACEHOLDER,
          menuItemName: item.name,
          price: item.price,
          foodTruckName: truck ? truck.name : PLACEHOLDER,
          foodTruckType: truck ? truck.type : PLACEHOLDER,
        });
      }
    }

    return out;
  }

  render(orders: readonly Order[], options: RenderOptions = {}): string[] {
    return this.rows(orders, options).map(toLine);
  }
}

function toLine(row: OrderReportRow): string {
  const { customerName, menuItemName, price, foodTruckName, foodTruckType } = row;
  return [customerName, menuItemName, price, foodTruckName, foodTruckType].join(' ');
}

function required<T>(value: T | undefined, entity: string, relation: string, id: number): T {
  if (value === undefined) throw new RelationshipAbsentError(entity, relation, id, 'not_loaded');
  return value;
}

function optional<T>(
  value: T | null | undefined,
  strict: boolean,
  entity: string,
  relation: string,
  id: number,
): T | null {
  if (value === undefined) throw new RelationshipAbsentError(entity, relation, id, 'not_loaded');
  if (value === null && strict) throw new RelationshipAbsentError(entity, relation, id, 'null');
  return value;
}
