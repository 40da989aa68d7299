/**
 * Order Entity
 * Layer: Domain
 *
 * An order references one employee and one customer (both optional) and any
 * number of menu items. It owns none of them. The items are not required to
 * come from the employee's truck.
 *
 *   orders (1) ──< menu_item_orders >── (1) menu_items
 *
 * `menu_item_orders` is a pure junction: composite key, no id, and it
 * cascades away with either side.
 */
import type { MenuItem } from './MenuItem';
import type { Customer, Employee } from './Person';

export interface Order {
  id: number;
  customerId: number | null;
  employeeId: number | null;
  menuItems?: MenuItem[];
  customer?: Customer | null;
  employee?: Employee | null;
}

export interface NewOrder {
  customerId: number | null;
  employeeId: number | null;
  menuItemIds: number[];
}

export interface OrderRow {
  customer_id: number | null;
  employee_id: number | null;
}

export interface MenuItemOrderRow {
  menu_item_id: number;
  order_id: number;
}
