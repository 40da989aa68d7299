/**
 * MenuItem Entity
 * Layer: Domain
 *
 * Price is an integer number of cents. An item belongs to exactly one truck
 * (`food_truck_id` is NOT NULL) and is never shared between trucks; orders
 * reach it through the `menu_item_orders` junction.
 */
import type { FoodTruck } from './FoodTruck';
import type { Order } from './Order';

export interface MenuItem {
  id: number;
  name: string;
  price: number;
  foodTruckId: number;
  foodTruck?: FoodTruck | null;
  orders?: Order[];
}

export interface NewMenuItem {
  name: string;
  price: number;
  foodTruckId: number;
}

export interface MenuItemRow {
  name: string;
  price: number;
  food_truck_id: number;
}
