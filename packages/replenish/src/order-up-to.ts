import { roundHalfAwayFromZero } from "../../numeric/src/rounding.js";

export type InventoryPosition = {
  net_available: number; // on hand + on order - backorders; may be negative
  reorder_point: number;
  base_stock: number;
};

export type ReplenishmentDecision = {
  order_quantity: number;
  triggered: boolean; // net_available < reorder_point
  gap: number; // base_stock - net_available, unrounded
};

/**
 * Order-up-to quantity: below the reorder point, order enough to reach
 * base stock (rounded to whole units, halves away from zero); otherwise 0.
 */
export function decideOrderQuantity(net_available: number, reorder_point: number, base_stock: number): number {
  if (net_available < reorder_point) {
    return roundHalfAwayFromZero(Math.max(0, base_stock - net_available));
  }
  return 0;
}

export function decideReplenishment(p: InventoryPosition): ReplenishmentDecision {
  return {
    order_quantity: decideOrderQuantity(p.net_available, p.reorder_point, p.base_stock),
    triggered: p.net_available < p.reorder_point,
    gap: p.base_stock - p.net_available,
  };
}
