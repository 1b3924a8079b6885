import type { DerivedOrder, OrderRecord } from "./schema.js";

export function deriveOrder(r: OrderRecord): DerivedOrder {
  return {
    ...r,
    net_price: r.unit_price * (1 - r.discount_pct),
    profit: r.revenue - r.cost,
  };
}
