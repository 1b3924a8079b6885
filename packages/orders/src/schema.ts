// Order record model.
// Types only. No functions.

export const REQUIRED_ORDER_COLUMNS = [
  "product",
  "channel",
  "region",
  "unit_price",
  "discount_pct",
  "revenue",
  "cost",
] as const;

export type OrderColumn = (typeof REQUIRED_ORDER_COLUMNS)[number];

/* ------------------------------ Orders ------------------------------ */

export interface OrderRecord {
  product: string;
  channel: string;
  region: string;

  unit_price: number; // > 0
  discount_pct: number; // 0..1 (exclusive)

  revenue: number; // >= 0
  cost: number; // >= 0
}

export interface DerivedOrder extends OrderRecord {
  net_price: number;
  profit: number;
}
