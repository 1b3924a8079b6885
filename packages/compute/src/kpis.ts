import type { SummaryRow } from "./aggregate.js";
import { finiteOrZero, safeDivide } from "./safe-divide.js";

export type KpiBundle = {
  total_revenue: number;
  total_orders: number;
  avg_AOV: number; // unweighted mean of row AOVs
  total_profit: number;
  row_count: number;
};

export function kpis(rows: readonly SummaryRow[]): KpiBundle {
  let total_revenue = 0;
  let total_orders = 0;
  let total_profit = 0;
  let aovSum = 0;

  for (const r of rows) {
    total_revenue += r.revenue;
    total_orders += r.orders;
    total_profit += r.profit;
    // NaN/Infinity count as 0; "no data" and "zero" are not told apart here.
    aovSum += finiteOrZero(r.AOV);
  }

  return {
    total_revenue,
    total_orders,
    avg_AOV: safeDivide(aovSum, rows.length),
    total_profit,
    row_count: rows.length,
  };
}
