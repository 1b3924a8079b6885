import type { KpiBundle } from "../../compute/src/kpis.js";
import type { SummaryRow } from "../../compute/src/aggregate.js";
import { formatCount, formatCurrency, round2 } from "./format.js";

export type MetricLine = {
  label: string;
  value: string;
};

export function explainKpis(k: KpiBundle, titlePrefix = ""): MetricLine[] {
  return [
    { label: `${titlePrefix}Total Revenue`, value: formatCurrency(k.total_revenue) },
    { label: `${titlePrefix}Total Orders`, value: formatCount(k.total_orders) },
    { label: `${titlePrefix}AOV`, value: formatCurrency(k.avg_AOV, 2) },
    { label: `${titlePrefix}Total Profit`, value: formatCurrency(k.total_profit) },
  ];
}

// Detail-table view. Counts are left as they are.
export function roundSummaryRows(rows: readonly SummaryRow[]): SummaryRow[] {
  return rows.map((r) => ({
    ...r,
    revenue: round2(r.revenue),
    profit: round2(r.profit),
    AOV: round2(r.AOV),
  }));
}
