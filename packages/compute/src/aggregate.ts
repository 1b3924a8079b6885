import type { OrderRecord } from "../../orders/src/schema.js";
import { assertRequiredColumns } from "../../orders/src/validate.js";
import { deriveOrder } from "../../orders/src/derive.js";
import { safeDivide } from "./safe-divide.js";
import { compareCodepoints } from "./compare.js";

export type SummaryRow = {
  channel: string;
  region: string;
  orders: number;
  revenue: number;
  profit: number;
  AOV: number;
};

type Accumulator = {
  channel: string;
  region: string;
  orders: number;
  revenue: number;
  profit: number;
};

/**
 * Group order records by (channel, region) and sum them.
 * Output is sorted by channel, then region.
 *
 * Throws SchemaError before any grouping if the input lacks a required column.
 */
export function aggregate(records: readonly OrderRecord[]): SummaryRow[] {
  assertRequiredColumns(records);

  const groups = new Map<string, Accumulator>();

  for (const r of records) {
    const { channel, region, revenue, profit } = deriveOrder(r);
    const key = segmentKey(channel, region);

    const acc = groups.get(key);
    if (acc) {
      acc.orders += 1;
      acc.revenue += revenue;
      acc.profit += profit;
    } else {
      groups.set(key, { channel, region, orders: 1, revenue, profit });
    }
  }

  return [...groups.values()]
    .map((g) => ({ ...g, AOV: safeDivide(g.revenue, g.orders) }))
    .sort(bySegment);
}

export function bySegment(
  a: { channel: string; region: string },
  b: { channel: string; region: string }
): number {
  return compareCodepoints(a.channel, b.channel) || compareCodepoints(a.region, b.region);
}

// JSON keeps the pair unambiguous even when a label contains a separator.
function segmentKey(channel: string, region: string): string {
  return JSON.stringify([channel, region]);
}
