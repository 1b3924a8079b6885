import type { SummaryRow } from "../../compute/src/aggregate.js";
import { safeDivide } from "../../compute/src/safe-divide.js";
import type { SegmentBaseline, SegmentSimulation, SimulationParams } from "./types.js";
import { revenueDelta, simulatePriceChange } from "./elasticity.js";

/**
 * Baseline for a set of summary rows: order count stands in for units,
 * and the average price is revenue per order.
 */
export function segmentBaseline(rows: readonly SummaryRow[]): SegmentBaseline {
  let base_units = 0;
  let baseline_revenue = 0;
  for (const r of rows) {
    base_units += r.orders;
    baseline_revenue += r.revenue;
  }
  return {
    base_units,
    avg_price: safeDivide(baseline_revenue, base_units),
    baseline_revenue,
  };
}

/**
 * Caller-level gate around simulatePriceChange.
 *
 * A segment without units or without a price yields INSUFFICIENT_DATA
 * instead of a zero projection. Domain errors from the simulator propagate.
 */
export function simulateSegment(
  baseline: SegmentBaseline,
  params: SimulationParams
): SegmentSimulation {
  if (!(baseline.base_units > 0)) {
    return { status: "INSUFFICIENT_DATA", reason: "NO_UNITS", baseline, params };
  }
  if (!(baseline.avg_price > 0)) {
    return { status: "INSUFFICIENT_DATA", reason: "NO_PRICE", baseline, params };
  }

  const result = simulatePriceChange({
    base_units: baseline.base_units,
    avg_price: baseline.avg_price,
    elasticity: params.elasticity,
    price_delta: params.price_delta,
  });

  return {
    status: "OK",
    baseline,
    params,
    result,
    revenue_delta: revenueDelta(result, baseline.baseline_revenue),
  };
}
