import {
  ELASTICITY_RANGE,
  PRICE_DELTA_RANGE,
  revenueDelta,
  simulatePriceChange,
} from "../packages/simulate/src/index.js";

// Sweep the suggested slider grid for a single segment.
const base = { base_units: 1000, avg_price: 50 };
const baselineRevenue = base.base_units * base.avg_price;

const grid: Array<{ price_delta: number; elasticity: number; projected_revenue: number; delta: number }> = [];

for (let e = ELASTICITY_RANGE.min; e <= ELASTICITY_RANGE.max + 1e-9; e += 0.5) {
  for (let d = PRICE_DELTA_RANGE.min; d <= PRICE_DELTA_RANGE.max + 1e-9; d += 0.1) {
    const price_delta = Math.round(d * 100) / 100;
    const elasticity = Math.round(e * 10) / 10;
    const r = simulatePriceChange({ ...base, elasticity, price_delta });
    grid.push({
      price_delta,
      elasticity,
      projected_revenue: Math.round(r.projected_revenue),
      delta: Math.round(revenueDelta(r, baselineRevenue)),
    });
  }
}

console.table(grid);
