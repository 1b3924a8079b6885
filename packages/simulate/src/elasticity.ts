import type { SimulationInput, SimulationResult } from "./types.js";
import { InvalidElasticityDomainError } from "./errors.js";

/**
 * Constant-elasticity demand response:
 *
 *   demand_factor     = (1 + price_delta) ^ (-elasticity)
 *   projected_units   = base_units * demand_factor
 *   projected_revenue = projected_units * avg_price * (1 + price_delta)
 *
 * Inputs are not clamped. Only price_delta <= -1 is rejected, since the
 * base (1 + price_delta) must stay positive under a fractional exponent.
 * Degenerate segments (no units / no price) are gated by the caller, see
 * simulateSegment.
 */
export function simulatePriceChange(input: SimulationInput): SimulationResult {
  const { base_units, avg_price, elasticity, price_delta } = input;

  // NaN fails this too.
  if (!(price_delta > -1)) throw new InvalidElasticityDomainError(price_delta);

  const priceFactor = 1 + price_delta;
  const demand_factor = Math.pow(priceFactor, -elasticity);
  const projected_units = base_units * demand_factor;

  return {
    demand_factor,
    projected_units,
    projected_revenue: projected_units * avg_price * priceFactor,
  };
}

/** Only meaningful when baseline_revenue describes the same segment as the simulation input. */
export function revenueDelta(result: SimulationResult, baseline_revenue: number): number {
  return result.projected_revenue - baseline_revenue;
}
