import { z } from "zod";
import type { SimulationParams } from "./types.js";
import { InvalidSimulationParamsError } from "./errors.js";

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

// Suggested slider ranges. Advisory only; nothing outside them is rejected.
export const PRICE_DELTA_RANGE = { min: -0.2, max: 0.2, step: 0.01 } as const;
export const ELASTICITY_RANGE = { min: 0.5, max: 2.0, step: 0.1 } as const;

export const DEFAULT_SIMULATION_PARAMS: Readonly<SimulationParams> = Object.freeze({
  price_delta: 0.05,
  elasticity: 1.2,
});

export const SimulationParamsSchema = z.object({
  price_delta: FiniteNumber,
  elasticity: FiniteNumber,
});

export function resolveSimulationParams(
  override: Partial<SimulationParams> = {}
): SimulationParams {
  const merged = { ...DEFAULT_SIMULATION_PARAMS, ...stripUndefined(override) };
  const r = SimulationParamsSchema.safeParse(merged);
  if (!r.success) {
    throw new InvalidSimulationParamsError(
      r.error.issues.map((i) => `${i.path.map((p) => String(p)).join(".")}: ${i.message}`)
    );
  }
  return r.data;
}

export function isWithinSuggestedRange(p: SimulationParams): boolean {
  return (
    p.price_delta >= PRICE_DELTA_RANGE.min &&
    p.price_delta <= PRICE_DELTA_RANGE.max &&
    p.elasticity >= ELASTICITY_RANGE.min &&
    p.elasticity <= ELASTICITY_RANGE.max
  );
}

function stripUndefined(o: Partial<SimulationParams>): Partial<SimulationParams> {
  const out: Partial<SimulationParams> = {};
  if (o.price_delta !== undefined) out.price_delta = o.price_delta;
  if (o.elasticity !== undefined) out.elasticity = o.elasticity;
  return out;
}
