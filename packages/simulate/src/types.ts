export type SimulationInput = {
  base_units: number;
  avg_price: number;
  elasticity: number;
  price_delta: number; // fractional, e.g. 0.05 = +5%
};

export type SimulationResult = {
  demand_factor: number;
  projected_units: number;
  projected_revenue: number;
};

export type SimulationParams = {
  price_delta: number;
  elasticity: number;
};

export type SegmentBaseline = {
  base_units: number;
  avg_price: number;
  baseline_revenue: number;
};

export type SegmentSimulation =
  | {
      status: "INSUFFICIENT_DATA";
      reason: "NO_UNITS" | "NO_PRICE";
      baseline: SegmentBaseline;
      params: SimulationParams;
    }
  | {
      status: "OK";
      baseline: SegmentBaseline;
      params: SimulationParams;
      result: SimulationResult;
      revenue_delta: number;
    };
