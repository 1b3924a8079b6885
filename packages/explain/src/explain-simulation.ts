import type { SegmentSimulation } from "../../simulate/src/types.js";
import { formatCount, formatCurrency, formatPercent } from "./format.js";

export type ExplanationLine = {
  kind: "INPUT" | "COMPUTE" | "RESULT" | "NOTE";
  text: string;
};

export const INSUFFICIENT_DATA_TEXT = "Not enough data for simulation in this segment.";

export function explainSimulation(s: SegmentSimulation): ExplanationLine[] {
  if (s.status === "INSUFFICIENT_DATA") {
    return [{ kind: "NOTE", text: INSUFFICIENT_DATA_TEXT }];
  }

  const { baseline, params, result } = s;
  return [
    {
      kind: "INPUT",
      text: `Baseline: units=${formatCount(baseline.base_units)}, avg price=${formatCurrency(baseline.avg_price, 2)}, revenue=${formatCurrency(baseline.baseline_revenue)}`,
    },
    {
      kind: "INPUT",
      text: `Price change ${signed(formatPercent(params.price_delta))} at elasticity ${params.elasticity}`,
    },
    {
      kind: "COMPUTE",
      text: `Demand factor = (1 ${params.price_delta < 0 ? "-" : "+"} ${Math.abs(params.price_delta)})^(-${params.elasticity}) = ${result.demand_factor.toFixed(4)}`,
    },
    { kind: "RESULT", text: `Projected Units: ${formatCount(Math.round(result.projected_units))}` },
    { kind: "RESULT", text: `Projected Revenue: ${formatCurrency(result.projected_revenue)}` },
    { kind: "RESULT", text: `Revenue Δ: ${formatCurrency(s.revenue_delta)}` },
  ];
}

function signed(text: string): string {
  return text.startsWith("-") || text === "0%" ? text : `+${text}`;
}
