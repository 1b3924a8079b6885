import { describe, it, expect } from "vitest";
import { explainKpis, roundSummaryRows } from "../src/explain-kpis.js";
import { explainSimulation, INSUFFICIENT_DATA_TEXT } from "../src/explain-simulation.js";
import { simulateSegment } from "../../simulate/src/segment.js";

describe("explain: kpis", () => {
  const bundle = { total_revenue: 175, total_orders: 3, avg_AOV: 50, total_profit: 65, row_count: 2 };

  it("renders the four headline metrics", () => {
    expect(explainKpis(bundle)).toEqual([
      { label: "Total Revenue", value: "$175" },
      { label: "Total Orders", value: "3" },
      { label: "AOV", value: "$50.00" },
      { label: "Total Profit", value: "$65" },
    ]);
  });

  it("prefixes labels for segment views", () => {
    expect(explainKpis(bundle, "Online – ").map((l) => l.label)).toEqual([
      "Online – Total Revenue",
      "Online – Total Orders",
      "Online – AOV",
      "Online – Total Profit",
    ]);
  });

  it("rounds detail rows to cents", () => {
    expect(
      roundSummaryRows([
        { channel: "Online", region: "West", orders: 3, revenue: 100.456, profit: 20.004, AOV: 33.485333 },
      ])
    ).toEqual([{ channel: "Online", region: "West", orders: 3, revenue: 100.46, profit: 20, AOV: 33.49 }]);
  });
});

describe("explain: simulation", () => {
  it("shows a note when the segment has no data", () => {
    const s = simulateSegment({ base_units: 0, avg_price: 0, baseline_revenue: 0 }, { price_delta: 0.05, elasticity: 1.2 });
    expect(explainSimulation(s)).toEqual([{ kind: "NOTE", text: INSUFFICIENT_DATA_TEXT }]);
  });

  it("walks through inputs, factor and results", () => {
    const s = simulateSegment({ base_units: 10, avg_price: 50, baseline_revenue: 500 }, { price_delta: 0, elasticity: 1.2 });
    expect(explainSimulation(s).map((l) => l.text)).toEqual([
      "Baseline: units=10, avg price=$50.00, revenue=$500",
      "Price change 0% at elasticity 1.2",
      "Demand factor = (1 + 0)^(-1.2) = 1.0000",
      "Projected Units: 10",
      "Projected Revenue: $500",
      "Revenue Δ: $0",
    ]);
  });

  it("writes price cuts as a subtraction", () => {
    const s = simulateSegment({ base_units: 1000, avg_price: 50, baseline_revenue: 50000 }, { price_delta: -0.1, elasticity: 1.2 });
    const lines = explainSimulation(s);
    expect(lines[1]?.text).toBe("Price change -10% at elasticity 1.2");
    expect(lines[2]?.text).toBe("Demand factor = (1 - 0.1)^(-1.2) = 1.1348");
  });

  it("shows a tiny cut as an unsigned 0%", () => {
    const s = simulateSegment({ base_units: 1000, avg_price: 50, baseline_revenue: 50000 }, { price_delta: -0.004, elasticity: 1.2 });
    const lines = explainSimulation(s);
    expect(lines[1]?.text).toBe("Price change 0% at elasticity 1.2");
    expect(lines[2]?.text).toBe("Demand factor = (1 - 0.004)^(-1.2) = 1.0048");
  });

  it("signs price increases", () => {
    const s = simulateSegment({ base_units: 1000, avg_price: 50, baseline_revenue: 50000 }, { price_delta: 0.05, elasticity: 1.2 });
    const lines = explainSimulation(s);
    expect(lines[1]?.text).toBe("Price change +5% at elasticity 1.2");
    expect(lines[2]?.text).toBe("Demand factor = (1 + 0.05)^(-1.2) = 0.9431");
    expect(lines[3]?.text).toBe("Projected Units: 943");
    expect(lines[4]?.text).toBe("Projected Revenue: $49,514");
    expect(lines[5]?.text).toBe("Revenue Δ: -$486");
  });
});
