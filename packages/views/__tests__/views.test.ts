import { describe, it, expect } from "vitest";
import type { OrderRecord } from "../../orders/src/schema.js";
import { aggregate } from "../../compute/src/aggregate.js";
import { buildChannelView, buildOverview, buildRegionView } from "../src/views.js";
import { parseSelectionList, resolveSelection } from "../src/selection.js";
import { UnknownSegmentError } from "../src/errors.js";

function order(channel: string, region: string, revenue: number, cost: number): OrderRecord {
  return { product: "Trail Backpack", channel, region, unit_price: 69, discount_pct: 0.05, revenue, cost };
}

const summary = aggregate([
  order("Retail", "West", 80, 50),
  order("Online", "West", 100, 60),
  order("Online", "East", 100, 70),
  order("Online", "West", 50, 30),
]);

describe("views: selection", () => {
  it("treats a missing or empty selection as everything", () => {
    expect(resolveSelection(["A", "B"])).toEqual(["A", "B"]);
    expect(resolveSelection(["A", "B"], [])).toEqual(["A", "B"]);
    expect(resolveSelection(["A", "B"], null)).toEqual(["A", "B"]);
    expect(resolveSelection(["A", "B"], ["B", "C"])).toEqual(["B", "C"]);
  });

  it("parses comma lists", () => {
    expect(parseSelectionList(" Online, Retail ,,")).toEqual(["Online", "Retail"]);
    expect(parseSelectionList(undefined)).toBeUndefined();
  });
});

describe("views: overview", () => {
  it("covers everything when nothing is selected", () => {
    const v = buildOverview(summary);
    expect(v.channels).toEqual(["Online", "Retail"]);
    expect(v.regions).toEqual(["East", "West"]);
    expect(v.rows.map((r) => `${r.channel}/${r.region}`)).toEqual([
      "Online/East",
      "Online/West",
      "Retail/West",
    ]);
    expect(v.kpis).toEqual({
      total_revenue: 330,
      total_orders: 4,
      avg_AOV: 85,
      total_profit: 120,
      row_count: 3,
    });
  });

  it("simulates on the filtered total with default parameters", () => {
    const v = buildOverview(summary);
    expect(v.simulation.status).toBe("OK");
    if (v.simulation.status === "OK") {
      expect(v.simulation.baseline).toEqual({ base_units: 4, avg_price: 82.5, baseline_revenue: 330 });
      expect(v.simulation.params).toEqual({ price_delta: 0.05, elasticity: 1.2 });
      expect(v.simulation.result.projected_revenue).toBeCloseTo(326.7955, 3);
    }
  });

  it("narrows by region", () => {
    const v = buildOverview(summary, { regions: ["West"] }, { price_delta: 0 });
    expect(v.rows.map((r) => r.channel)).toEqual(["Online", "Retail"]);
    expect(v.kpis.total_revenue).toBe(230);
    if (v.simulation.status === "OK") expect(v.simulation.revenue_delta).toBe(0);
  });

  it("reports insufficient data when the filters match nothing", () => {
    const v = buildOverview(summary, { channels: ["Partner"] });
    expect(v.rows).toEqual([]);
    expect(v.kpis.total_orders).toBe(0);
    expect(v.simulation.status).toBe("INSUFFICIENT_DATA");
  });
});

describe("views: channel and region", () => {
  it("defaults to the first channel and orders its rows by region", () => {
    const v = buildChannelView(summary);
    expect(v.status).toBe("OK");
    if (v.status === "OK") {
      expect(v.options).toEqual(["Online", "Retail"]);
      expect(v.selected).toBe("Online");
      expect(v.rows.map((r) => r.region)).toEqual(["East", "West"]);
      expect(v.kpis.total_revenue).toBe(250);
      expect(v.kpis.total_orders).toBe(3);
    }
  });

  it("aggregates one region across channels", () => {
    const v = buildRegionView(summary, "West", { price_delta: 0 });
    expect(v.status).toBe("OK");
    if (v.status === "OK") {
      expect(v.rows.map((r) => r.channel)).toEqual(["Online", "Retail"]);
      expect(v.kpis.total_profit).toBe(90);
      expect(v.simulation.status).toBe("OK");
    }
  });

  it("orders a region's channels by code unit", () => {
    const mixed = aggregate([order("retail", "West", 10, 5), order("Retail", "West", 20, 5)]);
    const v = buildRegionView(mixed, "West");
    if (v.status === "OK") expect(v.rows.map((r) => r.channel)).toEqual(["Retail", "retail"]);
    expect(v.status).toBe("OK");
  });

  it("is empty when nothing remains after filtering", () => {
    expect(buildChannelView([])).toEqual({ status: "EMPTY", dimension: "channel" });
    expect(buildRegionView([])).toEqual({ status: "EMPTY", dimension: "region" });
  });

  it("rejects a segment that is not in the view", () => {
    expect(() => buildChannelView(summary, "Partner")).toThrow(UnknownSegmentError);
  });
});
