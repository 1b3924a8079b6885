import { readFileSync } from "node:fs";
import { parseOrders } from "../packages/orders/src/index.js";
import { aggregate } from "../packages/compute/src/index.js";
import { buildOverview, buildChannelView, buildRegionView } from "../packages/views/src/index.js";
import { explainKpis, explainSimulation } from "../packages/explain/src/index.js";

const raw = JSON.parse(readFileSync("examples/orders/sample-orders.json", "utf-8"));

const summary = aggregate(parseOrders(raw));
const overview = buildOverview(summary, { regions: ["West", "Midwest"] }, { price_delta: -0.1 });

console.log("== Overview (West + Midwest)");
for (const m of explainKpis(overview.kpis)) console.log(`${m.label}: ${m.value}`);
for (const l of explainSimulation(overview.simulation)) console.log(`[${l.kind}] ${l.text}`);

for (const view of [buildChannelView(overview.rows), buildRegionView(overview.rows)]) {
  if (view.status === "EMPTY") {
    console.log(`\nNo ${view.dimension}s available with current filters.`);
    continue;
  }
  console.log(`\n== ${view.dimension}: ${view.selected}`);
  for (const m of explainKpis(view.kpis, `${view.selected} – `)) console.log(`${m.label}: ${m.value}`);
}
