// ---------- Division guard ----------
export { safeDivide, finiteOrZero } from "./safe-divide.js";

// ---------- Ordering ----------
export { compareCodepoints } from "./compare.js";

// ---------- Aggregation (stable public API) ----------
export { aggregate, bySegment } from "./aggregate.js";
export type { SummaryRow } from "./aggregate.js";

// ---------- Views over summaries ----------
export { filterSummary, listChannels, listRegions } from "./filter.js";

// ---------- KPI rollup ----------
export { kpis } from "./kpis.js";
export type { KpiBundle } from "./kpis.js";
