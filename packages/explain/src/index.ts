export * from "./format.js";
export * from "./explain-kpis.js";
export * from "./explain-simulation.js";
