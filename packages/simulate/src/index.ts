export * from "./types.js";
export * from "./errors.js";
export * from "./elasticity.js";
export * from "./params.js";
export * from "./segment.js";
