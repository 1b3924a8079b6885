export * from "./selection.js";
export * from "./errors.js";
export * from "./views.js";
