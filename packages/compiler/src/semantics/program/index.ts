export * from "./expressions.js";
export * from "./program-index.js";
export * from "./type-checker.js";
