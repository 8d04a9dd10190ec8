export * from "./call.js";
export * from "./catalog.js";
export * from "./catalog-cache.js";
export * from "./diagnostics.js";
export * from "./engine.js";
export * from "./errors.js";
export * from "./resolve-call.js";
export * from "./resolve-constructor.js";
export * from "./segment.js";
export * from "./signature.js";
export * from "./validate-signature.js";
