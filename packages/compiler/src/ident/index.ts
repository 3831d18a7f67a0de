export * from "./attributes.js";
export * from "./idx.js";
export * from "./interner.js";
export * from "./problems.js";
export * from "./errors.js";
export * from "./store.js";
export * from "./diagnostics.js";
