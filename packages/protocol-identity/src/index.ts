export * from "./delegation.js";
export * from "./registry.js";
export * from "./store.js";
