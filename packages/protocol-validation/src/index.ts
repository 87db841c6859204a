export * from "./registry.js";
export * from "./request-id.js";
export * from "./store.js";
