export * from "./address.js";
export * from "./authority.js";
export * from "./errors.js";
export * from "./events.js";
export * from "./limits.js";
export * from "./validate.js";
