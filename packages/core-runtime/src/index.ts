export * from "./config.js";
export * from "./envelope.js";
export * from "./runtime.js";
export * from "./signer.js";
export * from "./transactions.js";
export { stringifyJson, toJsonSafe } from "@trustledger/state";
