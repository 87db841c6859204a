export * from "./database.js";
export * from "./json.js";
export { SCHEMA_VERSION } from "./schema.js";
