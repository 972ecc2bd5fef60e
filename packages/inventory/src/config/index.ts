export * from "./schema.js";
export * from "./inventory-config.js";
export * from "./loader.js";
