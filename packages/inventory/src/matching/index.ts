export * from "./criterion.js";
export * from "./registry.js";
export * from "./match-config.js";
export * from "./resolver.js";
