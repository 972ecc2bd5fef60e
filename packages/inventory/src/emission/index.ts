export * from "./masses.js";
export * from "./emission-config.js";
export * from "./segment-duration.js";
export * from "./calculator.js";
