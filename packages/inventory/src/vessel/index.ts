export * from "./vessel-info.js";
export * from "./guesser.js";
