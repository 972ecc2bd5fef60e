export * from "./geo.js";
export * from "./position.js";
export * from "./segment.js";
export * from "./track.js";
export * from "./sanitize.js";
