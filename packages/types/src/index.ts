/**
 * @port-emissions/types
 *
 * Shared domain types for the ship emission inventory.
 *
 * - Vessel: Vessel information, ship types and their size units, engines
 * - Track: Raw position reports and operating modes
 * - Config: The emission configuration as operators write it
 * - Emission: Pollutant masses and emission factors
 */

export * from "./vessel.js";
export * from "./track.js";
export * from "./config.js";
export * from "./emission.js";
