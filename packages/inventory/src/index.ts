/**
 * @port-emissions/inventory
 *
 * Bottom-up emission estimates for ships from AIS tracks.
 *
 * Key concepts:
 * - Match config: Criteria on vessel attributes plus a payload of data
 * - Vessel info: What is known or guessed about a vessel and its engines
 * - Track: Sanitized, time-ordered positions of one vessel
 * - Emission config: Factors and engine powers resolved for one vessel
 *
 * Pipeline:
 * 1. Load configuration -> InventoryConfig
 * 2. Complete what is known about a vessel -> VesselInfo
 * 3. Sanitize raw positions -> Track
 * 4. Calculate emissions per track or mooring period -> pollutant masses
 */

export * from "./errors.js";
export * from "./matching/index.js";
export * from "./config/index.js";
export * from "./vessel/index.js";
export * from "./track/index.js";
export * from "./emission/index.js";
