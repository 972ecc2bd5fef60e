/**
 * Position and operating mode types.
 */

/**
 * A position report as it arrives from an AIS feed.
 *
 * Speeds in knots, bearings in degrees, ts in seconds since the epoch.
 * tide_bearing is the direction the water flows towards.
 */
export interface RawPosition {
  ts: number;
  lon: number;
  lat: number;
  sog: number | null;
  cog: number | null;
  heading: number | null;
  tide_flow?: number | null;
  tide_bearing?: number | null;
}

/** Operating mode, deciding which engines run at what loads */
export type Mode = "transit" | "maneuvering" | "hotelling" | "anchorage";

export const TRACK_MODES = ["transit", "maneuvering"] as const satisfies readonly Mode[];
export const MOORING_MODES = ["hotelling", "anchorage"] as const satisfies readonly Mode[];

export type TrackMode = (typeof TRACK_MODES)[number];
export type MooringMode = (typeof MOORING_MODES)[number];
