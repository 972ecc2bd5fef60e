/**
 * A single sanitized position report.
 *
 * Speeds in knots, bearings in degrees, ts in seconds since the epoch.
 * tideBearing is the direction the water flows towards, so a tide bearing of
 * 0 means water flowing from south to north.
 */

import { ValidationError } from "../errors.js";

export interface PositionInit {
  ts: number;
  lon: number;
  lat: number;
  sog: number;
  cog: number;
  heading: number;
  tideFlow?: number;
  tideBearing?: number;
}

export function isValidSpeed(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

export function isValidBearing(value: number): boolean {
  return value >= 0 && value < 360;
}

export function isValidLongitude(value: number): boolean {
  return value >= -180 && value < 180;
}

export function isValidLatitude(value: number): boolean {
  return value >= -90 && value <= 90;
}

/**
 * Speed through water: the ground velocity minus the tide's drift.
 *
 * Both speeds must be in the same unit, which is also the unit of the result.
 */
export function speedThroughWater(
  sog: number,
  cog: number,
  tideFlow: number,
  tideBearing: number,
): number {
  if (tideFlow === 0) return sog;
  const cosAngle = Math.cos(((cog - tideBearing) * Math.PI) / 180);
  return Math.sqrt(sog * sog + tideFlow * tideFlow - 2 * sog * tideFlow * cosAngle);
}

export class Position {
  readonly ts: number;
  readonly lon: number;
  readonly lat: number;
  readonly sog: number;
  readonly cog: number;
  readonly heading: number;
  readonly tideFlow: number;
  readonly tideBearing: number;
  /** Speed through water, derived from sog, cog and tide */
  readonly stw: number;

  constructor(init: PositionInit) {
    const { ts, lon, lat, sog, cog, heading, tideFlow = 0, tideBearing = 0 } = init;
    const issues: string[] = [];
    if (!Number.isFinite(ts)) issues.push(`invalid ts ${ts}`);
    if (!isValidLongitude(lon)) issues.push(`longitude ${lon} not in [-180, 180)`);
    if (!isValidLatitude(lat)) issues.push(`latitude ${lat} not in [-90, 90]`);
    if (!isValidSpeed(sog)) issues.push(`invalid sog ${sog}`);
    if (!isValidBearing(cog)) issues.push(`cog ${cog} not in [0, 360)`);
    if (!isValidBearing(heading)) issues.push(`heading ${heading} not in [0, 360)`);
    if (!isValidSpeed(tideFlow)) issues.push(`invalid tide flow ${tideFlow}`);
    if (!isValidBearing(tideBearing)) issues.push(`tide bearing ${tideBearing} not in [0, 360)`);
    if (issues.length > 0) {
      throw new ValidationError("Invalid position", issues);
    }

    this.ts = ts;
    this.lon = lon;
    this.lat = lat;
    this.sog = sog;
    this.cog = cog;
    this.heading = heading;
    this.tideFlow = tideFlow;
    this.tideBearing = tideBearing;
    this.stw = speedThroughWater(sog, cog, tideFlow, tideBearing);
  }

  /** The same position under different tide conditions */
  withTide(tideFlow: number, tideBearing: number): Position {
    return new Position({ ...this.toInit(), tideFlow, tideBearing });
  }

  toInit(): Required<PositionInit> {
    return {
      ts: this.ts,
      lon: this.lon,
      lat: this.lat,
      sog: this.sog,
      cog: this.cog,
      heading: this.heading,
      tideFlow: this.tideFlow,
      tideBearing: this.tideBearing,
    };
  }
}
