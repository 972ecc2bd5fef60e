/**
 * Geodesy helpers for position tracks.
 *
 * Coordinates in degrees, distances in meters, bearings in degrees clockwise
 * from north in [0, 360).
 */

/** Mean earth radius in meters */
export const EARTH_RADIUS_METERS = 6370986;

export const METERS_PER_NAUTICAL_MILE = 1852;

export const SECONDS_PER_HOUR = 3600;

export interface LonLat {
  lon: number;
  lat: number;
}

export function metersToNauticalMiles(meters: number): number {
  return meters / METERS_PER_NAUTICAL_MILE;
}

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance between two coordinates using the Haversine formula.
 *
 * @returns Distance in meters
 */
export function greatCircleDistance(a: LonLat, b: LonLat): number {
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLat = toRadians(b.lat - a.lat);
  const dLon = toRadians(b.lon - a.lon);

  const sinDLat = Math.sin(dLat / 2);
  const sinDLon = Math.sin(dLon / 2);

  const h = sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLon * sinDLon;

  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Bearing from one coordinate to another.
 *
 * Planar approximation: accurate enough across the short hops between
 * position reports, but wrong across the poles or the antimeridian.
 */
export function bearing(from: LonLat, to: LonLat): number {
  const dLon = to.lon - from.lon;
  const dLat = to.lat - from.lat;
  return ((Math.atan2(dLon, dLat) * 180) / Math.PI + 360) % 360;
}

/** Mean of two bearings, taking the short way round */
export function averageBearing(b1: number, b2: number): number {
  let first = b1;
  let second = b2;
  if (Math.abs(first - second) > 180) {
    if (first < second) {
      first += 360;
    } else {
      second += 360;
    }
  }
  return ((first + second) / 2) % 360;
}
