/**
 * Track sanitization.
 *
 * AIS position streams are noisy: positions jump, speeds and courses are
 * missing or nonsense. Sanitization turns raw reports into a consistent
 * track in two passes over the chronologically sorted input:
 *
 * 1. Outlier rejection: a position the vessel could not plausibly have
 *    reached from the accepted positions before it is dropped. Dropped
 *    positions never serve as reference for later ones.
 * 2. Repair: missing or implausible sog and missing or invalid cog are
 *    calculated from the neighbouring accepted positions (mean over the
 *    incoming and outgoing hop), a missing heading takes the cog, and tide
 *    data is only kept when complete and valid. Speed through water follows
 *    from sog, cog and tide.
 */

import type { RawPosition } from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import {
  SECONDS_PER_HOUR,
  averageBearing,
  bearing,
  greatCircleDistance,
  metersToNauticalMiles,
} from "./geo.js";
import { Position, isValidBearing, isValidLatitude, isValidLongitude, isValidSpeed } from "./position.js";
import { Track, type SanitizationStats } from "./track.js";

/** Whether a reported speed over ground (knots) is believable */
export type SogPlausibility = (sog: number) => boolean;

/** Whether a vessel could have moved from one timestamped coordinate to another */
export type DistanceCoveredPlausibility = (
  ts1: number,
  lon1: number,
  lat1: number,
  ts2: number,
  lon2: number,
  lat2: number,
) => boolean;

export interface SanitizeOptions {
  sogIsPlausible?: SogPlausibility;
  distanceCoveredIsPlausible?: DistanceCoveredPlausibility;
  /** Cap for calculated speeds in knots (default: 16) */
  maxCalculatedSpeed?: number;
  /**
   * Number of preceding accepted positions whose mean time and coordinates
   * serve as reference for outlier rejection (default: 1)
   */
  outlierReferenceSize?: number;
}

export const DEFAULT_MAX_CALCULATED_SPEED = 16;

const alwaysPlausible = (): boolean => true;

/** Sog plausibility: anything up to maxKnots */
export function sogAtMost(maxKnots: number): SogPlausibility {
  return (sog) => sog <= maxKnots;
}

/** Distance plausibility: implied speed up to maxKnots */
export function impliedSpeedAtMost(maxKnots: number): DistanceCoveredPlausibility {
  return (ts1, lon1, lat1, ts2, lon2, lat2) => {
    const nauticalMiles = metersToNauticalMiles(
      greatCircleDistance({ lon: lon1, lat: lat1 }, { lon: lon2, lat: lat2 }),
    );
    const hours = (ts2 - ts1) / SECONDS_PER_HOUR;
    if (hours <= 0) return nauticalMiles === 0;
    return nauticalMiles / hours <= maxKnots;
  };
}

function assertUsable(raw: RawPosition, index: number): void {
  const issues: string[] = [];
  if (!Number.isFinite(raw.ts)) issues.push(`invalid ts ${raw.ts}`);
  if (!isValidLongitude(raw.lon)) issues.push(`longitude ${raw.lon} not in [-180, 180)`);
  if (!isValidLatitude(raw.lat)) issues.push(`latitude ${raw.lat} not in [-90, 90]`);
  if (issues.length > 0) {
    throw new ValidationError(`Invalid raw position at index ${index}`, issues);
  }
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Neighbouring hops of a position: (previous, current) and (current, next) */
function hops(
  current: RawPosition,
  previous: RawPosition | undefined,
  next: RawPosition | undefined,
): [RawPosition, RawPosition][] {
  const pairs: [RawPosition, RawPosition][] = [];
  if (previous) pairs.push([previous, current]);
  if (next) pairs.push([current, next]);
  return pairs;
}

function calculateSog(
  pairs: [RawPosition, RawPosition][],
  maxCalculatedSpeed: number,
): number {
  if (pairs.length === 0) return 0;
  let total = 0;
  for (const [from, to] of pairs) {
    const hours = (to.ts - from.ts) / SECONDS_PER_HOUR;
    if (hours > 0) {
      total += metersToNauticalMiles(greatCircleDistance(from, to)) / hours;
    }
  }
  return Math.min(total / pairs.length, maxCalculatedSpeed);
}

function calculateCog(pairs: [RawPosition, RawPosition][]): number {
  const [first, second] = pairs.map(([from, to]) => bearing(from, to));
  if (first === undefined) return 0;
  if (second === undefined) return first;
  return averageBearing(first, second);
}

function usableTide(raw: RawPosition): { tideFlow: number; tideBearing: number } | undefined {
  const { tide_flow: tideFlow, tide_bearing: tideBearing } = raw;
  if (tideFlow == null || tideBearing == null) return undefined;
  if (!isValidSpeed(tideFlow) || !isValidBearing(tideBearing)) return undefined;
  return { tideFlow, tideBearing };
}

/**
 * Build a sanitized track from raw position reports.
 *
 * Throws ValidationError when a report has no usable timestamp or
 * coordinates; everything else is repaired or dropped and counted in
 * `track.sanitization`.
 */
export function sanitizeTrack(
  rawPositions: Iterable<RawPosition>,
  options: SanitizeOptions = {},
): Track {
  const {
    sogIsPlausible = alwaysPlausible,
    distanceCoveredIsPlausible = alwaysPlausible,
    maxCalculatedSpeed = DEFAULT_MAX_CALCULATED_SPEED,
    outlierReferenceSize = 1,
  } = options;

  const sorted = [...rawPositions];
  sorted.forEach(assertUsable);
  sorted.sort((a, b) => a.ts - b.ts);

  const stats: SanitizationStats = { discarded: 0, sogs: 0, cogs: 0, headings: 0, tides: 0 };
  const implausibleSogs: (number | null)[] = [];

  // Pass 1: outlier rejection against accepted positions only
  const accepted: RawPosition[] = [];
  for (const candidate of sorted) {
    const reference = accepted.slice(-Math.max(1, outlierReferenceSize));
    if (
      reference.length > 0 &&
      !distanceCoveredIsPlausible(
        mean(reference.map((p) => p.ts)),
        mean(reference.map((p) => p.lon)),
        mean(reference.map((p) => p.lat)),
        candidate.ts,
        candidate.lon,
        candidate.lat,
      )
    ) {
      stats.discarded++;
      continue;
    }
    accepted.push(candidate);
  }

  // Pass 2: repair kinematics from accepted neighbours
  const positions = accepted.map((current, i) => {
    const pairs = hops(current, accepted[i - 1], accepted[i + 1]);

    let sog = current.sog;
    if (sog == null || !isValidSpeed(sog) || !sogIsPlausible(sog)) {
      stats.sogs++;
      implausibleSogs.push(sog);
      sog = calculateSog(pairs, maxCalculatedSpeed);
    }

    let cog = current.cog;
    if (cog == null || !isValidBearing(cog)) {
      stats.cogs++;
      cog = calculateCog(pairs);
    }

    let heading = current.heading;
    if (heading == null || !isValidBearing(heading)) {
      stats.headings++;
      heading = cog;
    }

    const tide = usableTide(current);
    if (!tide && (current.tide_flow != null || current.tide_bearing != null)) {
      stats.tides++;
    }

    return new Position({
      ts: current.ts,
      lon: current.lon,
      lat: current.lat,
      sog,
      cog,
      heading,
      tideFlow: tide?.tideFlow ?? 0,
      tideBearing: tide?.tideBearing ?? 0,
    });
  });

  if (stats.discarded + stats.sogs + stats.cogs + stats.headings + stats.tides > 0) {
    console.log(
      `[track] Sanitized ${sorted.length} positions: ${stats.discarded} outliers, ` +
        `${stats.sogs} sogs (${implausibleSogs.join(", ")}), ${stats.cogs} cogs, ` +
        `${stats.headings} headings, ${stats.tides} tides`,
    );
  }

  return new Track(positions, stats);
}
