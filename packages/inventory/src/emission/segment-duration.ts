/**
 * Segment duration sanitization.
 *
 * Timestamps in AIS data are often off, which makes segment durations, and
 * with them propulsion energy, unreliable. The reported speeds tell us how
 * far the vessel should have gone in the segment's time. When that assumed
 * distance is outside `actual * (1 ± maxDistanceDeviation)`, the duration is
 * scaled so the assumed distance reaches the nearest bound.
 *
 * E.g. a 6nm, 1h segment at 3kts suggests 3nm. With a deviation of 0.25
 * the duration becomes 1.5h, the smallest one for which 3kts covers
 * 0.75 * 6nm.
 *
 * The duration is left alone when the average sog is 0, and never grows by
 * more than maxDurationIncreaseFactor.
 */

import { metersToNauticalMiles } from "../track/geo.js";
import type { Segment } from "../track/segment.js";

export interface SegmentDurationOptions {
  /** Relative distance deviation tolerated before adjusting (default: 0.25) */
  maxDistanceDeviation?: number;
  /** Upper bound of the duration scale factor (default: 10) */
  maxDurationIncreaseFactor?: number;
}

export interface SegmentDurationAdjustment {
  /** Duration to use for energy calculation, in hours */
  hours: number;
  /** Factor the raw duration was scaled by (1 = unchanged) */
  factor: number;
}

export const DEFAULT_MAX_DISTANCE_DEVIATION = 0.25;
export const DEFAULT_MAX_DURATION_INCREASE_FACTOR = 10;

export class SegmentDurationSanitizer {
  readonly maxDistanceDeviation: number;
  readonly maxDurationIncreaseFactor: number;

  constructor(options: SegmentDurationOptions = {}) {
    this.maxDistanceDeviation = options.maxDistanceDeviation ?? DEFAULT_MAX_DISTANCE_DEVIATION;
    this.maxDurationIncreaseFactor =
      options.maxDurationIncreaseFactor ?? DEFAULT_MAX_DURATION_INCREASE_FACTOR;
  }

  adjust(segment: Segment): SegmentDurationAdjustment {
    const hours = segment.durationHours;
    const assumedDistance = hours * segment.averageSog;
    const actualDistance = metersToNauticalMiles(segment.distance);
    const minDistance = actualDistance * (1 - this.maxDistanceDeviation);
    const maxDistance = actualDistance * (1 + this.maxDistanceDeviation);

    let factor = 1;
    if (assumedDistance !== 0) {
      if (assumedDistance < minDistance) {
        factor = minDistance / assumedDistance;
      } else if (assumedDistance > maxDistance) {
        factor = maxDistance / assumedDistance;
      }
    }
    factor = Math.min(factor, this.maxDurationIncreaseFactor);
    return { hours: hours * factor, factor };
  }

  adjustedSegmentHours(segment: Segment): number {
    return this.adjust(segment).hours;
  }
}
