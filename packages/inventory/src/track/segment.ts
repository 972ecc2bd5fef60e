/**
 * The connection between two consecutive positions of a track.
 */

import { ValidationError } from "../errors.js";
import { SECONDS_PER_HOUR, greatCircleDistance } from "./geo.js";
import type { Position } from "./position.js";

export class Segment {
  private cachedDistance: number | undefined;

  /**
   * @param distance - Known distance in meters; computed from the coordinates
   *   when omitted
   */
  constructor(
    readonly start: Position,
    readonly end: Position,
    distance?: number,
  ) {
    if (start.ts > end.ts) {
      throw new ValidationError(`Segment start ${start.ts} is after its end ${end.ts}`);
    }
    this.cachedDistance = distance;
  }

  /** Great-circle distance in meters */
  get distance(): number {
    if (this.cachedDistance === undefined) {
      this.cachedDistance = greatCircleDistance(this.start, this.end);
    }
    return this.cachedDistance;
  }

  get durationSeconds(): number {
    return this.end.ts - this.start.ts;
  }

  get durationHours(): number {
    return this.durationSeconds / SECONDS_PER_HOUR;
  }

  /** Mean of the speeds over ground at both ends, in knots */
  get averageSog(): number {
    return (this.start.sog + this.end.sog) / 2;
  }
}
