/**
 * Tracks: time-ordered positions and the segments between them.
 */

import { ValidationError } from "../errors.js";
import { SECONDS_PER_HOUR } from "./geo.js";
import type { Position } from "./position.js";
import { Segment } from "./segment.js";

/** What sanitization changed while building a track */
export interface SanitizationStats {
  /** Positions dropped as implausible jumps */
  discarded: number;
  /** Speeds over ground replaced by calculated ones */
  sogs: number;
  /** Courses over ground replaced by calculated ones */
  cogs: number;
  /** Headings replaced by the course over ground */
  headings: number;
  /** Positions whose unusable tide data was dropped */
  tides: number;
}

export const NO_SANITIZATION: Readonly<SanitizationStats> = Object.freeze({
  discarded: 0,
  sogs: 0,
  cogs: 0,
  headings: 0,
  tides: 0,
});

export class Track {
  readonly positions: readonly Position[];
  readonly sanitization: Readonly<SanitizationStats>;
  private cachedSegments: readonly Segment[] | undefined;

  constructor(positions: readonly Position[], sanitization: SanitizationStats = NO_SANITIZATION) {
    for (let i = 1; i < positions.length; i++) {
      const previous = positions[i - 1];
      const current = positions[i];
      if (previous && current && previous.ts > current.ts) {
        throw new ValidationError(`Track positions out of order at index ${i}`);
      }
    }
    this.positions = [...positions];
    this.sanitization = Object.freeze({ ...sanitization });
  }

  /** Segments between each pair of consecutive positions */
  get segments(): readonly Segment[] {
    if (this.cachedSegments === undefined) {
      const segments: Segment[] = [];
      let previous: Position | undefined;
      for (const position of this.positions) {
        if (previous) segments.push(new Segment(previous, position));
        previous = position;
      }
      this.cachedSegments = segments;
    }
    return this.cachedSegments;
  }

  /** Total distance in meters */
  get distance(): number {
    return this.segments.reduce((sum, segment) => sum + segment.distance, 0);
  }

  get durationSeconds(): number {
    return this.segments.reduce((sum, segment) => sum + segment.durationSeconds, 0);
  }

  get durationHours(): number {
    return this.durationSeconds / SECONDS_PER_HOUR;
  }

  toString(): string {
    const count = this.positions.length;
    if (count === 0) return "Track (empty)";
    if (count === 1) return "Track with a single position";
    return `Track of ${count} positions, ${(this.distance / 1000).toFixed(1)}km over ${this.durationHours.toFixed(2)}h`;
  }
}
