/**
 * Emission calculation for one vessel.
 *
 * Propulsion energy per segment follows the propeller law: engine load is
 * the cube of speed through water over maximum speed, raised by the sea
 * margin and capped at full load. Auxiliary engines and boilers run at the
 * configured power of the operating mode for the whole duration.
 *
 * All masses are in grams.
 */

import {
  MOORING_MODES,
  NON_PROPULSION_ENGINE_GROUPS,
  TRACK_MODES,
  type Mode,
  type MooringMode,
  type PollutantMasses,
  type TrackMode,
  type VesselInfo,
} from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import { SECONDS_PER_HOUR } from "../track/geo.js";
import type { Segment } from "../track/segment.js";
import type { Track } from "../track/track.js";
import {
  emissionsFromEnergy,
  lowLoadFactorsAt,
  type EmissionConfig,
} from "./emission-config.js";
import { addMasses, scaleMasses } from "./masses.js";
import { SegmentDurationSanitizer } from "./segment-duration.js";

/** What the calculator needs from a configuration */
export interface EmissionConfigSource {
  readonly seaMarginAdjustmentFactor: number;
  emissionConfigFor(vesselInfo: VesselInfo, mode: Mode): EmissionConfig;
}

export interface EmissionCalculatorOptions {
  segmentDurationSanitizer?: SegmentDurationSanitizer;
}

const trackModes: readonly Mode[] = TRACK_MODES;
const mooringModes: readonly Mode[] = MOORING_MODES;

function isTrackMode(mode: Mode): mode is TrackMode {
  return trackModes.includes(mode);
}

function isMooringMode(mode: Mode): mode is MooringMode {
  return mooringModes.includes(mode);
}

export class EmissionCalculator {
  readonly segmentDurationSanitizer: SegmentDurationSanitizer;

  constructor(
    private readonly config: EmissionConfigSource,
    readonly vesselInfo: VesselInfo,
    options: EmissionCalculatorOptions = {},
  ) {
    this.segmentDurationSanitizer =
      options.segmentDurationSanitizer ?? new SegmentDurationSanitizer();
  }

  /**
   * Emissions of a vessel under way: propulsion over every segment plus
   * auxiliary engines and boiler over the track's duration.
   *
   * Throws ValidationError for modes other than transit and maneuvering.
   */
  calculateTrackEmissions(track: Track, mode: Mode): PollutantMasses {
    if (!isTrackMode(mode)) {
      throw new ValidationError(`Track emissions need one of ${TRACK_MODES.join(", ")}, got ${mode}`);
    }
    const emissionConfig = this.config.emissionConfigFor(this.vesselInfo, mode);

    let adjusted = 0;
    const propulsion = addMasses(
      ...track.segments.map((segment) => {
        const { hours, factor } = this.segmentDurationSanitizer.adjust(segment);
        if (factor !== 1) adjusted++;
        return this.segmentPropulsionEmissions(emissionConfig, segment, hours);
      }),
    );

    if (Object.values(propulsion).every((grams) => grams === 0)) {
      console.warn(`[emission] No propulsion emissions for ${track.toString()}`);
    }
    if (adjusted > 0) {
      console.log(
        `[emission] Adjusted durations of ${adjusted}/${track.segments.length} segments`,
      );
    }

    return addMasses(propulsion, this.nonPropulsionEmissions(emissionConfig, track.durationHours));
  }

  /**
   * Emissions of auxiliary engines and boiler while moored or anchored.
   *
   * Throws ValidationError for modes other than hotelling and anchorage.
   */
  calculateMooringEmissions(durationSeconds: number, mode: Mode): PollutantMasses {
    if (!isMooringMode(mode)) {
      throw new ValidationError(
        `Mooring emissions need one of ${MOORING_MODES.join(", ")}, got ${mode}`,
      );
    }
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      throw new ValidationError(`Invalid mooring duration ${durationSeconds}`);
    }
    const emissionConfig = this.config.emissionConfigFor(this.vesselInfo, mode);
    return this.nonPropulsionEmissions(emissionConfig, durationSeconds / SECONDS_PER_HOUR);
  }

  /** Propulsion engine load fraction at a speed through water in knots */
  propulsionLoadAtStw(stw: number): number {
    const speedRatio = stw / this.vesselInfo.maxSpeed;
    return Math.min(speedRatio ** 3 * this.config.seaMarginAdjustmentFactor, 1);
  }

  /** Mean of the loads at both ends of the segment */
  segmentLoad(segment: Segment): number {
    return (
      (this.propulsionLoadAtStw(segment.start.stw) + this.propulsionLoadAtStw(segment.end.stw)) / 2
    );
  }

  /**
   * Low-load adjusted propulsion emissions of a segment.
   *
   * @param hours - Duration to use; the segment's own duration when omitted
   */
  segmentPropulsionEmissions(
    emissionConfig: EmissionConfig,
    segment: Segment,
    hours: number = segment.durationHours,
  ): PollutantMasses {
    const load = this.segmentLoad(segment);
    const kwh = load * this.vesselInfo.engineKw * hours;
    const masses = emissionsFromEnergy(emissionConfig, "propulsion", kwh);
    const factors = lowLoadFactorsAt(emissionConfig, load);
    return factors ? scaleMasses(masses, factors) : masses;
  }

  private nonPropulsionEmissions(emissionConfig: EmissionConfig, hours: number): PollutantMasses {
    return addMasses(
      ...NON_PROPULSION_ENGINE_GROUPS.map((engineGroup) =>
        emissionsFromEnergy(
          emissionConfig,
          engineGroup,
          emissionConfig.enginePowers[engineGroup] * hours,
        ),
      ),
    );
  }
}
