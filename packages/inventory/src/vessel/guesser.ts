/**
 * Guessing missing vessel information from configuration.
 *
 * Operators rarely know everything about a vessel. The guesser fills the
 * gaps from `vessel_info_guess_data`, scanning the entries in order and
 * taking each attribute from the first matching entry that supplies it.
 * Attributes guessed from earlier entries take part in matching later ones,
 * so a guessed ship type can select ship-type specific engine data.
 *
 * NOx tiers mostly depend on the keel-laid year, which is often unknown while
 * the year of build is known. For c3 engines the guess runs in two stages:
 *
 * 1. Guess every attribute from what the caller knows.
 * 2. Derive keel_laid_year = year_of_build - average build time (looked up
 *    with everything known or guessed so far), then guess the NOx tier again
 *    with keel_laid_year in the context. The second stage replaces the first
 *    stage's NOx tier, never one the caller supplied.
 */

import { SHIP_TYPES, type VesselInfo, type VesselQuery } from "@port-emissions/types";
import type { BuildTimeData, VesselGuessData } from "../config/schema.js";
import { ConfigurationError, ValidationError } from "../errors.js";
import {
  criterionAccepts,
  firstMatch,
  hasCriteriaOn,
  isUnconditional,
  resolve,
  type MatchConfig,
  type MatchContext,
} from "../matching/index.js";
import {
  VESSEL_ATTRIBUTE_NAMES,
  isValidSizeUnit,
  knownAttributes,
  queryContext,
  vesselInfoFromAttributes,
  type VesselAttributeName,
  type VesselAttributes,
} from "./vessel-info.js";

/** Neutral values to lay guess entries over when checking them */
const CHECK_DEFAULTS: VesselAttributes = {
  max_speed: 1,
  engine_kw: 1,
  engine_rpm: 1,
  engine_category: "c1",
  engine_nox_tier: 1,
  ship_type: "misc",
  size: 0,
  size_unit: "n/a",
};

const TYPE_AND_SIZE = ["ship_type", "size", "size_unit"] as const;

/**
 * Size and size unit only make sense for the ship type they were given with,
 * so they are only taken from entries naming the ship type already known.
 */
function acceptAttribute(
  key: VesselAttributeName,
  data: VesselGuessData,
  collected: Readonly<Partial<VesselGuessData>>,
): boolean {
  if (key !== "size" && key !== "size_unit") return true;
  const shipType = data.ship_type;
  if (shipType === undefined) return false;
  return collected.ship_type === undefined || collected.ship_type === shipType;
}

function isComplete(attrs: Partial<VesselAttributes>): attrs is VesselAttributes {
  return VESSEL_ATTRIBUTE_NAMES.every((name) => attrs[name] !== undefined);
}

export class VesselInfoGuesser {
  /** What would be guessed if nothing is known about a vessel */
  readonly defaultVesselInfo: VesselInfo;

  constructor(
    private readonly guessData: readonly MatchConfig<VesselGuessData>[],
    private readonly buildTimes: readonly MatchConfig<BuildTimeData>[],
  ) {
    this.assertValidConfig();
    this.defaultVesselInfo = this.guessMissing({});
  }

  /**
   * Complete a partial vessel description.
   *
   * Attributes present in the query are kept as they are. Throws
   * ValidationError when size or size unit are given without a ship type or
   * the result is invalid, and ConfigurationError when the configuration
   * can't supply an attribute.
   */
  guessMissing(query: VesselQuery): VesselInfo {
    if (query.shipType == null && (query.size != null || query.sizeUnit != null)) {
      throw new ValidationError("Size specified without a ship type");
    }

    const context = queryContext(query);
    let attrs = this.guessAttributes(knownAttributes(query), context);
    if (query.engineNoxTier == null) {
      attrs = this.refineNoxTier(attrs, query, context);
    }
    return this.toVesselInfo(attrs);
  }

  private guessAttributes(
    known: Partial<VesselAttributes>,
    context: MatchContext,
  ): Partial<VesselAttributes> {
    const guessed = resolve(this.guessData, context, VESSEL_ATTRIBUTE_NAMES, {
      initial: known,
      contextFor: (collected) => ({ ...context, ...collected }),
      accept: acceptAttribute,
    });
    return { ...guessed };
  }

  private refineNoxTier(
    attrs: Partial<VesselAttributes>,
    query: VesselQuery,
    context: MatchContext,
  ): Partial<VesselAttributes> {
    if (
      attrs.engine_category !== "c3" ||
      query.keelLaidYear != null ||
      query.yearOfBuild == null
    ) {
      return attrs;
    }

    const { engine_nox_tier: _firstGuess, ...withoutTier } = attrs;
    const buildTime = firstMatch(this.buildTimes, { ...context, ...withoutTier });
    if (!buildTime) {
      throw new ConfigurationError("No average vessel build time matches");
    }
    const keelLaidYear = query.yearOfBuild - buildTime.build_time_years;
    return this.guessAttributes(withoutTier, { ...context, keel_laid_year: keelLaidYear });
  }

  private toVesselInfo(attrs: Partial<VesselAttributes>): VesselInfo {
    if ((attrs.size === undefined) !== (attrs.size_unit === undefined)) {
      throw new ConfigurationError("size and size_unit must be resolved together");
    }
    if (!isComplete(attrs)) {
      const missing = VESSEL_ATTRIBUTE_NAMES.filter((name) => attrs[name] === undefined);
      throw new ConfigurationError(`No value for vessel attributes ${missing.join(", ")}`);
    }
    return vesselInfoFromAttributes(attrs);
  }

  private assertValidConfig(): void {
    const defaultsSeen = new Set<string>();
    const shipTypesWithSize = new Set<string>();

    for (const config of this.guessData) {
      const { data } = config;
      try {
        vesselInfoFromAttributes({ ...CHECK_DEFAULTS, ...data });
      } catch (err) {
        if (err instanceof ValidationError) {
          throw new ValidationError(
            `Unable to build vessel info from ${JSON.stringify(data)}`,
            err.issues,
          );
        }
        throw err;
      }

      const present = TYPE_AND_SIZE.filter((name) => data[name] !== undefined);
      if (present.length > 0) {
        if (present.length < TYPE_AND_SIZE.length) {
          throw new ConfigurationError(
            `Attributes ${TYPE_AND_SIZE.join(", ")} must be specified together in ${JSON.stringify(data)}`,
          );
        }
        if (
          data.ship_type !== undefined &&
          data.size_unit !== undefined &&
          !isValidSizeUnit(data.ship_type, data.size_unit)
        ) {
          throw new ValidationError(`${data.size_unit} is not a valid unit for ${data.ship_type}`);
        }
      }

      if (isUnconditional(config)) {
        for (const name of VESSEL_ATTRIBUTE_NAMES) {
          if (data[name] !== undefined) defaultsSeen.add(name);
        }
      }

      const shipTypeCriterion = config.criteria.get("ship_type");
      if (shipTypeCriterion && hasCriteriaOn(config, ["ship_type"]) && data.size !== undefined) {
        for (const shipType of SHIP_TYPES) {
          if (criterionAccepts(shipTypeCriterion, shipType)) shipTypesWithSize.add(shipType);
        }
      }
    }

    const missingDefaults = VESSEL_ATTRIBUTE_NAMES.filter((name) => !defaultsSeen.has(name));
    if (missingDefaults.length > 0) {
      throw new ConfigurationError(
        `Attributes ${missingDefaults.join(", ")} are not present in a criteria-less entry`,
      );
    }

    const missingSizes = SHIP_TYPES.filter((shipType) => !shipTypesWithSize.has(shipType));
    if (missingSizes.length > 0) {
      throw new ConfigurationError(
        `No sizes and units specified for ship types ${missingSizes.join(", ")}`,
      );
    }

    if (!this.buildTimes.some(isUnconditional)) {
      throw new ConfigurationError("No criteria-less average vessel build time exists");
    }
  }
}
