/**
 * Emission configuration for a specific vessel in a specific mode.
 *
 * EmissionConfigs holds the configuration rule lists; configFor() resolves
 * everything a calculation for one vessel and mode needs:
 *
 * - emission factors per engine group: for each pollutant, the first
 *   pollutant entry matching the vessel and engine group names a base value
 *   and optionally a multiplier and offset; the base value's g_per_kwh is
 *   resolved for the same context. Factor = offset + multiplier * base.
 * - auxiliary and boiler power in kW for the mode.
 * - the low-load adjustment range factors for the vessel.
 */

import {
  ENGINE_GROUPS,
  NON_PROPULSION_ENGINE_GROUPS,
  type EmissionFactors,
  type EngineGroup,
  type Mode,
  type NonPropulsionEngineGroup,
  type PollutantMasses,
  type RangeSpec,
  type VesselInfo,
} from "@port-emissions/types";
import type {
  BaseValueData,
  EnginePowerData,
  LowLoadData,
  PollutantData,
} from "../config/schema.js";
import { ConfigurationError, ValidationError } from "../errors.js";
import {
  criterionAccepts,
  firstMatch,
  hasCriteriaOn,
  inRange,
  isUnconditional,
  resolve,
  type MatchConfig,
  type MatchContext,
} from "../matching/index.js";
import { vesselContext } from "../vessel/vessel-info.js";

export interface RangeFactors {
  range: RangeSpec;
  factors: Readonly<Record<string, number>>;
}

export interface EmissionConfig {
  readonly emissionFactors: Readonly<Record<EngineGroup, EmissionFactors>>;
  /** Power in kW of the non-propulsion engine groups in the configured mode */
  readonly enginePowers: Readonly<Record<NonPropulsionEngineGroup, number>>;
  readonly lowLoadAdjustmentFactors: readonly RangeFactors[];
}

/** Pollutant masses in grams for energy spent by an engine group */
export function emissionsFromEnergy(
  config: EmissionConfig,
  engineGroup: EngineGroup,
  kwh: number,
): PollutantMasses {
  const masses: PollutantMasses = {};
  for (const [pollutant, gPerKwh] of Object.entries(config.emissionFactors[engineGroup])) {
    masses[pollutant] = kwh * gPerKwh;
  }
  return masses;
}

/** Adjustment factors of the first range containing the load, if any */
export function lowLoadFactorsAt(
  config: EmissionConfig,
  load: number,
): Readonly<Record<string, number>> | undefined {
  return config.lowLoadAdjustmentFactors.find(({ range }) => inRange(range, load))?.factors;
}

export class EmissionConfigs {
  constructor(
    private readonly baseValues: ReadonlyMap<string, readonly MatchConfig<BaseValueData>[]>,
    private readonly pollutants: ReadonlyMap<string, readonly MatchConfig<PollutantData>[]>,
    private readonly enginePowers: readonly MatchConfig<EnginePowerData>[],
    private readonly lowLoadAdjustmentFactors: readonly MatchConfig<LowLoadData>[],
  ) {
    this.assertValidConfig();
  }

  configFor(vesselInfo: VesselInfo, mode: Mode): EmissionConfig {
    const context = vesselContext(vesselInfo);
    return {
      emissionFactors: {
        propulsion: this.emissionFactorsFor(context, "propulsion"),
        auxiliary: this.emissionFactorsFor(context, "auxiliary"),
        boiler: this.emissionFactorsFor(context, "boiler"),
      },
      enginePowers: {
        auxiliary: this.enginePowerFor(context, "auxiliary", mode),
        boiler: this.enginePowerFor(context, "boiler", mode),
      },
      lowLoadAdjustmentFactors: this.lowLoadAdjustmentFactorsFor(context),
    };
  }

  private emissionFactorsFor(vessel: MatchContext, engineGroup: EngineGroup): EmissionFactors {
    const context = { ...vessel, engine_group: engineGroup };
    const factors: EmissionFactors = {};

    for (const [pollutant, configs] of this.pollutants) {
      const pollutantConfig = firstMatch(configs, context);
      if (!pollutantConfig) {
        throw new ConfigurationError(
          `No ${pollutant} pollutant entry matches ${engineGroup} engines of ${describeVessel(vessel)}`,
        );
      }

      const { base_value_name: baseValueName, multiplier = 1, offset_g_per_kwh: offset = 0 } =
        pollutantConfig;
      const { g_per_kwh: gPerKwh } = resolve(
        this.baseValues.get(baseValueName) ?? [],
        context,
        ["g_per_kwh"],
      );
      if (gPerKwh === undefined) {
        throw new ConfigurationError(
          `No ${baseValueName} base value matches ${engineGroup} engines of ${describeVessel(vessel)}`,
        );
      }

      factors[pollutant] = offset + multiplier * gPerKwh;
    }

    return factors;
  }

  private enginePowerFor(
    vessel: MatchContext,
    engineGroup: NonPropulsionEngineGroup,
    mode: Mode,
  ): number {
    const context = { ...vessel, engine_group: engineGroup };
    const kw = resolve(this.enginePowers, context, [mode])[mode];
    if (kw === undefined) {
      throw new ConfigurationError(`No ${engineGroup} engine power for ${describeVessel(vessel)}`);
    }
    return kw;
  }

  private lowLoadAdjustmentFactorsFor(vessel: MatchContext): RangeFactors[] {
    const { range_factors: rangeFactors = [] } = resolve(
      this.lowLoadAdjustmentFactors,
      vessel,
      ["range_factors"],
    );
    return rangeFactors;
  }

  private assertValidConfig(): void {
    for (const [pollutant, configs] of this.pollutants) {
      for (const { data } of configs) {
        if (!this.baseValues.has(data.base_value_name)) {
          throw new ConfigurationError(
            `Pollutant ${pollutant} references unknown base value ${data.base_value_name}`,
          );
        }
      }
    }

    const missingFallbacks = new Set<NonPropulsionEngineGroup>(NON_PROPULSION_ENGINE_GROUPS);
    for (const config of this.enginePowers) {
      if (isUnconditional(config)) {
        missingFallbacks.clear();
        break;
      }
      const criterion = config.criteria.get("engine_group");
      if (!criterion || !hasCriteriaOn(config, ["engine_group"])) continue;
      for (const engineGroup of ENGINE_GROUPS) {
        if (engineGroup !== "propulsion" && criterionAccepts(criterion, engineGroup)) {
          missingFallbacks.delete(engineGroup);
        }
      }
    }
    if (missingFallbacks.size > 0) {
      throw new ConfigurationError(
        `No criteria-less engine powers for engine groups ${[...missingFallbacks].join(", ")}`,
      );
    }

    for (const { data } of this.lowLoadAdjustmentFactors) {
      for (const { range } of data.range_factors) {
        if (!(range.ge < range.lt)) {
          throw new ValidationError(`Invalid low-load range ge=${range.ge}, lt=${range.lt}`);
        }
      }
    }
  }
}

function describeVessel(vessel: MatchContext): string {
  return `${String(vessel["ship_type"])} (${String(vessel["size"])} ${String(vessel["size_unit"])})`;
}
