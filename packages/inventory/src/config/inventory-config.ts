/**
 * The assembled emission configuration.
 *
 * Built from the raw (parsed JSON) configuration: every rule list becomes a
 * list of match configs, criteria are checked against the criterion registry
 * and the semantic checks of the guesser and the emission configs run once,
 * here. The result is read-only and may be shared by any number of
 * calculators.
 */

import type { CriterionSpec, Mode, VesselInfo, VesselQuery } from "@port-emissions/types";
import { EmissionConfigs, type EmissionConfig } from "../emission/emission-config.js";
import {
  CriterionRegistry,
  createMatchConfig,
  type MatchConfig,
  type ValueValidator,
} from "../matching/index.js";
import { VesselInfoGuesser } from "../vessel/guesser.js";
import {
  parseRawConfig,
  type BaseValueData,
  type BuildTimeData,
  type EnginePowerData,
  type LowLoadData,
  type PollutantData,
  type VesselGuessData,
} from "./schema.js";

export interface InventoryConfigOptions {
  /** Criterion names usable besides the built-in ones, with their validators */
  criteria?: Readonly<Record<string, ValueValidator | null>>;
}

interface Entry {
  match_criteria: Record<string, CriterionSpec>;
}

function toMatchConfigs<TEntry extends Entry>(
  entries: readonly TEntry[],
  registry: CriterionRegistry,
): MatchConfig<Omit<TEntry, "match_criteria">>[] {
  return entries.map(({ match_criteria: criteria, ...data }) =>
    createMatchConfig(criteria, data, registry),
  );
}

function toMatchConfigMap<TEntry extends Entry>(
  entries: Readonly<Record<string, readonly TEntry[]>>,
  registry: CriterionRegistry,
): Map<string, MatchConfig<Omit<TEntry, "match_criteria">>[]> {
  return new Map<string, MatchConfig<Omit<TEntry, "match_criteria">>[]>(
    Object.entries(entries).map(([name, list]) => [name, toMatchConfigs(list, registry)]),
  );
}

export class InventoryConfig {
  readonly seaMarginAdjustmentFactor: number;
  readonly pollutants: ReadonlyMap<string, readonly MatchConfig<PollutantData>[]>;
  readonly baseValues: ReadonlyMap<string, readonly MatchConfig<BaseValueData>[]>;
  readonly defaultEnginePowers: readonly MatchConfig<EnginePowerData>[];
  readonly vesselInfoGuessData: readonly MatchConfig<VesselGuessData>[];
  readonly averageVesselBuildTimes: readonly MatchConfig<BuildTimeData>[];
  readonly lowLoadAdjustmentFactors: readonly MatchConfig<LowLoadData>[];

  private readonly guesser: VesselInfoGuesser;
  private readonly emissionConfigs: EmissionConfigs;

  private constructor(raw: unknown, options: InventoryConfigOptions) {
    const parsed = parseRawConfig(raw);
    const registry = new CriterionRegistry(options.criteria);

    this.seaMarginAdjustmentFactor = parsed.sea_margin_adjustment_factor;
    this.pollutants = toMatchConfigMap(parsed.pollutants, registry);
    this.baseValues = toMatchConfigMap(parsed.base_values, registry);
    this.defaultEnginePowers = toMatchConfigs(parsed.default_engine_powers, registry);
    this.vesselInfoGuessData = toMatchConfigs(parsed.vessel_info_guess_data, registry);
    this.averageVesselBuildTimes = toMatchConfigs(parsed.average_vessel_build_times, registry);
    this.lowLoadAdjustmentFactors = toMatchConfigs(parsed.low_load_adjustment_factors, registry);

    this.guesser = new VesselInfoGuesser(this.vesselInfoGuessData, this.averageVesselBuildTimes);
    this.emissionConfigs = new EmissionConfigs(
      this.baseValues,
      this.pollutants,
      this.defaultEnginePowers,
      this.lowLoadAdjustmentFactors,
    );
  }

  /**
   * Validate and assemble a raw configuration object.
   *
   * Throws ValidationError for structural problems and invalid values,
   * ConfigurationError for missing fallbacks.
   */
  static fromRaw(raw: unknown, options: InventoryConfigOptions = {}): InventoryConfig {
    return new InventoryConfig(raw, options);
  }

  /** Vessel info guessed when nothing is known about a vessel */
  get defaultVesselInfo(): VesselInfo {
    return this.guesser.defaultVesselInfo;
  }

  guessMissingVesselInfo(query: VesselQuery): VesselInfo {
    return this.guesser.guessMissing(query);
  }

  emissionConfigFor(vesselInfo: VesselInfo, mode: Mode): EmissionConfig {
    return this.emissionConfigs.configFor(vesselInfo, mode);
  }
}
