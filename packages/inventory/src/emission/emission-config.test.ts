import { describe, it, expect } from "vitest";
import type { CriterionSpec, VesselInfo } from "@port-emissions/types";
import type {
  BaseValueData,
  EnginePowerData,
  LowLoadData,
  PollutantData,
} from "../config/schema.js";
import { ConfigurationError, ValidationError } from "../errors.js";
import { CriterionRegistry, createMatchConfig, type MatchConfig } from "../matching/index.js";
import {
  EmissionConfigs,
  emissionsFromEnergy,
  lowLoadFactorsAt,
  type EmissionConfig,
} from "./emission-config.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

const registry = new CriterionRegistry();

function rule<TData extends object>(
  criteria: Record<string, CriterionSpec>,
  data: TData,
): MatchConfig<TData> {
  return createMatchConfig(criteria, data, registry);
}

function single<TData extends object>(
  name: string,
  ...configs: MatchConfig<TData>[]
): Map<string, MatchConfig<TData>[]> {
  return new Map([[name, configs]]);
}

function makeVesselInfo(overrides: Partial<VesselInfo> = {}): VesselInfo {
  return {
    maxSpeed: 20,
    engineKw: 10000,
    engineRpm: 100,
    engineCategory: "c3",
    engineNoxTier: 0,
    shipType: "container_ship",
    size: 4000,
    sizeUnit: "teu",
    ...overrides,
  };
}

const BASE_VALUES = new Map<string, MatchConfig<BaseValueData>[]>([
  [
    "bsfc",
    [
      rule({ engine_group: "propulsion" }, { g_per_kwh: 200 }),
      rule({ engine_group: "auxiliary" }, { g_per_kwh: 220 }),
      rule({ engine_group: "boiler" }, { g_per_kwh: 300 }),
    ],
  ],
  [
    "nox",
    [
      rule({ engine_group: "propulsion", engine_nox_tier: 0 }, { g_per_kwh: 17 }),
      rule({}, { g_per_kwh: 10 }),
    ],
  ],
]);

const POLLUTANTS = new Map<string, MatchConfig<PollutantData>[]>([
  ["nox", [rule({}, { base_value_name: "nox" })]],
  ["co2", [rule({}, { base_value_name: "bsfc", multiplier: 3 })]],
  [
    "sox",
    [
      rule({ ship_type: "tug" }, { base_value_name: "bsfc", multiplier: 0.5, offset_g_per_kwh: 1 }),
      rule({}, { base_value_name: "bsfc", multiplier: 0.25 }),
    ],
  ],
]);

const ENGINE_POWERS: MatchConfig<EnginePowerData>[] = [
  rule(
    { engine_group: "auxiliary", ship_type: "container_ship" },
    { transit: 1000, maneuvering: 2000, hotelling: 500, anchorage: 800 },
  ),
  rule({ engine_group: "auxiliary" }, { transit: 100, maneuvering: 100, hotelling: 100, anchorage: 100 }),
  rule({ engine_group: "boiler" }, { transit: 0, maneuvering: 50, hotelling: 50, anchorage: 50 }),
];

const TUG_LOW_LOAD: MatchConfig<LowLoadData> = rule(
  { ship_type: "tug" },
  { range_factors: [{ range: { ge: 0, lt: 0.5 }, factors: { nox: 4 } }] },
);

const LOW_LOAD: MatchConfig<LowLoadData>[] = [
  TUG_LOW_LOAD,
  rule({}, { range_factors: [{ range: { ge: 0, lt: 0.2 }, factors: { co2: 2 } }] }),
];

function makeConfigs(
  overrides: {
    pollutants?: Map<string, MatchConfig<PollutantData>[]>;
    enginePowers?: MatchConfig<EnginePowerData>[];
    lowLoad?: MatchConfig<LowLoadData>[];
  } = {},
): EmissionConfigs {
  return new EmissionConfigs(
    BASE_VALUES,
    overrides.pollutants ?? POLLUTANTS,
    overrides.enginePowers ?? ENGINE_POWERS,
    overrides.lowLoad ?? LOW_LOAD,
  );
}

// ─── configFor ──────────────────────────────────────────────────────────────

describe("EmissionConfigs.configFor", () => {
  const configs = makeConfigs();

  it("resolves factors, powers and low-load ranges for a vessel", () => {
    expect(configs.configFor(makeVesselInfo(), "hotelling")).toEqual({
      emissionFactors: {
        propulsion: { nox: 17, co2: 600, sox: 50 },
        auxiliary: { nox: 10, co2: 660, sox: 55 },
        boiler: { nox: 10, co2: 900, sox: 75 },
      },
      enginePowers: { auxiliary: 500, boiler: 50 },
      lowLoadAdjustmentFactors: [{ range: { ge: 0, lt: 0.2 }, factors: { co2: 2 } }],
    });
  });

  it("takes multiplier and offset from the matching pollutant entry", () => {
    const tug = makeVesselInfo({ shipType: "tug", size: 0, sizeUnit: "n/a" });
    const config = configs.configFor(tug, "transit");
    expect(config.emissionFactors.propulsion["sox"]).toBe(101);
    expect(config.lowLoadAdjustmentFactors).toEqual([
      { range: { ge: 0, lt: 0.5 }, factors: { nox: 4 } },
    ]);
  });

  it("falls back to the criteria-less engine powers", () => {
    const tug = makeVesselInfo({ shipType: "tug", size: 0, sizeUnit: "n/a" });
    expect(configs.configFor(tug, "maneuvering").enginePowers).toEqual({
      auxiliary: 100,
      boiler: 50,
    });
  });

  it("uses the engine power of the mode", () => {
    expect(configs.configFor(makeVesselInfo(), "anchorage").enginePowers.auxiliary).toBe(800);
    expect(configs.configFor(makeVesselInfo(), "transit").enginePowers).toEqual({
      auxiliary: 1000,
      boiler: 0,
    });
  });

  it("has no low-load ranges when no entry matches", () => {
    const config = makeConfigs({ lowLoad: [TUG_LOW_LOAD] });
    expect(config.configFor(makeVesselInfo(), "transit").lowLoadAdjustmentFactors).toEqual([]);
  });

  it("fails when no pollutant entry matches", () => {
    const pollutants = single<PollutantData>(
      "pm",
      rule({ ship_type: "tug" }, { base_value_name: "bsfc" }),
    );
    expect(() => makeConfigs({ pollutants }).configFor(makeVesselInfo(), "transit")).toThrow(
      ConfigurationError,
    );
  });

  it("fails when no base value matches", () => {
    const baseValues = single<BaseValueData>(
      "pm",
      rule({ engine_group: "boiler" }, { g_per_kwh: 1 }),
    );
    const pollutants = single<PollutantData>("pm", rule({}, { base_value_name: "pm" }));
    const configs = new EmissionConfigs(baseValues, pollutants, ENGINE_POWERS, LOW_LOAD);
    expect(() => configs.configFor(makeVesselInfo(), "transit")).toThrow(
      "No pm base value matches propulsion engines of container_ship (4000 teu)",
    );
  });
});

// ─── Config checks ──────────────────────────────────────────────────────────

describe("EmissionConfigs config checks", () => {
  it("requires known base value names", () => {
    const pollutants = single<PollutantData>("pm", rule({}, { base_value_name: "soot" }));
    expect(() => makeConfigs({ pollutants })).toThrow(
      "Pollutant pm references unknown base value soot",
    );
  });

  it("requires a fallback engine power per engine group", () => {
    const auxiliaryOnly = ENGINE_POWERS.slice(0, 2);
    expect(() => makeConfigs({ enginePowers: auxiliaryOnly })).toThrow(
      "No criteria-less engine powers for engine groups boiler",
    );
  });

  it("doesn't count entries with further criteria as fallback", () => {
    const containerOnly = ENGINE_POWERS.slice(0, 1);
    expect(() => makeConfigs({ enginePowers: containerOnly })).toThrow(ConfigurationError);
  });

  it("accepts one fallback covering both engine groups", () => {
    const both = rule(
      { engine_group: { any_of: ["auxiliary", "boiler"] } },
      { transit: 1, maneuvering: 1, hotelling: 1, anchorage: 1 },
    );
    expect(() => makeConfigs({ enginePowers: [both] })).not.toThrow();
  });

  it("accepts an entry without criteria as fallback for both engine groups", () => {
    const catchAll = rule({}, { transit: 10, maneuvering: 10, hotelling: 10, anchorage: 10 });
    const configs = makeConfigs({ enginePowers: [catchAll] });
    expect(configs.configFor(makeVesselInfo(), "hotelling").enginePowers).toEqual({
      auxiliary: 10,
      boiler: 10,
    });
  });

  it("rejects empty low-load ranges", () => {
    const lowLoad = [rule({}, { range_factors: [{ range: { ge: 0.2, lt: 0.2 }, factors: {} }] })];
    expect(() => makeConfigs({ lowLoad })).toThrow(ValidationError);
  });
});

// ─── Helpers on a resolved config ───────────────────────────────────────────

describe("resolved emission config", () => {
  const config: EmissionConfig = {
    emissionFactors: {
      propulsion: { nox: 10, co2: 600 },
      auxiliary: { nox: 5 },
      boiler: {},
    },
    enginePowers: { auxiliary: 100, boiler: 0 },
    lowLoadAdjustmentFactors: [
      { range: { ge: 0, lt: 0.1 }, factors: { co2: 3 } },
      { range: { ge: 0.1, lt: 0.2 }, factors: { co2: 2 } },
    ],
  };

  it("turns energy into pollutant masses", () => {
    expect(emissionsFromEnergy(config, "propulsion", 2)).toEqual({ nox: 20, co2: 1200 });
    expect(emissionsFromEnergy(config, "boiler", 2)).toEqual({});
  });

  it("finds the low-load range of a load", () => {
    expect(lowLoadFactorsAt(config, 0)).toEqual({ co2: 3 });
    expect(lowLoadFactorsAt(config, 0.1)).toEqual({ co2: 2 });
    expect(lowLoadFactorsAt(config, 0.2)).toBeUndefined();
  });
});
