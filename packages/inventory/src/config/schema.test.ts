import { describe, it, expect } from "vitest";
import { SHIP_TYPES, type RawInventoryConfig } from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import { parseRawConfig } from "./schema.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function makeRawConfig(): RawInventoryConfig {
  return {
    sea_margin_adjustment_factor: 1.1,
    pollutants: { nox: [{ match_criteria: {}, base_value_name: "nox" }] },
    base_values: { nox: [{ match_criteria: {}, g_per_kwh: 10 }] },
    default_engine_powers: [
      {
        match_criteria: { engine_group: { any_of: ["auxiliary", "boiler"] } },
        transit: 10,
        maneuvering: 10,
        hotelling: 10,
        anchorage: 10,
      },
    ],
    vessel_info_guess_data: [
      {
        match_criteria: { ship_type: { any_of: [...SHIP_TYPES] } },
        ship_type: "misc",
        size: 0,
        size_unit: "n/a",
      },
    ],
    average_vessel_build_times: [{ match_criteria: {}, build_time_years: 1 }],
    low_load_adjustment_factors: [],
  };
}

function issuesOf(raw: unknown): string[] {
  try {
    parseRawConfig(raw);
  } catch (err) {
    if (err instanceof ValidationError) return err.issues;
    throw err;
  }
  return [];
}

// ─── parseRawConfig ─────────────────────────────────────────────────────────

describe("parseRawConfig", () => {
  it("accepts a well-formed configuration", () => {
    const parsed = parseRawConfig(makeRawConfig());
    expect(parsed.sea_margin_adjustment_factor).toBe(1.1);
    expect(parsed.pollutants["nox"]).toEqual([{ match_criteria: {}, base_value_name: "nox" }]);
  });

  it("rejects anything but an object", () => {
    expect(() => parseRawConfig("sea_margin_adjustment_factor: 1.1")).toThrow(ValidationError);
  });

  it("reports missing sections", () => {
    const { base_values: _baseValues, ...raw } = makeRawConfig();
    expect(issuesOf(raw)).toEqual(["base_values: Required"]);
  });

  it("requires a positive sea margin factor", () => {
    expect(issuesOf({ ...makeRawConfig(), sea_margin_adjustment_factor: 0 })).toEqual([
      "sea_margin_adjustment_factor: Number must be greater than 0",
    ]);
  });

  it("rejects unknown keys in entries", () => {
    const raw = {
      ...makeRawConfig(),
      base_values: { nox: [{ match_criteria: {}, g_per_kwh: 10, gram_per_kwh: 10 }] },
    };
    expect(issuesOf(raw)).toEqual([
      "base_values.nox.0: Unrecognized key(s) in object: 'gram_per_kwh'",
    ]);
  });

  it("requires match criteria", () => {
    const raw = { ...makeRawConfig(), average_vessel_build_times: [{ build_time_years: 1 }] };
    expect(issuesOf(raw)).toEqual(["average_vessel_build_times.0.match_criteria: Required"]);
  });

  it("checks vessel attribute values", () => {
    const raw = {
      ...makeRawConfig(),
      vessel_info_guess_data: [
        { match_criteria: {}, ship_type: "submarine", engine_category: "c4", size_unit: "teu" },
      ],
    };
    expect(issuesOf(raw)).toEqual([
      "vessel_info_guess_data.0.engine_category: invalid engine category",
      "vessel_info_guess_data.0.ship_type: unknown ship type",
    ]);
  });

  it("rejects malformed criteria", () => {
    const raw = {
      ...makeRawConfig(),
      average_vessel_build_times: [{ match_criteria: { size: { ge: 1 } }, build_time_years: 1 }],
    };
    expect(issuesOf(raw)).toHaveLength(1);
    expect(issuesOf(raw)[0]).toMatch(/^average_vessel_build_times\.0\.match_criteria\.size: /);
  });

  it("requires at least one range per low-load entry", () => {
    const raw = {
      ...makeRawConfig(),
      low_load_adjustment_factors: [{ match_criteria: {}, range_factors: [] }],
    };
    expect(issuesOf(raw)).toHaveLength(1);
  });
});
