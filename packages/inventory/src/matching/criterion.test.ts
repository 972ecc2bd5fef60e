import { describe, it, expect } from "vitest";
import { criterionMatches, parseCriterion } from "./criterion.js";
import { CriterionRegistry } from "./registry.js";
import { ValidationError } from "../errors.js";

const registry = new CriterionRegistry();

// ─── const ──────────────────────────────────────────────────────────────────

describe("const criterion", () => {
  const criterion = parseCriterion("ship_type", "container_ship", registry);

  it("matches an equal value", () => {
    expect(criterionMatches(criterion, { ship_type: "container_ship" })).toBe(true);
  });

  it("doesn't match a different value", () => {
    expect(criterionMatches(criterion, { ship_type: "tug" })).toBe(false);
  });

  it("doesn't match when the attribute is absent or null", () => {
    expect(criterionMatches(criterion, {})).toBe(false);
    expect(criterionMatches(criterion, { ship_type: null })).toBe(false);
  });

  it("compares numbers", () => {
    const tier = parseCriterion("engine_nox_tier", 1, registry);
    expect(criterionMatches(tier, { engine_nox_tier: 1 })).toBe(true);
    expect(criterionMatches(tier, { engine_nox_tier: 2 })).toBe(false);
  });
});

// ─── range ──────────────────────────────────────────────────────────────────

describe("range criterion", () => {
  const criterion = parseCriterion("size", { ge: 2000, lt: 3000 }, registry);

  it("matches the lower bound", () => {
    expect(criterionMatches(criterion, { size: 2000 })).toBe(true);
  });

  it("matches inside", () => {
    expect(criterionMatches(criterion, { size: 2999.5 })).toBe(true);
  });

  it("doesn't match the upper bound", () => {
    expect(criterionMatches(criterion, { size: 3000 })).toBe(false);
  });

  it("doesn't match below or above", () => {
    expect(criterionMatches(criterion, { size: 1999 })).toBe(false);
    expect(criterionMatches(criterion, { size: 4000 })).toBe(false);
  });

  it("doesn't match non-numbers", () => {
    expect(criterionMatches(criterion, { size: "2500" })).toBe(false);
  });

  it("rejects ranges that aren't ge < lt", () => {
    expect(() => parseCriterion("size", { ge: 3000, lt: 3000 }, registry)).toThrow(
      ValidationError,
    );
    expect(() => parseCriterion("size", { ge: 5, lt: 1 }, registry)).toThrow(ValidationError);
  });
});

// ─── any_of ─────────────────────────────────────────────────────────────────

describe("any_of criterion", () => {
  const criterion = parseCriterion(
    "keel_laid_year",
    { any_of: [1990, { ge: 2000, lt: 2011 }] },
    registry,
  );

  it("matches a scalar member", () => {
    expect(criterionMatches(criterion, { keel_laid_year: 1990 })).toBe(true);
  });

  it("matches inside a range member", () => {
    expect(criterionMatches(criterion, { keel_laid_year: 2000 })).toBe(true);
    expect(criterionMatches(criterion, { keel_laid_year: 2010 })).toBe(true);
  });

  it("doesn't match outside every member", () => {
    expect(criterionMatches(criterion, { keel_laid_year: 1991 })).toBe(false);
    expect(criterionMatches(criterion, { keel_laid_year: 2011 })).toBe(false);
  });

  it("validates every member", () => {
    expect(() =>
      parseCriterion("ship_type", { any_of: ["tug", "submarine"] }, registry),
    ).toThrow(ValidationError);
  });

  it("rejects an empty member list", () => {
    expect(() => parseCriterion("ship_type", { any_of: [] }, registry)).toThrow(ValidationError);
  });
});

// ─── names ──────────────────────────────────────────────────────────────────

describe("criterion names", () => {
  it("rejects unregistered names", () => {
    expect(() => parseCriterion("hull_color", "red", registry)).toThrow(ValidationError);
  });

  it("accepts names registered on a registry", () => {
    const custom = new CriterionRegistry({ flag_state: null });
    const criterion = parseCriterion("flag_state", "DE", custom);
    expect(criterionMatches(criterion, { flag_state: "DE" })).toBe(true);
  });

  it("refuses to register a name twice", () => {
    const custom = new CriterionRegistry();
    expect(() => custom.register("ship_type")).toThrow(ValidationError);
  });

  it("rejects values that fail the name's validator", () => {
    expect(() => parseCriterion("engine_kw", -1, registry)).toThrow(ValidationError);
    expect(() => parseCriterion("engine_category", "c4", registry)).toThrow(ValidationError);
    expect(() => parseCriterion("engine_nox_tier", 4, registry)).toThrow(ValidationError);
  });
});
