/**
 * Registry of criterion names usable in match configs.
 *
 * Each name may carry a validator that constant values given for it must
 * pass. Ranges are not validated beyond ge < lt.
 */

import {
  ENGINE_CATEGORIES,
  ENGINE_GROUPS,
  ENGINE_NOX_TIERS,
  SHIP_SIZE_UNITS,
  SHIP_TYPES,
} from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import type { MatchValue } from "./criterion.js";

export type ValueValidator = (value: MatchValue) => boolean;

const nonNegative: ValueValidator = (value) => typeof value === "number" && value >= 0;

function oneOf(allowed: readonly MatchValue[]): ValueValidator {
  return (value) => allowed.includes(value);
}

/** Names known to every registry, with their validators (null = anything goes) */
export const DEFAULT_CRITERION_VALIDATORS: Readonly<Record<string, ValueValidator | null>> = {
  max_speed: nonNegative,
  engine_kw: nonNegative,
  engine_rpm: nonNegative,
  engine_category: oneOf(ENGINE_CATEGORIES),
  engine_nox_tier: oneOf(ENGINE_NOX_TIERS),
  ship_type: oneOf(SHIP_TYPES),
  size: nonNegative,
  size_unit: oneOf(SHIP_SIZE_UNITS),
  engine_group: oneOf(ENGINE_GROUPS),
  length: nonNegative,
  width: nonNegative,
  ais_type: null,
  keel_laid_year: null,
  year_of_build: null,
};

export class CriterionRegistry {
  private readonly validators = new Map<string, ValueValidator | null>();

  constructor(extra: Readonly<Record<string, ValueValidator | null>> = {}) {
    for (const [name, validator] of Object.entries(DEFAULT_CRITERION_VALIDATORS)) {
      this.validators.set(name, validator);
    }
    for (const [name, validator] of Object.entries(extra)) {
      this.register(name, validator);
    }
  }

  has(name: string): boolean {
    return this.validators.has(name);
  }

  validatorFor(name: string): ValueValidator | null {
    return this.validators.get(name) ?? null;
  }

  /** Make a new criterion name usable. Names can only be registered once. */
  register(name: string, validator: ValueValidator | null = null): void {
    if (this.validators.has(name)) {
      throw new ValidationError(`${name} was already registered`);
    }
    this.validators.set(name, validator);
  }
}
