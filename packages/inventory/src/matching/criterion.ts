/**
 * Atomic predicates over a single named attribute.
 *
 * A criterion is one of three shapes:
 * - const: the attribute equals a scalar
 * - range: ge <= attribute < lt (half-open)
 * - any_of: the attribute satisfies at least one member criterion
 *
 * An attribute that is absent from the context never matches.
 */

import type { CriterionScalar, CriterionSpec, RangeSpec } from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import type { CriterionRegistry, ValueValidator } from "./registry.js";

/** Values a context may hold for an attribute */
export type MatchValue = CriterionScalar;

/** Currently known attribute values, keyed by criterion name */
export type MatchContext = Readonly<Record<string, MatchValue | null | undefined>>;

export interface ConstCriterion {
  kind: "const";
  name: string;
  value: CriterionScalar;
}

export interface RangeCriterion {
  kind: "range";
  name: string;
  ge: number;
  lt: number;
}

export interface AnyOfCriterion {
  kind: "any_of";
  name: string;
  members: Criterion[];
}

export type Criterion = ConstCriterion | RangeCriterion | AnyOfCriterion;

/** Whether a value lies in the half-open range [ge, lt) */
export function inRange(range: RangeSpec, value: number): boolean {
  return range.ge <= value && value < range.lt;
}

/** Check a single value against a criterion, ignoring its name */
export function criterionAccepts(criterion: Criterion, value: MatchValue): boolean {
  switch (criterion.kind) {
    case "const":
      return value === criterion.value;
    case "range":
      return typeof value === "number" && inRange(criterion, value);
    case "any_of":
      return criterion.members.some((member) => criterionAccepts(member, value));
  }
}

/** Check the value the context holds for the criterion's attribute */
export function criterionMatches(criterion: Criterion, context: MatchContext): boolean {
  const value = context[criterion.name];
  if (value === undefined || value === null) return false;
  return criterionAccepts(criterion, value);
}

function isRangeSpec(spec: object): spec is RangeSpec {
  return "ge" in spec && "lt" in spec;
}

/**
 * Parse and validate a criterion specification for an attribute.
 *
 * Throws ValidationError for unregistered names, ranges that are not
 * ge < lt, empty any_of lists and scalars rejected by the name's validator.
 */
export function parseCriterion(
  name: string,
  spec: CriterionSpec,
  registry: CriterionRegistry,
): Criterion {
  if (!registry.has(name)) {
    throw new ValidationError(`Invalid criterion name ${name}`);
  }
  return parseSpec(name, spec, registry.validatorFor(name));
}

function parseSpec(
  name: string,
  spec: CriterionSpec,
  validator: ValueValidator | null,
): Criterion {
  if (typeof spec !== "object") {
    if (validator && !validator(spec)) {
      throw new ValidationError(`Invalid ${name}: ${JSON.stringify(spec)}`);
    }
    return { kind: "const", name, value: spec };
  }

  if (isRangeSpec(spec)) {
    const { ge, lt } = spec;
    if (!Number.isFinite(ge) || !Number.isFinite(lt) || ge >= lt) {
      throw new ValidationError(`Invalid range for ${name}: ge=${ge}, lt=${lt}`);
    }
    return { kind: "range", name, ge, lt };
  }

  if (spec.any_of.length === 0) {
    throw new ValidationError(`Empty any_of for ${name}`);
  }
  return {
    kind: "any_of",
    name,
    members: spec.any_of.map((member) => parseSpec(name, member, validator)),
  };
}
