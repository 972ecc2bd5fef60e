/**
 * Match configs: a set of criteria paired with a payload of data.
 *
 * A match config matches a context when every one of its criteria matches.
 * A config without criteria matches everything and acts as the fallback.
 */

import type { CriterionSpec } from "@port-emissions/types";
import { criterionMatches, parseCriterion, type Criterion, type MatchContext } from "./criterion.js";
import type { CriterionRegistry } from "./registry.js";

export interface MatchConfig<TData extends object> {
  /** Criteria keyed by attribute name */
  readonly criteria: ReadonlyMap<string, Criterion>;
  readonly data: TData;
}

export function createMatchConfig<TData extends object>(
  criteriaSpec: Readonly<Record<string, CriterionSpec>>,
  data: TData,
  registry: CriterionRegistry,
): MatchConfig<TData> {
  const criteria = new Map<string, Criterion>();
  for (const [name, spec] of Object.entries(criteriaSpec)) {
    criteria.set(name, parseCriterion(name, spec, registry));
  }
  return { criteria, data };
}

export function matchConfigMatches(
  config: MatchConfig<object>,
  context: MatchContext,
): boolean {
  for (const criterion of config.criteria.values()) {
    if (!criterionMatches(criterion, context)) return false;
  }
  return true;
}

/** True for a config without criteria */
export function isUnconditional(config: MatchConfig<object>): boolean {
  return config.criteria.size === 0;
}

/** True when the config's criteria are on exactly the given attribute names */
export function hasCriteriaOn(config: MatchConfig<object>, names: readonly string[]): boolean {
  return config.criteria.size === names.length && names.every((name) => config.criteria.has(name));
}
