/**
 * Config resolution: answering questions from ordered lists of match configs.
 *
 * Configs are scanned in list order. For each needed key, the value comes
 * from the first config that both matches the context and supplies the key;
 * later configs never override it. Scanning stops as soon as every needed key
 * has a value. List order is therefore part of the configuration's meaning:
 * specific entries go first, fallbacks (no criteria) last.
 */

import type { MatchContext } from "./criterion.js";
import { matchConfigMatches, type MatchConfig } from "./match-config.js";

export interface ResolveOptions<TData extends object, K extends keyof TData> {
  /** Values already known; these count as collected and are never replaced */
  initial?: Partial<TData>;
  /**
   * Build the context used for each config from what has been collected so
   * far. Lets values found in earlier configs take part in matching later
   * ones. Defaults to the fixed context.
   */
  contextFor?: (collected: Readonly<Partial<TData>>) => MatchContext;
  /** Veto taking a key's value from a matching config */
  accept?: (key: K, data: TData, collected: Readonly<Partial<TData>>) => boolean;
}

function isComplete<TData extends object>(
  collected: Partial<TData>,
  neededKeys: readonly (keyof TData)[],
): boolean {
  return neededKeys.every((key) => collected[key] !== undefined);
}

/**
 * Collect values for the needed keys from the first matching configs that
 * supply them.
 *
 * The result may lack keys when no matching config supplies them; callers
 * decide whether that is an error.
 */
export function resolve<TData extends object, K extends keyof TData>(
  configs: readonly MatchConfig<TData>[],
  context: MatchContext,
  neededKeys: readonly K[],
  options: ResolveOptions<TData, K> = {},
): Partial<TData> {
  const { contextFor, accept } = options;
  const collected: Partial<TData> = options.initial ? { ...options.initial } : {};

  for (const config of configs) {
    if (isComplete(collected, neededKeys)) break;
    const matchContext = contextFor ? contextFor(collected) : context;
    if (!matchConfigMatches(config, matchContext)) continue;

    for (const key of neededKeys) {
      if (collected[key] !== undefined) continue;
      const value = config.data[key];
      if (value === undefined) continue;
      if (accept && !accept(key, config.data, collected)) continue;
      collected[key] = value;
    }
  }

  return collected;
}

/** Find the data of the first config matching the context */
export function firstMatch<TData extends object>(
  configs: readonly MatchConfig<TData>[],
  context: MatchContext,
): TData | undefined {
  return configs.find((config) => matchConfigMatches(config, context))?.data;
}
