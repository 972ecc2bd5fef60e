/**
 * Arithmetic on pollutant mass mappings.
 */

import type { PollutantMasses } from "@port-emissions/types";

/** Union of keys, values of shared keys added */
export function addMasses(...masses: Readonly<PollutantMasses>[]): PollutantMasses {
  const total: PollutantMasses = {};
  for (const entry of masses) {
    for (const [pollutant, grams] of Object.entries(entry)) {
      total[pollutant] = (total[pollutant] ?? 0) + grams;
    }
  }
  return total;
}

/** Multiply the pollutants that have a factor, leave the rest as they are */
export function scaleMasses(
  masses: Readonly<PollutantMasses>,
  factors: Readonly<Record<string, number>>,
): PollutantMasses {
  const scaled: PollutantMasses = {};
  for (const [pollutant, grams] of Object.entries(masses)) {
    scaled[pollutant] = grams * (factors[pollutant] ?? 1);
  }
  return scaled;
}
