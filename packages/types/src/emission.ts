/**
 * Emission result types.
 */

/** Pollutant name (as defined by the configuration) to mass in grams */
export type PollutantMasses = Record<string, number>;

/** Pollutant name to emission factor in g/kWh */
export type EmissionFactors = Record<string, number>;
