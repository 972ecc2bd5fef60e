/**
 * Shape of the emission configuration as operators write it.
 *
 * Keys are snake_case; criteria names refer to vessel attributes in their
 * configuration spelling (max_speed, ship_type, keel_laid_year, ...).
 */

/** A scalar a criterion compares against */
export type CriterionScalar = string | number | boolean;

/** Half-open numeric range, ge <= value < lt */
export interface RangeSpec {
  ge: number;
  lt: number;
}

export interface AnyOfSpec {
  any_of: CriterionSpec[];
}

export type CriterionSpec = CriterionScalar | RangeSpec | AnyOfSpec;

/** A conditional rule: criteria plus arbitrary payload keys */
export type MatchConfigSpec = {
  match_criteria: Record<string, CriterionSpec>;
} & Record<string, unknown>;

export interface RawInventoryConfig {
  sea_margin_adjustment_factor: number;
  pollutants: Record<string, MatchConfigSpec[]>;
  base_values: Record<string, MatchConfigSpec[]>;
  default_engine_powers: MatchConfigSpec[];
  vessel_info_guess_data: MatchConfigSpec[];
  average_vessel_build_times: MatchConfigSpec[];
  low_load_adjustment_factors: MatchConfigSpec[];
}
