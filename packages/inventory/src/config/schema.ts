/**
 * Schema of the raw emission configuration.
 *
 * Checks structure and types only; the semantic checks (fallback entries,
 * criterion names, size units) happen when the config is assembled.
 */

import { z } from "zod";
import {
  ENGINE_CATEGORIES,
  ENGINE_NOX_TIERS,
  SHIP_SIZE_UNITS,
  type CriterionSpec,
  type EngineCategory,
  type EngineNoxTier,
  type ShipSizeUnit,
  type ShipType,
} from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import { isShipType } from "../vessel/vessel-info.js";

function isOneOf<T extends string | number>(allowed: readonly T[], value: string | number): boolean {
  return allowed.some((item) => item === value);
}

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

const rangeSchema = z.object({ ge: z.number(), lt: z.number() }).strict();

const criterionSchema: z.ZodType<CriterionSpec> = z.lazy(() =>
  z.union([scalarSchema, rangeSchema, z.object({ any_of: z.array(criterionSchema) }).strict()]),
);

const matchCriteriaSchema = z.record(criterionSchema);

const engineCategorySchema = z
  .string()
  .refine((v): v is EngineCategory => isOneOf(ENGINE_CATEGORIES, v), {
    message: "invalid engine category",
  });

const noxTierSchema = z
  .number()
  .refine((v): v is EngineNoxTier => isOneOf(ENGINE_NOX_TIERS, v), {
    message: "invalid NOx tier",
  });

const sizeUnitSchema = z
  .string()
  .refine((v): v is ShipSizeUnit => isOneOf(SHIP_SIZE_UNITS, v), {
    message: "invalid size unit",
  });

const shipTypeSchema = z
  .string()
  .refine((v): v is ShipType => isShipType(v), { message: "unknown ship type" });

export const pollutantEntrySchema = z
  .object({
    match_criteria: matchCriteriaSchema,
    base_value_name: z.string(),
    multiplier: z.number().optional(),
    offset_g_per_kwh: z.number().optional(),
  })
  .strict();

export const baseValueEntrySchema = z
  .object({
    match_criteria: matchCriteriaSchema,
    g_per_kwh: z.number(),
  })
  .strict();

export const enginePowerEntrySchema = z
  .object({
    match_criteria: matchCriteriaSchema,
    transit: z.number(),
    maneuvering: z.number(),
    hotelling: z.number(),
    anchorage: z.number(),
  })
  .strict();

export const vesselGuessEntrySchema = z
  .object({
    match_criteria: matchCriteriaSchema,
    max_speed: z.number().optional(),
    engine_kw: z.number().optional(),
    engine_rpm: z.number().optional(),
    engine_category: engineCategorySchema.optional(),
    engine_nox_tier: noxTierSchema.optional(),
    ship_type: shipTypeSchema.optional(),
    size: z.number().optional(),
    size_unit: sizeUnitSchema.optional(),
  })
  .strict();

export const buildTimeEntrySchema = z
  .object({
    match_criteria: matchCriteriaSchema,
    build_time_years: z.number(),
  })
  .strict();

export const lowLoadEntrySchema = z
  .object({
    match_criteria: matchCriteriaSchema,
    range_factors: z
      .array(
        z
          .object({
            range: rangeSchema,
            factors: z.record(z.number()),
          })
          .strict(),
      )
      .min(1),
  })
  .strict();

export const inventoryConfigSchema = z.object({
  sea_margin_adjustment_factor: z.number().positive(),
  pollutants: z.record(z.array(pollutantEntrySchema)),
  base_values: z.record(z.array(baseValueEntrySchema)),
  default_engine_powers: z.array(enginePowerEntrySchema),
  vessel_info_guess_data: z.array(vesselGuessEntrySchema),
  average_vessel_build_times: z.array(buildTimeEntrySchema),
  low_load_adjustment_factors: z.array(lowLoadEntrySchema),
});

export type ParsedInventoryConfig = z.infer<typeof inventoryConfigSchema>;

/** Payload types, i.e. the entries without their match_criteria */
export type PollutantData = Omit<z.infer<typeof pollutantEntrySchema>, "match_criteria">;
export type BaseValueData = Omit<z.infer<typeof baseValueEntrySchema>, "match_criteria">;
export type EnginePowerData = Omit<z.infer<typeof enginePowerEntrySchema>, "match_criteria">;
export type VesselGuessData = Omit<z.infer<typeof vesselGuessEntrySchema>, "match_criteria">;
export type BuildTimeData = Omit<z.infer<typeof buildTimeEntrySchema>, "match_criteria">;
export type LowLoadData = Omit<z.infer<typeof lowLoadEntrySchema>, "match_criteria">;

/** Check a raw configuration object, collecting every issue */
export function parseRawConfig(raw: unknown): ParsedInventoryConfig {
  const result = inventoryConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      "Invalid configuration",
      result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return result.data;
}
