/**
 * VesselInfo construction and the mapping between VesselInfo fields and the
 * attribute names used in configuration criteria.
 */

import {
  ENGINE_CATEGORIES,
  ENGINE_NOX_TIERS,
  SHIP_TYPE_SIZE_UNITS,
  type EngineCategory,
  type EngineNoxTier,
  type ShipSizeUnit,
  type ShipType,
  type VesselInfo,
  type VesselQuery,
} from "@port-emissions/types";
import { ValidationError } from "../errors.js";
import type { MatchContext } from "../matching/index.js";

/** VesselInfo in configuration spelling */
export interface VesselAttributes {
  max_speed: number;
  engine_kw: number;
  engine_rpm: number;
  engine_category: EngineCategory;
  engine_nox_tier: EngineNoxTier;
  ship_type: ShipType;
  size: number;
  size_unit: ShipSizeUnit;
}

export type VesselAttributeName = keyof VesselAttributes;

/** Attribute names in the order they are resolved */
export const VESSEL_ATTRIBUTE_NAMES: readonly VesselAttributeName[] = [
  "max_speed",
  "engine_kw",
  "engine_rpm",
  "engine_category",
  "engine_nox_tier",
  "ship_type",
  "size",
  "size_unit",
];

export function isShipType(value: unknown): value is ShipType {
  return typeof value === "string" && Object.hasOwn(SHIP_TYPE_SIZE_UNITS, value);
}

/** Whether a size unit makes sense for a ship type */
export function isValidSizeUnit(shipType: ShipType, sizeUnit: string): boolean {
  const units: readonly string[] = SHIP_TYPE_SIZE_UNITS[shipType];
  return units.includes(sizeUnit);
}

function vesselInfoIssues(info: VesselInfo): string[] {
  const issues: string[] = [];
  if (!(info.maxSpeed > 0)) issues.push(`max_speed must be positive, got ${info.maxSpeed}`);
  if (!(info.engineKw > 0)) issues.push(`engine_kw must be positive, got ${info.engineKw}`);
  if (!(info.engineRpm > 0)) issues.push(`engine_rpm must be positive, got ${info.engineRpm}`);
  if (!ENGINE_CATEGORIES.includes(info.engineCategory)) {
    issues.push(`invalid engine_category ${String(info.engineCategory)}`);
  }
  if (!ENGINE_NOX_TIERS.includes(info.engineNoxTier)) {
    issues.push(`invalid engine_nox_tier ${String(info.engineNoxTier)}`);
  }
  if (!(info.size >= 0)) issues.push(`size must not be negative, got ${info.size}`);
  if (!isShipType(info.shipType)) {
    issues.push(`unknown ship_type ${String(info.shipType)}`);
  } else if (!isValidSizeUnit(info.shipType, info.sizeUnit)) {
    issues.push(`${info.sizeUnit} is not a valid size unit for ${info.shipType}`);
  }
  return issues;
}

/** Validate and freeze a VesselInfo */
export function createVesselInfo(info: VesselInfo): VesselInfo {
  const issues = vesselInfoIssues(info);
  if (issues.length > 0) {
    throw new ValidationError("Invalid vessel info", issues);
  }
  return Object.freeze({ ...info });
}

export function vesselInfoFromAttributes(attrs: VesselAttributes): VesselInfo {
  return createVesselInfo({
    maxSpeed: attrs.max_speed,
    engineKw: attrs.engine_kw,
    engineRpm: attrs.engine_rpm,
    engineCategory: attrs.engine_category,
    engineNoxTier: attrs.engine_nox_tier,
    shipType: attrs.ship_type,
    size: attrs.size,
    sizeUnit: attrs.size_unit,
  });
}

export function vesselInfoToAttributes(info: VesselInfo): VesselAttributes {
  return {
    max_speed: info.maxSpeed,
    engine_kw: info.engineKw,
    engine_rpm: info.engineRpm,
    engine_category: info.engineCategory,
    engine_nox_tier: info.engineNoxTier,
    ship_type: info.shipType,
    size: info.size,
    size_unit: info.sizeUnit,
  };
}

/** The VesselInfo attributes a query already knows */
export function knownAttributes(query: VesselQuery): Partial<VesselAttributes> {
  const known: Partial<VesselAttributes> = {};
  if (query.maxSpeed != null) known.max_speed = query.maxSpeed;
  if (query.engineKw != null) known.engine_kw = query.engineKw;
  if (query.engineRpm != null) known.engine_rpm = query.engineRpm;
  if (query.engineCategory != null) known.engine_category = query.engineCategory;
  if (query.engineNoxTier != null) known.engine_nox_tier = query.engineNoxTier;
  if (query.shipType != null) known.ship_type = query.shipType;
  if (query.size != null) known.size = query.size;
  if (query.sizeUnit != null) known.size_unit = query.sizeUnit;
  return known;
}

/** Everything a query knows, as a match context */
export function queryContext(query: VesselQuery): MatchContext {
  return {
    ...knownAttributes(query),
    year_of_build: query.yearOfBuild,
    keel_laid_year: query.keelLaidYear,
    length: query.length,
    width: query.width,
    ais_type: query.aisType,
  };
}

/** A complete VesselInfo as a match context */
export function vesselContext(info: VesselInfo): MatchContext {
  return { ...vesselInfoToAttributes(info) };
}
