/**
 * Vessel description types.
 *
 * Ship types, size units and engine classifications used both as vessel
 * attributes and as match criteria in the emission configuration.
 */

/** Size units a vessel size may be expressed in */
export type ShipSizeUnit = "n/a" | "dwt" | "teu" | "gt" | "number_vehicles";

/** Valid size units per ship type */
export const SHIP_TYPE_SIZE_UNITS = {
  barge: ["n/a"],
  crew_supply: ["n/a"],
  excursion: ["n/a"],
  fishing: ["n/a"],
  towboat_pushboat: ["n/a"],
  dredging: ["n/a"],
  sailing: ["n/a"],
  recreational: ["n/a"],
  pilot: ["n/a"],
  tug: ["n/a"],
  workboat: ["n/a"],
  government: ["n/a"],
  bulk_carrier: ["dwt"],
  chemical_tanker: ["dwt"],
  container_ship: ["teu"],
  cruise: ["gt"],
  ferry_passenger: ["gt", "n/a"],
  ferry_roro_passenger: ["gt"],
  general_cargo: ["dwt"],
  liquified_gas_tanker: ["dwt"],
  offshort_support_drillship: ["n/a"],
  oil_tanker: ["dwt"],
  other_service: ["n/a"],
  other_tanker: ["n/a"],
  reefer: ["n/a"],
  roro: ["gt"],
  vehicle_carrier: ["number_vehicles"],
  misc: ["n/a"],
} as const satisfies Record<string, readonly ShipSizeUnit[]>;

export type ShipType = keyof typeof SHIP_TYPE_SIZE_UNITS;

export const SHIP_TYPES: readonly ShipType[] = Object.keys(SHIP_TYPE_SIZE_UNITS).filter(
  (key): key is ShipType => Object.hasOwn(SHIP_TYPE_SIZE_UNITS, key),
);

export const SHIP_SIZE_UNITS: readonly ShipSizeUnit[] = [
  "n/a",
  "dwt",
  "teu",
  "gt",
  "number_vehicles",
];

/** Engine classification by role on board */
export type EngineGroup = "propulsion" | "auxiliary" | "boiler";

export const ENGINE_GROUPS: readonly EngineGroup[] = ["propulsion", "auxiliary", "boiler"];

/** Engine groups whose power is looked up per operating mode */
export type NonPropulsionEngineGroup = Exclude<EngineGroup, "propulsion">;

export const NON_PROPULSION_ENGINE_GROUPS: readonly NonPropulsionEngineGroup[] = [
  "auxiliary",
  "boiler",
];

/** Marine engine category by displacement per cylinder */
export type EngineCategory = "c1" | "c2" | "c3";

export const ENGINE_CATEGORIES: readonly EngineCategory[] = ["c1", "c2", "c3"];

/** IMO NOx tier (0 = unclassified) */
export type EngineNoxTier = 0 | 1 | 2 | 3;

export const ENGINE_NOX_TIERS: readonly EngineNoxTier[] = [0, 1, 2, 3];

/** Complete description of a vessel as needed for emission calculation */
export interface VesselInfo {
  /** Maximum speed in knots */
  readonly maxSpeed: number;
  /** Installed propulsion power in kW */
  readonly engineKw: number;
  readonly engineRpm: number;
  readonly engineCategory: EngineCategory;
  readonly engineNoxTier: EngineNoxTier;
  readonly shipType: ShipType;
  readonly size: number;
  readonly sizeUnit: ShipSizeUnit;
}

/**
 * Whatever is known about a vessel.
 *
 * Any VesselInfo attribute may be missing or null. The extra attributes only
 * take part in matching configuration criteria.
 */
export type VesselQuery = {
  [K in keyof VesselInfo]?: VesselInfo[K] | null;
} & {
  yearOfBuild?: number | null;
  keelLaidYear?: number | null;
  length?: number | null;
  width?: number | null;
  aisType?: number | null;
};
