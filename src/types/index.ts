// Core data types for the flight performance engine

import type { InsufficientFuelError, OutOfDomainWarning } from '../core/errors';
import type { PerformanceTable } from '../engine/PerformanceTable';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export type FuelUnit = 'gal' | 'lb';
export type FuelType = 'AvGas' | 'JetA';
export type FlightRules = 'VFR' | 'IFR';
export type HemisphericalDirection = 'EAST' | 'WEST';
export type WindSpatialMode = 'nearest' | 'inverse-distance';
export type MissingWindPolicy = 'fail' | 'assume-calm';

// ── Aircraft performance ────────────────────────────────────

export interface PerformanceSample {
  altitudeFt: number;
  temperatureC?: number;
  weightLb?: number;
  trueAirspeedKt: number;
  fuelFlow: number; // fuel unit per hour
  climbRateFpm?: number;
  descentRateFpm?: number;
}

export type PerformanceAxis = 'altitude' | 'temperature' | 'weight';

export interface AxisRange {
  axis: PerformanceAxis;
  min: number;
  max: number;
}

export interface PerformanceLookup {
  trueAirspeedKt: number;
  fuelFlow: number;
  climbRateFpm?: number;
  descentRateFpm?: number;
  outOfDomain: boolean;
  warnings: OutOfDomainWarning[];
}

export interface AircraftProfile {
  id: string;
  label: string;
  emptyWeightLb: number;
  maxGrossWeightLb: number;
  fuelCapacity: number; // usable, in fuelUnit
  fuelUnit: FuelUnit;
  fuelType: FuelType;
  serviceCeilingFt: number;
  preferredCruiseAltitudeFt: number;
  taxiFuel: number;
  contingencyPct: number;
  /** Used when the performance table carries no climb or descent rates. */
  climbRateFpm?: number;
  descentRateFpm?: number;
  performance: PerformanceTable;
}

// ── Winds aloft ─────────────────────────────────────────────

export interface WindSample {
  altitudeFt: number;
  directionDeg: number; // true
  speedKt: number;
  temperatureC?: number;
  variable?: boolean; // light & variable
}

export interface StationForecast {
  stationId: string;
  position?: GeoPoint;
  samples: WindSample[];
}

export type WindQuery = { stationId: string } | { position: GeoPoint };

export interface WindVector {
  directionDeg: number;
  speedKt: number;
  temperatureC?: number;
  variable: boolean;
  stations: string[];
  clamped: boolean;
}

// ── Route ───────────────────────────────────────────────────

export interface Waypoint {
  ident: string;
  position?: GeoPoint;
  elevationFt?: number; // field elevation; sea level when absent
}

export interface RouteLeg {
  from: Waypoint;
  to: Waypoint;
  trueCourseDeg: number;
  distanceNm: number;
  cruiseAltitudeFt?: number;
  minSafeAltitudeFt?: number;
  magneticVariationDeg?: number; // east positive
  windStationId?: string;
}

export type ResolvedRouteLeg = RouteLeg & { cruiseAltitudeFt: number };

export interface CruiseAltitudeSelection {
  altitudeFt: number;
  courseDeg: number;
  direction: HemisphericalDirection;
  hemisphericalRuleApplied: boolean;
}

// ── Results ─────────────────────────────────────────────────

export type WarningSource = 'leg' | 'alternate' | 'reserve' | 'plan';

export interface PlanWarning {
  source: WarningSource;
  legIndex?: number;
  code: string;
  message: string;
}

export interface WindTriangleSolution {
  windCorrectionAngleDeg: number;
  trueHeadingDeg: number;
  groundSpeedKt: number;
  headwindComponentKt: number;
  crosswindComponentKt: number;
}

/** Climb to or descent from the cruise altitude, flown within a leg. */
export interface PhaseSegment {
  altitudeChangeFt: number;
  rateFpm: number;
  timeHr: number;
  distanceNm: number;
  fuel: number;
}

export interface LegResult extends WindTriangleSolution {
  leg: ResolvedRouteLeg;
  cruiseAltitudeFt: number;
  trueAirspeedKt: number;
  fuelFlow: number;
  climbRateFpm?: number;
  descentRateFpm?: number;
  wind: WindVector;
  climb: PhaseSegment | null;
  descent: PhaseSegment | null;
  cruiseDistanceNm: number;
  cruiseTimeHr: number;
  timeEnrouteHr: number;
  timeEnrouteMin: number;
  fuelBurned: number;
  startWeightLb: number;
  endWeightLb: number;
  warnings: readonly PlanWarning[];
}

export interface FuelPlan {
  aircraftId: string;
  fuelUnit: FuelUnit;
  legs: readonly LegResult[];
  alternate: LegResult | null;
  runningTotals: readonly number[];
  tripFuel: number;
  climbFuel: number;
  climbTimeHr: number;
  cruiseFuel: number;
  cruiseTimeHr: number;
  descentFuel: number;
  descentTimeHr: number;
  taxiFuel: number;
  contingencyFuel: number;
  reserveFuel: number;
  reserveFuelFlow: number;
  alternateFuel: number;
  totalFuel: number;
  totalTimeHr: number;
  totalDistanceNm: number;
  fuelCapacity: number;
  marginFuel: number;
  fuelOk: boolean;
  deficiency: InsufficientFuelError | null;
  enduranceHr: number;
  maxRangeNm: number; // still air, at the final leg's true airspeed
  landingWeightLb: number;
  warnings: readonly PlanWarning[];
}

// ── Configuration ───────────────────────────────────────────

export interface EngineConfig {
  logging: {
    level: string;
    directory?: string;
  };
  altitude: {
    flightRules: FlightRules;
    transitionAltitudeFt: number;
  };
  fuel: {
    defaultReserveMinutes: number;
    defaultReserveFuelFlow: number;
  };
  winds: {
    spatialMode: WindSpatialMode;
    missingWindPolicy: MissingWindPolicy;
  };
  data: {
    aircraftPath: string;
    stationsPath: string;
  };
}
