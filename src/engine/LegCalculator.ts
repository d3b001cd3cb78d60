import type {
  FuelType,
  FuelUnit,
  LegResult,
  PhaseSegment,
  PlanWarning,
  ResolvedRouteLeg,
  WindQuery,
  WindTriangleSolution,
  WindVector
} from '../types';
import { InvalidQueryError, NoWindDataError, WindExceedsPerformanceError } from '../core/errors';
import { cosDeg, normalizeDegrees, sinDeg, toDegrees } from './interpolation';
import { midpoint } from './navigation';
import type { PerformanceTable } from './PerformanceTable';
import type { WindGrid } from './WindGrid';

export const FUEL_DENSITY_LB_PER_GAL: Record<FuelType, number> = {
  AvGas: 6.0,
  JetA: 6.7
};

/** Pounds of aircraft weight per unit of fuel as planned. */
export function poundsPerFuelUnit(fuelUnit: FuelUnit, fuelType: FuelType): number {
  return fuelUnit === 'lb' ? 1 : FUEL_DENSITY_LB_PER_GAL[fuelType];
}

/**
 * Wind triangle for a course, true airspeed and wind (direction it blows
 * from). Throws WindExceedsPerformanceError when the crosswind exceeds TAS
 * or the headwind leaves no positive ground speed.
 */
export function solveWindTriangle(
  courseDeg: number,
  trueAirspeedKt: number,
  windDirectionDeg: number,
  windSpeedKt: number
): WindTriangleSolution {
  const relative = windDirectionDeg - courseDeg;
  const crosswind = windSpeedKt * sinDeg(relative);
  const headwind = windSpeedKt * cosDeg(relative);

  const ratio = crosswind / trueAirspeedKt;
  if (!(trueAirspeedKt > 0) || ratio > 1 || ratio < -1) {
    throw new WindExceedsPerformanceError(trueAirspeedKt, windDirectionDeg, windSpeedKt, courseDeg);
  }

  const wca = toDegrees(Math.asin(ratio));
  const groundSpeedKt = trueAirspeedKt * Math.cos(Math.asin(ratio)) - headwind;
  if (!(groundSpeedKt > 0)) {
    throw new WindExceedsPerformanceError(trueAirspeedKt, windDirectionDeg, windSpeedKt, courseDeg);
  }

  return {
    windCorrectionAngleDeg: wca,
    trueHeadingDeg: normalizeDegrees(courseDeg + wca),
    groundSpeedKt,
    headwindComponentKt: headwind,
    crosswindComponentKt: crosswind
  };
}

export interface LegCalculatorOptions {
  fuelUnit?: FuelUnit;
  fuelType?: FuelType;
  /** Use a calm wind, annotated on the leg, when the grid has nothing for it. */
  assumeCalmWhenMissing?: boolean;
  /** Rates used where the performance table has none. */
  climbRateFpm?: number;
  descentRateFpm?: number;
}

/**
 * Altitudes a leg climbs from and descends to around its cruise altitude.
 * Without either, the whole leg is flown at cruise.
 */
export interface LegPhases {
  climbFromFt?: number;
  descendToFt?: number;
}

// Share of the cruise ground speed made good while climbing or descending
const CLIMB_SPEED_RATIO = 0.6;
const DESCENT_SPEED_RATIO = 0.7;

const CALM: WindVector = { directionDeg: 0, speedKt: 0, variable: false, stations: [], clamped: false };

export class LegCalculator {
  private readonly poundsPerUnit: number;
  private readonly assumeCalmWhenMissing: boolean;
  private readonly climbRateFpm?: number;
  private readonly descentRateFpm?: number;

  constructor(options: LegCalculatorOptions = {}) {
    this.poundsPerUnit = poundsPerFuelUnit(options.fuelUnit ?? 'gal', options.fuelType ?? 'AvGas');
    this.assumeCalmWhenMissing = options.assumeCalmWhenMissing ?? false;
    this.climbRateFpm = options.climbRateFpm;
    this.descentRateFpm = options.descentRateFpm;
  }

  compute(
    leg: ResolvedRouteLeg,
    perf: PerformanceTable,
    wind: WindGrid,
    currentWeightLb: number,
    phases: LegPhases = {}
  ): LegResult {
    if (!(leg.distanceNm >= 0) || !Number.isFinite(leg.trueCourseDeg) || !Number.isFinite(currentWeightLb)) {
      throw new InvalidQueryError(`Leg ${leg.from.ident}-${leg.to.ident} has an invalid course, distance or weight`);
    }

    const warnings: PlanWarning[] = [];
    const altitudeFt = leg.cruiseAltitudeFt;
    const windVector = this.lookupWind(leg, wind, warnings);

    const performance = perf.lookup(altitudeFt, windVector.temperatureC, currentWeightLb);
    for (const warning of performance.warnings) {
      warnings.push({ source: 'leg', code: warning.code, message: warning.message });
    }
    if (windVector.clamped) {
      warnings.push({
        source: 'leg',
        code: 'WIND_ALTITUDE_CLAMPED',
        message: `Winds for ${altitudeFt} ft taken from the nearest forecast level`
      });
    }

    const triangle = solveWindTriangle(
      leg.trueCourseDeg,
      performance.trueAirspeedKt,
      windVector.directionDeg,
      windVector.speedKt
    );

    const { groundSpeedKt } = triangle;
    const fuelFlow = performance.fuelFlow;
    const climbRateFpm = performance.climbRateFpm ?? this.climbRateFpm;
    const descentRateFpm = performance.descentRateFpm ?? this.descentRateFpm;

    const climb = phaseSegment('climb', phases.climbFromFt, warnings, {
      altitudeFt,
      rateFpm: climbRateFpm,
      speedKt: groundSpeedKt * CLIMB_SPEED_RATIO,
      fuelFlow
    });
    const descent = phaseSegment('descent', phases.descendToFt, warnings, {
      altitudeFt,
      rateFpm: descentRateFpm,
      speedKt: groundSpeedKt * DESCENT_SPEED_RATIO,
      fuelFlow
    });

    const phaseDistanceNm = (climb?.distanceNm ?? 0) + (descent?.distanceNm ?? 0);
    if (phaseDistanceNm > leg.distanceNm) {
      warnings.push({
        source: 'leg',
        code: 'PHASES_EXCEED_LEG',
        message: `Climb and descent need ${phaseDistanceNm.toFixed(1)} nm of a ${leg.distanceNm} nm leg`
      });
    }

    const cruiseDistanceNm = Math.max(0, leg.distanceNm - phaseDistanceNm);
    const cruiseTimeHr = cruiseDistanceNm / groundSpeedKt;
    const timeEnrouteHr = (climb?.timeHr ?? 0) + cruiseTimeHr + (descent?.timeHr ?? 0);
    const fuelBurned = (climb?.fuel ?? 0) + cruiseTimeHr * fuelFlow + (descent?.fuel ?? 0);

    return Object.freeze({
      leg,
      cruiseAltitudeFt: altitudeFt,
      trueAirspeedKt: performance.trueAirspeedKt,
      fuelFlow,
      climbRateFpm,
      descentRateFpm,
      wind: windVector,
      ...triangle,
      climb,
      descent,
      cruiseDistanceNm,
      cruiseTimeHr,
      timeEnrouteHr,
      timeEnrouteMin: timeEnrouteHr * 60,
      fuelBurned,
      startWeightLb: currentWeightLb,
      endWeightLb: currentWeightLb - fuelBurned * this.poundsPerUnit,
      warnings: Object.freeze(warnings)
    });
  }

  private lookupWind(leg: ResolvedRouteLeg, wind: WindGrid, warnings: PlanWarning[]): WindVector {
    const query = this.windQuery(leg, wind);
    if (!query) {
      return this.missingWind(
        new NoWindDataError(`No wind station or waypoint positions for leg ${leg.from.ident}-${leg.to.ident}`),
        warnings
      );
    }

    try {
      return wind.windAt(query, leg.cruiseAltitudeFt);
    } catch (error) {
      if (error instanceof NoWindDataError) {
        return this.missingWind(error, warnings);
      }
      throw error;
    }
  }

  // The zero-wind fallback is opt-in and always annotated
  private missingWind(error: NoWindDataError, warnings: PlanWarning[]): WindVector {
    if (!this.assumeCalmWhenMissing) {
      throw error;
    }
    warnings.push({ source: 'leg', code: error.code, message: `${error.message}; calm wind assumed` });
    return CALM;
  }

  private windQuery(leg: ResolvedRouteLeg, wind: WindGrid): WindQuery | null {
    if (leg.windStationId) {
      return { stationId: leg.windStationId };
    }
    if (leg.from.position && leg.to.position) {
      return { position: midpoint(leg.from.position, leg.to.position) };
    }

    const [only, ...rest] = wind.stationIds;
    return only && rest.length === 0 ? { stationId: only } : null;
  }
}

interface PhaseConditions {
  altitudeFt: number;
  rateFpm?: number;
  speedKt: number;
  fuelFlow: number;
}

// Phases burn the cruise fuel flow; none when there is no altitude to change
function phaseSegment(
  kind: 'climb' | 'descent',
  fieldElevationFt: number | undefined,
  warnings: PlanWarning[],
  { altitudeFt, rateFpm, speedKt, fuelFlow }: PhaseConditions
): PhaseSegment | null {
  if (fieldElevationFt === undefined || rateFpm === undefined) return null;

  const altitudeChangeFt = altitudeFt - fieldElevationFt;
  if (!(altitudeChangeFt > 0)) return null;
  if (!(rateFpm > 0)) {
    warnings.push({
      source: 'leg',
      code: 'NO_PHASE_RATE',
      message: `No ${kind} rate at ${altitudeFt} ft; the ${altitudeChangeFt} ft ${kind} is not planned`
    });
    return null;
  }

  const timeHr = altitudeChangeFt / rateFpm / 60;
  return Object.freeze({
    altitudeChangeFt,
    rateFpm,
    timeHr,
    distanceNm: timeHr * speedKt,
    fuel: timeHr * fuelFlow
  });
}
