import type {
  AircraftProfile,
  FuelPlan,
  LegResult,
  MissingWindPolicy,
  PlanWarning,
  ResolvedRouteLeg,
  RouteLeg,
  WarningSource,
  Waypoint
} from '../types';
import { InsufficientFuelError, InvalidQueryError } from '../core/errors';
import { CruiseAltitudeSelector } from './CruiseAltitudeSelector';
import { normalizeDegrees } from './interpolation';
import { LegCalculator } from './LegCalculator';
import type { WindGrid } from './WindGrid';

export interface FuelPlannerOptions {
  selector?: CruiseAltitudeSelector;
  missingWind?: MissingWindPolicy;
  /** Used for the reserve when the final cruise lookup yields no usable flow. */
  defaultReserveFuelFlow?: number;
  taxiFuel?: number;
  contingencyPct?: number;
}

/**
 * Sequences the leg calculator over a route for one aircraft and one wind
 * grid, carrying weight burn-off from leg to leg. The first leg climbs from
 * the departure elevation and the last descends to the destination's.
 *
 * Lookup clamping and calm-wind fallbacks are collected as warnings; data
 * and infeasibility errors from a leg propagate to the caller.
 */
export class FuelPlanner {
  private readonly selector: CruiseAltitudeSelector;
  private readonly calculator: LegCalculator;
  private readonly defaultReserveFuelFlow: number;
  private readonly taxiFuel: number;
  private readonly contingencyPct: number;

  constructor(
    private readonly profile: AircraftProfile,
    private readonly wind: WindGrid,
    options: FuelPlannerOptions = {}
  ) {
    this.selector = options.selector ?? new CruiseAltitudeSelector();
    this.calculator = new LegCalculator({
      fuelUnit: profile.fuelUnit,
      fuelType: profile.fuelType,
      assumeCalmWhenMissing: options.missingWind === 'assume-calm',
      climbRateFpm: profile.climbRateFpm,
      descentRateFpm: profile.descentRateFpm
    });
    this.defaultReserveFuelFlow = options.defaultReserveFuelFlow ?? 0;
    this.taxiFuel = options.taxiFuel ?? profile.taxiFuel;
    this.contingencyPct = options.contingencyPct ?? profile.contingencyPct;
  }

  plan(legs: readonly RouteLeg[], startWeightLb: number, reserveMinutes: number, alternateLeg?: RouteLeg): FuelPlan {
    if (legs.length === 0) {
      throw new InvalidQueryError('A fuel plan needs at least one leg');
    }
    if (!Number.isFinite(startWeightLb) || !(reserveMinutes >= 0)) {
      throw new InvalidQueryError(`Invalid start weight ${startWeightLb} lb or reserve ${reserveMinutes} min`);
    }

    const warnings: PlanWarning[] = [];
    const results: LegResult[] = [];
    const runningTotals: number[] = [];
    let weight = startWeightLb;
    let tripFuel = 0;

    const lastIndex = legs.length - 1;
    legs.forEach((leg, legIndex) => {
      const resolved = this.resolveAltitude(leg, 'leg', legIndex, warnings);
      const result = this.calculator.compute(resolved, this.profile.performance, this.wind, weight, {
        climbFromFt: legIndex === 0 ? fieldElevation(leg.from) : undefined,
        descendToFt: legIndex === lastIndex ? fieldElevation(leg.to) : undefined
      });
      collect(warnings, result.warnings, 'leg', legIndex);
      results.push(result);
      tripFuel += result.fuelBurned;
      runningTotals.push(tripFuel);
      weight = result.endWeightLb;
    });

    const landingWeightLb = weight;
    const finalLeg = results[results.length - 1];
    const reserveFuelFlow = this.reserveFuelFlow(finalLeg, landingWeightLb, warnings);
    const reserveFuel = (reserveMinutes / 60) * reserveFuelFlow;

    let alternate: LegResult | null = null;
    if (alternateLeg) {
      alternate = this.calculator.compute(
        this.resolveAltitude(alternateLeg, 'alternate', undefined, warnings),
        this.profile.performance,
        this.wind,
        landingWeightLb,
        { climbFromFt: fieldElevation(alternateLeg.from), descendToFt: fieldElevation(alternateLeg.to) }
      );
      collect(warnings, alternate.warnings, 'alternate');
    }
    const alternateFuel = alternate ? alternate.fuelBurned : 0;

    const contingencyFuel = tripFuel * (this.contingencyPct / 100);
    const totalFuel = tripFuel + reserveFuel + alternateFuel + this.taxiFuel + contingencyFuel;
    const fuelCapacity = this.profile.fuelCapacity;
    const deficiency =
      totalFuel > fuelCapacity ? new InsufficientFuelError(totalFuel, fuelCapacity, this.profile.fuelUnit) : null;
    if (deficiency) {
      warnings.push({ source: 'plan', code: deficiency.code, message: deficiency.message });
    }

    const enduranceHr = Math.max(0, (fuelCapacity - this.taxiFuel - reserveFuel) / finalLeg.fuelFlow);

    return Object.freeze({
      aircraftId: this.profile.id,
      fuelUnit: this.profile.fuelUnit,
      legs: Object.freeze(results),
      alternate,
      runningTotals: Object.freeze(runningTotals),
      tripFuel,
      climbFuel: sum(results, r => r.climb?.fuel ?? 0),
      climbTimeHr: sum(results, r => r.climb?.timeHr ?? 0),
      cruiseFuel: sum(results, r => r.cruiseTimeHr * r.fuelFlow),
      cruiseTimeHr: sum(results, r => r.cruiseTimeHr),
      descentFuel: sum(results, r => r.descent?.fuel ?? 0),
      descentTimeHr: sum(results, r => r.descent?.timeHr ?? 0),
      taxiFuel: this.taxiFuel,
      contingencyFuel,
      reserveFuel,
      reserveFuelFlow,
      alternateFuel,
      totalFuel,
      totalTimeHr: sum(results, r => r.timeEnrouteHr),
      totalDistanceNm: sum(legs, l => l.distanceNm),
      fuelCapacity,
      marginFuel: fuelCapacity - totalFuel,
      fuelOk: deficiency === null,
      deficiency,
      enduranceHr,
      maxRangeNm: enduranceHr * finalLeg.trueAirspeedKt,
      landingWeightLb,
      warnings: Object.freeze(warnings)
    });
  }

  private resolveAltitude(
    leg: RouteLeg,
    source: WarningSource,
    legIndex: number | undefined,
    warnings: PlanWarning[]
  ): ResolvedRouteLeg {
    const ceiling = this.profile.serviceCeilingFt;

    if (leg.cruiseAltitudeFt !== undefined) {
      if (leg.cruiseAltitudeFt > ceiling) {
        warnings.push({
          source,
          legIndex,
          code: 'ABOVE_CEILING',
          message: `${leg.cruiseAltitudeFt} ft is above the ${ceiling} ft service ceiling`
        });
      }
      return { ...leg, cruiseAltitudeFt: leg.cruiseAltitudeFt };
    }

    if (leg.minSafeAltitudeFt === undefined) {
      throw new InvalidQueryError(
        `Leg ${leg.from.ident}-${leg.to.ident} has neither a cruise altitude nor a minimum safe altitude`
      );
    }

    const course = normalizeDegrees(leg.trueCourseDeg - (leg.magneticVariationDeg ?? 0));
    const selection = this.selector.select(course, leg.minSafeAltitudeFt, ceiling);
    return { ...leg, cruiseAltitudeFt: selection.altitudeFt };
  }

  // Fuel flow at the final cruise altitude and landing weight
  private reserveFuelFlow(finalLeg: LegResult, landingWeightLb: number, warnings: PlanWarning[]): number {
    const lookup = this.profile.performance.lookup(
      finalLeg.cruiseAltitudeFt,
      finalLeg.wind.temperatureC,
      landingWeightLb
    );
    for (const warning of lookup.warnings) {
      warnings.push({ source: 'reserve', code: warning.code, message: warning.message });
    }

    if (Number.isFinite(lookup.fuelFlow) && lookup.fuelFlow > 0) {
      return lookup.fuelFlow;
    }

    warnings.push({
      source: 'reserve',
      code: 'DEFAULT_RESERVE_FLOW',
      message: `No usable fuel flow at ${finalLeg.cruiseAltitudeFt} ft; reserve uses ${this.defaultReserveFuelFlow}/hr`
    });
    return this.defaultReserveFuelFlow;
  }
}

function collect(target: PlanWarning[], warnings: readonly PlanWarning[], source: WarningSource, legIndex?: number): void {
  for (const warning of warnings) {
    target.push({ ...warning, source, legIndex });
  }
}

function fieldElevation(waypoint: Waypoint): number {
  return waypoint.elevationFt ?? 0;
}

function sum<T>(items: readonly T[], value: (item: T) => number): number {
  return items.reduce((total, item) => total + value(item), 0);
}
