import { describe, expect, it } from 'vitest';
import { InsufficientFuelError, InvalidQueryError, NoWindDataError } from '../../core/errors';
import type { AircraftProfile, RouteLeg } from '../../types';
import { CruiseAltitudeSelector } from '../CruiseAltitudeSelector';
import { FuelPlanner } from '../FuelPlanner';
import { PerformanceTable } from '../PerformanceTable';
import { WindGrid } from '../WindGrid';

function profile(overrides: Partial<AircraftProfile> = {}): AircraftProfile {
  return {
    id: 'TEST1',
    label: 'Test single',
    emptyWeightLb: 1500,
    maxGrossWeightLb: 2300,
    fuelCapacity: 50,
    fuelUnit: 'gal',
    fuelType: 'AvGas',
    serviceCeilingFt: 12000,
    preferredCruiseAltitudeFt: 5500,
    taxiFuel: 0,
    contingencyPct: 0,
    performance: new PerformanceTable([
      { altitudeFt: 2000, trueAirspeedKt: 120, fuelFlow: 10 },
      { altitudeFt: 5500, trueAirspeedKt: 120, fuelFlow: 10 },
      { altitudeFt: 8000, trueAirspeedKt: 120, fuelFlow: 10 }
    ]),
    ...overrides
  };
}

// 270/20 at every level: a 20 kt tailwind eastbound, headwind westbound
const westerly = new WindGrid([
  {
    stationId: 'WND',
    samples: [
      { altitudeFt: 5500, directionDeg: 270, speedKt: 20 },
      { altitudeFt: 9500, directionDeg: 270, speedKt: 20 }
    ]
  }
]);

function leg(ident: string, trueCourseDeg: number, distanceNm: number, extra: Partial<RouteLeg> = {}): RouteLeg {
  return {
    from: { ident: `${ident}1` },
    to: { ident: `${ident}2` },
    trueCourseDeg,
    distanceNm,
    cruiseAltitudeFt: 5500,
    ...extra
  };
}

const route = [leg('A', 90, 140), leg('B', 90, 70)];

describe('FuelPlanner', () => {
  it('sums leg burns, reserve and alternate into the total', () => {
    const plan = new FuelPlanner(profile(), westerly).plan(route, 2000, 45);

    expect(plan.legs.map(l => l.fuelBurned)).toEqual([10, 5]);
    expect(plan.runningTotals).toEqual([10, 15]);
    expect(plan.tripFuel).toBe(15);
    expect(plan.reserveFuelFlow).toBe(10);
    expect(plan.reserveFuel).toBe(7.5);
    expect(plan.alternateFuel).toBe(0);
    expect(plan.totalFuel).toBe(22.5);
    expect(plan.totalFuel).toBe(plan.legs[0].fuelBurned + plan.legs[1].fuelBurned + plan.reserveFuel);
    expect(plan.totalDistanceNm).toBe(210);
    expect(plan.totalTimeHr).toBe(1.5);
    expect(plan.fuelOk).toBe(true);
    expect(plan.marginFuel).toBe(27.5);
    expect(plan.enduranceHr).toBe(4.25);
    expect(plan.maxRangeNm).toBe(510);
    expect(plan.climbFuel).toBe(0);
    expect(plan.descentFuel).toBe(0);
    expect(plan.cruiseFuel).toBe(15);
    expect(plan.cruiseTimeHr).toBe(1.5);
    expect(plan.deficiency).toBeNull();
    expect(plan.warnings).toEqual([]);
  });

  it('carries burn-off weight from leg to leg', () => {
    const plan = new FuelPlanner(profile(), westerly).plan(route, 2000, 45);

    expect(plan.legs[0].startWeightLb).toBe(2000);
    expect(plan.legs[1].startWeightLb).toBe(1940);
    expect(plan.landingWeightLb).toBe(1910);
  });

  it('flies the alternate from the landing weight', () => {
    const plan = new FuelPlanner(profile(), westerly).plan(route, 2000, 45, leg('ALT', 270, 70));

    expect(plan.alternate?.startWeightLb).toBe(1910);
    expect(plan.alternate?.groundSpeedKt).toBe(100);
    expect(plan.alternateFuel).toBeCloseTo(7, 9);
    expect(plan.totalFuel).toBeCloseTo(29.5, 9);
  });

  it('adds taxi and contingency fuel', () => {
    const plan = new FuelPlanner(profile(), westerly, { taxiFuel: 1.5, contingencyPct: 10 }).plan(route, 2000, 45);

    expect(plan.taxiFuel).toBe(1.5);
    expect(plan.contingencyFuel).toBeCloseTo(1.5, 9);
    expect(plan.totalFuel).toBeCloseTo(25.5, 9);
  });

  it('returns the plan with a deficiency when fuel exceeds capacity', () => {
    const plan = new FuelPlanner(profile({ fuelCapacity: 20 }), westerly).plan(route, 2000, 45);

    expect(plan.fuelOk).toBe(false);
    expect(plan.deficiency).toBeInstanceOf(InsufficientFuelError);
    expect(plan.deficiency?.deficit).toBe(2.5);
    expect(plan.deficiency?.message).toBe('Required fuel 22.5 gal exceeds usable capacity 20.0 gal');
    expect(plan.warnings).toEqual([
      {
        source: 'plan',
        code: 'INSUFFICIENT_FUEL',
        message: 'Required fuel 22.5 gal exceeds usable capacity 20.0 gal'
      }
    ]);
  });

  it('selects a cruise altitude from the minimum safe altitude', () => {
    const planner = new FuelPlanner(profile(), westerly, { selector: new CruiseAltitudeSelector() });
    const plan = planner.plan([leg('A', 90, 140, { cruiseAltitudeFt: undefined, minSafeAltitudeFt: 4000 })], 2000, 45);

    expect(plan.legs[0].cruiseAltitudeFt).toBe(5500);
  });

  it('selects the hemisphere from the magnetic course', () => {
    // 175° true with 10° west variation is 185° magnetic: westbound
    const westbound = leg('A', 175, 100, {
      cruiseAltitudeFt: undefined,
      minSafeAltitudeFt: 4000,
      magneticVariationDeg: -10
    });
    const plan = new FuelPlanner(profile(), westerly).plan([westbound], 2000, 45);

    expect(plan.legs[0].cruiseAltitudeFt).toBe(6500);
  });

  it('warns when a given altitude is above the service ceiling', () => {
    const plan = new FuelPlanner(profile(), westerly).plan([leg('A', 90, 140, { cruiseAltitudeFt: 13000 })], 2000, 45);

    expect(plan.warnings[0]).toEqual({
      source: 'leg',
      legIndex: 0,
      code: 'ABOVE_CEILING',
      message: '13000 ft is above the 12000 ft service ceiling'
    });
  });

  it('rejects a leg with no altitude information', () => {
    const planner = new FuelPlanner(profile(), westerly);
    expect(() => planner.plan([leg('A', 90, 140, { cruiseAltitudeFt: undefined })], 2000, 45)).toThrow(
      InvalidQueryError
    );
  });

  it('rejects an empty route', () => {
    expect(() => new FuelPlanner(profile(), westerly).plan([], 2000, 45)).toThrow(InvalidQueryError);
  });

  it('propagates missing wind unless calm is assumed', () => {
    const noWind = [leg('A', 90, 120, { windStationId: 'ZZZ' })];
    expect(() => new FuelPlanner(profile(), westerly).plan(noWind, 2000, 45)).toThrow(NoWindDataError);

    const plan = new FuelPlanner(profile(), westerly, { missingWind: 'assume-calm' }).plan(noWind, 2000, 45);
    expect(plan.legs[0].groundSpeedKt).toBe(120);
    expect(plan.warnings).toEqual([
      {
        source: 'leg',
        legIndex: 0,
        code: 'NO_WIND_DATA',
        message: 'No wind samples for station ZZZ; calm wind assumed'
      }
    ]);
  });

  it('climbs on the first leg and descends on the last', () => {
    const rated = profile({ climbRateFpm: 1000, descentRateFpm: 500 });
    const fields = [
      leg('A', 90, 140, { from: { ident: 'DEP', elevationFt: 500 } }),
      leg('B', 90, 70, { to: { ident: 'ARR', elevationFt: 500 } })
    ];
    const plan = new FuelPlanner(rated, westerly).plan(fields, 2000, 45);

    const [first, last] = plan.legs;
    expect(first.climb?.timeHr).toBeCloseTo(1 / 12, 9);
    expect(first.descent).toBeNull();
    expect(last.climb).toBeNull();
    expect(last.descent?.timeHr).toBeCloseTo(1 / 6, 9);
    expect(last.startWeightLb).toBeCloseTo(1938, 9);

    expect(plan.climbFuel).toBeCloseTo(10 / 12, 9);
    expect(plan.climbTimeHr).toBeCloseTo(1 / 12, 9);
    expect(plan.descentFuel).toBeCloseTo(10 / 6, 9);
    expect(plan.descentTimeHr).toBeCloseTo(1 / 6, 9);
    expect(plan.cruiseTimeHr).toBeCloseTo(4 / 3, 9);
    expect(plan.tripFuel).toBeCloseTo(95 / 6, 9);
    expect(plan.tripFuel).toBeCloseTo(plan.climbFuel + plan.cruiseFuel + plan.descentFuel, 9);
    expect(plan.totalTimeHr).toBeCloseTo(19 / 12, 9);
    expect(plan.landingWeightLb).toBeCloseTo(1905, 9);
    expect(plan.totalFuel).toBeCloseTo(95 / 6 + 7.5, 9);
  });

  it('climbs and descends within a single-leg route and its alternate', () => {
    const rated = profile({ climbRateFpm: 1000, descentRateFpm: 500 });
    const plan = new FuelPlanner(rated, westerly).plan([leg('A', 90, 140)], 2000, 45, leg('ALT', 90, 70));

    // Sea level at both ends: 5500 ft of climb and of descent
    expect(plan.legs[0].climb?.altitudeChangeFt).toBe(5500);
    expect(plan.legs[0].descent?.altitudeChangeFt).toBe(5500);
    expect(plan.alternate?.climb?.altitudeChangeFt).toBe(5500);
    expect(plan.alternate?.descent?.altitudeChangeFt).toBe(5500);
    expect(plan.climbFuel).toBeCloseTo(55 / 60, 9);
  });

  it('freezes the plan and its lists', () => {
    const plan = new FuelPlanner(profile(), westerly).plan(route, 2000, 45);

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.legs)).toBe(true);
    expect(Object.isFrozen(plan.runningTotals)).toBe(true);
    expect(Object.isFrozen(plan.warnings)).toBe(true);
    expect(() => Array.prototype.push.call(plan.runningTotals, 999)).toThrow(TypeError);
    expect(plan.runningTotals).toEqual([10, 15]);
  });
});
