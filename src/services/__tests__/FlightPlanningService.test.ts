import { beforeEach, describe, expect, it } from 'vitest';
import { ConfigService } from '../../core/ConfigService';
import { EventEmitter } from '../../core/EventEmitter';
import { Logger } from '../../core/Logger';
import { UnknownAircraftError } from '../../core/errors';
import type { RouteLeg, StationForecast } from '../../types';
import { FlightPlanningService } from '../FlightPlanningService';
import type { PlanningEvents } from '../FlightPlanningService';

const logger = new Logger({ silent: true });

const forecasts: StationForecast[] = [
  {
    stationId: 'ABI',
    samples: [
      { altitudeFt: 3000, directionDeg: 270, speedKt: 10, temperatureC: 12 },
      { altitudeFt: 6000, directionDeg: 270, speedKt: 10, temperatureC: 6 }
    ]
  }
];

const FD_TEXT = [
  'FT  3000    6000    9000',
  'ABI      1910+17 2123+11',
  'DFW 2010 2115+16 2225+10'
].join('\n');

function eastbound(distanceNm: number): RouteLeg {
  return {
    from: { ident: 'AAA' },
    to: { ident: 'BBB' },
    trueCourseDeg: 90,
    distanceNm,
    cruiseAltitudeFt: 4500,
    windStationId: 'KABI'
  };
}

describe('FlightPlanningService', () => {
  let emitter: EventEmitter<PlanningEvents>;
  let service: FlightPlanningService;
  let events: string[];

  beforeEach(async () => {
    emitter = new EventEmitter<PlanningEvents>();
    events = [];
    emitter.on('plan:completed', () => events.push('completed'));
    emitter.on('plan:warning', ({ warning }) => events.push(`warning:${warning.code}`));
    emitter.on('plan:insufficient-fuel', () => events.push('insufficient-fuel'));
    emitter.on('plan:failed', () => events.push('failed'));

    service = new FlightPlanningService(logger, new ConfigService(logger, {}), emitter);
    await service.initialize();
  });

  it('is healthy once the catalogs are loaded', async () => {
    expect(await service.isHealthy()).toBe(true);
    await service.shutdown();
    expect(await service.isHealthy()).toBe(false);
  });

  it('plans a route with the configured defaults', () => {
    const plan = service.planFlight({ aircraftId: 'c152', route: [eastbound(100)], winds: { forecasts } });

    expect(plan.aircraftId).toBe('C152');
    expect(plan.legs[0].startWeightLb).toBe(1670);
    expect(plan.legs[0].trueAirspeedKt).toBe(92);
    expect(plan.legs[0].groundSpeedKt).toBe(102);
    expect(plan.legs[0].wind.stations).toEqual(['ABI']);
    expect(plan.legs[0].climb?.rateFpm).toBe(620);
    expect(plan.legs[0].descent?.rateFpm).toBe(400);
    expect(plan.maxRangeNm).toBeGreaterThan(0);
    expect(plan.reserveFuel).toBeCloseTo(0.75 * 5.3, 9);
    expect(plan.taxiFuel).toBe(1);
    expect(plan.fuelOk).toBe(true);
    expect(events).toEqual(['completed']);
  });

  it('reports a fuel shortfall and still returns the plan', () => {
    const plan = service.planFlight({ aircraftId: 'C152', route: [eastbound(1000)], winds: { forecasts } });

    expect(plan.fuelOk).toBe(false);
    expect(plan.deficiency?.fuelUnit).toBe('gal');
    expect(events).toEqual(['warning:INSUFFICIENT_FUEL', 'insufficient-fuel', 'completed']);
  });

  it('locates waypoints and decodes an FD bulletin', () => {
    const plan = service.planFlight({
      aircraftId: 'C152',
      route: { waypoints: [{ ident: 'KABI' }, { ident: 'KDFW' }], minSafeAltitudeFt: 3000 },
      winds: { fdText: FD_TEXT },
      reserveMinutes: 30
    });

    const [leg] = plan.legs;
    expect(leg.leg.from.position).toEqual({ latitude: 32.41, longitude: -99.68 });
    expect(leg.leg.trueCourseDeg).toBeGreaterThan(0);
    expect(leg.leg.trueCourseDeg).toBeLessThan(180);
    expect(leg.cruiseAltitudeFt).toBe(5500);
    expect(leg.wind.stations).toHaveLength(1);
  });

  it('suggests a cruise altitude near the preferred one', () => {
    expect(service.suggestCruiseAltitude('C172', 90, 2000).altitudeFt).toBe(7500);
  });

  it('logs, emits and rethrows failures', () => {
    expect(() => service.planFlight({ aircraftId: 'B747', route: [eastbound(100)], winds: { forecasts } })).toThrow(
      UnknownAircraftError
    );
    expect(events).toEqual(['failed']);
  });

  it('refuses to plan before initialization', () => {
    const idle = new FlightPlanningService(logger, new ConfigService(logger, {}), emitter);
    expect(() => idle.planFlight({ aircraftId: 'C152', route: [eastbound(100)], winds: { forecasts } })).toThrow(
      'Flight Planning Service is not initialized'
    );
  });
});
