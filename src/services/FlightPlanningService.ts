import type { IService, ILogger } from '../interfaces/IService';
import type {
  CruiseAltitudeSelection,
  FuelPlan,
  PlanWarning,
  RouteLeg,
  Waypoint
} from '../types';
import type { ConfigService } from '../core/ConfigService';
import type { EventEmitter } from '../core/EventEmitter';
import type { InsufficientFuelError } from '../core/errors';
import { AircraftCatalog } from '../catalog/AircraftCatalog';
import { StationCatalog } from '../catalog/StationCatalog';
import { CruiseAltitudeSelector } from '../engine/CruiseAltitudeSelector';
import { FuelPlanner } from '../engine/FuelPlanner';
import { buildRouteLegs } from '../engine/navigation';
import type { RouteLegDefaults } from '../engine/navigation';
import { WindGrid } from '../engine/WindGrid';
import { WindsAloftDecoder } from './WindsAloftDecoder';

export interface PlanningEvents {
  'plan:completed': { aircraftId: string; plan: FuelPlan };
  'plan:warning': { aircraftId: string; warning: PlanWarning };
  'plan:insufficient-fuel': { aircraftId: string; deficiency: InsufficientFuelError };
  'plan:failed': { aircraftId: string; error: unknown };
}

export interface WaypointRoute extends RouteLegDefaults {
  waypoints: Waypoint[];
}

/** Station forecasts (validated) or the raw text of an FD bulletin. */
export type WindInput = { forecasts: unknown } | { fdText: string };

export interface FlightPlanRequest {
  aircraftId: string;
  route: RouteLeg[] | WaypointRoute;
  winds: WindInput;
  startWeightLb?: number; // defaults to max gross
  reserveMinutes?: number;
  alternate?: RouteLeg;
}

export interface FlightPlanningCatalogs {
  aircraft?: AircraftCatalog;
  stations?: StationCatalog;
}

export class FlightPlanningService implements IService {
  private logger: ILogger;
  private config: ConfigService;
  private eventEmitter: EventEmitter<PlanningEvents>;
  private aircraftCatalog?: AircraftCatalog;
  private stationCatalog?: StationCatalog;
  private isInitialized = false;
  private plansCompleted = 0;

  constructor(
    logger: ILogger,
    config: ConfigService,
    eventEmitter: EventEmitter<PlanningEvents>,
    catalogs: FlightPlanningCatalogs = {}
  ) {
    this.logger = logger;
    this.config = config;
    this.eventEmitter = eventEmitter;
    this.aircraftCatalog = catalogs.aircraft;
    this.stationCatalog = catalogs.stations;
  }

  async initialize(): Promise<void> {
    try {
      const data = this.config.get('data');
      this.aircraftCatalog ??= AircraftCatalog.fromFile(data.aircraftPath);
      this.stationCatalog ??= StationCatalog.fromFile(data.stationsPath);

      this.isInitialized = true;
      this.logger.info('Flight Planning Service initialized successfully', {
        aircraft: this.aircraftCatalog.list().map(profile => profile.id),
        stations: this.stationCatalog.size
      });
    } catch (error) {
      this.logger.error('Flight Planning Service initialization failed', error);
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    this.isInitialized = false;
    this.logger.info('Flight Planning Service shutdown completed', { plansCompleted: this.plansCompleted });
  }

  async isHealthy(): Promise<boolean> {
    return this.isInitialized && this.aircraft().list().length > 0;
  }

  planFlight(request: FlightPlanRequest): FuelPlan {
    const { aircraftId } = request;

    try {
      const profile = this.aircraft().get(aircraftId);
      const winds = this.buildWindGrid(request.winds);
      const legs = this.resolveRoute(request.route);
      const alternate = request.alternate && this.resolveLeg(request.alternate);
      const fuel = this.config.get('fuel');

      const planner = new FuelPlanner(profile, winds, {
        selector: this.selector(),
        missingWind: this.config.get('winds').missingWindPolicy,
        defaultReserveFuelFlow: fuel.defaultReserveFuelFlow
      });
      const plan = planner.plan(
        legs,
        request.startWeightLb ?? profile.maxGrossWeightLb,
        request.reserveMinutes ?? fuel.defaultReserveMinutes,
        alternate
      );

      this.report(plan);
      return plan;
    } catch (error) {
      this.logger.error('Flight planning failed', error, { aircraftId });
      this.eventEmitter.emit('plan:failed', { aircraftId, error });
      throw error;
    }
  }

  suggestCruiseAltitude(aircraftId: string, courseDeg: number, minSafeAltitudeFt: number): CruiseAltitudeSelection {
    const profile = this.aircraft().get(aircraftId);
    return this.selector().suggest(
      courseDeg,
      minSafeAltitudeFt,
      profile.serviceCeilingFt,
      profile.preferredCruiseAltitudeFt
    );
  }

  private report(plan: FuelPlan): void {
    const { aircraftId } = plan;

    for (const warning of plan.warnings) {
      this.logger.warn(warning.message, { aircraftId, code: warning.code, legIndex: warning.legIndex });
      this.eventEmitter.emit('plan:warning', { aircraftId, warning });
    }

    if (plan.deficiency) {
      this.eventEmitter.emit('plan:insufficient-fuel', { aircraftId, deficiency: plan.deficiency });
    }

    this.plansCompleted++;
    this.logger.info('Flight plan completed', {
      aircraftId,
      legs: plan.legs.length,
      totalDistanceNm: Math.round(plan.totalDistanceNm),
      totalFuel: Number(plan.totalFuel.toFixed(1)),
      fuelOk: plan.fuelOk
    });
    this.eventEmitter.emit('plan:completed', { aircraftId, plan });
  }

  private buildWindGrid(input: WindInput): WindGrid {
    const spatialMode = this.config.get('winds').spatialMode;
    if ('fdText' in input) {
      const decoder = new WindsAloftDecoder(this.logger, this.stations());
      return new WindGrid(decoder.decode(input.fdText), { spatialMode });
    }
    return WindGrid.fromForecasts(input.forecasts, { spatialMode });
  }

  private resolveRoute(route: RouteLeg[] | WaypointRoute): RouteLeg[] {
    if ('waypoints' in route) {
      const { waypoints, ...defaults } = route;
      return buildRouteLegs(waypoints.map(waypoint => this.locate(waypoint)), defaults);
    }
    return route.map(leg => this.resolveLeg(leg));
  }

  // Airport identifiers map onto their FD station (KDFW -> DFW)
  private resolveLeg(leg: RouteLeg): RouteLeg {
    if (!leg.windStationId) return leg;
    return { ...leg, windStationId: this.stations().resolve(leg.windStationId) ?? leg.windStationId };
  }

  private locate(waypoint: Waypoint): Waypoint {
    if (waypoint.position) return waypoint;
    const position = this.stations().position(waypoint.ident);
    return position ? { ...waypoint, position } : waypoint;
  }

  private selector(): CruiseAltitudeSelector {
    const altitude = this.config.get('altitude');
    return new CruiseAltitudeSelector({
      flightRules: altitude.flightRules,
      transitionAltitudeFt: altitude.transitionAltitudeFt
    });
  }

  private aircraft(): AircraftCatalog {
    if (!this.aircraftCatalog) {
      throw new Error('Flight Planning Service is not initialized');
    }
    return this.aircraftCatalog;
  }

  private stations(): StationCatalog {
    if (!this.stationCatalog) {
      throw new Error('Flight Planning Service is not initialized');
    }
    return this.stationCatalog;
  }
}
