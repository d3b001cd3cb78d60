import { Logger } from './core/Logger';
import { ConfigService } from './core/ConfigService';
import { ServiceContainer } from './core/ServiceContainer';
import { EventEmitter } from './core/EventEmitter';
import { FlightPlanningService } from './services/FlightPlanningService';
import type { PlanningEvents } from './services/FlightPlanningService';

export interface EngineServices {
  logger: Logger;
  config: ConfigService;
  eventEmitter: EventEmitter<PlanningEvents>;
  planning: FlightPlanningService;
}

/** Wire the core services and the planning service into a container. */
export function createEngine(env?: NodeJS.ProcessEnv): ServiceContainer<EngineServices> {
  const bootstrapLogger = new Logger({ level: (env ?? process.env).LOG_LEVEL || 'info' });
  const configService = new ConfigService(bootstrapLogger, env);
  const { level, directory } = configService.get('logging');
  const logger = new Logger({ level, directory });
  const eventEmitter = new EventEmitter<PlanningEvents>(logger);

  const serviceContainer = new ServiceContainer<EngineServices>(logger);
  serviceContainer.registerSingleton('logger', logger);
  serviceContainer.registerSingleton('config', configService);
  serviceContainer.registerSingleton('eventEmitter', eventEmitter);
  serviceContainer.registerSingleton('planning', new FlightPlanningService(logger, configService, eventEmitter));

  return serviceContainer;
}

async function main(): Promise<void> {
  const serviceContainer = createEngine();
  const logger = serviceContainer.get('logger');

  try {
    logger.info('Starting flight performance engine...');

    await serviceContainer.initializeAll();

    const healthStatus = await serviceContainer.checkHealth();
    logger.info('System health check completed', { healthStatus });

    const config = serviceContainer.get('config').getConfig();
    logger.info('Engine configuration loaded', {
      flightRules: config.altitude.flightRules,
      transitionAltitudeFt: config.altitude.transitionAltitudeFt,
      reserveMinutes: config.fuel.defaultReserveMinutes,
      windSpatialMode: config.winds.spatialMode
    });

    logger.info('Flight performance engine started successfully');

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      serviceContainer
        .shutdownAll()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error('Failed to start flight performance engine', error);
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Unhandled error during startup:', error);
    process.exit(1);
  });
}

export { main };

export * from './types';
export * from './core/errors';
export { Logger } from './core/Logger';
export type { LoggerOptions } from './core/Logger';
export { ConfigService } from './core/ConfigService';
export { EventEmitter } from './core/EventEmitter';
export { ServiceContainer } from './core/ServiceContainer';
export type { IService, ILogger, IConfigService, IEventEmitter, LogMeta } from './interfaces/IService';
export {
  bracket,
  lerp,
  clamp,
  normalizeDegrees,
  angleDifference,
  interpolateDirection
} from './engine/interpolation';
export { distanceNm, initialCourseDeg, midpoint, buildRouteLegs } from './engine/navigation';
export type { RouteLegDefaults } from './engine/navigation';
export { PerformanceTable, isaTemperatureC } from './engine/PerformanceTable';
export { WindGrid } from './engine/WindGrid';
export type { WindGridOptions } from './engine/WindGrid';
export { CruiseAltitudeSelector, HEMISPHERICAL_RULE } from './engine/CruiseAltitudeSelector';
export type { CruiseAltitudeSelectorOptions } from './engine/CruiseAltitudeSelector';
export { LegCalculator, solveWindTriangle, poundsPerFuelUnit, FUEL_DENSITY_LB_PER_GAL } from './engine/LegCalculator';
export type { LegCalculatorOptions, LegPhases } from './engine/LegCalculator';
export { FuelPlanner } from './engine/FuelPlanner';
export type { FuelPlannerOptions } from './engine/FuelPlanner';
export { AircraftCatalog } from './catalog/AircraftCatalog';
export type { AircraftProfileData } from './catalog/AircraftCatalog';
export { StationCatalog } from './catalog/StationCatalog';
export { WindsAloftDecoder, decodeToken } from './services/WindsAloftDecoder';
export { FlightPlanningService } from './services/FlightPlanningService';
export type {
  FlightPlanRequest,
  FlightPlanningCatalogs,
  PlanningEvents,
  WaypointRoute,
  WindInput
} from './services/FlightPlanningService';
