import path from 'path';
import { config } from 'dotenv';
import Joi from 'joi';
import type { IConfigService, ILogger } from '../interfaces/IService';
import type { EngineConfig } from '../types';
import { ConfigurationError } from './errors';

const DATA_DIR = path.resolve(__dirname, '../../data');

const configSchema = Joi.object<EngineConfig>({
  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').required(),
    directory: Joi.string().optional()
  }).required(),
  altitude: Joi.object({
    flightRules: Joi.string().valid('VFR', 'IFR').required(),
    transitionAltitudeFt: Joi.number().min(0).max(18000).required()
  }).required(),
  fuel: Joi.object({
    defaultReserveMinutes: Joi.number().min(0).max(180).required(),
    defaultReserveFuelFlow: Joi.number().positive().required()
  }).required(),
  winds: Joi.object({
    spatialMode: Joi.string().valid('nearest', 'inverse-distance').required(),
    missingWindPolicy: Joi.string().valid('fail', 'assume-calm').required()
  }).required(),
  data: Joi.object({
    aircraftPath: Joi.string().required(),
    stationsPath: Joi.string().required()
  }).required()
});

export class ConfigService implements IConfigService<EngineConfig> {
  private configuration: EngineConfig;
  private logger?: ILogger;

  /**
   * Reads `.env` into `process.env` unless an explicit environment is given,
   * then builds and validates the engine configuration.
   */
  constructor(logger?: ILogger, env?: NodeJS.ProcessEnv) {
    this.logger = logger;

    if (!env) {
      config();
    }

    this.configuration = this.validateConfiguration(this.buildConfiguration(env ?? process.env));
  }

  async initialize(): Promise<void> {
    this.logger?.info('ConfigService initialized');
  }

  async shutdown(): Promise<void> {
    this.logger?.info('ConfigService shutdown');
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  get<K extends keyof EngineConfig>(key: K): EngineConfig[K] {
    return this.configuration[key];
  }

  set<K extends keyof EngineConfig>(key: K, value: EngineConfig[K]): void {
    this.configuration = this.validateConfiguration({ ...this.configuration, [key]: value });
    this.logger?.debug(`Configuration updated: ${key} = ${JSON.stringify(value)}`);
  }

  getConfig(): EngineConfig {
    return { ...this.configuration };
  }

  // Raw values; types and ranges are enforced by the schema
  private buildConfiguration(env: NodeJS.ProcessEnv): object {
    return {
      logging: {
        level: env.LOG_LEVEL || 'info',
        directory: env.LOG_DIR || undefined
      },
      altitude: {
        flightRules: env.FLIGHT_RULES || 'VFR',
        transitionAltitudeFt: Number(env.TRANSITION_ALTITUDE_FT || 3000)
      },
      fuel: {
        defaultReserveMinutes: Number(env.DEFAULT_RESERVE_MINUTES || 45),
        defaultReserveFuelFlow: Number(env.DEFAULT_RESERVE_FUEL_FLOW || 8)
      },
      winds: {
        spatialMode: env.WIND_SPATIAL_MODE || 'nearest',
        missingWindPolicy: env.MISSING_WIND_POLICY || 'fail'
      },
      data: {
        aircraftPath: env.AIRCRAFT_DATA_PATH || path.join(DATA_DIR, 'aircraft-profiles.json'),
        stationsPath: env.FD_STATIONS_PATH || path.join(DATA_DIR, 'fd-stations.json')
      }
    };
  }

  private validateConfiguration(candidate: object): EngineConfig {
    const { error, value } = configSchema.validate(candidate, { abortEarly: false });
    if (error) {
      const errorMessage = `Configuration validation failed: ${error.details.map(d => d.message).join(', ')}`;
      this.logger?.error(errorMessage);
      throw new ConfigurationError(errorMessage);
    }

    this.logger?.debug('Configuration validation passed');
    return value;
  }
}
