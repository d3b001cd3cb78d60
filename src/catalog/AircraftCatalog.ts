import fs from 'fs';
import Joi from 'joi';
import type { AircraftProfile, FuelType, FuelUnit, PerformanceSample } from '../types';
import { InvalidTableError, UnknownAircraftError } from '../core/errors';
import { PerformanceTable, performanceSampleSchema } from '../engine/PerformanceTable';

export interface AircraftProfileData {
  id: string;
  label: string;
  emptyWeightLb: number;
  maxGrossWeightLb: number;
  fuelCapacity: number;
  fuelUnit: FuelUnit;
  fuelType: FuelType;
  serviceCeilingFt: number;
  preferredCruiseAltitudeFt: number;
  taxiFuel?: number;
  contingencyPct?: number;
  climbRateFpm?: number;
  descentRateFpm?: number;
  performance: PerformanceSample[];
}

const profileSchema = Joi.object<AircraftProfileData>({
  id: Joi.string().trim().uppercase().min(2).required(),
  label: Joi.string().required(),
  emptyWeightLb: Joi.number().positive().required(),
  maxGrossWeightLb: Joi.number().positive().min(Joi.ref('emptyWeightLb')).required(),
  fuelCapacity: Joi.number().positive().required(),
  fuelUnit: Joi.string().valid('gal', 'lb').required(),
  fuelType: Joi.string().valid('AvGas', 'JetA').required(),
  serviceCeilingFt: Joi.number().positive().required(),
  preferredCruiseAltitudeFt: Joi.number().positive().max(Joi.ref('serviceCeilingFt')).required(),
  taxiFuel: Joi.number().min(0).default(0),
  contingencyPct: Joi.number().min(0).max(100).default(0),
  climbRateFpm: Joi.number().positive(),
  descentRateFpm: Joi.number().positive(),
  performance: Joi.array().items(performanceSampleSchema).min(2).required()
});

const catalogSchema = Joi.array<AircraftProfileData[]>().items(profileSchema).unique('id').required();

/**
 * Aircraft profiles with their POH performance tables. Profiles are frozen;
 * the tables are shared read-only across planning sessions.
 */
export class AircraftCatalog {
  private readonly profiles: Map<string, AircraftProfile>;

  constructor(data: readonly AircraftProfileData[]) {
    this.profiles = new Map(data.map(entry => [entry.id.toUpperCase(), buildProfile(entry)]));
  }

  static fromFile(filePath: string): AircraftCatalog {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const { error, value } = catalogSchema.validate(raw, { abortEarly: false });
    if (error) {
      throw new InvalidTableError(
        `Invalid aircraft data ${filePath}: ${error.details.map(d => d.message).join(', ')}`
      );
    }
    return new AircraftCatalog(value);
  }

  get(id: string): AircraftProfile {
    const profile = this.profiles.get(id.trim().toUpperCase());
    if (!profile) {
      throw new UnknownAircraftError(id);
    }
    return profile;
  }

  has(id: string): boolean {
    return this.profiles.has(id.trim().toUpperCase());
  }

  list(): AircraftProfile[] {
    return [...this.profiles.values()];
  }
}

function buildProfile(data: AircraftProfileData): AircraftProfile {
  let performance: PerformanceTable;
  try {
    performance = new PerformanceTable(data.performance);
  } catch (error) {
    if (error instanceof InvalidTableError) {
      throw new InvalidTableError(`${data.id}: ${error.message}`);
    }
    throw error;
  }

  return Object.freeze({
    id: data.id.toUpperCase(),
    label: data.label,
    emptyWeightLb: data.emptyWeightLb,
    maxGrossWeightLb: data.maxGrossWeightLb,
    fuelCapacity: data.fuelCapacity,
    fuelUnit: data.fuelUnit,
    fuelType: data.fuelType,
    serviceCeilingFt: data.serviceCeilingFt,
    preferredCruiseAltitudeFt: data.preferredCruiseAltitudeFt,
    taxiFuel: data.taxiFuel ?? 0,
    contingencyPct: data.contingencyPct ?? 0,
    climbRateFpm: data.climbRateFpm,
    descentRateFpm: data.descentRateFpm,
    performance
  });
}
