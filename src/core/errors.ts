import type { FuelUnit, PerformanceAxis } from '../types';

export type ErrorCategory =
  | 'domain-range'
  | 'data-integrity'
  | 'infeasible'
  | 'shortfall'
  | 'configuration';

export abstract class FlightPerformanceError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Returned alongside a clamped lookup, never thrown by the engine.
export class OutOfDomainWarning extends FlightPerformanceError {
  readonly code = 'OUT_OF_DOMAIN';
  readonly category = 'domain-range';

  constructor(
    readonly axis: PerformanceAxis,
    readonly requested: number,
    readonly clampedTo: number
  ) {
    super(`${axis} ${requested} outside sampled range; clamped to ${clampedTo}`);
  }
}

export class InvalidTableError extends FlightPerformanceError {
  readonly code = 'INVALID_TABLE';
  readonly category = 'data-integrity';
}

export class InvalidQueryError extends FlightPerformanceError {
  readonly code = 'INVALID_QUERY';
  readonly category = 'data-integrity';
}

export class NoWindDataError extends FlightPerformanceError {
  readonly code = 'NO_WIND_DATA';
  readonly category = 'data-integrity';
}

export class InvalidWindDataError extends FlightPerformanceError {
  readonly code = 'INVALID_WIND_DATA';
  readonly category = 'data-integrity';
}

export class WindsAloftFormatError extends FlightPerformanceError {
  readonly code = 'WINDS_ALOFT_FORMAT';
  readonly category = 'data-integrity';
}

export class UnknownAircraftError extends FlightPerformanceError {
  readonly code = 'UNKNOWN_AIRCRAFT';
  readonly category = 'data-integrity';

  constructor(readonly aircraftId: string) {
    super(`Aircraft '${aircraftId}' not found in catalog`);
  }
}

export class WindExceedsPerformanceError extends FlightPerformanceError {
  readonly code = 'WIND_EXCEEDS_PERFORMANCE';
  readonly category = 'infeasible';

  constructor(
    readonly trueAirspeedKt: number,
    readonly windDirectionDeg: number,
    readonly windSpeedKt: number,
    readonly courseDeg: number
  ) {
    super(
      `Wind ${Math.round(windDirectionDeg)}°/${windSpeedKt}kt cannot be corrected for at ` +
        `${trueAirspeedKt}kt TAS on course ${Math.round(courseDeg)}°`
    );
  }
}

export class NoLegalAltitudeError extends FlightPerformanceError {
  readonly code = 'NO_LEGAL_ALTITUDE';
  readonly category = 'infeasible';

  constructor(
    readonly courseDeg: number,
    readonly minSafeAltitudeFt: number,
    readonly maxAltitudeFt: number
  ) {
    super(
      `No legal cruise altitude for course ${Math.round(courseDeg)}° between ` +
        `${minSafeAltitudeFt} ft and ${maxAltitudeFt} ft`
    );
  }
}

// Attached to a completed plan; the plan is still returned.
export class InsufficientFuelError extends FlightPerformanceError {
  readonly code = 'INSUFFICIENT_FUEL';
  readonly category = 'shortfall';
  readonly deficit: number;

  constructor(
    readonly requiredFuel: number,
    readonly fuelCapacity: number,
    readonly fuelUnit: FuelUnit
  ) {
    super(
      `Required fuel ${requiredFuel.toFixed(1)} ${fuelUnit} exceeds usable capacity ` +
        `${fuelCapacity.toFixed(1)} ${fuelUnit}`
    );
    this.deficit = requiredFuel - fuelCapacity;
  }
}

export class ConfigurationError extends FlightPerformanceError {
  readonly code = 'CONFIGURATION';
  readonly category = 'configuration';
}
