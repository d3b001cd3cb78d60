import type { CruiseAltitudeSelection, FlightRules, HemisphericalDirection } from '../types';
import { InvalidQueryError, NoLegalAltitudeError } from '../core/errors';
import { normalizeDegrees } from './interpolation';

/**
 * Hemispherical cruising altitudes, FAR 91.159 (VFR) and 91.179 (IFR).
 *
 *   EAST (000°–179°): odd thousands  + offset  → 3,500 / 5,500 / 7,500 ...
 *   WEST (180°–359°): even thousands + offset  → 4,500 / 6,500 / 8,500 ...
 *
 * Below the transition altitude the rule does not apply and the offset is
 * omitted. Every candidate keeps `clearanceFt` above the minimum safe
 * altitude (terrain or obstacle height).
 */
export const HEMISPHERICAL_RULE = {
  altitudeStepFt: 1000,
  levelSpacingFt: 2000,
  offsetFt: { VFR: 500, IFR: 0 } satisfies Record<FlightRules, number>,
  defaultTransitionAltitudeFt: 3000,
  defaultClearanceFt: 1000
} as const;

export interface CruiseAltitudeSelectorOptions {
  flightRules?: FlightRules;
  transitionAltitudeFt?: number;
  clearanceFt?: number;
}

export class CruiseAltitudeSelector {
  readonly flightRules: FlightRules;
  readonly transitionAltitudeFt: number;
  readonly clearanceFt: number;

  constructor(options: CruiseAltitudeSelectorOptions = {}) {
    this.flightRules = options.flightRules ?? 'VFR';
    this.transitionAltitudeFt = options.transitionAltitudeFt ?? HEMISPHERICAL_RULE.defaultTransitionAltitudeFt;
    this.clearanceFt = options.clearanceFt ?? HEMISPHERICAL_RULE.defaultClearanceFt;
  }

  direction(courseDeg: number): HemisphericalDirection {
    return normalizeDegrees(courseDeg) < 180 ? 'EAST' : 'WEST';
  }

  /** Lowest legal altitude at or above the minimum safe altitude plus clearance. */
  select(courseDeg: number, minSafeAltitudeFt: number, maxAircraftAltitudeFt: number): CruiseAltitudeSelection {
    const [first] = this.options(courseDeg, minSafeAltitudeFt, maxAircraftAltitudeFt);
    if (!first) {
      throw new NoLegalAltitudeError(normalizeDegrees(courseDeg), minSafeAltitudeFt, maxAircraftAltitudeFt);
    }
    return first;
  }

  /** Legal altitude closest to a preferred cruise; ties go to the lower one. */
  suggest(
    courseDeg: number,
    minSafeAltitudeFt: number,
    maxAircraftAltitudeFt: number,
    preferredAltitudeFt: number
  ): CruiseAltitudeSelection {
    const options = this.options(courseDeg, minSafeAltitudeFt, maxAircraftAltitudeFt);
    if (options.length === 0) {
      throw new NoLegalAltitudeError(normalizeDegrees(courseDeg), minSafeAltitudeFt, maxAircraftAltitudeFt);
    }

    return options.reduce((best, option) =>
      Math.abs(option.altitudeFt - preferredAltitudeFt) < Math.abs(best.altitudeFt - preferredAltitudeFt)
        ? option
        : best
    );
  }

  /** Every legal altitude between the minimum safe altitude and the ceiling, lowest first. */
  options(courseDeg: number, minSafeAltitudeFt: number, maxAircraftAltitudeFt: number): CruiseAltitudeSelection[] {
    for (const [name, value] of [['course', courseDeg], ['minimum safe altitude', minSafeAltitudeFt], ['maximum altitude', maxAircraftAltitudeFt]] as const) {
      if (!Number.isFinite(value)) {
        throw new InvalidQueryError(`Cruise altitude ${name} must be a finite number, got ${value}`);
      }
    }

    const course = normalizeDegrees(courseDeg);
    const direction = this.direction(course);
    const { altitudeStepFt, levelSpacingFt } = HEMISPHERICAL_RULE;
    const options: CruiseAltitudeSelection[] = [];
    const floorFt = minSafeAltitudeFt + this.clearanceFt;

    const lowest = Math.max(altitudeStepFt, Math.ceil(floorFt / altitudeStepFt) * altitudeStepFt);
    if (lowest < this.transitionAltitudeFt && lowest <= maxAircraftAltitudeFt) {
      options.push({ altitudeFt: lowest, courseDeg: course, direction, hemisphericalRuleApplied: false });
    }

    const offset = HEMISPHERICAL_RULE.offsetFt[this.flightRules];
    // First thousand of the right parity: odd for EAST, even for WEST
    const parity = direction === 'EAST' ? 1 : 0;
    let thousands = Math.floor(Math.max(floorFt, this.transitionAltitudeFt) / altitudeStepFt);
    if (thousands % 2 !== parity) thousands++;

    let altitude = thousands * altitudeStepFt + offset;
    while (altitude < floorFt || altitude < this.transitionAltitudeFt) {
      altitude += levelSpacingFt;
    }

    for (; altitude <= maxAircraftAltitudeFt; altitude += levelSpacingFt) {
      options.push({ altitudeFt: altitude, courseDeg: course, direction, hemisphericalRuleApplied: true });
    }

    return options;
  }
}
