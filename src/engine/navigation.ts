import type { GeoPoint, RouteLeg, Waypoint } from '../types';
import { InvalidQueryError } from '../core/errors';
import { normalizeDegrees, toDegrees, toRadians } from './interpolation';

export const EARTH_RADIUS_NM = 3440.065;

/** Initial great-circle course, degrees true: 0° = north, 90° = east. */
export function initialCourseDeg(from: GeoPoint, to: GeoPoint): number {
  const φ1 = toRadians(from.latitude);
  const φ2 = toRadians(to.latitude);
  const Δλ = toRadians(to.longitude - from.longitude);

  const y = Math.sin(Δλ) * Math.cos(φ2);
  const x = Math.cos(φ1) * Math.sin(φ2) - Math.sin(φ1) * Math.cos(φ2) * Math.cos(Δλ);

  return normalizeDegrees(toDegrees(Math.atan2(y, x)));
}

/** Haversine distance in nautical miles. */
export function distanceNm(from: GeoPoint, to: GeoPoint): number {
  const φ1 = toRadians(from.latitude);
  const φ2 = toRadians(to.latitude);
  const Δφ = φ2 - φ1;
  const Δλ = toRadians(to.longitude - from.longitude);

  const a = Math.sin(Δφ / 2) ** 2 + Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) ** 2;
  return 2 * EARTH_RADIUS_NM * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/** Great-circle midpoint. */
export function midpoint(from: GeoPoint, to: GeoPoint): GeoPoint {
  const φ1 = toRadians(from.latitude);
  const φ2 = toRadians(to.latitude);
  const λ1 = toRadians(from.longitude);
  const Δλ = toRadians(to.longitude - from.longitude);

  const bx = Math.cos(φ2) * Math.cos(Δλ);
  const by = Math.cos(φ2) * Math.sin(Δλ);
  const φm = Math.atan2(Math.sin(φ1) + Math.sin(φ2), Math.sqrt((Math.cos(φ1) + bx) ** 2 + by ** 2));
  const λm = λ1 + Math.atan2(by, Math.cos(φ1) + bx);

  return {
    latitude: toDegrees(φm),
    longitude: ((toDegrees(λm) + 540) % 360) - 180
  };
}

export interface RouteLegDefaults {
  cruiseAltitudeFt?: number;
  minSafeAltitudeFt?: number;
  magneticVariationDeg?: number;
}

/**
 * Turn an ordered list of positioned waypoints into route legs with course and
 * distance filled in. Every waypoint must carry a position.
 */
export function buildRouteLegs(waypoints: readonly Waypoint[], defaults: RouteLegDefaults = {}): RouteLeg[] {
  if (waypoints.length < 2) {
    throw new InvalidQueryError(`A route needs at least two waypoints, got ${waypoints.length}`);
  }

  const legs: RouteLeg[] = [];
  for (let i = 0; i + 1 < waypoints.length; i++) {
    const from = waypoints[i];
    const to = waypoints[i + 1];
    if (!from.position || !to.position) {
      throw new InvalidQueryError(`Waypoint ${from.position ? to.ident : from.ident} has no position`);
    }

    legs.push({
      from,
      to,
      trueCourseDeg: initialCourseDeg(from.position, to.position),
      distanceNm: distanceNm(from.position, to.position),
      ...defaults
    });
  }

  return legs;
}
