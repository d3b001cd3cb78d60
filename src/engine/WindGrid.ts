import Joi from 'joi';
import type { GeoPoint, StationForecast, WindQuery, WindSample, WindSpatialMode, WindVector } from '../types';
import { InvalidQueryError, InvalidWindDataError, NoWindDataError } from '../core/errors';
import { bracket, interpolateDirection, lerp, normalizeDegrees } from './interpolation';
import { distanceNm } from './navigation';

const windSampleSchema = Joi.object<WindSample>({
  altitudeFt: Joi.number().min(0).max(60000).required(),
  directionDeg: Joi.number().min(0).max(360).required(),
  speedKt: Joi.number().min(0).max(300).required(),
  temperatureC: Joi.number().min(-90).max(60),
  variable: Joi.boolean()
});

const stationSchema = Joi.object<StationForecast>({
  stationId: Joi.string().trim().min(1).required(),
  position: Joi.object({
    latitude: Joi.number().min(-90).max(90).required(),
    longitude: Joi.number().min(-180).max(180).required()
  }),
  samples: Joi.array().items(windSampleSchema).required()
});

const forecastSchema = Joi.array<StationForecast[]>().items(stationSchema).required();

interface StationProfile {
  stationId: string;
  position?: GeoPoint;
  altitudes: number[];
  samples: WindSample[];
}

export interface WindGridOptions {
  spatialMode?: WindSpatialMode;
}

/**
 * Winds-aloft forecast for one planning session. Immutable after
 * construction; altitudes per station are sorted and must be distinct.
 */
export class WindGrid {
  readonly spatialMode: WindSpatialMode;
  private readonly stations: Map<string, StationProfile>;

  constructor(forecasts: readonly StationForecast[], options: WindGridOptions = {}) {
    this.spatialMode = options.spatialMode ?? 'nearest';
    this.stations = new Map();

    for (const forecast of forecasts) {
      const stationId = forecast.stationId.toUpperCase();
      if (this.stations.has(stationId)) {
        throw new InvalidWindDataError(`Station ${stationId} appears more than once`);
      }

      const samples = [...forecast.samples]
        .map(sample => ({ ...sample, directionDeg: normalizeDegrees(sample.directionDeg) }))
        .sort((a, b) => a.altitudeFt - b.altitudeFt);
      for (let i = 1; i < samples.length; i++) {
        if (samples[i].altitudeFt === samples[i - 1].altitudeFt) {
          throw new InvalidWindDataError(`Station ${stationId} has two samples at ${samples[i].altitudeFt} ft`);
        }
      }

      this.stations.set(stationId, {
        stationId,
        position: forecast.position,
        altitudes: samples.map(s => s.altitudeFt),
        samples
      });
    }
  }

  /** Validate raw (e.g. JSON) station forecasts before building the grid. */
  static fromForecasts(raw: unknown, options: WindGridOptions = {}): WindGrid {
    const { error, value } = forecastSchema.validate(raw, { abortEarly: false });
    if (error) {
      throw new InvalidWindDataError(`Invalid wind forecast: ${error.details.map(d => d.message).join(', ')}`);
    }
    return new WindGrid(value, options);
  }

  /** An explicit zero-wind grid, for callers that choose to plan without forecast data. */
  static calm(): WindGrid {
    return new WindGrid([{ stationId: 'CALM', samples: [{ altitudeFt: 0, directionDeg: 0, speedKt: 0 }] }]);
  }

  get stationIds(): string[] {
    return [...this.stations.keys()];
  }

  windAt(query: WindQuery, altitudeFt: number): WindVector {
    if (!Number.isFinite(altitudeFt)) {
      throw new InvalidQueryError(`Wind lookup altitude must be a finite number, got ${altitudeFt}`);
    }

    if ('stationId' in query) {
      return this.stationWind(this.requireStation(query.stationId), altitudeFt);
    }

    const candidates = this.rankByDistance(query.position);
    if (candidates.length === 0) {
      throw new NoWindDataError('No forecast station with wind samples near the requested position');
    }

    const [nearest, second] = candidates;
    const nearestWind = this.stationWind(nearest.station, altitudeFt);
    if (this.spatialMode === 'nearest' || !second || nearest.distance === 0) {
      return nearestWind;
    }

    // Inverse-distance weights: w1 = 1/d1, w2 = 1/d2, share of the second = d1 / (d1 + d2)
    const t = nearest.distance / (nearest.distance + second.distance);
    const secondWind = this.stationWind(second.station, altitudeFt);
    return blend(nearestWind, secondWind, t);
  }

  private requireStation(stationId: string): StationProfile {
    const station = this.stations.get(stationId.toUpperCase());
    if (!station || station.samples.length === 0) {
      throw new NoWindDataError(`No wind samples for station ${stationId.toUpperCase()}`);
    }
    return station;
  }

  private rankByDistance(position: GeoPoint): Array<{ station: StationProfile; distance: number }> {
    const withData = [...this.stations.values()].filter(s => s.samples.length > 0);

    // A lone station covers the whole route, positioned or not
    if (withData.length === 1) {
      const only = withData[0];
      return [{ station: only, distance: only.position ? distanceNm(position, only.position) : 0 }];
    }

    return withData
      .flatMap(station => (station.position ? [{ station, distance: distanceNm(position, station.position) }] : []))
      .sort((a, b) => a.distance - b.distance);
  }

  private stationWind(station: StationProfile, altitudeFt: number): WindVector {
    const b = bracket(altitudeFt, station.altitudes);
    const lower = station.samples[b.lower];
    const upper = station.samples[b.upper];

    return {
      ...blendSamples(lower, upper, b.t),
      stations: [station.stationId],
      clamped: b.clamped
    };
  }
}

function blendSamples(
  a: WindSample,
  b: WindSample,
  t: number
): Pick<WindVector, 'directionDeg' | 'speedKt' | 'temperatureC' | 'variable'> {
  return {
    directionDeg: blendDirection(a, b, t),
    speedKt: lerp(a.speedKt, b.speedKt, t),
    temperatureC: interpolateOptional(a.temperatureC, b.temperatureC, t),
    variable: t === 0 ? a.variable === true : a.variable === true && b.variable === true
  };
}

function blend(a: WindVector, b: WindVector, t: number): WindVector {
  return {
    directionDeg: blendDirection(a, b, t),
    speedKt: lerp(a.speedKt, b.speedKt, t),
    temperatureC: interpolateOptional(a.temperatureC, b.temperatureC, t),
    variable: a.variable && b.variable,
    stations: [...a.stations, ...b.stations],
    clamped: a.clamped || b.clamped
  };
}

type Heading = Pick<WindSample, 'directionDeg' | 'speedKt' | 'variable'>;

// Calm and light-and-variable winds carry a placeholder direction
function hasHeading(wind: Heading): boolean {
  return wind.speedKt > 0 && wind.variable !== true;
}

function blendDirection(a: Heading, b: Heading, t: number): number {
  if (hasHeading(a) && !hasHeading(b)) return a.directionDeg;
  if (hasHeading(b) && !hasHeading(a)) return b.directionDeg;
  return interpolateDirection(a.directionDeg, b.directionDeg, t);
}

function interpolateOptional(a: number | undefined, b: number | undefined, t: number): number | undefined {
  if (a === undefined || b === undefined) {
    return t === 0 ? a : undefined;
  }
  return lerp(a, b, t);
}
