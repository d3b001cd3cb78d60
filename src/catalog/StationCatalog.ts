import fs from 'fs';
import Joi from 'joi';
import type { GeoPoint } from '../types';
import { InvalidWindDataError } from '../core/errors';
import { distanceNm } from '../engine/navigation';

const stationsSchema = Joi.object<Record<string, GeoPoint>>().pattern(
  /^[A-Z0-9]{3}$/,
  Joi.object({
    latitude: Joi.number().min(-90).max(90).required(),
    longitude: Joi.number().min(-180).max(180).required()
  })
);

// ICAO prefixes dropped to get the three-letter FD identifier (KDFW -> DFW, PANC -> ANC)
const ICAO_PREFIXES = ['K', 'C', 'M', 'P'];

/**
 * Forecast (FD) station identifiers and their positions.
 */
export class StationCatalog {
  private readonly stations: Map<string, GeoPoint>;

  constructor(stations: Record<string, GeoPoint>) {
    this.stations = new Map(Object.entries(stations).map(([id, position]) => [id.toUpperCase(), position]));
  }

  static fromFile(filePath: string): StationCatalog {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const { error, value } = stationsSchema.validate(raw);
    if (error) {
      throw new InvalidWindDataError(`Invalid station catalog ${filePath}: ${error.message}`);
    }
    return new StationCatalog(value);
  }

  get size(): number {
    return this.stations.size;
  }

  /** Map an airport or FD identifier to the FD station id, or null if unknown. */
  resolve(ident: string): string | null {
    const id = ident.trim().toUpperCase();
    if (this.stations.has(id)) return id;

    if (id.length === 4 && ICAO_PREFIXES.includes(id[0])) {
      const short = id.slice(1);
      if (this.stations.has(short)) return short;
    }
    return null;
  }

  position(ident: string): GeoPoint | undefined {
    const id = this.resolve(ident);
    return id ? this.stations.get(id) : undefined;
  }

  nearest(position: GeoPoint, count = 1): Array<{ stationId: string; distanceNm: number }> {
    return [...this.stations.entries()]
      .map(([stationId, stationPosition]) => ({ stationId, distanceNm: distanceNm(position, stationPosition) }))
      .sort((a, b) => a.distanceNm - b.distanceNm)
      .slice(0, count);
  }
}
