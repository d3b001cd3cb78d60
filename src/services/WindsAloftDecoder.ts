import type { ILogger } from '../interfaces/IService';
import type { StationForecast, WindSample } from '../types';
import { WindsAloftFormatError } from '../core/errors';
import type { StationCatalog } from '../catalog/StationCatalog';

// Temperatures at and above this level are printed without their (negative) sign
const IMPLIED_NEGATIVE_TEMP_FT = 24000;
const LIGHT_AND_VARIABLE = '9900';
const MISSING = '////';

interface LevelColumn {
  altitudeFt: number;
  start: number;
  end: number;
}

/**
 * Decodes FD winds and temperatures aloft bulletins. A bulletin may carry
 * several `FT` tables (low and high levels); samples for the same station
 * are merged, the first table winning where levels overlap.
 */
export class WindsAloftDecoder {
  private logger: ILogger;
  private catalog?: StationCatalog;

  constructor(logger: ILogger, catalog?: StationCatalog) {
    this.logger = logger;
    this.catalog = catalog;
  }

  decode(text: string): StationForecast[] {
    const lines = text.split(/\r?\n/);
    const headerIndexes = lines.flatMap((line, i) => (/^FT\b/.test(line) ? [i] : []));
    if (headerIndexes.length === 0) {
      throw new WindsAloftFormatError('No FT level header found in winds aloft bulletin');
    }

    const stations = new Map<string, Map<number, WindSample>>();

    headerIndexes.forEach((headerIndex, n) => {
      const columns = this.parseHeader(lines[headerIndex]);
      const stop = headerIndexes[n + 1] ?? lines.length;

      for (const line of lines.slice(headerIndex + 1, stop)) {
        const match = /^\s*([A-Z0-9]{3,4})\s/.exec(line);
        if (!match) continue;

        const stationId = match[1];
        const samples = stations.get(stationId) ?? new Map<number, WindSample>();
        stations.set(stationId, samples);

        const rowStart = match.index + match[0].length - 1;
        columns.forEach((column, c) => {
          const from = Math.max(column.start, rowStart);
          const to = c === columns.length - 1 ? line.length : column.end;
          const token = line.slice(from, to).trim();
          if (!token || token === MISSING || samples.has(column.altitudeFt)) return;

          const sample = decodeToken(token, column.altitudeFt);
          if (sample) {
            samples.set(column.altitudeFt, sample);
          } else {
            this.logger.warn('Skipping malformed winds aloft group', {
              stationId,
              altitudeFt: column.altitudeFt,
              token
            });
          }
        });
      }
    });

    const forecasts: StationForecast[] = [];
    for (const [stationId, samples] of stations) {
      if (samples.size === 0) continue;
      forecasts.push({
        stationId,
        position: this.catalog?.position(stationId),
        samples: [...samples.values()].sort((a, b) => a.altitudeFt - b.altitudeFt)
      });
    }

    this.logger.debug('Winds aloft bulletin decoded', {
      tables: headerIndexes.length,
      stations: forecasts.length
    });
    return forecasts;
  }

  // Each level's field ends where its header number ends
  private parseHeader(line: string): LevelColumn[] {
    const columns: LevelColumn[] = [];
    const pattern = /\S+/g;
    let previousEnd = 0;
    let match: RegExpExecArray | null;

    pattern.lastIndex = 2;
    while ((match = pattern.exec(line)) !== null) {
      if (!/^\d{4,5}$/.test(match[0])) {
        throw new WindsAloftFormatError(`Unexpected level '${match[0]}' in FT header`);
      }
      const end = match.index + match[0].length;
      columns.push({ altitudeFt: Number(match[0]), start: previousEnd, end });
      previousEnd = end;
    }

    if (columns.length === 0) {
      throw new WindsAloftFormatError('FT header lists no levels');
    }
    return columns;
  }
}

/** Decode one `DDSS[±TT]`, `DDSSTT` or `9900[±TT]` group, or null if malformed. */
export function decodeToken(token: string, altitudeFt: number): WindSample | null {
  const impliedNegative = altitudeFt >= IMPLIED_NEGATIVE_TEMP_FT;

  const match = /^(\d{2})(\d{2})([+-]\d{2}|\d{2})?$/.exec(token);
  if (!match) return null;

  const temperatureC = parseTemperature(match[3], impliedNegative);

  if (token.startsWith(LIGHT_AND_VARIABLE)) {
    return { altitudeFt, directionDeg: 0, speedKt: 0, temperatureC, variable: true };
  }

  let tens = Number(match[1]);
  let speedKt = Number(match[2]);
  // Speeds of 100 kt or more: 50 is added to the direction tens
  if (tens >= 51) {
    tens -= 50;
    speedKt += 100;
  }
  if (tens > 36) return null;

  return { altitudeFt, directionDeg: (tens * 10) % 360, speedKt, temperatureC, variable: false };
}

function parseTemperature(group: string | undefined, impliedNegative: boolean): number | undefined {
  if (group === undefined) return undefined;
  const value = Number(group);
  if (value === 0) return 0;
  return /^\d/.test(group) && impliedNegative ? -value : value;
}
