import { describe, expect, it, vi } from 'vitest';
import { WindsAloftFormatError } from '../../core/errors';
import type { ILogger } from '../../interfaces/IService';
import { StationCatalog } from '../../catalog/StationCatalog';
import { WindsAloftDecoder, decodeToken } from '../WindsAloftDecoder';

const BULLETIN = [
  'DATA BASED ON 011200Z',
  'VALID 011800Z   FOR USE 1400-2100Z. TEMPS NEG ABV 24000',
  '',
  'FT  3000    6000    9000   12000   18000   24000  30000  34000  39000',
  'ABI      1910+17 2123+11 2127+05 2334-09 2444-21 244736 245045 245452',
  'ABQ              9900+06 2413+01 2625-14 2738-26 275141 275651 285961',
  'ALB 2714 2725+00 2734-06 2745-11 7712-24 7820-35 781449 780657 279668',
  '',
  'FT   39000  45000',
  'ABI 279668 289870'
].join('\n');

function mockLogger(): ILogger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe('decodeToken()', () => {
  it('decodes direction, speed and signed temperature', () => {
    expect(decodeToken('2123+11', 9000)).toEqual({
      altitudeFt: 9000,
      directionDeg: 210,
      speedKt: 23,
      temperatureC: 11,
      variable: false
    });
  });

  it('decodes a group without temperature', () => {
    expect(decodeToken('2714', 3000)).toEqual({
      altitudeFt: 3000,
      directionDeg: 270,
      speedKt: 14,
      temperatureC: undefined,
      variable: false
    });
  });

  it('decodes light and variable', () => {
    expect(decodeToken('9900+06', 9000)).toEqual({
      altitudeFt: 9000,
      directionDeg: 0,
      speedKt: 0,
      temperatureC: 6,
      variable: true
    });
  });

  it('applies the implied negative temperature above 24000 ft', () => {
    expect(decodeToken('244736', 30000)?.temperatureC).toBe(-36);
    expect(decodeToken('2444-21', 24000)?.temperatureC).toBe(-21);
  });

  it('decodes speeds of 100 kt and more', () => {
    expect(decodeToken('7712-24', 18000)).toMatchObject({ directionDeg: 270, speedKt: 112 });
    expect(decodeToken('781449', 30000)).toMatchObject({ directionDeg: 280, speedKt: 114, temperatureC: -49 });
  });

  it('rejects malformed groups', () => {
    expect(decodeToken('2X15+03', 9000)).toBeNull();
    expect(decodeToken('4015+03', 9000)).toBeNull();
  });
});

describe('WindsAloftDecoder', () => {
  it('decodes every station row by column', () => {
    const forecasts = new WindsAloftDecoder(mockLogger()).decode(BULLETIN);

    expect(forecasts.map(f => f.stationId)).toEqual(['ABI', 'ABQ', 'ALB']);

    const abq = forecasts[1];
    expect(abq.samples[0]).toEqual({ altitudeFt: 9000, directionDeg: 0, speedKt: 0, temperatureC: 6, variable: true });
    expect(abq.samples).toHaveLength(7);

    const alb = forecasts[2];
    expect(alb.samples[0]).toMatchObject({ altitudeFt: 3000, directionDeg: 270, speedKt: 14 });
    expect(alb.samples[1].temperatureC).toBe(0);
  });

  it('merges tables, keeping the first value for a repeated level', () => {
    const [abi] = new WindsAloftDecoder(mockLogger()).decode(BULLETIN);

    expect(abi.samples.map(s => s.altitudeFt)).toEqual([6000, 9000, 12000, 18000, 24000, 30000, 34000, 39000, 45000]);
    expect(abi.samples[7]).toMatchObject({ directionDeg: 240, speedKt: 54, temperatureC: -52 });
    expect(abi.samples[8]).toMatchObject({ directionDeg: 280, speedKt: 98, temperatureC: -70 });
  });

  it('attaches catalog positions', () => {
    const catalog = new StationCatalog({ ABI: { latitude: 32.41, longitude: -99.68 } });
    const forecasts = new WindsAloftDecoder(mockLogger(), catalog).decode(BULLETIN);

    expect(forecasts[0].position).toEqual({ latitude: 32.41, longitude: -99.68 });
    expect(forecasts[1].position).toBeUndefined();
  });

  it('skips missing and malformed groups with a warning', () => {
    const logger = mockLogger();
    const text = ['FT  3000    6000', 'XYZ ////    2X15'].join('\n');
    const forecasts = new WindsAloftDecoder(logger).decode(text);

    expect(forecasts).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('Skipping malformed winds aloft group', {
      stationId: 'XYZ',
      altitudeFt: 6000,
      token: '2X15'
    });
  });

  it('rejects a bulletin without a level header', () => {
    expect(() => new WindsAloftDecoder(mockLogger()).decode('ABI 1910+17')).toThrow(WindsAloftFormatError);
  });

  it('rejects a malformed level header', () => {
    expect(() => new WindsAloftDecoder(mockLogger()).decode('FT  3000  SIXK')).toThrow(
      "Unexpected level 'SIXK' in FT header"
    );
  });
});
