import Joi from 'joi';
import type { AxisRange, PerformanceAxis, PerformanceLookup, PerformanceSample } from '../types';
import { InvalidQueryError, InvalidTableError, OutOfDomainWarning } from '../core/errors';
import { bracket, interpolateVector } from './interpolation';

// ISA: 15 °C at sea level, -1.98 °C per 1000 ft
export const ISA_SEA_LEVEL_C = 15;
export const ISA_LAPSE_RATE_C_PER_1000FT = 1.98;

export function isaTemperatureC(altitudeFt: number): number {
  return ISA_SEA_LEVEL_C - (ISA_LAPSE_RATE_C_PER_1000FT * altitudeFt) / 1000;
}

type OptionalOutput = 'climbRateFpm' | 'descentRateFpm';

const OPTIONAL_OUTPUTS: readonly OptionalOutput[] = ['climbRateFpm', 'descentRateFpm'];

export const performanceSampleSchema = Joi.object<PerformanceSample>({
  altitudeFt: Joi.number().min(-2000).max(60000).required(),
  temperatureC: Joi.number().min(-80).max(60),
  weightLb: Joi.number().positive(),
  trueAirspeedKt: Joi.number().positive().required(),
  fuelFlow: Joi.number().positive().required(),
  climbRateFpm: Joi.number().min(0),
  descentRateFpm: Joi.number().positive()
});

const samplesSchema = Joi.array<PerformanceSample[]>().items(performanceSampleSchema).min(2).required();

// Values of one altitude row: [tas, fuelFlow, ...optional outputs]
interface AltitudeSlice {
  altitudes: number[];
  values: number[][];
}

interface TemperatureSlice {
  temperatures: number[];
  slices: AltitudeSlice[];
}

interface Interpolated {
  values: number[];
  warnings: OutOfDomainWarning[];
}

/**
 * One aircraft's POH cruise data as a sparse sample grid.
 *
 * Samples are grouped weight → temperature → altitude. Each group may have its
 * own altitude rows, so printed tables with ragged columns load as they are.
 * A lookup interpolates altitude first inside every (weight, temperature)
 * group, then temperature inside every weight, then weight. Queries outside a
 * group's range clamp to its edge and are reported as OutOfDomainWarning.
 */
export class PerformanceTable {
  readonly hasTemperatureAxis: boolean;
  readonly hasWeightAxis: boolean;
  readonly outputs: readonly OptionalOutput[];
  readonly sampleCount: number;

  private readonly weights: number[];
  private readonly byWeight: TemperatureSlice[];

  constructor(samples: readonly PerformanceSample[]) {
    if (samples.length < 2) {
      throw new InvalidTableError(`Performance table needs at least two samples, got ${samples.length}`);
    }

    const first = samples[0];
    this.hasTemperatureAxis = first.temperatureC !== undefined;
    this.hasWeightAxis = first.weightLb !== undefined;
    this.outputs = OPTIONAL_OUTPUTS.filter(key => first[key] !== undefined);
    this.sampleCount = samples.length;

    for (const sample of samples) {
      this.assertShape(sample);
    }

    // weight → temperature → altitude → values
    const grouped = new Map<number, Map<number, Map<number, number[]>>>();
    for (const sample of samples) {
      const weight = sample.weightLb ?? 0;
      const temperature = sample.temperatureC ?? 0;
      const byTemperature = grouped.get(weight) ?? new Map<number, Map<number, number[]>>();
      const byAltitude = byTemperature.get(temperature) ?? new Map<number, number[]>();

      if (byAltitude.has(sample.altitudeFt)) {
        throw new InvalidTableError(`Duplicate sample at ${describeKey(sample)}`);
      }

      byAltitude.set(sample.altitudeFt, this.outputValues(sample));
      byTemperature.set(temperature, byAltitude);
      grouped.set(weight, byTemperature);
    }

    this.weights = sortedKeys(grouped);
    if (this.hasWeightAxis && this.weights.length < 2) {
      throw new InvalidTableError('Weight axis needs at least two distinct weights');
    }

    this.byWeight = this.weights.map(weight => {
      const byTemperature = grouped.get(weight) ?? new Map<number, Map<number, number[]>>();
      const temperatures = sortedKeys(byTemperature);
      if (this.hasTemperatureAxis && temperatures.length < 2) {
        throw new InvalidTableError(`Temperature axis needs at least two temperatures at ${weight} lb`);
      }

      return {
        temperatures,
        slices: temperatures.map(temperature => {
          const byAltitude = byTemperature.get(temperature) ?? new Map<number, number[]>();
          const altitudes = sortedKeys(byAltitude);
          if (altitudes.length < 2) {
            throw new InvalidTableError(
              `Altitude axis needs at least two altitudes at ${temperature} °C / ${weight} lb`
            );
          }
          return { altitudes, values: altitudes.map(altitude => byAltitude.get(altitude) ?? []) };
        })
      };
    });
  }

  /** Validate raw (e.g. JSON) sample rows before building the table. */
  static fromSamples(raw: unknown): PerformanceTable {
    const { error, value } = samplesSchema.validate(raw, { abortEarly: false });
    if (error) {
      throw new InvalidTableError(`Invalid performance samples: ${error.details.map(d => d.message).join(', ')}`);
    }
    return new PerformanceTable(value);
  }

  get axes(): AxisRange[] {
    const altitudes = this.byWeight.flatMap(w => w.slices.flatMap(s => s.altitudes));
    const ranges: AxisRange[] = [{ axis: 'altitude', min: Math.min(...altitudes), max: Math.max(...altitudes) }];

    if (this.hasTemperatureAxis) {
      const temperatures = this.byWeight.flatMap(w => w.temperatures);
      ranges.push({ axis: 'temperature', min: Math.min(...temperatures), max: Math.max(...temperatures) });
    }
    if (this.hasWeightAxis) {
      ranges.push({ axis: 'weight', min: this.weights[0], max: this.weights[this.weights.length - 1] });
    }
    return ranges;
  }

  /**
   * Interpolated performance at a pressure altitude. Temperature and weight
   * are ignored when the table has no such axis; when the table has one and
   * the query omits it, ISA temperature and the heaviest sampled weight apply.
   */
  lookup(altitudeFt: number, temperatureC?: number, weightLb?: number): PerformanceLookup {
    assertFinite('altitude', altitudeFt);
    if (temperatureC !== undefined) assertFinite('temperature', temperatureC);
    if (weightLb !== undefined) assertFinite('weight', weightLb);

    const temperature = temperatureC ?? isaTemperatureC(altitudeFt);
    const weight = weightLb ?? this.weights[this.weights.length - 1];

    const result = this.hasWeightAxis
      ? this.interpolateAxis('weight', weight, this.weights, this.byWeight, slice =>
          this.lookupTemperature(slice, altitudeFt, temperature)
        )
      : this.lookupTemperature(this.byWeight[0], altitudeFt, temperature);

    const [trueAirspeedKt, fuelFlow, ...optional] = result.values;
    const lookup: PerformanceLookup = {
      trueAirspeedKt,
      fuelFlow,
      outOfDomain: result.warnings.length > 0,
      warnings: dedupeWarnings(result.warnings)
    };
    this.outputs.forEach((key, i) => {
      lookup[key] = optional[i];
    });
    return lookup;
  }

  private lookupTemperature(slice: TemperatureSlice, altitudeFt: number, temperatureC: number): Interpolated {
    if (!this.hasTemperatureAxis) {
      return this.lookupAltitude(slice.slices[0], altitudeFt);
    }
    return this.interpolateAxis('temperature', temperatureC, slice.temperatures, slice.slices, s =>
      this.lookupAltitude(s, altitudeFt)
    );
  }

  private lookupAltitude(slice: AltitudeSlice, altitudeFt: number): Interpolated {
    return this.interpolateAxis('altitude', altitudeFt, slice.altitudes, slice.values, values => ({
      values,
      warnings: []
    }));
  }

  private interpolateAxis<T>(
    axis: PerformanceAxis,
    x: number,
    keys: readonly number[],
    children: readonly T[],
    resolve: (child: T) => Interpolated
  ): Interpolated {
    const b = bracket(x, keys);
    const lower = resolve(children[b.lower]);
    const warnings = [...lower.warnings];

    if (b.clamped && b.clampedTo !== undefined) {
      warnings.push(new OutOfDomainWarning(axis, x, b.clampedTo));
    }
    if (b.upper === b.lower) {
      return { values: lower.values, warnings };
    }

    const upper = resolve(children[b.upper]);
    return {
      values: interpolateVector(lower.values, upper.values, b.t),
      warnings: [...warnings, ...upper.warnings]
    };
  }

  private outputValues(sample: PerformanceSample): number[] {
    return [sample.trueAirspeedKt, sample.fuelFlow, ...this.outputs.map(key => sample[key] ?? NaN)];
  }

  private assertShape(sample: PerformanceSample): void {
    if ((sample.temperatureC !== undefined) !== this.hasTemperatureAxis) {
      throw new InvalidTableError(`Sample at ${describeKey(sample)} disagrees on the temperature axis`);
    }
    if ((sample.weightLb !== undefined) !== this.hasWeightAxis) {
      throw new InvalidTableError(`Sample at ${describeKey(sample)} disagrees on the weight axis`);
    }
    for (const key of OPTIONAL_OUTPUTS) {
      if ((sample[key] !== undefined) !== this.outputs.includes(key)) {
        throw new InvalidTableError(`Sample at ${describeKey(sample)} disagrees on output ${key}`);
      }
    }

    const values = [sample.altitudeFt, sample.trueAirspeedKt, sample.fuelFlow, sample.temperatureC ?? 0, sample.weightLb ?? 0];
    if (!values.every(Number.isFinite)) {
      throw new InvalidTableError(`Sample at ${describeKey(sample)} has a non-finite value`);
    }
    if (sample.trueAirspeedKt <= 0 || sample.fuelFlow <= 0) {
      throw new InvalidTableError(`Sample at ${describeKey(sample)} must have positive TAS and fuel flow`);
    }
  }
}

function sortedKeys(map: Map<number, unknown>): number[] {
  return [...map.keys()].sort((a, b) => a - b);
}

function describeKey(sample: PerformanceSample): string {
  const parts = [`${sample.altitudeFt} ft`];
  if (sample.temperatureC !== undefined) parts.push(`${sample.temperatureC} °C`);
  if (sample.weightLb !== undefined) parts.push(`${sample.weightLb} lb`);
  return parts.join(' / ');
}

function assertFinite(axis: PerformanceAxis, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidQueryError(`Lookup ${axis} must be a finite number, got ${value}`);
  }
}

// The same clamp can be hit once per group; report it once
function dedupeWarnings(warnings: OutOfDomainWarning[]): OutOfDomainWarning[] {
  const seen = new Map<string, OutOfDomainWarning>();
  for (const warning of warnings) {
    const key = `${warning.axis}:${warning.clampedTo}`;
    if (!seen.has(key)) seen.set(key, warning);
  }
  return [...seen.values()];
}
