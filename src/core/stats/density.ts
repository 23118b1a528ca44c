import * as d3 from 'd3';
import { EmptyInputError, PlotError, ErrorCode } from '../errors';
import type { SampleTable, SampleRow } from '../data';

export interface DensityPoint {
  x: number;
  y: number;
}

export interface KDEOptions {
  /** Number of evaluation points */
  points?: number;
  /** Kernel standard deviation; Silverman's rule when omitted */
  bandwidth?: number;
  /** Lower end of the evaluation grid, defaults to the minimum draw */
  from?: number;
  /** Upper end of the evaluation grid, defaults to the maximum draw */
  to?: number;
}

/**
 * Gaussian kernel density estimate on an evenly spaced grid
 */
export function calculateKDE(samples: ArrayLike<number>, options: KDEOptions = {}): DensityPoint[] {
  const n = samples.length;
  if (n === 0) return [];

  const nPoints = Math.max(1, Math.floor(options.points ?? 512));
  const h = options.bandwidth ?? silvermanBandwidth(samples);
  const from = options.from ?? d3.min(Array.from(samples)) ?? 0;
  const to = options.to ?? d3.max(Array.from(samples)) ?? 0;
  const step = nPoints > 1 ? (to - from) / (nPoints - 1) : 0;
  const norm = n * h * Math.sqrt(2 * Math.PI);

  const points: DensityPoint[] = [];
  for (let i = 0; i < nPoints; i++) {
    const x = from + step * i;
    let density = 0;
    for (let j = 0; j < n; j++) {
      const u = (x - samples[j]) / h;
      density += Math.exp(-0.5 * u * u);
    }
    points.push({ x, y: density / norm });
  }
  return points;
}

/**
 * Silverman's rule of thumb: 0.9 * min(sd, IQR / 1.34) * n^(-1/5).
 * Falls back to sd, then |x0|, then 1 when the spread is zero.
 */
export function silvermanBandwidth(samples: ArrayLike<number>): number {
  const values = Array.from(samples);
  const n = values.length;
  const sd = d3.deviation(values) ?? 0;
  const sorted = Float64Array.from(values).sort();
  const iqr = (d3.quantileSorted(sorted, 0.75) ?? 0) - (d3.quantileSorted(sorted, 0.25) ?? 0);

  let lo = Math.min(sd, iqr / 1.34);
  if (!lo) lo = sd || Math.abs(values[0]) || 1;
  return 0.9 * lo * Math.pow(n, -1 / 5);
}

export interface DensityEstimateOptions {
  /** Curve points per parameter */
  precision: number;
  /** Fraction of the range added on each side of the grid */
  extend: number;
  /** Fixed bandwidth for every parameter; Silverman per parameter when undefined */
  bandwidth?: number;
}

export const DEFAULT_DENSITY_ESTIMATE_OPTIONS: DensityEstimateOptions = {
  precision: 512,
  extend: 0.1,
};

/**
 * Turn draws per parameter into a table of density curve points.
 * Parameters keep the key order of `draws`.
 */
export function estimateDensity(
  draws: Record<string, readonly number[]>,
  options: Partial<DensityEstimateOptions> = {}
): SampleTable {
  const config = { ...DEFAULT_DENSITY_ESTIMATE_OPTIONS, ...options };
  if (!Number.isInteger(config.precision) || config.precision < 2) {
    throw new PlotError(ErrorCode.INVALID_CONFIG, 'precision must be an integer of at least 2', {
      precision: config.precision,
    });
  }
  if (!(config.extend >= 0)) {
    throw new PlotError(ErrorCode.INVALID_CONFIG, 'extend must be non-negative', {
      extend: config.extend,
    });
  }

  const parameters = Object.keys(draws);
  if (parameters.length === 0) {
    throw new EmptyInputError('No parameters to estimate densities for');
  }

  const rows: SampleRow[] = [];
  for (const parameter of parameters) {
    const values = draws[parameter];
    if (values.length === 0) {
      throw new EmptyInputError(`Parameter ${parameter} has no draws`, { parameter });
    }
    const [min, max] = d3.extent(values);
    if (min === undefined || max === undefined) {
      throw new EmptyInputError(`Parameter ${parameter} has no finite draws`, { parameter });
    }
    const pad = (max - min) * config.extend;

    const curve = calculateKDE(values, {
      points: config.precision,
      bandwidth: config.bandwidth,
      from: min - pad,
      to: max + pad,
    });
    for (const point of curve) {
      rows.push({ x: point.x, y: point.y, Parameter: parameter });
    }
  }

  return { columns: ['Parameter'], rows };
}
