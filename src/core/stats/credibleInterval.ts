import { EmptyInputError, InvalidIntervalMassError } from '../errors';
import { quantileOf } from './pointEstimate';

/**
 * eti: equal-tailed interval
 * hdi: highest density interval (shortest window)
 */
export type IntervalMethod = 'eti' | 'hdi';

export interface CredibleInterval {
  ci: number;
  low: number;
  high: number;
}

export function validateIntervalMass(ci: number): number {
  if (typeof ci !== 'number' || !Number.isFinite(ci) || ci <= 0 || ci > 1) {
    throw new InvalidIntervalMassError(ci);
  }
  return ci;
}

/**
 * Two-sided credible interval containing `ci` of the draws
 */
export function credibleInterval(
  values: readonly number[],
  ci: number,
  method: IntervalMethod = 'eti'
): CredibleInterval {
  validateIntervalMass(ci);
  if (values.length === 0) {
    throw new EmptyInputError('Cannot compute a credible interval of zero draws', { ci });
  }
  const sorted = Float64Array.from(values).sort();

  if (method === 'hdi') {
    return { ci, ...highestDensityInterval(sorted, ci) };
  }
  return {
    ci,
    low: quantileOf(sorted, (1 - ci) / 2),
    high: quantileOf(sorted, (1 + ci) / 2),
  };
}

/**
 * Shortest window spanning ceil(ci * n) sorted draws.
 * With equal widths the rightmost window wins.
 */
function highestDensityInterval(sorted: Float64Array, ci: number): { low: number; high: number } {
  const n = sorted.length;
  const window = Math.ceil(ci * n);
  const candidates = n - window;

  if (window < 2 || candidates < 1) {
    return { low: sorted[0], high: sorted[n - 1] };
  }

  let best = 0;
  let bestWidth = Infinity;
  for (let i = 0; i < candidates; i++) {
    const width = sorted[i + window] - sorted[i];
    if (width <= bestWidth) {
      bestWidth = width;
      best = i;
    }
  }
  return { low: sorted[best], high: sorted[best + window] };
}
