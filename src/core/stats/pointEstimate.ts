import * as d3 from 'd3';
import { EmptyInputError, UnknownCentralityError } from '../errors';
import { calculateKDE, silvermanBandwidth } from './density';

export type Centrality = 'median' | 'mean' | 'MAP';

/** Grid size used to locate the density peak */
export const MAP_PRECISION = 1024;

const CENTRALITY_ALIASES: Record<string, Centrality> = {
  median: 'median',
  mean: 'mean',
  MAP: 'MAP',
  map: 'MAP',
  mode: 'MAP',
};

/**
 * Resolve a user-supplied centrality name
 */
export function parseCentrality(value: string): Centrality {
  const centrality = Object.prototype.hasOwnProperty.call(CENTRALITY_ALIASES, value)
    ? CENTRALITY_ALIASES[value]
    : undefined;
  if (centrality === undefined) {
    throw new UnknownCentralityError(value);
  }
  return centrality;
}

/**
 * Point estimate of a set of draws.
 *
 * Draws are sorted before any arithmetic so the result does not depend on
 * their order. The mean uses an exact sum for the same reason.
 */
export function pointEstimate(values: readonly number[], centrality: Centrality): number {
  if (values.length === 0) {
    throw new EmptyInputError('Cannot compute a point estimate of zero draws');
  }
  const sorted = Float64Array.from(values).sort();

  switch (centrality) {
    case 'mean':
      return d3.fsum(sorted) / sorted.length;
    case 'median':
      return quantileOf(sorted, 0.5);
    case 'MAP':
      return mapEstimate(sorted);
  }
}

/**
 * Maximum a posteriori estimate: the peak of a Gaussian KDE over the
 * draws' range. Ties resolve to the leftmost grid point.
 */
export function mapEstimate(sorted: Float64Array): number {
  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  if (min === max) return min;

  const curve = calculateKDE(sorted, {
    points: MAP_PRECISION,
    bandwidth: silvermanBandwidth(sorted),
    from: min,
    to: max,
  });

  let best = curve[0];
  for (const point of curve) {
    if (point.y > best.y) best = point;
  }
  return best.x;
}

/**
 * R-7 quantile of sorted values (linear interpolation, as d3 does)
 */
export function quantileOf(sorted: ArrayLike<number>, p: number): number {
  const q = d3.quantileSorted(sorted, p);
  if (q === undefined) {
    throw new EmptyInputError('Cannot compute a quantile of zero draws', { p });
  }
  return q;
}
