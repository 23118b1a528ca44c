export type { Centrality } from './pointEstimate';
export { MAP_PRECISION, parseCentrality, pointEstimate, mapEstimate, quantileOf } from './pointEstimate';

export type { IntervalMethod, CredibleInterval } from './credibleInterval';
export { credibleInterval, validateIntervalMass } from './credibleInterval';

export type { DensityPoint, KDEOptions, DensityEstimateOptions } from './density';
export {
  calculateKDE,
  silvermanBandwidth,
  estimateDensity,
  DEFAULT_DENSITY_ESTIMATE_OPTIONS,
} from './density';
