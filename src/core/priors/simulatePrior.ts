import jStat from 'jstat';
import { RNG } from '../math/random';
import { PlotError, ErrorCode, EmptyInputError } from '../errors';

export type PriorFamily = 'normal' | 'student_t' | 'cauchy' | 'uniform';

/**
 * Prior of one parameter.
 * For `uniform` the support is Location ± Scale.
 */
export interface PriorSpec {
  Parameter: string;
  Distribution: PriorFamily;
  Location: number;
  Scale: number;
  /** Degrees of freedom, student_t only */
  df?: number;
}

export interface PriorSimulationOptions {
  /** Draws per parameter */
  n: number;
  /**
   * quantile: inverse CDF at i / (n + 1), i = 1..n, no randomness
   * random: inverse CDF at seeded uniform draws
   */
  method: 'quantile' | 'random';
  seed?: number;
}

export const DEFAULT_PRIOR_SIMULATION_OPTIONS: PriorSimulationOptions = {
  n: 1000,
  method: 'quantile',
};

function inverseCdf(prior: PriorSpec): (p: number) => number {
  const { Location: location, Scale: scale } = prior;
  switch (prior.Distribution) {
    case 'normal':
      return p => jStat.normal.inv(p, location, scale);
    case 'student_t': {
      const df = prior.df ?? 3;
      if (!(df > 0)) {
        throw new PlotError(ErrorCode.INVALID_PRIOR, `Prior of ${prior.Parameter} needs df > 0`, {
          parameter: prior.Parameter,
          df,
        });
      }
      return p => location + scale * jStat.studentt.inv(p, df);
    }
    case 'cauchy':
      return p => jStat.cauchy.inv(p, location, scale);
    case 'uniform':
      return p => jStat.uniform.inv(p, location - scale, location + scale);
  }
}

function validatePrior(prior: PriorSpec): void {
  const families: readonly string[] = ['normal', 'student_t', 'cauchy', 'uniform'];
  if (!families.includes(prior.Distribution)) {
    throw new PlotError(ErrorCode.INVALID_PRIOR, `Unknown prior family '${prior.Distribution}'`, {
      parameter: prior.Parameter,
      distribution: prior.Distribution,
    });
  }
  if (!Number.isFinite(prior.Location) || !(prior.Scale > 0) || !Number.isFinite(prior.Scale)) {
    throw new PlotError(ErrorCode.INVALID_PRIOR, `Prior of ${prior.Parameter} needs a finite location and a positive scale`, {
      parameter: prior.Parameter,
      location: prior.Location,
      scale: prior.Scale,
    });
  }
}

/**
 * Draws from each parameter's prior, keyed by parameter name.
 * Feed the result to estimateDensity to get prior density curves.
 */
export function simulatePrior(
  priors: readonly PriorSpec[],
  options: Partial<PriorSimulationOptions> = {}
): Record<string, number[]> {
  const config = { ...DEFAULT_PRIOR_SIMULATION_OPTIONS, ...options };
  if (priors.length === 0) {
    throw new EmptyInputError('No priors to simulate');
  }
  if (!Number.isInteger(config.n) || config.n < 1) {
    throw new PlotError(ErrorCode.INVALID_CONFIG, 'n must be a positive integer', { n: config.n });
  }

  const rng = config.method === 'random' ? new RNG(config.seed) : null;
  const probabilities = (): number[] =>
    rng ? rng.uniforms(config.n) : Array.from({ length: config.n }, (_, i) => (i + 1) / (config.n + 1));

  const draws: Record<string, number[]> = {};
  for (const prior of priors) {
    validatePrior(prior);
    const inv = inverseCdf(prior);
    draws[prior.Parameter] = probabilities().map(inv);
  }
  return draws;
}
