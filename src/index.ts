/**
 * posterior-plot - chart specifications for posterior density summaries
 *
 * Reshapes long-format posterior draws, summarizes each parameter with a
 * point estimate and a credible interval, and builds stacked or ridge
 * density charts rendered with Observable Plot.
 */

// Error handling
export {
  PlotError,
  ErrorCode,
  EmptyInputError,
  UnknownCentralityError,
  InvalidIntervalMassError,
  ReshapeError,
  isPlotError,
  wrapError,
} from './core/errors';

// Sample Table model
export * from './core/data';

// Posterior statistics
export * from './core/stats';

// Parameter names and classification
export * from './core/parameters';

// Prior simulation
export * from './core/priors';

// Random number generation
export { RNG } from './core/math/random';

// Density summarizer
export * from './domain/density';

// Charts
export * from './ui/visualizations';

// Version
export const VERSION = '0.1.0';
