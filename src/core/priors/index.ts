export type { PriorFamily, PriorSpec, PriorSimulationOptions } from './simulatePrior';
export { simulatePrior, DEFAULT_PRIOR_SIMULATION_OPTIONS } from './simulatePrior';
