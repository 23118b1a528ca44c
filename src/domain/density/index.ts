export { summarizeDensity } from './summarizeDensity';
export type {
  SummaryRow,
  PlotMetadata,
  DensitySummary,
  UnmatchedPolicy,
  SummaryOptions,
} from './types';
export { DEFAULT_SUMMARY_OPTIONS, DENSITY_METADATA } from './types';
