import type { SampleTable } from '../../core/data';
import type { IntervalMethod } from '../../core/stats';
import type { ParameterInfo } from '../../core/parameters';

export interface SummaryRow {
  Parameter: string;
  /** Point estimate */
  x: number;
  CI_low: number;
  CI_high: number;
  Effects?: string;
  Component?: string;
}

/**
 * Axis, legend and title labels for rendering
 */
export interface PlotMetadata {
  xlab: string;
  ylab: string;
  legendFill: string;
  legendColor: string;
  title: string;
}

export const DENSITY_METADATA: Readonly<PlotMetadata> = {
  xlab: 'Values',
  ylab: 'Density',
  legendFill: 'Parameter',
  legendColor: 'Parameter',
  title: 'Estimated Density Function',
};

/**
 * Reshaped samples with their summary overlay.
 *
 * `parameterLevels` is the display order shared by `samples` and
 * `summary`: first-seen parameter last.
 */
export interface DensitySummary {
  samples: SampleTable;
  summary: SummaryRow[];
  metadata: PlotMetadata;
  parameterLevels: string[];
  /** True when classification metadata was joined in */
  classified: boolean;
}

/**
 * error: throw ReshapeError listing the unmatched parameters
 * drop: remove their rows and warn
 */
export type UnmatchedPolicy = 'error' | 'drop';

export interface SummaryOptions {
  /** median, mean or MAP (alias mode) */
  centrality: string;
  ci: number;
  ciMethod: IntervalMethod;
  /** Effects/Component per parameter, joined by Parameter */
  classification?: readonly ParameterInfo[];
  onUnmatched: UnmatchedPolicy;
}

export const DEFAULT_SUMMARY_OPTIONS: SummaryOptions = {
  centrality: 'median',
  ci: 0.95,
  ciMethod: 'eti',
  onUnmatched: 'error',
};
