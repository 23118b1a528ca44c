import type { SummaryRow } from '../../../domain/density';
import type { SampleRow, SampleTable } from '../../../core/data';

/**
 * Declarative chart specification.
 *
 * Builders produce it from density tables; renderers turn it into a
 * concrete chart. Every row of a faceted chart carries its facet key.
 */

export type FacetColumn = 'Effects' | 'Component' | 'Group';

export interface FacetCell {
  key: string;
  label: string;
  column: number;
  row: number;
}

export interface FacetSpec {
  by: FacetColumn[];
  columns: number;
  cells: FacetCell[];
}

export interface LinePoint extends SampleRow {
  facet?: string;
}

/** A density point lifted onto its parameter's row */
export interface RidgePoint {
  x: number;
  baseline: number;
  top: number;
  Parameter: string;
  facet?: string;
}

export interface IntervalMark extends SummaryRow {
  position: number;
  facet?: string;
}

export interface LineLayer {
  type: 'line';
  data: LinePoint[];
  strokeWidth: number;
}

export interface RidgelineLayer {
  type: 'ridgeline';
  data: RidgePoint[];
  /** Legend entry of this layer: Posterior or Prior */
  series: string;
  opacity: number;
}

export interface ErrorBarLayer {
  type: 'errorbar';
  data: IntervalMark[];
  series: string;
  strokeWidth: number;
}

export interface PointLayer {
  type: 'point';
  data: IntervalMark[];
  series: string;
  radius: number;
  fill: string;
}

export type ChartLayer = LineLayer | RidgelineLayer | ErrorBarLayer | PointLayer;

export interface AxisTick {
  position: number;
  label: string;
}

export interface AxisSpec {
  label: string | null;
  /** null: no ticks at all */
  ticks?: AxisTick[] | null;
}

/**
 * Color scale: by parameter for stacked lines, by series (Posterior/Prior)
 * for ridges
 */
export interface ColorSpec {
  domain: string[];
  range: string[];
  /** Legend text per domain value */
  labels: Record<string, string>;
  legend: boolean;
}

export interface ChartSpec {
  kind: 'stacked' | 'ridge';
  title: string;
  axes: { x: AxisSpec; y: AxisSpec };
  color: ColorSpec;
  layers: ChartLayer[];
  facet: FacetSpec | null;
  dimensions: { width: number; height: number };
}

export interface DensityChartOptions {
  /** Stacked lines; ridgelines with summary overlays when false */
  stack: boolean;
  showIntercept: boolean;
  /** Facet columns; facets are only used when Effects or Component vary */
  nColumns: number;
  /** Prior density curves drawn behind the posterior ridges */
  priors?: SampleTable;
  priorsAlpha: number;
  posteriorsAlpha: number;
  sizeLine: number;
  sizePoint: number;
  /** Tallest ridge height, in rows */
  ridgeScale: number;
  centrality: string;
  ci: number;
  width: number;
  height?: number;
}

export const DEFAULT_DENSITY_CHART_OPTIONS: DensityChartOptions = {
  stack: true,
  showIntercept: false,
  nColumns: 1,
  priorsAlpha: 0.4,
  posteriorsAlpha: 0.7,
  sizeLine: 0.9,
  sizePoint: 2,
  ridgeScale: 0.9,
  centrality: 'median',
  ci: 0.95,
  width: 640,
};

export interface DensityDfChartOptions {
  stack: boolean;
  nColumns: number;
  sizeLine: number;
  ridgeScale: number;
  width: number;
  height?: number;
}

export const DEFAULT_DENSITY_DF_CHART_OPTIONS: DensityDfChartOptions = {
  stack: true,
  nColumns: 1,
  sizeLine: 0.9,
  ridgeScale: 0.9,
  width: 640,
};

/** Height of one facet cell when none is given */
export const DEFAULT_CELL_HEIGHT = 400;
