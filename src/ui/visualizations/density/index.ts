export type {
  FacetColumn,
  FacetCell,
  FacetSpec,
  LinePoint,
  RidgePoint,
  IntervalMark,
  LineLayer,
  RidgelineLayer,
  ErrorBarLayer,
  PointLayer,
  ChartLayer,
  AxisTick,
  AxisSpec,
  ColorSpec,
  ChartSpec,
  DensityChartOptions,
  DensityDfChartOptions,
} from './types';
export {
  DEFAULT_DENSITY_CHART_OPTIONS,
  DEFAULT_DENSITY_DF_CHART_OPTIONS,
  DEFAULT_CELL_HEIGHT,
} from './types';

export { buildFacets, facetKey, facetRowCount } from './facets';
export { buildDensityChart } from './builders/densityChart';
export { buildDensityDfChart } from './builders/densityDfChart';

export type { RenderOptions } from './renderers/observablePlot';
export { toPlotOptions, renderChart } from './renderers/observablePlot';
