import { hasColumn, normalizeSampleTable } from '../../../../core/data';
import type { RawSampleTable, SampleRow } from '../../../../core/data';
import { EmptyInputError } from '../../../../core/errors';
import { cleanParameterLabels, removeIntercept } from '../../../../core/parameters';
import { summarizeDensity } from '../../../../domain/density';
import type { DensitySummary, SummaryRow } from '../../../../domain/density';
import { ColorSchemes, getSeriesColor } from '../../base/colors';
import { buildFacets, facetKey } from '../facets';
import {
  DEFAULT_DENSITY_CHART_OPTIONS,
  type ChartLayer,
  type ChartSpec,
  type ColorSpec,
  type DensityChartOptions,
  type FacetColumn,
  type FacetSpec,
  type IntervalMark,
} from '../types';
import {
  chartDimensions,
  densityRows,
  maxDensityOf,
  parameterAxis,
  requireFraction,
  requirePositive,
  requirePositiveInteger,
  toRidgePoints,
} from './chartUtils';

function isDensitySummary(input: DensitySummary | RawSampleTable): input is DensitySummary {
  return 'summary' in input && 'samples' in input;
}

function validateChartOptions(config: DensityChartOptions): void {
  requirePositiveInteger('nColumns', config.nColumns);
  requireFraction('priorsAlpha', config.priorsAlpha);
  requireFraction('posteriorsAlpha', config.posteriorsAlpha);
  requirePositive('sizeLine', config.sizeLine);
  requirePositive('sizePoint', config.sizePoint);
  requirePositive('ridgeScale', config.ridgeScale);
  requirePositive('width', config.width);
  if (config.height !== undefined) requirePositive('height', config.height);
}

/**
 * Facet only when Effects or Component takes more than one value
 */
function facetColumns(result: DensitySummary): FacetColumn[] {
  const { samples } = result;
  const candidates = (['Effects', 'Component'] as const).filter(c => hasColumn(samples, c));
  const varies = candidates.some(c => new Set(samples.rows.map(r => r[c])).size > 1);
  return varies ? [...candidates] : [];
}

/**
 * Chart of posterior densities: stacked lines, or one ridge per parameter
 * with its credible interval and point estimate.
 *
 * Accepts a summarized result, or a sample table that is summarized with
 * the chart's `centrality` and `ci`.
 */
export function buildDensityChart(
  input: DensitySummary | RawSampleTable,
  options: Partial<DensityChartOptions> = {}
): ChartSpec {
  const config = { ...DEFAULT_DENSITY_CHART_OPTIONS, ...options };
  validateChartOptions(config);

  const result = isDensitySummary(input)
    ? input
    : summarizeDensity(input, { centrality: config.centrality, ci: config.ci });

  const by = facetColumns(result);
  const labels = cleanParameterLabels(result.parameterLevels, { grid: by.length > 0 });

  const rows = removeIntercept(densityRows(result.samples), config.showIntercept);
  if (rows.length === 0) {
    throw new EmptyInputError('No parameters left to plot after removing intercepts');
  }
  const present = new Set(rows.map(r => r.Parameter));
  const levels = result.parameterLevels.filter(p => present.has(p));
  const single = levels.length === 1;

  const facet: FacetSpec | null = by.length > 0 ? buildFacets(rows, by, config.nColumns) : null;
  const facetOf = (row: SampleRow | SummaryRow): string | undefined =>
    facet ? facetKey(row, by) : undefined;

  const levelLabels: Record<string, string> = {};
  for (const level of levels) levelLabels[level] = labels[level] ?? level;

  const base = {
    title: result.metadata.title,
    facet,
    dimensions: chartDimensions(config.width, config.height, facet),
  };

  if (config.stack) {
    const color: ColorSpec = {
      domain: levels,
      range: levels.map((_, i) => getSeriesColor(i)),
      labels: levelLabels,
      legend: !single,
    };
    return {
      kind: 'stacked',
      ...base,
      axes: {
        x: { label: result.metadata.xlab },
        y: { label: result.metadata.ylab, ticks: null },
      },
      color,
      layers: [
        {
          type: 'line',
          data: rows.map(row => withFacet(row, facetOf(row))),
          strokeWidth: config.sizeLine,
        },
      ],
    };
  }

  const positions = new Map(levels.map((p, i) => [p, i]));
  const priorRows = priorDensityRows(config, present);
  const maxDensity = Math.max(maxDensityOf(rows), maxDensityOf(priorRows));

  // priors carry no Effects/Component; they sit in their parameter's facet
  const facetByParameter = new Map<string, string | undefined>();
  for (const row of rows) {
    if (!facetByParameter.has(row.Parameter)) facetByParameter.set(row.Parameter, facetOf(row));
  }

  const layers: ChartLayer[] = [];
  if (priorRows.length > 0) {
    layers.push({
      type: 'ridgeline',
      series: 'Prior',
      opacity: config.priorsAlpha,
      data: toRidgePoints(priorRows, positions, maxDensity, config.ridgeScale, r =>
        facetByParameter.get(r.Parameter)
      ),
    });
  }
  layers.push({
    type: 'ridgeline',
    series: 'Posterior',
    opacity: config.posteriorsAlpha,
    data: toRidgePoints(rows, positions, maxDensity, config.ridgeScale, facetOf),
  });

  const marks: IntervalMark[] = [];
  for (const row of removeIntercept(result.summary, config.showIntercept)) {
    const position = positions.get(row.Parameter);
    if (position === undefined) continue;
    const mark: IntervalMark = { ...row, position };
    const key = facetOf(row);
    if (key !== undefined) mark.facet = key;
    marks.push(mark);
  }
  layers.push(
    { type: 'errorbar', series: 'Posterior', data: marks, strokeWidth: config.sizeLine },
    {
      type: 'point',
      series: 'Posterior',
      data: marks,
      radius: config.sizePoint,
      fill: ColorSchemes.pointFill,
    }
  );

  const withPriors = priorRows.length > 0;
  const color: ColorSpec = withPriors
    ? {
        domain: ['Posterior', 'Prior'],
        range: [ColorSchemes.comparison.posterior, ColorSchemes.comparison.prior],
        labels: { Posterior: 'Posterior', Prior: 'Prior' },
        legend: true,
      }
    : {
        domain: ['Posterior'],
        range: [ColorSchemes.neutral],
        labels: { Posterior: 'Posterior' },
        legend: false,
      };

  return {
    kind: 'ridge',
    ...base,
    axes: {
      x: { label: result.metadata.xlab },
      y: parameterAxis(result.metadata.ylab, levels, levelLabels, !single),
    },
    color,
    layers,
  };
}

function withFacet<T extends object>(row: T, facet: string | undefined): T & { facet?: string } {
  return facet === undefined ? { ...row } : { ...row, facet };
}

/**
 * Prior density rows for the parameters being drawn
 */
function priorDensityRows(config: DensityChartOptions, present: ReadonlySet<string>): SampleRow[] {
  if (!config.priors || config.priors.rows.length === 0) return [];
  const priors = normalizeSampleTable(config.priors);
  return removeIntercept(densityRows(priors), config.showIntercept).filter(r => present.has(r.Parameter));
}
