import { displayOrder, normalizeSampleTable } from '../../../../core/data';
import type { RawSampleTable, SampleRow } from '../../../../core/data';
import { EmptyInputError } from '../../../../core/errors';
import { ColorSchemes, getSeriesColor } from '../../base/colors';
import { DENSITY_METADATA } from '../../../../domain/density';
import { buildFacets, facetKey } from '../facets';
import {
  DEFAULT_DENSITY_DF_CHART_OPTIONS,
  type ChartSpec,
  type DensityDfChartOptions,
  type FacetColumn,
} from '../types';
import {
  chartDimensions,
  densityRows,
  maxDensityOf,
  parameterAxis,
  requirePositive,
  requirePositiveInteger,
  toRidgePoints,
} from './chartUtils';

const GROUP_FACET: FacetColumn[] = ['Group'];

/**
 * Chart of a plain table of density curves, without summary overlays.
 * Rows that carry a Group are wrapped into one facet per group.
 */
export function buildDensityDfChart(
  table: RawSampleTable,
  options: Partial<DensityDfChartOptions> = {}
): ChartSpec {
  const config = { ...DEFAULT_DENSITY_DF_CHART_OPTIONS, ...options };
  requirePositiveInteger('nColumns', config.nColumns);
  requirePositive('sizeLine', config.sizeLine);
  requirePositive('ridgeScale', config.ridgeScale);
  requirePositive('width', config.width);
  if (config.height !== undefined) requirePositive('height', config.height);

  if (table.rows.length === 0) {
    throw new EmptyInputError('Density table has no rows');
  }
  const rows = densityRows(normalizeSampleTable(table));
  const levels = displayOrder(rows.map(r => r.Parameter));
  const single = levels.length === 1;
  const labels: Record<string, string> = {};
  for (const level of levels) labels[level] = level;

  const facet = rows.some(r => r.Group !== undefined)
    ? buildFacets(rows, GROUP_FACET, config.nColumns)
    : null;
  const facetOf = (row: SampleRow): string | undefined =>
    facet ? facetKey(row, GROUP_FACET) : undefined;

  const base = {
    title: DENSITY_METADATA.title,
    facet,
    dimensions: chartDimensions(config.width, config.height, facet),
  };

  if (config.stack) {
    return {
      kind: 'stacked',
      ...base,
      axes: {
        x: { label: DENSITY_METADATA.xlab },
        y: { label: DENSITY_METADATA.ylab, ticks: null },
      },
      color: {
        domain: levels,
        range: levels.map((_, i) => getSeriesColor(i)),
        labels,
        legend: !single,
      },
      layers: [
        {
          type: 'line',
          data: rows.map(row => {
            const key = facetOf(row);
            return key === undefined ? { ...row } : { ...row, facet: key };
          }),
          strokeWidth: config.sizeLine,
        },
      ],
    };
  }

  const positions = new Map(levels.map((p, i) => [p, i]));
  return {
    kind: 'ridge',
    ...base,
    axes: {
      x: { label: DENSITY_METADATA.xlab },
      y: parameterAxis(DENSITY_METADATA.ylab, levels, labels, !single),
    },
    color: {
      domain: ['Density'],
      range: [ColorSchemes.neutral],
      labels: { Density: 'Density' },
      legend: false,
    },
    layers: [
      {
        type: 'ridgeline',
        series: 'Density',
        opacity: 1,
        data: toRidgePoints(rows, positions, maxDensityOf(rows), config.ridgeScale, facetOf),
      },
    ],
  };
}
