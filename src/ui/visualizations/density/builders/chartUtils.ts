import * as d3 from 'd3';
import { activeColumns } from '../../../../core/data';
import type { SampleRow, SampleTable } from '../../../../core/data';
import { PlotError, ErrorCode, ReshapeError } from '../../../../core/errors';
import { calculateKDE } from '../../../../core/stats';
import { DEFAULT_CELL_HEIGHT } from '../types';
import type { AxisSpec, FacetSpec, RidgePoint } from '../types';
import { facetRowCount } from '../facets';

/** Curve points per group when a chart has to estimate densities itself */
export const CHART_DENSITY_POINTS = 512;

export function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new PlotError(ErrorCode.INVALID_CONFIG, `${name} must be a positive integer`, { [name]: value });
  }
}

export function requireFraction(name: string, value: number): void {
  if (!(value >= 0 && value <= 1)) {
    throw new PlotError(ErrorCode.INVALID_CONFIG, `${name} must be between 0 and 1`, { [name]: value });
  }
}

export function requirePositive(name: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new PlotError(ErrorCode.INVALID_CONFIG, `${name} must be a positive number`, { [name]: value });
  }
}

/**
 * Rows with a density value. Raw draws are turned into density curves per
 * group (Parameter, Effects, Component), keeping each group's labels.
 */
export function densityRows(table: SampleTable): SampleRow[] {
  const withDensity = table.rows.filter(r => r.y !== undefined).length;
  if (withDensity === table.rows.length) return table.rows;
  if (withDensity > 0) {
    throw new ReshapeError('Table mixes density points and raw draws', {
      withDensity,
      rows: table.rows.length,
    });
  }

  const columns = activeColumns(table.columns);
  const groups = d3.group(table.rows, r => JSON.stringify(columns.map(c => r[c] ?? null)));

  const rows: SampleRow[] = [];
  for (const members of groups.values()) {
    const first = members[0];
    const values = members.map(r => r.x);
    const [min = 0, max = 0] = d3.extent(values);
    const pad = (max - min) * 0.1;
    const curve = calculateKDE(values, { points: CHART_DENSITY_POINTS, from: min - pad, to: max + pad });
    for (const point of curve) {
      rows.push({ ...first, x: point.x, y: point.y });
    }
  }
  return rows;
}

/**
 * Lift density points onto their parameter's row. Heights are relative to
 * `maxDensity` so the tallest ridge spans `scale` rows.
 */
export function toRidgePoints(
  rows: readonly SampleRow[],
  positions: ReadonlyMap<string, number>,
  maxDensity: number,
  scale: number,
  facetOf: (row: SampleRow) => string | undefined
): RidgePoint[] {
  const points: RidgePoint[] = [];
  for (const row of rows) {
    const baseline = positions.get(row.Parameter);
    if (baseline === undefined) continue;
    const height = maxDensity > 0 ? ((row.y ?? 0) / maxDensity) * scale : 0;
    const point: RidgePoint = { x: row.x, baseline, top: baseline + height, Parameter: row.Parameter };
    const facet = facetOf(row);
    if (facet !== undefined) point.facet = facet;
    points.push(point);
  }
  return points;
}

export function maxDensityOf(rows: readonly SampleRow[]): number {
  return d3.max(rows, r => r.y) ?? 0;
}

/**
 * Continuous axis without ticks, or one tick per parameter row
 */
export function parameterAxis(
  label: string | null,
  levels: readonly string[],
  labels: Readonly<Record<string, string>>,
  discrete: boolean
): AxisSpec {
  if (!discrete) return { label, ticks: null };
  return {
    label,
    ticks: levels.map((parameter, position) => ({ position, label: labels[parameter] ?? parameter })),
  };
}

export function chartDimensions(
  width: number,
  height: number | undefined,
  facet: FacetSpec | null
): { width: number; height: number } {
  return { width, height: height ?? DEFAULT_CELL_HEIGHT * facetRowCount(facet) };
}
