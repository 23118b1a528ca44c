/**
 * Sample Table model
 *
 * Long-format draws (or density curve points) per parameter. The table's
 * schema lists which grouping columns exist, so code never probes rows to
 * find out whether Effects or Component are present.
 */

import { ReshapeError } from '../errors';

/**
 * Grouping columns, in their fixed precedence
 */
export const GROUPING_COLUMNS = ['Parameter', 'Effects', 'Component'] as const;

export type GroupingColumn = (typeof GROUPING_COLUMNS)[number];

/**
 * Label given to every row of a table that declares no Parameter column
 */
export const DEFAULT_PARAMETER = 'Distribution';

export interface SampleRow {
  /** Draw value, or the x position of a density curve point */
  x: number;
  /** Density at x, only for curve points */
  y?: number;
  Parameter: string;
  Effects?: string;
  Component?: string;
  /** Grouping prefix split off a `group[param]` name */
  Group?: string;
  /** Display label split off a `group[param]` name */
  Label?: string;
}

export interface SampleTable {
  columns: GroupingColumn[];
  rows: SampleRow[];
}

/**
 * Input row: Parameter may be missing when the table does not declare it
 */
export type RawSampleRow = Omit<SampleRow, 'Parameter'> & { Parameter?: string };

export interface RawSampleTable {
  columns: GroupingColumn[];
  rows: RawSampleRow[];
}

export function hasColumn(table: { columns: readonly GroupingColumn[] }, column: GroupingColumn): boolean {
  return table.columns.includes(column);
}

/**
 * Declared grouping columns in precedence order, without duplicates
 */
export function activeColumns(columns: readonly GroupingColumn[]): GroupingColumn[] {
  return GROUPING_COLUMNS.filter(c => columns.includes(c));
}

/**
 * Check a raw table against its schema and fill the Parameter column.
 *
 * Values of undeclared grouping columns are dropped so that the schema is
 * the only source of truth downstream.
 */
export function normalizeSampleTable(table: RawSampleTable): SampleTable {
  const declaresParameter = hasColumn(table, 'Parameter');
  const declaresEffects = hasColumn(table, 'Effects');
  const declaresComponent = hasColumn(table, 'Component');

  const rows = table.rows.map((row, index): SampleRow => {
    if (!Number.isFinite(row.x)) {
      throw new ReshapeError(`Row ${index} has a non-finite x value`, { row: index, x: row.x });
    }

    let parameter = DEFAULT_PARAMETER;
    if (declaresParameter) {
      if (typeof row.Parameter !== 'string') {
        throw missingValue('Parameter', index);
      }
      parameter = row.Parameter;
    }

    const out: SampleRow = { x: row.x, Parameter: parameter };
    if (row.y !== undefined) out.y = row.y;
    if (row.Group !== undefined) out.Group = row.Group;
    if (row.Label !== undefined) out.Label = row.Label;

    if (declaresEffects) {
      if (typeof row.Effects !== 'string') throw missingValue('Effects', index);
      out.Effects = row.Effects;
    }
    if (declaresComponent) {
      if (typeof row.Component !== 'string') throw missingValue('Component', index);
      out.Component = row.Component;
    }
    return out;
  });

  const columns = activeColumns(table.columns);
  return {
    columns: declaresParameter ? columns : ['Parameter', ...columns],
    rows,
  };
}

function missingValue(column: GroupingColumn, row: number): ReshapeError {
  return new ReshapeError(`Row ${row} has no value for declared column ${column}`, { column, row });
}

/**
 * Display ordering of a factor: distinct values in order of first
 * appearance, reversed, so the first-seen level is drawn last (on top).
 *
 * Both the sample rows and the summary rows are laid out with this one
 * ordering so that curves and overlays line up.
 */
export function displayOrder(values: Iterable<string>): string[] {
  return [...new Set(values)].reverse();
}

/**
 * Distinct values in order of first appearance
 */
export function uniqueInOrder<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}
