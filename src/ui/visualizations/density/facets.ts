import { uniqueInOrder } from '../../../core/data';
import type { FacetCell, FacetColumn, FacetSpec } from './types';

type Facetable = Partial<Record<FacetColumn, string>>;

export function facetKey(row: Facetable, by: readonly FacetColumn[]): string {
  return JSON.stringify(by.map(c => row[c] ?? null));
}

function facetLabel(row: Facetable, by: readonly FacetColumn[]): string {
  return by
    .map(c => row[c])
    .filter((v): v is string => v !== undefined && v !== '')
    .join(', ');
}

/**
 * Wrap the distinct facet values, in order of first appearance, into a
 * grid of `columns` columns filled row by row.
 */
export function buildFacets(rows: readonly Facetable[], by: FacetColumn[], columns: number): FacetSpec {
  const firstRows = new Map<string, Facetable>();
  for (const row of rows) {
    const key = facetKey(row, by);
    if (!firstRows.has(key)) firstRows.set(key, row);
  }

  const cells: FacetCell[] = uniqueInOrder(firstRows.keys()).map((key, i) => {
    const first = firstRows.get(key) ?? {};
    return {
      key,
      label: facetLabel(first, by),
      column: i % columns,
      row: Math.floor(i / columns),
    };
  });

  return { by, columns, cells };
}

/**
 * Number of grid rows a facet spec occupies
 */
export function facetRowCount(facet: FacetSpec | null): number {
  if (!facet || facet.cells.length === 0) return 1;
  return Math.max(...facet.cells.map(c => c.row)) + 1;
}
