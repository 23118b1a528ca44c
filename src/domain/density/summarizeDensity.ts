import {
  normalizeSampleTable,
  activeColumns,
  displayOrder,
  uniqueInOrder,
} from '../../core/data';
import type { GroupingColumn, RawSampleTable, SampleRow, SampleTable } from '../../core/data';
import { EmptyInputError, ReshapeError } from '../../core/errors';
import { fixFacetNames, fixGroupedNames, indexClassification } from '../../core/parameters';
import type { ParameterInfo } from '../../core/parameters';
import {
  credibleInterval,
  parseCentrality,
  pointEstimate,
  validateIntervalMass,
} from '../../core/stats';
import type { Centrality, IntervalMethod } from '../../core/stats';
import {
  DEFAULT_SUMMARY_OPTIONS,
  DENSITY_METADATA,
  type DensitySummary,
  type SummaryOptions,
  type SummaryRow,
  type UnmatchedPolicy,
} from './types';

/**
 * Reshape a table of draws or density points and summarize each
 * Parameter × Effects × Component group with a point estimate and a
 * credible interval.
 *
 * @example
 * ```typescript
 * const result = summarizeDensity(
 *   { columns: ['Parameter'], rows },
 *   { centrality: 'mean', ci: 0.89 }
 * );
 * result.summary; // one row per parameter
 * ```
 */
export function summarizeDensity(
  table: RawSampleTable,
  options: Partial<SummaryOptions> = {}
): DensitySummary {
  const config = { ...DEFAULT_SUMMARY_OPTIONS, ...options };

  if (table.rows.length === 0) {
    throw new EmptyInputError('Sample table has no rows');
  }
  const centrality = parseCentrality(config.centrality);
  const ci = validateIntervalMass(config.ci);

  let samples = normalizeSampleTable(table);
  let classified = false;
  if (config.classification) {
    samples = joinClassification(samples, config.classification, config.onUnmatched);
    classified = true;
  }

  samples = {
    columns: samples.columns,
    rows: fixGroupedNames(fixFacetNames(samples.rows, samples.columns)),
  };

  const parameterLevels = displayOrder(samples.rows.map(r => r.Parameter));
  const summary = summarizeBuckets(samples, parameterLevels, centrality, ci, config.ciMethod);

  return {
    samples,
    summary,
    metadata: { ...DENSITY_METADATA },
    parameterLevels,
    classified,
  };
}

/**
 * Left join of Effects and Component by Parameter
 */
function joinClassification(
  samples: SampleTable,
  classification: readonly ParameterInfo[],
  policy: UnmatchedPolicy
): SampleTable {
  const byName = indexClassification(classification);
  const unmatched = uniqueInOrder(
    samples.rows.map(r => r.Parameter).filter(p => !byName.has(p))
  );

  if (unmatched.length > 0 && policy === 'error') {
    throw new ReshapeError(
      `No classification for parameter(s): ${unmatched.join(', ')}`,
      { unmatched }
    );
  }

  const rows: SampleRow[] = [];
  for (const row of samples.rows) {
    const info = byName.get(row.Parameter);
    if (!info) continue;
    rows.push({ ...row, Effects: info.Effects, Component: info.Component });
  }

  if (unmatched.length > 0) {
    console.warn(
      `⚠️ summarizeDensity: dropped ${samples.rows.length - rows.length} row(s) of unclassified parameter(s): ${unmatched.join(', ')}`
    );
  }
  if (rows.length === 0) {
    throw new EmptyInputError('No rows left after joining classification', { unmatched });
  }

  const columns: GroupingColumn[] = [...samples.columns, 'Effects', 'Component'];
  return { columns: activeColumns(columns), rows };
}

function bucketKey(row: SampleRow, columns: readonly GroupingColumn[]): string {
  return JSON.stringify(columns.map(c => row[c] ?? null));
}

/**
 * One summary row per non-empty bucket, ordered by parameter level,
 * then by first appearance of Effects and Component.
 */
function summarizeBuckets(
  samples: SampleTable,
  parameterLevels: readonly string[],
  centrality: Centrality,
  ci: number,
  method: IntervalMethod
): SummaryRow[] {
  const columns = activeColumns(samples.columns);
  const buckets = new Map<string, { first: SampleRow; values: number[] }>();
  for (const row of samples.rows) {
    const key = bucketKey(row, columns);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.values.push(row.x);
    } else {
      buckets.set(key, { first: row, values: [row.x] });
    }
  }

  const levelIndex = new Map(parameterLevels.map((p, i) => [p, i]));
  const effectsOrder = firstSeenIndex(samples.rows, 'Effects');
  const componentOrder = firstSeenIndex(samples.rows, 'Component');
  const rank = (row: SampleRow): [number, number, number] => [
    levelIndex.get(row.Parameter) ?? 0,
    row.Effects !== undefined ? effectsOrder.get(row.Effects) ?? 0 : 0,
    row.Component !== undefined ? componentOrder.get(row.Component) ?? 0 : 0,
  ];

  const ordered = [...buckets.values()]
    .filter(b => b.values.length > 0)
    .sort((a, b) => {
      const ra = rank(a.first);
      const rb = rank(b.first);
      return ra[0] - rb[0] || ra[1] - rb[1] || ra[2] - rb[2];
    });

  return ordered.map(({ first, values }) => {
    const interval = credibleInterval(values, ci, method);
    let estimate = pointEstimate(values, centrality);
    // a mean or a KDE peak can sit outside a narrow interval on skewed draws
    estimate = Math.min(Math.max(estimate, interval.low), interval.high);

    const out: SummaryRow = {
      Parameter: first.Parameter,
      x: estimate,
      CI_low: interval.low,
      CI_high: interval.high,
    };
    if (columns.includes('Effects') && first.Effects !== undefined) out.Effects = first.Effects;
    if (columns.includes('Component') && first.Component !== undefined) out.Component = first.Component;
    return out;
  });
}

function firstSeenIndex(rows: readonly SampleRow[], column: 'Effects' | 'Component'): Map<string, number> {
  const order = new Map<string, number>();
  for (const row of rows) {
    const value = row[column];
    if (value !== undefined && !order.has(value)) order.set(value, order.size);
  }
  return order;
}
